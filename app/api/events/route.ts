import { NextRequest } from 'next/server';
import { fail, numberParam, ok, readJson, searchParam } from '@/lib/api';
import { getStore } from '@/lib/store';
import { eventCreateSchema, parseInput } from '@/lib/validation';

export const runtime = 'nodejs';

export async function GET(req: NextRequest) {
  try {
    const { events } = getStore();
    const keyword = searchParam(req, 'q');
    if (keyword !== undefined) {
      return ok(events.search(keyword));
    }
    const past = numberParam(req, 'past');
    if (past !== undefined) {
      return ok(events.listPast(past));
    }
    return ok(
      events.list({
        date: searchParam(req, 'date'),
        from: searchParam(req, 'from'),
        to: searchParam(req, 'to'),
      })
    );
  } catch (e) {
    return fail(e, 'api/events');
  }
}

export async function POST(req: NextRequest) {
  try {
    const input = parseInput(eventCreateSchema, await readJson(req));
    return ok(getStore().events.create(input), 201);
  } catch (e) {
    return fail(e, 'api/events');
  }
}
