import { NextRequest } from 'next/server';
import { fail, numberParam, ok, readJson, searchParam } from '@/lib/api';
import { getStore } from '@/lib/store';
import { ValidationError } from '@/lib/errors';
import { parseInput, pointsSchema } from '@/lib/validation';

export const runtime = 'nodejs';

export async function GET(req: NextRequest) {
  try {
    const { points } = getStore();
    const year = numberParam(req, 'year');
    const month = numberParam(req, 'month');
    if (year !== undefined || month !== undefined) {
      if (year === undefined || month === undefined) {
        throw new ValidationError('year and month must be given together');
      }
      return ok({ summary: points.getMonthSummary(year, month) });
    }
    return ok(points.list({ from: searchParam(req, 'from'), to: searchParam(req, 'to') }));
  } catch (e) {
    return fail(e, 'api/points');
  }
}

// Upsert: one row per date, score recomputed on every write
export async function PUT(req: NextRequest) {
  try {
    const input = parseInput(pointsSchema, await readJson(req));
    return ok(getStore().points.record(input));
  } catch (e) {
    return fail(e, 'api/points');
  }
}
