import { NextRequest } from 'next/server';
import { fail, ok, readJson } from '@/lib/api';
import { getStore } from '@/lib/store';
import { exerciseCreateSchema, parseInput } from '@/lib/validation';

export const runtime = 'nodejs';

export async function GET() {
  try {
    return ok(getStore().exercises.list());
  } catch (e) {
    return fail(e, 'api/exercises');
  }
}

export async function POST(req: NextRequest) {
  try {
    const store = getStore();
    const input = parseInput(exerciseCreateSchema(store.schemaVersion), await readJson(req));
    return ok(store.exercises.create(input), 201);
  } catch (e) {
    return fail(e, 'api/exercises');
  }
}
