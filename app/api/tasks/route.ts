import { NextRequest } from 'next/server';
import { booleanParam, fail, numberParam, ok, readJson, searchParam } from '@/lib/api';
import { getStore } from '@/lib/store';
import { parseInput, prioritySchema, taskCreateSchema } from '@/lib/validation';

export const runtime = 'nodejs';

export async function GET(req: NextRequest) {
  try {
    const tasks = getStore().tasks.list({
      date: searchParam(req, 'date'),
      from: searchParam(req, 'from'),
      to: searchParam(req, 'to'),
      category: searchParam(req, 'category'),
      completed: booleanParam(req, 'completed'),
      priority: parseInput(prioritySchema.optional(), numberParam(req, 'priority')),
    });
    return ok(tasks);
  } catch (e) {
    return fail(e, 'api/tasks');
  }
}

export async function POST(req: NextRequest) {
  try {
    const input = parseInput(taskCreateSchema, await readJson(req));
    return ok(getStore().tasks.create(input), 201);
  } catch (e) {
    return fail(e, 'api/tasks');
  }
}
