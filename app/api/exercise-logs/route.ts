import { NextRequest } from 'next/server';
import { fail, numberParam, ok, searchParam } from '@/lib/api';
import { getStore } from '@/lib/store';

export const runtime = 'nodejs';

export async function GET(req: NextRequest) {
  try {
    const { exercises } = getStore();
    const date = searchParam(req, 'date');
    const exerciseId = numberParam(req, 'exerciseId');

    if (date !== undefined) return ok(exercises.listLogs({ date }));
    if (exerciseId !== undefined) return ok(exercises.listLogs({ exerciseId }));
    return ok(exercises.listLogs({ from: searchParam(req, 'from'), to: searchParam(req, 'to') }));
  } catch (e) {
    return fail(e, 'api/exercise-logs');
  }
}
