import { NextRequest } from 'next/server';
import { fail, ok, searchParam } from '@/lib/api';
import { getStore } from '@/lib/store';

export const runtime = 'nodejs';

export async function GET(req: NextRequest) {
  try {
    const store = getStore();
    const date = searchParam(req, 'date') ?? store.today();
    return ok({
      date,
      items: store.exercises.getDailyProgress(date),
      summary: store.exercises.getSummaryForDate(date),
      weekly: store.exercises.getWeeklyCompletionRates(date),
    });
  } catch (e) {
    return fail(e, 'api/progress');
  }
}
