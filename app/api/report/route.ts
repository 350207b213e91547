import { NextRequest } from 'next/server';
import { fail, ok, searchParam } from '@/lib/api';
import { getStore } from '@/lib/store';
import { buildDailyReport, formatDailyReport } from '@/lib/report';

export const runtime = 'nodejs';

export async function GET(req: NextRequest) {
  try {
    const store = getStore();
    const report = buildDailyReport(store, searchParam(req, 'date') ?? store.today());

    if (searchParam(req, 'format') === 'text') {
      return new Response(formatDailyReport(report), {
        status: 200,
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
      });
    }
    return ok(report);
  } catch (e) {
    return fail(e, 'api/report');
  }
}
