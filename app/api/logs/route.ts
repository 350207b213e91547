import { NextRequest } from 'next/server';
import { z } from 'zod';
import { fail, ok, searchParam } from '@/lib/api';
import { LOG_LEVELS, logger } from '@/lib/logger';
import { parseInput } from '@/lib/validation';

const querySchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export async function GET(req: NextRequest) {
  try {
    const { level, limit } = parseInput(querySchema, {
      level: searchParam(req, 'level'),
      limit: searchParam(req, 'limit'),
    });
    return ok(logger.getLogs(level, limit));
  } catch (e) {
    return fail(e, 'api/logs');
  }
}

export async function DELETE() {
  try {
    logger.clearLogs();
    return ok({ success: true });
  } catch (e) {
    return fail(e, 'api/logs');
  }
}
