import { NextRequest, NextResponse } from 'next/server';
import { ValidationError, isAppError, toError } from './errors';
import { logger } from './logger';
import type { ApiErrorCode, ApiResponse } from './types';

export type RouteContext<P> = { params: Promise<P> };

const STATUS_BY_CODE: Record<ApiErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  STORAGE_ERROR: 500,
  CONFIG_ERROR: 500,
  INTERNAL_ERROR: 500,
};

export function ok<T>(data: T, status = 200): NextResponse<ApiResponse<T>> {
  return NextResponse.json<ApiResponse<T>>({ data, error: null }, { status });
}

export function fail(e: unknown, component = 'api'): NextResponse<ApiResponse<never>> {
  if (isAppError(e)) {
    return NextResponse.json<ApiResponse<never>>(
      { data: null, error: { code: e.code, message: e.message } },
      { status: STATUS_BY_CODE[e.code] }
    );
  }

  logger.error('Unexpected error', component, toError(e));
  return NextResponse.json<ApiResponse<never>>(
    { data: null, error: { code: 'INTERNAL_ERROR', message: 'Unexpected error' } },
    { status: 500 }
  );
}

export async function readJson(req: NextRequest): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

export function searchParam(req: NextRequest, name: string): string | undefined {
  return req.nextUrl.searchParams.get(name) ?? undefined;
}

export function numberParam(req: NextRequest, name: string): number | undefined {
  const raw = searchParam(req, name);
  return raw === undefined ? undefined : Number(raw);
}

export function booleanParam(req: NextRequest, name: string): boolean | undefined {
  const raw = searchParam(req, name);
  if (raw === undefined) return undefined;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ValidationError(`${name} must be true or false`);
}
