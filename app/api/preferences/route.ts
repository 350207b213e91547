import { NextRequest } from 'next/server';
import { fail, ok, readJson } from '@/lib/api';
import { loadConfig } from '@/lib/config';
import { preferencesPatchSchema, resetPreferences, updatePreferences } from '@/lib/preferences';
import { parseInput } from '@/lib/validation';

export const runtime = 'nodejs';

export async function GET() {
  try {
    return ok(loadConfig().preferences);
  } catch (e) {
    return fail(e, 'api/preferences');
  }
}

export async function PUT(req: NextRequest) {
  try {
    const { preferencesFile } = loadConfig();
    const patch = parseInput(preferencesPatchSchema, await readJson(req));
    return ok(updatePreferences(preferencesFile, patch));
  } catch (e) {
    return fail(e, 'api/preferences');
  }
}

export async function DELETE() {
  try {
    return ok(resetPreferences(loadConfig().preferencesFile));
  } catch (e) {
    return fail(e, 'api/preferences');
  }
}
