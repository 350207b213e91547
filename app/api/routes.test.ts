import { after, afterEach, before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { NextRequest } from 'next/server';
import { z } from 'zod';
import { closeStore } from '@/lib/store';
import { logger } from '@/lib/logger';
import * as exercisesRoute from './exercises/route';
import * as exerciseRoute from './exercises/[id]/route';
import * as exerciseLogsRoute from './exercises/[id]/logs/route';
import * as logsRoute from './exercise-logs/route';
import * as pointsRoute from './points/route';
import * as pointsDateRoute from './points/[date]/route';
import * as tasksRoute from './tasks/route';
import * as taskCompleteRoute from './tasks/[id]/complete/route';
import * as reportRoute from './report/route';
import * as appLogsRoute from './logs/route';
import * as preferencesRoute from './preferences/route';

const envelopeSchema = z.object({
  data: z.unknown(),
  error: z.object({ code: z.string(), message: z.string() }).nullable(),
});

const exerciseSchema = z.object({ id: z.number(), name: z.string(), color: z.string() });
const pointsSchema = z.object({ date: z.string(), score: z.number() });
const taskSchema = z.object({ id: z.number(), isCompleted: z.boolean(), completedAt: z.string().nullable() });

function request(url: string, method = 'GET', body?: unknown): NextRequest {
  const init = body === undefined ? { method } : { method, body: typeof body === 'string' ? body : JSON.stringify(body) };
  return new NextRequest(`http://localhost${url}`, init);
}

function params<P>(value: P) {
  return { params: Promise.resolve(value) };
}

async function envelope(res: Response) {
  return envelopeSchema.parse(await res.json());
}

describe('api routes', () => {
  const saved = { ...process.env };
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'energy-routes-'));
    process.env.ENERGY_TRACKER_PREFERENCES_FILE = path.join(dir, 'preferences.json');
    logger.setLevel('error');
    process.env.ENERGY_TRACKER_DB_PATH = ':memory:';
    process.env.ENERGY_TRACKER_TIMEZONE = 'UTC';
    process.env.ENERGY_TRACKER_LOG_LEVEL = 'error';
    delete process.env.ENERGY_TRACKER_SCHEMA_VERSION;
    delete process.env.ENERGY_TRACKER_SEED_FILE;
  });

  beforeEach(() => {
    closeStore();
  });

  afterEach(() => {
    closeStore();
  });

  after(() => {
    process.env = saved;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('exercises', () => {
    it('creates an exercise next to the seeded ones', async () => {
      const res = await exercisesRoute.POST(
        request('/api/exercises', 'POST', { name: 'Walking', category: 'physical', targetValue: 3, unit: 'km' })
      );
      assert.equal(res.status, 201);
      const created = exerciseSchema.parse((await envelope(res)).data);
      assert.equal(created.name, 'Walking');
      assert.equal(created.color, '#FF8A65');

      const list = z.array(exerciseSchema).parse((await envelope(await exercisesRoute.GET())).data);
      assert.deepEqual(list.map(exercise => exercise.name), ['Stretching', 'Breathing', 'Nap', 'Walking']);
    });

    it('maps duplicates to 409', async () => {
      const res = await exercisesRoute.POST(
        request('/api/exercises', 'POST', { name: 'stretching', category: 'physical', targetValue: 5, unit: 'reps' })
      );
      assert.equal(res.status, 409);
      const body = await envelope(res);
      assert.equal(body.data, null);
      assert.equal(body.error?.code, 'CONFLICT');
    });

    it('maps invalid input to 400', async () => {
      const res = await exercisesRoute.POST(
        request('/api/exercises', 'POST', { name: 'Run', category: 'cardio', targetValue: 5, unit: 'km' })
      );
      assert.equal(res.status, 400);
      assert.deepEqual((await envelope(res)).error, {
        code: 'VALIDATION_ERROR',
        message: 'Category must be one of physical, mental, sleepiness',
      });

      const broken = await exercisesRoute.POST(request('/api/exercises', 'POST', 'not json'));
      assert.equal(broken.status, 400);
      assert.equal((await envelope(broken)).error?.message, 'Request body must be valid JSON');
    });

    it('reports a missing seed file on first open as a server fault', async () => {
      process.env.ENERGY_TRACKER_SEED_FILE = path.join(dir, 'no-seeds.json');
      try {
        const res = await exercisesRoute.GET();
        assert.equal(res.status, 500);
        assert.equal((await envelope(res)).error?.code, 'CONFIG_ERROR');
      } finally {
        delete process.env.ENERGY_TRACKER_SEED_FILE;
      }
    });

    it('maps unknown ids to 404', async () => {
      const res = await exerciseRoute.GET(request('/api/exercises/99'), params({ id: '99' }));
      assert.equal(res.status, 404);
      assert.equal((await envelope(res)).error?.message, 'Exercise 99 not found');
    });

    it('logs once per day and drops logs with the exercise', async () => {
      const log = () =>
        exerciseLogsRoute.POST(
          request('/api/exercises/1/logs', 'POST', { date: '2026-03-10', actualValue: 30 }),
          params({ id: '1' })
        );

      assert.equal((await log()).status, 201);
      assert.equal((await log()).status, 409);

      const removed = await exerciseRoute.DELETE(request('/api/exercises/1', 'DELETE'), params({ id: '1' }));
      assert.deepEqual((await envelope(removed)).data, { id: 1, name: 'Stretching' });

      const logs = await logsRoute.GET(request('/api/exercise-logs?exerciseId=1'));
      assert.deepEqual((await envelope(logs)).data, []);
    });
  });

  describe('points', () => {
    it('rejects out-of-range points and stores valid ones', async () => {
      const bad = await pointsRoute.PUT(request('/api/points', 'PUT', { date: '2026-03-10', physical: 11, mental: 0 }));
      assert.equal(bad.status, 400);

      const good = await pointsRoute.PUT(request('/api/points', 'PUT', { date: '2026-03-10', physical: 5, mental: 5 }));
      assert.equal(good.status, 200);
      assert.equal(pointsSchema.parse((await envelope(good)).data).score, 60);

      const stored = await pointsDateRoute.GET(request('/api/points/2026-03-10'), params({ date: '2026-03-10' }));
      assert.deepEqual(pointsSchema.parse((await envelope(stored)).data), { date: '2026-03-10', score: 60 });

      const summary = await pointsRoute.GET(request('/api/points?year=2026&month=3'));
      const parsed = z
        .object({ summary: z.object({ recordedDays: z.number(), averageScore: z.number() }) })
        .parse((await envelope(summary)).data);
      assert.deepEqual(parsed.summary, { recordedDays: 1, averageScore: 60 });
    });

    it('needs both year and month for a summary', async () => {
      const res = await pointsRoute.GET(request('/api/points?year=2026'));
      assert.equal(res.status, 400);
      assert.equal((await envelope(res)).error?.message, 'year and month must be given together');
    });
  });

  describe('tasks', () => {
    it('marks a task complete', async () => {
      const created = await tasksRoute.POST(request('/api/tasks', 'POST', { title: 'Call', dueDate: '2026-03-12' }));
      assert.equal(created.status, 201);
      const task = taskSchema.parse((await envelope(created)).data);
      assert.equal(task.isCompleted, false);

      const done = await taskCompleteRoute.POST(
        request(`/api/tasks/${task.id}/complete`, 'POST'),
        params({ id: String(task.id) })
      );
      const completed = taskSchema.parse((await envelope(done)).data);
      assert.equal(completed.isCompleted, true);
      assert.notEqual(completed.completedAt, null);
    });

    it('filters by priority', async () => {
      await tasksRoute.POST(request('/api/tasks', 'POST', { title: 'Low' }));
      await tasksRoute.POST(request('/api/tasks', 'POST', { title: 'Urgent', priority: 2 }));

      const res = await tasksRoute.GET(request('/api/tasks?priority=2'));
      const titles = z.array(z.object({ title: z.string() })).parse((await envelope(res)).data);
      assert.deepEqual(titles.map(task => task.title), ['Urgent']);

      const bad = await tasksRoute.GET(request('/api/tasks?priority=5'));
      assert.equal(bad.status, 400);
    });

    it('validates boolean filters', async () => {
      const res = await tasksRoute.GET(request('/api/tasks?completed=maybe'));
      assert.equal(res.status, 400);
      assert.equal((await envelope(res)).error?.message, 'completed must be true or false');
    });
  });

  describe('report', () => {
    it('renders plain text on request', async () => {
      await pointsRoute.PUT(request('/api/points', 'PUT', { date: '2026-03-10', physical: 5, mental: 5 }));

      const res = await reportRoute.GET(request('/api/report?date=2026-03-10&format=text'));
      assert.equal(res.status, 200);
      assert.equal(res.headers.get('content-type'), 'text/plain; charset=utf-8');
      const lines = (await res.text()).split('\n');
      assert.equal(lines[0], 'Energy report for 2026-03-10');
      assert.equal(lines[2], 'Score: 60/100 (Moderate)');
    });
  });

  describe('preferences', () => {
    const preferencesSchema = z.object({
      uiScale: z.number(),
      textSizeOffset: z.number(),
      windowWidth: z.number(),
      windowHeight: z.number(),
    });

    it('updates, clamps and resets preferences', async () => {
      const defaults = preferencesSchema.parse((await envelope(await preferencesRoute.GET())).data);
      assert.deepEqual(defaults, { uiScale: 1, textSizeOffset: 0, windowWidth: 1200, windowHeight: 800 });

      const updated = await preferencesRoute.PUT(request('/api/preferences', 'PUT', { uiScale: 3, windowWidth: 1400 }));
      assert.deepEqual(preferencesSchema.parse((await envelope(updated)).data), {
        uiScale: 2,
        textSizeOffset: 0,
        windowWidth: 1400,
        windowHeight: 800,
      });
      assert.equal(preferencesSchema.parse((await envelope(await preferencesRoute.GET())).data).uiScale, 2);

      const reset = await preferencesRoute.DELETE();
      assert.deepEqual(preferencesSchema.parse((await envelope(reset)).data), defaults);
    });

    it('rejects unknown keys', async () => {
      const res = await preferencesRoute.PUT(request('/api/preferences', 'PUT', { theme: 'dark' }));
      assert.equal(res.status, 400);
      assert.equal((await envelope(res)).error?.code, 'VALIDATION_ERROR');
    });
  });

  describe('logs', () => {
    it('validates the limit', async () => {
      const res = await appLogsRoute.GET(request('/api/logs?limit=0'));
      assert.equal(res.status, 400);
      assert.equal((await envelope(res)).error?.code, 'VALIDATION_ERROR');
    });
  });
});
