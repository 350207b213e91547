import { and, asc, eq, gte, lte } from 'drizzle-orm';
import { exerciseLogs, exercises } from '../db/schema';
import { ConflictError, NotFoundError } from '../errors';
import { logger } from '../logger';
import { addDays, getDateRange } from '../date';
import { categoryColor } from '../schema-versions';
import { summarizeProgress, toExerciseProgress } from '../progress';
import {
  dateRangeSchema,
  exerciseCreateSchema,
  exerciseUpdateSchema,
  idSchema,
  isoDateSchema,
  logInputSchema,
  logUpdateSchema,
  parseInput,
} from '../validation';
import { BaseManager } from './base';
import type { Exercise, ExerciseInput, ExerciseLog, ExerciseProgress, ExerciseSummary } from '../types';

export type LogOptions = {
  completed?: boolean;
  notes?: string;
};

export type ExerciseLogFilter =
  | { date: string }
  | { from?: string; to?: string }
  | { exerciseId: number };

export type ExerciseLogPatch = Partial<Pick<ExerciseLog, 'completed' | 'actualValue' | 'notes'>>;

function nameKey(name: string): string {
  return name.normalize('NFC').toLocaleLowerCase();
}

export class ExerciseManager extends BaseManager {
  protected readonly component = 'ExerciseManager';

  create(input: ExerciseInput): Exercise {
    const data = parseInput(exerciseCreateSchema(this.schemaVersion), input);

    return this.write('Create exercise', () => {
      this.assertNameAvailable(data.name);
      const created = this.db
        .insert(exercises)
        .values({
          name: data.name,
          category: data.category,
          color: data.color ?? categoryColor(this.schemaVersion, data.category),
          targetValue: data.targetValue,
          unit: data.unit,
          createdAt: this.now(),
        })
        .returning()
        .get();
      logger.info(`Exercise ${created.id} "${created.name}" created`, this.component);
      return created;
    });
  }

  getById(id: number): Exercise {
    const exerciseId = parseInput(idSchema, id);
    const found = this.read('Get exercise', () =>
      this.db.select().from(exercises).where(eq(exercises.id, exerciseId)).get()
    );
    if (!found) throw new NotFoundError('Exercise', exerciseId);
    return found;
  }

  list(): Exercise[] {
    return this.read('List exercises', () => this.db.select().from(exercises).orderBy(asc(exercises.id)).all());
  }

  update(id: number, patch: Partial<ExerciseInput>): Exercise {
    const data = parseInput(exerciseUpdateSchema(this.schemaVersion), patch);

    return this.write('Update exercise', () => {
      const existing = this.getById(id);
      if (data.name !== undefined && nameKey(data.name) !== nameKey(existing.name)) {
        this.assertNameAvailable(data.name, existing.id);
      }
      const updated = this.db
        .update(exercises)
        .set({
          name: data.name ?? existing.name,
          category: data.category ?? existing.category,
          color: data.color ?? existing.color,
          targetValue: data.targetValue ?? existing.targetValue,
          unit: data.unit ?? existing.unit,
        })
        .where(eq(exercises.id, existing.id))
        .returning()
        .get();
      if (!updated) throw new NotFoundError('Exercise', existing.id);
      logger.info(`Exercise ${updated.id} updated`, this.component);
      return updated;
    });
  }

  /** Deletes the exercise and, through the foreign key cascade, all of its logs. */
  delete(id: number): void {
    const exerciseId = parseInput(idSchema, id);
    this.write('Delete exercise', () => {
      const result = this.db.delete(exercises).where(eq(exercises.id, exerciseId)).run();
      if (result.changes === 0) throw new NotFoundError('Exercise', exerciseId);
    });
    logger.info(`Exercise ${exerciseId} deleted`, this.component);
  }

  logCompletion(exerciseId: number, date: string, actualValue: number, options: LogOptions = {}): ExerciseLog {
    const data = parseInput(logInputSchema, { date, actualValue, ...options });

    return this.write('Log exercise', () => {
      const exercise = this.getById(exerciseId);
      const existing = this.findLog(exercise.id, data.date);
      if (existing) {
        throw new ConflictError(`Exercise ${exercise.id} already has a log for ${data.date}`);
      }
      const created = this.db
        .insert(exerciseLogs)
        .values({
          exerciseId: exercise.id,
          date: data.date,
          completed: data.completed ?? true,
          actualValue: data.actualValue,
          notes: data.notes ?? '',
          loggedAt: this.now(),
        })
        .returning()
        .get();
      logger.info(`Exercise ${exercise.id} logged for ${data.date}`, this.component);
      return created;
    });
  }

  /** Creates the day's log or updates it in place. */
  recordProgress(exerciseId: number, date: string, actualValue: number, options: LogOptions = {}): ExerciseLog {
    const data = parseInput(logInputSchema, { date, actualValue, ...options });

    return this.write('Record progress', () => {
      const exercise = this.getById(exerciseId);
      const loggedAt = this.now();
      const saved = this.db
        .insert(exerciseLogs)
        .values({
          exerciseId: exercise.id,
          date: data.date,
          completed: data.completed ?? true,
          actualValue: data.actualValue,
          notes: data.notes ?? '',
          loggedAt,
        })
        .onConflictDoUpdate({
          target: [exerciseLogs.exerciseId, exerciseLogs.date],
          set: {
            completed: data.completed ?? true,
            actualValue: data.actualValue,
            notes: data.notes ?? '',
            loggedAt,
          },
        })
        .returning()
        .get();
      logger.info(`Progress for exercise ${exercise.id} on ${data.date} saved`, this.component);
      return saved;
    });
  }

  getLog(id: number): ExerciseLog {
    const logId = parseInput(idSchema, id);
    const found = this.read('Get log', () =>
      this.db.select().from(exerciseLogs).where(eq(exerciseLogs.id, logId)).get()
    );
    if (!found) throw new NotFoundError('Exercise log', logId);
    return found;
  }

  listLogs(filter: ExerciseLogFilter = {}): ExerciseLog[] {
    const where = this.logFilter(filter);
    return this.read('List logs', () =>
      this.db
        .select()
        .from(exerciseLogs)
        .where(where)
        .orderBy(asc(exerciseLogs.date), asc(exerciseLogs.id))
        .all()
    );
  }

  updateLog(id: number, patch: ExerciseLogPatch): ExerciseLog {
    const data = parseInput(logUpdateSchema, patch);

    return this.write('Update log', () => {
      const existing = this.getLog(id);
      const updated = this.db
        .update(exerciseLogs)
        .set({
          completed: data.completed ?? existing.completed,
          actualValue: data.actualValue ?? existing.actualValue,
          notes: data.notes ?? existing.notes,
        })
        .where(eq(exerciseLogs.id, existing.id))
        .returning()
        .get();
      if (!updated) throw new NotFoundError('Exercise log', existing.id);
      return updated;
    });
  }

  deleteLog(id: number): void {
    const logId = parseInput(idSchema, id);
    this.write('Delete log', () => {
      const result = this.db.delete(exerciseLogs).where(eq(exerciseLogs.id, logId)).run();
      if (result.changes === 0) throw new NotFoundError('Exercise log', logId);
    });
  }

  /** Every exercise paired with its log for `date`; missing logs count as zero progress. */
  getDailyProgress(date: string): ExerciseProgress[] {
    const day = parseInput(isoDateSchema, date);
    const logs = new Map(this.listLogs({ date: day }).map(log => [log.exerciseId, log]));
    return this.list().map(exercise => toExerciseProgress(exercise, logs.get(exercise.id) ?? null));
  }

  getSummaryForDate(date: string): ExerciseSummary {
    return summarizeProgress(this.getDailyProgress(date));
  }

  // Seven days ending at `endDate`, oldest first
  getWeeklyCompletionRates(endDate: string): { date: string; completionRate: number }[] {
    const end = parseInput(isoDateSchema, endDate);
    return getDateRange(addDays(end, -6), end).map(date => ({
      date,
      completionRate: this.getSummaryForDate(date).completionRate,
    }));
  }

  private findLog(exerciseId: number, date: string): ExerciseLog | undefined {
    return this.db
      .select()
      .from(exerciseLogs)
      .where(and(eq(exerciseLogs.exerciseId, exerciseId), eq(exerciseLogs.date, date)))
      .get();
  }

  // Unicode-aware; the column's COLLATE NOCASE only folds ASCII
  private assertNameAvailable(name: string, exceptId?: number) {
    const key = nameKey(name);
    const duplicate = this.db
      .select({ id: exercises.id, name: exercises.name })
      .from(exercises)
      .all()
      .find(row => row.id !== exceptId && nameKey(row.name) === key);
    if (duplicate) {
      throw new ConflictError(`Exercise "${name}" already exists`);
    }
  }

  private logFilter(filter: ExerciseLogFilter) {
    if ('date' in filter) {
      return eq(exerciseLogs.date, parseInput(isoDateSchema, filter.date));
    }
    if ('exerciseId' in filter) {
      return eq(exerciseLogs.exerciseId, parseInput(idSchema, filter.exerciseId));
    }
    const { from, to } = parseInput(dateRangeSchema, filter);
    return and(
      from ? gte(exerciseLogs.date, from) : undefined,
      to ? lte(exerciseLogs.date, to) : undefined
    );
  }
}
