import { and, asc, eq, gte, lte } from 'drizzle-orm';
import { dailyPoints } from '../db/schema';
import { NotFoundError } from '../errors';
import { logger } from '../logger';
import { getMonthBounds } from '../date';
import { computeScore } from '../score';
import {
  dateRangeSchema,
  isoDateSchema,
  parseInput,
  pointsSchema,
  pointsUpdateSchema,
  yearMonthSchema,
} from '../validation';
import { BaseManager } from './base';
import type { DailyPoints, PointsMonthSummary } from '../types';

export type PointsInput = {
  date: string;
  physical: number;
  mental: number;
};

export type PointsPatch = Partial<Pick<DailyPoints, 'physical' | 'mental'>>;

/**
 * Daily physical/mental points and the score derived from them. The score is
 * computed in the same statement that writes the points, so a stored row
 * always agrees with its inputs.
 */
export class DailyPointsManager extends BaseManager {
  protected readonly component = 'DailyPointsManager';

  record(input: PointsInput): DailyPoints {
    const data = parseInput(pointsSchema, input);
    const score = computeScore(data.physical, data.mental);

    return this.write('Record points', () => {
      const updatedAt = this.now();
      const saved = this.db
        .insert(dailyPoints)
        .values({ date: data.date, physical: data.physical, mental: data.mental, score, updatedAt })
        .onConflictDoUpdate({
          target: dailyPoints.date,
          set: { physical: data.physical, mental: data.mental, score, updatedAt },
        })
        .returning()
        .get();
      logger.info(`Points for ${saved.date} saved (score ${saved.score})`, this.component);
      return saved;
    });
  }

  find(date: string): DailyPoints | null {
    const day = parseInput(isoDateSchema, date);
    const found = this.read('Get points', () =>
      this.db.select().from(dailyPoints).where(eq(dailyPoints.date, day)).get()
    );
    return found ?? null;
  }

  get(date: string): DailyPoints {
    const found = this.find(date);
    if (!found) throw new NotFoundError('Points for', date);
    return found;
  }

  update(date: string, patch: PointsPatch): DailyPoints {
    const data = parseInput(pointsUpdateSchema, patch);

    return this.write('Update points', () => {
      const existing = this.get(date);
      return this.record({
        date: existing.date,
        physical: data.physical ?? existing.physical,
        mental: data.mental ?? existing.mental,
      });
    });
  }

  list(range: { from?: string; to?: string } = {}): DailyPoints[] {
    const { from, to } = parseInput(dateRangeSchema, range);
    return this.read('List points', () =>
      this.db
        .select()
        .from(dailyPoints)
        .where(and(from ? gte(dailyPoints.date, from) : undefined, to ? lte(dailyPoints.date, to) : undefined))
        .orderBy(asc(dailyPoints.date))
        .all()
    );
  }

  delete(date: string): void {
    const day = parseInput(isoDateSchema, date);
    this.write('Delete points', () => {
      const result = this.db.delete(dailyPoints).where(eq(dailyPoints.date, day)).run();
      if (result.changes === 0) throw new NotFoundError('Points for', day);
    });
    logger.info(`Points for ${day} deleted`, this.component);
  }

  getMonthSummary(year: number, month: number): PointsMonthSummary {
    const parsed = parseInput(yearMonthSchema, { year, month });
    const { start, end } = getMonthBounds(parsed.year, parsed.month);
    const rows = this.list({ from: start, to: end });

    if (rows.length === 0) {
      return { ...parsed, recordedDays: 0, averageScore: null, best: null, worst: null };
    }

    const total = rows.reduce((sum, row) => sum + row.score, 0);
    // Ties go to the earliest date
    const best = rows.reduce((top, row) => (row.score > top.score ? row : top));
    const worst = rows.reduce((low, row) => (row.score < low.score ? row : low));

    return {
      ...parsed,
      recordedDays: rows.length,
      averageScore: Math.round((total / rows.length) * 10) / 10,
      best,
      worst,
    };
  }
}
