import { and, asc, eq, gte, lte } from 'drizzle-orm';
import { z } from 'zod';
import { events } from '../db/schema';
import { NotFoundError } from '../errors';
import { logger } from '../logger';
import { addDays, getMonthBounds } from '../date';
import {
  dateRangeSchema,
  eventCreateSchema,
  eventUpdateSchema,
  idSchema,
  isoDateSchema,
  parseInput,
  yearMonthSchema,
} from '../validation';
import { BaseManager } from './base';
import type { CalendarEvent, EventMonthSummary } from '../types';

export type EventInput = {
  title: string;
  eventDate: string;
  description?: string | null;
};

export type EventPatch = Partial<EventInput>;

export type EventFilter = {
  date?: string;
  from?: string;
  to?: string;
};

const UPCOMING_WINDOW_DAYS = 7;

const daysAheadSchema = z.number().int().min(1, 'Day count must be at least 1').max(366, 'Day count must be at most 366');
const keywordSchema = z.string().trim().min(1, 'Search keyword cannot be empty');

export class EventManager extends BaseManager {
  protected readonly component = 'EventManager';

  create(input: EventInput): CalendarEvent {
    const data = parseInput(eventCreateSchema, input);

    return this.write('Create event', () => {
      const created = this.db
        .insert(events)
        .values({
          title: data.title,
          eventDate: data.eventDate,
          description: data.description ?? null,
          createdAt: this.now(),
        })
        .returning()
        .get();
      logger.info(`Event ${created.id} created for ${created.eventDate}`, this.component);
      return created;
    });
  }

  getById(id: number): CalendarEvent {
    const eventId = parseInput(idSchema, id);
    const found = this.read('Get event', () => this.db.select().from(events).where(eq(events.id, eventId)).get());
    if (!found) throw new NotFoundError('Event', eventId);
    return found;
  }

  list(filter: EventFilter = {}): CalendarEvent[] {
    const date = filter.date === undefined ? undefined : parseInput(isoDateSchema, filter.date);
    const { from, to } = parseInput(dateRangeSchema, { from: filter.from, to: filter.to });

    return this.read('List events', () =>
      this.db
        .select()
        .from(events)
        .where(
          and(
            date ? eq(events.eventDate, date) : undefined,
            from ? gte(events.eventDate, from) : undefined,
            to ? lte(events.eventDate, to) : undefined
          )
        )
        .orderBy(asc(events.eventDate), asc(events.id))
        .all()
    );
  }

  update(id: number, patch: EventPatch): CalendarEvent {
    const data = parseInput(eventUpdateSchema, patch);

    return this.write('Update event', () => {
      const existing = this.getById(id);
      const updated = this.db
        .update(events)
        .set({
          title: data.title ?? existing.title,
          eventDate: data.eventDate ?? existing.eventDate,
          description: data.description === undefined ? existing.description : data.description,
        })
        .where(eq(events.id, existing.id))
        .returning()
        .get();
      logger.info(`Event ${existing.id} updated`, this.component);
      return updated;
    });
  }

  delete(id: number): void {
    const eventId = parseInput(idSchema, id);
    this.write('Delete event', () => {
      const result = this.db.delete(events).where(eq(events.id, eventId)).run();
      if (result.changes === 0) throw new NotFoundError('Event', eventId);
    });
    logger.info(`Event ${eventId} deleted`, this.component);
  }

  /** Sorted, de-duplicated dates in the month that carry at least one event. */
  datesWithEvents(year: number, month: number): string[] {
    const { start, end } = this.monthRange(year, month);
    return [...new Set(this.list({ from: start, to: end }).map(event => event.eventDate))];
  }

  listUpcoming(daysAhead = UPCOMING_WINDOW_DAYS, today: string = this.today()): CalendarEvent[] {
    const days = parseInput(daysAheadSchema, daysAhead);
    const from = parseInput(isoDateSchema, today);
    return this.list({ from, to: addDays(from, days - 1) });
  }

  // Plain substring match; SQLite LIKE would treat % and _ as wildcards and fold ASCII only
  search(keyword: string): CalendarEvent[] {
    const needle = parseInput(keywordSchema, keyword).toLocaleLowerCase();
    return this.list().filter(
      event =>
        event.title.toLocaleLowerCase().includes(needle) ||
        (event.description ?? '').toLocaleLowerCase().includes(needle)
    );
  }

  countForDate(date: string): number {
    return this.list({ date }).length;
  }

  /** Events of the `daysBack` days before `today`, today itself excluded. */
  listPast(daysBack = UPCOMING_WINDOW_DAYS, today: string = this.today()): CalendarEvent[] {
    const days = parseInput(daysAheadSchema, daysBack);
    const day = parseInput(isoDateSchema, today);
    return this.list({ from: addDays(day, -days), to: addDays(day, -1) });
  }

  getMonthSummary(year: number, month: number, today: string = this.today()): EventMonthSummary {
    const { start, end } = this.monthRange(year, month);
    const day = parseInput(isoDateSchema, today);
    const upcomingEnd = addDays(day, UPCOMING_WINDOW_DAYS);
    const monthEvents = this.list({ from: start, to: end });

    return {
      totalEvents: monthEvents.length,
      pastEvents: monthEvents.filter(event => event.eventDate < day).length,
      todayEvents: monthEvents.filter(event => event.eventDate === day).length,
      upcomingEvents: monthEvents.filter(event => event.eventDate >= day && event.eventDate <= upcomingEnd).length,
      rangeStart: start,
      rangeEnd: end,
    };
  }

  private monthRange(year: number, month: number) {
    const parsed = parseInput(yearMonthSchema, { year, month });
    return getMonthBounds(parsed.year, parsed.month);
  }
}
