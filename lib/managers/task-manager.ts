import { and, asc, eq, gte, lte } from 'drizzle-orm';
import { tasks } from '../db/schema';
import { NotFoundError } from '../errors';
import { logger } from '../logger';
import {
  dateRangeSchema,
  idSchema,
  isoDateSchema,
  parseInput,
  prioritySchema,
  taskCreateSchema,
  taskUpdateSchema,
} from '../validation';
import { BaseManager } from './base';
import type { Task, TaskGroup, TaskPriority, TaskStatistics } from '../types';

export type TaskInput = {
  title: string;
  date?: string;
  dueDate?: string | null;
  priority?: TaskPriority;
  category?: string | null;
};

export type TaskPatch = Partial<Pick<Task, 'title' | 'isCompleted' | 'date' | 'dueDate' | 'priority' | 'category'>>;

export type TaskFilter = {
  date?: string;
  from?: string;
  to?: string;
  category?: string;
  completed?: boolean;
  priority?: TaskPriority;
};

const HIGH_PRIORITY: TaskPriority = 2;

export const UNCATEGORIZED_GROUP = 'Other';

export function isOverdue(task: Task, today: string): boolean {
  return !task.isCompleted && task.dueDate !== null && task.dueDate < today;
}

export class TaskManager extends BaseManager {
  protected readonly component = 'TaskManager';

  create(input: TaskInput): Task {
    const data = parseInput(taskCreateSchema, input);

    return this.write('Create task', () => {
      const created = this.db
        .insert(tasks)
        .values({
          title: data.title,
          isCompleted: false,
          date: data.date ?? this.today(),
          dueDate: data.dueDate ?? null,
          priority: data.priority,
          category: data.category ?? null,
          createdAt: this.now(),
          completedAt: null,
        })
        .returning()
        .get();
      logger.info(`Task ${created.id} created`, this.component);
      return created;
    });
  }

  getById(id: number): Task {
    const taskId = parseInput(idSchema, id);
    const found = this.read('Get task', () => this.db.select().from(tasks).where(eq(tasks.id, taskId)).get());
    if (!found) throw new NotFoundError('Task', taskId);
    return found;
  }

  list(filter: TaskFilter = {}): Task[] {
    const date = filter.date === undefined ? undefined : parseInput(isoDateSchema, filter.date);
    const { from, to } = parseInput(dateRangeSchema, { from: filter.from, to: filter.to });
    const priority = filter.priority === undefined ? undefined : parseInput(prioritySchema, filter.priority);

    return this.read('List tasks', () =>
      this.db
        .select()
        .from(tasks)
        .where(
          and(
            date ? eq(tasks.date, date) : undefined,
            from ? gte(tasks.date, from) : undefined,
            to ? lte(tasks.date, to) : undefined,
            filter.category === undefined ? undefined : eq(tasks.category, filter.category),
            filter.completed === undefined ? undefined : eq(tasks.isCompleted, filter.completed),
            priority === undefined ? undefined : eq(tasks.priority, priority)
          )
        )
        .orderBy(asc(tasks.date), asc(tasks.id))
        .all()
    );
  }

  update(id: number, patch: TaskPatch): Task {
    const data = parseInput(taskUpdateSchema, patch);

    return this.write('Update task', () => {
      const existing = this.getById(id);
      const isCompleted = data.isCompleted ?? existing.isCompleted;
      const updated = this.db
        .update(tasks)
        .set({
          title: data.title ?? existing.title,
          isCompleted,
          date: data.date ?? existing.date,
          dueDate: data.dueDate === undefined ? existing.dueDate : data.dueDate,
          priority: data.priority ?? existing.priority,
          category: data.category === undefined ? existing.category : data.category,
          completedAt: this.completedAt(existing, isCompleted),
        })
        .where(eq(tasks.id, existing.id))
        .returning()
        .get();
      logger.info(`Task ${existing.id} updated`, this.component);
      return updated;
    });
  }

  delete(id: number): void {
    const taskId = parseInput(idSchema, id);
    this.write('Delete task', () => {
      const result = this.db.delete(tasks).where(eq(tasks.id, taskId)).run();
      if (result.changes === 0) throw new NotFoundError('Task', taskId);
    });
    logger.info(`Task ${taskId} deleted`, this.component);
  }

  /** Idempotent: completing a completed task keeps its original completedAt. */
  markComplete(id: number): Task {
    return this.update(id, { isCompleted: true });
  }

  toggleCompletion(id: number): Task {
    return this.write('Toggle task', () => {
      const existing = this.getById(id);
      return this.update(existing.id, { isCompleted: !existing.isCompleted });
    });
  }

  getStatistics(today: string = this.today()): TaskStatistics {
    const day = parseInput(isoDateSchema, today);
    const all = this.list();
    const completed = all.filter(task => task.isCompleted).length;

    return {
      total: all.length,
      completed,
      pending: all.length - completed,
      overdue: all.filter(task => isOverdue(task, day)).length,
      completionRate: all.length > 0 ? Math.round((completed / all.length) * 1000) / 10 : 0,
    };
  }

  listOverdue(today: string = this.today()): Task[] {
    const day = parseInput(isoDateSchema, today);
    return this.list().filter(task => isOverdue(task, day));
  }

  listHighPriority(): Task[] {
    return this.list({ priority: HIGH_PRIORITY });
  }

  // Named categories in first-seen order, uncategorized tasks last
  groupByCategory(): TaskGroup[] {
    const groups = new Map<string, Task[]>();
    const uncategorized: Task[] = [];

    for (const task of this.list()) {
      if (task.category) {
        groups.set(task.category, [...(groups.get(task.category) ?? []), task]);
      } else {
        uncategorized.push(task);
      }
    }

    const result = [...groups.entries()].map(([category, items]) => toGroup(category, items));
    if (uncategorized.length > 0) {
      result.push(toGroup(UNCATEGORIZED_GROUP, uncategorized));
    }
    return result;
  }

  clearCompleted(): number {
    const removed = this.write('Clear completed tasks', () =>
      this.db.delete(tasks).where(eq(tasks.isCompleted, true)).run().changes
    );
    logger.info(`${removed} completed tasks cleared`, this.component);
    return removed;
  }

  private completedAt(existing: Task, isCompleted: boolean): string | null {
    if (!isCompleted) return null;
    return existing.isCompleted ? existing.completedAt : this.now();
  }
}

function toGroup(category: string, items: Task[]): TaskGroup {
  return {
    category,
    tasks: items,
    completedCount: items.filter(task => task.isCompleted).length,
  };
}
