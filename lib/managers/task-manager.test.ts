import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NotFoundError, ValidationError } from '../errors';
import { manualClock, openTestStore } from '../test-helpers';
import { UNCATEGORIZED_GROUP, isOverdue } from './task-manager';
import type { EnergyStore } from '../store';

describe('TaskManager', () => {
  const clock = manualClock();
  let store: EnergyStore;

  beforeEach(() => {
    clock.set('2026-03-10T09:00:00.000Z');
    store = openTestStore({}, clock);
  });

  afterEach(() => {
    store.close();
  });

  it('creates pending tasks dated today', () => {
    assert.deepEqual(store.tasks.create({ title: 'Buy water' }), {
      id: 1,
      title: 'Buy water',
      isCompleted: false,
      date: '2026-03-10',
      dueDate: null,
      priority: 0,
      category: null,
      createdAt: '2026-03-10T09:00:00.000Z',
      completedAt: null,
    });
  });

  it('validates titles, dates and priority', () => {
    assert.throws(() => store.tasks.create({ title: '   ' }), { message: 'Title cannot be empty' });
    assert.throws(() => store.tasks.create({ title: 'Call', dueDate: '2026-02-30' }), ValidationError);
    assert.throws(() => store.tasks.update(1, { title: 'x' }), NotFoundError);
    assert.deepEqual(store.tasks.list(), []);
  });

  it('marks a task complete once', () => {
    const task = store.tasks.create({ title: 'Stretch' });

    const done = store.tasks.markComplete(task.id);
    assert.equal(done.isCompleted, true);
    assert.equal(done.completedAt, '2026-03-10T09:00:00.000Z');

    clock.set('2026-03-10T12:00:00.000Z');
    assert.equal(store.tasks.markComplete(task.id).completedAt, '2026-03-10T09:00:00.000Z');
  });

  it('toggles completion back and forth', () => {
    const task = store.tasks.create({ title: 'Stretch' });
    assert.equal(store.tasks.toggleCompletion(task.id).isCompleted, true);

    const reopened = store.tasks.toggleCompletion(task.id);
    assert.equal(reopened.isCompleted, false);
    assert.equal(reopened.completedAt, null);
  });

  it('round-trips updates and deletes only the addressed task', () => {
    const keep = store.tasks.create({ title: 'Keep', priority: 2, category: 'Home' });
    const drop = store.tasks.create({ title: 'Drop' });

    store.tasks.update(keep.id, { title: 'Kept', dueDate: '2026-03-12' });
    assert.deepEqual(store.tasks.getById(keep.id), { ...keep, title: 'Kept', dueDate: '2026-03-12' });

    store.tasks.delete(drop.id);
    assert.deepEqual(store.tasks.list().map(task => task.id), [keep.id]);
    assert.throws(() => store.tasks.delete(drop.id), NotFoundError);
  });

  it('filters and orders by date then id', () => {
    store.tasks.create({ title: 'Later', date: '2026-03-12' });
    store.tasks.create({ title: 'Now', date: '2026-03-10', category: 'Home' });
    const early = store.tasks.create({ title: 'Early', date: '2026-03-09' });
    store.tasks.markComplete(early.id);

    assert.deepEqual(store.tasks.list().map(task => task.title), ['Early', 'Now', 'Later']);
    assert.deepEqual(store.tasks.list({ completed: false }).map(task => task.title), ['Now', 'Later']);
    assert.deepEqual(store.tasks.list({ category: 'Home' }).map(task => task.title), ['Now']);
    assert.deepEqual(
      store.tasks.list({ from: '2026-03-10', to: '2026-03-12' }).map(task => task.title),
      ['Now', 'Later']
    );
    assert.deepEqual(store.tasks.list({ date: '2026-03-12' }).map(task => task.title), ['Later']);
  });

  it('filters by priority and lists high-priority tasks', () => {
    store.tasks.create({ title: 'Low' });
    store.tasks.create({ title: 'Urgent', priority: 2 });
    store.tasks.create({ title: 'Medium', priority: 1 });
    store.tasks.create({ title: 'Also urgent', priority: 2, date: '2026-03-09' });

    assert.deepEqual(store.tasks.list({ priority: 1 }).map(task => task.title), ['Medium']);
    assert.deepEqual(store.tasks.listHighPriority().map(task => task.title), ['Also urgent', 'Urgent']);
  });

  it('computes statistics and overdue tasks', () => {
    store.tasks.create({ title: 'Late', dueDate: '2026-03-09' });
    store.tasks.create({ title: 'Soon', dueDate: '2026-03-11' });
    const done = store.tasks.create({ title: 'Done', dueDate: '2026-03-01' });
    store.tasks.markComplete(done.id);

    assert.deepEqual(store.tasks.getStatistics(), {
      total: 3,
      completed: 1,
      pending: 2,
      overdue: 1,
      completionRate: 33.3,
    });
    assert.deepEqual(store.tasks.listOverdue().map(task => task.title), ['Late']);
  });

  it('has empty statistics without tasks', () => {
    assert.deepEqual(store.tasks.getStatistics('2026-03-10'), {
      total: 0,
      completed: 0,
      pending: 0,
      overdue: 0,
      completionRate: 0,
    });
  });

  it('groups by category with uncategorized tasks last', () => {
    store.tasks.create({ title: 'Stretch', category: 'Morning' });
    store.tasks.create({ title: 'Loose' });
    const tea = store.tasks.create({ title: 'Tea', category: 'Evening' });
    store.tasks.create({ title: 'Walk', category: 'Morning' });
    store.tasks.markComplete(tea.id);

    assert.deepEqual(
      store.tasks.groupByCategory().map(group => [group.category, group.tasks.length, group.completedCount]),
      [
        ['Morning', 2, 0],
        ['Evening', 1, 1],
        [UNCATEGORIZED_GROUP, 1, 0],
      ]
    );
  });

  it('clears completed tasks', () => {
    const a = store.tasks.create({ title: 'A' });
    store.tasks.create({ title: 'B' });
    store.tasks.markComplete(a.id);

    assert.equal(store.tasks.clearCompleted(), 1);
    assert.deepEqual(store.tasks.list().map(task => task.title), ['B']);
  });
});

describe('isOverdue', () => {
  const base = {
    id: 1,
    title: 'Call',
    isCompleted: false,
    date: '2026-03-01',
    dueDate: '2026-03-05',
    priority: 0,
    category: null,
    createdAt: '2026-03-01T09:00:00.000Z',
    completedAt: null,
  } as const;

  it('needs a past due date on a pending task', () => {
    assert.equal(isOverdue(base, '2026-03-06'), true);
    assert.equal(isOverdue(base, '2026-03-05'), false);
    assert.equal(isOverdue({ ...base, dueDate: null }, '2026-03-06'), false);
    assert.equal(isOverdue({ ...base, isCompleted: true }, '2026-03-06'), false);
  });
});
