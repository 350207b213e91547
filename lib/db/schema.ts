import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { ExerciseCategory, ExerciseUnit, TaskPriority } from '../types';

// Column definitions only; DDL (checks, unique keys, indexes) lives in ./sql

export const exercises = sqliteTable('exercises', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  category: text('category').$type<ExerciseCategory>().notNull(),
  color: text('color').notNull(),
  targetValue: integer('target_value').notNull(),
  unit: text('unit').$type<ExerciseUnit>().notNull(),
  createdAt: text('created_at').notNull(),
});

export const exerciseLogs = sqliteTable('exercise_logs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  exerciseId: integer('exercise_id')
    .notNull()
    .references(() => exercises.id, { onDelete: 'cascade' }),
  date: text('date').notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  actualValue: integer('actual_value').notNull().default(0),
  notes: text('notes').notNull().default(''),
  loggedAt: text('logged_at').notNull(),
});

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  isCompleted: integer('is_completed', { mode: 'boolean' }).notNull().default(false),
  date: text('date').notNull(),
  dueDate: text('due_date'),
  priority: integer('priority').$type<TaskPriority>().notNull().default(0),
  category: text('category'),
  createdAt: text('created_at').notNull(),
  completedAt: text('completed_at'),
});

export const events = sqliteTable('events', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  eventDate: text('event_date').notNull(),
  description: text('description'),
  createdAt: text('created_at').notNull(),
});

export const dailyPoints = sqliteTable('daily_points', {
  date: text('date').primaryKey(),
  physical: integer('physical').notNull(),
  mental: integer('mental').notNull(),
  score: integer('score').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export const appMetadata = sqliteTable('app_metadata', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: text('updated_at').notNull(),
});

