import { z } from 'zod';
import { ValidationError } from './errors';
import { isValidCalendarDate } from './date';
import { EXERCISE_UNITS, SCHEMA_VERSIONS } from './schema-versions';
import type { SchemaVersion } from './types';

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .refine(isValidCalendarDate, 'Date is not a valid calendar date');

export const energyPointSchema = z
  .number({ invalid_type_error: 'Points must be a number' })
  .int('Points must be a whole number')
  .min(0, 'Points must be between 0 and 10')
  .max(10, 'Points must be between 0 and 10');

export const idSchema = z.coerce
  .number()
  .int('Id must be a positive integer')
  .positive('Id must be a positive integer')
  .safe('Id is out of range');

const MAX_MEASURE = 100_000;

const nameSchema = z
  .string()
  .trim()
  .min(1, 'Exercise name cannot be empty')
  .max(100, 'Exercise name must be at most 100 characters');

const colorSchema = z
  .string()
  .regex(/^#[0-9A-Fa-f]{6}$/, 'Color must be a #RRGGBB hex code')
  .transform(value => value.toUpperCase());

const unitSchema = z.enum(EXERCISE_UNITS, {
  errorMap: () => ({ message: `Unit must be one of ${EXERCISE_UNITS.join(', ')}` }),
});

const targetValueSchema = z
  .number()
  .int('Target must be a whole number')
  .positive('Target must be greater than 0')
  .max(MAX_MEASURE, `Target must be at most ${MAX_MEASURE}`);
const actualValueSchema = z
  .number()
  .int('Actual value must be a whole number')
  .min(0, 'Actual value cannot be negative')
  .max(MAX_MEASURE, `Actual value must be at most ${MAX_MEASURE}`);
const notesSchema = z.string().max(500, 'Notes must be at most 500 characters');

export function categorySchema(version: SchemaVersion) {
  const { categories } = SCHEMA_VERSIONS[version];
  return z.enum(categories, {
    errorMap: () => ({ message: `Category must be one of ${categories.join(', ')}` }),
  });
}

export function exerciseCreateSchema(version: SchemaVersion) {
  return z.object({
    name: nameSchema,
    category: categorySchema(version),
    targetValue: targetValueSchema,
    unit: unitSchema,
    color: colorSchema.optional(),
  });
}

export function exerciseUpdateSchema(version: SchemaVersion) {
  return exerciseCreateSchema(version).partial();
}

export function seedExerciseSchema(version: SchemaVersion) {
  return z.array(exerciseCreateSchema(version));
}

export const logInputSchema = z.object({
  date: isoDateSchema,
  actualValue: actualValueSchema,
  completed: z.boolean().optional(),
  notes: notesSchema.optional(),
});

export const logUpdateSchema = z.object({
  completed: z.boolean().optional(),
  actualValue: actualValueSchema.optional(),
  notes: notesSchema.optional(),
});

const titleSchema = z
  .string()
  .trim()
  .min(1, 'Title cannot be empty')
  .max(200, 'Title must be at most 200 characters');

export const prioritySchema = z.union([z.literal(0), z.literal(1), z.literal(2)], {
  errorMap: () => ({ message: 'Priority must be 0, 1 or 2' }),
});

const taskCategorySchema = z.string().trim().min(1).max(50, 'Category must be at most 50 characters');

export const taskCreateSchema = z.object({
  title: titleSchema,
  date: isoDateSchema.optional(),
  dueDate: isoDateSchema.nullable().optional(),
  priority: prioritySchema.default(0),
  category: taskCategorySchema.nullable().optional(),
});

export const taskUpdateSchema = z.object({
  title: titleSchema.optional(),
  isCompleted: z.boolean().optional(),
  date: isoDateSchema.optional(),
  dueDate: isoDateSchema.nullable().optional(),
  priority: prioritySchema.optional(),
  category: taskCategorySchema.nullable().optional(),
});

export const eventCreateSchema = z.object({
  title: titleSchema,
  eventDate: isoDateSchema,
  description: z.string().max(1000, 'Description must be at most 1000 characters').nullable().optional(),
});

export const eventUpdateSchema = eventCreateSchema.partial();

export const pointsSchema = z.object({
  date: isoDateSchema,
  physical: energyPointSchema,
  mental: energyPointSchema,
});

export const pointsUpdateSchema = z.object({
  physical: energyPointSchema.optional(),
  mental: energyPointSchema.optional(),
});

export const dateRangeSchema = z
  .object({
    from: isoDateSchema.optional(),
    to: isoDateSchema.optional(),
  })
  .refine(({ from, to }) => !from || !to || from <= to, 'from must not be after to');

export const yearMonthSchema = z.object({
  year: z.number().int().min(1970).max(9999),
  month: z.number().int().min(1, 'Month must be 1-12').max(12, 'Month must be 1-12'),
});

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(i => i.message).join(', '));
  }
  return parsed.data;
}
