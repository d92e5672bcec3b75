import { z } from 'zod';

export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;
export const TASK_PRIORITIES = ['low', 'medium', 'high'] as const;

export const taskStatusSchema = z.enum(TASK_STATUSES);
export const taskPrioritySchema = z.enum(TASK_PRIORITIES);

const titleSchema = z.string().min(1).max(200);
const descriptionSchema = z.string().max(1000).nullable();

const isoDate = z.string().date();
const isoDateTime = z.string().datetime({ offset: true, local: true });
const OFFSET_SUFFIX = /(Z|[+-]\d{2}(?::?\d{2})?)$/;

/**
 * Reads an ISO 8601 date or date-time as a UTC instant. A bare date is
 * midnight UTC; a date-time without an offset is taken as UTC.
 */
export function parseDueDate(value: string): Date {
  if (isoDate.safeParse(value).success) {
    return new Date(`${value}T00:00:00.000Z`);
  }
  const match = OFFSET_SUFFIX.exec(value);
  if (!match) {
    return new Date(`${value}Z`);
  }
  const offset = match[1];
  if (offset === 'Z') {
    return new Date(value);
  }
  // +05, +0500 and +05:00 all become +05:00
  const digits = offset.replace(':', '');
  const normalized = `${digits.slice(0, 3)}:${digits.slice(3) || '00'}`;
  return new Date(value.slice(0, -offset.length) + normalized);
}

const dueDateSchema = z
  .string()
  .refine((value) => isoDate.safeParse(value).success || isoDateTime.safeParse(value).success, {
    message: 'Expected an ISO 8601 date or date-time',
  })
  .transform(parseDueDate)
  .nullable();

/** Body of POST /tasks. Server-assigned fields are stripped. */
export const createTaskSchema = z.object({
  title: titleSchema,
  description: descriptionSchema.optional(),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  due_date: dueDateSchema.optional(),
});

/** Body of PUT/PATCH /tasks/:id. A missing key leaves the column untouched. */
export const updateTaskSchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema.optional(),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  due_date: dueDateSchema.optional(),
});

export const taskReadSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  status: taskStatusSchema,
  priority: taskPrioritySchema,
  due_date: z.date().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

export const taskListSchema = z.object({
  tasks: z.array(taskReadSchema),
  count: z.number().int().nonnegative(),
});

const MAX_PAGE_SIZE = 100;

// Oversized values are clamped rather than rejected.
const pageValue = (max: number) =>
  z
    .string()
    .regex(/^\d+$/, 'Expected a non-negative integer')
    .transform((value) => Math.min(Number(value), max));

export const listQuerySchema = z.object({
  offset: pageValue(Number.MAX_SAFE_INTEGER).default('0'),
  limit: pageValue(MAX_PAGE_SIZE).default(String(MAX_PAGE_SIZE)),
});

/**
 * Path id. `label` keeps the digits as sent, so a not-found message never
 * shows a rounded number.
 */
export const taskIdParamSchema = z
  .object({
    id: z.string().regex(/^-?\d+$/, 'Expected an integer'),
  })
  .transform(({ id }) => ({ id: Number(id), label: id }));
