/**
 * Core types for the TodoList API
 * Task records and request inputs, defined once as Zod schemas
 */

import { z } from 'zod';

// ============================================================
// Task
// ============================================================

export const TaskIdSchema = z.number().int().positive();
export type TaskId = z.infer<typeof TaskIdSchema>;

// Whitespace-only titles are rejected, but the stored value is kept verbatim
export const TaskTitleSchema = z
  .string()
  .refine((title) => title.trim().length > 0, { message: 'must not be empty' });

export const TaskSchema = z.object({
  id: TaskIdSchema,
  title: TaskTitleSchema,
  description: z.string(),
  completed: z.boolean()
});
export type Task = z.infer<typeof TaskSchema>;

// ============================================================
// Inputs
// ============================================================

// id is assigned by the service, never by the caller
export const TaskCreateInputSchema = z.object({
  title: TaskTitleSchema,
  description: z.string(),
  completed: z.boolean().default(false)
});
export type TaskCreateInput = z.input<typeof TaskCreateInputSchema>;

// null is accepted and means "leave unchanged", same as omitting the field
export const TaskUpdateInputSchema = z.object({
  title: TaskTitleSchema.nullish(),
  description: z.string().nullish(),
  completed: z.boolean().nullish()
});
export type TaskUpdateInput = z.input<typeof TaskUpdateInputSchema>;

// Path parameters arrive as strings. Any integer is accepted, unknown ids are
// a lookup miss rather than a malformed request.
export const TaskIdParamSchema = z
  .string()
  .regex(/^-?\d+$/, { message: 'must be an integer' })
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), { message: 'must be a safe integer' });
