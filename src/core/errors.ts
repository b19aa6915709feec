/**
 * Task errors
 * Each error knows its code and the HTTP status it maps to, so the GraphQL
 * and REST surfaces report the same failure the same way
 */

import type { ZodError } from 'zod';

export type TaskErrorCode = 'VALIDATION_ERROR' | 'TASK_NOT_FOUND';

export abstract class TaskError extends Error {
  abstract readonly code: TaskErrorCode;
  abstract readonly httpStatus: 400 | 404;

  /**
   * Machine-readable details attached to GraphQL errors
   */
  toExtensions(): Record<string, unknown> {
    return {
      code: this.code,
      http_status: this.httpStatus
    };
  }
}

export class TaskValidationError extends TaskError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly httpStatus = 400 as const;

  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = 'TaskValidationError';
  }

  static fromZodError(error: ZodError): TaskValidationError {
    const message = error.issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ');
    const first = error.issues[0]?.path[0];
    return new TaskValidationError(message, typeof first === 'string' ? first : undefined);
  }

  override toExtensions(): Record<string, unknown> {
    const extensions = super.toExtensions();
    if (this.field !== undefined) {
      extensions.field = this.field;
    }
    return extensions;
  }
}

export class TaskNotFoundError extends TaskError {
  readonly code = 'TASK_NOT_FOUND' as const;
  readonly httpStatus = 404 as const;

  constructor(readonly taskId: number) {
    super(`Task with ID ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }

  override toExtensions(): Record<string, unknown> {
    return { ...super.toExtensions(), task_id: this.taskId };
  }
}

export function isTaskError(error: unknown): error is TaskError {
  return error instanceof TaskError;
}
