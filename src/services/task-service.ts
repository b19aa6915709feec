/**
 * Task Service - sole owner of the task list
 * Assigns identifiers and implements create/read/update/delete by id
 */

import type { z, ZodTypeAny } from 'zod';

import {
  TaskCreateInputSchema,
  TaskUpdateInputSchema,
  type Task,
  type TaskCreateInput,
  type TaskUpdateInput
} from '../core/types.js';
import { TaskNotFoundError, TaskValidationError } from '../core/errors.js';

/**
 * Parse a value against a schema, reporting failures as TaskValidationError
 */
export function parseInput<Schema extends ZodTypeAny>(
  schema: Schema,
  value: unknown
): z.output<Schema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw TaskValidationError.fromZodError(result.error);
  }
  return result.data;
}

export class TaskService {
  private tasks: Task[] = [];
  private nextId = 1;

  /**
   * All tasks in insertion order
   */
  listTasks(): Task[] {
    return this.tasks.map(task => ({ ...task }));
  }

  getTask(taskId: number): Task | null {
    const task = this.find(taskId);
    return task ? { ...task } : null;
  }

  getTaskOrThrow(taskId: number): Task {
    const task = this.getTask(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  createTask(input: TaskCreateInput): Task {
    const data = parseInput(TaskCreateInputSchema, input);

    const task: Task = {
      id: this.nextId++,
      title: data.title,
      description: data.description,
      completed: data.completed
    };
    this.tasks.push(task);

    return { ...task };
  }

  /**
   * Apply only the supplied fields. Returns null when the task does not exist.
   */
  updateTask(taskId: number, input: TaskUpdateInput): Task | null {
    const task = this.find(taskId);
    if (!task) {
      return null;
    }

    // Validate everything before touching the record
    const data = parseInput(TaskUpdateInputSchema, input);

    if (data.title !== undefined && data.title !== null) {
      task.title = data.title;
    }
    if (data.description !== undefined && data.description !== null) {
      task.description = data.description;
    }
    if (data.completed !== undefined && data.completed !== null) {
      task.completed = data.completed;
    }

    return { ...task };
  }

  updateTaskOrThrow(taskId: number, input: TaskUpdateInput): Task {
    const task = this.updateTask(taskId, input);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  /**
   * Remove a task. Returns false when the task does not exist.
   * The id is never handed out again.
   */
  deleteTask(taskId: number): boolean {
    const index = this.tasks.findIndex(task => task.id === taskId);
    if (index === -1) {
      return false;
    }
    this.tasks.splice(index, 1);
    return true;
  }

  deleteTaskOrThrow(taskId: number): true {
    if (!this.deleteTask(taskId)) {
      throw new TaskNotFoundError(taskId);
    }
    return true;
  }

  count(): number {
    return this.tasks.length;
  }

  private find(taskId: number): Task | undefined {
    return this.tasks.find(task => task.id === taskId);
  }
}

// ============================================================
// Factory Functions
// ============================================================

let defaultService: TaskService | null = null;

/**
 * Process-wide service used by the running server
 */
export function getDefaultTaskService(): TaskService {
  if (!defaultService) {
    defaultService = new TaskService();
  }
  return defaultService;
}

export function createTaskService(): TaskService {
  return new TaskService();
}
