/**
 * GraphQL resolvers
 * Root-value resolvers delegating every operation to a TaskService
 */

import { GraphQLError } from 'graphql';

import type { Task, TaskCreateInput, TaskUpdateInput } from '../core/types.js';
import { isTaskError } from '../core/errors.js';
import type { TaskService } from '../services/task-service.js';

interface TaskIdArgs {
  taskId: number;
}

interface CreateTaskArgs {
  taskInput: TaskCreateInput;
}

interface UpdateTaskArgs extends TaskIdArgs {
  taskInput: TaskUpdateInput;
}

export interface TaskRootValue {
  tasks(): Task[];
  task(args: TaskIdArgs): Task | null;
  taskStrict(args: TaskIdArgs): Task;
  createTask(args: CreateTaskArgs): Task;
  updateTask(args: UpdateTaskArgs): Task | null;
  updateTaskStrict(args: UpdateTaskArgs): Task;
  deleteTask(args: TaskIdArgs): boolean;
  deleteTaskStrict(args: TaskIdArgs): boolean;
}

/**
 * Turn domain errors into GraphQL errors carrying code/status extensions.
 * Anything else propagates untouched.
 */
function withTaskErrors<T>(resolve: () => T): T {
  try {
    return resolve();
  } catch (error) {
    if (isTaskError(error)) {
      throw new GraphQLError(error.message, {
        originalError: error,
        extensions: error.toExtensions()
      });
    }
    throw error;
  }
}

export function createRootValue(service: TaskService): TaskRootValue {
  return {
    tasks: () => service.listTasks(),

    task: ({ taskId }) => service.getTask(taskId),

    taskStrict: ({ taskId }) =>
      withTaskErrors(() => service.getTaskOrThrow(taskId)),

    createTask: ({ taskInput }) =>
      withTaskErrors(() => service.createTask(taskInput)),

    updateTask: ({ taskId, taskInput }) =>
      withTaskErrors(() => service.updateTask(taskId, taskInput)),

    updateTaskStrict: ({ taskId, taskInput }) =>
      withTaskErrors(() => service.updateTaskOrThrow(taskId, taskInput)),

    deleteTask: ({ taskId }) => service.deleteTask(taskId),

    deleteTaskStrict: ({ taskId }) =>
      withTaskErrors(() => service.deleteTaskOrThrow(taskId))
  };
}
