/**
 * Tasks API
 * REST endpoints mirroring the GraphQL operations
 */

import { Hono, type Context } from 'hono';

import {
  TaskCreateInputSchema,
  TaskIdParamSchema,
  TaskUpdateInputSchema
} from '../../core/types.js';
import { TaskValidationError, isTaskError } from '../../core/errors.js';
import { parseInput, type TaskService } from '../../services/task-service.js';

async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new TaskValidationError('Request body must be valid JSON');
  }
}

function parseTaskId(c: Context): number {
  try {
    return parseInput(TaskIdParamSchema, c.req.param('taskId'));
  } catch (error) {
    if (error instanceof TaskValidationError) {
      throw new TaskValidationError(`Task ID ${error.message}`, 'taskId');
    }
    throw error;
  }
}

export function createTasksRouter(service: TaskService): Hono {
  const router = new Hono({ strict: false });

  router.onError((error, c) => {
    if (isTaskError(error)) {
      return c.json({ detail: error.message }, error.httpStatus);
    }
    console.error('[tasks] Unexpected error:', error);
    return c.json({ detail: 'Internal server error' }, 500);
  });

  // GET /api/v1/tasks - List all tasks
  router.get('/', (c) => c.json(service.listTasks()));

  // GET /api/v1/tasks/:taskId - Get one task
  router.get('/:taskId', (c) => c.json(service.getTaskOrThrow(parseTaskId(c))));

  // POST /api/v1/tasks - Create a task
  router.post('/', async (c) => {
    const body = await readJsonBody(c);
    const task = service.createTask(parseInput(TaskCreateInputSchema, body));
    return c.json(task, 201);
  });

  // PUT /api/v1/tasks/:taskId - Partial update
  router.put('/:taskId', async (c) => {
    const taskId = parseTaskId(c);
    const body = await readJsonBody(c);
    return c.json(service.updateTaskOrThrow(taskId, parseInput(TaskUpdateInputSchema, body)));
  });

  // DELETE /api/v1/tasks/:taskId - Delete a task
  router.delete('/:taskId', (c) => {
    service.deleteTaskOrThrow(parseTaskId(c));
    return c.body(null, 204);
  });

  return router;
}
