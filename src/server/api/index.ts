/**
 * API Router
 * Central router for the REST endpoints
 */

import { Hono } from 'hono';
import { createTasksRouter } from './tasks.js';
import type { TaskService } from '../../services/task-service.js';

export function createApiRouter(service: TaskService): Hono {
  return new Hono({ strict: false })
    .route('/v1/tasks', createTasksRouter(service));
}
