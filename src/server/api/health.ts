/**
 * Health API
 * Liveness check for load balancers and container probes
 */

import { Hono } from 'hono';
import type { TaskService } from '../../services/task-service.js';

export const SERVICE_NAME = 'TodoList GraphQL API';

export function createHealthRouter(service: TaskService): Hono {
  const router = new Hono({ strict: false });

  // GET /health
  router.get('/', (c) => c.json({
    status: 'healthy',
    service: SERVICE_NAME,
    taskCount: service.count()
  }));

  return router;
}
