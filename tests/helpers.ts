/**
 * Shared helpers for HTTP-level tests
 */

import { z } from 'zod';
import type { Hono } from 'hono';

import { TaskSchema } from '../src/core/types.js';
import { createApp } from '../src/server/index.js';
import { TaskService } from '../src/services/task-service.js';
import type { AppConfig } from '../src/config.js';

export const GraphQLBodySchema = z.object({
  data: z.record(z.unknown()).nullish(),
  errors: z.array(z.object({
    message: z.string(),
    path: z.array(z.union([z.string(), z.number()])).optional(),
    extensions: z.record(z.unknown()).optional()
  })).optional()
});
export type GraphQLBody = z.infer<typeof GraphQLBodySchema>;

export const ErrorDetailSchema = z.object({ detail: z.string() });
export const TaskListSchema = z.array(TaskSchema);

export function createTestApp(config: Partial<AppConfig> = {}, service = new TaskService()): {
  app: Hono;
  service: TaskService;
} {
  const app = createApp({ service, config: { logRequests: false, ...config } });
  return { app, service };
}

export async function postGraphQL(
  app: Hono,
  query: string,
  variables?: Record<string, unknown>
): Promise<{ status: number; body: GraphQLBody }> {
  const res = await app.request('/graphql', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ query, variables })
  });
  return { status: res.status, body: GraphQLBodySchema.parse(await res.json()) };
}
