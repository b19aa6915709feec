/**
 * TodoList HTTP Server
 * Serves the GraphQL endpoint, the REST mirror and the health check
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { Server } from 'node:net';
import { serve, type ServerType } from '@hono/node-server';

import { createApiRouter } from './api/index.js';
import { createGraphQLRouter } from './api/graphql.js';
import { createHealthRouter } from './api/health.js';
import { DEFAULT_CONFIG, type AppConfig } from '../config.js';
import { getDefaultTaskService, type TaskService } from '../services/task-service.js';

export interface AppOptions {
  /** Defaults to the process-wide service */
  service?: TaskService;
  config?: Partial<AppConfig>;
}

export function createApp(options: AppOptions = {}): Hono {
  const service = options.service ?? getDefaultTaskService();
  const config: AppConfig = { ...DEFAULT_CONFIG, ...options.config };

  const app = new Hono({ strict: false });

  // Middleware
  app.use('/*', cors());
  if (config.logRequests) {
    app.use('/*', logger());
  }

  app.route('/graphql', createGraphQLRouter({
    service,
    debug: config.debug,
    playground: config.playground,
    endpoint: '/graphql'
  }));
  app.route('/api', createApiRouter(service));
  app.route('/health', createHealthRouter(service));

  app.notFound((c) => c.json({ detail: 'Not found' }, 404));

  return app;
}

let serverInstance: ServerType | null = null;

/**
 * Start the HTTP server
 */
export function startServer(config: AppConfig = DEFAULT_CONFIG, service?: TaskService): ServerType {
  if (serverInstance) {
    return serverInstance;
  }

  const app = createApp({ service, config });

  serverInstance = serve({
    fetch: app.fetch,
    hostname: config.host,
    port: config.port
  }, (info) => {
    console.log(`✅ TodoList API listening on http://${config.host}:${info.port}/graphql`);
  });

  // Listen failures (EADDRINUSE, EACCES) arrive asynchronously as 'error' events
  const listener: Server = serverInstance;
  listener.on('error', (error) => {
    console.error(`❌ Could not start server on ${config.host}:${config.port}:`, error.message);
    process.exit(1);
  });

  return serverInstance;
}

/**
 * Stop the HTTP server
 */
export function stopServer(): Promise<void> {
  const server = serverInstance;
  serverInstance = null;
  if (!server) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
