/**
 * TodoList CLI program
 * Starts the API server or prints its GraphQL schema
 */

import { Command } from 'commander';
import { printSchema } from 'graphql';

import { loadConfig, type AppConfig } from '../config.js';
import { schema } from '../graphql/schema.js';
import { startServer, stopServer } from '../server/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('todolist-api')
    .description('TodoList GraphQL API')
    .version('1.0.0');

  /**
   * Serve command
   */
  program
    .command('serve')
    .description('Start the HTTP server')
    .option('-p, --port <number>', 'Port to listen on (overrides PORT)')
    .option('-H, --host <host>', 'Interface to bind (overrides HOST)')
    .action((options: { port?: string; host?: string }) => {
      let config: AppConfig;
      try {
        config = loadConfig({
          ...process.env,
          ...(options.port !== undefined ? { PORT: options.port } : {}),
          ...(options.host !== undefined ? { HOST: options.host } : {})
        });
      } catch (error) {
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
      }

      startServer(config);

      const shutdown = (signal: string) => {
        console.log(`\n${signal} received, shutting down...`);
        stopServer()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error('Shutdown failed:', error);
            process.exit(1);
          });
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });

  /**
   * Schema command
   */
  program
    .command('schema')
    .description('Print the GraphQL schema (SDL)')
    .action(() => {
      console.log(printSchema(schema));
    });

  return program;
}
