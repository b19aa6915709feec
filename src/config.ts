/**
 * Server configuration
 * Read from environment variables and validated with Zod
 */

import { z } from 'zod';

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function envFlag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return defaultValue;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) return true;
      if (FALSE_VALUES.includes(normalized)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
      });
      return z.NEVER;
    });
}

const EnvSchema = z.object({
  HOST: z.string().trim().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  DEBUG: envFlag(false),
  GRAPHQL_PLAYGROUND: envFlag(true),
  LOG_REQUESTS: envFlag(true)
});

export interface AppConfig {
  host: string;
  port: number;
  /** Unmasked error messages for unexpected GraphQL failures */
  debug: boolean;
  /** GraphiQL page on GET /graphql */
  playground: boolean;
  logRequests: boolean;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_CONFIG: AppConfig = {
  host: '127.0.0.1',
  port: 8000,
  debug: false,
  playground: true,
  logRequests: true
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    debug: parsed.DEBUG,
    playground: parsed.GRAPHQL_PLAYGROUND,
    logRequests: parsed.LOG_REQUESTS
  };
}
