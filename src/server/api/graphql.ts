/**
 * GraphQL API
 * GraphQL over HTTP: POST for any operation, GET for queries only
 */

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import {
  GraphQLError,
  execute,
  getOperationAST,
  parse,
  validate,
  type DocumentNode
} from 'graphql';

import { schema } from '../../graphql/schema.js';
import { createRootValue } from '../../graphql/resolvers.js';
import { formatExecutionResult } from '../../graphql/errors.js';
import { renderGraphiQL } from '../../graphql/graphiql.js';
import type { TaskService } from '../../services/task-service.js';

export interface GraphQLRouterOptions {
  service: TaskService;
  /** Report unexpected resolver errors verbatim instead of masking them */
  debug: boolean;
  /** Serve GraphiQL on GET requests without a query */
  playground: boolean;
  /** Path the router is mounted on, used by the playground page */
  endpoint?: string;
}

const GraphQLParamsSchema = z.object({
  query: z.string().min(1),
  variables: z.record(z.unknown()).nullish(),
  operationName: z.string().nullish()
});
type GraphQLParams = z.infer<typeof GraphQLParamsSchema>;

function badRequest(c: Context, message: string) {
  return c.json({ errors: [{ message }] }, 400);
}

export function createGraphQLRouter(options: GraphQLRouterOptions): Hono {
  const { service, debug, playground, endpoint = '/graphql' } = options;
  const rootValue = createRootValue(service);
  const router = new Hono({ strict: false });

  async function run(c: Context, params: GraphQLParams, method: 'GET' | 'POST') {
    let document: DocumentNode;
    try {
      document = parse(params.query);
    } catch (error) {
      if (error instanceof GraphQLError) {
        return c.json({ errors: [error.toJSON()] }, 400);
      }
      throw error;
    }

    const validationErrors = validate(schema, document);
    if (validationErrors.length > 0) {
      return c.json({ errors: validationErrors.map(error => error.toJSON()) }, 400);
    }

    const operationName = params.operationName ?? undefined;

    if (method === 'GET') {
      const operation = getOperationAST(document, operationName);
      if (operation && operation.operation !== 'query') {
        c.header('Allow', 'POST');
        return c.json(
          { errors: [{ message: `Can only perform a query operation from a GET request, not ${operation.operation}.` }] },
          405
        );
      }
    }

    const result = await execute({
      schema,
      document,
      rootValue,
      variableValues: params.variables ?? undefined,
      operationName
    });

    return c.json(formatExecutionResult(result, debug));
  }

  // POST /graphql
  router.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch {
      return badRequest(c, 'Request body must be valid JSON.');
    }

    const params = GraphQLParamsSchema.safeParse(body);
    if (!params.success) {
      return badRequest(c, 'Request body must contain a non-empty "query" string.');
    }

    return run(c, params.data, 'POST');
  });

  // GET /graphql
  router.get('/', async (c) => {
    const query = c.req.query('query');

    if (query === undefined) {
      if (playground) {
        return c.html(renderGraphiQL(endpoint));
      }
      return badRequest(c, 'Missing "query" parameter.');
    }

    let variables: unknown;
    const rawVariables = c.req.query('variables');
    if (rawVariables) {
      try {
        variables = JSON.parse(rawVariables);
      } catch {
        return badRequest(c, '"variables" must be a JSON object.');
      }
    }

    const params = GraphQLParamsSchema.safeParse({
      query,
      variables,
      operationName: c.req.query('operationName')
    });
    if (!params.success) {
      return badRequest(c, 'Invalid GraphQL request parameters.');
    }

    return run(c, params.data, 'GET');
  });

  return router;
}
