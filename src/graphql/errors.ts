/**
 * GraphQL error formatting
 */

import { GraphQLError, type ExecutionResult, type GraphQLFormattedError } from 'graphql';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export interface FormattedExecutionResult {
  data?: Record<string, unknown> | null;
  errors?: GraphQLFormattedError[];
}

/**
 * Errors raised by something other than GraphQL itself or a resolver's
 * deliberate GraphQLError (i.e. bugs)
 */
function isUnexpected(error: GraphQLError): boolean {
  return error.originalError !== undefined && !(error.originalError instanceof GraphQLError);
}

export function formatGraphQLError(error: GraphQLError, debug: boolean): GraphQLFormattedError {
  if (!isUnexpected(error)) {
    return error.toJSON();
  }

  console.error('[graphql] Unexpected resolver error:', error.originalError);

  if (debug) {
    return {
      ...error.toJSON(),
      extensions: { ...error.extensions, code: 'INTERNAL_SERVER_ERROR' }
    };
  }

  return {
    message: INTERNAL_ERROR_MESSAGE,
    locations: error.locations,
    path: error.path,
    extensions: { code: 'INTERNAL_SERVER_ERROR' }
  };
}

export function formatExecutionResult(result: ExecutionResult, debug: boolean): FormattedExecutionResult {
  const formatted: FormattedExecutionResult = {};
  if (result.errors && result.errors.length > 0) {
    formatted.errors = result.errors.map(error => formatGraphQLError(error, debug));
  }
  if ('data' in result) {
    formatted.data = result.data ?? null;
  }
  return formatted;
}
