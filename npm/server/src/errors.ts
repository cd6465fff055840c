/**
 * Server-side error handling.
 */

import { GraphQLError, type GraphQLFormattedError } from 'graphql';

/**
 * Base HTTP error. Carries the status and any headers the response needs.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;

  constructor(
    status: number,
    message: string,
    headers: Record<string, string> = {}
  ) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.headers = headers;
  }
}

/**
 * Unparsable or incomplete request.
 */
export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'BadRequestError';
  }
}

/**
 * Method not supported for this request.
 */
export class MethodNotAllowedError extends HttpError {
  readonly allowed: ReadonlyArray<string>;

  constructor(allowed: ReadonlyArray<string>, message: string) {
    super(405, message, { Allow: allowed.join(', ') });
    this.name = 'MethodNotAllowedError';
    this.allowed = allowed;
  }
}

/**
 * Unexpected failure in a hook or the executor.
 */
export class InternalServerError extends HttpError {
  readonly originalError?: unknown;

  constructor(message = 'Internal server error', originalError?: unknown) {
    super(500, message);
    this.name = 'InternalServerError';
    this.originalError = originalError;
  }

  /**
   * Wraps an unknown thrown value. In production the message is hidden.
   */
  static from(error: unknown): InternalServerError {
    if (process.env.NODE_ENV === 'production') {
      return new InternalServerError('An unexpected error occurred', error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new InternalServerError(message, error);
  }
}

/**
 * Formats an error for a GraphQL response body.
 */
export function formatError(error: unknown): GraphQLFormattedError {
  if (error instanceof GraphQLError) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    return { message: error.message };
  }

  return { message: String(error) };
}
