/**
 * Core types for the GraphQL view.
 */

import type {
  ExecutionArgs,
  ExecutionResult,
  GraphQLSchema,
} from 'graphql';

/**
 * Values that may or may not be wrapped in a promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Executes a parsed and validated GraphQL document.
 * `execute` from `graphql` is the default.
 */
export type ExecuteFn = (args: ExecutionArgs) => MaybePromise<ExecutionResult>;

/**
 * Logger function, compatible with `console.log`.
 */
export type Logger = (message: string, data?: unknown) => void;

/**
 * A schema wrapper carrying its own execution strategy.
 */
export interface SchemaWithExecutor {
  readonly schema: GraphQLSchema;
  readonly executor?: ExecuteFn;
}

/**
 * Framework-neutral incoming request.
 */
export interface ViewRequest {
  readonly method: string;
  /**
   * Path plus query string, e.g. `/graphql?query={hello}`.
   */
  readonly url: string;
  readonly headers: Headers;
  /**
   * Raw request body, if any. Bytes are kept as sent so multipart parts
   * are not decoded as text.
   */
  readonly body?: string | Uint8Array;
}

/**
 * Response produced by the view.
 */
export interface ViewResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/**
 * GraphQL operation extracted from a request.
 */
export interface RequestParameters {
  readonly query: string | undefined;
  readonly variables: Readonly<Record<string, unknown>> | undefined;
  readonly operationName: string | undefined;
}

/**
 * View configuration.
 */
export interface ViewOptions {
  /**
   * Schema to execute against.
   */
  readonly schema: GraphQLSchema | SchemaWithExecutor;

  /**
   * Context value passed to resolvers.
   * @default the request
   */
  readonly context?: unknown;

  /**
   * Root value passed to the executor.
   */
  readonly rootValue?: unknown;

  /**
   * Pretty-print JSON responses.
   * @default false
   */
  readonly pretty?: boolean;

  /**
   * Execution strategy.
   * @default execute from graphql
   */
  readonly executor?: ExecuteFn;

  /**
   * Serve GraphiQL to browsers.
   * @default false
   */
  readonly graphiql?: boolean;

  /**
   * GraphiQL major version loaded from the CDN.
   * @default '3'
   */
  readonly graphiqlVersion?: string;

  /**
   * @default console.log
   */
  readonly logger?: Logger;
}

/**
 * Per-request root value resolution.
 */
export interface RootValueResolver<TRequest extends ViewRequest = ViewRequest> {
  resolveRootValue(request: TRequest): MaybePromise<unknown>;
}
