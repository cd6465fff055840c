/**
 * GraphQL view.
 *
 * Maps an HTTP request onto a GraphQL operation, runs it through the
 * configured executor and maps the result back onto an HTTP response.
 */

import {
  GraphQLError,
  Source,
  execute,
  getOperationAST,
  isSchema,
  parse,
  validate,
  type DocumentNode,
  type ExecutionResult,
  type GraphQLSchema,
} from 'graphql';
import {
  BadRequestError,
  HttpError,
  InternalServerError,
  MethodNotAllowedError,
  formatError,
} from './errors';
import { renderGraphiQL } from './graphiql';
import { encodeJson } from './json';
import { canDisplayGraphiQL, getGraphQLParams, parseBody, parseRequestUrl } from './request';
import type {
  ExecuteFn,
  Logger,
  MaybePromise,
  RequestParameters,
  RootValueResolver,
  ViewOptions,
  ViewRequest,
  ViewResponse,
} from './types';

const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';
const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

/**
 * Response body and status for an executed operation.
 */
interface ExecutionOutcome {
  readonly status: number;
  readonly body: Record<string, unknown>;
}

/**
 * Resolved view configuration.
 */
export interface ResolvedViewOptions {
  readonly schema: GraphQLSchema;
  readonly context: unknown;
  readonly rootValue: unknown;
  readonly pretty: boolean;
  readonly executor: ExecuteFn;
  readonly graphiql: boolean;
  readonly graphiqlVersion: string;
  readonly logger: Logger;
}

function unwrapSchema(options: ViewOptions): { schema: unknown; executor?: ExecuteFn } {
  const candidate = options.schema;
  if (isSchema(candidate)) {
    return { schema: candidate, executor: options.executor };
  }
  return {
    schema: candidate?.schema,
    executor: options.executor ?? candidate?.executor,
  };
}

function resolveOptions(options: ViewOptions): ResolvedViewOptions {
  const { schema, executor } = unwrapSchema(options);

  if (!isSchema(schema)) {
    throw new TypeError('A schema is required to be provided to GraphQLView.');
  }

  return Object.freeze({
    schema,
    context: options.context,
    rootValue: options.rootValue,
    pretty: options.pretty ?? false,
    executor: executor ?? execute,
    graphiql: options.graphiql ?? false,
    graphiqlVersion: options.graphiqlVersion ?? '3',
    logger: options.logger ?? console.log,
  });
}

/**
 * Handles GraphQL requests over HTTP.
 *
 * Subclass and override {@link GraphQLView.resolveRootValue} or
 * {@link GraphQLView.resolveContext} to derive per-request values.
 *
 * @example
 * ```typescript
 * class AuthenticatedView extends GraphQLView<RequestWithUser> {
 *   resolveRootValue(request: RequestWithUser) {
 *     return request.user;
 *   }
 * }
 * ```
 */
export class GraphQLView<TRequest extends ViewRequest = ViewRequest>
  implements RootValueResolver<TRequest>
{
  readonly options: ResolvedViewOptions;

  constructor(options: ViewOptions) {
    this.options = resolveOptions(options);
  }

  resolveRootValue(_request: TRequest): MaybePromise<unknown> {
    return this.options.rootValue;
  }

  resolveContext(request: TRequest): MaybePromise<unknown> {
    return this.options.context === undefined ? request : this.options.context;
  }

  /**
   * Runs a validated document through the executor.
   */
  protected async execute(
    request: TRequest,
    document: DocumentNode,
    params: RequestParameters
  ): Promise<ExecutionResult> {
    return this.options.executor({
      schema: this.options.schema,
      document,
      rootValue: await this.resolveRootValue(request),
      contextValue: await this.resolveContext(request),
      variableValues: params.variables,
      operationName: params.operationName,
    });
  }

  /**
   * Produces the response for a request. Failures become JSON error
   * responses; anything that is not an HTTP error is reported as a 500.
   */
  async dispatch(request: TRequest): Promise<ViewResponse> {
    let pretty = this.options.pretty;

    try {
      const url = parseRequestUrl(request.url);
      pretty = pretty || Boolean(url.searchParams.get('pretty'));

      const method = request.method.toUpperCase();
      if (method !== 'GET' && method !== 'POST') {
        throw new MethodNotAllowedError(
          ['GET', 'POST'],
          'GraphQL only supports GET and POST requests.'
        );
      }

      const data = await parseBody(request);
      const showGraphiQL =
        this.options.graphiql && canDisplayGraphiQL(request, url.searchParams, data);
      const params = getGraphQLParams(url.searchParams, data);

      const outcome = await this.executeGraphQLRequest(request, params, showGraphiQL);

      if (showGraphiQL) {
        return {
          status: 200,
          headers: { 'Content-Type': HTML_CONTENT_TYPE },
          body: renderGraphiQL({
            endpoint: url.pathname,
            version: this.options.graphiqlVersion,
            query: params.query,
            variables: params.variables,
            operationName: params.operationName,
            result: outcome ? encodeJson(outcome.body, pretty) : undefined,
          }),
        };
      }

      // executeGraphQLRequest only skips execution when GraphiQL is shown
      if (!outcome) {
        throw new BadRequestError('Must provide query string.');
      }

      return {
        status: outcome.status,
        headers: { 'Content-Type': JSON_CONTENT_TYPE },
        body: encodeJson(outcome.body, pretty),
      };
    } catch (caught) {
      const error = caught instanceof HttpError ? caught : InternalServerError.from(caught);
      if (error instanceof InternalServerError) {
        this.options.logger('[graphql-view] Request failed', {
          method: request.method,
          url: request.url,
          error: error.originalError,
        });
      }
      return {
        status: error.status,
        headers: { ...error.headers, 'Content-Type': JSON_CONTENT_TYPE },
        body: encodeJson({ errors: [formatError(error)] }, pretty),
      };
    }
  }

  /**
   * Parses, validates and executes the request's operation.
   * Returns `null` when GraphiQL should render without a result.
   */
  protected async executeGraphQLRequest(
    request: TRequest,
    params: RequestParameters,
    showGraphiQL: boolean
  ): Promise<ExecutionOutcome | null> {
    if (!params.query) {
      if (showGraphiQL) {
        return null;
      }
      throw new BadRequestError('Must provide query string.');
    }

    let document: DocumentNode;
    try {
      document = parse(new Source(params.query, 'GraphQL request'));
    } catch (error) {
      return { status: 400, body: { errors: [formatError(error)] } };
    }

    const validationErrors = validate(this.options.schema, document);
    if (validationErrors.length > 0) {
      return { status: 400, body: { errors: validationErrors.map(formatError) } };
    }

    if (request.method.toUpperCase() === 'GET') {
      const operation = getOperationAST(document, params.operationName);
      if (operation && operation.operation !== 'query') {
        if (showGraphiQL) {
          return null;
        }
        throw new MethodNotAllowedError(
          ['POST'],
          `Can only perform a ${operation.operation} operation from a POST request.`
        );
      }
    }

    let result: ExecutionResult;
    try {
      result = await this.execute(request, document, params);
    } catch (error) {
      if (error instanceof GraphQLError) {
        return { status: 400, body: { errors: [formatError(error)] } };
      }
      throw InternalServerError.from(error);
    }

    const body: Record<string, unknown> = { data: result.data ?? null };
    if (result.errors && result.errors.length > 0) {
      body.errors = result.errors.map(formatError);
    }

    const failed = result.data == null && body.errors !== undefined;
    return { status: failed ? 400 : 200, body };
  }
}
