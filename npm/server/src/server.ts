/**
 * node:http integration.
 *
 * Adapts node (and Connect/Express-style) requests to a {@link GraphQLView}
 * and provides a small routed server around it.
 */

import * as http from 'node:http';
import { HttpError, InternalServerError, formatError } from './errors';
import { renderGraphiQL } from './graphiql';
import { encodeJson } from './json';
import { parseRequestUrl } from './request';
import type { Logger, ViewOptions, ViewRequest, ViewResponse } from './types';
import { GraphQLView } from './view';

/**
 * The parts of `http.IncomingMessage` the adapter reads.
 */
export interface NodeRequest extends AsyncIterable<Buffer | string> {
  readonly method?: string;
  readonly url?: string;
  readonly headers: http.IncomingHttpHeaders;
}

/**
 * The parts of `http.ServerResponse` the adapter writes.
 */
export interface NodeResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

export type NodeHandler = (req: NodeRequest, res: NodeResponse) => Promise<void>;

/**
 * Connect/Express-style middleware.
 */
export type NodeMiddleware = (
  req: NodeRequest,
  res: NodeResponse,
  next: (error?: unknown) => void
) => void;

/**
 * Server options.
 */
export interface ServerOptions {
  /**
   * Port to listen on.
   * @default 4000
   */
  readonly port?: number;

  /**
   * Host to bind to.
   * @default '0.0.0.0'
   */
  readonly host?: string;

  /**
   * Path of the GraphQL endpoint.
   * @default '/graphql'
   */
  readonly endpoint?: string;

  /**
   * Path serving GraphiQL, when `graphiql` is enabled.
   * @default '/graphiql'
   */
  readonly graphiqlPath?: string;
}

/**
 * Server configuration: view options, or a prebuilt view such as a
 * subclass resolving per-request root values.
 */
export type ServerConfig = (ViewOptions | { readonly view: GraphQLView }) & {
  readonly options?: ServerOptions;
};

/**
 * Server info returned after starting.
 */
export interface ServerInfo {
  readonly url: string;
  readonly port: number;
  readonly host: string;
}

export interface GraphQLServer {
  /**
   * Request listener, usable with any node:http server.
   */
  readonly handler: NodeHandler;

  /**
   * Starts the server.
   */
  listen(options?: { port?: number; host?: string }): Promise<ServerInfo>;

  /**
   * Stops the server gracefully.
   */
  stop(): Promise<void>;

  /**
   * Returns the underlying HTTP server (if started).
   */
  readonly httpServer: http.Server | null;
}

const DEFAULT_OPTIONS: Required<ServerOptions> = {
  port: 4000,
  host: '0.0.0.0',
  endpoint: '/graphql',
  graphiqlPath: '/graphiql',
};

/**
 * Converts node headers to a Headers object.
 */
export function convertHeaders(incomingHeaders: http.IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incomingHeaders)) {
    if (value) {
      if (Array.isArray(value)) {
        for (const v of value) {
          headers.append(key, v);
        }
      } else {
        headers.set(key, value);
      }
    }
  }
  return headers;
}

/**
 * Reads a node request into a {@link ViewRequest}.
 */
export async function toViewRequest(req: NodeRequest): Promise<ViewRequest> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }

  return {
    method: req.method || 'GET',
    url: req.url || '/',
    headers: convertHeaders(req.headers),
    body: chunks.length > 0 ? Buffer.concat(chunks) : undefined,
  };
}

/**
 * Writes a {@link ViewResponse} to a node response.
 */
export function writeViewResponse(res: NodeResponse, response: ViewResponse): void {
  res.statusCode = response.status;
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  res.setHeader('Content-Length', String(Buffer.byteLength(response.body)));
  res.end(response.body);
}

function jsonResponse(status: number, data: unknown): ViewResponse {
  return {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
    body: encodeJson(data),
  };
}

function failureResponse(error: unknown, logger: Logger): ViewResponse {
  const internal = InternalServerError.from(error);
  logger('[graphql-view] Request failed', { error });
  return jsonResponse(internal.status, { errors: [formatError(internal)] });
}

/**
 * Creates a request listener serving a view.
 */
export function createGraphQLHandler(view: GraphQLView): NodeHandler {
  return async (req, res) => {
    let response: ViewResponse;
    try {
      response = await view.dispatch(await toViewRequest(req));
    } catch (error) {
      response = failureResponse(error, view.options.logger);
    }
    writeViewResponse(res, response);
  };
}

/**
 * Connect/Express-style middleware serving a view. Errors are passed to
 * `next`.
 */
export function graphqlMiddleware(view: GraphQLView): NodeMiddleware {
  return (req, res, next) => {
    void toViewRequest(req)
      .then((request) => view.dispatch(request))
      .then((response) => writeViewResponse(res, response))
      .catch(next);
  };
}

/**
 * Creates a GraphQL server.
 *
 * @example
 * ```typescript
 * const server = createServer({
 *   schema,
 *   graphiql: true,
 *   options: { port: 4000 },
 * });
 *
 * const info = await server.listen();
 * console.log(`Server running at ${info.url}`);
 * ```
 */
export function createServer(config: ServerConfig): GraphQLServer {
  const options = { ...DEFAULT_OPTIONS, ...config.options };
  const view = 'view' in config ? config.view : new GraphQLView(config);
  const { logger } = view.options;
  const viewHandler = createGraphQLHandler(view);

  let httpServer: http.Server | null = null;

  const handler: NodeHandler = async (req, res) => {
    let pathname: string;
    try {
      pathname = parseRequestUrl(req.url || '/').pathname;
    } catch (error) {
      if (!(error instanceof HttpError)) {
        throw error;
      }
      writeViewResponse(res, jsonResponse(error.status, { errors: [formatError(error)] }));
      return;
    }

    if (pathname === options.endpoint) {
      await viewHandler(req, res);
      return;
    }

    if (view.options.graphiql && pathname === options.graphiqlPath && req.method === 'GET') {
      writeViewResponse(res, {
        status: 200,
        headers: { 'Content-Type': 'text/html; charset=utf-8' },
        body: renderGraphiQL({
          endpoint: options.endpoint,
          version: view.options.graphiqlVersion,
        }),
      });
      return;
    }

    writeViewResponse(res, jsonResponse(404, { errors: [{ message: 'Not found' }] }));
  };

  return {
    handler,

    get httpServer() {
      return httpServer;
    },

    async listen(listenOptions) {
      const port = listenOptions?.port ?? options.port;
      const host = listenOptions?.host ?? options.host;

      const server = http.createServer((req, res) => {
        handler(req, res).catch((error: unknown) => {
          writeViewResponse(res, failureResponse(error, logger));
        });
      });
      httpServer = server;

      return new Promise((resolve, reject) => {
        server.on('error', reject);

        server.listen(port, host, () => {
          logger(`[graphql-view] Server running at http://${host}:${port}${options.endpoint}`);

          if (view.options.graphiql) {
            logger(`[graphql-view] GraphiQL available at http://${host}:${port}${options.graphiqlPath}`);
          }

          resolve({
            url: `http://${host}:${port}`,
            port,
            host,
          });
        });
      });
    },

    async stop() {
      const server = httpServer;
      if (!server) {
        return;
      }

      return new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            logger('[graphql-view] Server stopped');
            httpServer = null;
            resolve();
          }
        });
      });
    },
  };
}
