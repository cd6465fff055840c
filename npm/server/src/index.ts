/**
 * graphql-http-view - serve a GraphQL schema over HTTP
 *
 * Parses GraphQL requests, hands them to the `graphql` executor and writes
 * the result back as JSON, with optional GraphiQL for browsers.
 */

export * from './view';
export * from './server';
export * from './request';
export * from './graphiql';
export * from './json';
export * from './errors';
export * from './types';
