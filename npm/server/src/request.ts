/**
 * Request parsing: body decoding, GraphQL parameter extraction and
 * Accept header negotiation.
 */

import { BadRequestError } from './errors';
import type { RequestParameters, ViewRequest } from './types';

/**
 * Decoded request body.
 */
export type RequestData = Readonly<Record<string, unknown>>;

/**
 * Returns the request mimetype, without parameters.
 */
export function getContentType(headers: Headers): string {
  const contentType = headers.get('Content-Type') || '';
  return contentType.split(';')[0].trim().toLowerCase();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the request URL, relative to the server root.
 */
export function parseRequestUrl(url: string): URL {
  try {
    return new URL(url, 'http://localhost');
  } catch {
    throw new BadRequestError('Invalid request URL.');
  }
}

/**
 * Returns the request body as text.
 */
export function bodyText(request: ViewRequest): string {
  const { body } = request;
  if (body === undefined) {
    return '';
  }
  return typeof body === 'string' ? body : new TextDecoder().decode(body);
}

async function parseMultipart(request: ViewRequest): Promise<RequestData> {
  const contentType = request.headers.get('Content-Type') || '';
  let form: FormData;
  try {
    form = await new Request('http://localhost/', {
      method: 'POST',
      headers: { 'Content-Type': contentType },
      body: request.body ?? '',
    }).formData();
  } catch {
    throw new BadRequestError('POST body sent invalid form data.');
  }

  // File parts carry no GraphQL parameters
  const data: Record<string, string> = {};
  form.forEach((value, key) => {
    if (typeof value === 'string') {
      data[key] = value;
    }
  });
  return data;
}

/**
 * Parses the request body based on content type.
 */
export async function parseBody(request: ViewRequest): Promise<RequestData> {
  switch (getContentType(request.headers)) {
    case 'application/graphql':
      return { query: bodyText(request) };

    case 'application/json': {
      let parsed: unknown;
      try {
        parsed = JSON.parse(bodyText(request));
      } catch {
        throw new BadRequestError('POST body sent invalid JSON.');
      }
      if (!isPlainObject(parsed)) {
        throw new BadRequestError('POST body sent invalid JSON.');
      }
      return parsed;
    }

    case 'application/x-www-form-urlencoded':
      return Object.fromEntries(new URLSearchParams(bodyText(request)));

    case 'multipart/form-data':
      return parseMultipart(request);

    default:
      return {};
  }
}

function pickString(
  searchParams: URLSearchParams,
  data: RequestData,
  key: string
): string | undefined {
  const fromQuery = searchParams.get(key);
  if (fromQuery) {
    return fromQuery;
  }
  const fromBody = data[key];
  return typeof fromBody === 'string' && fromBody ? fromBody : undefined;
}

/**
 * Extracts the GraphQL operation. The query string takes precedence over
 * the body for every parameter.
 */
export function getGraphQLParams(
  searchParams: URLSearchParams,
  data: RequestData
): RequestParameters {
  const query = pickString(searchParams, data, 'query');
  const operationName = pickString(searchParams, data, 'operationName');

  let variables: unknown = searchParams.get('variables') || data.variables;
  if (variables === '') {
    variables = undefined;
  }
  if (typeof variables === 'string') {
    try {
      variables = JSON.parse(variables);
    } catch {
      throw new BadRequestError('Variables are invalid JSON.');
    }
  }
  if (variables === undefined || variables === null) {
    return { query, variables: undefined, operationName };
  }
  if (!isPlainObject(variables)) {
    throw new BadRequestError('Variables are invalid JSON.');
  }

  return { query, variables, operationName };
}

interface MediaRange {
  readonly type: string;
  readonly subtype: string;
  readonly quality: number;
}

/**
 * Parses an Accept header into media ranges.
 */
export function parseAccept(accept: string): MediaRange[] {
  const ranges: MediaRange[] = [];

  for (const part of accept.split(',')) {
    const [mediaType, ...params] = part.split(';');
    const [type, subtype] = mediaType.trim().toLowerCase().split('/');
    if (!type || !subtype) continue;

    let quality = 1;
    for (const param of params) {
      const [name, value] = param.split('=');
      if (name.trim() === 'q' && value !== undefined) {
        const q = Number.parseFloat(value);
        quality = Number.isNaN(q) ? 0 : Math.min(Math.max(q, 0), 1);
      }
    }

    ranges.push({ type, subtype, quality });
  }

  return ranges;
}

function specificity(range: MediaRange): number {
  if (range.type === '*') return 0;
  if (range.subtype === '*') return 1;
  return 2;
}

/**
 * Quality the client assigns to a mimetype. The most specific matching
 * range wins; unmatched types get 0.
 */
export function acceptQuality(ranges: ReadonlyArray<MediaRange>, mimetype: string): number {
  const [type, subtype] = mimetype.split('/');
  let best: MediaRange | undefined;

  for (const range of ranges) {
    const matches =
      (range.type === '*' || range.type === type) &&
      (range.subtype === '*' || range.subtype === subtype);
    if (matches && (!best || specificity(range) > specificity(best))) {
      best = range;
    }
  }

  return best?.quality ?? 0;
}

/**
 * Checks if a request prefers HTML over JSON.
 */
export function acceptsHTML(headers: Headers): boolean {
  const accept = headers.get('Accept');
  if (!accept) {
    return false;
  }
  const ranges = parseAccept(accept);
  return acceptQuality(ranges, 'text/html') > acceptQuality(ranges, 'application/json');
}

/**
 * GraphiQL is offered to browsers unless the client asked for the raw result.
 */
export function canDisplayGraphiQL(
  request: ViewRequest,
  searchParams: URLSearchParams,
  data: RequestData
): boolean {
  const raw = searchParams.has('raw') || 'raw' in data;
  return !raw && acceptsHTML(request.headers);
}
