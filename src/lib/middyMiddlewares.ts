/**
 * Shared Middy middlewares: correlation ID, request/response logging (INFO + TRACE),
 * staff API key check and HTTP error handling.
 */

import { timingSafeEqual } from 'node:crypto';
import middy, { type MiddlewareObj } from '@middy/core';
import httpErrorHandler from '@middy/http-error-handler';
import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context as LambdaContext } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import { HttpError, UnauthorizedError } from './errors';

const LOG_LEVEL = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
const isTrace = LOG_LEVEL === 'trace';

/** Context extended with correlationId (set by our middleware). */
export interface MiddyContext extends LambdaContext {
  correlationId?: string;
}

/** The parts of an API Gateway event the handlers read. */
export type HttpEvent = Pick<
  APIGatewayProxyEvent,
  'body' | 'headers' | 'isBase64Encoded' | 'pathParameters' | 'queryStringParameters'
> & { requestContext?: { requestId?: string } };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Case-insensitive header lookup. */
export function getHeader(headers: Record<string, string | undefined> | null | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

function getCorrelationIdFromEvent(event: unknown): string | null {
  if (!isRecord(event)) return null;
  // API Gateway
  const headers = event.headers;
  if (isRecord(headers)) {
    const id = headers['X-Correlation-Id'] ?? headers['x-correlation-id'];
    if (typeof id === 'string' && id) return id;
    const ctx = event.requestContext;
    if (isRecord(ctx) && typeof ctx.requestId === 'string' && ctx.requestId) return ctx.requestId;
  }
  return null;
}

function isHttpEvent(event: unknown): boolean {
  return isRecord(event) && 'headers' in event && 'body' in event;
}

/** Correlation ID middleware: set from header/requestId or generate; add to HTTP response headers. */
export const correlationIdMiddleware = <E, R>(): MiddlewareObj<E, R, Error, MiddyContext> => {
  return {
    before: async (request) => {
      request.context.correlationId = getCorrelationIdFromEvent(request.event) ?? uuidv4();
    },
    after: async (request) => {
      const response: unknown = request.response;
      if (!isRecord(response)) return;
      if (!isHttpEvent(request.event)) return;
      const correlationId = request.context.correlationId;
      if (!correlationId) return;
      const headers = isRecord(response.headers) ? response.headers : {};
      headers['X-Correlation-Id'] = correlationId;
      response.headers = headers;
    },
  };
};

/** Request/response logger: INFO = static message, TRACE = full event/response (when LOG_LEVEL=trace). */
export function requestResponseLoggerMiddleware<E, R>(functionName: string): MiddlewareObj<E, R, Error, MiddyContext> {
  return {
    before: async (request) => {
      const name = functionName || request.context.functionName || 'lambda';
      const correlationId = request.context.correlationId ?? '';
      console.info(JSON.stringify({ level: 'INFO', message: 'Lambda invoked', functionName: name, correlationId }));
      if (isTrace) {
        console.info(JSON.stringify({ level: 'TRACE', message: 'Lambda request', functionName: name, correlationId, event: request.event }));
      }
    },
    after: async (request) => {
      const name = functionName || request.context.functionName || 'lambda';
      const correlationId = request.context.correlationId ?? '';
      console.info(JSON.stringify({ level: 'INFO', message: 'Lambda completed', functionName: name, correlationId }));
      if (isTrace) {
        console.info(JSON.stringify({ level: 'TRACE', message: 'Lambda response', functionName: name, correlationId, response: request.response }));
      }
    },
  };
}

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Rejects the request with 401 unless X-Api-Key matches the staff key. An unset key locks the endpoint. */
export function staffApiKeyMiddleware<R>(getStaffApiKey: () => string): MiddlewareObj<HttpEvent, R, Error, MiddyContext> {
  return {
    before: async (request) => {
      const expected = getStaffApiKey();
      const given = getHeader(request.event.headers, 'x-api-key') ?? '';
      if (!expected || !sameSecret(given, expected)) {
        throw new UnauthorizedError('Invalid or missing API key');
      }
    },
  };
}

/** Render HttpErrors as JSON `{ error }`; anything else is left to the fallback handler. */
export function jsonHttpErrorMiddleware<E>(): MiddlewareObj<E, APIGatewayProxyResult, Error, MiddyContext> {
  return {
    onError: async (request) => {
      const err = request.error;
      if (request.response !== undefined || !(err instanceof HttpError)) return;
      if (err.statusCode >= 500) console.error('HTTP error', err);
      request.response = {
        statusCode: err.statusCode,
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ error: err.message }),
      };
    },
  };
}

/** Wrap an API Gateway handler with correlation ID, logger and HTTP error handling. */
export function withMiddyHttp<E extends HttpEvent = HttpEvent>(
  handler: (event: E, context: MiddyContext) => Promise<APIGatewayProxyResult>,
  functionName?: string,
  options?: { staffApiKey?: () => string }
) {
  const name = functionName ?? 'http';
  const wrapped = middy<E, APIGatewayProxyResult, Error, MiddyContext>(handler)
    .use(correlationIdMiddleware<E, APIGatewayProxyResult>())
    .use(requestResponseLoggerMiddleware<E, APIGatewayProxyResult>(name))
    .use(httpErrorHandler({ fallbackMessage: 'Internal server error' }))
    .use(jsonHttpErrorMiddleware<E>());
  if (options?.staffApiKey) wrapped.use(staffApiKeyMiddleware<APIGatewayProxyResult>(options.staffApiKey));
  return wrapped;
}

/** Wrap a directly invoked handler (batch jobs) with correlation ID and logger. */
export function withMiddy<E = unknown, R = unknown>(
  handler: (event: E, context: MiddyContext) => Promise<R>,
  functionName?: string
) {
  const name = functionName ?? 'lambda';
  return middy<E, R, Error, MiddyContext>(handler)
    .use(correlationIdMiddleware<E, R>())
    .use(requestResponseLoggerMiddleware<E, R>(name));
}
