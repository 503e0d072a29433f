import type { APIGatewayProxyResult } from 'aws-lambda';
import { ValidationError } from './errors';
import type { HttpEvent } from './middyMiddlewares';

export function json(statusCode: number, body: unknown): APIGatewayProxyResult {
  return { statusCode, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) };
}

/** Parsed request body; an absent body reads as {}. */
export function readJsonBody(event: HttpEvent): unknown {
  const raw = event.isBase64Encoded && event.body ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  if (!raw) return {};
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch {
    throw new ValidationError('Invalid JSON body');
  }
}

export function requirePathParam(event: HttpEvent, name: string): string {
  const value = event.pathParameters?.[name]?.trim();
  if (!value) throw new ValidationError(`Missing ${name}`);
  return value;
}
