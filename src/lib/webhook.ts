/**
 * Helpers shared by the gateway webhook handlers, which always answer in plain text.
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import { HttpError, ReferenceResolutionError, errorMessage } from './errors';
import type { HttpEvent } from './middyMiddlewares';

export function text(statusCode: number, body: string): APIGatewayProxyResult {
  return { statusCode, headers: { 'Content-Type': 'text/plain' }, body };
}

/** Body exactly as the gateway sent it (signatures are computed over these bytes). */
export function rawBody(event: HttpEvent): Buffer {
  const body = event.body ?? '';
  return Buffer.from(body, event.isBase64Encoded ? 'base64' : 'utf8');
}

export function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

export function reconciledText(result: { status: string; outcome: 'success' | 'failed' }): string {
  if (result.status === 'already_reconciled') return 'Already processed';
  return result.outcome === 'success' ? 'Webhook processed successfully' : 'Transaction failed';
}

/** Maps a failure inside webhook processing to a definite plain-text response. */
export function webhookFailure(gateway: string, err: unknown): APIGatewayProxyResult {
  if (err instanceof ReferenceResolutionError) {
    console.warn(JSON.stringify({ level: 'WARN', message: `${gateway} webhook for unknown registration`, reference: err.reference }));
    return text(404, 'Registration not found');
  }
  if (err instanceof HttpError && err.statusCode === 400) return text(400, err.message);
  console.error(JSON.stringify({ level: 'ERROR', message: `${gateway} webhook processing failed`, error: errorMessage(err) }));
  return text(500, 'Internal server error');
}
