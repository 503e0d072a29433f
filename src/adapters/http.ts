/**
 * JSON-over-HTTP helper for gateway adapters (global fetch with a timeout).
 */

import { GatewayError, errorMessage } from '../lib/errors';

export interface JsonResponse {
  ok: boolean;
  status: number;
  body: unknown;
}

export async function fetchJson(
  label: string,
  url: string,
  init: { method: 'GET' | 'POST'; headers?: Record<string, string>; body?: unknown },
  timeoutMs: number
): Promise<JsonResponse> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: init.method,
      headers: { Accept: 'application/json', ...(init.body !== undefined && { 'Content-Type': 'application/json' }), ...init.headers },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new GatewayError(`${label} unreachable: ${errorMessage(err)}`);
  }
  let body: unknown;
  try {
    body = await res.json();
  } catch {
    throw new GatewayError(`${label} returned a non-JSON response (HTTP ${res.status})`, res.status);
  }
  return { ok: res.ok, status: res.status, body };
}

/** Authorization header value; accepts keys stored with or without the Bearer prefix. */
export function bearer(secretKey: string): string {
  const key = secretKey.trim();
  return key.startsWith('Bearer ') ? key : `Bearer ${key}`;
}
