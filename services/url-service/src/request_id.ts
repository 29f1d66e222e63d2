import type { IncomingHttpHeaders } from "node:http";
import { randomUUID } from "crypto";

export const REQUEST_ID_HEADER = "x-request-id";
export const MAX_REQUEST_ID_LENGTH = 128;

/** First value of a possibly repeated header, trimmed; empty when absent. */
export function firstHeaderValue(headers: IncomingHttpHeaders, name: string): string {
  const raw = headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return (value ?? "").trim();
}

/**
 * Correlation id for a request: the caller's X-Request-Id when it is non-empty
 * and at most 128 characters, a fresh UUID otherwise.
 */
export function getOrCreateRequestId(headers: IncomingHttpHeaders): string {
  const incoming = firstHeaderValue(headers, REQUEST_ID_HEADER);
  if (incoming.length > 0 && incoming.length <= MAX_REQUEST_ID_LENGTH) return incoming;
  return randomUUID();
}
