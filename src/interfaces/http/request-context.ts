import type { FastifyRequest } from 'fastify';

export const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const SYSTEM_USER = 'system';

/**
 * Caller identity recorded in the audit trail.
 * Authentication happens upstream; the header is trusted as given.
 */
export function requestUserId(request: FastifyRequest): string {
  const header = request.headers['x-user-id'];
  if (typeof header === 'string' && header.trim().length > 0) {
    return header.trim();
  }
  return SYSTEM_USER;
}

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and NaN for non-integers.
 */
export function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/** Returns true if `value` is a parseable ISO-8601 date string. */
export function isValidIso(value: string): boolean {
  return Number.isFinite(Date.parse(value));
}
