import { isAxiosError } from 'axios';
import type { TestErrorClass } from './types.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
]);

export function classifyProbeError(error: unknown): TestErrorClass {
  if (isAxiosError(error)) {
    if (error.response?.status === 407) {
      return 'auth';
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return 'timeout';
    }

    if (error.code && CONNECTION_CODES.has(error.code)) {
      return 'connection';
    }
  }

  if (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  ) {
    return 'timeout';
  }

  const message = error instanceof Error ? error.message.toLowerCase() : '';

  if (message.includes('timeout') || message.includes('timed out')) {
    return 'timeout';
  }

  if (message.includes('407') || message.includes('proxy authentication')) {
    return 'auth';
  }

  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('socket hang up')
  ) {
    return 'connection';
  }

  return 'unknown';
}

/** Reads the egress address from an IP-echo body (`{ origin }`, `{ ip }` or plain text). */
export function extractEgressIp(body: unknown): string | undefined {
  if (typeof body === 'string') {
    const trimmed = body.trim();
    return /^[0-9a-f.:]+$/i.test(trimmed) ? trimmed : undefined;
  }

  if (typeof body !== 'object' || body === null) {
    return undefined;
  }

  const origin = 'origin' in body ? body.origin : undefined;
  if (typeof origin === 'string' && origin) {
    // A forwarding chain reports "client, proxy"; the first hop is the egress.
    return origin.split(',')[0]?.trim();
  }

  const ip = 'ip' in body ? body.ip : undefined;
  return typeof ip === 'string' && ip ? ip : undefined;
}
