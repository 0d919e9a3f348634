import * as crypto from 'crypto';
import { AdapterConfig, InvalidConfigError, InvalidPayloadError } from '../../../core';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Trimmed string, or '' when absent or not a string
 */
export function pickString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Integer value, or 0 when absent, fractional or not a number
 */
export function pickInteger(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) ? value : 0;
}

export function pickRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

/**
 * Decode a JSON object body. Arrays and scalars are rejected.
 */
export function parseJsonObject(rawBody: Buffer): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    throw new InvalidPayloadError('webhook body is not valid JSON');
  }
  if (!isRecord(parsed)) {
    throw new InvalidPayloadError('webhook body is not a JSON object');
  }
  return parsed;
}

/**
 * Unix seconds to Date; falls back through the candidates, then to now
 */
export function unixToDate(...candidates: number[]): Date {
  for (const seconds of candidates) {
    if (seconds > 0) {
      return new Date(seconds * 1000);
    }
  }
  return new Date();
}

/**
 * Constant-time string comparison
 */
export function timingSafeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

export function requireConfigValue(config: AdapterConfig, key: string): string {
  const value = config.values[key]?.trim();
  if (!value) {
    throw new InvalidConfigError(`provider config is missing ${key}`);
  }
  return value;
}
