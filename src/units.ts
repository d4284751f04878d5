import { z } from 'zod';

export const WEI_DECIMALS = 18;
export const SUN_DECIMALS = 6;

const INTEGER_RE = /^[+-]?\d+$/;
const isoDateTime = z.string().datetime({ offset: true, local: true });
const zonedDateTime = z.string().datetime({ offset: true });

/**
 * Converts a smallest-unit integer (wei, sun) into its display unit.
 * Anything that is not an integer string or a finite number yields 0.
 */
export function toDisplayUnit(raw: unknown, decimals: number): number {
  let value: number;

  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && INTEGER_RE.test(raw.trim())) {
    value = Number(raw.trim());
  } else {
    return 0;
  }

  if (!Number.isFinite(value)) {
    return 0;
  }

  return value / 10 ** decimals;
}

export function normalizeIsoTimestamp(input: unknown): string | null {
  if (typeof input !== 'string' || input.length === 0) {
    return null;
  }

  const withOffset = input.endsWith('Z') ? `${input.slice(0, -1)}+00:00` : input;
  if (!isoDateTime.safeParse(withOffset).success) {
    return null;
  }

  // No offset means UTC.
  const zoned = zonedDateTime.safeParse(withOffset).success ? withOffset : `${withOffset}+00:00`;
  const millis = Date.parse(zoned);
  return Number.isNaN(millis) ? null : new Date(millis).toISOString();
}

export function normalizeEpochMillis(input: unknown): string | null {
  if (!input) {
    return null;
  }

  const millis = typeof input === 'number' ? input : typeof input === 'string' ? Number(input) : Number.NaN;
  if (!Number.isFinite(millis) || millis === 0) {
    return null;
  }

  // Date accepts up to +/-8.64e15 ms; beyond that toISOString throws.
  const date = new Date(millis);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return null;
    }

    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

export function toNumberOr(value: unknown, fallback: number): number {
  return toFiniteNumber(value) ?? fallback;
}
