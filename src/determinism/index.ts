/**
 * Canonical JSON and seeded randomness.
 *
 * Fallback documents must be byte-identical for identical inputs, so
 * every "random" choice they make draws from a PRNG seeded with the
 * canonical hash of those inputs.
 */

import { createHash } from 'crypto';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function canonicalizeJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalizeJson(item));
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      result[key] = canonicalizeJson(value[key]);
    }
    return result;
  }

  return value;
}

export function hashCanonical(value: unknown): string {
  const canonical = JSON.stringify(canonicalizeJson(value));
  return createHash('sha256').update(canonical).digest('hex');
}

// ============================================================================
// Seeded PRNG (mulberry32)
// ============================================================================

export interface SeededRandom {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform float in [min, max). */
  between(min: number, max: number): number;
  /** Uniform integer in [min, max]. */
  int(min: number, max: number): number;
}

export function seedFrom(value: unknown): number {
  return parseInt(hashCanonical(value).slice(0, 8), 16) >>> 0;
}

export function createSeededRandom(seed: number): SeededRandom {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    between: (min, max) => min + next() * (max - min),
    int: (min, max) => min + Math.floor(next() * (max - min + 1)),
  };
}

/** Round to two decimals (currency). */
export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/** Split `total` (cents-exact) in proportion to `weights`; drift lands on the largest share. */
export function splitAmount(total: number, weights: readonly number[]): number[] {
  const sum = weights.reduce((a, b) => a + b, 0);
  const parts = weights.map((w) => (sum > 0 ? roundCurrency((total * w) / sum) : 0));
  const drift = roundCurrency(total - parts.reduce((a, b) => a + b, 0));
  if (drift !== 0 && parts.length > 0) {
    const largest = parts.indexOf(Math.max(...parts));
    parts[largest] = Math.max(0, roundCurrency(parts[largest] + drift));
  }
  return parts;
}
