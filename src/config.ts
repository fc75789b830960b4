/**
 * Option resolution for every ta-crypto entry point.
 *
 * All names resolve against closed enumerations; an unknown option key or
 * value fails fast instead of falling back to a default.
 */
import { TaCryptoError } from './errors.js';
import { parseCurveName, type CurveName } from './exchange/curves.js';
import { parseEncodingBase, type EncodingBase } from './crypto/encoding.js';
import { parseHashAlgorithm, type HashAlgorithm } from './crypto/hash.js';

export type Counter = number | bigint;

/** Fully resolved, validated options. */
export interface CryptoOptions {
  curve: CurveName;
  base: EncodingBase;
  algorithm: HashAlgorithm;
  digits: number;
  counter?: Counter;
}

/** Caller-supplied options: names as strings, every key optional. */
export interface CryptoOptionsInput {
  curve?: string;
  base?: string;
  algorithm?: string;
  digits?: number;
  counter?: Counter;
}

export const DEFAULT_OPTIONS: Readonly<CryptoOptions> = Object.freeze({
  curve: 'x25519',
  base: 'b64',
  algorithm: 'SHA256',
  digits: 6,
});

export const HOTP_MIN_DIGITS = 6;
export const HOTP_MAX_DIGITS = 8;

const OPTION_KEYS: readonly string[] = ['curve', 'base', 'algorithm', 'digits', 'counter'];

/** Largest HOTP counter (2^64 - 1). */
export const MAX_COUNTER = (1n << 64n) - 1n;

export function validateDigits(digits: unknown): number {
  if (
    typeof digits !== 'number' ||
    !Number.isInteger(digits) ||
    digits < HOTP_MIN_DIGITS ||
    digits > HOTP_MAX_DIGITS
  ) {
    throw TaCryptoError.invalidDigitCount(digits, HOTP_MIN_DIGITS, HOTP_MAX_DIGITS);
  }
  return digits;
}

/**
 * A HOTP counter is an unsigned 64-bit integer. Numbers must be safe integers.
 */
export function validateCounter(counter: unknown): Counter {
  if (typeof counter === 'number') {
    if (!Number.isSafeInteger(counter) || counter < 0) {
      throw TaCryptoError.configuration(`counter must be a non-negative safe integer, got ${counter}`);
    }
    return counter;
  }
  if (typeof counter === 'bigint') {
    if (counter < 0n || counter > MAX_COUNTER) {
      throw TaCryptoError.configuration(`counter must be in 0..2^64-1, got ${counter}`);
    }
    return counter;
  }
  throw TaCryptoError.configuration(`counter must be a number or bigint, got ${typeof counter}`);
}

/**
 * Validate `input` and fill in defaults.
 */
export function resolveConfig(input: CryptoOptionsInput = {}): CryptoOptions {
  for (const key of Object.keys(input)) {
    if (!OPTION_KEYS.includes(key)) {
      throw TaCryptoError.configuration(`unknown option "${key}"`);
    }
  }

  const resolved: CryptoOptions = {
    curve: input.curve === undefined ? DEFAULT_OPTIONS.curve : parseCurveName(input.curve),
    base: input.base === undefined ? DEFAULT_OPTIONS.base : parseEncodingBase(input.base),
    algorithm: input.algorithm === undefined ? DEFAULT_OPTIONS.algorithm : parseHashAlgorithm(input.algorithm),
    digits: input.digits === undefined ? DEFAULT_OPTIONS.digits : validateDigits(input.digits),
  };
  if (input.counter !== undefined) {
    resolved.counter = validateCounter(input.counter);
  }
  return resolved;
}

/**
 * Read options from environment variables:
 *
 *   TA_CRYPTO_CURVE      curve name            (default x25519)
 *   TA_CRYPTO_BASE       encoding base         (default b64)
 *   TA_CRYPTO_ALGORITHM  hash algorithm        (default SHA256)
 *   TA_CRYPTO_DIGITS     HOTP length, 6..8     (default 6)
 *
 * Empty variables count as unset.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): CryptoOptions {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const input: CryptoOptionsInput = {};
  const curve = read('TA_CRYPTO_CURVE');
  const base = read('TA_CRYPTO_BASE');
  const algorithm = read('TA_CRYPTO_ALGORITHM');
  const digits = read('TA_CRYPTO_DIGITS');

  if (curve !== undefined) input.curve = curve;
  if (base !== undefined) input.base = base;
  if (algorithm !== undefined) input.algorithm = algorithm;
  if (digits !== undefined) {
    if (!/^\d+$/.test(digits)) {
      throw TaCryptoError.invalidDigitCount(digits, HOTP_MIN_DIGITS, HOTP_MAX_DIGITS);
    }
    input.digits = Number(digits);
  }

  return resolveConfig(input);
}
