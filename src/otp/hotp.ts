/**
 * HOTP: HMAC-based one-time passwords (RFC 4226).
 *
 *   HS   = HMAC(hash, K = psk, C = I2OSP(counter, 8))
 *   Snum = DT(HS)                 (31-bit dynamic truncation, §5.3)
 *   HOTP = Snum mod 10^digits, zero-padded to `digits`
 *
 * Stateless: the caller supplies, stores and advances the counter.
 */
import { hmac } from '@noble/hashes/hmac';
import type { CHash } from '@noble/hashes/utils';
import { TaCryptoError } from '../errors.js';
import { MAX_COUNTER, resolveConfig, validateCounter, type Counter, type CryptoOptions } from '../config.js';
import { silentLogger, type Logger } from '../logger.js';
import { decode, strToBytes } from '../crypto/encoding.js';
import { getHash } from '../crypto/hash.js';
import { constantTimeEqual, i2osp } from '../crypto/primitives.js';
import { SecretBuffer } from '../crypto/secret.js';

/** Hash algorithms RFC 4226 / RFC 6238 define HOTP over. */
export const HOTP_ALGORITHMS = ['SHA1', 'SHA256', 'SHA512'] as const;

/** Shortest accepted HOTP key (128 bits, RFC 4226 §4 R6). */
export const MIN_PSK_LENGTH = 16;

/** Largest look-ahead window accepted by verify. */
export const MAX_LOOK_AHEAD = 100;

export interface HotpOptions {
  algorithm?: string;
  base?: string;
  digits?: number;
}

export interface HotpVerifyOptions extends HotpOptions {
  /** Extra counters after `counter` to accept (resynchronisation window). */
  lookAhead?: number;
}

// ── Core algorithm ───────────────────────────────────────────────────────────

/**
 * Dynamic truncation (RFC 4226 §5.3): the low nibble of the last byte selects
 * a 4-byte window, read big-endian with the top bit cleared.
 */
export function dynamicTruncate(mac: Uint8Array): number {
  if (mac.length < 20) {
    throw new RangeError(`dynamicTruncate: HMAC must be at least 20 bytes, got ${mac.length}`);
  }
  const offset = mac[mac.length - 1] & 0x0f;
  return (
    ((mac[offset] & 0x7f) << 24) |
    (mac[offset + 1] << 16) |
    (mac[offset + 2] << 8) |
    mac[offset + 3]
  );
}

function hotpValue(hash: CHash, key: Uint8Array, counter: Counter, digits: number): string {
  const mac = hmac(hash, key, i2osp(counter, 8));
  const code = dynamicTruncate(mac) % 10 ** digits;
  mac.fill(0);
  return code.toString().padStart(digits, '0');
}

function resolveHotpConfig(options: HotpOptions, counter?: Counter): CryptoOptions {
  const config = resolveConfig({
    algorithm: options.algorithm,
    base: options.base,
    digits: options.digits,
    counter,
  });
  if (!(HOTP_ALGORITHMS as readonly string[]).includes(config.algorithm)) {
    throw TaCryptoError.unsupportedAlgorithm(config.algorithm, HOTP_ALGORITHMS);
  }
  return config;
}

function decodePsk(encodedPsk: string, base: string): Uint8Array {
  let key: Uint8Array;
  try {
    key = decode(encodedPsk, base);
  } catch (err) {
    throw TaCryptoError.invalidPsk(`not valid ${base} text`, err);
  }
  if (key.length < MIN_PSK_LENGTH) {
    const length = key.length;
    key.fill(0);
    throw TaCryptoError.invalidPsk(`key must be at least ${MIN_PSK_LENGTH} bytes, got ${length}`);
  }
  return key;
}

function validateLookAhead(lookAhead: number): number {
  if (!Number.isInteger(lookAhead) || lookAhead < 0 || lookAhead > MAX_LOOK_AHEAD) {
    throw TaCryptoError.configuration(`lookAhead must be an integer in 0..${MAX_LOOK_AHEAD}, got ${lookAhead}`);
  }
  return lookAhead;
}

/** Steps past `counter` that stay within its type's counter range, at most `lookAhead`. */
function windowSpan(counter: Counter, lookAhead: number): number {
  const room =
    typeof counter === 'bigint' ? MAX_COUNTER - counter : BigInt(Number.MAX_SAFE_INTEGER - counter);
  return room < BigInt(lookAhead) ? Number(room) : lookAhead;
}

function offsetCounter(counter: Counter, step: number): Counter {
  return typeof counter === 'bigint' ? counter + BigInt(step) : counter + step;
}

function matchCounter(
  hash: CHash,
  key: Uint8Array,
  candidate: string,
  counter: Counter,
  digits: number,
  lookAhead: number,
): Counter | null {
  const expected = strToBytes(candidate);
  const span = windowSpan(counter, lookAhead);
  for (let step = 0; step <= span; step++) {
    const current = offsetCounter(counter, step);
    if (constantTimeEqual(strToBytes(hotpValue(hash, key, current, digits)), expected)) {
      return current;
    }
  }
  return null;
}

// ── Functional API ───────────────────────────────────────────────────────────

/**
 * Compute the HOTP value for `counter` under the encoded PSK.
 *
 * @throws INVALID_PSK, INVALID_DIGIT_COUNT, UNSUPPORTED_ALGORITHM, CONFIGURATION_ERROR
 */
export function generateHotp(encodedPsk: string, counter: Counter, options: HotpOptions = {}): string {
  const config = resolveHotpConfig(options);
  const value = validateCounter(counter);
  const hash = getHash(config.algorithm);
  return SecretBuffer.scoped(decodePsk(encodedPsk, config.base), key =>
    key.use(bytes => hotpValue(hash, bytes, value, config.digits)),
  );
}

/**
 * Check `candidate` against counters `counter .. counter + lookAhead`. The
 * window stops at the largest counter of the given type (2^64 - 1 for a
 * bigint, Number.MAX_SAFE_INTEGER for a number).
 *
 * @returns the matching counter (store it + 1 as the next expected counter), or null
 */
export function verifyHotp(
  encodedPsk: string,
  candidate: string,
  counter: Counter,
  options: HotpVerifyOptions = {},
): Counter | null {
  const config = resolveHotpConfig(options);
  const start = validateCounter(counter);
  const lookAhead = validateLookAhead(options.lookAhead ?? 0);
  const hash = getHash(config.algorithm);
  return SecretBuffer.scoped(decodePsk(encodedPsk, config.base), key =>
    key.use(bytes => matchCounter(hash, bytes, candidate, start, config.digits, lookAhead)),
  );
}

// ── Bound generator ──────────────────────────────────────────────────────────

export interface HotpGeneratorOptions extends HotpOptions {
  /** Counter used by at() and verify() when none is passed (default 0). */
  counter?: Counter;
  logger?: Logger;
}

/**
 * A HOTP generator bound to one PSK. The decoded key is held until destroy().
 */
export class HotpGenerator {
  readonly algorithm: string;
  readonly digits: number;
  readonly counter: Counter;
  private readonly hash: CHash;
  private readonly key: SecretBuffer;
  private readonly logger: Logger;

  constructor(encodedPsk: string, options: HotpGeneratorOptions = {}) {
    const { logger = silentLogger, counter, ...rest } = options;
    const config = resolveHotpConfig(rest, counter);
    this.algorithm = config.algorithm;
    this.digits = config.digits;
    this.counter = config.counter ?? 0;
    this.hash = getHash(config.algorithm);
    this.key = new SecretBuffer(decodePsk(encodedPsk, config.base), 'HOTP key');
    this.logger = logger;
  }

  /** HOTP value at `counter`. */
  at(counter: Counter = this.counter): string {
    const value = validateCounter(counter);
    return this.key.use(bytes => hotpValue(this.hash, bytes, value, this.digits));
  }

  verify(candidate: string, counter: Counter = this.counter, lookAhead = 0): Counter | null {
    const start = validateCounter(counter);
    const window = validateLookAhead(lookAhead);
    const matched = this.key.use(bytes =>
      matchCounter(this.hash, bytes, candidate, start, this.digits, window),
    );
    if (matched === null) {
      this.logger.warn('HOTP verification failed', { counter: String(start), lookAhead: window });
    } else {
      this.logger.debug('HOTP verified', { counter: String(matched) });
    }
    return matched;
  }

  destroy(): void {
    this.key.wipe();
  }
}
