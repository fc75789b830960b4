/**
 * ta-crypto: ECDH-derived pre-shared keys and HOTP one-time passwords.
 *
 * Two parties exchange public keys, each derives the same PSK bound to a user
 * identity, and both then generate/verify RFC 4226 HOTP values from it.
 *
 * @example
 * ```typescript
 * import { KeyExchange, generateHotp } from 'ta-crypto';
 *
 * const alice = KeyExchange.create({ curve: 'x25519' });
 * const bob = KeyExchange.create({ curve: 'x25519' });
 *
 * const psk = alice.generatePsk('alice@example.org', bob.exportPublicKey());
 * // bob.generatePsk('alice@example.org', alice.exportPublicKey()) === psk
 *
 * const otp = generateHotp(psk, 0); // six decimal digits
 * ```
 */

// ── Errors, logging, configuration ──────────────────────────────────────────
export { TaCryptoError, TaCryptoErrorCode, isTaCryptoError } from './errors.js';
export { type Logger, silentLogger, consoleLogger } from './logger.js';
export {
  type Counter,
  type CryptoOptions,
  type CryptoOptionsInput,
  DEFAULT_OPTIONS,
  MAX_COUNTER,
  HOTP_MIN_DIGITS,
  HOTP_MAX_DIGITS,
  resolveConfig,
  configFromEnv,
  validateDigits,
  validateCounter,
} from './config.js';

// ── Crypto utilities ────────────────────────────────────────────────────────
export { constantTimeEqual, isAllZero, fromHex, toHex } from './crypto/primitives.js';
export {
  ENCODING_BASES,
  type EncodingBase,
  type Codec,
  isEncodingBase,
  parseEncodingBase,
  getCodec,
  encode,
  decode,
  urlQuote,
  urlUnquote,
  strToBytes,
  bytesToStr,
} from './crypto/encoding.js';
export { HASH_ALGORITHMS, type HashAlgorithm, isHashAlgorithm, parseHashAlgorithm, getHash } from './crypto/hash.js';
export { type CryptoProvider, initCryptoProvider, isCryptoProviderInitialized } from './crypto/provider.js';
export { SecretBuffer } from './crypto/secret.js';
export { DEFAULT_PSK_LENGTH, type PskOptions, hkdfDerive, derivePsk } from './crypto/hkdf.js';

// ── Key exchange ─────────────────────────────────────────────────────────────
export {
  CURVE_NAMES,
  type CurveName,
  type CurveSuite,
  X25519,
  X448,
  P256,
  P384,
  P521,
  isCurveName,
  parseCurveName,
  getCurveSuite,
} from './exchange/curves.js';
export { KeyExchange, type KeyExchangeOptions } from './exchange/key-exchange.js';

// ── One-time passwords ───────────────────────────────────────────────────────
export {
  HOTP_ALGORITHMS,
  MIN_PSK_LENGTH,
  MAX_LOOK_AHEAD,
  type HotpOptions,
  type HotpVerifyOptions,
  type HotpGeneratorOptions,
  dynamicTruncate,
  generateHotp,
  verifyHotp,
  HotpGenerator,
} from './otp/hotp.js';

// ── Digests ──────────────────────────────────────────────────────────────────
export { DigestEngine, type DigestOptions, hashText, verifyHash } from './digest/digest.js';
