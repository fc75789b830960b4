/**
 * HKDF (RFC 5869) over @noble/hashes, and PSK derivation from an ECDH secret.
 *
 *   psk = encode(HKDF(hash, ikm = sharedSecret, salt = none, info = UTF-8(user), L))
 *
 * Both parties must agree on `user` out of band; a different identity string
 * yields a different, non-interoperable PSK without any error.
 */
import { hkdf } from '@noble/hashes/hkdf';
import type { CHash } from '@noble/hashes/utils';
import { TaCryptoError } from '../errors.js';
import { resolveConfig } from '../config.js';
import { silentLogger, type Logger } from '../logger.js';
import { getCodec, strToBytes } from './encoding.js';
import { getHash } from './hash.js';
import { SecretBuffer } from './secret.js';

/** PSK length in bytes (the HOTP seed size). */
export const DEFAULT_PSK_LENGTH = 20;

export interface PskOptions {
  algorithm?: string;
  base?: string;
  length?: number;
  logger?: Logger;
}

/**
 * HKDF extract-and-expand. An absent salt means HashLen zero bytes.
 */
export function hkdfDerive(hash: CHash, ikm: Uint8Array, info: Uint8Array, length: number): Uint8Array {
  const max = 255 * hash.outputLen;
  if (!Number.isInteger(length) || length < 1 || length > max) {
    throw TaCryptoError.configuration(`HKDF output length must be an integer in 1..${max}, got ${length}`);
  }
  return hkdf(hash, ikm, undefined, info, length);
}

/**
 * Derive the encoded pre-shared key bound to `userIdentity`.
 * The raw HKDF output is wiped once encoded.
 */
export function derivePsk(
  sharedSecret: Uint8Array | SecretBuffer,
  userIdentity: string,
  options: PskOptions = {},
): string {
  const { logger = silentLogger, length = DEFAULT_PSK_LENGTH, algorithm, base } = options;
  const config = resolveConfig({ algorithm, base });
  const hash = getHash(config.algorithm);
  const codec = getCodec(config.base);
  const info = strToBytes(userIdentity);

  const derive = (ikm: Uint8Array): string =>
    SecretBuffer.scoped(hkdfDerive(hash, ikm, info, length), okm => okm.use(codec.encode));

  const psk = sharedSecret instanceof SecretBuffer ? sharedSecret.use(derive) : derive(sharedSecret);
  logger.debug('derived pre-shared key', { algorithm: config.algorithm, base: config.base, length });
  return psk;
}
