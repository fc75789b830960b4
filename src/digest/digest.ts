/**
 * Encoded message digests for hashing text such as passwords, with a
 * constant-time check against a stored reference.
 */
import type { CHash } from '@noble/hashes/utils';
import { resolveConfig } from '../config.js';
import { getCodec, strToBytes, type Codec, type EncodingBase } from '../crypto/encoding.js';
import { getHash, type HashAlgorithm } from '../crypto/hash.js';
import { constantTimeEqual } from '../crypto/primitives.js';

export interface DigestOptions {
  algorithm?: string;
  base?: string;
}

export class DigestEngine {
  readonly algorithm: HashAlgorithm;
  readonly base: EncodingBase;
  private readonly hashFn: CHash;
  private readonly codec: Codec;

  constructor(options: DigestOptions = {}) {
    const config = resolveConfig({ algorithm: options.algorithm, base: options.base });
    this.algorithm = config.algorithm;
    this.base = config.base;
    this.hashFn = getHash(config.algorithm);
    this.codec = getCodec(config.base);
  }

  /** Digest of `plaintext` (strings are hashed as UTF-8), base-N encoded. */
  hash(plaintext: Uint8Array | string): string {
    const bytes = typeof plaintext === 'string' ? strToBytes(plaintext) : plaintext;
    return this.codec.encode(this.hashFn(bytes));
  }

  /**
   * Recompute the digest of `plaintext` and compare it with `encodedReference`
   * without an early exit on the first differing byte.
   */
  verify(plaintext: Uint8Array | string, encodedReference: string): boolean {
    return constantTimeEqual(strToBytes(this.hash(plaintext)), strToBytes(encodedReference));
  }
}

export function hashText(plaintext: Uint8Array | string, options: DigestOptions = {}): string {
  return new DigestEngine(options).hash(plaintext);
}

export function verifyHash(
  plaintext: Uint8Array | string,
  encodedReference: string,
  options: DigestOptions = {},
): boolean {
  return new DigestEngine(options).verify(plaintext, encodedReference);
}
