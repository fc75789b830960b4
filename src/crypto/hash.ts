/**
 * Hash algorithm registry. Every name maps to a @noble/hashes function usable
 * as a plain digest, as the HMAC core of HOTP and as the HKDF hash.
 */
import { sha1 } from '@noble/hashes/sha1';
import { sha224, sha256 } from '@noble/hashes/sha256';
import { sha384, sha512, sha512_224, sha512_256 } from '@noble/hashes/sha512';
import { sha3_224, sha3_256, sha3_384, sha3_512 } from '@noble/hashes/sha3';
import type { CHash } from '@noble/hashes/utils';
import { TaCryptoError } from '../errors.js';

export const HASH_ALGORITHMS = [
  'SHA1',
  'SHA224',
  'SHA256',
  'SHA384',
  'SHA512',
  'SHA512_224',
  'SHA512_256',
  'SHA3_224',
  'SHA3_256',
  'SHA3_384',
  'SHA3_512',
] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

const HASH_FUNCTIONS: Readonly<Record<HashAlgorithm, CHash>> = Object.freeze({
  SHA1: sha1,
  SHA224: sha224,
  SHA256: sha256,
  SHA384: sha384,
  SHA512: sha512,
  SHA512_224: sha512_224,
  SHA512_256: sha512_256,
  SHA3_224: sha3_224,
  SHA3_256: sha3_256,
  SHA3_384: sha3_384,
  SHA3_512: sha3_512,
});

export function isHashAlgorithm(name: string): name is HashAlgorithm {
  return (HASH_ALGORITHMS as readonly string[]).includes(name);
}

/**
 * Resolve an algorithm name, case-insensitively ("sha256" → "SHA256").
 */
export function parseHashAlgorithm(name: string): HashAlgorithm {
  const normalized = name.toUpperCase();
  if (!isHashAlgorithm(normalized)) {
    throw TaCryptoError.unsupportedAlgorithm(name, HASH_ALGORITHMS);
  }
  return normalized;
}

export function getHash(name: string): CHash {
  return HASH_FUNCTIONS[parseHashAlgorithm(name)];
}
