/**
 * Process-wide cryptographic provider.
 *
 * Initialised explicitly, once, on first key generation: the randomness source
 * is checked then and the frozen provider is returned on every later call.
 * Nothing here runs at import time.
 */
import { randomBytes } from '@noble/hashes/utils';
import { TaCryptoError } from '../errors.js';

export interface CryptoProvider {
  /** Cryptographically secure random bytes. */
  readonly randomBytes: (length: number) => Uint8Array;
}

let provider: CryptoProvider | undefined;

export function initCryptoProvider(): CryptoProvider {
  if (provider) return provider;

  const source = globalThis.crypto;
  if (!source || typeof source.getRandomValues !== 'function') {
    throw TaCryptoError.configuration('no secure random source (globalThis.crypto.getRandomValues) available');
  }

  provider = Object.freeze({
    randomBytes: (length: number) => randomBytes(length),
  });
  return provider;
}

export function isCryptoProviderInitialized(): boolean {
  return provider !== undefined;
}
