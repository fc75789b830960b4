import { isTaCryptoError, type TaCryptoErrorCode } from '../src/errors.js';

/** Run `fn` and return the TaCryptoError code it throws, if any. */
export function thrownCode(fn: () => unknown): TaCryptoErrorCode | 'no error' | 'other error' {
  try {
    fn();
  } catch (err) {
    return isTaCryptoError(err) ? err.code : 'other error';
  }
  return 'no error';
}
