/**
 * HOTP: RFC 4226 Appendix D vectors, SHA256/SHA512 variants, validation, and
 * look-ahead verification.
 *
 * RFC 4226 secret = ASCII "12345678901234567890".
 */
import { describe, it, expect, vi } from 'vitest';
import {
  HotpGenerator,
  dynamicTruncate,
  generateHotp,
  verifyHotp,
} from '../src/otp/hotp.js';
import { encode, strToBytes } from '../src/crypto/encoding.js';
import { MAX_COUNTER } from '../src/config.js';
import { fromHex } from '../src/crypto/primitives.js';
import { TaCryptoErrorCode } from '../src/errors.js';
import type { Logger } from '../src/logger.js';
import { thrownCode } from './helpers.js';

const RFC_PSK_B64 = 'MTIzNDU2Nzg5MDEyMzQ1Njc4OTA=';
const RFC_PSK_B32 = 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ';
const SHA1 = { algorithm: 'SHA1' };

const RFC4226_VALUES = [
  '755224', '287082', '359152', '969429', '338314',
  '254676', '287922', '162583', '399871', '520489',
];

describe('dynamicTruncate', () => {
  it('matches RFC 4226 §5.4', () => {
    const mac = fromHex('1f8698690e02ca16618550ef7f19da8e945b555a');
    expect(dynamicTruncate(mac)).toBe(0x50ef7f19);
    expect(dynamicTruncate(mac) % 1_000_000).toBe(872921);
  });

  it('rejects a MAC shorter than 20 bytes', () => {
    expect(() => dynamicTruncate(new Uint8Array(19))).toThrow(RangeError);
  });
});

describe('generateHotp', () => {
  it('matches RFC 4226 Appendix D for counters 0..9', () => {
    RFC4226_VALUES.forEach((value, counter) => {
      expect(generateHotp(RFC_PSK_B64, counter, SHA1)).toBe(value);
    });
  });

  it('decodes the PSK in the configured base', () => {
    expect(generateHotp(RFC_PSK_B32, 0, { ...SHA1, base: 'b32' })).toBe('755224');
  });

  it('produces 8-digit values', () => {
    expect(generateHotp(RFC_PSK_B64, 1, { ...SHA1, digits: 8 })).toBe('94287082');
  });

  it('keeps leading zeros', () => {
    expect(generateHotp(RFC_PSK_B64, 37037036, { ...SHA1, digits: 8 })).toBe('07081804');
  });

  it('supports SHA256 and SHA512 keys', () => {
    const key32 = encode(strToBytes('12345678901234567890123456789012'));
    const key64 = encode(strToBytes('1234567890123456789012345678901234567890123456789012345678901234'));
    expect(generateHotp(key32, 1, { algorithm: 'SHA256', digits: 8 })).toBe('46119246');
    expect(generateHotp(key64, 1, { algorithm: 'sha512', digits: 8 })).toBe('90693936');
  });

  it('takes bigint counters up to 2^64-1', () => {
    expect(generateHotp(RFC_PSK_B64, 1n, SHA1)).toBe('287082');
    expect(generateHotp(RFC_PSK_B64, (1n << 64n) - 1n, SHA1)).toMatch(/^\d{6}$/);
  });

  it('rejects counters outside the unsigned 64-bit range', () => {
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, -1, SHA1))).toBe(TaCryptoErrorCode.CONFIGURATION_ERROR);
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, 1.5, SHA1))).toBe(TaCryptoErrorCode.CONFIGURATION_ERROR);
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, 1n << 64n, SHA1))).toBe(
      TaCryptoErrorCode.CONFIGURATION_ERROR,
    );
  });

  it('rejects digit counts outside 6..8', () => {
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, 0, { digits: 5 }))).toBe(
      TaCryptoErrorCode.INVALID_DIGIT_COUNT,
    );
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, 0, { digits: 9 }))).toBe(
      TaCryptoErrorCode.INVALID_DIGIT_COUNT,
    );
  });

  it('rejects hashes HOTP is not defined over', () => {
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, 0, { algorithm: 'SHA3_256' }))).toBe(
      TaCryptoErrorCode.UNSUPPORTED_ALGORITHM,
    );
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, 0, { algorithm: 'MD5' }))).toBe(
      TaCryptoErrorCode.UNSUPPORTED_ALGORITHM,
    );
  });

  it('rejects undecodable or short keys', () => {
    expect(thrownCode(() => generateHotp('not base64!', 0))).toBe(TaCryptoErrorCode.INVALID_PSK);
    expect(thrownCode(() => generateHotp(RFC_PSK_B64, 0, { base: 'b32' }))).toBe(TaCryptoErrorCode.INVALID_PSK);
    expect(thrownCode(() => generateHotp(encode(new Uint8Array(15).fill(7)), 0))).toBe(
      TaCryptoErrorCode.INVALID_PSK,
    );
  });
});

describe('verifyHotp', () => {
  it('returns the matching counter', () => {
    expect(verifyHotp(RFC_PSK_B64, '755224', 0, SHA1)).toBe(0);
  });

  it('returns null outside the window', () => {
    expect(verifyHotp(RFC_PSK_B64, '287082', 0, SHA1)).toBeNull();
    expect(verifyHotp(RFC_PSK_B64, '755224', 1, { ...SHA1, lookAhead: 5 })).toBeNull();
  });

  it('searches lookAhead counters past the start', () => {
    expect(verifyHotp(RFC_PSK_B64, '969429', 1, { ...SHA1, lookAhead: 2 })).toBe(3);
    expect(verifyHotp(RFC_PSK_B64, '969429', 1, { ...SHA1, lookAhead: 1 })).toBeNull();
  });

  it('keeps bigint counters as bigint', () => {
    expect(verifyHotp(RFC_PSK_B64, '969429', 1n, { ...SHA1, lookAhead: 2 })).toBe(3n);
  });

  it('rejects candidates of the wrong length', () => {
    expect(verifyHotp(RFC_PSK_B64, '55224', 0, SHA1)).toBeNull();
    expect(verifyHotp(RFC_PSK_B64, '0755224', 0, SHA1)).toBeNull();
  });

  it('stops the window at the largest safe integer counter', () => {
    const top = Number.MAX_SAFE_INTEGER;
    const otp = generateHotp(RFC_PSK_B64, top, SHA1);
    expect(verifyHotp(RFC_PSK_B64, 'abcdef', top - 1, { ...SHA1, lookAhead: 5 })).toBeNull();
    expect(verifyHotp(RFC_PSK_B64, otp, top, { ...SHA1, lookAhead: 5 })).toBe(top);
  });

  it('stops the window at 2^64-1 for bigint counters', () => {
    const top = MAX_COUNTER;
    const otp = generateHotp(RFC_PSK_B64, top, SHA1);
    expect(verifyHotp(RFC_PSK_B64, 'abcdef', top - 1n, { ...SHA1, lookAhead: 5 })).toBeNull();
    expect(verifyHotp(RFC_PSK_B64, otp, top, { ...SHA1, lookAhead: 5 })).toBe(top);
  });

  it('rejects oversized look-ahead windows', () => {
    expect(thrownCode(() => verifyHotp(RFC_PSK_B64, '755224', 0, { lookAhead: 101 }))).toBe(
      TaCryptoErrorCode.CONFIGURATION_ERROR,
    );
    expect(thrownCode(() => verifyHotp(RFC_PSK_B64, '755224', 0, { lookAhead: -1 }))).toBe(
      TaCryptoErrorCode.CONFIGURATION_ERROR,
    );
  });
});

describe('HotpGenerator', () => {
  it('generates the same values as generateHotp', () => {
    const generator = new HotpGenerator(RFC_PSK_B64, SHA1);
    expect(generator.algorithm).toBe('SHA1');
    expect(generator.digits).toBe(6);
    expect([0, 1, 2].map(c => generator.at(c))).toEqual(RFC4226_VALUES.slice(0, 3));
  });

  it('logs failed and successful verifications without the candidate', () => {
    const logger = { debug: vi.fn(), warn: vi.fn() } satisfies Logger;
    const generator = new HotpGenerator(RFC_PSK_B64, { ...SHA1, logger });

    expect(generator.verify('000000', 0)).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('HOTP verification failed', { counter: '0', lookAhead: 0 });

    expect(generator.verify('359152', 0, 5)).toBe(2);
    expect(logger.debug).toHaveBeenCalledWith('HOTP verified', { counter: '2' });
  });

  it('verifies near the top of the counter range', () => {
    const generator = new HotpGenerator(RFC_PSK_B64, SHA1);
    expect(generator.verify('abcdef', Number.MAX_SAFE_INTEGER - 1, 5)).toBeNull();
    expect(generator.verify('abcdef', MAX_COUNTER - 2n, 5)).toBeNull();
  });

  it('uses the configured counter when none is passed', () => {
    const generator = new HotpGenerator(RFC_PSK_B64, { ...SHA1, counter: 2 });
    expect(generator.counter).toBe(2);
    expect(generator.at()).toBe('359152');
    expect(generator.verify('969429', undefined, 1)).toBe(3);
    expect(new HotpGenerator(RFC_PSK_B64, SHA1).at()).toBe('755224');
  });

  it('rejects an invalid configured counter', () => {
    expect(thrownCode(() => new HotpGenerator(RFC_PSK_B64, { ...SHA1, counter: -1 }))).toBe(
      TaCryptoErrorCode.CONFIGURATION_ERROR,
    );
  });

  it('refuses to generate after destroy', () => {
    const generator = new HotpGenerator(RFC_PSK_B64, SHA1);
    generator.destroy();
    generator.destroy();
    expect(thrownCode(() => generator.at(0))).toBe(TaCryptoErrorCode.SECRET_DISPOSED);
    expect(thrownCode(() => generator.verify('755224', 0))).toBe(TaCryptoErrorCode.SECRET_DISPOSED);
  });
});
