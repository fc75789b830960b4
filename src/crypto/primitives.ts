/**
 * Pure byte utilities with no external dependencies.
 */

/**
 * I2OSP: Integer-to-Octet-String Primitive (RFC 8017 §4.1).
 * Serializes a non-negative integer as a big-endian byte array of the given length.
 */
export function i2osp(value: number | bigint, length: number): Uint8Array {
  let v = BigInt(value);
  if (v < 0n) {
    throw new RangeError(`i2osp: negative value ${value}`);
  }
  const result = new Uint8Array(length);
  for (let i = length - 1; i >= 0; i--) {
    result[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  if (v !== 0n) {
    throw new RangeError(`i2osp: value ${value} overflows ${length} bytes`);
  }
  return result;
}

/**
 * Constant-time equality check. Accumulates XOR differences so no early exit.
 * Lengths are not secret and are compared up front.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/** True when every byte is zero, scanning the whole buffer. */
export function isAllZero(bytes: Uint8Array): boolean {
  let acc = 0;
  for (let i = 0; i < bytes.length; i++) {
    acc |= bytes[i];
  }
  return acc === 0;
}

/**
 * Decode a hex string to a Uint8Array.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error(`fromHex: odd-length hex string`);
  }
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error('fromHex: non-hex character');
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Encode a Uint8Array to a lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}
