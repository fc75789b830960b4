/**
 * Owned secret bytes with explicit, guaranteed scrubbing.
 *
 * A SecretBuffer takes ownership of the array it is given. There is no way to
 * copy it out: callers borrow the bytes through {@link SecretBuffer.use} and
 * must not keep them past the callback.
 */
import { TaCryptoError } from '../errors.js';

export class SecretBuffer {
  private bytes: Uint8Array | null;
  readonly length: number;

  constructor(bytes: Uint8Array, private readonly label = 'secret') {
    this.bytes = bytes;
    this.length = bytes.length;
  }

  /**
   * Run `fn` over the secret and wipe it afterwards, whatever way `fn` exits.
   */
  static scoped<T>(secret: Uint8Array | SecretBuffer, fn: (secret: SecretBuffer) => T): T {
    const owned = secret instanceof SecretBuffer ? secret : new SecretBuffer(secret);
    try {
      return fn(owned);
    } finally {
      owned.wipe();
    }
  }

  get wiped(): boolean {
    return this.bytes === null;
  }

  /** Borrow the bytes for the duration of `fn`. */
  use<T>(fn: (bytes: Uint8Array) => T): T {
    if (this.bytes === null) {
      throw TaCryptoError.secretDisposed(this.label);
    }
    return fn(this.bytes);
  }

  /** Zero the bytes and drop the reference. Idempotent. */
  wipe(): void {
    if (this.bytes === null) return;
    this.bytes.fill(0);
    this.bytes = null;
  }

  toString(): string {
    return `SecretBuffer(${this.label}, ${this.length} bytes)`;
  }

  toJSON(): string {
    return this.toString();
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return this.toString();
  }
}
