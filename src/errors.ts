/**
 * Typed errors for every ta-crypto operation.
 *
 * Messages and context never carry key material: peer keys, PSKs and shared
 * secrets are described by length only.
 */

export enum TaCryptoErrorCode {
  UNSUPPORTED_CURVE = 'UNSUPPORTED_CURVE',
  UNSUPPORTED_ALGORITHM = 'UNSUPPORTED_ALGORITHM',
  MALFORMED_ENCODING = 'MALFORMED_ENCODING',
  MALFORMED_PEER_KEY = 'MALFORMED_PEER_KEY',
  INVALID_PSK = 'INVALID_PSK',
  INVALID_DIGIT_COUNT = 'INVALID_DIGIT_COUNT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  SECRET_DISPOSED = 'SECRET_DISPOSED',
}

export class TaCryptoError extends Error {
  readonly code: TaCryptoErrorCode;
  readonly context?: Record<string, unknown>;

  private constructor(
    code: TaCryptoErrorCode,
    message: string,
    cause?: unknown,
    context?: Record<string, unknown>,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TaCryptoError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TaCryptoError);
    }
  }

  // ── Factories ──────────────────────────────────────────────────────────────

  static unsupportedCurve(name: string, supported: readonly string[]): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.UNSUPPORTED_CURVE,
      `Unsupported curve: "${name}". Expected one of ${supported.join(', ')}.`,
      undefined,
      { curve: name },
    );
  }

  static unsupportedAlgorithm(name: string, supported: readonly string[]): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.UNSUPPORTED_ALGORITHM,
      `Unsupported hash algorithm: "${name}". Expected one of ${supported.join(', ')}.`,
      undefined,
      { algorithm: name },
    );
  }

  static malformedEncoding(base: string, cause?: unknown): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.MALFORMED_ENCODING,
      `Malformed ${base} input`,
      cause,
      { base },
    );
  }

  static malformedPeerKey(curve: string, reason: string, cause?: unknown): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.MALFORMED_PEER_KEY,
      `Invalid ${curve} peer public key: ${reason}`,
      cause,
      { curve },
    );
  }

  static invalidPsk(reason: string, cause?: unknown): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.INVALID_PSK,
      `Invalid pre-shared key: ${reason}`,
      cause,
    );
  }

  static invalidDigitCount(digits: unknown, min: number, max: number): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.INVALID_DIGIT_COUNT,
      `HOTP digit count must be an integer in ${min}..${max}, got ${String(digits)}`,
      undefined,
      { digits: String(digits) },
    );
  }

  static configuration(reason: string, cause?: unknown): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.CONFIGURATION_ERROR,
      `Configuration error: ${reason}`,
      cause,
    );
  }

  static secretDisposed(what: string): TaCryptoError {
    return new TaCryptoError(
      TaCryptoErrorCode.SECRET_DISPOSED,
      `${what} has already been wiped`,
      undefined,
      { what },
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export function isTaCryptoError(error: unknown): error is TaCryptoError {
  return error instanceof TaCryptoError;
}
