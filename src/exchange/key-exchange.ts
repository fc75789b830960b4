/**
 * ECDH key exchange producing an identity-bound HOTP seed.
 *
 * Each party creates a KeyExchange, sends exportPublicKey() to the other out
 * of band, then calls generatePsk(user, peerKey). With the same curve, base,
 * algorithm and user string on both sides the two PSKs are equal.
 *
 * Public key transport format: raw public bytes → base-N → URL-quoted. No
 * framing or curve identifier; the curve is agreed out of band.
 */
import { TaCryptoError } from '../errors.js';
import { resolveConfig, type CryptoOptions, type CryptoOptionsInput } from '../config.js';
import { silentLogger, type Logger } from '../logger.js';
import { bytesToStr, decode, encode, urlQuote, urlUnquote } from '../crypto/encoding.js';
import { derivePsk, DEFAULT_PSK_LENGTH } from '../crypto/hkdf.js';
import { isAllZero } from '../crypto/primitives.js';
import { initCryptoProvider } from '../crypto/provider.js';
import { SecretBuffer } from '../crypto/secret.js';
import { getCurveSuite, type CurveName, type CurveSuite } from './curves.js';

export interface KeyExchangeOptions extends CryptoOptionsInput {
  logger?: Logger;
}

export class KeyExchange {
  private readonly privateKey: SecretBuffer;
  private readonly rawPublicKey: Uint8Array;

  private constructor(
    private readonly suite: CurveSuite,
    private readonly config: CryptoOptions,
    privateKey: Uint8Array,
    private readonly logger: Logger,
  ) {
    this.rawPublicKey = suite.getPublicKey(privateKey);
    this.privateKey = new SecretBuffer(privateKey, `${suite.name} private key`);
  }

  /**
   * Generate a fresh ephemeral key pair on `options.curve` (default x25519).
   *
   * @throws UNSUPPORTED_CURVE, UNSUPPORTED_ALGORITHM, CONFIGURATION_ERROR
   */
  static create(options: KeyExchangeOptions = {}): KeyExchange {
    const { logger = silentLogger, ...rest } = options;
    const config = resolveConfig(rest);
    const suite = getCurveSuite(config.curve);
    const { randomBytes } = initCryptoProvider();

    const exchange = new KeyExchange(suite, config, suite.randomPrivateKey(randomBytes), logger);
    logger.debug('generated ephemeral key pair', { curve: suite.name });
    return exchange;
  }

  /**
   * Build from a known private key (test vectors, or a key the caller keeps).
   * The bytes are copied; the caller's array is left untouched.
   */
  static fromPrivateKey(privateKey: Uint8Array, options: KeyExchangeOptions = {}): KeyExchange {
    const { logger = silentLogger, ...rest } = options;
    const config = resolveConfig(rest);
    const suite = getCurveSuite(config.curve);
    if (!suite.isValidPrivateKey(privateKey)) {
      throw TaCryptoError.configuration(
        `private key is not a valid ${suite.name} key (${suite.privateKeyLength} bytes expected)`,
      );
    }
    return new KeyExchange(suite, config, privateKey.slice(), logger);
  }

  get curve(): CurveName {
    return this.suite.name;
  }

  get destroyed(): boolean {
    return this.privateKey.wiped;
  }

  /** Raw public key bytes (a copy). */
  get publicKey(): Uint8Array {
    return this.rawPublicKey.slice();
  }

  /**
   * The public key in transport form: URL-quoted base-N of the raw bytes.
   */
  exportPublicKey(): string {
    return urlQuote(encode(this.rawPublicKey, this.config.base));
  }

  /**
   * ECDH with the peer's exported public key.
   *
   * The returned buffer is owned by the caller, who must wipe() it as soon as
   * the seed has been derived; prefer {@link generatePsk}.
   *
   * @throws MALFORMED_PEER_KEY if the key cannot be decoded, has the wrong
   *         length, is not on the curve, or is a low-order point
   */
  deriveSharedSecret(peerPublicKey: string): SecretBuffer {
    const peer = this.decodePeerKey(peerPublicKey);

    const shared = this.privateKey.use(sk => {
      try {
        return this.suite.getSharedSecret(sk, peer);
      } catch (err) {
        throw this.rejectPeer('point rejected by the curve', err);
      }
    });
    if (isAllZero(shared)) {
      throw this.rejectPeer('low-order point');
    }

    this.logger.debug('derived shared secret', { curve: this.suite.name, length: shared.length });
    return new SecretBuffer(shared, 'shared secret');
  }

  /**
   * ECDH followed by HKDF binding to `userIdentity`. The shared secret is
   * wiped before this returns or throws.
   *
   * @param userIdentity  MUST be the same string the peer uses
   * @param peerPublicKey The peer's exportPublicKey() output
   * @param length        PSK length in bytes (default 20)
   * @returns             The base-N encoded PSK
   */
  generatePsk(userIdentity: string, peerPublicKey: string, length = DEFAULT_PSK_LENGTH): string {
    return SecretBuffer.scoped(this.deriveSharedSecret(peerPublicKey), shared =>
      derivePsk(shared, userIdentity, {
        algorithm: this.config.algorithm,
        base: this.config.base,
        length,
        logger: this.logger,
      }),
    );
  }

  /** Wipe the private key. Later exchanges fail with SECRET_DISPOSED. */
  destroy(): void {
    if (this.privateKey.wiped) return;
    this.privateKey.wipe();
    this.logger.debug('destroyed key pair', { curve: this.suite.name });
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private decodePeerKey(peerPublicKey: string): Uint8Array {
    let raw: Uint8Array;
    try {
      raw = decode(bytesToStr(urlUnquote(peerPublicKey)), this.config.base);
    } catch (err) {
      throw this.rejectPeer(`not URL-quoted ${this.config.base} text`, err);
    }
    try {
      this.suite.assertValidPublicKey(raw);
    } catch (err) {
      throw this.rejectPeer(err instanceof Error ? err.message : 'invalid point', err);
    }
    return raw;
  }

  private rejectPeer(reason: string, cause?: unknown): TaCryptoError {
    this.logger.warn('rejected peer public key', { curve: this.suite.name, reason });
    return TaCryptoError.malformedPeerKey(this.suite.name, reason, cause);
  }
}
