/**
 * ECDH curve suites: X25519 and X448 (RFC 7748) and the NIST P-256, P-384 and
 * P-521 curves.
 *
 * Each suite encapsulates the curve-specific sizes and operations so that
 * KeyExchange can be written generically against the CurveSuite interface.
 * Signature-only curves (Ed25519, Ed448) are not key-agreement curves and are
 * not listed.
 */
import { x25519 } from '@noble/curves/ed25519';
import { x448 } from '@noble/curves/ed448';
import { p256 } from '@noble/curves/p256';
import { p384 } from '@noble/curves/p384';
import { p521 } from '@noble/curves/p521';
import { getMinHashLength, mapHashToField } from '@noble/curves/abstract/modular';
import { TaCryptoError } from '../errors.js';

// ── CurveSuite interface ─────────────────────────────────────────────────────

export const CURVE_NAMES = ['x25519', 'x448', 'p256', 'p384', 'p521'] as const;

export type CurveName = (typeof CURVE_NAMES)[number];

export interface CurveSuite {
  readonly name: CurveName;
  readonly family: 'montgomery' | 'weierstrass';
  /** Private key size in bytes. */
  readonly privateKeyLength: number;
  /** Exported public key size in bytes (raw u-coordinate, or compressed SEC1). */
  readonly publicKeyLength: number;
  /** Shared secret size in bytes. */
  readonly sharedSecretLength: number;

  randomPrivateKey(randomBytes: (length: number) => Uint8Array): Uint8Array;
  isValidPrivateKey(privateKey: Uint8Array): boolean;
  getPublicKey(privateKey: Uint8Array): Uint8Array;
  /** Throws if `publicKey` is not an acceptable peer key for this curve. */
  assertValidPublicKey(publicKey: Uint8Array): void;
  getSharedSecret(privateKey: Uint8Array, peerPublicKey: Uint8Array): Uint8Array;
}

// Structural views of the noble curve objects, limited to what the suites use.

interface MontgomeryCurve {
  getPublicKey(privateKey: Uint8Array): Uint8Array;
  getSharedSecret(privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array;
}

interface WeierstrassCurve {
  CURVE: { n: bigint };
  ProjectivePoint: { fromHex(hex: Uint8Array): unknown };
  utils: { isValidPrivateKey(privateKey: Uint8Array): boolean };
  getPublicKey(privateKey: Uint8Array, isCompressed?: boolean): Uint8Array;
  getSharedSecret(privateKey: Uint8Array, publicKey: Uint8Array, isCompressed?: boolean): Uint8Array;
}

// ── Suite factories ──────────────────────────────────────────────────────────

function montgomerySuite(name: CurveName, size: number, curve: MontgomeryCurve): CurveSuite {
  return {
    name,
    family: 'montgomery',
    privateKeyLength: size,
    publicKeyLength: size,
    sharedSecretLength: size,

    // Any `size` random bytes are a valid scalar; clamping happens in the ladder.
    randomPrivateKey: (randomBytes) => randomBytes(size),

    isValidPrivateKey: (privateKey) => privateKey.length === size,

    getPublicKey: (privateKey) => curve.getPublicKey(privateKey),

    assertValidPublicKey(publicKey) {
      if (publicKey.length !== size) {
        throw new Error(`expected ${size} bytes, got ${publicKey.length}`);
      }
    },

    // noble rejects an all-zero result (low-order peer point) by throwing.
    getSharedSecret: (privateKey, peerPublicKey) => curve.getSharedSecret(privateKey, peerPublicKey),
  };
}

function weierstrassSuite(name: CurveName, scalarLength: number, curve: WeierstrassCurve): CurveSuite {
  const ORDER = curve.CURVE.n;

  return {
    name,
    family: 'weierstrass',
    privateKeyLength: scalarLength,
    publicKeyLength: scalarLength + 1,
    sharedSecretLength: scalarLength,

    // Same reduction noble uses for utils.randomPrivateKey, over provider bytes.
    randomPrivateKey: (randomBytes) => mapHashToField(randomBytes(getMinHashLength(ORDER)), ORDER),

    isValidPrivateKey: (privateKey) =>
      privateKey.length === scalarLength && curve.utils.isValidPrivateKey(privateKey),

    getPublicKey: (privateKey) => curve.getPublicKey(privateKey, true),

    assertValidPublicKey(publicKey) {
      if (publicKey.length !== scalarLength + 1) {
        throw new Error(`expected ${scalarLength + 1} bytes, got ${publicKey.length}`);
      }
      // fromHex decodes and checks the point lies on the curve
      curve.ProjectivePoint.fromHex(publicKey);
    },

    // Compressed shared point minus its prefix byte = the x-coordinate.
    getSharedSecret: (privateKey, peerPublicKey) =>
      curve.getSharedSecret(privateKey, peerPublicKey, true).slice(1),
  };
}

// ── Public suites ────────────────────────────────────────────────────────────

export const X25519: CurveSuite = montgomerySuite('x25519', 32, x25519);
export const X448: CurveSuite = montgomerySuite('x448', 56, x448);
export const P256: CurveSuite = weierstrassSuite('p256', 32, p256);
export const P384: CurveSuite = weierstrassSuite('p384', 48, p384);
export const P521: CurveSuite = weierstrassSuite('p521', 66, p521);

const CURVE_SUITES: Readonly<Record<CurveName, CurveSuite>> = Object.freeze({
  x25519: X25519,
  x448: X448,
  p256: P256,
  p384: P384,
  p521: P521,
});

const CURVE_ALIASES: ReadonlyMap<string, CurveName> = new Map<string, CurveName>([
  ['p-256', 'p256'],
  ['secp256r1', 'p256'],
  ['prime256v1', 'p256'],
  ['p-384', 'p384'],
  ['secp384r1', 'p384'],
  ['p-521', 'p521'],
  ['secp521r1', 'p521'],
]);

export function isCurveName(name: string): name is CurveName {
  return (CURVE_NAMES as readonly string[]).includes(name);
}

/**
 * Resolve a curve name, case-insensitively ("X25519", "P-256", "secp384r1").
 */
export function parseCurveName(name: string): CurveName {
  const normalized = name.toLowerCase();
  if (isCurveName(normalized)) return normalized;
  const alias = CURVE_ALIASES.get(normalized);
  if (alias !== undefined) return alias;
  throw TaCryptoError.unsupportedCurve(name, CURVE_NAMES);
}

export function getCurveSuite(name: string): CurveSuite {
  return CURVE_SUITES[parseCurveName(name)];
}
