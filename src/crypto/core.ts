import { type WeierstrassPoint } from '@noble/curves/abstract/weierstrass.js';
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { utf8ToBytes } from '@noble/hashes/utils.js';
import { bytesToHex, randomBytes } from '@noble/curves/utils.js';
import { Bytes, bytesToNumber } from '../utils';
import { InvalidPointError } from '../model/Errors';
import { type Proof } from '../model/types';

export type CurvePoint = WeierstrassPoint<bigint>;

export type BlindSignature = {
	C_: CurvePoint;
	amount: number;
	id: string;
};

export type RawBlindedMessage = {
	B_: CurvePoint;
	r: bigint;
	secret: Uint8Array;
};

export type DLEQ = {
	s: Uint8Array; // signature
	e: Uint8Array; // challenge
	r?: bigint; // optional: blinding factor
};

export type RawProof = {
	C: CurvePoint;
	secret: Uint8Array;
	amount: number;
	id: string;
};

// Public protocol constant; changing it breaks compatibility with every other wallet and mint.
const DOMAIN_SEPARATOR = utf8ToBytes('Secp256k1_HashToCurve_Cashu_');

export const CURVE_ORDER: bigint = secp256k1.Point.Fn.ORDER;

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

// ------------------------------
// Curve arithmetic
// ------------------------------

/**
 * Rejects the identity and any point that fails the curve equation.
 *
 * @param label Names the point in the error message.
 * @throws {InvalidPointError}
 */
export function assertValidPoint(P: CurvePoint, label = 'point'): CurvePoint {
	if (P.is0()) {
		throw new InvalidPointError(`${label} is the point at infinity`);
	}
	try {
		P.assertValidity();
	} catch (e) {
		throw new InvalidPointError(`${label} is not on the curve: ${errorMessage(e)}`);
	}
	return P;
}

/**
 * @throws {InvalidPointError} If `k` is not in [1, n).
 */
export function assertValidScalar(k: bigint, label = 'scalar'): bigint {
	if (k <= 0n || k >= CURVE_ORDER) {
		throw new InvalidPointError(`${label} out of range`);
	}
	return k;
}

export function pointFromHex(hex: string): CurvePoint {
	try {
		return secp256k1.Point.fromHex(hex);
	} catch (e) {
		throw new InvalidPointError(`invalid point encoding: ${errorMessage(e)}`);
	}
}

export function pointFromBytes(bytes: Uint8Array): CurvePoint {
	return pointFromHex(bytesToHex(bytes));
}

export function scalarFromBytes(bytes: Uint8Array): bigint {
	return assertValidScalar(bytesToNumber(bytes));
}

/**
 * Constant-time k·P.
 */
export function scalarMultiply(k: bigint, P: CurvePoint): CurvePoint {
	return assertValidPoint(P).multiply(assertValidScalar(k));
}

export function pointAdd(P: CurvePoint, Q: CurvePoint): CurvePoint {
	return assertValidPoint(assertValidPoint(P).add(assertValidPoint(Q)), 'sum');
}

export function pointSubtract(P: CurvePoint, Q: CurvePoint): CurvePoint {
	return assertValidPoint(assertValidPoint(P).subtract(assertValidPoint(Q)), 'difference');
}

export function createRandomSecretKey(): Uint8Array {
	return secp256k1.utils.randomSecretKey();
}

/**
 * Uniform non-zero scalar from the platform CSPRNG.
 */
export function randomScalar(): bigint {
	return bytesToNumber(createRandomSecretKey());
}

/**
 * Maps arbitrary bytes to a curve point with unknown discrete log.
 *
 * Y = PublicKey('02' || sha256(sha256(DOMAIN_SEPARATOR || x) || counter)), where counter is the
 * first little-endian uint32 for which that x coordinate is on the curve.
 */
export function hashToCurve(secret: Uint8Array): CurvePoint {
	const msgToHash = sha256(Bytes.concat(DOMAIN_SEPARATOR, secret));
	const maxIterations = 2 ** 16;
	for (let counter = 0; counter < maxIterations; counter++) {
		const hash = sha256(Bytes.concat(msgToHash, Bytes.writeUint32LE(counter)));
		try {
			return secp256k1.Point.fromHex(bytesToHex(Bytes.concat(new Uint8Array([0x02]), hash)));
		} catch {
			// x is not on the curve, try the next counter
		}
	}
	throw new InvalidPointError('No valid point found');
}

/**
 * Y of a secret as compressed hex. The mint identifies proofs by Y so that logs and state
 * queries never carry the secret itself.
 */
export function secretToY(secret: string): string {
	return hashToCurve(Bytes.fromString(secret)).toHex(true);
}

export function hash_e(pubkeys: CurvePoint[]): Uint8Array {
	const e_ = pubkeys.map((p) => p.toHex(false)).join('');
	return sha256(utf8ToBytes(e_));
}

// ------------------------------
// BDHKE
// ------------------------------

/**
 * Creates a random secret and blinds it.
 *
 * @remarks
 * The secret is a UTF-8 encoded 64-character lowercase hex string, generated from 32 random bytes.
 */
export function createRandomRawBlindedMessage(): RawBlindedMessage {
	const secretStr = bytesToHex(randomBytes(32));
	return blindMessage(Bytes.fromString(secretStr));
}

/**
 * Blind a secret message: B_ = hashToCurve(secret) + r·G.
 *
 * @param secret A UTF-8 byte encoded string.
 * @param r Optional. Deterministic blinding scalar to use (eg: for testing / seeded)
 * @returns A RawBlindedMessage: {B_, r, secret}
 */
export function blindMessage(secret: Uint8Array, r?: bigint): RawBlindedMessage {
	const Y = hashToCurve(secret);
	const blindingFactor = r === undefined ? randomScalar() : assertValidScalar(r, 'blinding factor');
	const rG = secp256k1.Point.BASE.multiply(blindingFactor);
	const B_ = pointAdd(Y, rG);
	return { B_, r: blindingFactor, secret };
}

/**
 * Mint side: C_ = k·B_. Pure, touches no ledger.
 */
export function createBlindSignature(
	B_: CurvePoint,
	privateKey: Uint8Array,
	amount: number,
	id: string,
): BlindSignature {
	const C_ = scalarMultiply(scalarFromBytes(privateKey), B_);
	return { C_, amount, id };
}

/**
 * Wallet side: C = C_ - r·A.
 */
export function unblindSignature(C_: CurvePoint, r: bigint, A: CurvePoint): CurvePoint {
	return pointSubtract(C_, scalarMultiply(r, A));
}

export function constructProofFromPromise(
	promise: BlindSignature,
	r: bigint,
	secret: Uint8Array,
	key: CurvePoint,
): RawProof {
	const C = unblindSignature(promise.C_, r, key);
	return {
		id: promise.id,
		amount: promise.amount,
		secret,
		C,
	};
}

export const serializeProof = (proof: RawProof): Proof => {
	return {
		id: proof.id,
		amount: proof.amount,
		secret: Bytes.toString(proof.secret),
		C: proof.C.toHex(true),
	};
};

export const deserializeProof = (proof: Proof): RawProof => {
	return {
		id: proof.id,
		amount: proof.amount,
		secret: Bytes.fromString(proof.secret),
		C: pointFromHex(proof.C),
	};
};
