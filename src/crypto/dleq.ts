import { numberToBytesBE } from '@noble/curves/utils.js';
import { secp256k1 } from '@noble/curves/secp256k1.js';
import {
	type CurvePoint,
	type DLEQ,
	hash_e,
	hashToCurve,
	randomScalar,
	scalarFromBytes,
} from './core';
import { Bytes, bytesToNumber } from '../utils';

const Fn = secp256k1.Point.Fn;

/**
 * Proves that the key behind C_ = a·B_ is the one published as A = a·G, without revealing a.
 *
 * e = hash(R1, R2, A, C_) with R1 = r·G, R2 = r·B_, and s = r + e·a (mod n).
 */
export const createDLEQProof = (B_: CurvePoint, a: Uint8Array): DLEQ => {
	const r = randomScalar();
	const R_1 = secp256k1.Point.BASE.multiply(r);
	const R_2 = B_.multiply(r);
	const scalar_a = scalarFromBytes(a);
	const C_ = B_.multiply(scalar_a);
	const A = secp256k1.Point.BASE.multiply(scalar_a);
	const e = hash_e([R_1, R_2, A, C_]);
	const scalar_e = Fn.create(bytesToNumber(e));
	// field operations keep the secret-dependent arithmetic constant time
	const s_scalar = Fn.add(r, Fn.mul(scalar_e, scalar_a));
	const s = numberToBytesBE(s_scalar, 32);
	return { s, e };
};

export const verifyDLEQProof = (
	dleq: DLEQ,
	B_: CurvePoint,
	C_: CurvePoint,
	A: CurvePoint,
): boolean => {
	const s = Fn.create(bytesToNumber(dleq.s));
	const e = Fn.create(bytesToNumber(dleq.e));
	if (s === 0n || e === 0n) return false;
	const R_1 = secp256k1.Point.BASE.multiply(s).subtract(A.multiply(e)); // R1 = sG - eA
	const R_2 = B_.multiply(s).subtract(C_.multiply(e)); // R2 = sB' - eC'
	if (R_1.is0() || R_2.is0()) return false;
	const hash = hash_e([R_1, R_2, A, C_]);
	return Bytes.equals(hash, dleq.e);
};

/**
 * Verifies a DLEQ carried on an unblinded proof by re-blinding it with the stored factor r.
 *
 * @param secret The proof's secret bytes.
 * @param C Unblinded signature point.
 * @param A Mint public key for the proof's amount.
 * @throws If the DLEQ does not carry a blinding factor.
 */
export const verifyDLEQProof_reblind = (
	secret: Uint8Array,
	dleq: DLEQ,
	C: CurvePoint,
	A: CurvePoint,
): boolean => {
	if (dleq.r === undefined) throw new Error('verifyDLEQProof_reblind: Undefined blinding factor');
	const Y = hashToCurve(secret);
	const C_ = C.add(A.multiply(dleq.r));
	const B_ = Y.add(secp256k1.Point.BASE.multiply(dleq.r));
	return verifyDLEQProof(dleq, B_, C_, A);
};
