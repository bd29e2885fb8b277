import { secp256k1 } from '@noble/curves/secp256k1.js';
import { hexToBytes, bytesToHex } from '@noble/hashes/utils.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { describe, expect, test } from 'vitest';
import {
	CURVE_ORDER,
	assertValidPoint,
	blindMessage,
	constructProofFromPromise,
	createBlindSignature,
	createRandomRawBlindedMessage,
	deserializeProof,
	hashToCurve,
	hash_e,
	pointAdd,
	pointFromBytes,
	pointFromHex,
	pointSubtract,
	randomScalar,
	scalarMultiply,
	secretToY,
	serializeProof,
	unblindSignature,
	verifyProof,
} from '../../src/crypto';
import { InvalidPointError } from '../../src/model/Errors';
import { Bytes, bytesToNumber } from '../../src/utils';

const SECRET_MESSAGE = 'test_message';
const ONE = '0000000000000000000000000000000000000000000000000000000000000001';

describe('blind signature round trip', () => {
	test('unblinded signature verifies against the signing key', () => {
		const mintPrivKey = secp256k1.utils.randomSecretKey();
		const mintPubKey = secp256k1.getPublicKey(mintPrivKey, true);

		// wallet
		const blinded = createRandomRawBlindedMessage();
		// mint
		const blindSignature = createBlindSignature(blinded.B_, mintPrivKey, 1, '00aa');
		// wallet
		const proof = constructProofFromPromise(
			blindSignature,
			blinded.r,
			blinded.secret,
			pointFromHex(bytesToHex(mintPubKey)),
		);

		expect(proof.amount).toBe(1);
		expect(proof.id).toBe('00aa');
		expect(verifyProof(proof, mintPrivKey)).toBe(true);
	});

	test('proof does not verify under another key', () => {
		const mintPrivKey = secp256k1.utils.randomSecretKey();
		const otherKey = secp256k1.utils.randomSecretKey();
		const blinded = blindMessage(Bytes.fromString('abc'));
		const sig = createBlindSignature(blinded.B_, mintPrivKey, 8, '00aa');
		const proof = constructProofFromPromise(
			sig,
			blinded.r,
			blinded.secret,
			pointFromBytes(secp256k1.getPublicKey(mintPrivKey, true)),
		);

		expect(verifyProof(proof, otherKey)).toBe(false);
	});

	test('proof does not verify for a different secret', () => {
		const mintPrivKey = secp256k1.utils.randomSecretKey();
		const blinded = blindMessage(Bytes.fromString('abc'));
		const sig = createBlindSignature(blinded.B_, mintPrivKey, 8, '00aa');
		const proof = constructProofFromPromise(
			sig,
			blinded.r,
			blinded.secret,
			pointFromBytes(secp256k1.getPublicKey(mintPrivKey, true)),
		);

		expect(verifyProof({ ...proof, secret: Bytes.fromString('abd') }, mintPrivKey)).toBe(false);
	});

	test('serialized proof carries the secret as text and C as compressed hex', () => {
		const mintPrivKey = secp256k1.utils.randomSecretKey();
		const blinded = blindMessage(Bytes.fromString('abc'));
		const sig = createBlindSignature(blinded.B_, mintPrivKey, 8, '00aa');
		const proof = constructProofFromPromise(
			sig,
			blinded.r,
			blinded.secret,
			pointFromBytes(secp256k1.getPublicKey(mintPrivKey, true)),
		);

		const serialized = serializeProof(proof);
		expect(serialized.secret).toBe('abc');
		expect(serialized.C).toBe(proof.C.toHex(true));
		expect(deserializeProof(serialized).C.equals(proof.C)).toBe(true);
	});
});

describe('testing hash to curve', () => {
	test('testing string 0000....00', () => {
		const Y = hashToCurve(
			hexToBytes('0000000000000000000000000000000000000000000000000000000000000000'),
		);
		expect(Y.toHex(true)).toBe(
			'024cce997d3b518f739663b757deaec95bcd9473c30a14ac2fd04023a739d1a725',
		);
	});

	test('testing string 0000....01', () => {
		const Y = hashToCurve(hexToBytes(ONE));
		expect(Y.toHex(true)).toBe(
			'022e7158e11c9506f1aa4248bf531298daa7febd6194f003edcd9b93ade6253acf',
		);
	});

	test('secretToY hashes the UTF-8 encoding', () => {
		expect(secretToY('abc')).toBe(hashToCurve(Bytes.fromString('abc')).toHex(true));
	});
});

describe('test blinding message', () => {
	test('r = 1 gives the reference B_', () => {
		const { B_, r } = blindMessage(Bytes.fromString(SECRET_MESSAGE), bytesToNumber(hexToBytes(ONE)));
		expect(r).toBe(1n);
		expect(B_.toHex(true)).toBe(
			'025cc16fe33b953e2ace39653efb3e7a7049711ae1d8a2f7a9108753f1cdea742b',
		);
	});

	test('signing with key 1 leaves B_ unchanged', () => {
		const { B_ } = blindMessage(Bytes.fromString(SECRET_MESSAGE), 1n);
		const { C_ } = createBlindSignature(B_, hexToBytes(ONE), 1, '00aa');
		expect(C_.toHex(true)).toBe(
			'025cc16fe33b953e2ace39653efb3e7a7049711ae1d8a2f7a9108753f1cdea742b',
		);
	});

	test('rejects a zero blinding factor', () => {
		expect(() => blindMessage(Bytes.fromString(SECRET_MESSAGE), 0n)).toThrow(InvalidPointError);
	});

	test('rejects a blinding factor of n', () => {
		expect(() => blindMessage(Bytes.fromString(SECRET_MESSAGE), CURVE_ORDER)).toThrow(
			InvalidPointError,
		);
	});
});

describe('test unblinding signature', () => {
	test('testing string 0000....01', () => {
		const C_ = pointFromHex('02a9acc1e48c25eeeb9289b5031cc57da9fe72f3fe2861d264bdc074209b107ba2');
		const r = bytesToNumber(hexToBytes(ONE));
		const A = pointFromHex('020000000000000000000000000000000000000000000000000000000000000001');
		const C = unblindSignature(C_, r, A);
		expect(C.toHex(true)).toBe(
			'03c724d7e6a5443b39ac8acf11f40420adc4f99a02e7cc1b57703d9391f6d129cd',
		);
	});
});

describe('curve arithmetic', () => {
	test('pointFromBytes round-trips a compressed pubkey', () => {
		const sk = secp256k1.utils.randomSecretKey();
		const hex = bytesToHex(secp256k1.getPublicKey(sk, true));
		expect(pointFromBytes(hexToBytes(hex)).toHex(true)).toBe(hex);
	});

	test('pointFromHex rejects malformed encodings', () => {
		expect(() => pointFromHex('02zz')).toThrow(InvalidPointError);
		expect(() => pointFromHex('05' + ONE)).toThrow(InvalidPointError);
		expect(() => pointFromHex('')).toThrow(InvalidPointError);
	});

	test('scalarMultiply matches noble for k·G', () => {
		const k = randomScalar();
		expect(scalarMultiply(k, secp256k1.Point.BASE).equals(secp256k1.Point.BASE.multiply(k))).toBe(
			true,
		);
	});

	test('scalarMultiply rejects scalars outside [1, n)', () => {
		expect(() => scalarMultiply(0n, secp256k1.Point.BASE)).toThrow(InvalidPointError);
		expect(() => scalarMultiply(CURVE_ORDER, secp256k1.Point.BASE)).toThrow(InvalidPointError);
	});

	test('pointAdd and pointSubtract are inverse', () => {
		const P = secp256k1.Point.BASE.multiply(randomScalar());
		const Q = secp256k1.Point.BASE.multiply(randomScalar());
		expect(pointSubtract(pointAdd(P, Q), Q).equals(P)).toBe(true);
	});

	test('pointSubtract rejects an identity result', () => {
		const P = secp256k1.Point.BASE.multiply(7n);
		expect(() => pointSubtract(P, P)).toThrow(InvalidPointError);
	});

	test('assertValidPoint rejects the identity', () => {
		expect(() => assertValidPoint(secp256k1.Point.ZERO, 'B_')).toThrow(
			'B_ is the point at infinity',
		);
	});

	test('randomScalar stays in [1, n)', () => {
		for (let i = 0; i < 16; i++) {
			const k = randomScalar();
			expect(k > 0n && k < CURVE_ORDER).toBe(true);
		}
	});

	test('hash_e == sha256(concat(uncompressed points))', () => {
		const P1 = secp256k1.Point.BASE.multiply(randomScalar());
		const P2 = secp256k1.Point.BASE.multiply(randomScalar());

		const e = hash_e([P1, P2]);

		const expected = sha256(new TextEncoder().encode(P1.toHex(false) + P2.toHex(false)));
		expect(bytesToHex(e)).toBe(bytesToHex(expected));
	});
});
