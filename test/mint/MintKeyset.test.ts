import { secp256k1 } from '@noble/curves/secp256k1.js';
import { describe, expect, test } from 'vitest';
import { MintKeyset } from '../../src/mint';
import { blindMessage, pointFromHex, unblindSignature } from '../../src/crypto';
import {
	IntegrityError,
	InvalidPointError,
	InvalidSignatureError,
	UnknownDenominationError,
} from '../../src/model/Errors';
import { Bytes, deriveKeysetId } from '../../src/utils';
import { type Proof } from '../../src/model/types';

function issue(keyset: MintKeyset, amount: number, secret: string): Proof {
	const { B_, r } = blindMessage(Bytes.fromString(secret));
	const sig = keyset.sign(amount, B_);
	const C = unblindSignature(pointFromHex(sig.C_), r, keyset.publicKey(amount));
	return { id: keyset.id, amount, secret, C: C.toHex(true) };
}

describe('MintKeyset.generate', () => {
	test('defaults to 32 sat denominations', () => {
		const keyset = MintKeyset.generate();
		expect(keyset.unit).toBe('sat');
		expect(keyset.amounts).toHaveLength(32);
		expect(keyset.amounts[0]).toBe(1);
		expect(keyset.amounts[31]).toBe(2 ** 31);
	});

	test('honours maxOrder and unit', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4, unit: 'usd' });
		expect(keyset.amounts).toEqual([1, 2, 4, 8]);
		expect(keyset.unit).toBe('usd');
	});

	test('string seeds are reproducible', () => {
		const a = MintKeyset.generate({ maxOrder: 4, seed: 'test-seed' });
		const b = MintKeyset.generate({ maxOrder: 4, seed: 'test-seed' });
		const c = MintKeyset.generate({ maxOrder: 4, seed: 'other-seed' });
		expect(a.id).toBe(b.id);
		expect(a.publicKeyset()).toEqual(b.publicKeyset());
		expect(a.id).not.toBe(c.id);
	});

	test.each([0, 54, 2.5])('rejects maxOrder %s', (maxOrder) => {
		expect(() => MintKeyset.generate({ maxOrder })).toThrow(
			`maxOrder must be an integer between 1 and 53, got ${maxOrder}`,
		);
	});

	test('rejects a short byte seed', () => {
		expect(() => MintKeyset.generate({ seed: new Uint8Array(8) })).toThrow(
			'seed must be 16 to 64 bytes, got 8',
		);
	});

	test('rejects an empty unit', () => {
		expect(() => MintKeyset.generate({ unit: '' })).toThrow('unit must be a non empty string');
	});
});

describe('publicKeyset', () => {
	test('carries id, unit and one compressed key per amount', () => {
		const keyset = MintKeyset.generate({ maxOrder: 3 });
		const pub = keyset.publicKeyset();
		expect(pub.id).toBe(keyset.id);
		expect(pub.unit).toBe('sat');
		expect(Object.keys(pub.keys)).toEqual(['1', '2', '4']);
		expect(pub.keys[2]).toMatch(/^0[23][0-9a-f]{64}$/);
		expect(deriveKeysetId(pub.keys)).toBe(keyset.id);
	});

	test('has no private material', () => {
		const keyset = MintKeyset.generate({ maxOrder: 2 });
		const privHexes = Object.values(keyset.exportPrivateKeys());
		const json = JSON.stringify(keyset.publicKeyset());
		for (const hex of privHexes) {
			expect(json.includes(hex)).toBe(false);
		}
	});

	test('private keys leave only through the backup export', () => {
		const keyset = MintKeyset.generate({ maxOrder: 2 });
		const backup = keyset.exportPrivateKeys();
		const json = JSON.stringify(keyset);
		for (const hex of Object.values(backup)) {
			expect(json.includes(hex)).toBe(false);
		}
		expect(MintKeyset.fromPrivateKeys(backup).id).toBe(keyset.id);
	});
});

describe('signing and verification', () => {
	test('an issued proof verifies', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		expect(() => keyset.verifyProof(issue(keyset, 8, 'abc'))).not.toThrow();
	});

	test('a proof presented with another amount fails', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		const proof = issue(keyset, 8, 'abc');
		expect(() => keyset.verifyProof({ ...proof, amount: 4 })).toThrow(InvalidSignatureError);
	});

	test('a proof with a changed secret fails', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		const proof = issue(keyset, 8, 'abc');
		expect(() => keyset.verifyProof({ ...proof, secret: 'abd' })).toThrow(InvalidSignatureError);
	});

	test('a proof from another keyset fails', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		const other = MintKeyset.generate({ maxOrder: 4 });
		expect(() => keyset.verifyProof(issue(other, 8, 'abc'))).toThrow(InvalidSignatureError);
	});

	test('a proof with an undecodable C fails', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		const proof = issue(keyset, 8, 'abc');
		expect(() => keyset.verifyProof({ ...proof, C: '02' + '00'.repeat(31) })).toThrow(
			InvalidPointError,
		);
	});

	test('unknown denomination', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		const { B_ } = blindMessage(Bytes.fromString('abc'));
		expect(() => keyset.sign(16, B_)).toThrow(UnknownDenominationError);
		expect(() => keyset.publicKey(16)).toThrow('no key for amount 16');
		expect(keyset.hasDenomination(16)).toBe(false);
		expect(keyset.hasDenomination(8)).toBe(true);
	});

	test('signing rejects the identity', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		expect(() => keyset.sign(1, secp256k1.Point.ZERO)).toThrow(InvalidPointError);
	});

	test('attaches a DLEQ proof on request', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		const { B_ } = blindMessage(Bytes.fromString('abc'));
		expect(keyset.sign(1, B_).dleq).toBeUndefined();
		const sig = keyset.sign(1, B_, true);
		expect(sig.dleq?.s).toMatch(/^[0-9a-f]{64}$/);
		expect(sig.dleq?.e).toMatch(/^[0-9a-f]{64}$/);
	});
});

describe('restoring and integrity', () => {
	test('fromPrivateKeys restores the same keyset', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4, unit: 'usd' });
		const restored = MintKeyset.fromPrivateKeys(keyset.exportPrivateKeys(), 'usd');
		expect(restored.id).toBe(keyset.id);
		expect(restored.publicKeyset()).toEqual(keyset.publicKeyset());
		expect(() => restored.verify()).not.toThrow();
	});

	test('a restored keyset verifies proofs of the original', () => {
		const keyset = MintKeyset.generate({ maxOrder: 4 });
		const restored = MintKeyset.fromPrivateKeys(keyset.exportPrivateKeys());
		expect(() => restored.verifyProof(issue(keyset, 2, 'abc'))).not.toThrow();
	});

	test('short keys are padded', () => {
		const keyset = MintKeyset.fromPrivateKeys({ 1: '01' });
		expect(keyset.publicKeyset().keys[1]).toBe(secp256k1.Point.BASE.toHex(true));
		expect(keyset.exportPrivateKeys()).toEqual({ 1: '00'.repeat(31) + '01' });
	});

	test('a stored id that does not match the keys fails verify', () => {
		const keyset = MintKeyset.generate({ maxOrder: 2 });
		const tampered = MintKeyset.fromPrivateKeys(
			keyset.exportPrivateKeys(),
			'sat',
			'00ffffffffffffff',
		);
		expect(tampered.id).toBe('00ffffffffffffff');
		expect(() => tampered.verify()).toThrow(IntegrityError);
		expect(() => tampered.verify()).toThrow(
			`keyset id 00ffffffffffffff does not match keys (${keyset.id})`,
		);
	});

	test('rejects a denomination that is not a power of two', () => {
		expect(() => MintKeyset.fromPrivateKeys({ 3: '01' })).toThrow(
			'denomination 3 is not a power of two',
		);
	});

	test('rejects a zero private key', () => {
		expect(() => MintKeyset.fromPrivateKeys({ 1: '00' })).toThrow(IntegrityError);
	});

	test('rejects invalid hex', () => {
		expect(() => MintKeyset.fromPrivateKeys({ 1: 'zz' })).toThrow('private key for 1 is invalid');
	});

	test('rejects an empty key set', () => {
		expect(() => MintKeyset.fromPrivateKeys({})).toThrow('keyset has no keys');
	});
});
