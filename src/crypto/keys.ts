import { bytesToHex, hexToBytes } from '@noble/curves/utils.js';
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { HDKey } from '@scure/bip32';
import { type RawProof, createRandomSecretKey, hashToCurve, scalarFromBytes } from './core';
import { deriveKeysetId } from '../utils';

const DERIVATION_PATH = "m/0'/0'/0'";

/**
 * Largest supported number of denominations. 2^52 is the largest power of two every amount
 * arithmetic path can still carry as a safe integer.
 */
export const MAX_ORDER = 53;

export type RawMintKeys = { [amount: string]: Uint8Array };

export type SerializedMintKeys = {
	[amount: string]: string;
};

export type KeysetPair = {
	keysetId: string;
	pubKeys: RawMintKeys;
	privKeys: RawMintKeys;
};

export function serializeMintKeys(mintKeys: RawMintKeys): SerializedMintKeys {
	const serializedMintKeys: SerializedMintKeys = {};
	Object.keys(mintKeys).forEach((p) => {
		serializedMintKeys[p] = bytesToHex(mintKeys[p]);
	});
	return serializedMintKeys;
}

export function deserializeMintKeys(serializedMintKeys: SerializedMintKeys): RawMintKeys {
	const mintKeys: RawMintKeys = {};
	Object.keys(serializedMintKeys).forEach((p) => {
		mintKeys[p] = hexToBytes(serializedMintKeys[p]);
	});
	return mintKeys;
}

export function getPubKeyFromPrivKey(privKey: Uint8Array): Uint8Array {
	return secp256k1.getPublicKey(privKey, true);
}

/**
 * Creates one keypair per requested denomination.
 *
 * Without a seed every private scalar is drawn from the CSPRNG. With a seed the scalar for 2^i is
 * the BIP32 key at `m/0'/0'/0'/i`, so a mint can rebuild its keyset from the seed alone.
 *
 * @param denominations Powers of two to create keys for.
 * @param seed (Optional). Seed for key derivation.
 * @throws If a denomination is not a power of two, or a key cannot be derived.
 */
export function generateKeys(denominations: Iterable<number>, seed?: Uint8Array): KeysetPair {
	const pubKeys: RawMintKeys = {};
	const privKeys: RawMintKeys = {};
	const masterKey = seed ? HDKey.fromMasterSeed(seed) : undefined;
	for (const amount of denominations) {
		const exponent = Math.log2(amount);
		if (!Number.isInteger(exponent) || exponent < 0 || exponent >= MAX_ORDER) {
			throw new Error(`Denomination must be a power of two below 2^${MAX_ORDER}: ${amount}`);
		}
		const index = amount.toString();
		if (masterKey) {
			const path = `${DERIVATION_PATH}/${exponent}`;
			const k = masterKey.derive(path).privateKey;
			if (!k) {
				throw new Error(`Could not derive Private key from: ${path}`);
			}
			privKeys[index] = k;
		} else {
			privKeys[index] = createRandomSecretKey();
		}
		pubKeys[index] = getPubKeyFromPrivKey(privKeys[index]);
	}
	const keysetId = deriveKeysetId(serializeMintKeys(pubKeys));
	return { pubKeys, privKeys, keysetId };
}

/**
 * Creates new mint keys for the denominations 2^0 .. 2^(maxOrder-1).
 *
 * @param maxOrder Number of powers of 2 to create (1 to 53).
 * @param seed (Optional). Seed for key derivation.
 * @returns KeysetPair object.
 */
export function createNewMintKeys(maxOrder: number, seed?: Uint8Array): KeysetPair {
	if (!Number.isInteger(maxOrder) || maxOrder < 1 || maxOrder > MAX_ORDER) {
		throw new Error(`maxOrder must be an integer between 1 and ${MAX_ORDER}, got ${maxOrder}`);
	}
	const denominations = Array.from({ length: maxOrder }, (_, i) => 2 ** i);
	return generateKeys(denominations, seed);
}

/**
 * Checks C == k·hashToCurve(secret). Says nothing about whether the secret was spent.
 */
export function verifyProof(proof: RawProof, privKey: Uint8Array): boolean {
	const Y = hashToCurve(proof.secret);
	const aY = Y.multiply(scalarFromBytes(privKey));
	return aY.equals(proof.C);
}
