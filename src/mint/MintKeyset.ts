import { bytesToHex, hexToBytes, numberToBytesBE } from '@noble/curves/utils.js';
import { secp256k1 } from '@noble/curves/secp256k1.js';
import {
	type CurvePoint,
	type KeysetPair,
	type RawMintKeys,
	type SerializedMintKeys,
	createBlindSignature,
	createDLEQProof,
	createNewMintKeys,
	deserializeProof,
	getPubKeyFromPrivKey,
	pointFromHex,
	scalarFromBytes,
	secretToY,
	serializeMintKeys,
	verifyProof,
} from '../crypto';
import { IntegrityError, InvalidSignatureError, UnknownDenominationError } from '../model/Errors';
import {
	type Keys,
	type MintKeys,
	type Proof,
	type SerializedBlindedSignature,
} from '../model/types';
import { deriveKeysetId, isPowerOfTwo } from '../utils';
import { type MintKeysetOptions, resolveKeysetOptions } from './config';

/**
 * The mint's signing keys, one per power-of-two denomination.
 *
 * Signing and verification happen here. {@link MintKeyset.publicKeyset} is the view of the keys
 * to hand out. Private scalars leave this class only through
 * {@link MintKeyset.exportPrivateKeys}, the backup export that {@link MintKeyset.fromPrivateKeys}
 * reads back.
 */
export class MintKeyset {
	private readonly _id: string;
	private readonly _unit: string;
	private readonly privKeys: Map<number, Uint8Array>;
	private readonly pubKeys: Map<number, string>;

	private constructor(pair: KeysetPair, unit: string) {
		this._id = pair.keysetId;
		this._unit = unit;
		this.privKeys = toAmountMap(pair.privKeys);
		this.pubKeys = new Map(
			[...toAmountMap(pair.pubKeys)].map(([amount, key]) => [amount, bytesToHex(key)]),
		);
	}

	/**
	 * Creates a keyset for the denominations 2^0 .. 2^(maxOrder-1).
	 *
	 * @throws If an option is out of range.
	 */
	static generate(options?: MintKeysetOptions): MintKeyset {
		const { maxOrder, seed, unit } = resolveKeysetOptions(options);
		return new MintKeyset(createNewMintKeys(maxOrder, seed), unit);
	}

	/**
	 * Restores a keyset from its private keys (hex by amount). The public keys are recomputed; the
	 * id too, unless a stored one is given, in which case {@link MintKeyset.verify} checks it.
	 *
	 * @throws {IntegrityError} If an amount is not a power of two or a key is not a valid scalar.
	 */
	static fromPrivateKeys(privKeys: SerializedMintKeys, unit = 'sat', id?: string): MintKeyset {
		const raw: RawMintKeys = {};
		const pubKeys: RawMintKeys = {};
		for (const [amount, hex] of Object.entries(privKeys)) {
			if (!isPowerOfTwo(Number(amount))) {
				throw new IntegrityError('keyset', `denomination ${amount} is not a power of two`);
			}
			try {
				raw[amount] = numberToBytesBE(scalarFromBytes(hexToBytes(hex)), 32);
			} catch (e) {
				throw new IntegrityError('keyset', `private key for ${amount} is invalid`, { cause: e });
			}
			pubKeys[amount] = getPubKeyFromPrivKey(raw[amount]);
		}
		if (!Object.keys(pubKeys).length) {
			throw new IntegrityError('keyset', 'keyset has no keys');
		}
		const keysetId = id ?? deriveKeysetId(serializeMintKeys(pubKeys));
		return new MintKeyset({ keysetId, pubKeys, privKeys: raw }, unit);
	}

	get id(): string {
		return this._id;
	}

	get unit(): string {
		return this._unit;
	}

	/**
	 * Denominations, ascending.
	 */
	get amounts(): number[] {
		return [...this.pubKeys.keys()].sort((a, b) => a - b);
	}

	hasDenomination(amount: number): boolean {
		return this.privKeys.has(amount);
	}

	/**
	 * @throws {UnknownDenominationError}
	 */
	publicKey(amount: number): CurvePoint {
		return pointFromHex(this.publicKeyHex(amount));
	}

	/**
	 * The public keys, safe to hand to any party.
	 */
	publicKeyset(): MintKeys {
		const keys: Keys = {};
		for (const amount of this.amounts) {
			keys[amount] = this.publicKeyHex(amount);
		}
		return { id: this._id, unit: this._unit, keys };
	}

	/**
	 * Signs a blinded point with the key for `amount`: C_ = k·B_.
	 *
	 * @param dleq Attach a proof that C_ was made with the published key.
	 * @throws {UnknownDenominationError}
	 * @throws {InvalidPointError} If `B_` is the identity or off the curve.
	 */
	sign(amount: number, B_: CurvePoint, dleq = false): SerializedBlindedSignature {
		const privKey = this.privateKey(amount);
		const { C_ } = createBlindSignature(B_, privKey, amount, this._id);
		const signature: SerializedBlindedSignature = {
			id: this._id,
			amount,
			C_: C_.toHex(true),
		};
		if (dleq) {
			const proof = createDLEQProof(B_, privKey);
			signature.dleq = { s: bytesToHex(proof.s), e: bytesToHex(proof.e) };
		}
		return signature;
	}

	/**
	 * Checks C == k·hashToCurve(secret). Only the signature: whether the secret was spent is the
	 * ledger's business.
	 *
	 * @throws {UnknownDenominationError}
	 * @throws {InvalidPointError} If `C` does not decode.
	 * @throws {InvalidSignatureError}
	 */
	verifyProof(proof: Proof): void {
		const privKey = this.privateKey(proof.amount);
		if (!verifyProof(deserializeProof(proof), privKey)) {
			throw new InvalidSignatureError(secretToY(proof.secret));
		}
	}

	/**
	 * Re-derives every public key and the id from the private keys.
	 *
	 * @throws {IntegrityError} On the first mismatch.
	 */
	verify(): void {
		for (const [amount, privKey] of this.privKeys) {
			const expected = secp256k1.Point.BASE.multiply(scalarFromBytes(privKey));
			const published = this.pubKeys.get(amount);
			if (!published || !pointFromHex(published).equals(expected)) {
				throw new IntegrityError('keyset', `public key for ${amount} does not match private key`);
			}
		}
		if (this.pubKeys.size !== this.privKeys.size) {
			throw new IntegrityError('keyset', 'public and private key counts differ');
		}
		const derived = deriveKeysetId(this.publicKeyset().keys);
		if (derived !== this._id) {
			throw new IntegrityError('keyset', `keyset id ${this._id} does not match keys (${derived})`);
		}
	}

	/**
	 * Private keys as hex by amount, for backing the keyset up. Handle with care.
	 */
	exportPrivateKeys(): SerializedMintKeys {
		const out: SerializedMintKeys = {};
		for (const [amount, key] of this.privKeys) {
			out[amount] = bytesToHex(key);
		}
		return out;
	}

	private privateKey(amount: number): Uint8Array {
		const key = this.privKeys.get(amount);
		if (!key) {
			throw new UnknownDenominationError(amount);
		}
		return key;
	}

	private publicKeyHex(amount: number): string {
		const key = this.pubKeys.get(amount);
		if (!key) {
			throw new UnknownDenominationError(amount);
		}
		return key;
	}
}

function toAmountMap<T>(keys: { [amount: string]: T }): Map<number, T> {
	return new Map(Object.entries(keys).map(([amount, key]) => [Number(amount), key]));
}
