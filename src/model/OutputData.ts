import { bytesToHex, hexToBytes, randomBytes } from '@noble/hashes/utils.js';
import {
	type SerializedBlindedMessage,
	type SerializedBlindedSignature,
	type HasKeysetKeys,
	type Proof,
} from './types';
import {
	blindMessage,
	constructProofFromPromise,
	pointFromHex,
	serializeProof,
	verifyDLEQProof,
} from '../crypto';
import { Bytes, numberToHexPadded64, splitAmount, sumAmounts } from '../utils';

/**
 * Wallet side of one output: the blinded message sent to the mint, and the secret and blinding
 * factor needed to turn the mint's signature into a proof.
 */
export interface OutputDataLike {
	blindedMessage: SerializedBlindedMessage;
	blindingFactor: bigint;
	secret: Uint8Array;

	toProof: (signature: SerializedBlindedSignature, keyset: HasKeysetKeys) => Proof;
}

export class OutputData implements OutputDataLike {
	blindedMessage: SerializedBlindedMessage;
	blindingFactor: bigint;
	secret: Uint8Array;

	constructor(
		blindedMessage: SerializedBlindedMessage,
		blindingFactor: bigint,
		secret: Uint8Array,
	) {
		this.secret = secret;
		this.blindingFactor = blindingFactor;
		this.blindedMessage = blindedMessage;
	}

	/**
	 * Unblinds the mint's signature: C = C_ - r·A. When the signature carries a DLEQ proof it is
	 * checked first, and kept on the proof together with r.
	 *
	 * @throws If the signature is for another keyset or amount, or its DLEQ proof is invalid.
	 */
	toProof(sig: SerializedBlindedSignature, keyset: HasKeysetKeys): Proof {
		if (sig.id !== keyset.id || sig.id !== this.blindedMessage.id) {
			throw new Error(`Signature keyset ${sig.id} does not match keyset ${keyset.id}`);
		}
		if (sig.amount !== this.blindedMessage.amount) {
			throw new Error(
				`Signature amount ${sig.amount} does not match output amount ${this.blindedMessage.amount}`,
			);
		}
		const keyHex = keyset.keys[sig.amount];
		if (!keyHex) {
			throw new Error(`No key for amount ${sig.amount} in keyset ${keyset.id}`);
		}
		const A = pointFromHex(keyHex);
		const C_ = pointFromHex(sig.C_);
		if (sig.dleq) {
			const dleq = { s: hexToBytes(sig.dleq.s), e: hexToBytes(sig.dleq.e) };
			if (!verifyDLEQProof(dleq, pointFromHex(this.blindedMessage.B_), C_, A)) {
				throw new Error(`DLEQ verification failed for amount ${sig.amount}`);
			}
		}
		const proof = constructProofFromPromise(
			{ id: sig.id, amount: sig.amount, C_ },
			this.blindingFactor,
			this.secret,
			A,
		);
		return {
			...serializeProof(proof),
			...(sig.dleq && {
				dleq: {
					s: sig.dleq.s,
					e: sig.dleq.e,
					r: numberToHexPadded64(this.blindingFactor),
				},
			}),
		};
	}

	/**
	 * One output per power of two in `amount`, each with a fresh random secret.
	 *
	 * @throws {UnknownDenominationError} If the keyset lacks a needed denomination.
	 */
	static createRandomData(amount: number, keyset: HasKeysetKeys): OutputData[] {
		const amounts = splitAmount(amount, keyset.keys);
		return amounts.map((a) => this.createSingleRandomData(a, keyset.id));
	}

	/**
	 * The secret is 32 random bytes as lowercase hex, hashed as its UTF-8 encoding.
	 */
	static createSingleRandomData(amount: number, keysetId: string): OutputData {
		return this.createSingleData(amount, keysetId, bytesToHex(randomBytes(32)));
	}

	/**
	 * Output for a caller-chosen secret. Pass `r` only for reproducible outputs, such as in tests.
	 */
	static createSingleData(amount: number, keysetId: string, secret: string, r?: bigint) {
		const secretBytes = Bytes.fromString(secret);
		const blinded = blindMessage(secretBytes, r);
		return new OutputData(
			{ amount, B_: blinded.B_.toHex(true), id: keysetId },
			blinded.r,
			secretBytes,
		);
	}

	/**
	 * Calculates the sum of amounts in an array of OutputDataLike objects.
	 */
	static sumOutputAmounts(outputs: OutputDataLike[]): bigint {
		return sumAmounts(outputs.map((output) => output.blindedMessage.amount));
	}
}
