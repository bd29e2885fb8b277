import { sha256 } from '@noble/hashes/sha2.js';
import { type Keys, type Proof } from '../model/types';
import { InvalidAmountError, UnknownDenominationError } from '../model/Errors';
import { Bytes } from './Bytes';

/**
 * A valid amount is a positive integer that survives a round trip through `number`.
 */
export function isValidAmount(amount: unknown): amount is number {
	return typeof amount === 'number' && Number.isSafeInteger(amount) && amount > 0;
}

export function isPowerOfTwo(amount: number): boolean {
	if (!isValidAmount(amount)) return false;
	const n = BigInt(amount);
	return (n & (n - 1n)) === 0n;
}

/**
 * Decomposes an amount into the powers of two of its binary representation: one output per set
 * bit, so the result has the fewest possible outputs.
 *
 * @param value Amount to split.
 * @param keyset Optional keys; when given, every denomination must have a key.
 * @param order Optional order of the result (default: "asc").
 * @returns Array of power-of-two amounts summing to `value`.
 * @throws {InvalidAmountError} If `value` is not a positive safe integer.
 * @throws {UnknownDenominationError} If a required denomination is missing from `keyset`.
 */
export function splitAmount(value: number, keyset?: Keys, order: 'asc' | 'desc' = 'asc'): number[] {
	if (!isValidAmount(value)) {
		throw new InvalidAmountError(value);
	}
	const split: number[] = [];
	let remaining = BigInt(value);
	let denomination = 1n;
	while (remaining > 0n) {
		if (remaining & 1n) {
			split.push(Number(denomination));
		}
		remaining >>= 1n;
		denomination <<= 1n;
	}
	if (keyset) {
		const missing = split.find((amt) => !hasCorrespondingKey(amt, keyset));
		if (missing !== undefined) {
			throw new UnknownDenominationError(missing);
		}
	}
	return order === 'desc' ? split.reverse() : split;
}

/**
 * Checks if the provided amount is in the keyset.
 */
export function hasCorrespondingKey(amount: number, keyset: Keys): boolean {
	return amount in keyset;
}

/**
 * Sums amounts without losing precision, whatever their count.
 */
export function sumAmounts(amounts: Iterable<number>): bigint {
	let total = 0n;
	for (const amount of amounts) {
		total += BigInt(amount);
	}
	return total;
}

export function sumProofs(proofs: Array<Pick<Proof, 'amount'>>): bigint {
	return sumAmounts(proofs.map((p) => p.amount));
}

/**
 * Converts a bytes array to a number.
 */
export function bytesToNumber(bytes: Uint8Array): bigint {
	return hexToNumber(Bytes.toHex(bytes));
}

/**
 * Converts a hex string to a number.
 */
export function hexToNumber(hex: string): bigint {
	return BigInt(`0x${hex}`);
}

/**
 * Converts a number to a hex string of 64 characters.
 *
 * @param number (bigint) to convert to hex.
 * @returns Hex string start-padded to 64 characters.
 */
export function numberToHexPadded64(number: bigint): string {
	return number.toString(16).padStart(64, '0');
}

/**
 * Returns the keyset id of a set of public keys: version byte `00` followed by the first seven
 * bytes of sha256 over the compressed keys concatenated in ascending amount order.
 *
 * @param keys Public keys by amount, compressed hex.
 * @returns Keyset id, 16 hex characters.
 */
export function deriveKeysetId(keys: Keys): string {
	const pubkeysConcat = Bytes.concat(
		...Object.entries(keys)
			.sort((a: [string, string], b: [string, string]) => +a[0] - +b[0])
			.map(([, pubKey]: [string, string]) => Bytes.fromHex(pubKey)),
	);
	const hashHex = Bytes.toHex(sha256(pubkeysConcat)).slice(0, 14);
	return '00' + hashHex;
}
