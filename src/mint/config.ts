import { sha256 } from '@noble/hashes/sha2.js';
import { utf8ToBytes } from '@noble/hashes/utils.js';
import { MAX_ORDER } from '../crypto';
import { type Logger, NULL_LOGGER } from '../logger';
import { type ProofLedger } from './ledger';
import { type MintKeyset } from './MintKeyset';

/**
 * Default number of denominations, 1 to 2^31.
 */
export const DEFAULT_MAX_ORDER = 32;

/**
 * Maximum secret length in characters.
 */
export const DEFAULT_MAX_SECRET_LENGTH = 1024;

export type MintKeysetOptions = {
	/**
	 * Number of power-of-two denominations, 1 to 53. Default 32.
	 */
	maxOrder?: number;
	/**
	 * Derive the keys from this seed instead of the CSPRNG. A string seed is hashed to 32 bytes;
	 * byte seeds go to BIP32 as they are and must be 16 to 64 bytes long.
	 */
	seed?: Uint8Array | string;
	/**
	 * Default 'sat'.
	 */
	unit?: string;
};

export type ResolvedKeysetOptions = {
	maxOrder: number;
	seed?: Uint8Array;
	unit: string;
};

export type MintOptions = {
	keyset: MintKeyset;
	ledger: ProofLedger;
	logger?: Logger;
	/**
	 * Longest accepted input secret, in characters. Default 1024.
	 */
	maxSecretLength?: number;
	/**
	 * Attach DLEQ proofs to blind signatures. Default true.
	 */
	dleq?: boolean;
};

export type ResolvedMintOptions = Required<MintOptions>;

export function resolveKeysetOptions(options: MintKeysetOptions = {}): ResolvedKeysetOptions {
	const maxOrder = options.maxOrder ?? DEFAULT_MAX_ORDER;
	if (!Number.isInteger(maxOrder) || maxOrder < 1 || maxOrder > MAX_ORDER) {
		throw new Error(`maxOrder must be an integer between 1 and ${MAX_ORDER}, got ${maxOrder}`);
	}
	const unit = options.unit ?? 'sat';
	if (!unit) {
		throw new Error('unit must be a non empty string');
	}
	const seed = typeof options.seed === 'string' ? sha256(utf8ToBytes(options.seed)) : options.seed;
	if (seed && (seed.length < 16 || seed.length > 64)) {
		throw new Error(`seed must be 16 to 64 bytes, got ${seed.length}`);
	}
	return { maxOrder, seed, unit };
}

/**
 * Applies defaults and checks the values once, so the mint never re-validates its settings.
 */
export function resolveMintOptions(options: MintOptions): ResolvedMintOptions {
	const maxSecretLength = options.maxSecretLength ?? DEFAULT_MAX_SECRET_LENGTH;
	if (!Number.isSafeInteger(maxSecretLength) || maxSecretLength < 1) {
		throw new Error(`maxSecretLength must be a positive integer, got ${maxSecretLength}`);
	}
	return {
		keyset: options.keyset,
		ledger: options.ledger,
		logger: options.logger ?? NULL_LOGGER,
		maxSecretLength,
		dleq: options.dleq ?? true,
	};
}
