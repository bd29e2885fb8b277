// ==========================
// Public API Surface
// ==========================
export {
	Mint,
	MintKeyset,
	MemoryProofLedger,
	FileProofLedger,
	resolveMintOptions,
	resolveKeysetOptions,
	DEFAULT_MAX_ORDER,
	DEFAULT_MAX_SECRET_LENGTH,
	type ProofLedger,
	type Admission,
	type BatchAdmission,
	type MintOptions,
	type MintKeysetOptions,
	type ResolvedMintOptions,
	type ResolvedKeysetOptions,
} from './mint';

// Wallet side
export { OutputData, type OutputDataLike } from './model/OutputData';

// Shared models & primitives
export type * from './model/types/blinded';
export type * from './model/types/keyset';
export type * from './model/types/proof';
export { type ProofState, CheckStateEnum } from './model/types/proof-state';
export * from './model/Errors';

// Crypto
export * from './crypto';

// Utils
export * from './utils';

// Logging
export * from './logger';
