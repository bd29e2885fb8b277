import { type CheckStateEnum } from '../../model/types';

/**
 * Outcome of admitting a single secret.
 */
export type Admission = 'ACCEPTED' | 'ALREADY_SPENT';

/**
 * Outcome of admitting a batch. On rejection `spent` lists the secrets and `issued` the outputs
 * that were already in the ledger (or repeated within the batch), and nothing was inserted.
 */
export type BatchAdmission =
	| { accepted: true }
	| { accepted: false; spent: string[]; issued: string[] };

/**
 * The set of spent secrets and of signed outputs, and the only source of truth about double
 * spends and double signing.
 *
 * Implementations MUST make check-and-insert atomic: of any number of concurrent calls admitting
 * the same secret or output, exactly one is accepted. A failed write MUST leave nothing of the
 * batch behind and reject with an `IntegrityError`.
 */
export interface ProofLedger {
	/**
	 * Insert `secret` if it is not in the ledger yet.
	 */
	checkAndMarkSpent(secret: string): Promise<Admission>;
	/**
	 * All or nothing: either every secret and every output is inserted or none is.
	 *
	 * @param outputs Blinded messages about to be signed, as compressed hex.
	 */
	checkAndMarkSpentBatch(secrets: string[], outputs?: string[]): Promise<BatchAdmission>;
	/**
	 * State per secret, in input order. Read only.
	 */
	getStates(secrets: string[]): Promise<CheckStateEnum[]>;
	/**
	 * Whether each output has been signed, in input order. Read only.
	 */
	getIssued(outputs: string[]): Promise<boolean[]>;
	/**
	 * Optional introspection.
	 */
	snapshot?(): Promise<string[]>;
}

/**
 * Entries of `batch` that `known` already holds, plus any repeated within the batch.
 *
 * @internal
 */
export function findConflicts(known: ReadonlySet<string>, batch: string[]): string[] {
	const seen = new Set<string>();
	const conflicts: string[] = [];
	for (const entry of batch) {
		if (known.has(entry) || seen.has(entry)) conflicts.push(entry);
		seen.add(entry);
	}
	return conflicts;
}
