import { CheckStateEnum } from '../../model/types';
import {
	type Admission,
	type BatchAdmission,
	type ProofLedger,
	findConflicts,
} from './ProofLedger';

/**
 * In memory ledger. Check and insert run in one synchronous step, so callers sharing the event
 * loop are serialised without a lock.
 */
export class MemoryProofLedger implements ProofLedger {
	private spent = new Set<string>();
	private issued = new Set<string>();

	constructor(initial?: Iterable<string>) {
		if (initial) {
			for (const secret of initial) this.spent.add(secret);
		}
	}

	get size(): number {
		return this.spent.size;
	}

	async checkAndMarkSpent(secret: string): Promise<Admission> {
		const result = await this.checkAndMarkSpentBatch([secret]);
		return result.accepted ? 'ACCEPTED' : 'ALREADY_SPENT';
	}

	checkAndMarkSpentBatch(secrets: string[], outputs: string[] = []): Promise<BatchAdmission> {
		const spent = findConflicts(this.spent, secrets);
		const issued = findConflicts(this.issued, outputs);
		if (spent.length || issued.length) {
			return Promise.resolve({ accepted: false, spent, issued });
		}
		for (const secret of secrets) this.spent.add(secret);
		for (const output of outputs) this.issued.add(output);
		return Promise.resolve({ accepted: true });
	}

	getStates(secrets: string[]): Promise<CheckStateEnum[]> {
		return Promise.resolve(
			secrets.map((s) => (this.spent.has(s) ? CheckStateEnum.SPENT : CheckStateEnum.UNSPENT)),
		);
	}

	getIssued(outputs: string[]): Promise<boolean[]> {
		return Promise.resolve(outputs.map((o) => this.issued.has(o)));
	}

	snapshot(): Promise<string[]> {
		return Promise.resolve([...this.spent]);
	}
}
