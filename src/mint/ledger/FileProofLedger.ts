import { open, readFile } from 'node:fs/promises';
import { type Logger, NULL_LOGGER } from '../../logger';
import { IntegrityError } from '../../model/Errors';
import { CheckStateEnum } from '../../model/types';
import {
	type Admission,
	type BatchAdmission,
	type ProofLedger,
	findConflicts,
} from './ProofLedger';

function isMissingFile(e: unknown): boolean {
	return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

type JournalEntry = { secrets: string[]; outputs: string[] };

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((v) => typeof v === 'string' && v.length > 0);
}

function isJournalEntry(value: unknown): value is JournalEntry {
	return (
		typeof value === 'object' &&
		value !== null &&
		'secrets' in value &&
		isStringArray(value.secrets) &&
		'outputs' in value &&
		isStringArray(value.outputs)
	);
}

/**
 * Durable ledger backed by an append-only journal: one JSON line per admitted batch, holding its
 * spent secrets and its signed outputs.
 *
 * Admission is optimistic. The batch is reserved in memory in the same synchronous step as the
 * conflict check, then the journal line is written and synced to disk. Reserved entries already
 * count, so a concurrent caller cannot get them admitted twice. If the write or the sync fails,
 * the whole batch is released and the call rejects with an {@link IntegrityError}. A line whose
 * sync failed may still be on disk, and counts after a reload.
 *
 * @example
 *
 *     const ledger = await FileProofLedger.open('./spent.jsonl', logger);
 */
export class FileProofLedger implements ProofLedger {
	private spent = new Set<string>();
	private issued = new Set<string>();
	private tail: Promise<void> = Promise.resolve();

	private constructor(
		private readonly path: string,
		private readonly logger: Logger,
	) {}

	/**
	 * Loads the journal at `path`. A missing file is an empty ledger; it is created on the first
	 * admission.
	 *
	 * @throws {IntegrityError} If the file cannot be read or a line is corrupted.
	 */
	static async open(path: string, logger: Logger = NULL_LOGGER): Promise<FileProofLedger> {
		const ledger = new FileProofLedger(path, logger);
		await ledger.load();
		return ledger;
	}

	get size(): number {
		return this.spent.size;
	}

	async checkAndMarkSpent(secret: string): Promise<Admission> {
		const result = await this.checkAndMarkSpentBatch([secret]);
		return result.accepted ? 'ACCEPTED' : 'ALREADY_SPENT';
	}

	async checkAndMarkSpentBatch(
		secrets: string[],
		outputs: string[] = [],
	): Promise<BatchAdmission> {
		const spent = findConflicts(this.spent, secrets);
		const issued = findConflicts(this.issued, outputs);
		if (spent.length || issued.length) {
			return { accepted: false, spent, issued };
		}
		// reserve before the first await
		for (const secret of secrets) this.spent.add(secret);
		for (const output of outputs) this.issued.add(output);
		try {
			const entry: JournalEntry = { secrets, outputs };
			await this.append(JSON.stringify(entry) + '\n');
		} catch (e) {
			for (const secret of secrets) this.spent.delete(secret);
			for (const output of outputs) this.issued.delete(output);
			this.logger.error('Journal write failed, batch released', { path: this.path, error: e });
			throw new IntegrityError('ledger', `could not write to ${this.path}`, { cause: e });
		}
		return { accepted: true };
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

	/**
	 * Appends in call order. A failed write rejects its own caller and does not block later ones.
	 */
	private append(line: string): Promise<void> {
		const write = this.tail.then(() => this.writeSynced(line));
		this.tail = write.then(
			() => undefined,
			() => undefined,
		);
		return write;
	}

	private async writeSynced(line: string): Promise<void> {
		const handle = await open(this.path, 'a');
		try {
			await handle.appendFile(line, 'utf8');
			await handle.datasync();
		} finally {
			await handle.close();
		}
	}

	private async load(): Promise<void> {
		let text: string;
		try {
			text = await readFile(this.path, 'utf8');
		} catch (e) {
			if (isMissingFile(e)) {
				this.logger.debug('No journal yet, starting empty', { path: this.path });
				return;
			}
			throw new IntegrityError('ledger', `could not read ${this.path}`, { cause: e });
		}
		const lines = text.split('\n');
		lines.forEach((line, i) => {
			if (!line.trim()) return;
			let entry: unknown;
			try {
				entry = JSON.parse(line);
			} catch (e) {
				throw new IntegrityError('ledger', `corrupted journal line ${i + 1} in ${this.path}`, {
					cause: e,
				});
			}
			if (!isJournalEntry(entry)) {
				throw new IntegrityError('ledger', `corrupted journal line ${i + 1} in ${this.path}`);
			}
			for (const secret of entry.secrets) this.spent.add(secret);
			for (const output of entry.outputs) this.issued.add(output);
		});
		this.logger.debug('Journal loaded', {
			path: this.path,
			spent: this.spent.size,
			issued: this.issued.size,
		});
	}
}
