import { type CurvePoint, assertValidPoint, pointFromHex, secretToY } from '../crypto';
import { type Logger, failFatal, failIf, measureTime } from '../logger';
import {
	AlreadySpentError,
	AmountMismatchError,
	IntegrityError,
	InvalidAmountError,
	MintOperationError,
	TransactionError,
	UnknownDenominationError,
	UnknownKeysetError,
} from '../model/Errors';
import {
	type MintKeys,
	type Proof,
	type ProofState,
	type SerializedBlindedMessage,
	type SerializedBlindedSignature,
} from '../model/types';
import { isValidAmount, sumAmounts, sumProofs } from '../utils';
import { type MintOptions, resolveMintOptions } from './config';
import { type ProofLedger } from './ledger';
import { type MintKeyset } from './MintKeyset';

type ParsedOutput = { amount: number; B_: CurvePoint };

/**
 * Mint core: issues blind signatures, swaps proofs for fresh outputs and redeems proofs.
 *
 * Every operation validates the whole request before the ledger is touched, so a rejected request
 * leaves no partial state. The ledger is consulted last, in one batch admission per request that
 * spends the inputs and records the outputs as signed.
 *
 * @example
 *
 *     const mint = new Mint({ keyset: MintKeyset.generate(), ledger: new MemoryProofLedger() });
 *     const signatures = await mint.split(proofs, outputs);
 */
export class Mint {
	private readonly keyset: MintKeyset;
	private readonly ledger: ProofLedger;
	private readonly logger: Logger;
	private readonly maxSecretLength: number;
	private readonly dleq: boolean;

	/**
	 * @throws {IntegrityError} If the keyset fails its self check.
	 */
	constructor(options: MintOptions) {
		const { keyset, ledger, logger, maxSecretLength, dleq } = resolveMintOptions(options);
		this.keyset = keyset;
		this.ledger = ledger;
		this.logger = logger;
		this.maxSecretLength = maxSecretLength;
		this.dleq = dleq;
		try {
			keyset.verify();
		} catch (e) {
			failFatal(
				e instanceof IntegrityError
					? e
					: new IntegrityError('keyset', 'keyset self check failed', { cause: e }),
				this.logger,
				{ keysetId: keyset.id },
			);
		}
		this.logger.info('Mint ready', { keysetId: keyset.id, unit: keyset.unit });
	}

	get keysetId(): string {
		return this.keyset.id;
	}

	getPublicKeyset(): MintKeys {
		return this.keyset.publicKeyset();
	}

	/**
	 * Signs a single blinded message once payment has been confirmed elsewhere.
	 *
	 * @param B_ Blinded point, compressed hex.
	 */
	async requestSignature(amount: number, B_: string): Promise<SerializedBlindedSignature> {
		const [signature] = await this.requestSignatures([{ amount, B_, id: this.keyset.id }]);
		return signature;
	}

	/**
	 * Signs blinded messages once payment has been confirmed elsewhere. The outputs are recorded as
	 * signed; nothing is spent.
	 *
	 * @returns One signature per output, in output order.
	 * @throws {TransactionError} If any output has been signed before.
	 */
	async requestSignatures(
		outputs: SerializedBlindedMessage[],
	): Promise<SerializedBlindedSignature[]> {
		return this.run('requestSignatures', async () => {
			failIf(!outputs.length, () => new TransactionError('no outputs provided'));
			const parsed = this.validateOutputs(outputs);
			const signatures = this.signAll(parsed);
			await this.admit([], parsed);
			this.logger.info('Outputs signed', {
				outputs: outputs.length,
				amount: sumAmounts(outputs.map((o) => o.amount)),
			});
			return signatures;
		});
	}

	/**
	 * Swaps `inputs` for blind signatures on `outputs` of the same total value. To spend proofs
	 * without new outputs, use {@link Mint.redeem}.
	 *
	 * @throws {TransactionError} If there are no outputs, or an output has been signed before.
	 * @throws {AmountMismatchError} If the totals differ. Nothing is signed or spent.
	 * @throws {AlreadySpentError} If any input is spent. Nothing is spent.
	 */
	async split(
		inputs: Proof[],
		outputs: SerializedBlindedMessage[],
	): Promise<SerializedBlindedSignature[]> {
		return this.run('split', async () => {
			const inputAmount = this.validateInputs(inputs);
			failIf(!outputs.length, () => new TransactionError('no outputs provided'));
			const parsed = this.validateOutputs(outputs);
			const outputAmount = sumAmounts(parsed.map((o) => o.amount));
			if (inputAmount !== outputAmount) {
				throw new AmountMismatchError(inputAmount, outputAmount);
			}
			// signing is pure, so it happens before admission and is discarded on conflict
			const signatures = this.signAll(parsed);
			await this.admit(inputs, parsed);
			this.logger.info('Split complete', {
				inputs: inputs.length,
				outputs: signatures.length,
				amount: inputAmount,
			});
			return signatures;
		});
	}

	/**
	 * Spends `inputs` for value settled outside the mint.
	 *
	 * @returns The total value of the inputs.
	 * @throws {AlreadySpentError} If any input is spent. Nothing is spent.
	 */
	async redeem(inputs: Proof[]): Promise<number> {
		return this.run('redeem', async () => {
			const total = this.validateInputs(inputs);
			if (total > BigInt(Number.MAX_SAFE_INTEGER)) {
				throw new InvalidAmountError(total);
			}
			await this.admit(inputs, []);
			this.logger.info('Redeemed', { inputs: inputs.length, amount: total });
			return Number(total);
		});
	}

	/**
	 * Ledger state of each proof, keyed by Y. Signatures are not checked.
	 */
	async checkProofStates(proofs: Array<Pick<Proof, 'secret'>>): Promise<ProofState[]> {
		return this.run('checkProofStates', async () => {
			const states = await this.ledger.getStates(proofs.map((p) => p.secret));
			return proofs.map((p, i) => ({ Y: secretToY(p.secret), state: states[i] }));
		});
	}

	private async run<T>(op: string, fn: () => T | Promise<T>): Promise<T> {
		const timer = measureTime();
		try {
			const result = await fn();
			this.logger.debug(`${op} finished`, { ms: timer.elapsed() });
			return result;
		} catch (e) {
			if (e instanceof IntegrityError) {
				failFatal(e, this.logger, { op });
			}
			if (e instanceof MintOperationError) {
				this.logger.warn(`${op} rejected`, { code: e.code, detail: e.detail });
			}
			throw e;
		}
	}

	/**
	 * Checks structure, keyset, amounts and signatures of every input.
	 *
	 * @returns The inputs' total.
	 */
	private validateInputs(inputs: Proof[]): bigint {
		failIf(!inputs.length, () => new TransactionError('no inputs provided'));
		const secrets = new Set<string>();
		for (const proof of inputs) {
			failIf(
				typeof proof.secret !== 'string' || !proof.secret.length,
				() => new TransactionError('proof secret is empty'),
			);
			failIf(
				proof.secret.length > this.maxSecretLength,
				() => new TransactionError(`secrets may not be longer than ${this.maxSecretLength}`),
			);
			failIf(secrets.has(proof.secret), () => new TransactionError('duplicate inputs provided'));
			secrets.add(proof.secret);
			this.checkKeysetId(proof.id);
			this.checkAmount(proof.amount);
			this.keyset.verifyProof(proof);
		}
		return sumProofs(inputs);
	}

	private validateOutputs(outputs: SerializedBlindedMessage[]): ParsedOutput[] {
		const seen = new Set<string>();
		return outputs.map((output) => {
			this.checkKeysetId(output.id);
			this.checkAmount(output.amount);
			const B_ = assertValidPoint(pointFromHex(output.B_), 'B_');
			const key = B_.toHex(true);
			failIf(seen.has(key), () => new TransactionError('duplicate outputs provided'));
			seen.add(key);
			return { amount: output.amount, B_ };
		});
	}

	private checkKeysetId(id: string) {
		if (id !== this.keyset.id) {
			throw new UnknownKeysetError(id);
		}
	}

	private checkAmount(amount: number) {
		if (!isValidAmount(amount)) {
			throw new InvalidAmountError(amount);
		}
		if (!this.keyset.hasDenomination(amount)) {
			throw new UnknownDenominationError(amount);
		}
	}

	private signAll(outputs: ParsedOutput[]): SerializedBlindedSignature[] {
		return outputs.map(({ amount, B_ }) => this.keyset.sign(amount, B_, this.dleq));
	}

	/**
	 * Admits every input secret and every output as one batch.
	 *
	 * @throws {AlreadySpentError} Listing the Ys of the conflicting secrets.
	 * @throws {TransactionError} If an output has been signed before.
	 */
	private async admit(inputs: Proof[], outputs: ParsedOutput[]): Promise<void> {
		const result = await this.ledger.checkAndMarkSpentBatch(
			inputs.map((p) => p.secret),
			outputs.map((o) => o.B_.toHex(true)),
		);
		if (!result.accepted) {
			if (result.spent.length) {
				throw new AlreadySpentError(result.spent.map(secretToY));
			}
			throw new TransactionError('outputs have already been signed before');
		}
		this.logger.debug('Batch admitted', {
			Ys: inputs.map((p) => secretToY(p.secret)),
			outputs: outputs.length,
		});
	}
}
