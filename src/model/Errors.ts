const MESSAGES: Record<number, string> = {
	10001: 'Point is not a valid curve point',
	10003: 'Token could not be verified',
	11000: 'Transaction is malformed',
	11001: 'Token is already spent',
	11002: 'Transaction is not balanced (inputs != outputs)',
	11006: 'Amount outside of limit range',
	12001: 'Keyset is not known',
	12003: 'Amount has no key in the keyset',
};

/**
 * Base class of every error a mint operation can reject a request with.
 *
 * Request errors are final: the core never retries them and a rejected request leaves no partial
 * ledger state behind.
 */
export class MintOperationError extends Error {
	code: number;
	detail: string;

	constructor(code: number, detail?: string) {
		super(detail || MESSAGES[code] || 'Unknown mint operation error');
		this.code = code;
		this.detail = this.message;
		this.name = 'MintOperationError';
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** Malformed curve input: off-curve, identity where disallowed, or a scalar out of range. */
export class InvalidPointError extends MintOperationError {
	constructor(detail: string) {
		super(10001, detail);
		this.name = 'InvalidPointError';
	}
}

/** A proof whose signature does not satisfy C == k·hashToCurve(secret). */
export class InvalidSignatureError extends MintOperationError {
	Y?: string;

	constructor(Y?: string) {
		super(10003, Y ? `could not verify proof ${Y}` : undefined);
		this.Y = Y;
		this.name = 'InvalidSignatureError';
	}
}

/** Structural faults of a request: no inputs, duplicates, bad secrets. */
export class TransactionError extends MintOperationError {
	constructor(detail: string) {
		super(11000, detail);
		this.name = 'TransactionError';
	}
}

export class AlreadySpentError extends MintOperationError {
	/** Hash-to-curve points (compressed hex) of the secrets found in the ledger. */
	Ys: string[];

	constructor(Ys: string[]) {
		super(11001, Ys.length ? `proofs already spent: ${Ys.join(', ')}` : undefined);
		this.Ys = Ys;
		this.name = 'AlreadySpentError';
	}
}

export class AmountMismatchError extends MintOperationError {
	inputAmount: bigint;
	outputAmount: bigint;

	constructor(inputAmount: bigint, outputAmount: bigint) {
		super(11002, `inputs (${inputAmount}) vs outputs (${outputAmount}) are not balanced`);
		this.inputAmount = inputAmount;
		this.outputAmount = outputAmount;
		this.name = 'AmountMismatchError';
	}
}

export class InvalidAmountError extends MintOperationError {
	constructor(amount: unknown) {
		super(11006, `invalid amount: ${String(amount)}`);
		this.name = 'InvalidAmountError';
	}
}

export class UnknownKeysetError extends MintOperationError {
	constructor(id: string) {
		super(12001, `keyset ${id} unknown`);
		this.name = 'UnknownKeysetError';
	}
}

export class UnknownDenominationError extends MintOperationError {
	amount: number;

	constructor(amount: number) {
		super(12003, `no key for amount ${amount}`);
		this.amount = amount;
		this.name = 'UnknownDenominationError';
	}
}

export type IntegrityComponent = 'ledger' | 'keyset';

/**
 * The mint can no longer guarantee its invariants: ledger storage failed or the keyset is
 * corrupted. Not a request error; callers should stop serving rather than answer the request.
 */
export class IntegrityError extends Error {
	component: IntegrityComponent;

	constructor(component: IntegrityComponent, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.component = component;
		this.name = 'IntegrityError';
		Object.setPrototypeOf(this, IntegrityError.prototype);
	}
}
