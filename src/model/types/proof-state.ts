/**
 * Ledger state of a proof, keyed by Y = hashToCurve(secret).
 */
export type ProofState = {
	Y: string;
	state: CheckStateEnum;
};

export const CheckStateEnum = {
	UNSPENT: 'UNSPENT',
	SPENT: 'SPENT',
} as const;
export type CheckStateEnum = (typeof CheckStateEnum)[keyof typeof CheckStateEnum];
