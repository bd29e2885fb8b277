import { type SerializedDLEQ } from './blinded';

/**
 * A bearer token: a secret plus the unblinded mint signature on it.
 */
export type Proof = {
	/**
	 * Keyset id, links the proof to the keys that signed it.
	 */
	id: string;
	/**
	 * Denomination. Has to match the amount of the mint's signing key.
	 */
	amount: number;
	/**
	 * The secret that was (randomly) chosen by the wallet for the creation of this proof.
	 */
	secret: string;
	/**
	 * The unblinded signature for this secret, compressed hex.
	 */
	C: string;
	/**
	 * DLEQ proof, with the blinding factor so a third party can re-blind and check it.
	 */
	dleq?: SerializedDLEQ;
};
