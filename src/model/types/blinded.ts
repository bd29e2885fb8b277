/**
 * Blinded message a wallet sends to the mint. `B_ = Y + r·G`, with `r` kept by the wallet.
 */
export type SerializedBlindedMessage = {
	/**
	 * Denomination the wallet asks to have signed.
	 */
	amount: number;
	/**
	 * Blinded point, compressed hex.
	 */
	B_: string;
	/**
	 * Keyset id.
	 */
	id: string;
};

/**
 * Blinded signature as returned by the mint. `C_ = k·B_`.
 */
export type SerializedBlindedSignature = {
	/**
	 * Keyset id for indicating which private key was used to sign the blinded message.
	 */
	id: string;
	amount: number;
	/**
	 * Blinded signature, compressed hex.
	 */
	C_: string;
	/**
	 * DLEQ proof that C_ was made with the key published for `amount`.
	 */
	dleq?: SerializedDLEQ;
};

/*
 * Zero-knowledge proof that a BlindedSignature
 * was generated using a specific public key
 */
export type SerializedDLEQ = {
	s: string;
	e: string;
	r?: string;
};
