/**
 * Public keys by amount. The number represents the amount that the key signs for.
 */
export type Keys = { [amount: number]: string };

/**
 * Minimal key carrier shape for low level helpers.
 */
export type HasKeysetKeys = { id: string; keys: Keys };

/**
 * The public view of a mint keyset, safe to hand to any party.
 */
export type MintKeys = {
	/**
	 * Keyset ID.
	 */
	id: string;
	/**
	 * Unit of the keyset.
	 */
	unit: string;
	keys: Keys;
};
