/*
 * Entry flags
 * -----------
 * Bit flags stored in Entry.flags so the locator can branch on registration
 * kind and state without string comparisons.
 *
 *   Bits 0-1:  Registration kind
 *   Bit  2:    Has materialized instance
 *   Bit  3:    Permanent (non-forced deletes are refused)
 *   Bit  4:    Fenix (delete keeps the builder)
 */

/** Built once and cached: `put`, `lazyPut`, `putAsync`. */
export const KIND_SINGLETON = 0b00;
/** Built on every resolve, never cached: `create`. */
export const KIND_FACTORY = 0b01;

export const KIND_MASK = 0b11;

export const FLAG_HAS_INSTANCE = 1 << 2;
export const FLAG_PERMANENT = 1 << 3;
export const FLAG_FENIX = 1 << 4;
