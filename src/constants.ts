// ============================================================================
// @phasemint/engine — Shared Constants
// ============================================================================

/** Id reserved for the public sale phase. */
export const PUBLIC_PHASE_ID = 0;

/** Presale phases that may be alive (not removed, not ended) at once. */
export const MAX_PRESALE_PHASES = 5;

/** Upper bound on recipients in a single batch airdrop. */
export const MAX_BATCH_AIRDROP = 8;

/** Basis-point denominator (100% = 10 000 bps). */
export const BPS_DENOMINATOR = 10_000n;
