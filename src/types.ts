// ============================================================================
// @phasemint/engine — Type Definitions
// ============================================================================

/** Checksummed 20-byte hex address (e.g. `0xAbC…`). */
export type Address = string;

/** 0x-prefixed 32-byte hex string. */
export type Bytes32 = string;

// ---- Call context ----------------------------------------------------------

/**
 * Capability passed into every entry point.
 *
 * The engine never reads an ambient "current caller"; each call states who
 * is acting and how much value it attaches.
 */
export interface CallContext {
  /** Account performing the call. */
  caller: Address;
  /** Value attached to the call, in the smallest currency unit. */
  value?: bigint;
}

// ---- Phases ----------------------------------------------------------------

export enum PhaseKind {
  Public = 'public',
  Presale = 'presale',
}

/** A registered sale window. `start` and `end` are unix seconds. */
export interface Phase {
  /** 0 for the public phase, 1.. for presale phases. Never reassigned. */
  id: number;
  name: string;
  kind: PhaseKind;
  start: number;
  end: number;
  /** Price per unit, excluding platform fees. */
  price: bigint;
  maxPerAddress: number;
  /** Merkle root committing to the allow-list. Presale phases only. */
  allowListRoot?: Bytes32;
  /** Tombstone flag; removed phases keep their id. */
  removed: boolean;
}

/**
 * Owner-supplied presale phase parameters.
 *
 * Offsets are seconds relative to the moment the phase is registered.
 */
export interface PresalePhaseConfig {
  name: string;
  startOffset: number;
  endOffset: number;
  price: bigint;
  maxPerAddress: number;
  allowListRoot: Bytes32;
}

/** Public phase parameters; offsets are relative to when they are applied. */
export interface PublicMintConfig {
  name: string;
  startOffset: number;
  endOffset: number;
  price: bigint;
  maxPerAddress: number;
}

// ---- Supply ----------------------------------------------------------------

export interface SupplyInfo {
  maxSupply: number;
  totalMinted: number;
  /** Id the next issued unit will receive. */
  nextId: number;
  totalBurned: number;
  /** `maxSupply - totalMinted`. */
  remaining: number;
}

/** A contiguous id range `[firstId, firstId + amount)`. */
export interface Reservation {
  firstId: number;
  amount: number;
}

// ---- Fees & royalties ------------------------------------------------------

/** Fee split fixed for the lifetime of one instance. */
export interface FeeConfig {
  /** Flat platform fee charged per unit on top of the price. */
  mintFeePerUnit: bigint;
  /** Platform fee on the sale subtotal, in basis points. */
  salesFeeBps: number;
  /** Receives the platform share. */
  feeRecipient: Address;
  /** Receives the creator share. */
  proceedsRecipient: Address;
}

export interface RoyaltyConfig {
  receiver: Address;
  bps: number;
}

export interface RoyaltyInfo {
  receiver: Address;
  amount: bigint;
}

export interface CollectionConfig {
  name: string;
  symbol: string;
  maxSupply: number;
  /** Id of the first unit issued. */
  firstTokenId: number;
}

/** Breakdown of what a purchase costs and where the value goes. */
export interface CostBreakdown {
  subtotal: bigint;
  mintFeeTotal: bigint;
  salesFee: bigint;
  requiredCost: bigint;
  platformShare: bigint;
  creatorShare: bigint;
}

// ---- Mint results ----------------------------------------------------------

export enum MintStage {
  Idle = 'idle',
  Validating = 'validating',
  Settling = 'settling',
  Issued = 'issued',
  Rejected = 'rejected',
}

/** Result of a settled purchase. */
export interface MintReceipt {
  stage: MintStage.Issued;
  phaseId: number;
  recipient: Address;
  firstId: number;
  amount: number;
  cost: CostBreakdown;
  /** Attached value beyond `cost.requiredCost`, retained by the instance. */
  excess: bigint;
}

/** Result of an owner airdrop. */
export interface AirdropReceipt {
  recipient: Address;
  firstId: number;
  amount: number;
}

// ---- Collaborators ---------------------------------------------------------

/**
 * Ownership registry for issued units. The engine only touches ownership
 * through these calls.
 */
export interface AssetRegistry {
  issue(to: Address, id: number): void;
  ownerOf(id: number): Address | undefined;
  balanceOf(owner: Address): number;
  transfer(from: Address, to: Address, id: number): void;
  burn(id: number): void;
}

/**
 * Value-transfer rail provided by the host environment.
 *
 * `transfer` may run recipient-controlled code before it returns. A
 * checkpoint lets an operation undo every transfer made since it was taken,
 * including those made by recipient code; `release` closes it once the
 * operation has committed.
 */
export interface FundsLedger {
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
  checkpoint(): number;
  revertTo(checkpoint: number): void;
  release(checkpoint: number): void;
}

/** Source of the current time in unix seconds. */
export interface Clock {
  now(): number;
}
