// ============================================================================
// @phasemint/engine — Phase Registry
// ============================================================================

import { ethers } from 'ethers';
import { MAX_PRESALE_PHASES, PUBLIC_PHASE_ID } from './constants.js';
import { ConfigError, PhaseError } from './errors.js';
import { PhaseKind } from './types.js';
import type { Address, Phase, PresalePhaseConfig, PublicMintConfig } from './types.js';

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function assertWindow(startOffset: number, endOffset: number): void {
  if (!Number.isSafeInteger(startOffset) || !Number.isSafeInteger(endOffset) || startOffset < 0) {
    throw new PhaseError('InvalidWindow', `phase offsets must be non-negative integers — got ${startOffset}..${endOffset}`);
  }
  if (startOffset >= endOffset) {
    throw new PhaseError('InvalidWindow', `phase must start before it ends — got ${startOffset}..${endOffset}`);
  }
}

function assertTerms(config: { name: string; price: bigint; maxPerAddress: number }): void {
  if (config.name.length === 0) {
    throw new ConfigError('InvalidConfig', 'phase name must be a non-empty string');
  }
  if (config.price < 0n) {
    throw new ConfigError('InvalidAmount', `phase price must not be negative — got ${config.price}`);
  }
  if (!Number.isSafeInteger(config.maxPerAddress) || config.maxPerAddress <= 0) {
    throw new ConfigError('InvalidAmount', `maxPerAddress must be a positive integer — got ${config.maxPerAddress}`);
  }
}

function assertRoot(root: string): void {
  if (!ethers.isHexString(root, 32)) {
    throw new ConfigError('InvalidConfig', `allowListRoot must be a 32-byte hex string — got ${root}`);
  }
}

// ---------------------------------------------------------------------------
// PhaseRegistry
// ---------------------------------------------------------------------------

/**
 * Sale phase definitions plus per-phase mint counters.
 *
 * The public phase always exists under id 0. Presale phases get sequential
 * ids from 1; removal tombstones a phase in place, so ids never shift and
 * callers may keep them across removals.
 */
export class PhaseRegistry {
  private readonly phases = new Map<number, Phase>();
  private readonly minted = new Map<string, number>();
  private nextPresaleId = 1;

  constructor(publicMint: PublicMintConfig, now: number) {
    this.phases.set(PUBLIC_PHASE_ID, this.buildPublic(publicMint, now));
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  get(id: number): Phase | undefined {
    const phase = this.phases.get(id);
    return phase ? { ...phase } : undefined;
  }

  /** @throws {PhaseError} `Unknown` for unregistered or removed ids. */
  require(id: number): Phase {
    const phase = this.phases.get(id);
    if (!phase || phase.removed) {
      throw new PhaseError('Unknown', `phase ${id} is not registered`);
    }
    return { ...phase };
  }

  publicPhase(): Phase {
    return this.require(PUBLIC_PHASE_ID);
  }

  /** Live (non-removed) phases in id order, the public phase first. */
  list(): Phase[] {
    return [...this.phases.values()]
      .filter((phase) => !phase.removed)
      .sort((a, b) => a.id - b.id)
      .map((phase) => ({ ...phase }));
  }

  /** Presale phases that are neither removed nor over. */
  alivePresaleCount(now: number): number {
    let count = 0;
    for (const phase of this.phases.values()) {
      if (phase.kind === PhaseKind.Presale && !phase.removed && phase.end > now) count++;
    }
    return count;
  }

  /**
   * Whether `now` falls inside the phase window.
   *
   * The public window includes its end second; presale windows do not.
   */
  isActive(phase: Phase, now: number): boolean {
    if (phase.removed) return false;
    if (phase.kind === PhaseKind.Public) {
      return phase.start <= now && now <= phase.end;
    }
    return phase.start <= now && now < phase.end;
  }

  perAddressLimitOk(phase: Phase, held: number, amount: number): boolean {
    return held + amount <= phase.maxPerAddress;
  }

  mintedBy(phaseId: number, account: Address): number {
    return this.minted.get(counterKey(phaseId, account)) ?? 0;
  }

  // -----------------------------------------------------------------------
  // Writes
  // -----------------------------------------------------------------------

  /**
   * Register a presale phase.
   *
   * @returns The new phase id.
   * @throws {PhaseError} `CapacityExceeded` when five presale phases are alive.
   */
  addPhase(config: PresalePhaseConfig, now: number): number {
    const phase = this.buildPresale(this.nextPresaleId, config, now);
    if (this.alivePresaleCount(now) >= MAX_PRESALE_PHASES) {
      throw new PhaseError('CapacityExceeded', `at most ${MAX_PRESALE_PHASES} presale phases may be alive`);
    }
    this.phases.set(phase.id, phase);
    this.nextPresaleId++;
    return phase.id;
  }

  /**
   * Replace the parameters of a presale phase that has not started yet.
   *
   * @returns The previous definition.
   * @throws {PhaseError} `Live` once the phase has started.
   */
  editPhase(id: number, config: PresalePhaseConfig, now: number): Phase {
    const current = this.requirePresale(id);
    if (current.start <= now) {
      throw new PhaseError('Live', `phase ${id} has already started and can no longer be edited`);
    }
    this.phases.set(id, this.buildPresale(id, config, now));
    return { ...current };
  }

  /**
   * Tombstone a presale phase that has not started yet.
   *
   * @throws {PhaseError} `Live` once the phase has started.
   */
  removePhase(id: number, now: number): Phase {
    const current = this.requirePresale(id);
    if (current.start <= now) {
      throw new PhaseError('Live', `phase ${id} has already started and can no longer be removed`);
    }
    this.phases.set(id, { ...current, removed: true });
    return { ...current };
  }

  /** Re-time or re-price the public phase. Returns the previous definition. */
  configurePublic(config: PublicMintConfig, now: number): Phase {
    const previous = this.publicPhase();
    this.phases.set(PUBLIC_PHASE_ID, this.buildPublic(config, now));
    return previous;
  }

  /** Put back a definition returned by one of the write methods. */
  restore(phase: Phase): void {
    this.phases.set(phase.id, { ...phase });
  }

  /** Drop the most recently added presale phase (rollback of `addPhase`). */
  unregister(id: number): void {
    if (id !== this.nextPresaleId - 1) {
      throw new PhaseError('Unknown', `phase ${id} is not the most recently added phase`);
    }
    this.phases.delete(id);
    this.nextPresaleId--;
  }

  recordMint(phaseId: number, account: Address, amount: number): void {
    const key = counterKey(phaseId, account);
    const next = (this.minted.get(key) ?? 0) + amount;
    if (next === 0) {
      this.minted.delete(key);
    } else {
      this.minted.set(key, next);
    }
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private requirePresale(id: number): Phase {
    const phase = this.require(id);
    if (phase.kind !== PhaseKind.Presale) {
      throw new PhaseError('Unknown', `phase ${id} is not a presale phase`);
    }
    return phase;
  }

  private buildPresale(id: number, config: PresalePhaseConfig, now: number): Phase {
    assertWindow(config.startOffset, config.endOffset);
    assertTerms(config);
    assertRoot(config.allowListRoot);
    return {
      id,
      name: config.name,
      kind: PhaseKind.Presale,
      start: now + config.startOffset,
      end: now + config.endOffset,
      price: config.price,
      maxPerAddress: config.maxPerAddress,
      allowListRoot: config.allowListRoot.toLowerCase(),
      removed: false,
    };
  }

  private buildPublic(config: PublicMintConfig, now: number): Phase {
    assertWindow(config.startOffset, config.endOffset);
    assertTerms(config);
    return {
      id: PUBLIC_PHASE_ID,
      name: config.name,
      kind: PhaseKind.Public,
      start: now + config.startOffset,
      end: now + config.endOffset,
      price: config.price,
      maxPerAddress: config.maxPerAddress,
      removed: false,
    };
  }
}

function counterKey(phaseId: number, account: Address): string {
  return `${phaseId}:${account.toLowerCase()}`;
}
