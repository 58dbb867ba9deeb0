// ============================================================================
// @phasemint/engine — Notifications
// ============================================================================

import { EventEmitter } from 'node:events';
import type { Address, Phase } from './types.js';

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface DropEventMap {
  PhaseAdded: { phase: Phase };
  PhaseEdited: { previous: Phase; phase: Phase };
  PhaseRemoved: { phase: Phase };
  PublicMintConfigured: { previous: Phase; phase: Phase };
  Purchase: {
    recipient: Address;
    payer: Address;
    phaseId: number;
    firstId: number;
    amount: number;
    cost: bigint;
  };
  Airdrop: { recipient: Address; firstId: number; amount: number };
  BatchAirdrop: { recipients: Address[]; firstId: number; amountEach: number };
  SupplyReduced: { previousCap: number; newCap: number };
  Paused: { by: Address };
  Resumed: { by: Address };
  FundsWithdrawn: { to: Address; amount: bigint };
  OwnershipTransferred: { previousOwner: Address; newOwner: Address };
  FeeConfigUpdated: { royaltyReceiver: Address; royaltyBps: number };
  TradingLockUpdated: { locked: boolean };
  Burned: { owner: Address; id: number };
}

// ---------------------------------------------------------------------------
// TypedEmitter
// ---------------------------------------------------------------------------

/** Thin typed facade over a Node `EventEmitter`. */
export class TypedEmitter<M extends object> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof M & string>(name: K, listener: (payload: M[K]) => void): this {
    this.emitter.on(name, listener);
    return this;
  }

  once<K extends keyof M & string>(name: K, listener: (payload: M[K]) => void): this {
    this.emitter.once(name, listener);
    return this;
  }

  off<K extends keyof M & string>(name: K, listener: (payload: M[K]) => void): this {
    this.emitter.off(name, listener);
    return this;
  }

  emit<K extends keyof M & string>(name: K, payload: M[K]): boolean {
    return this.emitter.emit(name, payload);
  }
}
