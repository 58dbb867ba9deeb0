// ============================================================================
// @phasemint/engine — In-Memory Funds Ledger
// ============================================================================

import { ethers } from 'ethers';
import { ConfigError, PaymentError } from './errors.js';
import type { Address, FundsLedger } from './types.js';

/** Details handed to a receive hook. */
export interface IncomingTransfer {
  from: Address;
  to: Address;
  amount: bigint;
}

/**
 * Code an account runs when it receives value. Throwing makes the transfer
 * fail; calling back into an engine models a reentrancy attempt.
 */
export type ReceiveHook = (transfer: IncomingTransfer) => void;

interface Movement {
  from?: string;
  to: string;
  amount: bigint;
}

/**
 * Journaled balance book implementing {@link FundsLedger}.
 *
 * While a checkpoint is open every movement is logged; `revertTo` unwinds
 * the log back to the checkpoint, restoring balances without running hooks.
 * Once the last open checkpoint is released or reverted the log is dropped.
 */
export class InMemoryFundsLedger implements FundsLedger {
  private readonly balances = new Map<string, bigint>();
  private readonly hooks = new Map<string, ReceiveHook>();
  private readonly movements: Movement[] = [];
  /** Open checkpoint id → absolute log position. */
  private readonly open = new Map<number, number>();
  /** Absolute position of `movements[0]`. */
  private base = 0;
  private nextCheckpoint = 1;

  /** Create value out of thin air (test funding, faucets). */
  credit(account: Address, amount: bigint): void {
    assertAmount(amount);
    const to = account.toLowerCase();
    this.apply({ to, amount });
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  /** Movements held for open checkpoints. */
  get retainedMovements(): number {
    return this.movements.length;
  }

  /**
   * Move value between accounts, then run the recipient's receive hook.
   *
   * @throws {PaymentError} `Insufficient` if `from` cannot cover `amount`.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new PaymentError(
        'Insufficient',
        `${ethers.getAddress(from)} holds ${available}, cannot send ${amount}`,
      );
    }
    this.apply({ from: from.toLowerCase(), to: to.toLowerCase(), amount });
    const hook = this.hooks.get(to.toLowerCase());
    if (hook) {
      hook({ from: ethers.getAddress(from), to: ethers.getAddress(to), amount });
    }
  }

  checkpoint(): number {
    const id = this.nextCheckpoint++;
    this.open.set(id, this.base + this.movements.length);
    return id;
  }

  /**
   * Undo every movement since `checkpoint`. Checkpoints taken after it are
   * closed along with it.
   */
  revertTo(checkpoint: number): void {
    const position = this.positionOf(checkpoint);
    while (this.base + this.movements.length > position) {
      const movement = this.movements.pop();
      if (!movement) break;
      this.adjust(movement.to, -movement.amount);
      if (movement.from !== undefined) this.adjust(movement.from, movement.amount);
    }
    for (const id of [...this.open.keys()]) {
      if (id >= checkpoint) this.open.delete(id);
    }
    this.trim();
  }

  release(checkpoint: number): void {
    this.positionOf(checkpoint);
    this.open.delete(checkpoint);
    this.trim();
  }

  /** Install (or with `undefined`, clear) the receive hook for an account. */
  onReceive(account: Address, hook: ReceiveHook | undefined): void {
    const key = account.toLowerCase();
    if (hook) {
      this.hooks.set(key, hook);
    } else {
      this.hooks.delete(key);
    }
  }

  private positionOf(checkpoint: number): number {
    const position = this.open.get(checkpoint);
    if (position === undefined) {
      throw new ConfigError('InvalidConfig', `unknown funds checkpoint ${checkpoint}`);
    }
    return position;
  }

  private trim(): void {
    if (this.open.size > 0) return;
    this.base += this.movements.length;
    this.movements.length = 0;
  }

  private apply(movement: Movement): void {
    if (movement.from !== undefined) this.adjust(movement.from, -movement.amount);
    this.adjust(movement.to, movement.amount);
    if (this.open.size > 0) {
      this.movements.push(movement);
    } else {
      this.base += 1;
    }
  }

  private adjust(key: string, delta: bigint): void {
    const next = (this.balances.get(key) ?? 0n) + delta;
    if (next === 0n) {
      this.balances.delete(key);
    } else {
      this.balances.set(key, next);
    }
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new ConfigError('InvalidAmount', `amount must not be negative — got ${amount}`);
  }
}
