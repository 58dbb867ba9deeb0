// ============================================================================
// @phasemint/engine — Supply Ledger
// ============================================================================

import { SupplyError } from './errors.js';
import type { Reservation, SupplyInfo } from './types.js';

/**
 * Issuance counters for one instance.
 *
 * `totalMinted` never exceeds `maxSupply`, `nextId` only moves forward, and
 * burning does not hand capacity back.
 */
export class SupplyLedger {
  private maxSupply: number;
  private totalMinted = 0;
  private totalBurned = 0;
  private nextId: number;

  constructor(maxSupply: number, firstTokenId: number) {
    this.maxSupply = maxSupply;
    this.nextId = firstTokenId;
  }

  canIssue(amount: number): boolean {
    return this.totalMinted + amount <= this.maxSupply;
  }

  /**
   * Claim the next `amount` ids and count them as minted.
   *
   * @throws {SupplyError} `SoldOut` if the cap would be exceeded.
   */
  reserve(amount: number): Reservation {
    if (!this.canIssue(amount)) {
      throw new SupplyError(
        'SoldOut',
        `cannot issue ${amount} — ${this.maxSupply - this.totalMinted} of ${this.maxSupply} remaining`,
      );
    }
    const reservation: Reservation = { firstId: this.nextId, amount };
    this.nextId += amount;
    this.totalMinted += amount;
    return reservation;
  }

  /**
   * Undo the most recent reservation. Only used when the operation that
   * made it is rolled back, so the ids were never observable.
   */
  release(reservation: Reservation): void {
    if (reservation.firstId + reservation.amount !== this.nextId) {
      throw new SupplyError(
        'InvalidCap',
        `reservation [${reservation.firstId}, ${reservation.firstId + reservation.amount}) is not the latest`,
      );
    }
    this.nextId = reservation.firstId;
    this.totalMinted -= reservation.amount;
  }

  /**
   * Lower the cap.
   *
   * @throws {SupplyError} `InvalidCap` if `newCap` is below what has been
   *         minted or above the current cap.
   */
  reduceCap(newCap: number): void {
    if (!Number.isSafeInteger(newCap) || newCap < this.totalMinted || newCap > this.maxSupply) {
      throw new SupplyError(
        'InvalidCap',
        `new cap ${newCap} must be between ${this.totalMinted} minted and the current cap ${this.maxSupply}`,
      );
    }
    this.maxSupply = newCap;
  }

  recordBurn(amount: number): void {
    this.totalBurned += amount;
  }

  snapshot(): SupplyInfo {
    return {
      maxSupply: this.maxSupply,
      totalMinted: this.totalMinted,
      nextId: this.nextId,
      totalBurned: this.totalBurned,
      remaining: this.maxSupply - this.totalMinted,
    };
  }
}
