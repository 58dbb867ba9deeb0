// ============================================================================
// @phasemint/engine — In-Memory Asset Registry
// ============================================================================

import { ethers } from 'ethers';
import { sameAddress } from './address.js';
import { AuthorizationError, StateError } from './errors.js';
import type { Address, AssetRegistry } from './types.js';

/**
 * Map-backed implementation of {@link AssetRegistry}.
 *
 * Suitable for simulations and tests; a deployment would back the same
 * interface with its token contract.
 */
export class InMemoryAssetRegistry implements AssetRegistry {
  private readonly owners = new Map<number, Address>();
  private readonly balances = new Map<string, number>();

  issue(to: Address, id: number): void {
    if (this.owners.has(id)) {
      throw new StateError('TokenExists', `unit ${id} has already been issued`);
    }
    const owner = ethers.getAddress(to);
    this.owners.set(id, owner);
    this.adjust(owner, 1);
  }

  ownerOf(id: number): Address | undefined {
    return this.owners.get(id);
  }

  balanceOf(owner: Address): number {
    return this.balances.get(owner.toLowerCase()) ?? 0;
  }

  transfer(from: Address, to: Address, id: number): void {
    const owner = this.requireOwner(id);
    if (!sameAddress(owner, from)) {
      throw new AuthorizationError('NotTokenOwner', `${from} does not own unit ${id}`);
    }
    const recipient = ethers.getAddress(to);
    this.owners.set(id, recipient);
    this.adjust(owner, -1);
    this.adjust(recipient, 1);
  }

  burn(id: number): void {
    const owner = this.requireOwner(id);
    this.owners.delete(id);
    this.adjust(owner, -1);
  }

  /** Number of units currently in existence. */
  get totalSupply(): number {
    return this.owners.size;
  }

  private requireOwner(id: number): Address {
    const owner = this.owners.get(id);
    if (owner === undefined) {
      throw new StateError('UnknownToken', `unit ${id} does not exist`);
    }
    return owner;
  }

  private adjust(owner: Address, delta: number): void {
    const key = owner.toLowerCase();
    const next = (this.balances.get(key) ?? 0) + delta;
    if (next === 0) {
      this.balances.delete(key);
    } else {
      this.balances.set(key, next);
    }
  }
}
