// ============================================================================
// @phasemint/engine — Access Control
// ============================================================================

import { sameAddress, toAddress } from './address.js';
import { AuthorizationError } from './errors.js';
import type { Address, CallContext } from './types.js';

/**
 * Holds the owner of an instance. The owner administers phases, supply,
 * pause and funds; the platform fee recipient holds no per-instance
 * privileges.
 *
 * Privilege is decided from the explicit {@link CallContext} handed to each
 * entry point.
 */
export class AccessController {
  private currentOwner: Address;

  constructor(owner: Address) {
    this.currentOwner = toAddress(owner, 'owner');
  }

  get owner(): Address {
    return this.currentOwner;
  }

  /** @throws {AuthorizationError} `NotOwner` */
  requireOwner(ctx: CallContext): void {
    if (!sameAddress(this.currentOwner, ctx.caller)) {
      throw new AuthorizationError('NotOwner', `${ctx.caller} is not the owner`);
    }
  }

  /**
   * Hand the owner role to another account.
   *
   * @returns The previous owner.
   */
  transferOwnership(newOwner: string): Address {
    const previous = this.currentOwner;
    this.currentOwner = toAddress(newOwner, 'newOwner');
    return previous;
  }
}
