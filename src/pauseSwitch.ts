// ============================================================================
// @phasemint/engine — Pause Switch
// ============================================================================

import { StateError } from './errors.js';

/** Global issuance kill switch. Transfers, burns and admin calls ignore it. */
export class PauseSwitch {
  private engaged = false;

  get paused(): boolean {
    return this.engaged;
  }

  /** @throws {StateError} `Paused` while engaged. */
  assertNotPaused(): void {
    if (this.engaged) {
      throw new StateError('Paused', 'minting is paused');
    }
  }

  pause(): void {
    if (this.engaged) throw new StateError('AlreadyPaused', 'minting is already paused');
    this.engaged = true;
  }

  resume(): void {
    if (!this.engaged) throw new StateError('NotPaused', 'minting is not paused');
    this.engaged = false;
  }
}
