// ============================================================================
// @phasemint/engine — Mint Executor
//
// Guard, price, reserve, issue and settle one purchase as a single step:
//
//   Idle → Validating → Settling → Issued
//                  ╰──────────╰──→ Rejected
//
// Every ledger mutation is journaled and applied before any value leaves
// the instance, so recipient code triggered by a settlement transfer only
// ever observes fully advanced counters.
// ============================================================================

import type { Logger } from 'pino';
import { verifyAllowList } from './allowList.js';
import { MAX_BATCH_AIRDROP } from './constants.js';
import {
  AllowListError,
  ConfigError,
  MintEngineError,
  PaymentError,
  PhaseError,
  SupplyError,
} from './errors.js';
import type { OperationJournal } from './journal.js';
import type { PauseSwitch } from './pauseSwitch.js';
import type { PhaseRegistry } from './phaseRegistry.js';
import { computeCost } from './pricing.js';
import type { SupplyLedger } from './supplyLedger.js';
import { MintStage, PhaseKind } from './types.js';
import type {
  Address,
  AirdropReceipt,
  AssetRegistry,
  Bytes32,
  Clock,
  CostBreakdown,
  FeeConfig,
  FundsLedger,
  MintReceipt,
  Phase,
  Reservation,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MintRequest {
  /** Account paying for the purchase. */
  payer: Address;
  phaseId: number;
  amount: number;
  recipient: Address;
  /** Value attached to the call. */
  payment: bigint;
  /** Allow-list proof for presale phases. */
  proof?: readonly Bytes32[];
}

export interface MintExecutorDeps {
  /** Account that holds the instance's funds. */
  account: Address;
  supply: SupplyLedger;
  phases: PhaseRegistry;
  pause: PauseSwitch;
  fees: FeeConfig;
  registry: AssetRegistry;
  funds: FundsLedger;
  clock: Clock;
  logger: Logger;
}

interface ValidatedPurchase {
  phase: Phase;
  cost: CostBreakdown;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function assertUnitAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ConfigError('InvalidAmount', `amount must be a positive integer — got ${amount}`);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// MintExecutor
// ---------------------------------------------------------------------------

export class MintExecutor {
  private readonly deps: MintExecutorDeps;
  private stage: MintStage = MintStage.Idle;

  constructor(deps: MintExecutorDeps) {
    this.deps = deps;
  }

  // -----------------------------------------------------------------------
  // Purchases
  // -----------------------------------------------------------------------

  /**
   * Run one purchase inside `journal`.
   *
   * The first failing guard aborts before anything is mutated. A failure
   * during settlement leaves every mutation registered in `journal` for the
   * caller to roll back.
   */
  purchase(request: MintRequest, journal: OperationJournal): MintReceipt {
    const log = this.deps.logger.child({ phaseId: request.phaseId, recipient: request.recipient });
    try {
      this.enter(MintStage.Validating, log);
      const { phase, cost } = this.validate(request);

      this.enter(MintStage.Settling, log);
      this.collect(request, journal);
      const reservation = this.issue(request.recipient, request.amount, journal);
      this.deps.phases.recordMint(phase.id, request.recipient, request.amount);
      journal.onRollback(() => this.deps.phases.recordMint(phase.id, request.recipient, -request.amount));
      this.settle(cost);

      this.enter(MintStage.Issued, log);
      log.info(
        { firstId: reservation.firstId, amount: request.amount, cost: cost.requiredCost.toString() },
        'Purchase settled',
      );
      return {
        stage: MintStage.Issued,
        phaseId: phase.id,
        recipient: request.recipient,
        firstId: reservation.firstId,
        amount: request.amount,
        cost,
        excess: request.payment - cost.requiredCost,
      };
    } catch (err) {
      const settling = this.stage === MintStage.Settling;
      this.enter(MintStage.Rejected, log);
      const code = err instanceof MintEngineError ? err.code : 'Unexpected';
      if (settling) {
        log.warn({ code, err }, 'Purchase failed during settlement, rolling back');
      } else {
        log.debug({ code }, 'Purchase rejected');
      }
      throw err;
    } finally {
      this.stage = MintStage.Idle;
    }
  }

  // -----------------------------------------------------------------------
  // Administrative issuance
  // -----------------------------------------------------------------------

  /** Issue `amount` units to one recipient without payment. */
  airdrop(recipient: Address, amount: number, journal: OperationJournal): AirdropReceipt {
    assertUnitAmount(amount);
    this.deps.pause.assertNotPaused();
    this.assertCapacity(amount);
    const reservation = this.issue(recipient, amount, journal);
    return { recipient, firstId: reservation.firstId, amount };
  }

  /**
   * Issue `amountEach` units to each recipient. Ids are contiguous across
   * the batch, in recipient order.
   *
   * @throws {SupplyError} `AmountTooHigh` for more than eight recipients.
   */
  batchAirdrop(
    recipients: readonly Address[],
    amountEach: number,
    journal: OperationJournal,
  ): AirdropReceipt[] {
    if (recipients.length === 0) {
      throw new ConfigError('InvalidAmount', 'batch airdrop needs at least one recipient');
    }
    if (recipients.length > MAX_BATCH_AIRDROP) {
      throw new SupplyError(
        'AmountTooHigh',
        `batch airdrop is limited to ${MAX_BATCH_AIRDROP} recipients — got ${recipients.length}`,
      );
    }
    assertUnitAmount(amountEach);
    this.deps.pause.assertNotPaused();
    this.assertCapacity(recipients.length * amountEach);
    return recipients.map((recipient) => {
      const reservation = this.issue(recipient, amountEach, journal);
      return { recipient, firstId: reservation.firstId, amount: amountEach };
    });
  }

  // -----------------------------------------------------------------------
  // Guards
  // -----------------------------------------------------------------------

  private validate(request: MintRequest): ValidatedPurchase {
    const { phases, pause, fees, clock, registry } = this.deps;
    assertUnitAmount(request.amount);

    pause.assertNotPaused();

    const phase = phases.require(request.phaseId);
    const now = clock.now();
    if (!phases.isActive(phase, now)) {
      throw new PhaseError('Inactive', `phase ${phase.id} is not active at ${now} (window ${phase.start}..${phase.end})`);
    }

    // Units held count even if minted elsewhere; units minted here count even once moved away.
    const held = Math.max(registry.balanceOf(request.recipient), phases.mintedBy(phase.id, request.recipient));
    if (!phases.perAddressLimitOk(phase, held, request.amount)) {
      throw new PhaseError(
        'LimitExceeded',
        `${request.recipient} may hold ${Math.max(phase.maxPerAddress - held, 0)} more in phase ${phase.id}, requested ${request.amount}`,
      );
    }

    if (phase.kind === PhaseKind.Presale) {
      const root = phase.allowListRoot;
      if (root === undefined) {
        throw new PhaseError('Unknown', `phase ${phase.id} has no allow-list commitment`);
      }
      if (!verifyAllowList(request.proof ?? [], request.recipient, root)) {
        throw new AllowListError('NotEligible', `${request.recipient} is not on the allow-list for phase ${phase.id}`);
      }
    }

    this.assertCapacity(request.amount);

    const cost = computeCost(request.amount, phase.price, fees);
    if (request.payment < cost.requiredCost) {
      throw new PaymentError(
        'Insufficient',
        `attached ${request.payment}, required ${cost.requiredCost}`,
      );
    }
    return { phase, cost };
  }

  private assertCapacity(amount: number): void {
    const { supply } = this.deps;
    if (!supply.canIssue(amount)) {
      const info = supply.snapshot();
      throw new SupplyError('SoldOut', `cannot issue ${amount} — ${info.remaining} of ${info.maxSupply} remaining`);
    }
  }

  // -----------------------------------------------------------------------
  // Commit steps
  // -----------------------------------------------------------------------

  /** Move the attached value into the instance account. */
  private collect(request: MintRequest, journal: OperationJournal): void {
    const { funds, account } = this.deps;
    const checkpoint = funds.checkpoint();
    journal.onRollback(() => funds.revertTo(checkpoint));
    journal.onCommit(() => funds.release(checkpoint));
    if (request.payment === 0n) return;
    try {
      funds.transfer(request.payer, account, request.payment);
    } catch (err) {
      if (err instanceof PaymentError) throw err;
      throw new PaymentError('TransferFailed', `could not collect payment — ${describe(err)}`, { cause: err });
    }
  }

  private issue(recipient: Address, amount: number, journal: OperationJournal): Reservation {
    const { supply, registry } = this.deps;
    const reservation = supply.reserve(amount);
    journal.onRollback(() => supply.release(reservation));
    for (let id = reservation.firstId; id < reservation.firstId + amount; id++) {
      registry.issue(recipient, id);
      journal.onRollback(() => registry.burn(id));
    }
    return reservation;
  }

  /** Pay out both shares. Any failure surfaces as `TransferFailed`. */
  private settle(cost: CostBreakdown): void {
    const { funds, fees, account } = this.deps;
    const payouts: Array<[Address, bigint]> = [
      [fees.feeRecipient, cost.platformShare],
      [fees.proceedsRecipient, cost.creatorShare],
    ];
    for (const [to, amount] of payouts) {
      if (amount === 0n) continue;
      try {
        funds.transfer(account, to, amount);
      } catch (err) {
        throw new PaymentError('TransferFailed', `settlement of ${amount} to ${to} failed — ${describe(err)}`, {
          cause: err,
        });
      }
    }
  }

  private enter(stage: MintStage, log: Logger): void {
    this.stage = stage;
    log.debug({ stage }, 'Mint stage');
  }
}
