// ============================================================================
// @phasemint/engine — Drop Engine
//
// Public surface of one collection instance. Each mutating entry point
//   1. takes the reentrancy lock,
//   2. checks the caller's capability,
//   3. runs inside an operation journal that is rolled back on any error,
//   4. releases the lock and only then delivers notifications.
// ============================================================================

import type { Logger } from 'pino';
import { AccessController } from './accessController.js';
import { sameAddress, toAddress } from './address.js';
import { BPS_DENOMINATOR, PUBLIC_PHASE_ID } from './constants.js';
import { systemClock } from './clock.js';
import {
  parseDropConfig,
  parseWith,
  presalePhaseSchema,
  publicMintSchema,
  royaltySchema,
} from './config.js';
import type { DropConfigInput, PresalePhaseInput, PublicMintInput, RoyaltyInput } from './config.js';
import { AuthorizationError, ConfigError, PaymentError, PhaseError, StateError } from './errors.js';
import { TypedEmitter } from './events.js';
import type { DropEventMap } from './events.js';
import { transactionContextFor } from './journal.js';
import type { OperationJournal, TransactionContext } from './journal.js';
import { createLogger } from './logger.js';
import { InMemoryAssetRegistry } from './memoryRegistry.js';
import { InMemoryFundsLedger } from './memoryFunds.js';
import { MintExecutor } from './mintExecutor.js';
import { PauseSwitch } from './pauseSwitch.js';
import { PhaseRegistry } from './phaseRegistry.js';
import { SupplyLedger } from './supplyLedger.js';
import { PhaseKind } from './types.js';
import type {
  Address,
  AirdropReceipt,
  AssetRegistry,
  Bytes32,
  CallContext,
  Clock,
  CollectionConfig,
  FeeConfig,
  FundsLedger,
  MintReceipt,
  Phase,
  RoyaltyConfig,
  RoyaltyInfo,
  SupplyInfo,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Host collaborators. Anything omitted gets an in-process default. */
export interface DropEngineDeps {
  registry?: AssetRegistry;
  funds?: FundsLedger;
  clock?: Clock;
  logger?: Logger;
}

export interface FeeRoyaltyUpdate {
  royaltyReceiver: string;
  royaltyBps: number;
}

// ---------------------------------------------------------------------------
// DropEngine
// ---------------------------------------------------------------------------

/**
 * A single, independent mint instance: one collection, one supply cap, one
 * fee split.
 *
 * @example
 * ```ts
 * const engine = new DropEngine({
 *   address: dropAccount,
 *   owner: creator,
 *   collection: { name: 'Tides', symbol: 'TIDE', maxSupply: 100 },
 *   publicMint: { startOffset: 0, endOffset: 86_400, price: 100n, maxPerAddress: 2 },
 *   fees: { mintFeePerUnit: 10n, feeRecipient: platform, proceedsRecipient: creator },
 * }, { funds, registry });
 *
 * const receipt = engine.mintPublic({ caller: buyer, value: 110n }, 1, buyer);
 * ```
 */
export class DropEngine {
  /** Notifications, delivered after the emitting operation commits. */
  readonly events = new TypedEmitter<DropEventMap>();
  readonly address: Address;
  readonly collection: CollectionConfig;

  private readonly fees: FeeConfig;
  private royalty: RoyaltyConfig;
  private tradingLocked = false;
  private locked = false;

  private readonly access: AccessController;
  private readonly pauseSwitch: PauseSwitch;
  private readonly supply: SupplyLedger;
  private readonly phaseRegistry: PhaseRegistry;
  private readonly executor: MintExecutor;
  private readonly registry: AssetRegistry;
  private readonly funds: FundsLedger;
  private readonly context: TransactionContext;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: DropConfigInput, deps: DropEngineDeps = {}) {
    const parsed = parseDropConfig(config);
    this.address = parsed.address;
    this.collection = { ...parsed.collection };
    this.fees = { ...parsed.fees };
    this.royalty = parsed.royalty ?? { receiver: parsed.owner, bps: 0 };

    this.registry = deps.registry ?? new InMemoryAssetRegistry();
    this.funds = deps.funds ?? new InMemoryFundsLedger();
    this.context = transactionContextFor(this.funds);
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger('phasemint')).child({ drop: this.address });

    this.access = new AccessController(parsed.owner);
    this.pauseSwitch = new PauseSwitch();
    this.supply = new SupplyLedger(parsed.collection.maxSupply, parsed.collection.firstTokenId);
    this.phaseRegistry = new PhaseRegistry(parsed.publicMint, this.clock.now());
    this.executor = new MintExecutor({
      account: this.address,
      supply: this.supply,
      phases: this.phaseRegistry,
      pause: this.pauseSwitch,
      fees: this.fees,
      registry: this.registry,
      funds: this.funds,
      clock: this.clock,
      logger: this.logger,
    });

    this.logger.info(
      { name: this.collection.name, maxSupply: this.collection.maxSupply, owner: parsed.owner },
      'Drop created',
    );
  }

  // -----------------------------------------------------------------------
  // Read operations
  // -----------------------------------------------------------------------

  supplyInfo(): SupplyInfo {
    return this.supply.snapshot();
  }

  /** A registered phase, or `undefined` for unknown and removed ids. */
  phaseInfo(id: number): Phase | undefined {
    const phase = this.phaseRegistry.get(id);
    return phase && !phase.removed ? phase : undefined;
  }

  publicMintInfo(): Phase {
    return this.phaseRegistry.publicPhase();
  }

  phases(): Phase[] {
    return this.phaseRegistry.list();
  }

  /** Units `account` has minted in a phase, counted against its cap. */
  mintedInPhase(phaseId: number, account: string): number {
    return this.phaseRegistry.mintedBy(phaseId, account);
  }

  feeInfo(): FeeConfig {
    return { ...this.fees };
  }

  royaltyInfo(salePrice: bigint): RoyaltyInfo {
    return {
      receiver: this.royalty.receiver,
      amount: (salePrice * BigInt(this.royalty.bps)) / BPS_DENOMINATOR,
    };
  }

  /** Value retained by the instance (overpayments), withdrawable by the owner. */
  heldBalance(): bigint {
    return this.funds.balanceOf(this.address);
  }

  owner(): Address {
    return this.access.owner;
  }

  isPaused(): boolean {
    return this.pauseSwitch.paused;
  }

  isTradingLocked(): boolean {
    return this.tradingLocked;
  }

  ownerOf(id: number): Address | undefined {
    return this.registry.ownerOf(id);
  }

  balanceOf(account: string): number {
    return this.registry.balanceOf(account);
  }

  // -----------------------------------------------------------------------
  // Public minting
  // -----------------------------------------------------------------------

  /** Buy `amount` units in the public phase for `to`, paying `ctx.value`. */
  mintPublic(ctx: CallContext, amount: number, to: string): MintReceipt {
    return this.execute('mintPublic', (journal) => {
      const payer = toAddress(ctx.caller, 'caller');
      const recipient = toAddress(to, 'recipient');
      const receipt = this.executor.purchase(
        { payer, recipient, amount, phaseId: PUBLIC_PHASE_ID, payment: ctx.value ?? 0n },
        journal,
      );
      this.notifyPurchase(journal, payer, receipt);
      return receipt;
    });
  }

  /** Buy `amount` units in a presale phase for the caller, proving eligibility. */
  whitelistMint(
    ctx: CallContext,
    proof: readonly Bytes32[],
    amount: number,
    phaseId: number,
  ): MintReceipt {
    return this.execute('whitelistMint', (journal) => {
      const payer = toAddress(ctx.caller, 'caller');
      if (this.phaseRegistry.get(phaseId)?.kind === PhaseKind.Public) {
        throw new PhaseError('Unknown', `phase ${phaseId} is not a presale phase`);
      }
      const receipt = this.executor.purchase(
        { payer, recipient: payer, amount, phaseId, payment: ctx.value ?? 0n, proof },
        journal,
      );
      this.notifyPurchase(journal, payer, receipt);
      return receipt;
    });
  }

  // -----------------------------------------------------------------------
  // Holder operations
  // -----------------------------------------------------------------------

  /** Destroy a unit the caller owns. Capacity is not returned to the cap. */
  burn(ctx: CallContext, id: number): void {
    this.execute('burn', (journal) => {
      const caller = toAddress(ctx.caller, 'caller');
      this.requireHolder(caller, id);
      this.registry.burn(id);
      journal.onRollback(() => this.registry.issue(caller, id));
      this.supply.recordBurn(1);
      journal.onRollback(() => this.supply.recordBurn(-1));
      journal.onCommit(() => this.events.emit('Burned', { owner: caller, id }));
    });
  }

  /** Move a unit the caller owns. Blocked while trading is locked. */
  transfer(ctx: CallContext, to: string, id: number): void {
    this.execute('transfer', (journal) => {
      const caller = toAddress(ctx.caller, 'caller');
      const recipient = toAddress(to, 'recipient');
      if (this.tradingLocked) {
        throw new StateError('TradingLocked', 'transfers are locked');
      }
      this.requireHolder(caller, id);
      this.registry.transfer(caller, recipient, id);
      journal.onRollback(() => this.registry.transfer(recipient, caller, id));
    });
  }

  // -----------------------------------------------------------------------
  // Owner: phases
  // -----------------------------------------------------------------------

  addPhase(ctx: CallContext, config: PresalePhaseInput): number {
    return this.execute('addPhase', (journal) => {
      this.access.requireOwner(ctx);
      const parsed = parseWith(presalePhaseSchema, config, 'presale phase');
      const id = this.phaseRegistry.addPhase(parsed, this.clock.now());
      journal.onRollback(() => this.phaseRegistry.unregister(id));
      const phase = this.phaseRegistry.require(id);
      this.logger.info({ phaseId: id, start: phase.start, end: phase.end }, 'Phase added');
      journal.onCommit(() => this.events.emit('PhaseAdded', { phase }));
      return id;
    });
  }

  editPhase(ctx: CallContext, id: number, config: PresalePhaseInput): Phase {
    return this.execute('editPhase', (journal) => {
      this.access.requireOwner(ctx);
      const parsed = parseWith(presalePhaseSchema, config, 'presale phase');
      const previous = this.phaseRegistry.editPhase(id, parsed, this.clock.now());
      journal.onRollback(() => this.phaseRegistry.restore(previous));
      const phase = this.phaseRegistry.require(id);
      this.logger.info({ phaseId: id }, 'Phase edited');
      journal.onCommit(() => this.events.emit('PhaseEdited', { previous, phase }));
      return phase;
    });
  }

  /** Tombstone a presale phase that has not started. Other ids are unaffected. */
  removePhase(ctx: CallContext, id: number): void {
    this.execute('removePhase', (journal) => {
      this.access.requireOwner(ctx);
      const previous = this.phaseRegistry.removePhase(id, this.clock.now());
      journal.onRollback(() => this.phaseRegistry.restore(previous));
      this.logger.info({ phaseId: id }, 'Phase removed');
      journal.onCommit(() => this.events.emit('PhaseRemoved', { phase: { ...previous, removed: true } }));
    });
  }

  /** Re-time or re-price the public phase. Settled purchases are unaffected. */
  configurePublicMint(ctx: CallContext, config: PublicMintInput): Phase {
    return this.execute('configurePublicMint', (journal) => {
      this.access.requireOwner(ctx);
      const parsed = parseWith(publicMintSchema, config, 'public mint config');
      const previous = this.phaseRegistry.configurePublic(parsed, this.clock.now());
      journal.onRollback(() => this.phaseRegistry.restore(previous));
      const phase = this.phaseRegistry.publicPhase();
      this.logger.info({ start: phase.start, end: phase.end, price: phase.price.toString() }, 'Public mint configured');
      journal.onCommit(() => this.events.emit('PublicMintConfigured', { previous, phase }));
      return phase;
    });
  }

  // -----------------------------------------------------------------------
  // Owner: supply, pause, funds
  // -----------------------------------------------------------------------

  reduceSupply(ctx: CallContext, newCap: number): void {
    this.execute('reduceSupply', (journal) => {
      this.access.requireOwner(ctx);
      const previousCap = this.supply.snapshot().maxSupply;
      this.supply.reduceCap(newCap);
      this.logger.info({ previousCap, newCap }, 'Supply reduced');
      journal.onCommit(() => this.events.emit('SupplyReduced', { previousCap, newCap }));
    });
  }

  pause(ctx: CallContext): void {
    this.execute('pause', (journal) => {
      this.access.requireOwner(ctx);
      this.pauseSwitch.pause();
      this.logger.info('Minting paused');
      journal.onCommit(() => this.events.emit('Paused', { by: this.access.owner }));
    });
  }

  resume(ctx: CallContext): void {
    this.execute('resume', (journal) => {
      this.access.requireOwner(ctx);
      this.pauseSwitch.resume();
      this.logger.info('Minting resumed');
      journal.onCommit(() => this.events.emit('Resumed', { by: this.access.owner }));
    });
  }

  /**
   * Send `amount` of the held balance to the owner.
   *
   * @throws {PaymentError} `Insufficient` if more than the held balance is
   *         requested, `TransferFailed` if the owner's account rejects it.
   */
  withdraw(ctx: CallContext, amount: bigint): void {
    this.execute('withdraw', (journal) => {
      this.access.requireOwner(ctx);
      if (amount <= 0n) {
        throw new ConfigError('InvalidAmount', `withdrawal amount must be positive — got ${amount}`);
      }
      const held = this.heldBalance();
      if (amount > held) {
        throw new PaymentError('Insufficient', `cannot withdraw ${amount}, holding ${held}`);
      }
      const to = this.access.owner;
      const checkpoint = this.funds.checkpoint();
      journal.onRollback(() => this.funds.revertTo(checkpoint));
      journal.onCommit(() => this.funds.release(checkpoint));
      try {
        this.funds.transfer(this.address, to, amount);
      } catch (err) {
        throw new PaymentError(
          'TransferFailed',
          `withdrawal to ${to} failed — ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
      this.logger.info({ to, amount: amount.toString() }, 'Funds withdrawn');
      journal.onCommit(() => this.events.emit('FundsWithdrawn', { to, amount }));
    });
  }

  /** Update royalty reporting. The mint fee split is fixed per instance. */
  setFeeRoyaltyConfig(ctx: CallContext, update: FeeRoyaltyUpdate): void {
    this.execute('setFeeRoyaltyConfig', (journal) => {
      this.access.requireOwner(ctx);
      const parsed: RoyaltyConfig = parseWith(
        royaltySchema,
        { receiver: update.royaltyReceiver, bps: update.royaltyBps } satisfies RoyaltyInput,
        'royalty config',
      );
      const previous = this.royalty;
      this.royalty = parsed;
      journal.onRollback(() => {
        this.royalty = previous;
      });
      this.logger.info({ receiver: parsed.receiver, bps: parsed.bps }, 'Royalty config updated');
      journal.onCommit(() =>
        this.events.emit('FeeConfigUpdated', { royaltyReceiver: parsed.receiver, royaltyBps: parsed.bps }),
      );
    });
  }

  setTradingLocked(ctx: CallContext, locked: boolean): void {
    this.execute('setTradingLocked', (journal) => {
      this.access.requireOwner(ctx);
      const previous = this.tradingLocked;
      this.tradingLocked = locked;
      journal.onRollback(() => {
        this.tradingLocked = previous;
      });
      journal.onCommit(() => this.events.emit('TradingLockUpdated', { locked }));
    });
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    this.execute('transferOwnership', (journal) => {
      this.access.requireOwner(ctx);
      const previousOwner = this.access.transferOwnership(newOwner);
      journal.onRollback(() => {
        this.access.transferOwnership(previousOwner);
      });
      const next = this.access.owner;
      this.logger.info({ previousOwner, newOwner: next }, 'Ownership transferred');
      journal.onCommit(() => this.events.emit('OwnershipTransferred', { previousOwner, newOwner: next }));
    });
  }

  // -----------------------------------------------------------------------
  // Owner: airdrops
  // -----------------------------------------------------------------------

  airdrop(ctx: CallContext, to: string, amount: number): AirdropReceipt {
    return this.execute('airdrop', (journal) => {
      this.access.requireOwner(ctx);
      const recipient = toAddress(to, 'recipient');
      const receipt = this.executor.airdrop(recipient, amount, journal);
      this.logger.info({ recipient, firstId: receipt.firstId, amount }, 'Airdrop issued');
      journal.onCommit(() => this.events.emit('Airdrop', { ...receipt }));
      return receipt;
    });
  }

  batchAirdrop(ctx: CallContext, recipients: readonly string[], amountEach: number): AirdropReceipt[] {
    return this.execute('batchAirdrop', (journal) => {
      this.access.requireOwner(ctx);
      const normalized = recipients.map((recipient, i) => toAddress(recipient, `recipients[${i}]`));
      const receipts = this.executor.batchAirdrop(normalized, amountEach, journal);
      this.logger.info({ recipients: normalized.length, amountEach }, 'Batch airdrop issued');
      journal.onCommit(() =>
        this.events.emit('BatchAirdrop', {
          recipients: normalized,
          firstId: receipts[0].firstId,
          amountEach,
        }),
      );
      return receipts;
    });
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  /**
   * Run a state-mutating operation atomically under the reentrancy lock.
   *
   * Operations on every instance sharing this funds ledger nest: one that
   * commits while another is open is rolled back with it, and its
   * notifications wait for the outermost commit.
   *
   * @throws {StateError} `Reentrant` if another operation is in progress.
   */
  private execute<T>(operation: string, body: (journal: OperationJournal) => T): T {
    if (this.locked) {
      throw new StateError('Reentrant', `${operation} called while another operation is in progress`);
    }
    this.locked = true;
    const journal = this.context.begin();
    let result: T;
    let deferred: Array<() => void>;
    try {
      result = body(journal);
      deferred = this.context.commit(journal);
    } catch (err) {
      if (journal.size > 0) {
        this.logger.debug({ operation, steps: journal.size }, 'Rolling back');
      }
      this.context.rollback(journal);
      throw err;
    } finally {
      this.locked = false;
    }
    for (const step of deferred) {
      try {
        step();
      } catch (err) {
        this.logger.error({ operation, err }, 'Commit step threw');
      }
    }
    return result;
  }

  private requireHolder(caller: Address, id: number): void {
    const holder = this.registry.ownerOf(id);
    if (holder === undefined) {
      throw new StateError('UnknownToken', `unit ${id} does not exist`);
    }
    if (!sameAddress(holder, caller)) {
      throw new AuthorizationError('NotTokenOwner', `${caller} does not own unit ${id}`);
    }
  }

  private notifyPurchase(journal: OperationJournal, payer: Address, receipt: MintReceipt): void {
    journal.onCommit(() =>
      this.events.emit('Purchase', {
        recipient: receipt.recipient,
        payer,
        phaseId: receipt.phaseId,
        firstId: receipt.firstId,
        amount: receipt.amount,
        cost: receipt.cost.requiredCost,
      }),
    );
  }
}
