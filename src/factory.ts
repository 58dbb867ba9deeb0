// ============================================================================
// @phasemint/engine — Drop Factory
//
// Creates engine instances and holds the platform defaults that are
// snapshotted into each new instance's fee split. Changing the defaults
// never touches instances that already exist.
// ============================================================================

import { ethers } from 'ethers';
import type { Logger } from 'pino';
import { sameAddress, toAddress } from './address.js';
import { systemClock } from './clock.js';
import { parseFactoryConfig, parseWith, platformDefaultsSchema } from './config.js';
import type {
  FactoryConfigInput,
  PlatformDefaults,
  PlatformDefaultsInput,
  PublicMintInput,
  RoyaltyInput,
} from './config.js';
import { DropEngine } from './engine.js';
import { AuthorizationError } from './errors.js';
import { TypedEmitter } from './events.js';
import { createLogger } from './logger.js';
import { InMemoryAssetRegistry } from './memoryRegistry.js';
import { InMemoryFundsLedger } from './memoryFunds.js';
import type { Address, AssetRegistry, CallContext, Clock, FundsLedger } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CreateDropParams {
  collection: { name: string; symbol: string; maxSupply: number; firstTokenId?: number };
  publicMint: PublicMintInput;
  royalty?: RoyaltyInput;
  /** Where the creator share goes. Defaults to the caller. */
  proceedsRecipient?: string;
}

export interface DropFactoryDeps {
  funds?: FundsLedger;
  clock?: Clock;
  logger?: Logger;
  /** Builds the ownership registry for each new instance. */
  createRegistry?: () => AssetRegistry;
}

export interface FactoryEventMap {
  DropCreated: { drop: Address; creator: Address; name: string };
  PlatformDefaultsUpdated: { previous: PlatformDefaults; defaults: PlatformDefaults };
  PlatformAdminTransferred: { previousAdmin: Address; newAdmin: Address };
}

// ---------------------------------------------------------------------------
// DropFactory
// ---------------------------------------------------------------------------

/**
 * Deploys {@link DropEngine} instances on a shared funds ledger and clock.
 *
 * Instance addresses follow the EVM contract-address rule
 * (`keccak256(rlp([factory, nonce]))`), so they are deterministic for a
 * given factory address and creation order.
 */
export class DropFactory {
  readonly events = new TypedEmitter<FactoryEventMap>();
  readonly address: Address;

  private admin: Address;
  private defaults: PlatformDefaults;
  private nonce = 1;
  private readonly drops = new Map<string, DropEngine>();
  private readonly byCreator = new Map<string, Address[]>();

  private readonly funds: FundsLedger;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly createRegistry: () => AssetRegistry;

  constructor(config: FactoryConfigInput, deps: DropFactoryDeps = {}) {
    const parsed = parseFactoryConfig(config);
    this.address = parsed.address;
    this.admin = parsed.platformAdmin;
    this.defaults = { ...parsed.defaults };
    this.funds = deps.funds ?? new InMemoryFundsLedger();
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('phasemint-factory');
    this.createRegistry = deps.createRegistry ?? (() => new InMemoryAssetRegistry());
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  get platformAdmin(): Address {
    return this.admin;
  }

  platformDefaults(): PlatformDefaults {
    return { ...this.defaults };
  }

  getDrop(address: string): DropEngine | undefined {
    return this.drops.get(address.toLowerCase());
  }

  /** Instance addresses created by `creator`, oldest first. */
  dropsOf(creator: string): Address[] {
    return [...(this.byCreator.get(creator.toLowerCase()) ?? [])];
  }

  allDrops(): Address[] {
    return [...this.drops.values()].map((drop) => drop.address);
  }

  // -----------------------------------------------------------------------
  // Instance creation
  // -----------------------------------------------------------------------

  /**
   * Create a drop owned by the caller, with the current platform defaults
   * copied into its fee split.
   */
  createDrop(ctx: CallContext, params: CreateDropParams): DropEngine {
    const creator = toAddress(ctx.caller, 'caller');
    const address = ethers.getCreateAddress({ from: this.address, nonce: this.nonce });
    const drop = new DropEngine(
      {
        address,
        owner: creator,
        collection: params.collection,
        publicMint: params.publicMint,
        royalty: params.royalty,
        fees: {
          mintFeePerUnit: this.defaults.mintFeePerUnit,
          salesFeeBps: this.defaults.salesFeeBps,
          feeRecipient: this.defaults.feeRecipient,
          proceedsRecipient: params.proceedsRecipient ?? creator,
        },
      },
      {
        registry: this.createRegistry(),
        funds: this.funds,
        clock: this.clock,
        logger: this.logger,
      },
    );
    this.nonce++;

    this.drops.set(address.toLowerCase(), drop);
    const key = creator.toLowerCase();
    this.byCreator.set(key, [...(this.byCreator.get(key) ?? []), address]);

    this.logger.info({ drop: address, creator }, 'Drop deployed');
    this.events.emit('DropCreated', { drop: address, creator, name: params.collection.name });
    return drop;
  }

  // -----------------------------------------------------------------------
  // Platform administration
  // -----------------------------------------------------------------------

  /** Replace the defaults applied to instances created from now on. */
  setPlatformDefaults(ctx: CallContext, input: PlatformDefaultsInput): void {
    this.requireAdmin(ctx);
    const defaults = parseWith(platformDefaultsSchema, input, 'platform defaults');
    const previous = this.defaults;
    this.defaults = defaults;
    this.logger.info(
      { feeRecipient: defaults.feeRecipient, mintFeePerUnit: defaults.mintFeePerUnit.toString(), salesFeeBps: defaults.salesFeeBps },
      'Platform defaults updated',
    );
    this.events.emit('PlatformDefaultsUpdated', { previous, defaults: { ...defaults } });
  }

  transferPlatformAdmin(ctx: CallContext, newAdmin: string): void {
    this.requireAdmin(ctx);
    const next = toAddress(newAdmin, 'newAdmin');
    const previousAdmin = this.admin;
    this.admin = next;
    this.events.emit('PlatformAdminTransferred', { previousAdmin, newAdmin: next });
  }

  private requireAdmin(ctx: CallContext): void {
    if (!sameAddress(ctx.caller, this.admin)) {
      throw new AuthorizationError('NotPlatformAdmin', `${ctx.caller} is not the platform admin`);
    }
  }
}
