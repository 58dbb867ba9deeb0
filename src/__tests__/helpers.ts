import { ethers } from 'ethers';
import { pino } from 'pino';
import { ManualClock } from '../clock.js';
import type { DropConfigInput } from '../config.js';
import { DropEngine } from '../engine.js';
import { InMemoryAssetRegistry } from '../memoryRegistry.js';
import { InMemoryFundsLedger } from '../memoryFunds.js';

// ---------------------------------------------------------------------------
// Fixed accounts
// ---------------------------------------------------------------------------

export function account(byte: string): string {
  return ethers.getAddress('0x' + byte.repeat(20));
}

export const DROP = account('d0');
export const OWNER = account('0a');
export const CREATOR = account('0c');
export const PLATFORM = account('0f');
export const ALICE = account('a1');
export const BOB = account('b2');
export const CAROL = account('c3');
export const DAVE = account('d4');
export const FACTORY = account('fa');

export const START = 1_700_000_000;
export const DAY = 86_400;

export const silentLogger = pino({ level: 'silent' });

// ---------------------------------------------------------------------------
// Drop fixture
// ---------------------------------------------------------------------------

export interface DropFixture {
  engine: DropEngine;
  clock: ManualClock;
  funds: InMemoryFundsLedger;
  registry: InMemoryAssetRegistry;
}

/**
 * maxSupply 100, public price 100, mint fee 10, two per wallet, public
 * window open for one day from creation.
 */
export function createDrop(overrides: Partial<DropConfigInput> = {}): DropFixture {
  const clock = new ManualClock(START);
  const funds = new InMemoryFundsLedger();
  const registry = new InMemoryAssetRegistry();
  const engine = new DropEngine(
    {
      address: DROP,
      owner: OWNER,
      collection: { name: 'Tides', symbol: 'TIDE', maxSupply: 100 },
      publicMint: { startOffset: 0, endOffset: DAY, price: 100n, maxPerAddress: 2 },
      fees: { mintFeePerUnit: 10n, feeRecipient: PLATFORM, proceedsRecipient: CREATOR },
      ...overrides,
    },
    { clock, funds, registry, logger: silentLogger },
  );
  return { engine, clock, funds, registry };
}

/** Run `fn` and return what it threw. Fails the test if nothing was thrown. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}
