import { describe, it, expect, vi } from 'vitest';
import { ethers } from 'ethers';
import { AuthorizationError } from '../errors.js';
import { ManualClock } from '../clock.js';
import { DropFactory } from '../factory.js';
import type { CreateDropParams } from '../factory.js';
import { InMemoryFundsLedger } from '../memoryFunds.js';
import { ALICE, BOB, CAROL, CREATOR, DAY, FACTORY, PLATFORM, START, catchError, silentLogger } from './helpers.js';

function setup() {
  const funds = new InMemoryFundsLedger();
  const clock = new ManualClock(START);
  const factory = new DropFactory(
    {
      address: FACTORY,
      platformAdmin: PLATFORM,
      defaults: { feeRecipient: PLATFORM, mintFeePerUnit: 10n },
    },
    { funds, clock, logger: silentLogger },
  );
  return { factory, funds, clock };
}

const params: CreateDropParams = {
  collection: { name: 'Tides', symbol: 'TIDE', maxSupply: 100 },
  publicMint: { startOffset: 0, endOffset: DAY, price: 100n, maxPerAddress: 2 },
};

describe('DropFactory', () => {
  it('derives instance addresses from the factory address and creation order', () => {
    const { factory } = setup();
    const first = factory.createDrop({ caller: CREATOR }, params);
    const second = factory.createDrop({ caller: CREATOR }, params);

    expect(first.address).toBe(ethers.getCreateAddress({ from: FACTORY, nonce: 1 }));
    expect(second.address).toBe(ethers.getCreateAddress({ from: FACTORY, nonce: 2 }));
    expect(factory.getDrop(first.address.toLowerCase())).toBe(first);
    expect(factory.allDrops()).toEqual([first.address, second.address]);
  });

  it('makes the caller owner and default proceeds recipient', () => {
    const { factory } = setup();
    const drop = factory.createDrop({ caller: CREATOR }, params);

    expect(drop.owner()).toBe(CREATOR);
    expect(drop.feeInfo()).toEqual({
      mintFeePerUnit: 10n,
      salesFeeBps: 0,
      feeRecipient: PLATFORM,
      proceedsRecipient: CREATOR,
    });
  });

  it('settles purchases on the shared funds ledger', () => {
    const { factory, funds } = setup();
    const drop = factory.createDrop({ caller: CREATOR }, params);
    funds.credit(ALICE, 110n);

    drop.mintPublic({ caller: ALICE, value: 110n }, 1, ALICE);

    expect(funds.balanceOf(PLATFORM)).toBe(10n);
    expect(funds.balanceOf(CREATOR)).toBe(100n);
  });

  it('rolls back a purchase on another drop made while settling a failed purchase', () => {
    const { factory, funds } = setup();
    const a = factory.createDrop({ caller: CREATOR }, params);
    const b = factory.createDrop({ caller: BOB }, params);
    funds.credit(ALICE, 1_000n);
    funds.credit(CAROL, 1_000n);
    const purchased = vi.fn();
    b.events.on('Purchase', purchased);
    funds.onReceive(PLATFORM, ({ from }) => {
      if (from !== a.address) return;
      b.mintPublic({ caller: CAROL, value: 110n }, 1, CAROL);
    });
    funds.onReceive(CREATOR, () => {
      throw new Error('creator wallet offline');
    });

    const err = catchError(() => a.mintPublic({ caller: ALICE, value: 110n }, 1, ALICE));

    expect(err).toMatchObject({ code: 'TransferFailed' });
    expect(b.supplyInfo().totalMinted).toBe(0);
    expect(b.ownerOf(1)).toBeUndefined();
    expect(b.mintedInPhase(0, CAROL)).toBe(0);
    expect(a.supplyInfo().totalMinted).toBe(0);
    expect(funds.balanceOf(CAROL)).toBe(1_000n);
    expect(funds.balanceOf(ALICE)).toBe(1_000n);
    expect(funds.balanceOf(BOB)).toBe(0n);
    expect(funds.balanceOf(PLATFORM)).toBe(0n);
    expect(purchased).not.toHaveBeenCalled();
    expect(funds.retainedMovements).toBe(0);
  });

  it('holds the nested purchase notification until the outer purchase commits', () => {
    const { factory, funds } = setup();
    const a = factory.createDrop({ caller: CREATOR }, params);
    const b = factory.createDrop({ caller: BOB }, params);
    funds.credit(ALICE, 1_000n);
    funds.credit(CAROL, 1_000n);
    const purchased = vi.fn();
    b.events.on('Purchase', purchased);
    const seenInsideOuter: number[] = [];
    funds.onReceive(PLATFORM, ({ from }) => {
      if (from !== a.address) return;
      b.mintPublic({ caller: CAROL, value: 110n }, 1, CAROL);
      seenInsideOuter.push(purchased.mock.calls.length);
    });

    a.mintPublic({ caller: ALICE, value: 110n }, 1, ALICE);

    expect(seenInsideOuter).toEqual([0]);
    expect(purchased).toHaveBeenCalledTimes(1);
    expect(b.ownerOf(1)).toBe(CAROL);
    expect(funds.balanceOf(PLATFORM)).toBe(20n);
    expect(funds.balanceOf(BOB)).toBe(100n);
    expect(funds.balanceOf(CREATOR)).toBe(100n);
    expect(funds.retainedMovements).toBe(0);
  });

  it('snapshots defaults so later changes leave existing drops alone', () => {
    const { factory } = setup();
    const before = factory.createDrop({ caller: CREATOR }, params);

    factory.setPlatformDefaults({ caller: PLATFORM }, { feeRecipient: BOB, mintFeePerUnit: '25', salesFeeBps: 100 });
    const after = factory.createDrop({ caller: CREATOR }, params);

    expect(before.feeInfo()).toMatchObject({ mintFeePerUnit: 10n, salesFeeBps: 0, feeRecipient: PLATFORM });
    expect(after.feeInfo()).toMatchObject({ mintFeePerUnit: 25n, salesFeeBps: 100, feeRecipient: BOB });
    expect(factory.platformDefaults()).toEqual({ feeRecipient: BOB, mintFeePerUnit: 25n, salesFeeBps: 100 });
  });

  it('indexes drops by creator', () => {
    const { factory } = setup();
    const a = factory.createDrop({ caller: CREATOR }, params);
    const b = factory.createDrop({ caller: ALICE }, params);
    const c = factory.createDrop({ caller: CREATOR }, { ...params, proceedsRecipient: BOB });

    expect(factory.dropsOf(CREATOR)).toEqual([a.address, c.address]);
    expect(factory.dropsOf(ALICE.toLowerCase())).toEqual([b.address]);
    expect(factory.dropsOf(BOB)).toEqual([]);
    expect(c.feeInfo().proceedsRecipient).toBe(BOB);
  });

  it('does not consume an address when construction fails', () => {
    const { factory } = setup();
    expect(() =>
      factory.createDrop({ caller: CREATOR }, { ...params, collection: { name: '', symbol: 'X', maxSupply: 1 } }),
    ).toThrow('invalid drop config');

    const drop = factory.createDrop({ caller: CREATOR }, params);
    expect(drop.address).toBe(ethers.getCreateAddress({ from: FACTORY, nonce: 1 }));
  });

  it('restricts platform administration to the admin', () => {
    const { factory } = setup();
    const err = catchError(() =>
      factory.setPlatformDefaults({ caller: CREATOR }, { feeRecipient: CREATOR, mintFeePerUnit: 0n }),
    );
    expect(err).toBeInstanceOf(AuthorizationError);
    expect(err).toMatchObject({ code: 'NotPlatformAdmin' });

    factory.transferPlatformAdmin({ caller: PLATFORM }, ALICE);
    expect(factory.platformAdmin).toBe(ALICE);
    expect(catchError(() => factory.transferPlatformAdmin({ caller: PLATFORM }, BOB))).toMatchObject({
      code: 'NotPlatformAdmin',
    });
  });

  it('announces new drops', () => {
    const { factory } = setup();
    const listener = vi.fn();
    factory.events.on('DropCreated', listener);

    const drop = factory.createDrop({ caller: CREATOR }, params);

    expect(listener).toHaveBeenCalledWith({ drop: drop.address, creator: CREATOR, name: 'Tides' });
  });
});
