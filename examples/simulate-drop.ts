#!/usr/bin/env npx tsx
// ============================================================================
// PhaseMint Drop Simulation
// ============================================================================
//
// Runs one collection through a presale and a public sale on in-process
// ledgers and prints the resulting splits.
//
// Usage:
//   npx tsx examples/simulate-drop.ts [drop-config.json]
//
// Without a config file, a 100-unit drop priced at 100 with a mint fee of
// 10 is used. Set LOG_LEVEL=debug to see every mint stage.
//
// ============================================================================

import { ethers } from 'ethers';
import {
  AllowListTree,
  DropEngine,
  InMemoryFundsLedger,
  ManualClock,
  MintEngineError,
  createLogger,
  loadDropConfig,
} from '../src/index.js';
import type { DropConfigInput } from '../src/index.js';

const log = createLogger('simulate-drop');

function wallet(label: string): string {
  return ethers.getAddress(ethers.dataSlice(ethers.id(label), 12));
}

const creator = wallet('creator');
const platform = wallet('platform');
const buyers = ['buyer-1', 'buyer-2', 'buyer-3'].map(wallet);

async function readConfig(): Promise<DropConfigInput> {
  const file = process.argv[2];
  if (file) {
    return loadDropConfig(file);
  }
  return {
    address: wallet('drop'),
    owner: creator,
    collection: { name: 'Simulated', symbol: 'SIM', maxSupply: 100 },
    publicMint: { startOffset: 3_600, endOffset: 86_400, price: 100n, maxPerAddress: 2 },
    fees: { mintFeePerUnit: 10n, feeRecipient: platform, proceedsRecipient: creator },
  };
}

async function main(): Promise<void> {
  const config = await readConfig();
  const clock = new ManualClock(Math.floor(Date.now() / 1000));
  const funds = new InMemoryFundsLedger();
  const engine = new DropEngine(config, { clock, funds, logger: log });
  const owner = { caller: engine.owner() };

  engine.events.on('Purchase', (purchase) => {
    log.info({ ...purchase, cost: purchase.cost.toString() }, 'Purchase');
  });

  for (const buyer of buyers) funds.credit(buyer, 10_000n);

  // --- Presale for the first two buyers ---
  const tree = AllowListTree.fromAddresses(buyers.slice(0, 2));
  const presaleId = engine.addPhase(owner, {
    name: 'Early access',
    startOffset: 60,
    endOffset: 3_600,
    price: 50n,
    maxPerAddress: 1,
    allowListRoot: tree.root,
  });
  clock.advance(60);

  const { mintFeePerUnit } = engine.feeInfo();
  for (const buyer of buyers) {
    try {
      const proof = tree.has(buyer) ? tree.getProof(buyer) : [];
      engine.whitelistMint({ caller: buyer, value: 50n + mintFeePerUnit }, proof, 1, presaleId);
    } catch (err) {
      if (!(err instanceof MintEngineError)) throw err;
      log.warn({ buyer, code: err.code }, 'Presale mint rejected');
    }
  }

  // --- Public sale ---
  clock.advance(3_600);
  const { price, maxPerAddress } = engine.publicMintInfo();
  for (const buyer of buyers) {
    // Presale units count towards the public cap.
    const amount = maxPerAddress - engine.balanceOf(buyer);
    if (amount <= 0) continue;
    engine.mintPublic({ caller: buyer, value: (price + mintFeePerUnit) * BigInt(amount) }, amount, buyer);
  }

  const { feeRecipient, proceedsRecipient } = engine.feeInfo();
  log.info(
    {
      supply: engine.supplyInfo(),
      platform: funds.balanceOf(feeRecipient).toString(),
      creator: funds.balanceOf(proceedsRecipient).toString(),
      held: engine.heldBalance().toString(),
    },
    'Simulation complete',
  );
}

main().catch((err) => {
  log.fatal({ err }, 'Simulation failed');
  process.exit(1);
});
