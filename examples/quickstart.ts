#!/usr/bin/env npx tsx
// ─── Revenue Governance Ledger — SDK Quick-Start ───────────────────────────
// Full flow: create strategy → stake and vote → notify revenue → buy the auction
//
// Usage:
//   npx tsx examples/quickstart.ts                         # uses localhost:8787
//   API_URL=https://your-server.com npx tsx examples/quickstart.ts
//
// Expects a fresh server started with the default owner ("owner") and
// LEDGER_REVENUE_SOURCE=revenue-source.
// ────────────────────────────────────────────────────────────────────────────

import { LedgerAPIClient, LedgerAPIError } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';
const HOUR = 3600;

async function main() {
  console.log(`\n🗳️  Revenue Governance Ledger — Quick-Start`);
  console.log(`   API: ${API_URL}\n`);

  const owner = new LedgerAPIClient(API_URL, 'owner');
  const voter = owner.as('alice');
  const source = owner.as('revenue-source');
  const buyer = owner.as('bob');

  const health = await owner.health();
  console.log(`✅ Health: ${health.status} | strategies=${health.strategies}`);

  // ── 1. Create a strategy ──────────────────────────────────────────────
  const strategy = await owner.addStrategy({
    paymentAsset: 'USDC',
    paymentReceiver: 'receiver',
    initPrice: 100_000_000n,
    epochPeriod: HOUR,
    priceMultiplier: 2_000_000_000_000_000_000n,
    minInitPrice: 1_000_000n,
    description: 'quickstart',
  });
  console.log(`\n📝 Strategy ${strategy.id} created`);

  // ── 2. Stake and vote ─────────────────────────────────────────────────
  await owner.mint('VOTE', 'alice', 100n * 10n ** 18n);
  const staked = await voter.stake(100n * 10n ** 18n);
  const vote = await voter.vote([strategy.id], [1n]);
  console.log(`   alice staked ${staked}, used weight ${vote.usedWeight}`);

  // ── 3. Route revenue to the strategy ──────────────────────────────────
  await owner.mint('REV', 'revenue-source', 1000n * 10n ** 18n);
  const { notice, distributions } = await source.notifyAndDistribute(1000n * 10n ** 18n);
  console.log(`\n💰 Revenue routed to ${notice.routedTo}; distributed ${distributions.map((d) => d.amount).join(', ')}`);

  // ── 4. Buy the auction ────────────────────────────────────────────────
  const card = await buyer.strategy(strategy.id);
  console.log(`\n📊 Auction epoch ${card.auction.epochId} at price ${card.price}, holding ${card.revenueBalance}`);

  await owner.mint('USDC', 'bob', 200_000_000n);
  await buyer.approve('USDC', `auction:${strategy.id}`, 200_000_000n);
  const { receipt, pot } = await buyer.buy(strategy.id, {
    expectedEpochId: card.auction.epochId,
    deadline: Math.floor(Date.now() / 1000) + 60,
    maxPayment: card.price,
  });
  console.log(`   Paid ${receipt.price} for ${receipt.assetsSold}; next init price ${receipt.nextInitPrice}`);
  console.log(`   Reward pot: ${pot.outcome}`);

  const summary = await owner.ledger('bob');
  console.log(`\n🏁 bob now holds ${summary.account?.revenueBalance ?? '0'} ${summary.revenueAsset}\n`);
}

main().catch((error: unknown) => {
  if (error instanceof LedgerAPIError) {
    console.error(`❌ ${error.status} ${error.code}: ${error.message}`);
  } else {
    console.error('❌ Unexpected error:', error);
  }
  process.exit(1);
});
