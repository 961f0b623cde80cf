import { z } from 'zod';

const bigintRecord = z.record(z.string(), z.bigint());

const assetSchema = z.object({
  id: z.string(),
  decimals: z.number().int().min(0),
  totalSupply: z.bigint(),
  balances: bigintRecord,
  allowances: z.record(z.string(), bigintRecord),
});

const strategySchema = z.object({
  id: z.string(),
  description: z.string(),
  paymentAsset: z.string(),
  paymentReceiver: z.string(),
  isValid: z.boolean(),
  isAlive: z.boolean(),
  weight: z.bigint(),
  supplyIndex: z.bigint(),
  claimable: z.bigint(),
  createdAt: z.string(),
});

const auctionSchema = z.object({
  epochId: z.number().int().min(0),
  startTime: z.number().int(),
  initPrice: z.bigint(),
  epochPeriod: z.number().int().positive(),
  priceMultiplier: z.bigint(),
  minInitPrice: z.bigint(),
});

const rewardStreamSchema = z.object({
  rewardAssets: z.array(z.string()),
  rewardData: z.record(z.string(), z.object({
    rewardRate: z.bigint(),
    periodFinish: z.number().int(),
    lastUpdateTime: z.number().int(),
    rewardPerTokenStored: z.bigint(),
  })),
  totalSupply: z.bigint(),
  balances: bigintRecord,
  rewardPerTokenPaid: z.record(z.string(), bigintRecord),
  owed: z.record(z.string(), bigintRecord),
});

export const ledgerStateSchema = z.object({
  settings: z.object({
    owner: z.string().min(1),
    treasury: z.string().min(1),
    revenueAsset: z.string().min(1),
    revenueSource: z.string().min(1).nullable(),
    bribeSplit: z.bigint(),
  }),
  totalWeight: z.bigint(),
  globalIndex: z.bigint(),
  strategyOrder: z.array(z.string()),
  strategies: z.record(z.string(), strategySchema),
  auctions: z.record(z.string(), auctionSchema),
  rewardStreams: z.record(z.string(), rewardStreamSchema),
  accounts: z.record(z.string(), z.object({
    usedWeight: z.bigint(),
    lastVotedAt: z.number().int().nullable(),
    votes: bigintRecord,
  })),
  assets: z.record(z.string(), assetSchema),
  staking: z.object({
    underlyingAsset: z.string().min(1),
    totalStaked: z.bigint(),
    stakes: bigintRecord,
  }),
  metrics: z.object({
    startedAt: z.string(),
    revenueNotified: z.bigint(),
    revenueToTreasury: z.bigint(),
    revenueDistributed: z.bigint(),
    auctionsSettled: z.number().int().min(0),
    votesCast: z.number().int().min(0),
    resets: z.number().int().min(0),
  }),
});
