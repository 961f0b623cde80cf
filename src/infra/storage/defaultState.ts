import { AssetBook } from '../../domain/assets/assetBook.js';
import { AccountId, AssetId, LedgerState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export interface LedgerSeed {
  owner: AccountId;
  treasury: AccountId;
  revenueSource: AccountId | null;
  revenueAsset: AssetId;
  underlyingAsset: AssetId;
  assets: Array<{ id: AssetId; decimals: number }>;
}

const DEFAULT_DECIMALS = 18;

export const createDefaultState = (seed: LedgerSeed): LedgerState => {
  const state: LedgerState = {
    settings: {
      owner: seed.owner,
      treasury: seed.treasury,
      revenueAsset: seed.revenueAsset,
      revenueSource: seed.revenueSource,
      bribeSplit: 0n,
    },
    totalWeight: 0n,
    globalIndex: 0n,
    strategyOrder: [],
    strategies: {},
    auctions: {},
    rewardStreams: {},
    accounts: {},
    assets: {},
    staking: {
      underlyingAsset: seed.underlyingAsset,
      totalStaked: 0n,
      stakes: {},
    },
    metrics: {
      startedAt: isoNow(),
      revenueNotified: 0n,
      revenueToTreasury: 0n,
      revenueDistributed: 0n,
      auctionsSettled: 0,
      votesCast: 0,
      resets: 0,
    },
  };

  const book = new AssetBook(state.assets);
  for (const asset of seed.assets) {
    if (!book.has(asset.id)) book.register(asset.id, asset.decimals);
  }
  for (const id of [seed.revenueAsset, seed.underlyingAsset]) {
    if (!book.has(id)) book.register(id, DEFAULT_DECIMALS);
  }

  return state;
};
