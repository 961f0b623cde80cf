export type AccountId = string;
export type AssetId = string;
export type StrategyId = string;

export type BribeDustPolicy = 'hold' | 'receiver' | 'treasury';

export interface AssetRecord {
  id: AssetId;
  decimals: number;
  totalSupply: bigint;
  balances: Record<AccountId, bigint>;
  /** owner → spender → remaining allowance */
  allowances: Record<AccountId, Record<AccountId, bigint>>;
}

export interface StrategyRecord {
  id: StrategyId;
  description: string;
  paymentAsset: AssetId;
  paymentReceiver: AccountId;
  isValid: boolean;
  isAlive: boolean;
  weight: bigint;
  supplyIndex: bigint;
  claimable: bigint;
  createdAt: string;
}

export interface AuctionState {
  epochId: number;
  startTime: number;
  initPrice: bigint;
  epochPeriod: number;
  priceMultiplier: bigint;
  minInitPrice: bigint;
}

export interface RewardData {
  rewardRate: bigint;
  periodFinish: number;
  lastUpdateTime: number;
  rewardPerTokenStored: bigint;
}

export interface RewardStreamState {
  rewardAssets: AssetId[];
  rewardData: Record<AssetId, RewardData>;
  totalSupply: bigint;
  balances: Record<AccountId, bigint>;
  /** account → asset → checkpoint */
  rewardPerTokenPaid: Record<AccountId, Record<AssetId, bigint>>;
  /** account → asset → claimable */
  owed: Record<AccountId, Record<AssetId, bigint>>;
}

export interface AccountVotes {
  usedWeight: bigint;
  lastVotedAt: number | null;
  votes: Record<StrategyId, bigint>;
}

export interface LedgerSettings {
  owner: AccountId;
  treasury: AccountId;
  revenueAsset: AssetId;
  revenueSource: AccountId | null;
  bribeSplit: bigint;
}

export interface StakeState {
  underlyingAsset: AssetId;
  totalStaked: bigint;
  stakes: Record<AccountId, bigint>;
}

export interface LedgerMetrics {
  startedAt: string;
  revenueNotified: bigint;
  revenueToTreasury: bigint;
  revenueDistributed: bigint;
  auctionsSettled: number;
  votesCast: number;
  resets: number;
}

export interface LedgerState {
  settings: LedgerSettings;
  totalWeight: bigint;
  globalIndex: bigint;
  strategyOrder: StrategyId[];
  strategies: Record<StrategyId, StrategyRecord>;
  auctions: Record<StrategyId, AuctionState>;
  rewardStreams: Record<StrategyId, RewardStreamState>;
  accounts: Record<AccountId, AccountVotes>;
  assets: Record<AssetId, AssetRecord>;
  staking: StakeState;
  metrics: LedgerMetrics;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  strategies: number;
  wsClients: number;
  logWriteFailures: number;
  processPid: number;
}
