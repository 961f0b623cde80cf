// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the revenue governance ledger HTTP API.
// Amounts travel as base-unit decimal strings; times are Unix seconds.
// ────────────────────────────────────────────────────────────────────────────

export type Amount = string;
/** Accepted wherever the client sends an amount. */
export type AmountInput = bigint | string;

// ─── Views ─────────────────────────────────────────────────────────────────

export interface AccountSummary {
  account: string;
  votingPower: Amount;
  usedWeight: Amount;
  lastVotedAt: number | null;
  revenueBalance: Amount;
  underlyingBalance: Amount;
}

export interface LedgerSummary {
  now: number;
  owner: string;
  treasury: string;
  revenueSource: string | null;
  revenueAsset: string;
  revenueDecimals: number;
  underlyingAsset: string;
  bribeSplit: Amount;
  totalWeight: Amount;
  globalIndex: Amount;
  strategyCount: number;
  totalStaked: Amount;
  custodyBalance: Amount;
  account?: AccountSummary;
}

export interface AuctionState {
  epochId: number;
  startTime: number;
  initPrice: Amount;
  epochPeriod: number;
  priceMultiplier: Amount;
  minInitPrice: Amount;
}

export interface StrategyCard {
  strategyId: string;
  index: number;
  description: string;
  paymentAsset: string;
  paymentDecimals: number;
  paymentReceiver: string;
  isAlive: boolean;
  weight: Amount;
  votePercent: Amount;
  claimable: Amount;
  pendingClaimable: Amount;
  revenueBalance: Amount;
  auction: AuctionState;
  auctionStatus: 'active' | 'expired';
  price: Amount;
  accountVote?: Amount;
  accountPaymentBalance?: Amount;
}

export interface RewardAssetCard {
  asset: string;
  decimals: number;
  rewardPerToken: Amount;
  left: Amount;
  rewardRate: Amount;
  periodFinish: number;
  accountEarned?: Amount;
}

export interface RewardCard {
  strategyId: string;
  index: number;
  totalSupply: Amount;
  potBalance: Amount;
  rewards: RewardAssetCard[];
  accountBalance?: Amount;
}

// ─── Writes ────────────────────────────────────────────────────────────────

export interface AddStrategyInput {
  paymentAsset: string;
  paymentReceiver: string;
  initPrice: AmountInput;
  epochPeriod: number;
  priceMultiplier: AmountInput;
  minInitPrice: AmountInput;
  description?: string;
}

export interface Strategy {
  id: string;
  description: string;
  paymentAsset: string;
  paymentReceiver: string;
  isValid: boolean;
  isAlive: boolean;
  weight: Amount;
  supplyIndex: Amount;
  claimable: Amount;
  createdAt: string;
}

export interface VoteAllocation {
  strategyId: string;
  weight: Amount;
}

export interface VoteResult {
  account: string;
  usedWeight: Amount;
  allocations: VoteAllocation[];
  skipped: string[];
}

export interface ResetResult {
  account: string;
  released: VoteAllocation[];
}

export interface RevenueNotice {
  amount: Amount;
  routedTo: 'index' | 'treasury';
  globalIndex: Amount;
  totalWeight: Amount;
}

export interface Distribution {
  strategyId: string;
  amount: Amount;
}

export interface RewardNotification {
  asset: string;
  amount: Amount;
  rolledOver: Amount;
  rewardRate: Amount;
  periodFinish: number;
}

export interface PotSettlement {
  strategyId: string;
  asset: string;
  amount: Amount;
  outcome: 'empty' | 'notified' | 'held' | 'forwarded';
  policy: 'hold' | 'receiver' | 'treasury';
  forwardedTo?: string;
  notification?: RewardNotification;
}

export interface PurchaseReceipt {
  strategyId: string;
  epochId: number;
  payer: string;
  recipient: string;
  paymentAsset: string;
  price: Amount;
  receiverShare: Amount;
  bribeShare: Amount;
  revenueAsset: string;
  assetsSold: Amount;
  nextEpochId: number;
  nextInitPrice: Amount;
  paidAt: number;
}

export interface PurchaseResult {
  receipt: PurchaseReceipt;
  pot: PotSettlement;
}

export interface RouterReceipt extends PurchaseResult {
  distributions: Distribution[];
  spent: Amount;
  refunded: Amount;
}

export interface BuyOptions {
  expectedEpochId: number;
  deadline: number;
  maxPayment: AmountInput;
  recipient?: string;
}

export interface Selection {
  strategies?: string[];
  range?: { start: number; end: number };
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: string;
  uptimeSeconds: number;
  strategies: number;
  wsClients: number;
  logWriteFailures: number;
  processPid: number;
}

export interface OkResponse {
  ok: true;
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    category?: string;
    message: string;
    details?: unknown;
  };
}
