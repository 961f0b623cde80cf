// Revenue governance ledger SDK entry point
export { LedgerAPIClient, LedgerAPIError } from './client.js';
export type { LedgerAPIClientOptions } from './client.js';
export type {
  // Amounts
  Amount,
  AmountInput,

  // Views
  AccountSummary,
  LedgerSummary,
  AuctionState,
  StrategyCard,
  RewardAssetCard,
  RewardCard,

  // Writes
  AddStrategyInput,
  Strategy,
  VoteAllocation,
  VoteResult,
  ResetResult,
  RevenueNotice,
  Distribution,
  RewardNotification,
  PotSettlement,
  PurchaseReceipt,
  PurchaseResult,
  RouterReceipt,
  BuyOptions,
  Selection,

  // System
  HealthResponse,
  OkResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
