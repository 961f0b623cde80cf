import { AccountId, StrategyId } from '../../types.js';

/** Holds notified revenue until strategies pull their share. */
export const LEDGER_CUSTODY: AccountId = 'ledger:custody';

/** Temporary home of a router caller's maxPayment while a composed purchase runs. */
export const ROUTER_ESCROW: AccountId = 'router:escrow';

export const STAKE_VAULT: AccountId = 'stake:vault';

export const auctionAccount = (strategyId: StrategyId): AccountId => `auction:${strategyId}`;
export const rewardsAccount = (strategyId: StrategyId): AccountId => `rewards:${strategyId}`;
export const rewardPotAccount = (strategyId: StrategyId): AccountId => `reward-pot:${strategyId}`;

const SYSTEM_PREFIXES = ['ledger:', 'router:', 'stake:', 'auction:', 'rewards:', 'reward-pot:'];

export const isSystemAccount = (account: AccountId): boolean => (
  SYSTEM_PREFIXES.some((prefix) => account.startsWith(prefix))
);
