import { ErrorCode, ledgerError } from '../../errors/taxonomy.js';
import { BribeDustPolicy, LedgerState, StrategyId, StrategyRecord } from '../../types.js';
import { ownValue } from '../../utils/records.js';
import { AssetBook } from '../assets/assetBook.js';
import { LedgerEvent, LedgerEventType } from '../events.js';

export interface LedgerParams {
  /** Length of the window gating one vote or reset per account, in seconds. */
  epochClockPeriod: number;
  /** Streaming duration of every reward notification, in seconds. */
  rewardDuration: number;
  /** Upper bound for the bribe split, in basis points. Always below 10 000. */
  maxBribeSplit: bigint;
  bribeDustPolicy: BribeDustPolicy;
}

/**
 * Everything one ledger operation reads or writes. `state` is the draft of
 * the current transaction; `events` is its outbox, published only after the
 * transaction commits.
 */
export interface LedgerContext {
  state: LedgerState;
  assets: AssetBook;
  now: number;
  params: LedgerParams;
  events: LedgerEvent[];
}

export const createLedgerContext = (state: LedgerState, now: number, params: LedgerParams): LedgerContext => ({
  state,
  assets: new AssetBook(state.assets),
  now,
  params,
  events: [],
});

export const emit = (ctx: LedgerContext, type: LedgerEventType, data: Record<string, unknown>): void => {
  ctx.events.push({ type, data });
};

export const requireStrategy = (ctx: LedgerContext, strategyId: StrategyId): StrategyRecord => {
  const strategy = ownValue(ctx.state.strategies, strategyId);
  if (!strategy || !strategy.isValid) {
    throw ledgerError(ErrorCode.StrategyNotFound, `Strategy ${strategyId} not found.`);
  }
  return strategy;
};

/** Resolves a half-open [start, end) slice of the registration order. */
export const strategyRange = (ctx: LedgerContext, start: number, end: number): StrategyId[] => {
  const order = ctx.state.strategyOrder;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > order.length) {
    throw ledgerError(ErrorCode.InvalidRange, `Range [${start}, ${end}) is outside [0, ${order.length}).`);
  }
  return order.slice(start, end);
};
