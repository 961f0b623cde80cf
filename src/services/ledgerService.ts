import { AppConfig } from '../config.js';
import { AssetBook } from '../domain/assets/assetBook.js';
import { LedgerEvent } from '../domain/events.js';
import { isSystemAccount } from '../domain/ledger/accounts.js';
import { LedgerContext, LedgerParams, createLedgerContext, emit } from '../domain/ledger/ledgerContext.js';
import {
  AddStrategyInput,
  Distribution,
  PurchaseResult,
  ResetResult,
  RevenueNotice,
  VoteResult,
  VotingLedger,
} from '../domain/ledger/votingLedger.js';
import { PotSettlement } from '../domain/rewards/rewardPot.js';
import { RewardNotification } from '../domain/rewards/rewardStream.js';
import { AtomicRouter, RouterReceipt } from '../domain/router/atomicRouter.js';
import { StakeVault } from '../domain/staking/stakeVault.js';
import { LedgerViews } from '../domain/views/ledgerViews.js';
import { DomainError, ErrorCode, ledgerError } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { AccountId, AssetId, AssetRecord, LedgerMetrics, StrategyId, StrategyRecord } from '../types.js';
import { DIVISOR } from '../utils/fixedPoint.js';
import { isReservedKey } from '../utils/records.js';
import { Clock } from '../utils/time.js';

export interface LedgerComponents {
  ctx: LedgerContext;
  assets: AssetBook;
  vault: StakeVault;
  ledger: VotingLedger;
  router: AtomicRouter;
  views: LedgerViews;
}

export const wireLedger = (ctx: LedgerContext): LedgerComponents => {
  const vault = new StakeVault(ctx);
  const ledger = new VotingLedger(ctx, vault);
  return {
    ctx,
    assets: ctx.assets,
    vault,
    ledger,
    router: new AtomicRouter(ctx, ledger),
    views: new LedgerViews(ctx, ledger, vault),
  };
};

export const ledgerParamsFromConfig = (config: AppConfig): LedgerParams => {
  const maxBribeSplit = BigInt(Math.trunc(config.ledger.maxBribeSplitBps));
  if (maxBribeSplit < 0n || maxBribeSplit >= DIVISOR) {
    throw new Error(`MAX_BRIBE_SPLIT_BPS must be within [0, ${DIVISOR}), got ${config.ledger.maxBribeSplitBps}.`);
  }
  if (!Number.isInteger(config.ledger.epochClockSeconds) || config.ledger.epochClockSeconds <= 0) {
    throw new Error('EPOCH_CLOCK_SECONDS must be a positive integer.');
  }
  if (!Number.isInteger(config.ledger.rewardDurationSeconds) || config.ledger.rewardDurationSeconds <= 0) {
    throw new Error('REWARD_DURATION_SECONDS must be a positive integer.');
  }

  return {
    epochClockPeriod: config.ledger.epochClockSeconds,
    rewardDuration: config.ledger.rewardDurationSeconds,
    maxBribeSplit,
    bribeDustPolicy: config.ledger.bribeDustPolicy,
  };
};

export interface BuyRequest {
  expectedEpochId: number;
  deadline: number;
  maxPayment: bigint;
  recipient?: AccountId;
}

/**
 * Runs every ledger operation as one store transaction and publishes the
 * events of committed operations to the log and the event bus.
 */
export class LedgerService {
  private readonly params: LedgerParams;

  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    config: AppConfig,
    private readonly clock: Clock,
  ) {
    this.params = ledgerParamsFromConfig(config);
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  read<T>(work: (components: LedgerComponents) => T): T {
    const ctx = createLedgerContext(this.store.snapshot(), this.clock.nowSeconds(), this.params);
    return work(wireLedger(ctx));
  }

  views(): LedgerViews {
    return this.read(({ views }) => views);
  }

  metrics(): LedgerMetrics {
    return this.store.snapshot().metrics;
  }

  // ─── Assets ─────────────────────────────────────────────────────────

  async registerAsset(caller: AccountId, id: AssetId, decimals: number): Promise<AssetRecord> {
    return this.mutate('asset.register', caller, ({ ctx, assets }) => {
      this.requireOwner(ctx, caller);
      const record = assets.register(id, decimals);
      emit(ctx, 'asset.registered', { asset: id, decimals });
      return structuredClone(record);
    });
  }

  async mint(caller: AccountId, asset: AssetId, to: AccountId, amount: bigint): Promise<bigint> {
    return this.mutate('asset.mint', caller, ({ ctx, assets }) => {
      this.requireOwner(ctx, caller);
      if (isSystemAccount(to)) {
        throw ledgerError(ErrorCode.InvalidAccount, 'Cannot mint into a system account.', { to });
      }
      assets.mint(asset, to, amount);
      emit(ctx, 'asset.minted', { asset, to, amount: amount.toString() });
      return assets.balanceOf(asset, to);
    });
  }

  async transfer(caller: AccountId, asset: AssetId, to: AccountId, amount: bigint): Promise<bigint> {
    return this.mutate('asset.transfer', caller, ({ ctx, assets }) => {
      assets.transfer(asset, caller, to, amount);
      emit(ctx, 'asset.transferred', { asset, from: caller, to, amount: amount.toString() });
      return assets.balanceOf(asset, caller);
    });
  }

  async approve(caller: AccountId, asset: AssetId, spender: AccountId, amount: bigint): Promise<bigint> {
    return this.mutate('asset.approve', caller, ({ ctx, assets }) => {
      assets.approve(asset, caller, spender, amount);
      emit(ctx, 'asset.approved', { asset, owner: caller, spender, amount: amount.toString() });
      return assets.allowance(asset, caller, spender);
    });
  }

  // ─── Staking ────────────────────────────────────────────────────────

  async stake(caller: AccountId, amount: bigint): Promise<bigint> {
    return this.mutate('stake.deposit', caller, ({ vault }) => vault.stake(caller, amount));
  }

  async unstake(caller: AccountId, amount: bigint): Promise<bigint> {
    return this.mutate('stake.withdraw', caller, ({ vault }) => vault.unstake(caller, amount));
  }

  // ─── Administration ─────────────────────────────────────────────────

  async setRevenueSource(caller: AccountId, source: AccountId): Promise<void> {
    return this.mutate('settings.revenue_source', caller, ({ ledger }) => ledger.setRevenueSource(caller, source));
  }

  async setBribeSplit(caller: AccountId, bribeSplit: bigint): Promise<void> {
    return this.mutate('settings.bribe_split', caller, ({ ledger }) => ledger.setBribeSplit(caller, bribeSplit));
  }

  async addStrategy(caller: AccountId, input: AddStrategyInput): Promise<StrategyRecord> {
    return this.mutate('strategy.add', caller, ({ ledger }) => structuredClone(ledger.addStrategy(caller, input)));
  }

  async killStrategy(caller: AccountId, strategyId: StrategyId): Promise<bigint> {
    return this.mutate('strategy.kill', caller, ({ ledger }) => ledger.killStrategy(caller, strategyId));
  }

  async addRewardAsset(caller: AccountId, strategyId: StrategyId, asset: AssetId): Promise<void> {
    return this.mutate('reward.add_asset', caller, ({ ledger }) => ledger.addRewardAsset(caller, strategyId, asset));
  }

  // ─── Voting and rewards ─────────────────────────────────────────────

  async vote(caller: AccountId, strategyIds: StrategyId[], weights: bigint[]): Promise<VoteResult> {
    return this.mutate('vote.cast', caller, ({ ledger }) => ledger.vote(caller, strategyIds, weights));
  }

  async reset(caller: AccountId): Promise<ResetResult> {
    return this.mutate('vote.reset', caller, ({ ledger }) => ledger.reset(caller));
  }

  async claimRewards(caller: AccountId, strategyIds: StrategyId[]): Promise<Record<StrategyId, Record<AssetId, bigint>>> {
    return this.mutate('rewards.claim', caller, ({ ledger }) => ledger.claimRewards(caller, strategyIds));
  }

  async notifyRewardAmount(caller: AccountId, strategyId: StrategyId, asset: AssetId, amount: bigint): Promise<RewardNotification> {
    return this.mutate('rewards.notify', caller, ({ ledger }) => ledger.notifyRewardAmount(caller, strategyId, asset, amount));
  }

  async distributeRewardPot(caller: AccountId, strategyId: StrategyId): Promise<PotSettlement> {
    return this.mutate('rewards.distribute_pot', caller, ({ ledger }) => ledger.distributeRewardPot(strategyId));
  }

  // ─── Revenue and distribution ───────────────────────────────────────

  async notifyRevenue(caller: AccountId, amount: bigint): Promise<RevenueNotice> {
    return this.mutate('revenue.notify', caller, ({ ledger }) => ledger.notifyRevenue(caller, amount));
  }

  async notifyAndDistribute(caller: AccountId, amount: bigint): Promise<{ notice: RevenueNotice; distributions: Distribution[] }> {
    return this.mutate('revenue.notify_and_distribute', caller, ({ ledger }) => ledger.notifyAndDistribute(caller, amount));
  }

  async updateStrategy(caller: AccountId, strategyId: StrategyId): Promise<bigint> {
    return this.mutate('strategy.update', caller, ({ ledger }) => ledger.updateStrategy(strategyId));
  }

  async updateFor(caller: AccountId, strategyIds: StrategyId[]): Promise<void> {
    return this.mutate('strategy.update_for', caller, ({ ledger }) => ledger.updateFor(strategyIds));
  }

  async updateAll(caller: AccountId): Promise<void> {
    return this.mutate('strategy.update_all', caller, ({ ledger }) => ledger.updateAll());
  }

  async updateForRange(caller: AccountId, start: number, end: number): Promise<void> {
    return this.mutate('strategy.update_range', caller, ({ ledger }) => ledger.updateForRange(start, end));
  }

  async distribute(caller: AccountId, strategyId: StrategyId): Promise<Distribution> {
    return this.mutate('strategy.distribute', caller, ({ ledger }) => ledger.distribute(strategyId));
  }

  async distributeMany(caller: AccountId, strategyIds: StrategyId[]): Promise<Distribution[]> {
    return this.mutate('strategy.distribute_many', caller, ({ ledger }) => ledger.distributeMany(strategyIds));
  }

  async distributeAll(caller: AccountId): Promise<Distribution[]> {
    return this.mutate('strategy.distribute_all', caller, ({ ledger }) => ledger.distributeAll());
  }

  async distributeRange(caller: AccountId, start: number, end: number): Promise<Distribution[]> {
    return this.mutate('strategy.distribute_range', caller, ({ ledger }) => ledger.distributeRange(start, end));
  }

  // ─── Auctions ───────────────────────────────────────────────────────

  async buy(caller: AccountId, strategyId: StrategyId, request: BuyRequest): Promise<PurchaseResult> {
    return this.mutate('auction.buy', caller, ({ ledger }) => ledger.buy(strategyId, {
      payer: caller,
      recipient: request.recipient ?? caller,
      expectedEpochId: request.expectedEpochId,
      deadline: request.deadline,
      maxPayment: request.maxPayment,
    }));
  }

  async distributeAndBuy(caller: AccountId, strategyId: StrategyId, request: BuyRequest): Promise<RouterReceipt> {
    return this.mutate('router.distribute_and_buy', caller, ({ router }) => router.distributeAndBuy({
      caller,
      strategyId,
      expectedEpochId: request.expectedEpochId,
      deadline: request.deadline,
      maxPayment: request.maxPayment,
    }));
  }

  async distributeAllAndBuy(caller: AccountId, strategyId: StrategyId, request: BuyRequest): Promise<RouterReceipt> {
    return this.mutate('router.distribute_all_and_buy', caller, ({ router }) => router.distributeAllAndBuy({
      caller,
      strategyId,
      expectedEpochId: request.expectedEpochId,
      deadline: request.deadline,
      maxPayment: request.maxPayment,
    }));
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private async mutate<T>(operation: string, caller: AccountId, work: (components: LedgerComponents) => T): Promise<T> {
    if (caller.trim().length === 0 || isSystemAccount(caller) || isReservedKey(caller)) {
      throw ledgerError(ErrorCode.InvalidAccount, 'Caller must be a non-empty, non-system, non-reserved account.', { caller });
    }

    let events: LedgerEvent[] = [];
    let result: T;
    try {
      result = await this.store.transaction((draft) => {
        const ctx = createLedgerContext(draft, this.clock.nowSeconds(), this.params);
        const value = work(wireLedger(ctx));
        events = ctx.events;
        return value;
      });
    } catch (error) {
      // A failed append is counted by the logger; the ledger error is what the caller gets.
      await this.logFailure(operation, caller, error).catch(() => undefined);
      throw error;
    }

    for (const event of events) {
      eventBus.emit(event.type, event.data);
      await this.logger.log('info', event.type, { operation, caller, ...event.data });
    }
    return result;
  }

  private logFailure(operation: string, caller: AccountId, error: unknown): Promise<void> {
    if (error instanceof DomainError) {
      return this.logger.log('warn', 'ledger.rejected', {
        operation,
        caller,
        code: error.code,
        category: error.category,
        message: error.message,
      });
    }
    return this.logger.log('error', 'ledger.failed', {
      operation,
      caller,
      message: error instanceof Error ? error.message : String(error),
    });
  }

  private requireOwner(ctx: LedgerContext, caller: AccountId): void {
    if (caller !== ctx.state.settings.owner) {
      throw ledgerError(ErrorCode.Unauthorized, 'Only the ledger owner may do this.');
    }
  }
}
