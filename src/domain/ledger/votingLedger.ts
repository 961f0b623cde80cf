/**
 * Voting ledger: strategy registry, epoch-gated weight voting and the
 * proportional revenue distributor.
 *
 * Revenue never fans out to strategies eagerly. Each notification bumps a
 * single `globalIndex` by `amount * SCALE / totalWeight`; a strategy catches
 * up lazily whenever it is touched by crediting `weight * (globalIndex -
 * supplyIndex) / SCALE` to its `claimable`. Distribution order across
 * strategies therefore never changes what each one receives.
 *
 * Killing a strategy keeps its weight. Only the voters' own resets remove
 * it, so a reset never subtracts weight that is no longer there. Until they
 * do, the dead strategy's share of new revenue stays in custody.
 */

import { v4 as uuid } from 'uuid';
import { ErrorCode, ledgerError } from '../../errors/taxonomy.js';
import { AccountId, AccountVotes, AssetId, StrategyId, StrategyRecord } from '../../types.js';
import { SCALE, sumBig } from '../../utils/fixedPoint.js';
import { isReservedKey, ownValue } from '../../utils/records.js';
import { isoNow } from '../../utils/time.js';
import { AuctionMarket, AuctionParams, BuyInput, PurchaseReceipt, createAuctionState, validateAuctionParams } from '../auction/auctionMarket.js';
import { PotSettlement, settleRewardPot } from '../rewards/rewardPot.js';
import { RewardNotification, RewardStream, createRewardStreamState } from '../rewards/rewardStream.js';
import { LEDGER_CUSTODY, auctionAccount } from './accounts.js';
import { LedgerContext, emit, requireStrategy, strategyRange } from './ledgerContext.js';

export interface AddStrategyInput extends AuctionParams {
  paymentAsset: AssetId;
  paymentReceiver: AccountId;
  description?: string;
}

export interface VoteAllocation {
  strategyId: StrategyId;
  weight: bigint;
}

export interface VoteResult {
  account: AccountId;
  usedWeight: bigint;
  allocations: VoteAllocation[];
  skipped: StrategyId[];
}

export interface ResetResult {
  account: AccountId;
  released: VoteAllocation[];
}

export interface RevenueNotice {
  amount: bigint;
  routedTo: 'index' | 'treasury';
  globalIndex: bigint;
  totalWeight: bigint;
}

export interface Distribution {
  strategyId: StrategyId;
  amount: bigint;
}

export interface PurchaseResult {
  receipt: PurchaseReceipt;
  pot: PotSettlement;
}

/** Source of an account's currently available voting weight. */
export interface VotingPowerSource {
  balanceOf(account: AccountId): bigint;
}

export class VotingLedger {
  constructor(
    private readonly ctx: LedgerContext,
    private readonly votingPower: VotingPowerSource,
  ) {}

  // ─── Components ─────────────────────────────────────────────────────

  auctionFor(strategyId: StrategyId): AuctionMarket {
    const strategy = requireStrategy(this.ctx, strategyId);
    const auction = ownValue(this.ctx.state.auctions, strategyId);
    if (!auction) {
      throw ledgerError(ErrorCode.StrategyNotFound, `Auction for strategy ${strategyId} not found.`);
    }
    return new AuctionMarket(strategy, auction, this.ctx.assets, this.ctx.state.settings.revenueAsset, this.ctx.now);
  }

  rewardStreamFor(strategyId: StrategyId): RewardStream {
    requireStrategy(this.ctx, strategyId);
    const stream = ownValue(this.ctx.state.rewardStreams, strategyId);
    if (!stream) {
      throw ledgerError(ErrorCode.StrategyNotFound, `Reward stream for strategy ${strategyId} not found.`);
    }
    return new RewardStream(strategyId, stream, this.ctx.assets, this.ctx.now, this.ctx.params.rewardDuration);
  }

  // ─── Administration ─────────────────────────────────────────────────

  setRevenueSource(caller: AccountId, source: AccountId): void {
    this.requireOwner(caller);
    if (source.trim().length === 0 || isReservedKey(source)) {
      throw ledgerError(ErrorCode.InvalidAccount, 'Revenue source must be a non-empty, non-reserved account.');
    }
    this.ctx.state.settings.revenueSource = source;
    emit(this.ctx, 'settings.revenue_source', { revenueSource: source });
  }

  setBribeSplit(caller: AccountId, bribeSplit: bigint): void {
    this.requireOwner(caller);
    if (bribeSplit < 0n || bribeSplit > this.ctx.params.maxBribeSplit) {
      throw ledgerError(ErrorCode.InvalidBribeSplit, `Bribe split must be within [0, ${this.ctx.params.maxBribeSplit}] bps.`, {
        bribeSplit: bribeSplit.toString(),
      });
    }
    this.ctx.state.settings.bribeSplit = bribeSplit;
    emit(this.ctx, 'settings.bribe_split', { bribeSplit: bribeSplit.toString() });
  }

  addStrategy(caller: AccountId, input: AddStrategyInput): StrategyRecord {
    this.requireOwner(caller);
    if (input.paymentReceiver.trim().length === 0 || isReservedKey(input.paymentReceiver)) {
      throw ledgerError(ErrorCode.InvalidAccount, 'Payment receiver must be a non-empty, non-reserved account.');
    }
    this.ctx.assets.decimals(input.paymentAsset);
    validateAuctionParams(input);

    const strategy: StrategyRecord = {
      id: uuid(),
      description: input.description ?? '',
      paymentAsset: input.paymentAsset,
      paymentReceiver: input.paymentReceiver,
      isValid: true,
      isAlive: true,
      weight: 0n,
      supplyIndex: this.ctx.state.globalIndex,
      claimable: 0n,
      createdAt: isoNow(),
    };

    this.ctx.state.strategies[strategy.id] = strategy;
    this.ctx.state.strategyOrder.push(strategy.id);
    this.ctx.state.auctions[strategy.id] = createAuctionState(input, this.ctx.now);
    this.ctx.state.rewardStreams[strategy.id] = createRewardStreamState();
    this.rewardStreamFor(strategy.id).addRewardAsset(input.paymentAsset);

    emit(this.ctx, 'strategy.added', {
      strategyId: strategy.id,
      paymentAsset: strategy.paymentAsset,
      paymentReceiver: strategy.paymentReceiver,
      initPrice: input.initPrice.toString(),
      epochPeriod: input.epochPeriod,
    });
    return strategy;
  }

  killStrategy(caller: AccountId, strategyId: StrategyId): bigint {
    this.requireOwner(caller);
    const strategy = requireStrategy(this.ctx, strategyId);
    if (!strategy.isAlive) {
      throw ledgerError(ErrorCode.AlreadyDead, `Strategy ${strategyId} is already dead.`);
    }

    this.updateStrategy(strategyId);
    const swept = strategy.claimable;
    if (swept > 0n) {
      this.ctx.assets.transfer(this.ctx.state.settings.revenueAsset, LEDGER_CUSTODY, this.ctx.state.settings.treasury, swept);
    }
    strategy.claimable = 0n;
    strategy.isAlive = false;

    emit(this.ctx, 'strategy.killed', { strategyId, sweptToTreasury: swept.toString() });
    return swept;
  }

  addRewardAsset(caller: AccountId, strategyId: StrategyId, asset: AssetId): void {
    this.requireOwner(caller);
    this.rewardStreamFor(strategyId).addRewardAsset(asset);
    emit(this.ctx, 'reward.asset_added', { strategyId, asset });
  }

  /** Streams `amount` of a registered reward asset from `funder` to the strategy's voters. */
  notifyRewardAmount(funder: AccountId, strategyId: StrategyId, asset: AssetId, amount: bigint): RewardNotification {
    const notification = this.rewardStreamFor(strategyId).notifyRewardAmount(funder, asset, amount);
    emit(this.ctx, 'rewards.notified', {
      strategyId,
      funder,
      asset,
      amount: amount.toString(),
      rolledOver: notification.rolledOver.toString(),
      rewardRate: notification.rewardRate.toString(),
      periodFinish: notification.periodFinish,
    });
    return notification;
  }

  // ─── Voting ─────────────────────────────────────────────────────────

  vote(account: AccountId, strategyIds: StrategyId[], weights: bigint[]): VoteResult {
    if (strategyIds.length !== weights.length) {
      throw ledgerError(ErrorCode.ArrayLengthMismatch, 'strategies and weights must have the same length.', {
        strategies: strategyIds.length,
        weights: weights.length,
      });
    }
    if (new Set(strategyIds).size !== strategyIds.length) {
      throw ledgerError(ErrorCode.DuplicateTarget, 'Each strategy may appear only once per vote.');
    }
    if (weights.some((w) => w < 0n)) {
      throw ledgerError(ErrorCode.InvalidAmount, 'Vote weights must not be negative.');
    }
    this.requireNewEpoch(account, ErrorCode.AlreadyVotedThisEpoch);

    const available = this.votingPower.balanceOf(account);
    if (available === 0n) {
      throw ledgerError(ErrorCode.NoWeight, 'Account has no voting weight.', { account });
    }

    this.releaseVotes(account);

    // Leniency policy: targets that are unknown or dead are dropped from the
    // ballot instead of failing it. A ballot left empty still releases the
    // previous allocation and consumes the epoch.
    const targets: Array<{ strategyId: StrategyId; relative: bigint }> = [];
    const skipped: StrategyId[] = [];
    strategyIds.forEach((strategyId, i) => {
      const strategy = ownValue(this.ctx.state.strategies, strategyId);
      const relative = weights[i] ?? 0n;
      if (strategy?.isValid && strategy.isAlive) {
        targets.push({ strategyId, relative });
      } else {
        skipped.push(strategyId);
      }
    });

    const relativeTotal = sumBig(targets.map((t) => t.relative));
    if (targets.length > 0 && relativeTotal === 0n) {
      throw ledgerError(ErrorCode.ZeroWeightAfterNormalization, 'No alive strategy receives weight.', { skipped });
    }

    const allocations: VoteAllocation[] = [];
    let assigned = 0n;
    targets.forEach((target, i) => {
      const weight = i === targets.length - 1
        ? available - assigned
        : (available * target.relative) / relativeTotal;
      if (weight === 0n) {
        throw ledgerError(ErrorCode.ZeroWeightAfterNormalization, 'A strategy would receive zero weight.', {
          strategyId: target.strategyId,
        });
      }
      assigned += weight;
      allocations.push({ strategyId: target.strategyId, weight });
    });

    const record = this.accountVotes(account);
    for (const { strategyId, weight } of allocations) {
      this.updateStrategy(strategyId);
      const strategy = requireStrategy(this.ctx, strategyId);
      strategy.weight += weight;
      this.ctx.state.totalWeight += weight;
      record.votes[strategyId] = weight;
      this.rewardStreamFor(strategyId).deposit(account, weight);
    }
    record.usedWeight = assigned;
    record.lastVotedAt = this.ctx.now;
    this.ctx.state.metrics.votesCast += 1;

    emit(this.ctx, 'vote.cast', {
      account,
      usedWeight: assigned.toString(),
      allocations: allocations.map((a) => ({ strategyId: a.strategyId, weight: a.weight.toString() })),
      skipped,
    });
    return { account, usedWeight: assigned, allocations, skipped };
  }

  reset(account: AccountId): ResetResult {
    this.requireNewEpoch(account, ErrorCode.AlreadyResetThisEpoch);
    const released = this.releaseVotes(account);
    this.accountVotes(account).lastVotedAt = this.ctx.now;
    this.ctx.state.metrics.resets += 1;

    emit(this.ctx, 'vote.reset', {
      account,
      released: released.map((r) => ({ strategyId: r.strategyId, weight: r.weight.toString() })),
    });
    return { account, released };
  }

  claimRewards(account: AccountId, strategyIds: StrategyId[]): Record<StrategyId, Record<AssetId, bigint>> {
    const claimed: Record<StrategyId, Record<AssetId, bigint>> = {};
    for (const strategyId of strategyIds) {
      const paid = this.rewardStreamFor(strategyId).getReward(account);
      claimed[strategyId] = paid;
      if (Object.keys(paid).length > 0) {
        emit(this.ctx, 'rewards.claimed', {
          account,
          strategyId,
          paid: Object.fromEntries(Object.entries(paid).map(([asset, amount]) => [asset, amount.toString()])),
        });
      }
    }
    return claimed;
  }

  // ─── Revenue ────────────────────────────────────────────────────────

  notifyRevenue(caller: AccountId, amount: bigint): RevenueNotice {
    const { settings } = this.ctx.state;
    if (settings.revenueSource === null || caller !== settings.revenueSource) {
      throw ledgerError(ErrorCode.Unauthorized, 'Only the revenue source may notify revenue.');
    }
    if (amount <= 0n) {
      throw ledgerError(ErrorCode.InvalidAmount, 'Revenue amount must be positive.');
    }

    this.ctx.assets.transfer(settings.revenueAsset, caller, LEDGER_CUSTODY, amount);
    this.ctx.state.metrics.revenueNotified += amount;

    const { totalWeight } = this.ctx.state;
    if (totalWeight === 0n) {
      this.ctx.assets.transfer(settings.revenueAsset, LEDGER_CUSTODY, settings.treasury, amount);
      this.ctx.state.metrics.revenueToTreasury += amount;
      emit(this.ctx, 'revenue.to_treasury', { amount: amount.toString(), treasury: settings.treasury });
      return { amount, routedTo: 'treasury', globalIndex: this.ctx.state.globalIndex, totalWeight };
    }

    this.ctx.state.globalIndex += (amount * SCALE) / totalWeight;
    emit(this.ctx, 'revenue.notified', {
      amount: amount.toString(),
      globalIndex: this.ctx.state.globalIndex.toString(),
      totalWeight: totalWeight.toString(),
    });
    return { amount, routedTo: 'index', globalIndex: this.ctx.state.globalIndex, totalWeight };
  }

  /** Catches a strategy up to the global index. */
  updateStrategy(strategyId: StrategyId): bigint {
    const strategy = requireStrategy(this.ctx, strategyId);
    const delta = this.ctx.state.globalIndex - strategy.supplyIndex;
    let accrued = 0n;
    if (delta > 0n && strategy.isAlive) {
      accrued = (strategy.weight * delta) / SCALE;
      strategy.claimable += accrued;
    }
    strategy.supplyIndex = this.ctx.state.globalIndex;
    return accrued;
  }

  updateFor(strategyIds: StrategyId[]): void {
    for (const strategyId of strategyIds) this.updateStrategy(strategyId);
  }

  updateAll(): void {
    this.updateFor([...this.ctx.state.strategyOrder]);
  }

  updateForRange(start: number, end: number): void {
    this.updateFor(strategyRange(this.ctx, start, end));
  }

  distribute(strategyId: StrategyId): Distribution {
    this.updateStrategy(strategyId);
    const strategy = requireStrategy(this.ctx, strategyId);
    const amount = strategy.claimable;
    if (amount > 0n) {
      strategy.claimable = 0n;
      this.ctx.assets.transfer(this.ctx.state.settings.revenueAsset, LEDGER_CUSTODY, auctionAccount(strategyId), amount);
      this.ctx.state.metrics.revenueDistributed += amount;
      emit(this.ctx, 'strategy.distributed', { strategyId, amount: amount.toString() });
    }
    return { strategyId, amount };
  }

  distributeMany(strategyIds: StrategyId[]): Distribution[] {
    return strategyIds.map((strategyId) => this.distribute(strategyId));
  }

  distributeAll(): Distribution[] {
    return this.distributeMany([...this.ctx.state.strategyOrder]);
  }

  distributeRange(start: number, end: number): Distribution[] {
    return this.distributeMany(strategyRange(this.ctx, start, end));
  }

  notifyAndDistribute(caller: AccountId, amount: bigint): { notice: RevenueNotice; distributions: Distribution[] } {
    const notice = this.notifyRevenue(caller, amount);
    return { notice, distributions: this.distributeAll() };
  }

  // ─── Auctions ───────────────────────────────────────────────────────

  /** Buys from a strategy's auction and settles its reward pot. */
  buy(strategyId: StrategyId, input: BuyInput): PurchaseResult {
    const receipt = this.auctionFor(strategyId).buy(input, this.ctx.state.settings.bribeSplit);
    this.ctx.state.metrics.auctionsSettled += 1;
    emit(this.ctx, 'auction.purchased', {
      strategyId,
      epochId: receipt.epochId,
      payer: receipt.payer,
      recipient: receipt.recipient,
      price: receipt.price.toString(),
      receiverShare: receipt.receiverShare.toString(),
      bribeShare: receipt.bribeShare.toString(),
      assetsSold: receipt.assetsSold.toString(),
      nextInitPrice: receipt.nextInitPrice.toString(),
    });

    const pot = this.distributeRewardPot(strategyId);
    return { receipt, pot };
  }

  distributeRewardPot(strategyId: StrategyId): PotSettlement {
    const strategy = requireStrategy(this.ctx, strategyId);
    return settleRewardPot(this.ctx, strategy, this.rewardStreamFor(strategyId));
  }

  // ─── Internals ──────────────────────────────────────────────────────

  accountVotes(account: AccountId): AccountVotes {
    const existing = ownValue(this.ctx.state.accounts, account);
    if (existing) return existing;

    const created: AccountVotes = { usedWeight: 0n, lastVotedAt: null, votes: {} };
    this.ctx.state.accounts[account] = created;
    return created;
  }

  private releaseVotes(account: AccountId): VoteAllocation[] {
    const record = this.accountVotes(account);
    const released: VoteAllocation[] = [];

    for (const [strategyId, weight] of Object.entries(record.votes)) {
      if (weight === 0n) continue;
      this.updateStrategy(strategyId);
      const strategy = requireStrategy(this.ctx, strategyId);
      strategy.weight -= weight;
      this.ctx.state.totalWeight -= weight;
      this.rewardStreamFor(strategyId).withdraw(account, weight);
      released.push({ strategyId, weight });
    }

    record.votes = {};
    record.usedWeight = 0n;
    return released;
  }

  private requireNewEpoch(
    account: AccountId,
    code: typeof ErrorCode.AlreadyVotedThisEpoch | typeof ErrorCode.AlreadyResetThisEpoch,
  ): void {
    const last = ownValue(this.ctx.state.accounts, account)?.lastVotedAt ?? null;
    if (last === null) return;

    const period = this.ctx.params.epochClockPeriod;
    if (Math.floor(last / period) === Math.floor(this.ctx.now / period)) {
      throw ledgerError(code, 'Account already voted or reset in this epoch.', {
        account,
        nextEpochAt: (Math.floor(this.ctx.now / period) + 1) * period,
      });
    }
  }

  private requireOwner(caller: AccountId): void {
    if (caller !== this.ctx.state.settings.owner) {
      throw ledgerError(ErrorCode.Unauthorized, 'Only the ledger owner may do this.');
    }
  }
}
