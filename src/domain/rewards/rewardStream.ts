/**
 * Duration-based streaming payout for one strategy's voters.
 *
 * Each notified amount is streamed linearly over `rewardDuration`. The
 * stream's `totalSupply` and per-account `balances` are not asset balances:
 * they mirror the vote weight the ledger has committed to the strategy and
 * are written only by the voting ledger.
 *
 * Integer division truncates in two places and both losses are accepted:
 * `rewardRate = amount / duration` drops up to `duration - 1` base units per
 * notification, and with a large `totalSupply` a small rate can move
 * `rewardPerToken` by zero for a whole period.
 */

import { DomainError, ErrorCode, ledgerError } from '../../errors/taxonomy.js';
import { AccountId, AssetId, RewardData, RewardStreamState, StrategyId } from '../../types.js';
import { SCALE } from '../../utils/fixedPoint.js';
import { ownValue } from '../../utils/records.js';
import { AssetBook } from '../assets/assetBook.js';
import { rewardsAccount } from '../ledger/accounts.js';

export const createRewardStreamState = (): RewardStreamState => ({
  rewardAssets: [],
  rewardData: {},
  totalSupply: 0n,
  balances: {},
  rewardPerTokenPaid: {},
  owed: {},
});

export interface RewardNotification {
  asset: AssetId;
  amount: bigint;
  rolledOver: bigint;
  rewardRate: bigint;
  periodFinish: number;
}

export class RewardStream {
  readonly account: AccountId;

  constructor(
    readonly strategyId: StrategyId,
    private readonly stream: RewardStreamState,
    private readonly assets: AssetBook,
    private readonly now: number,
    private readonly duration: number,
  ) {
    this.account = rewardsAccount(strategyId);
  }

  get totalSupply(): bigint {
    return this.stream.totalSupply;
  }

  get rewardAssets(): AssetId[] {
    return [...this.stream.rewardAssets];
  }

  balanceOf(account: AccountId): bigint {
    return ownValue(this.stream.balances, account) ?? 0n;
  }

  hasRewardAsset(asset: AssetId): boolean {
    return ownValue(this.stream.rewardData, asset) !== undefined;
  }

  rewardData(asset: AssetId): RewardData {
    return { ...this.requireData(asset) };
  }

  addRewardAsset(asset: AssetId): void {
    if (this.hasRewardAsset(asset)) {
      throw ledgerError(ErrorCode.RewardAssetExists, `Reward asset ${asset} is already registered.`, {
        strategyId: this.strategyId,
      });
    }
    this.assets.decimals(asset);

    this.stream.rewardAssets.push(asset);
    this.stream.rewardData[asset] = {
      rewardRate: 0n,
      periodFinish: 0,
      lastUpdateTime: 0,
      rewardPerTokenStored: 0n,
    };
  }

  lastTimeRewardApplicable(asset: AssetId): number {
    return Math.min(this.now, this.requireData(asset).periodFinish);
  }

  left(asset: AssetId): bigint {
    const data = this.requireData(asset);
    if (this.now >= data.periodFinish) return 0n;
    return BigInt(data.periodFinish - this.now) * data.rewardRate;
  }

  rewardPerToken(asset: AssetId): bigint {
    const data = this.requireData(asset);
    if (this.stream.totalSupply === 0n) return data.rewardPerTokenStored;

    const elapsed = Math.max(0, this.lastTimeRewardApplicable(asset) - data.lastUpdateTime);
    return data.rewardPerTokenStored
      + (BigInt(elapsed) * data.rewardRate * SCALE) / this.stream.totalSupply;
  }

  earned(account: AccountId, asset: AssetId): bigint {
    const paidPerAsset = ownValue(this.stream.rewardPerTokenPaid, account);
    const owedPerAsset = ownValue(this.stream.owed, account);
    const paid = (paidPerAsset && ownValue(paidPerAsset, asset)) ?? 0n;
    const owed = (owedPerAsset && ownValue(owedPerAsset, asset)) ?? 0n;
    return (this.balanceOf(account) * (this.rewardPerToken(asset) - paid)) / SCALE + owed;
  }

  /** Pulls `amount` from `funder` and streams it over the configured duration. */
  notifyRewardAmount(funder: AccountId, asset: AssetId, amount: bigint): RewardNotification {
    const data = this.requireData(asset);
    if (amount < BigInt(this.duration)) {
      throw ledgerError(ErrorCode.RewardAmountTooSmall, `Reward amount must be at least ${this.duration} base units.`, {
        strategyId: this.strategyId,
        asset,
        amount: amount.toString(),
      });
    }

    this.checkpoint(null);
    this.assets.transfer(asset, funder, this.account, amount);

    const rolledOver = this.left(asset);
    data.rewardRate = (amount + rolledOver) / BigInt(this.duration);
    data.lastUpdateTime = this.now;
    data.periodFinish = this.now + this.duration;

    return {
      asset,
      amount,
      rolledOver,
      rewardRate: data.rewardRate,
      periodFinish: data.periodFinish,
    };
  }

  deposit(account: AccountId, amount: bigint): void {
    this.checkpoint(account);
    this.stream.totalSupply += amount;
    this.stream.balances[account] = this.balanceOf(account) + amount;
  }

  withdraw(account: AccountId, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new DomainError(ErrorCode.InternalError, 500, 'Reward stream balance below withdrawn vote weight.', {
        strategyId: this.strategyId,
        account,
      });
    }

    this.checkpoint(account);
    this.stream.totalSupply -= amount;
    this.stream.balances[account] = balance - amount;
  }

  /** Pays everything the account has earned, per reward asset. */
  getReward(account: AccountId): Record<AssetId, bigint> {
    this.checkpoint(account);

    const paid: Record<AssetId, bigint> = {};
    const owed = ownValue(this.stream.owed, account) ?? {};
    for (const asset of this.stream.rewardAssets) {
      const amount = ownValue(owed, asset) ?? 0n;
      if (amount === 0n) continue;

      owed[asset] = 0n;
      this.assets.transfer(asset, this.account, account, amount);
      paid[asset] = amount;
    }
    return paid;
  }

  private checkpoint(account: AccountId | null): void {
    for (const asset of this.stream.rewardAssets) {
      const data = this.requireData(asset);
      data.rewardPerTokenStored = this.rewardPerToken(asset);
      data.lastUpdateTime = this.lastTimeRewardApplicable(asset);

      if (account !== null) {
        const owed = this.earned(account, asset);
        this.stream.owed[account] = { ...(ownValue(this.stream.owed, account) ?? {}), [asset]: owed };
        this.stream.rewardPerTokenPaid[account] = {
          ...(ownValue(this.stream.rewardPerTokenPaid, account) ?? {}),
          [asset]: data.rewardPerTokenStored,
        };
      }
    }
  }

  private requireData(asset: AssetId): RewardData {
    const data = ownValue(this.stream.rewardData, asset);
    if (!data) {
      throw ledgerError(ErrorCode.RewardAssetNotRegistered, `Reward asset ${asset} is not registered.`, {
        strategyId: this.strategyId,
      });
    }
    return data;
  }
}
