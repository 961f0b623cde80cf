import { AccountId, AssetId, AuctionState, StrategyId } from '../../types.js';
import { SCALE } from '../../utils/fixedPoint.js';
import { ownValue } from '../../utils/records.js';
import { AuctionStatus } from '../auction/auctionMarket.js';
import { LEDGER_CUSTODY, auctionAccount, rewardPotAccount } from '../ledger/accounts.js';
import { LedgerContext, requireStrategy, strategyRange } from '../ledger/ledgerContext.js';
import { VotingLedger } from '../ledger/votingLedger.js';
import { StakeVault } from '../staking/stakeVault.js';

export interface AccountSummary {
  account: AccountId;
  votingPower: bigint;
  usedWeight: bigint;
  lastVotedAt: number | null;
  revenueBalance: bigint;
  underlyingBalance: bigint;
}

export interface LedgerSummary {
  now: number;
  owner: AccountId;
  treasury: AccountId;
  revenueSource: AccountId | null;
  revenueAsset: AssetId;
  revenueDecimals: number;
  underlyingAsset: AssetId;
  bribeSplit: bigint;
  totalWeight: bigint;
  globalIndex: bigint;
  strategyCount: number;
  totalStaked: bigint;
  custodyBalance: bigint;
  account?: AccountSummary;
}

export interface StrategyCard {
  strategyId: StrategyId;
  index: number;
  description: string;
  paymentAsset: AssetId;
  paymentDecimals: number;
  paymentReceiver: AccountId;
  isAlive: boolean;
  weight: bigint;
  /** Share of total weight, scaled by 100 * 1e18. */
  votePercent: bigint;
  claimable: bigint;
  pendingClaimable: bigint;
  revenueBalance: bigint;
  auction: AuctionState;
  auctionStatus: AuctionStatus;
  price: bigint;
  accountVote?: bigint;
  accountPaymentBalance?: bigint;
}

export interface RewardAssetCard {
  asset: AssetId;
  decimals: number;
  rewardPerToken: bigint;
  left: bigint;
  rewardRate: bigint;
  periodFinish: number;
  accountEarned?: bigint;
}

export interface RewardCard {
  strategyId: StrategyId;
  index: number;
  totalSupply: bigint;
  potBalance: bigint;
  rewards: RewardAssetCard[];
  accountBalance?: bigint;
}

/** Read-only projections over a ledger snapshot. */
export class LedgerViews {
  constructor(
    private readonly ctx: LedgerContext,
    private readonly ledger: VotingLedger,
    private readonly vault: StakeVault,
  ) {}

  ledgerSummary(account?: AccountId): LedgerSummary {
    const { state, assets, now } = this.ctx;
    const { settings } = state;
    const underlyingAsset = state.staking.underlyingAsset;

    const summary: LedgerSummary = {
      now,
      owner: settings.owner,
      treasury: settings.treasury,
      revenueSource: settings.revenueSource,
      revenueAsset: settings.revenueAsset,
      revenueDecimals: assets.decimals(settings.revenueAsset),
      underlyingAsset,
      bribeSplit: settings.bribeSplit,
      totalWeight: state.totalWeight,
      globalIndex: state.globalIndex,
      strategyCount: state.strategyOrder.length,
      totalStaked: this.vault.totalStaked,
      custodyBalance: assets.balanceOf(settings.revenueAsset, LEDGER_CUSTODY),
    };

    if (account !== undefined) {
      const votes = ownValue(state.accounts, account);
      summary.account = {
        account,
        votingPower: this.vault.balanceOf(account),
        usedWeight: votes?.usedWeight ?? 0n,
        lastVotedAt: votes?.lastVotedAt ?? null,
        revenueBalance: assets.balanceOf(settings.revenueAsset, account),
        underlyingBalance: assets.balanceOf(underlyingAsset, account),
      };
    }
    return summary;
  }

  strategyCard(strategyId: StrategyId, account?: AccountId): StrategyCard {
    const { state, assets } = this.ctx;
    const strategy = requireStrategy(this.ctx, strategyId);
    const auction = this.ledger.auctionFor(strategyId);

    const delta = state.globalIndex - strategy.supplyIndex;
    const pendingClaimable = strategy.isAlive && delta > 0n ? (strategy.weight * delta) / SCALE : 0n;

    const card: StrategyCard = {
      strategyId,
      index: state.strategyOrder.indexOf(strategyId),
      description: strategy.description,
      paymentAsset: strategy.paymentAsset,
      paymentDecimals: assets.decimals(strategy.paymentAsset),
      paymentReceiver: strategy.paymentReceiver,
      isAlive: strategy.isAlive,
      weight: strategy.weight,
      votePercent: state.totalWeight === 0n ? 0n : (strategy.weight * 100n * SCALE) / state.totalWeight,
      claimable: strategy.claimable,
      pendingClaimable,
      revenueBalance: assets.balanceOf(state.settings.revenueAsset, auctionAccount(strategyId)),
      auction: auction.state(),
      auctionStatus: auction.status(),
      price: auction.getPrice(),
    };

    if (account !== undefined) {
      const votes = ownValue(state.accounts, account);
      card.accountVote = (votes && ownValue(votes.votes, strategyId)) ?? 0n;
      card.accountPaymentBalance = assets.balanceOf(strategy.paymentAsset, account);
    }
    return card;
  }

  strategyCards(start: number, end: number, account?: AccountId): StrategyCard[] {
    return strategyRange(this.ctx, start, end).map((id) => this.strategyCard(id, account));
  }

  allStrategyCards(account?: AccountId): StrategyCard[] {
    return this.strategyCards(0, this.ctx.state.strategyOrder.length, account);
  }

  rewardCard(strategyId: StrategyId, account?: AccountId): RewardCard {
    const { state, assets } = this.ctx;
    const strategy = requireStrategy(this.ctx, strategyId);
    const stream = this.ledger.rewardStreamFor(strategyId);

    const card: RewardCard = {
      strategyId,
      index: state.strategyOrder.indexOf(strategyId),
      totalSupply: stream.totalSupply,
      potBalance: assets.balanceOf(strategy.paymentAsset, rewardPotAccount(strategyId)),
      rewards: stream.rewardAssets.map((asset) => {
        const data = stream.rewardData(asset);
        const reward: RewardAssetCard = {
          asset,
          decimals: assets.decimals(asset),
          rewardPerToken: stream.rewardPerToken(asset),
          left: stream.left(asset),
          rewardRate: data.rewardRate,
          periodFinish: data.periodFinish,
        };
        if (account !== undefined) reward.accountEarned = stream.earned(account, asset);
        return reward;
      }),
    };

    if (account !== undefined) card.accountBalance = stream.balanceOf(account);
    return card;
  }

  rewardCards(start: number, end: number, account?: AccountId): RewardCard[] {
    return strategyRange(this.ctx, start, end).map((id) => this.rewardCard(id, account));
  }

  allRewardCards(account?: AccountId): RewardCard[] {
    return this.rewardCards(0, this.ctx.state.strategyOrder.length, account);
  }
}
