import { AccountId, AssetId, BribeDustPolicy, StrategyId, StrategyRecord } from '../../types.js';
import { rewardPotAccount } from '../ledger/accounts.js';
import { LedgerContext, emit } from '../ledger/ledgerContext.js';
import { RewardNotification, RewardStream } from './rewardStream.js';

export type PotOutcome = 'empty' | 'notified' | 'held' | 'forwarded';

export interface PotSettlement {
  strategyId: StrategyId;
  asset: AssetId;
  amount: bigint;
  outcome: PotOutcome;
  policy: BribeDustPolicy;
  forwardedTo?: AccountId;
  notification?: RewardNotification;
}

/**
 * Moves a strategy's accumulated bribe cut into its reward stream.
 *
 * A pot holding at least one base unit per second of the reward duration is
 * notified in full, but only once it exceeds what the running period still
 * has to stream; until then it is held so a small top-up cannot stretch the
 * period and dilute the current rate. Below one unit per second the notified
 * rate would truncate to zero, so the configured dust policy decides: keep it
 * for a later batch, or forward it to the strategy's payment receiver or to
 * the treasury.
 */
export const settleRewardPot = (
  ctx: LedgerContext,
  strategy: StrategyRecord,
  stream: RewardStream,
): PotSettlement => {
  const pot = rewardPotAccount(strategy.id);
  const asset = strategy.paymentAsset;
  const amount = ctx.assets.balanceOf(asset, pot);
  const policy = ctx.params.bribeDustPolicy;
  const base = { strategyId: strategy.id, asset, amount, policy };

  if (amount === 0n) {
    return { ...base, outcome: 'empty' };
  }

  if (amount >= BigInt(ctx.params.rewardDuration)) {
    const left = stream.left(asset);
    if (amount <= left) {
      emit(ctx, 'rewards.pot_held', { strategyId: strategy.id, asset, amount: amount.toString(), left: left.toString() });
      return { ...base, outcome: 'held' };
    }

    const notification = stream.notifyRewardAmount(pot, asset, amount);
    emit(ctx, 'rewards.notified', {
      strategyId: strategy.id,
      asset,
      amount: amount.toString(),
      rolledOver: notification.rolledOver.toString(),
      rewardRate: notification.rewardRate.toString(),
      periodFinish: notification.periodFinish,
    });
    return { ...base, outcome: 'notified', notification };
  }

  if (policy === 'hold') {
    emit(ctx, 'rewards.pot_held', { strategyId: strategy.id, asset, amount: amount.toString() });
    return { ...base, outcome: 'held' };
  }

  const forwardedTo = policy === 'receiver' ? strategy.paymentReceiver : ctx.state.settings.treasury;
  ctx.assets.transfer(asset, pot, forwardedTo, amount);
  emit(ctx, 'rewards.pot_forwarded', {
    strategyId: strategy.id,
    asset,
    amount: amount.toString(),
    policy,
    to: forwardedTo,
  });
  return { ...base, outcome: 'forwarded', forwardedTo };
};
