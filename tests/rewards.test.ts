import { describe, expect, it } from 'vitest';
import { auctionAccount, rewardPotAccount, rewardsAccount } from '../src/domain/ledger/accounts.js';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { BribeDustPolicy } from '../src/types.js';
import { DAY, HOUR, WEEK } from '../src/utils/time.js';
import {
  at,
  codeOf,
  fundVoter,
  notify,
  OWNER,
  PARAMS,
  RECEIVER,
  seedState,
  strategyInput,
  T0,
  TREASURY,
} from './support/ledgerFixture.js';

const HALF_WEEK = WEEK / 2;

/** A strategy backed by the given voters, with a funded sponsor for direct notifications. */
function setup(voters: Record<string, bigint> = { alice: 100n }, initPrice = 100n) {
  const state = seedState();
  const c = at(state, T0);
  const id = c.ledger.addStrategy(OWNER, strategyInput({ initPrice })).id;
  for (const [account, stake] of Object.entries(voters)) {
    fundVoter(c, account, stake);
    c.ledger.vote(account, [id], [1n]);
  }
  c.assets.mint('USDC', 'sponsor', 100_000_000n);
  return { state, c, id };
}

/** Routes revenue to the auction and buys it at T0 + 30 minutes (price 50 for the default initPrice). */
function buyWithSplit(bribeSplit: bigint, policy: BribeDustPolicy) {
  const { state, c, id } = setup();
  c.ledger.setBribeSplit(OWNER, bribeSplit);
  notify(c, 1000n);
  c.ledger.distribute(id);
  c.assets.mint('USDC', 'buyer', 1000n);
  c.assets.approve('USDC', 'buyer', auctionAccount(id), 1000n);

  const later = at(state, T0 + HOUR / 2, { ...PARAMS, bribeDustPolicy: policy });
  const result = later.ledger.buy(id, {
    payer: 'buyer',
    recipient: 'buyer',
    expectedEpochId: 0,
    deadline: T0 + HOUR,
    maxPayment: 1000n,
  });
  return { state, c: later, id, result };
}

describe('RewardStream', () => {
  it('streams a notified amount over the reward duration', () => {
    const { state, c, id } = setup();

    const notification = c.ledger.notifyRewardAmount('sponsor', id, 'USDC', 2_000_000n);

    expect(notification).toEqual({
      asset: 'USDC',
      amount: 2_000_000n,
      rolledOver: 0n,
      rewardRate: 3n,
      periodFinish: T0 + WEEK,
    });

    const end = at(state, T0 + WEEK).ledger.rewardStreamFor(id);
    expect(end.earned('alice', 'USDC')).toBe(1_814_400n);
    expect(end.left('USDC')).toBe(0n);
    expect(at(state, T0 + WEEK + DAY).ledger.rewardStreamFor(id).earned('alice', 'USDC')).toBe(1_814_400n);
  });

  it('splits rewards by vote weight', () => {
    const { state, c, id } = setup({ alice: 100n, bob: 300n });
    c.ledger.notifyRewardAmount('sponsor', id, 'USDC', 4n * BigInt(WEEK));

    const end = at(state, T0 + WEEK).ledger.rewardStreamFor(id);

    expect(end.earned('alice', 'USDC')).toBe(604_800n);
    expect(end.earned('bob', 'USDC')).toBe(1_814_400n);
  });

  it('rolls the unstreamed remainder into a new notification', () => {
    const { state, c, id } = setup();
    c.ledger.notifyRewardAmount('sponsor', id, 'USDC', 2_000_000n);

    const mid = at(state, T0 + HALF_WEEK);
    expect(mid.ledger.rewardStreamFor(id).left('USDC')).toBe(907_200n);

    const notification = mid.ledger.notifyRewardAmount('sponsor', id, 'USDC', 604_800n);
    expect(notification.rolledOver).toBe(907_200n);
    expect(notification.rewardRate).toBe(2n);
    expect(notification.periodFinish).toBe(T0 + HALF_WEEK + WEEK);
  });

  it('pays earned rewards once', () => {
    const { state, c, id } = setup();
    c.ledger.notifyRewardAmount('sponsor', id, 'USDC', 4n * BigInt(WEEK));

    const mid = at(state, T0 + HALF_WEEK);
    expect(mid.ledger.claimRewards('alice', [id])).toEqual({ [id]: { USDC: 1_209_600n } });
    expect(mid.ledger.claimRewards('alice', [id])).toEqual({ [id]: {} });
    expect(mid.assets.balanceOf('USDC', 'alice')).toBe(1_209_600n);
    expect(mid.assets.balanceOf('USDC', rewardsAccount(id))).toBe(1_209_600n);
  });

  it('rejects amounts that would stream at a zero rate', () => {
    const { c, id } = setup();

    expect(codeOf(() => c.ledger.notifyRewardAmount('sponsor', id, 'USDC', BigInt(WEEK) - 1n))).toBe(ErrorCode.RewardAmountTooSmall);
  });

  it('accepts only registered reward assets', () => {
    const { c, id } = setup();
    c.assets.mint('REV', 'sponsor', BigInt(WEEK));

    expect(codeOf(() => c.ledger.notifyRewardAmount('sponsor', id, 'REV', BigInt(WEEK)))).toBe(ErrorCode.RewardAssetNotRegistered);

    c.ledger.addRewardAsset(OWNER, id, 'REV');
    expect(c.ledger.notifyRewardAmount('sponsor', id, 'REV', BigInt(WEEK)).rewardRate).toBe(1n);
  });

  it('accrues nothing when the per-second increment truncates to zero', () => {
    const { state, c, id } = setup({ whale: 10n ** 30n });
    c.ledger.notifyRewardAmount('sponsor', id, 'USDC', BigInt(WEEK));

    const end = at(state, T0 + WEEK).ledger.rewardStreamFor(id);

    expect(end.rewardPerToken('USDC')).toBe(0n);
    expect(end.earned('whale', 'USDC')).toBe(0n);
  });
});

describe('Reward pot settlement', () => {
  it('holds a bribe below the notification threshold by default', () => {
    const { c, id, result } = buyWithSplit(2000n, 'hold');

    expect(result.receipt.receiverShare).toBe(40n);
    expect(result.receipt.bribeShare).toBe(10n);
    expect(result.pot).toMatchObject({ outcome: 'held', amount: 10n, policy: 'hold' });
    expect(c.assets.balanceOf('USDC', rewardPotAccount(id))).toBe(10n);
    expect(c.assets.balanceOf('USDC', RECEIVER)).toBe(40n);
  });

  it('forwards a sub-threshold bribe to the payment receiver', () => {
    const { c, id, result } = buyWithSplit(2000n, 'receiver');

    expect(result.pot).toMatchObject({ outcome: 'forwarded', forwardedTo: RECEIVER, amount: 10n });
    expect(c.assets.balanceOf('USDC', RECEIVER)).toBe(50n);
    expect(c.assets.balanceOf('USDC', rewardPotAccount(id))).toBe(0n);
  });

  it('forwards a sub-threshold bribe to the treasury', () => {
    const { c, result } = buyWithSplit(2000n, 'treasury');

    expect(result.pot).toMatchObject({ outcome: 'forwarded', forwardedTo: TREASURY, amount: 10n });
    expect(c.assets.balanceOf('USDC', TREASURY)).toBe(10n);
  });

  it('settles a held pot later under another policy', () => {
    const { state, id } = buyWithSplit(2000n, 'hold');

    const settlement = at(state, T0 + HOUR, { ...PARAMS, bribeDustPolicy: 'treasury' }).ledger.distributeRewardPot(id);

    expect(settlement.outcome).toBe('forwarded');
    expect(at(state, T0 + HOUR).assets.balanceOf('USDC', TREASURY)).toBe(10n);
  });

  it('holds a pot that does not exceed what the running period still streams', () => {
    const { state, c, id } = setup();
    c.ledger.notifyRewardAmount('sponsor', id, 'USDC', 100n * BigInt(WEEK));
    c.assets.transfer('USDC', 'sponsor', rewardPotAccount(id), BigInt(WEEK));

    const mid = at(state, T0 + HALF_WEEK, { ...PARAMS, bribeDustPolicy: 'treasury' });
    const settlement = mid.ledger.distributeRewardPot(id);

    expect(settlement.outcome).toBe('held');
    expect(settlement.amount).toBe(BigInt(WEEK));
    expect(mid.ledger.rewardStreamFor(id).rewardData('USDC')).toMatchObject({ rewardRate: 100n, periodFinish: T0 + WEEK });
    expect(mid.assets.balanceOf('USDC', TREASURY)).toBe(0n);

    const end = at(state, T0 + WEEK).ledger.distributeRewardPot(id);
    expect(end.outcome).toBe('notified');
    expect(end.notification).toMatchObject({ rolledOver: 0n, rewardRate: 1n, periodFinish: T0 + 2 * WEEK });
  });

  it('streams a large bribe to the voters', () => {
    const { state, c, id } = setup({ alice: 100n }, 10_000_000n);
    c.ledger.setBribeSplit(OWNER, 2000n);
    notify(c, 1000n);
    c.ledger.distribute(id);
    c.assets.mint('USDC', 'buyer', 10_000_000n);
    c.assets.approve('USDC', 'buyer', auctionAccount(id), 10_000_000n);

    const { receipt, pot } = c.ledger.buy(id, {
      payer: 'buyer',
      recipient: 'buyer',
      expectedEpochId: 0,
      deadline: T0,
      maxPayment: 10_000_000n,
    });

    expect(receipt.bribeShare).toBe(2_000_000n);
    expect(pot.outcome).toBe('notified');
    expect(pot.notification?.rewardRate).toBe(3n);

    const end = at(state, T0 + WEEK);
    expect(end.ledger.claimRewards('alice', [id])).toEqual({ [id]: { USDC: 1_814_400n } });
    expect(end.assets.balanceOf('USDC', rewardsAccount(id))).toBe(185_600n);
    expect(end.assets.balanceOf('USDC', rewardPotAccount(id))).toBe(0n);
  });
});
