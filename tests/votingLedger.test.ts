import { describe, expect, it } from 'vitest';
import { auctionAccount, LEDGER_CUSTODY } from '../src/domain/ledger/accounts.js';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { LedgerState } from '../src/types.js';
import { WEEK } from '../src/utils/time.js';
import {
  at,
  codeOf,
  fundVoter,
  notify,
  OWNER,
  seedState,
  SOURCE,
  strategyInput,
  T0,
  TREASURY,
} from './support/ledgerFixture.js';

/** Three strategies backed 100 / 200 / 300 by three single-target voters. */
function setup() {
  const state = seedState();
  const c = at(state, T0);
  const s1 = c.ledger.addStrategy(OWNER, strategyInput({ description: 'one' })).id;
  const s2 = c.ledger.addStrategy(OWNER, strategyInput({ description: 'two' })).id;
  const s3 = c.ledger.addStrategy(OWNER, strategyInput({ description: 'three' })).id;

  fundVoter(c, 'alice', 100n);
  fundVoter(c, 'bob', 200n);
  fundVoter(c, 'carol', 300n);
  c.ledger.vote('alice', [s1], [1n]);
  c.ledger.vote('bob', [s2], [1n]);
  c.ledger.vote('carol', [s3], [1n]);

  return { state, c, s1, s2, s3 };
}

const auctionRevenue = (state: LedgerState, strategyId: string): bigint => (
  at(state, T0).assets.balanceOf('REV', auctionAccount(strategyId))
);

describe('VotingLedger distribution', () => {
  it('splits 600 units across weights 100/200/300 regardless of distribution order', () => {
    const { state, c, s1, s2, s3 } = setup();
    expect(state.totalWeight).toBe(600n);

    notify(c, 600n);
    expect(c.ledger.distribute(s2).amount).toBe(200n);
    expect(c.ledger.distribute(s1).amount).toBe(100n);
    expect(c.ledger.distribute(s3).amount).toBe(300n);

    expect(auctionRevenue(state, s1)).toBe(100n);
    expect(auctionRevenue(state, s2)).toBe(200n);
    expect(auctionRevenue(state, s3)).toBe(300n);
    expect(c.assets.balanceOf('REV', LEDGER_CUSTODY)).toBe(0n);
  });

  it('gives identical balances for every distribution order', () => {
    const orders: Array<(ids: string[]) => string[]> = [
      (ids) => ids,
      (ids) => [...ids].reverse(),
      (ids) => [ids[1] ?? '', ids[2] ?? '', ids[0] ?? ''],
    ];

    const results = orders.map((order) => {
      const { state, c, s1, s2, s3 } = setup();
      notify(c, 1000n);
      const later = at(state, T0 + 60);
      notify(later, 333n);
      for (const id of order([s1, s2, s3])) later.ledger.distribute(id);
      return [s1, s2, s3].map((id) => auctionRevenue(state, id));
    });

    expect(results[1]).toEqual(results[0]);
    expect(results[2]).toEqual(results[0]);
  });

  it('is idempotent when no revenue arrives between two distributions', () => {
    const { state, c, s1 } = setup();
    notify(c, 600n);

    expect(c.ledger.distribute(s1).amount).toBe(100n);
    expect(c.ledger.distribute(s1).amount).toBe(0n);
    expect(auctionRevenue(state, s1)).toBe(100n);
  });

  it('truncates proportional shares and leaves the dust in custody', () => {
    const state = seedState();
    const c = at(state, T0);
    const s1 = c.ledger.addStrategy(OWNER, strategyInput()).id;
    const s2 = c.ledger.addStrategy(OWNER, strategyInput()).id;
    fundVoter(c, 'alice', 3n);
    c.ledger.vote('alice', [s1, s2], [1n, 2n]);

    notify(c, 1000n);
    expect(state.globalIndex).toBe(333333333333333333333n);

    const [d1, d2] = c.ledger.distributeAll();
    expect(d1?.amount).toBe(333n);
    expect(d2?.amount).toBe(666n);
    expect(c.assets.balanceOf('REV', LEDGER_CUSTODY)).toBe(1n);
  });

  it('conserves revenue across notifications, vote changes and partial distribution', () => {
    const { state, c, s1, s2, s3 } = setup();
    notify(c, 1000n);
    c.ledger.distribute(s1);

    const next = at(state, T0 + WEEK);
    next.ledger.vote('alice', [s2, s3], [1n, 1n]);
    notify(next, 777n);
    next.ledger.distribute(s2);
    notify(next, 5n);
    next.ledger.distributeAll();

    const distributed = [s1, s2, s3].reduce((sum, id) => sum + auctionRevenue(state, id), 0n);
    const custody = next.assets.balanceOf('REV', LEDGER_CUSTODY);
    expect(distributed + custody).toBe(1782n);
    expect(distributed).toBeLessThanOrEqual(1782n);
    expect(custody).toBeLessThan(10n);
  });

  it('forwards revenue to the treasury while nobody votes', () => {
    const state = seedState();
    const c = at(state, T0);
    c.ledger.addStrategy(OWNER, strategyInput());
    c.assets.mint('REV', SOURCE, 50n);

    const notice = c.ledger.notifyRevenue(SOURCE, 50n);

    expect(notice.routedTo).toBe('treasury');
    expect(state.globalIndex).toBe(0n);
    expect(c.assets.balanceOf('REV', TREASURY)).toBe(50n);
    expect(state.metrics.revenueToTreasury).toBe(50n);
  });

  it('accepts revenue only from the revenue source and only positive amounts', () => {
    const { c } = setup();
    c.assets.mint('REV', 'mallory', 10n);

    expect(codeOf(() => c.ledger.notifyRevenue('mallory', 10n))).toBe(ErrorCode.Unauthorized);
    expect(codeOf(() => c.ledger.notifyRevenue(SOURCE, 0n))).toBe(ErrorCode.InvalidAmount);
    expect(codeOf(() => c.ledger.notifyRevenue(SOURCE, 10n))).toBe(ErrorCode.InsufficientBalance);
  });

  it('notifies and distributes in one call', () => {
    const { state, c, s1, s2, s3 } = setup();
    c.assets.mint('REV', SOURCE, 600n);

    const { notice, distributions } = c.ledger.notifyAndDistribute(SOURCE, 600n);

    expect(notice.routedTo).toBe('index');
    expect(distributions.map((d) => d.amount)).toEqual([100n, 200n, 300n]);
    expect(auctionRevenue(state, s1) + auctionRevenue(state, s2) + auctionRevenue(state, s3)).toBe(600n);
  });

  it('never credits a new strategy with revenue notified before it existed', () => {
    const { state, c } = setup();
    notify(c, 600n);

    const late = c.ledger.addStrategy(OWNER, strategyInput()).id;

    expect(state.strategies[late]?.supplyIndex).toBe(state.globalIndex);
    expect(c.ledger.updateStrategy(late)).toBe(0n);
  });

  it('updates and distributes half-open ranges of the registration order', () => {
    const { state, c, s2, s3 } = setup();
    notify(c, 600n);

    c.ledger.updateForRange(0, 1);
    expect(state.strategies[state.strategyOrder[0] ?? '']?.claimable).toBe(100n);
    expect(state.strategies[s2]?.claimable).toBe(0n);

    const distributed = c.ledger.distributeRange(1, 3);
    expect(distributed).toEqual([
      { strategyId: s2, amount: 200n },
      { strategyId: s3, amount: 300n },
    ]);

    expect(codeOf(() => c.ledger.distributeRange(2, 4))).toBe(ErrorCode.InvalidRange);
    expect(codeOf(() => c.ledger.updateForRange(2, 1))).toBe(ErrorCode.InvalidRange);
    expect(c.ledger.distributeRange(3, 3)).toEqual([]);
  });

  it('updates an explicit list and every strategy', () => {
    const { state, c, s1, s2, s3 } = setup();
    notify(c, 600n);

    c.ledger.updateFor([s3]);
    expect(state.strategies[s3]?.claimable).toBe(300n);
    expect(state.strategies[s1]?.claimable).toBe(0n);

    c.ledger.updateAll();
    expect(state.strategies[s1]?.claimable).toBe(100n);
    expect(state.strategies[s2]?.claimable).toBe(200n);
    expect(state.strategies[s3]?.claimable).toBe(300n);
  });
});

describe('VotingLedger voting', () => {
  it('allocates weight proportionally with the last target taking the remainder', () => {
    const state = seedState();
    const c = at(state, T0);
    const ids = [1, 2, 3].map(() => c.ledger.addStrategy(OWNER, strategyInput()).id);
    fundVoter(c, 'alice', 100n);

    const result = c.ledger.vote('alice', ids, [1n, 1n, 1n]);

    expect(result.allocations.map((a) => a.weight)).toEqual([33n, 33n, 34n]);
    expect(result.usedWeight).toBe(100n);
    expect(state.accounts.alice?.usedWeight).toBe(100n);
    expect(state.totalWeight).toBe(100n);
  });

  it('rejects malformed ballots', () => {
    const { c, s1, s2 } = setup();
    fundVoter(c, 'dave', 10n);

    expect(codeOf(() => c.ledger.vote('dave', [s1, s2], [1n]))).toBe(ErrorCode.ArrayLengthMismatch);
    expect(codeOf(() => c.ledger.vote('dave', [s1, s1], [1n, 1n]))).toBe(ErrorCode.DuplicateTarget);
    expect(codeOf(() => c.ledger.vote('dave', [s1], [-1n]))).toBe(ErrorCode.InvalidAmount);
    expect(codeOf(() => c.ledger.vote('nobody', [s1], [1n]))).toBe(ErrorCode.NoWeight);
  });

  it('allows one vote or reset per epoch-clock period', () => {
    const { state, c, s2 } = setup();

    expect(codeOf(() => c.ledger.vote('alice', [s2], [1n]))).toBe(ErrorCode.AlreadyVotedThisEpoch);
    expect(codeOf(() => c.ledger.reset('alice'))).toBe(ErrorCode.AlreadyResetThisEpoch);
    expect(codeOf(() => at(state, T0 + WEEK - 1).ledger.reset('alice'))).toBe(ErrorCode.AlreadyResetThisEpoch);

    const next = at(state, T0 + WEEK);
    expect(next.ledger.vote('alice', [s2], [1n]).usedWeight).toBe(100n);
  });

  it('replaces the previous allocation on a new vote', () => {
    const { state, s1, s2 } = setup();

    at(state, T0 + WEEK).ledger.vote('alice', [s2], [5n]);

    expect(state.strategies[s1]?.weight).toBe(0n);
    expect(state.strategies[s2]?.weight).toBe(300n);
    expect(state.totalWeight).toBe(600n);
    expect(state.accounts.alice?.votes).toEqual({ [s2]: 100n });
  });

  it('skips unknown and dead targets', () => {
    const { state, c, s1, s2 } = setup();
    c.ledger.killStrategy(OWNER, s1);

    const result = at(state, T0 + WEEK).ledger.vote('alice', ['missing', s1, s2], [1n, 1n, 1n]);

    expect(result.skipped).toEqual(['missing', s1]);
    expect(result.allocations).toEqual([{ strategyId: s2, weight: 100n }]);
  });

  it('accepts a ballot whose targets are all dead or unknown as a release', () => {
    const { state, c, s1, s2 } = setup();
    c.ledger.killStrategy(OWNER, s1);
    const next = at(state, T0 + WEEK);

    const result = next.ledger.vote('alice', [s1, 'missing'], [1n, 1n]);

    expect(result).toEqual({ account: 'alice', usedWeight: 0n, allocations: [], skipped: [s1, 'missing'] });
    expect(state.strategies[s1]?.weight).toBe(0n);
    expect(state.totalWeight).toBe(500n);
    expect(state.accounts.alice).toEqual({ usedWeight: 0n, lastVotedAt: T0 + WEEK, votes: {} });
    expect(codeOf(() => next.ledger.vote('alice', [s2], [1n]))).toBe(ErrorCode.AlreadyVotedThisEpoch);
  });

  it('accepts an empty ballot', () => {
    const { state } = setup();

    const result = at(state, T0 + WEEK).ledger.vote('alice', [], []);

    expect(result.usedWeight).toBe(0n);
    expect(result.allocations).toEqual([]);
    expect(state.totalWeight).toBe(500n);
    expect(state.accounts.alice?.lastVotedAt).toBe(T0 + WEEK);
  });

  it('fails when live targets carry no relative weight', () => {
    const { state, s2 } = setup();

    expect(codeOf(() => at(state, T0 + WEEK).ledger.vote('alice', [s2], [0n]))).toBe(ErrorCode.ZeroWeightAfterNormalization);
  });

  it('fails when normalization rounds a target to zero', () => {
    const { state, s1, s2 } = setup();

    const code = codeOf(() => at(state, T0 + WEEK).ledger.vote('alice', [s1, s2], [1n, 1000n]));

    expect(code).toBe(ErrorCode.ZeroWeightAfterNormalization);
  });

  it('mirrors vote weight into the reward stream', () => {
    const { state, c, s1 } = setup();

    expect(c.ledger.rewardStreamFor(s1).balanceOf('alice')).toBe(100n);

    at(state, T0 + WEEK).ledger.reset('alice');
    expect(at(state, T0 + WEEK).ledger.rewardStreamFor(s1).totalSupply).toBe(0n);
  });

  it('recovers a killed strategy weight only through resets', () => {
    const state = seedState();
    const c = at(state, T0);
    const s1 = c.ledger.addStrategy(OWNER, strategyInput()).id;
    const s2 = c.ledger.addStrategy(OWNER, strategyInput()).id;
    fundVoter(c, 'alice', 100n);
    fundVoter(c, 'bob', 200n);
    c.ledger.vote('alice', [s1], [1n]);
    c.ledger.vote('bob', [s1, s2], [1n, 1n]);
    notify(c, 300n);

    expect(c.ledger.killStrategy(OWNER, s1)).toBe(200n);
    expect(c.assets.balanceOf('REV', TREASURY)).toBe(200n);
    expect(state.strategies[s1]?.weight).toBe(200n);
    expect(state.totalWeight).toBe(300n);
    expect(codeOf(() => c.ledger.killStrategy(OWNER, s1))).toBe(ErrorCode.AlreadyDead);

    notify(c, 300n);
    expect(c.ledger.distribute(s1).amount).toBe(0n);
    expect(c.ledger.distribute(s2).amount).toBe(200n);
    expect(c.assets.balanceOf('REV', LEDGER_CUSTODY)).toBe(200n);

    const next = at(state, T0 + WEEK);
    next.ledger.reset('alice');
    expect(state.strategies[s1]?.weight).toBe(100n);
    expect(state.totalWeight).toBe(200n);

    next.ledger.reset('bob');
    expect(state.strategies[s1]?.weight).toBe(0n);
    expect(state.strategies[s2]?.weight).toBe(0n);
    expect(state.totalWeight).toBe(0n);
  });
});

describe('VotingLedger administration', () => {
  it('restricts administrative operations to the owner', () => {
    const { c, s1 } = setup();

    expect(codeOf(() => c.ledger.addStrategy('alice', strategyInput()))).toBe(ErrorCode.Unauthorized);
    expect(codeOf(() => c.ledger.killStrategy('alice', s1))).toBe(ErrorCode.Unauthorized);
    expect(codeOf(() => c.ledger.setBribeSplit('alice', 100n))).toBe(ErrorCode.Unauthorized);
    expect(codeOf(() => c.ledger.setRevenueSource('alice', 'alice'))).toBe(ErrorCode.Unauthorized);
    expect(codeOf(() => c.ledger.addRewardAsset('alice', s1, 'REV'))).toBe(ErrorCode.Unauthorized);
  });

  it('validates new strategies', () => {
    const { c } = setup();

    expect(codeOf(() => c.ledger.addStrategy(OWNER, strategyInput({ paymentAsset: 'NOPE' })))).toBe(ErrorCode.AssetNotFound);
    expect(codeOf(() => c.ledger.addStrategy(OWNER, strategyInput({ paymentReceiver: ' ' })))).toBe(ErrorCode.InvalidAccount);
    expect(codeOf(() => c.ledger.addStrategy(OWNER, strategyInput({ epochPeriod: 60 })))).toBe(ErrorCode.InvalidAuctionParams);
    expect(codeOf(() => c.ledger.addStrategy(OWNER, strategyInput({ minInitPrice: 200n })))).toBe(ErrorCode.InvalidAuctionParams);
  });

  it('bounds the bribe split by the configured maximum', () => {
    const { state, c } = setup();

    expect(codeOf(() => c.ledger.setBribeSplit(OWNER, 5001n))).toBe(ErrorCode.InvalidBribeSplit);
    expect(codeOf(() => c.ledger.setBribeSplit(OWNER, -1n))).toBe(ErrorCode.InvalidBribeSplit);

    c.ledger.setBribeSplit(OWNER, 5000n);
    expect(state.settings.bribeSplit).toBe(5000n);
  });

  it('changes the revenue source', () => {
    const { state, c } = setup();

    expect(codeOf(() => c.ledger.setRevenueSource(OWNER, ''))).toBe(ErrorCode.InvalidAccount);
    c.ledger.setRevenueSource(OWNER, 'minter');
    expect(state.settings.revenueSource).toBe('minter');
  });

  it('registers additional reward assets once', () => {
    const { c, s1 } = setup();

    expect(codeOf(() => c.ledger.addRewardAsset(OWNER, s1, 'USDC'))).toBe(ErrorCode.RewardAssetExists);
    expect(codeOf(() => c.ledger.addRewardAsset(OWNER, s1, 'NOPE'))).toBe(ErrorCode.AssetNotFound);
    expect(codeOf(() => c.ledger.addRewardAsset(OWNER, 'missing', 'REV'))).toBe(ErrorCode.StrategyNotFound);

    c.ledger.addRewardAsset(OWNER, s1, 'REV');
    expect(c.ledger.rewardStreamFor(s1).rewardAssets).toEqual(['USDC', 'REV']);
  });

  it('records events for committed changes', () => {
    const { c } = setup();

    expect(c.ctx.events.map((e) => e.type)).toEqual([
      'strategy.added',
      'strategy.added',
      'strategy.added',
      'stake.deposited',
      'stake.deposited',
      'stake.deposited',
      'vote.cast',
      'vote.cast',
      'vote.cast',
    ]);
  });
});
