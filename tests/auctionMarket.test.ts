import { describe, expect, it } from 'vitest';
import { AddStrategyInput } from '../src/domain/ledger/votingLedger.js';
import { auctionAccount } from '../src/domain/ledger/accounts.js';
import { BuyInput } from '../src/domain/auction/auctionMarket.js';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { SCALE, UINT192_MAX } from '../src/utils/fixedPoint.js';
import { DAY, HOUR, WEEK } from '../src/utils/time.js';
import { at, codeOf, fundVoter, notify, OWNER, RECEIVER, seedState, strategyInput, T0 } from './support/ledgerFixture.js';

const BUYER_FUNDS = 1_000_000_000n;

/** One strategy whose auction holds 1000 units of revenue, plus a funded and approved buyer. */
function setup(overrides: Partial<AddStrategyInput> = {}, buyerFunds = BUYER_FUNDS) {
  const state = seedState();
  const c = at(state, T0);
  const id = c.ledger.addStrategy(OWNER, strategyInput(overrides)).id;
  fundVoter(c, 'alice', 100n);
  c.ledger.vote('alice', [id], [1n]);
  notify(c, 1000n);
  c.ledger.distribute(id);
  c.assets.mint('USDC', 'buyer', buyerFunds);
  c.assets.approve('USDC', 'buyer', auctionAccount(id), buyerFunds);
  return { state, c, id };
}

const order = (overrides: Partial<BuyInput> = {}): BuyInput => ({
  payer: 'buyer',
  recipient: 'buyer',
  expectedEpochId: 0,
  deadline: T0 + WEEK,
  maxPayment: 1_000_000n,
  ...overrides,
});

describe('AuctionMarket pricing', () => {
  it('decays linearly from initPrice to zero over the epoch period', () => {
    const { state, id } = setup();
    const priceAt = (now: number) => at(state, now).ledger.auctionFor(id).getPrice();

    expect(priceAt(T0)).toBe(100n);
    expect(priceAt(T0 + 900)).toBe(75n);
    expect(priceAt(T0 + 1800)).toBe(50n);
    expect(priceAt(T0 + HOUR - 1)).toBe(0n);
    expect(priceAt(T0 + HOUR)).toBe(0n);
    expect(priceAt(T0 + DAY)).toBe(0n);
  });

  it('reports an expired auction once the period has elapsed without a purchase', () => {
    const { state, id } = setup();

    expect(at(state, T0 + HOUR - 1).ledger.auctionFor(id).status()).toBe('active');
    expect(at(state, T0 + HOUR).ledger.auctionFor(id).status()).toBe('expired');
  });

  it('rejects out-of-range parameters', () => {
    const { c } = setup();
    const invalid = (overrides: Partial<AddStrategyInput>) => codeOf(() => c.ledger.addStrategy(OWNER, strategyInput(overrides)));

    expect(invalid({ epochPeriod: HOUR - 1 })).toBe(ErrorCode.InvalidAuctionParams);
    expect(invalid({ epochPeriod: 365 * DAY + 1 })).toBe(ErrorCode.InvalidAuctionParams);
    expect(invalid({ priceMultiplier: SCALE })).toBe(ErrorCode.InvalidAuctionParams);
    expect(invalid({ priceMultiplier: 3n * SCALE + 1n })).toBe(ErrorCode.InvalidAuctionParams);
    expect(invalid({ minInitPrice: 0n })).toBe(ErrorCode.InvalidAuctionParams);
    expect(invalid({ initPrice: UINT192_MAX + 1n })).toBe(ErrorCode.InvalidAuctionParams);
  });
});

describe('AuctionMarket purchases', () => {
  it('sells the whole revenue balance at the current price and reseeds the next epoch', () => {
    const { state, id } = setup();
    const c = at(state, T0 + 1800);

    const { receipt, pot } = c.ledger.buy(id, order());

    expect(receipt.price).toBe(50n);
    expect(receipt.receiverShare).toBe(50n);
    expect(receipt.bribeShare).toBe(0n);
    expect(receipt.assetsSold).toBe(1000n);
    expect(receipt.epochId).toBe(0);
    expect(receipt.nextEpochId).toBe(1);
    expect(receipt.nextInitPrice).toBe(100n);
    expect(receipt.paidAt).toBe(T0 + 1800);
    expect(pot.outcome).toBe('empty');

    expect(c.assets.balanceOf('REV', 'buyer')).toBe(1000n);
    expect(c.assets.balanceOf('REV', auctionAccount(id))).toBe(0n);
    expect(c.assets.balanceOf('USDC', RECEIVER)).toBe(50n);
    expect(c.assets.balanceOf('USDC', 'buyer')).toBe(BUYER_FUNDS - 50n);
    expect(c.assets.allowance('USDC', 'buyer', auctionAccount(id))).toBe(BUYER_FUNDS - 50n);
    expect(c.ledger.auctionFor(id).state()).toMatchObject({ epochId: 1, startTime: T0 + 1800, initPrice: 100n });
    expect(state.metrics.auctionsSettled).toBe(1);
  });

  it('delivers the revenue to a recipient other than the payer', () => {
    const { state, id } = setup();
    const c = at(state, T0 + 1800);

    c.ledger.buy(id, order({ recipient: 'vault' }));

    expect(c.assets.balanceOf('REV', 'vault')).toBe(1000n);
    expect(c.assets.balanceOf('REV', 'buyer')).toBe(0n);
  });

  it('rejects a replayed purchase against a consumed epoch', () => {
    const { state, id } = setup();
    const c = at(state, T0 + 1800);
    c.ledger.buy(id, order());

    expect(codeOf(() => c.ledger.buy(id, order()))).toBe(ErrorCode.EpochIdMismatch);
    expect(codeOf(() => c.ledger.buy(id, order({ expectedEpochId: 7 })))).toBe(ErrorCode.EpochIdMismatch);
  });

  it('enforces the deadline inclusively', () => {
    const { state, id } = setup();
    const c = at(state, T0 + 1800);

    expect(codeOf(() => c.ledger.buy(id, order({ deadline: T0 + 1799 })))).toBe(ErrorCode.DeadlineExpired);
    expect(c.ledger.buy(id, order({ deadline: T0 + 1800 })).receipt.price).toBe(50n);
  });

  it('refuses to pay more than maxPayment', () => {
    const { state, id } = setup();

    const code = codeOf(() => at(state, T0 + 1800).ledger.buy(id, order({ maxPayment: 49n })));

    expect(code).toBe(ErrorCode.MaxPaymentExceeded);
  });

  it('refuses to sell an empty balance', () => {
    const { state, id } = setup();
    const c = at(state, T0 + 1800);
    c.ledger.buy(id, order());

    expect(codeOf(() => c.ledger.buy(id, order({ expectedEpochId: 1 })))).toBe(ErrorCode.EmptyAssets);
  });

  it('sells for nothing once the price has decayed and reseeds at minInitPrice', () => {
    const { state, id } = setup();
    const c = at(state, T0 + 2 * HOUR);

    const { receipt } = c.ledger.buy(id, order({ maxPayment: 0n }));

    expect(receipt.price).toBe(0n);
    expect(receipt.nextInitPrice).toBe(1n);
    expect(c.assets.balanceOf('REV', 'buyer')).toBe(1000n);
    expect(c.assets.balanceOf('USDC', RECEIVER)).toBe(0n);
  });

  it('floors the reseeded price at minInitPrice', () => {
    const { state, id } = setup({ minInitPrice: 80n, priceMultiplier: (SCALE * 11n) / 10n });

    const { receipt } = at(state, T0 + 1800).ledger.buy(id, order());

    expect(receipt.price).toBe(50n);
    expect(receipt.nextInitPrice).toBe(80n);
  });

  it('caps the reseeded price at 2^192 - 1', () => {
    const { c, id } = setup({ initPrice: UINT192_MAX, priceMultiplier: 3n * SCALE }, UINT192_MAX);

    const { receipt } = c.ledger.buy(id, order({ maxPayment: UINT192_MAX }));

    expect(receipt.price).toBe(UINT192_MAX);
    expect(receipt.nextInitPrice).toBe(UINT192_MAX);
  });

  it('pulls payment only through an allowance granted to the auction account', () => {
    const { state, id } = setup();
    const c = at(state, T0 + 1800);
    c.assets.mint('USDC', 'stranger', 1000n);

    const code = codeOf(() => c.ledger.buy(id, order({ payer: 'stranger', recipient: 'stranger' })));

    expect(code).toBe(ErrorCode.InsufficientAllowance);
  });
});
