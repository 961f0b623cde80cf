/**
 * Continuous Dutch auction selling one strategy's revenue balance.
 *
 * The price decays linearly from `initPrice` to zero over `epochPeriod` and
 * stays at zero until someone buys; only a purchase opens the next epoch.
 * Buyers pass the epoch id they priced against so a purchase that lands
 * after someone else's fails instead of paying a stale price.
 */

import { ErrorCode, ledgerError } from '../../errors/taxonomy.js';
import { AccountId, AssetId, AuctionState, StrategyRecord } from '../../types.js';
import { DIVISOR, SCALE, UINT192_MAX, maxBig, minBig } from '../../utils/fixedPoint.js';
import { HOUR, DAY } from '../../utils/time.js';
import { AssetBook } from '../assets/assetBook.js';
import { auctionAccount, rewardPotAccount } from '../ledger/accounts.js';

export const AUCTION_BOUNDS = {
  minEpochPeriod: HOUR,
  maxEpochPeriod: 365 * DAY,
  minPriceMultiplier: (SCALE * 11n) / 10n,
  maxPriceMultiplier: SCALE * 3n,
  minInitPrice: 1n,
  maxInitPrice: UINT192_MAX,
} as const;

export interface AuctionParams {
  initPrice: bigint;
  epochPeriod: number;
  /** Scaled by 1e18: 2e18 doubles the last sale price. */
  priceMultiplier: bigint;
  minInitPrice: bigint;
}

export type AuctionStatus = 'active' | 'expired';

export interface BuyInput {
  /** Account the payment is pulled from; it must have approved the auction account. */
  payer: AccountId;
  recipient: AccountId;
  expectedEpochId: number;
  deadline: number;
  maxPayment: bigint;
}

export interface PurchaseReceipt {
  strategyId: string;
  epochId: number;
  payer: AccountId;
  recipient: AccountId;
  paymentAsset: AssetId;
  price: bigint;
  receiverShare: bigint;
  bribeShare: bigint;
  revenueAsset: AssetId;
  assetsSold: bigint;
  nextEpochId: number;
  nextInitPrice: bigint;
  paidAt: number;
}

export const validateAuctionParams = (params: AuctionParams): void => {
  const problems: string[] = [];
  if (!Number.isInteger(params.epochPeriod)
    || params.epochPeriod < AUCTION_BOUNDS.minEpochPeriod
    || params.epochPeriod > AUCTION_BOUNDS.maxEpochPeriod) {
    problems.push(`epochPeriod must be an integer in [${AUCTION_BOUNDS.minEpochPeriod}, ${AUCTION_BOUNDS.maxEpochPeriod}] seconds`);
  }
  if (params.priceMultiplier < AUCTION_BOUNDS.minPriceMultiplier || params.priceMultiplier > AUCTION_BOUNDS.maxPriceMultiplier) {
    problems.push('priceMultiplier must be within [1.1e18, 3e18]');
  }
  if (params.minInitPrice < AUCTION_BOUNDS.minInitPrice || params.minInitPrice > AUCTION_BOUNDS.maxInitPrice) {
    problems.push('minInitPrice must be within [1, 2^192 - 1]');
  }
  if (params.initPrice < params.minInitPrice || params.initPrice > AUCTION_BOUNDS.maxInitPrice) {
    problems.push('initPrice must be within [minInitPrice, 2^192 - 1]');
  }

  if (problems.length > 0) {
    throw ledgerError(ErrorCode.InvalidAuctionParams, 'Invalid auction parameters.', { problems });
  }
};

export const createAuctionState = (params: AuctionParams, now: number): AuctionState => ({
  epochId: 0,
  startTime: now,
  initPrice: params.initPrice,
  epochPeriod: params.epochPeriod,
  priceMultiplier: params.priceMultiplier,
  minInitPrice: params.minInitPrice,
});

export class AuctionMarket {
  readonly account: AccountId;

  constructor(
    private readonly strategy: StrategyRecord,
    private readonly auction: AuctionState,
    private readonly assets: AssetBook,
    private readonly revenueAsset: AssetId,
    private readonly now: number,
  ) {
    this.account = auctionAccount(strategy.id);
  }

  get epochId(): number {
    return this.auction.epochId;
  }

  state(): AuctionState {
    return { ...this.auction };
  }

  status(): AuctionStatus {
    return this.now - this.auction.startTime >= this.auction.epochPeriod ? 'expired' : 'active';
  }

  getPrice(): bigint {
    const elapsed = Math.max(0, this.now - this.auction.startTime);
    if (elapsed >= this.auction.epochPeriod) return 0n;

    const remaining = BigInt(this.auction.epochPeriod - elapsed);
    return (this.auction.initPrice * remaining) / BigInt(this.auction.epochPeriod);
  }

  revenueBalance(): bigint {
    return this.assets.balanceOf(this.revenueAsset, this.account);
  }

  /**
   * Sells the whole revenue balance at the current price. The bribe share of
   * the payment lands in the strategy's reward pot; settling the pot is up to
   * the caller.
   */
  buy(input: BuyInput, bribeSplit: bigint): PurchaseReceipt {
    if (this.now > input.deadline) {
      throw ledgerError(ErrorCode.DeadlineExpired, 'Purchase deadline has passed.', {
        deadline: input.deadline,
        now: this.now,
      });
    }
    if (input.expectedEpochId !== this.auction.epochId) {
      throw ledgerError(ErrorCode.EpochIdMismatch, 'Auction epoch has moved on; refresh and retry.', {
        expectedEpochId: input.expectedEpochId,
        epochId: this.auction.epochId,
      });
    }

    const price = this.getPrice();
    if (price > input.maxPayment) {
      throw ledgerError(ErrorCode.MaxPaymentExceeded, 'Current price exceeds maxPayment.', {
        price: price.toString(),
        maxPayment: input.maxPayment.toString(),
      });
    }

    const assetsSold = this.revenueBalance();
    if (assetsSold === 0n) {
      throw ledgerError(ErrorCode.EmptyAssets, 'Auction has no revenue to sell.', {
        strategyId: this.strategy.id,
      });
    }

    this.assets.transfer(this.revenueAsset, this.account, input.recipient, assetsSold);

    const bribeShare = (price * bribeSplit) / DIVISOR;
    const receiverShare = price - bribeShare;
    const paymentAsset = this.strategy.paymentAsset;
    this.assets.transferFrom(paymentAsset, this.account, input.payer, this.strategy.paymentReceiver, receiverShare);
    this.assets.transferFrom(paymentAsset, this.account, input.payer, rewardPotAccount(this.strategy.id), bribeShare);

    const soldEpochId = this.auction.epochId;
    const reseeded = maxBig((price * this.auction.priceMultiplier) / SCALE, this.auction.minInitPrice);
    this.auction.initPrice = minBig(reseeded, AUCTION_BOUNDS.maxInitPrice);
    this.auction.startTime = this.now;
    this.auction.epochId = soldEpochId + 1;

    return {
      strategyId: this.strategy.id,
      epochId: soldEpochId,
      payer: input.payer,
      recipient: input.recipient,
      paymentAsset,
      price,
      receiverShare,
      bribeShare,
      revenueAsset: this.revenueAsset,
      assetsSold,
      nextEpochId: this.auction.epochId,
      nextInitPrice: this.auction.initPrice,
      paidAt: this.now,
    };
  }
}
