/**
 * Composes distribution and an auction purchase into one unit.
 *
 * The caller's `maxPayment` is escrowed first so the auction can pull the
 * exact price from the escrow; whatever the auction did not take goes back
 * to the caller. The escrow holds nothing between operations.
 */

import { AccountId, StrategyId } from '../../types.js';
import { auctionAccount, ROUTER_ESCROW } from '../ledger/accounts.js';
import { LedgerContext, emit, requireStrategy } from '../ledger/ledgerContext.js';
import { Distribution, PurchaseResult, VotingLedger } from '../ledger/votingLedger.js';

export interface RouterBuyInput {
  caller: AccountId;
  strategyId: StrategyId;
  expectedEpochId: number;
  deadline: number;
  maxPayment: bigint;
}

export interface RouterReceipt extends PurchaseResult {
  distributions: Distribution[];
  spent: bigint;
  refunded: bigint;
}

export class AtomicRouter {
  constructor(
    private readonly ctx: LedgerContext,
    private readonly ledger: VotingLedger,
  ) {}

  distributeAndBuy(input: RouterBuyInput): RouterReceipt {
    return this.run(input, () => [this.ledger.distribute(input.strategyId)]);
  }

  distributeAllAndBuy(input: RouterBuyInput): RouterReceipt {
    return this.run(input, () => this.ledger.distributeAll());
  }

  private run(input: RouterBuyInput, distribute: () => Distribution[]): RouterReceipt {
    const strategy = requireStrategy(this.ctx, input.strategyId);
    const asset = strategy.paymentAsset;
    const auction = auctionAccount(strategy.id);
    const { assets } = this.ctx;

    assets.transferFrom(asset, ROUTER_ESCROW, input.caller, ROUTER_ESCROW, input.maxPayment);
    const distributions = distribute();

    assets.approve(asset, ROUTER_ESCROW, auction, input.maxPayment);
    const result = this.ledger.buy(strategy.id, {
      payer: ROUTER_ESCROW,
      recipient: input.caller,
      expectedEpochId: input.expectedEpochId,
      deadline: input.deadline,
      maxPayment: input.maxPayment,
    });
    assets.approve(asset, ROUTER_ESCROW, auction, 0n);

    const spent = result.receipt.price;
    const refunded = input.maxPayment - spent;
    assets.transfer(asset, ROUTER_ESCROW, input.caller, refunded);

    emit(this.ctx, 'router.distribute_and_buy', {
      caller: input.caller,
      strategyId: strategy.id,
      epochId: result.receipt.epochId,
      distributed: distributions.reduce((sum, d) => sum + d.amount, 0n).toString(),
      spent: spent.toString(),
      refunded: refunded.toString(),
    });
    return { ...result, distributions, spent, refunded };
  }
}
