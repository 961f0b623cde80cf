/** Names of the events committed ledger operations publish. */
export type LedgerEventType =
  | 'asset.registered'
  | 'asset.minted'
  | 'asset.transferred'
  | 'asset.approved'
  | 'stake.deposited'
  | 'stake.withdrawn'
  | 'settings.revenue_source'
  | 'settings.bribe_split'
  | 'strategy.added'
  | 'strategy.killed'
  | 'strategy.distributed'
  | 'reward.asset_added'
  | 'vote.cast'
  | 'vote.reset'
  | 'revenue.notified'
  | 'revenue.to_treasury'
  | 'auction.purchased'
  | 'rewards.notified'
  | 'rewards.pot_held'
  | 'rewards.pot_forwarded'
  | 'rewards.claimed'
  | 'router.distribute_and_buy';

export interface LedgerEvent {
  type: LedgerEventType;
  data: Record<string, unknown>;
}
