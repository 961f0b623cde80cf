import { ErrorCode, ledgerError } from '../../errors/taxonomy.js';
import { AccountId } from '../../types.js';
import { STAKE_VAULT } from '../ledger/accounts.js';
import { LedgerContext, emit } from '../ledger/ledgerContext.js';
import { VotingPowerSource } from '../ledger/votingLedger.js';
import { ownValue } from '../../utils/records.js';

/**
 * Locks the underlying asset and credits non-transferable voting power 1:1.
 * Stake cannot leave while the account has weight allocated.
 */
export class StakeVault implements VotingPowerSource {
  constructor(private readonly ctx: LedgerContext) {}

  get totalStaked(): bigint {
    return this.ctx.state.staking.totalStaked;
  }

  balanceOf(account: AccountId): bigint {
    return ownValue(this.ctx.state.staking.stakes, account) ?? 0n;
  }

  stake(account: AccountId, amount: bigint): bigint {
    if (amount <= 0n) {
      throw ledgerError(ErrorCode.InvalidAmount, 'Stake amount must be positive.');
    }
    const { staking } = this.ctx.state;
    this.ctx.assets.transfer(staking.underlyingAsset, account, STAKE_VAULT, amount);

    const balance = this.balanceOf(account) + amount;
    staking.stakes[account] = balance;
    staking.totalStaked += amount;

    emit(this.ctx, 'stake.deposited', { account, amount: amount.toString(), balance: balance.toString() });
    return balance;
  }

  unstake(account: AccountId, amount: bigint): bigint {
    if (amount <= 0n) {
      throw ledgerError(ErrorCode.InvalidAmount, 'Unstake amount must be positive.');
    }
    const usedWeight = ownValue(this.ctx.state.accounts, account)?.usedWeight ?? 0n;
    if (usedWeight > 0n) {
      throw ledgerError(ErrorCode.VotesActive, 'Reset votes before unstaking.', { usedWeight: usedWeight.toString() });
    }
    const current = this.balanceOf(account);
    if (current < amount) {
      throw ledgerError(ErrorCode.InsufficientStake, 'Unstake amount exceeds stake.', {
        staked: current.toString(),
        requested: amount.toString(),
      });
    }

    const { staking } = this.ctx.state;
    const balance = current - amount;
    staking.stakes[account] = balance;
    staking.totalStaked -= amount;
    this.ctx.assets.transfer(staking.underlyingAsset, STAKE_VAULT, account, amount);

    emit(this.ctx, 'stake.withdrawn', { account, amount: amount.toString(), balance: balance.toString() });
    return balance;
  }
}
