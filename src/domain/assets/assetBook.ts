/**
 * In-process fungible asset ledger.
 *
 * Stands in for the token contracts the ledger consumes: plain balances,
 * allowances and a decimals attribute. The ledger only relies on the
 * transfer / transferFrom / balanceOf / decimals contract below.
 */

import { ErrorCode, ledgerError } from '../../errors/taxonomy.js';
import { AccountId, AssetId, AssetRecord } from '../../types.js';
import { isReservedKey, ownValue } from '../../utils/records.js';

export interface FungibleAssetLedger {
  decimals(asset: AssetId): number;
  balanceOf(asset: AssetId, account: AccountId): bigint;
  transfer(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void;
  transferFrom(asset: AssetId, spender: AccountId, from: AccountId, to: AccountId, amount: bigint): void;
}

const MAX_DECIMALS = 36;

const assertAccount = (account: AccountId): void => {
  if (account.trim().length === 0) {
    throw ledgerError(ErrorCode.InvalidAccount, 'Account id must not be empty.');
  }
  if (isReservedKey(account)) {
    throw ledgerError(ErrorCode.InvalidAccount, `Account id ${account} is reserved.`);
  }
};

const assertAmount = (amount: bigint): void => {
  if (amount < 0n) {
    throw ledgerError(ErrorCode.InvalidAmount, 'Amount must not be negative.', { amount: amount.toString() });
  }
};

export class AssetBook implements FungibleAssetLedger {
  constructor(private readonly assets: Record<AssetId, AssetRecord>) {}

  register(id: AssetId, decimals: number): AssetRecord {
    if (id.trim().length === 0 || isReservedKey(id)) {
      throw ledgerError(ErrorCode.InvalidPayload, 'Asset id must be a non-empty, non-reserved name.');
    }
    if (this.has(id)) {
      throw ledgerError(ErrorCode.AssetExists, `Asset ${id} is already registered.`);
    }
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
      throw ledgerError(ErrorCode.InvalidPayload, `Decimals must be an integer in [0, ${MAX_DECIMALS}].`);
    }

    const record: AssetRecord = {
      id,
      decimals,
      totalSupply: 0n,
      balances: {},
      allowances: {},
    };
    this.assets[id] = record;
    return record;
  }

  has(asset: AssetId): boolean {
    return ownValue(this.assets, asset) !== undefined;
  }

  list(): AssetRecord[] {
    return Object.values(this.assets);
  }

  decimals(asset: AssetId): number {
    return this.require(asset).decimals;
  }

  totalSupply(asset: AssetId): bigint {
    return this.require(asset).totalSupply;
  }

  balanceOf(asset: AssetId, account: AccountId): bigint {
    return ownValue(this.require(asset).balances, account) ?? 0n;
  }

  allowance(asset: AssetId, owner: AccountId, spender: AccountId): bigint {
    const granted = ownValue(this.require(asset).allowances, owner);
    return granted ? ownValue(granted, spender) ?? 0n : 0n;
  }

  mint(asset: AssetId, to: AccountId, amount: bigint): void {
    assertAccount(to);
    assertAmount(amount);
    const record = this.require(asset);
    record.balances[to] = (ownValue(record.balances, to) ?? 0n) + amount;
    record.totalSupply += amount;
  }

  approve(asset: AssetId, owner: AccountId, spender: AccountId, amount: bigint): void {
    assertAccount(owner);
    assertAccount(spender);
    assertAmount(amount);
    const record = this.require(asset);
    record.allowances[owner] = { ...(ownValue(record.allowances, owner) ?? {}), [spender]: amount };
  }

  transfer(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void {
    assertAccount(from);
    assertAccount(to);
    assertAmount(amount);
    const record = this.require(asset);

    const balance = ownValue(record.balances, from) ?? 0n;
    if (balance < amount) {
      throw ledgerError(ErrorCode.InsufficientBalance, `Insufficient ${asset} balance.`, {
        account: from,
        balance: balance.toString(),
        required: amount.toString(),
      });
    }
    if (amount === 0n || from === to) return;

    record.balances[from] = balance - amount;
    record.balances[to] = (ownValue(record.balances, to) ?? 0n) + amount;
  }

  transferFrom(asset: AssetId, spender: AccountId, from: AccountId, to: AccountId, amount: bigint): void {
    assertAmount(amount);
    const allowed = this.allowance(asset, from, spender);
    if (allowed < amount) {
      throw ledgerError(ErrorCode.InsufficientAllowance, `Insufficient ${asset} allowance.`, {
        owner: from,
        spender,
        allowance: allowed.toString(),
        required: amount.toString(),
      });
    }

    this.transfer(asset, from, to, amount);
    if (amount > 0n) {
      this.approve(asset, from, spender, allowed - amount);
    }
  }

  private require(asset: AssetId): AssetRecord {
    const record = ownValue(this.assets, asset);
    if (!record) {
      throw ledgerError(ErrorCode.AssetNotFound, `Asset ${asset} is not registered.`);
    }
    return record;
  }
}
