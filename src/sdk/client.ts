// ─── LedgerAPIClient ───────────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the revenue governance ledger.
// Works in Node.js 20+ (uses native fetch).
// ────────────────────────────────────────────────────────────────────────────

import type {
  AddStrategyInput,
  AmountInput,
  APIErrorEnvelope,
  BuyOptions,
  Distribution,
  HealthResponse,
  LedgerSummary,
  OkResponse,
  PotSettlement,
  PurchaseResult,
  ResetResult,
  RevenueNotice,
  RewardCard,
  RewardNotification,
  RouterReceipt,
  Selection,
  Strategy,
  StrategyCard,
  VoteResult,
} from './types.js';

export class LedgerAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'LedgerAPIError';
  }
}

export interface LedgerAPIClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Account the client acts as; sent as the x-account-id header on every request. */
  account?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (value: unknown): value is APIErrorEnvelope => (
  typeof value === 'object'
  && value !== null
  && 'error' in value
  && typeof value.error === 'object'
  && value.error !== null
  && 'code' in value.error
  && typeof value.error.code === 'string'
  && 'message' in value.error
  && typeof value.error.message === 'string'
);

const amount = (value: AmountInput): string => (typeof value === 'bigint' ? value.toString() : value);

const withQuery = (path: string, params: Record<string, string | number | undefined>): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const qs = search.toString();
  return qs ? `${path}?${qs}` : path;
};

export class LedgerAPIClient {
  private readonly baseUrl: string;
  private readonly account?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, account?: string);
  constructor(opts: LedgerAPIClientOptions);
  constructor(baseUrlOrOpts: string | LedgerAPIClientOptions, account?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.account = account;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.account = baseUrlOrOpts.account;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** A client for the same server acting as another account. */
  as(account: string): LedgerAPIClient {
    return new LedgerAPIClient({ baseUrl: this.baseUrl, account, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.account) h['x-account-id'] = this.account;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    const payload: unknown = await res.json().catch((error: unknown) => {
      if (res.ok) throw error;
      return undefined;
    });

    if (!res.ok) {
      const envelope = isErrorEnvelope(payload) ? payload.error : undefined;
      throw new LedgerAPIError(
        res.status,
        envelope?.code ?? `HTTP_${res.status}`,
        envelope?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.details,
      );
    }

    return payload as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body: unknown = {}): Promise<T> {
    return this.request<T>('POST', path, body);
  }

  private put<T>(path: string, body: unknown): Promise<T> {
    return this.request<T>('PUT', path, body);
  }

  // ─── Views ─────────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }

  /** Ledger summary, with this client's account details when it has one. */
  async ledger(account = this.account): Promise<LedgerSummary> {
    return this.get<LedgerSummary>(withQuery('/ledger', { account }));
  }

  async strategies(range?: { start: number; end: number }, account = this.account): Promise<StrategyCard[]> {
    const res = await this.get<{ strategies: StrategyCard[] }>(withQuery('/strategies', { account, ...range }));
    return res.strategies;
  }

  async strategy(strategyId: string, account = this.account): Promise<StrategyCard> {
    return this.get<StrategyCard>(withQuery(`/strategies/${encodeURIComponent(strategyId)}`, { account }));
  }

  async rewardCard(strategyId: string, account = this.account): Promise<RewardCard> {
    return this.get<RewardCard>(withQuery(`/strategies/${encodeURIComponent(strategyId)}/rewards`, { account }));
  }

  async rewardCards(range?: { start: number; end: number }, account = this.account): Promise<RewardCard[]> {
    const res = await this.get<{ rewards: RewardCard[] }>(withQuery('/rewards', { account, ...range }));
    return res.rewards;
  }

  async balance(asset: string, account: string): Promise<string> {
    const res = await this.get<{ balance: string }>(
      `/assets/${encodeURIComponent(asset)}/balances/${encodeURIComponent(account)}`,
    );
    return res.balance;
  }

  // ─── Assets and staking ────────────────────────────────────────────────

  async approve(asset: string, spender: string, value: AmountInput): Promise<string> {
    const res = await this.post<{ allowance: string }>(`/assets/${encodeURIComponent(asset)}/approve`, {
      spender,
      amount: amount(value),
    });
    return res.allowance;
  }

  async transfer(asset: string, to: string, value: AmountInput): Promise<string> {
    const res = await this.post<{ balance: string }>(`/assets/${encodeURIComponent(asset)}/transfer`, {
      to,
      amount: amount(value),
    });
    return res.balance;
  }

  async mint(asset: string, to: string, value: AmountInput): Promise<string> {
    const res = await this.post<{ balance: string }>(`/assets/${encodeURIComponent(asset)}/mint`, {
      to,
      amount: amount(value),
    });
    return res.balance;
  }

  async stake(value: AmountInput): Promise<string> {
    const res = await this.post<{ staked: string }>('/stake', { amount: amount(value) });
    return res.staked;
  }

  async unstake(value: AmountInput): Promise<string> {
    const res = await this.post<{ staked: string }>('/unstake', { amount: amount(value) });
    return res.staked;
  }

  // ─── Administration ────────────────────────────────────────────────────

  async setRevenueSource(account: string): Promise<OkResponse> {
    return this.put<OkResponse>('/settings/revenue-source', { account });
  }

  async setBribeSplit(bps: number): Promise<OkResponse> {
    return this.put<OkResponse>('/settings/bribe-split', { bps });
  }

  async addStrategy(input: AddStrategyInput): Promise<Strategy> {
    return this.post<Strategy>('/strategies', {
      ...input,
      initPrice: amount(input.initPrice),
      priceMultiplier: amount(input.priceMultiplier),
      minInitPrice: amount(input.minInitPrice),
    });
  }

  async killStrategy(strategyId: string): Promise<{ sweptToTreasury: string }> {
    return this.post<{ sweptToTreasury: string }>(`/strategies/${encodeURIComponent(strategyId)}/kill`);
  }

  async addRewardAsset(strategyId: string, asset: string): Promise<OkResponse> {
    return this.post<OkResponse>(`/strategies/${encodeURIComponent(strategyId)}/reward-assets`, { asset });
  }

  // ─── Voting and rewards ────────────────────────────────────────────────

  async vote(strategies: string[], weights: AmountInput[]): Promise<VoteResult> {
    return this.post<VoteResult>('/votes', { strategies, weights: weights.map(amount) });
  }

  async reset(): Promise<ResetResult> {
    return this.post<ResetResult>('/votes/reset');
  }

  async claimRewards(strategies: string[]): Promise<Record<string, Record<string, string>>> {
    const res = await this.post<{ claimed: Record<string, Record<string, string>> }>('/rewards/claim', { strategies });
    return res.claimed;
  }

  async notifyRewardAmount(strategyId: string, asset: string, value: AmountInput): Promise<RewardNotification> {
    return this.post<RewardNotification>(`/strategies/${encodeURIComponent(strategyId)}/rewards/notify`, {
      asset,
      amount: amount(value),
    });
  }

  async distributeRewardPot(strategyId: string): Promise<PotSettlement> {
    return this.post<PotSettlement>(`/strategies/${encodeURIComponent(strategyId)}/rewards/distribute`);
  }

  // ─── Revenue and distribution ──────────────────────────────────────────

  async notifyRevenue(value: AmountInput): Promise<RevenueNotice> {
    return this.post<RevenueNotice>('/revenue/notify', { amount: amount(value) });
  }

  async notifyAndDistribute(value: AmountInput): Promise<{ notice: RevenueNotice; distributions: Distribution[] }> {
    return this.post<{ notice: RevenueNotice; distributions: Distribution[] }>('/revenue/notify', {
      amount: amount(value),
      distribute: true,
    });
  }

  async updateStrategy(strategyId: string): Promise<{ accrued: string }> {
    return this.post<{ accrued: string }>(`/strategies/${encodeURIComponent(strategyId)}/update`);
  }

  /** Updates the selection, or every strategy when none is given. */
  async update(selection: Selection = {}): Promise<OkResponse> {
    return this.post<OkResponse>('/update', selection);
  }

  async distribute(strategyId: string): Promise<Distribution> {
    return this.post<Distribution>(`/strategies/${encodeURIComponent(strategyId)}/distribute`);
  }

  /** Distributes the selection, or every strategy when none is given. */
  async distributeMany(selection: Selection = {}): Promise<Distribution[]> {
    const res = await this.post<{ distributions: Distribution[] }>('/distribute', selection);
    return res.distributions;
  }

  // ─── Auctions ──────────────────────────────────────────────────────────

  async buy(strategyId: string, opts: BuyOptions): Promise<PurchaseResult> {
    return this.post<PurchaseResult>(`/strategies/${encodeURIComponent(strategyId)}/buy`, {
      ...opts,
      maxPayment: amount(opts.maxPayment),
    });
  }

  async distributeAndBuy(strategyId: string, opts: Omit<BuyOptions, 'recipient'>, distributeAll = false): Promise<RouterReceipt> {
    return this.post<RouterReceipt>('/router/distribute-and-buy', {
      strategyId,
      expectedEpochId: opts.expectedEpochId,
      deadline: opts.deadline,
      maxPayment: amount(opts.maxPayment),
      distributeAll,
    });
  }
}
