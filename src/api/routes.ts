import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { DomainError, ErrorCode, ledgerError, toErrorEnvelope } from '../errors/taxonomy.js';
import { LedgerService } from '../services/ledgerService.js';
import { AccountId, RuntimeMetrics } from '../types.js';
import { toJsonSafe } from '../utils/json.js';
import { isReservedKey } from '../utils/records.js';
import { RateLimiter } from './rateLimiter.js';

interface RouteDeps {
  config: AppConfig;
  ledgerService: LedgerService;
  rateLimiter: RateLimiter;
  getRuntimeMetrics: () => RuntimeMetrics;
}

export const ACCOUNT_HEADER = 'x-account-id';

// ─── Schemas ────────────────────────────────────────────────────────────────

const notReserved = (value: string): boolean => !isReservedKey(value);
const accountId = z.string().trim().min(1).max(128).refine(notReserved, 'account id is a reserved name');
const assetId = z.string().trim().min(1).max(64).refine(notReserved, 'asset id is a reserved name');
const strategyId = z.string().min(1).max(64);
const amount = z.string().regex(/^\d+$/, 'amount must be a base-unit integer string').transform((value) => BigInt(value));
const unixSeconds = z.number().int().nonnegative();
const rangeBound = z.coerce.number().int().nonnegative();

const rangeSchema = z.object({ start: z.number().int().nonnegative(), end: z.number().int().nonnegative() });

const selectionSchema = z.object({
  strategies: z.array(strategyId).optional(),
  range: rangeSchema.optional(),
}).refine((body) => !(body.strategies && body.range), {
  message: 'give either strategies or range, not both',
});

const registerAssetSchema = z.object({
  id: assetId,
  decimals: z.number().int().min(0).max(36),
});

const assetAmountSchema = z.object({ asset: assetId, to: accountId, amount });
const approveSchema = z.object({ asset: assetId, spender: accountId, amount });
const amountSchema = z.object({ amount });

const addStrategySchema = z.object({
  paymentAsset: assetId,
  paymentReceiver: accountId,
  initPrice: amount,
  epochPeriod: z.number().int().positive(),
  priceMultiplier: amount,
  minInitPrice: amount,
  description: z.string().max(280).optional(),
});

const strategyParamsSchema = z.object({ id: strategyId });
const rewardAssetSchema = z.object({ id: strategyId, asset: assetId });
const notifyRewardSchema = z.object({ id: strategyId, asset: assetId, amount });

const voteSchema = z.object({
  strategies: z.array(strategyId).max(256),
  weights: z.array(amount).max(256),
});

const claimSchema = z.object({ strategies: z.array(strategyId).min(1).max(256) });

const notifyRevenueSchema = z.object({
  amount,
  distribute: z.boolean().optional(),
});

const buySchema = z.object({
  id: strategyId,
  expectedEpochId: z.number().int().nonnegative(),
  deadline: unixSeconds,
  maxPayment: amount,
  recipient: accountId.optional(),
});

const routerSchema = z.object({
  strategyId,
  expectedEpochId: z.number().int().nonnegative(),
  deadline: unixSeconds,
  maxPayment: amount,
  distributeAll: z.boolean().optional(),
});

const accountQuerySchema = z.object({ account: accountId.optional() });
const strategyQuerySchema = z.object({ id: strategyId, account: accountId.optional() });
const cardsQuerySchema = z.object({
  account: accountId.optional(),
  start: rangeBound.optional(),
  end: rangeBound.optional(),
});
const balanceQuerySchema = z.object({ asset: assetId, account: accountId });

// ─── Helpers ────────────────────────────────────────────────────────────────

const asRecord = (value: unknown): Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {}
);

/** Route params, query and JSON body merged into one object for validation. */
const requestInput = (request: FastifyRequest): Record<string, unknown> => ({
  ...asRecord(request.query),
  ...asRecord(request.body),
  ...asRecord(request.params),
});

const headerCaller = (request: FastifyRequest): AccountId | undefined => {
  const raw = request.headers[ACCOUNT_HEADER];
  return (Array.isArray(raw) ? raw[0] : raw)?.trim() || undefined;
};

const callerOf = (request: FastifyRequest): AccountId => {
  const value = headerCaller(request);
  if (!value) {
    throw ledgerError(ErrorCode.InvalidAccount, `The ${ACCOUNT_HEADER} header is required.`);
  }
  return value;
};

const sendDomainError = (reply: FastifyReply, error: unknown): FastifyReply => {
  if (error instanceof DomainError) {
    return reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
  }

  return reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

type Handler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>;

/** Validates the request, runs a read and serializes bigints as strings. */
const query = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  run: (input: T) => unknown,
): Handler => async (request, reply) => {
  const parse = schema.safeParse(requestInput(request));
  if (!parse.success) {
    return reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidPayload, 'Invalid request', parse.error.flatten()));
  }
  try {
    return reply.send(toJsonSafe(run(parse.data)));
  } catch (error) {
    return sendDomainError(reply, error);
  }
};

/** Validates the request, runs a write as the header's account and serializes the result. */
const command = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  run: (caller: AccountId, input: T) => Promise<unknown>,
): Handler => async (request, reply) => {
  const parse = schema.safeParse(requestInput(request));
  if (!parse.success) {
    return reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidPayload, 'Invalid payload', parse.error.flatten()));
  }
  try {
    const result = await run(callerOf(request), parse.data);
    return reply.send(toJsonSafe(result ?? { ok: true }));
  } catch (error) {
    return sendDomainError(reply, error);
  }
};

// ─── Routes ─────────────────────────────────────────────────────────────────

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { ledgerService: ledger } = deps;

  app.addHook('preHandler', async (request, reply) => {
    if (request.method === 'GET' || request.method === 'HEAD') return;
    const caller = headerCaller(request);
    if (!caller) return;

    const limit = deps.rateLimiter.check(caller);
    if (!limit.allowed) {
      return reply
        .code(429)
        .header('retry-after', String(limit.retryAfterSeconds ?? 60))
        .send(toErrorEnvelope(ErrorCode.RateLimited, 'Too many write requests.', {
          limit: limit.limit,
          retryAfterSeconds: limit.retryAfterSeconds,
        }));
    }
  });

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '1.0.0',
    status: 'ok',
  }));

  app.get('/health', async () => ({ status: 'ok', ...deps.getRuntimeMetrics() }));

  app.get('/metrics', async () => toJsonSafe({
    runtime: deps.getRuntimeMetrics(),
    ledger: ledger.metrics(),
    rateLimit: deps.rateLimiter.getMetrics(),
  }));

  // ─── Views ──────────────────────────────────────────────────────────────

  app.get('/ledger', query(accountQuerySchema, ({ account }) => ledger.views().ledgerSummary(account)));

  app.get('/strategies', query(cardsQuerySchema, ({ account, start, end }) => {
    const views = ledger.views();
    if (start === undefined && end === undefined) return { strategies: views.allStrategyCards(account) };
    const total = views.ledgerSummary().strategyCount;
    return { strategies: views.strategyCards(start ?? 0, end ?? total, account) };
  }));

  app.get('/strategies/:id', query(strategyQuerySchema, ({ id, account }) => ledger.views().strategyCard(id, account)));

  app.get('/strategies/:id/rewards', query(strategyQuerySchema, ({ id, account }) => ledger.views().rewardCard(id, account)));

  app.get('/rewards', query(cardsQuerySchema, ({ account, start, end }) => {
    const views = ledger.views();
    if (start === undefined && end === undefined) return { rewards: views.allRewardCards(account) };
    const total = views.ledgerSummary().strategyCount;
    return { rewards: views.rewardCards(start ?? 0, end ?? total, account) };
  }));

  app.get('/assets', query(z.object({}), () => ({
    assets: ledger.read(({ assets }) => assets.list().map((asset) => ({
      id: asset.id,
      decimals: asset.decimals,
      totalSupply: asset.totalSupply,
    }))),
  })));

  app.get('/assets/:asset/balances/:account', query(balanceQuerySchema, ({ asset, account }) => ledger.read(({ assets }) => ({
    asset,
    account,
    balance: assets.balanceOf(asset, account),
  }))));

  // ─── Assets and staking ─────────────────────────────────────────────────

  app.post('/assets', command(registerAssetSchema, (caller, body) => ledger.registerAsset(caller, body.id, body.decimals)));

  app.post('/assets/:asset/mint', command(assetAmountSchema, async (caller, body) => ({
    balance: await ledger.mint(caller, body.asset, body.to, body.amount),
  })));

  app.post('/assets/:asset/transfer', command(assetAmountSchema, async (caller, body) => ({
    balance: await ledger.transfer(caller, body.asset, body.to, body.amount),
  })));

  app.post('/assets/:asset/approve', command(approveSchema, async (caller, body) => ({
    allowance: await ledger.approve(caller, body.asset, body.spender, body.amount),
  })));

  app.post('/stake', command(amountSchema, async (caller, body) => ({
    staked: await ledger.stake(caller, body.amount),
  })));

  app.post('/unstake', command(amountSchema, async (caller, body) => ({
    staked: await ledger.unstake(caller, body.amount),
  })));

  // ─── Administration ─────────────────────────────────────────────────────

  app.put('/settings/revenue-source', command(z.object({ account: accountId }), (caller, body) => (
    ledger.setRevenueSource(caller, body.account)
  )));

  app.put('/settings/bribe-split', command(z.object({ bps: z.number().int().nonnegative() }), (caller, body) => (
    ledger.setBribeSplit(caller, BigInt(body.bps))
  )));

  app.post('/strategies', command(addStrategySchema, (caller, body) => ledger.addStrategy(caller, body)));

  app.post('/strategies/:id/kill', command(strategyParamsSchema, async (caller, { id }) => ({
    sweptToTreasury: await ledger.killStrategy(caller, id),
  })));

  app.post('/strategies/:id/reward-assets', command(rewardAssetSchema, (caller, body) => (
    ledger.addRewardAsset(caller, body.id, body.asset)
  )));

  // ─── Voting and rewards ─────────────────────────────────────────────────

  app.post('/votes', command(voteSchema, (caller, body) => ledger.vote(caller, body.strategies, body.weights)));

  app.post('/votes/reset', command(z.object({}), (caller) => ledger.reset(caller)));

  app.post('/rewards/claim', command(claimSchema, async (caller, body) => ({
    claimed: await ledger.claimRewards(caller, body.strategies),
  })));

  app.post('/strategies/:id/rewards/notify', command(notifyRewardSchema, (caller, body) => (
    ledger.notifyRewardAmount(caller, body.id, body.asset, body.amount)
  )));

  app.post('/strategies/:id/rewards/distribute', command(strategyParamsSchema, (caller, { id }) => (
    ledger.distributeRewardPot(caller, id)
  )));

  // ─── Revenue and distribution ───────────────────────────────────────────

  app.post('/revenue/notify', command(notifyRevenueSchema, (caller, body) => (
    body.distribute ? ledger.notifyAndDistribute(caller, body.amount) : ledger.notifyRevenue(caller, body.amount)
  )));

  app.post('/strategies/:id/update', command(strategyParamsSchema, async (caller, { id }) => ({
    accrued: await ledger.updateStrategy(caller, id),
  })));

  app.post('/update', command(selectionSchema, (caller, body) => {
    if (body.strategies) return ledger.updateFor(caller, body.strategies);
    if (body.range) return ledger.updateForRange(caller, body.range.start, body.range.end);
    return ledger.updateAll(caller);
  }));

  app.post('/strategies/:id/distribute', command(strategyParamsSchema, (caller, { id }) => ledger.distribute(caller, id)));

  app.post('/distribute', command(selectionSchema, async (caller, body) => {
    if (body.strategies) return { distributions: await ledger.distributeMany(caller, body.strategies) };
    if (body.range) return { distributions: await ledger.distributeRange(caller, body.range.start, body.range.end) };
    return { distributions: await ledger.distributeAll(caller) };
  }));

  // ─── Auctions ───────────────────────────────────────────────────────────

  app.post('/strategies/:id/buy', command(buySchema, (caller, { id, ...request }) => ledger.buy(caller, id, request)));

  app.post('/router/distribute-and-buy', command(routerSchema, (caller, { strategyId: id, distributeAll, ...request }) => (
    distributeAll ? ledger.distributeAllAndBuy(caller, id, request) : ledger.distributeAndBuy(caller, id, request)
  )));
}
