import dotenv from 'dotenv';
import path from 'node:path';
import { BribeDustPolicy } from './types.js';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseDustPolicy = (input: string | undefined): BribeDustPolicy => {
  if (input === 'receiver' || input === 'treasury') return input;
  return 'hold';
};

export interface AssetSeed {
  id: string;
  decimals: number;
}

/** Parses `ID:decimals` pairs, e.g. `REV:18,USDC:6`. */
const parseAssets = (input: string): AssetSeed[] => input
  .split(',')
  .map((entry) => entry.trim())
  .filter(Boolean)
  .map((entry) => {
    const [id, decimals] = entry.split(':');
    return { id: (id ?? '').trim(), decimals: parseNumber(decimals, 18) };
  })
  .filter((seed) => seed.id.length > 0);

const DAY_SECONDS = 86_400;

export const config = {
  app: {
    name: 'revenue-governance-ledger',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'ledger-state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  storage: {
    persist: parseBool(process.env.PERSIST_STATE, true),
    logToFile: parseBool(process.env.LOG_TO_FILE, true),
  },
  ledger: {
    owner: process.env.LEDGER_OWNER ?? 'owner',
    treasury: process.env.LEDGER_TREASURY ?? 'treasury',
    revenueSource: process.env.LEDGER_REVENUE_SOURCE ?? null,
    revenueAsset: process.env.LEDGER_REVENUE_ASSET ?? 'REV',
    underlyingAsset: process.env.LEDGER_UNDERLYING_ASSET ?? 'VOTE',
    assets: parseAssets(process.env.LEDGER_ASSETS ?? 'REV:18,VOTE:18,USDC:6'),
    epochClockSeconds: parseNumber(process.env.EPOCH_CLOCK_SECONDS, 7 * DAY_SECONDS),
    rewardDurationSeconds: parseNumber(process.env.REWARD_DURATION_SECONDS, 7 * DAY_SECONDS),
    maxBribeSplitBps: parseNumber(process.env.MAX_BRIBE_SPLIT_BPS, 5000),
    bribeDustPolicy: parseDustPolicy(process.env.BRIBE_DUST_POLICY),
  },
  rateLimit: {
    writesPerMinute: parseNumber(process.env.RATE_LIMIT_WRITES_PER_MINUTE, 120),
  },
};

export type AppConfig = typeof config;
