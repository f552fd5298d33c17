import dotenv from "dotenv";
import { ethers } from "ethers";
import { RouterDirectory } from "../types/dex";
import { parseRouterDirectory } from "../services/routers";
import { ConfigError } from "./errors";

export interface BotConfig {
  rpcUrl: string;
  privateKey: string;
  chainId: string;
  tokens: string[];
  baseCurrency: string;
  tradeAmount: string;
  baseCurrencyUsdPrice?: number;
  slippageTolerancePercent: number;
  minSpreadPercent: number;
  minLiquidityUsd: number;
  minVolumeUsd: number;
  cooldownMs: number;
  maxGasLimit: bigint;
  rpcMaxRetries: number;
  rpcBackoffMs: number;
  maxLiquidityImpactPercent: number;
  deadlineSeconds: number;
  txTimeoutMs: number;
  routers: RouterDirectory;
  pollIntervalMs: number;
  observationTtlSeconds: number;
  feedApiUrl: string;
  redisHost: string;
  redisPort: number;
  aggregatorApiUrl: string;
  aggregatorApiKey?: string;
  v2FeeBps: number;
  v3FeeBps: number;
}

type Env = Record<string, string | undefined>;

const required = (env: Env, name: string): string => {
  const value = env[name]?.trim();
  if (!value) throw new ConfigError(`Missing ${name} in environment variables`);
  return value;
};

const optional = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

function numberVar(env: Env, name: string, fallback: number, min: number = 0): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(`${name} must be a number >= ${min}, got '${raw}'`);
  }
  return value;
}

function integerVar(env: Env, name: string, fallback: number, min: number = 0): number {
  const value = numberVar(env, name, fallback, min);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got '${value}'`);
  }
  return value;
}

function addressVar(name: string, raw: string): string {
  if (!ethers.isAddress(raw)) {
    throw new ConfigError(`${name} contains an invalid address '${raw}'`);
  }
  return ethers.getAddress(raw);
}

function routersVar(env: Env): RouterDirectory {
  const raw = optional(env, "DEX_ROUTERS");
  if (raw === undefined) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `DEX_ROUTERS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseRouterDirectory(parsed);
}

/** Reads and validates the bot's settings from `env`. */
export function loadConfig(env: Env): BotConfig {
  const tokens = required(env, "TOKEN_ADDRESSES")
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
    .map((token) => addressVar("TOKEN_ADDRESSES", token));
  if (tokens.length === 0) {
    throw new ConfigError("TOKEN_ADDRESSES must list at least one token");
  }

  const tradeAmount = required(env, "TRADE_AMOUNT_BASE_TOKEN");
  if (!/^\d+(\.\d+)?$/.test(tradeAmount) || !(Number(tradeAmount) > 0)) {
    throw new ConfigError(`TRADE_AMOUNT_BASE_TOKEN must be a positive decimal, got '${tradeAmount}'`);
  }

  const rawKey = required(env, "PRIVATE_KEY");
  const privateKey = rawKey.startsWith("0x") ? rawKey : `0x${rawKey}`;
  if (!ethers.isHexString(privateKey, 32)) {
    throw new ConfigError("PRIVATE_KEY must be a 32-byte hex string");
  }

  const slippageTolerancePercent = numberVar(env, "SLIPPAGE_TOLERANCE_PERCENT", 1);
  if (slippageTolerancePercent >= 100) {
    throw new ConfigError("SLIPPAGE_TOLERANCE_PERCENT must be below 100");
  }

  const usdPrice = optional(env, "BASE_CURRENCY_USD_PRICE");

  return {
    rpcUrl: required(env, "RPC_URL"),
    privateKey,
    chainId: optional(env, "CHAIN_ID") ?? "base",
    tokens,
    baseCurrency: addressVar("BASE_CURRENCY_ADDRESS", required(env, "BASE_CURRENCY_ADDRESS")),
    tradeAmount,
    baseCurrencyUsdPrice:
      usdPrice === undefined ? undefined : numberVar(env, "BASE_CURRENCY_USD_PRICE", 0),
    slippageTolerancePercent,
    minSpreadPercent: numberVar(env, "MIN_SPREAD_PERCENT", 1),
    minLiquidityUsd: numberVar(env, "MIN_LIQUIDITY_USD", 1000),
    minVolumeUsd: numberVar(env, "MIN_VOLUME_USD", 0),
    cooldownMs: numberVar(env, "TRADE_COOLDOWN_SECONDS", 60) * 1000,
    maxGasLimit: BigInt(integerVar(env, "MAX_GAS_LIMIT", 500_000, 21_000)),
    rpcMaxRetries: integerVar(env, "RPC_MAX_RETRIES", 5, 1),
    rpcBackoffMs: numberVar(env, "RPC_BACKOFF_MS", 500),
    maxLiquidityImpactPercent: numberVar(env, "MAX_LIQUIDITY_IMPACT_PERCENT", 10),
    deadlineSeconds: integerVar(env, "DEADLINE_SECONDS", 300, 1),
    txTimeoutMs: numberVar(env, "TX_TIMEOUT_SECONDS", 120, 1) * 1000,
    routers: routersVar(env),
    pollIntervalMs: integerVar(env, "POLL_INTERVAL_MS", 5000, 100),
    observationTtlSeconds: integerVar(env, "OBSERVATION_TTL_SECONDS", 30, 1),
    feedApiUrl: optional(env, "FEED_API_URL") ?? "https://api.dexscreener.com",
    redisHost: optional(env, "REDIS_HOST") ?? "localhost",
    redisPort: integerVar(env, "REDIS_PORT", 6379, 1),
    aggregatorApiUrl: optional(env, "AGGREGATOR_API_URL") ?? "https://api.1inch.dev/swap/v6.0/8453",
    aggregatorApiKey: optional(env, "AGGREGATOR_API_KEY"),
    v2FeeBps: numberVar(env, "V2_FEE_BPS", 20),
    v3FeeBps: numberVar(env, "V3_FEE_BPS", 30),
  };
}

/** Loads `.env` into the process environment, then validates it. */
export function loadConfigFromEnv(): BotConfig {
  dotenv.config();
  return loadConfig(process.env);
}
