import axios from "axios";
import { PoolObservation } from "../types/dex";
import { ObservationStore } from "./store";
import {
  logFeedDebug,
  logFeedError,
  logFeedInfo,
  logFeedWarn,
} from "../utils/logger";

export interface DexScreenerToken {
  address: string;
  symbol?: string;
}

export interface DexScreenerPair {
  chainId: string;
  dexId: string;
  pairAddress: string;
  labels?: string[];
  baseToken: DexScreenerToken;
  quoteToken: DexScreenerToken;
  priceNative: string;
  priceUsd?: string;
  liquidity?: { usd?: number };
  volume?: { h24?: number };
}

interface DexScreenerResponse {
  pairs: DexScreenerPair[] | null;
}

export interface PriceFeedOptions {
  apiUrl: string;
  chainId: string;
  baseCurrency: string;
  minLiquidityUsd: number;
  minVolumeUsd: number;
  v2FeeBps: number;
  v3FeeBps: number;
  ttlSeconds: number;
}

const same = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

/**
 * Converts a feed pair into an observation of `token` priced in the base
 * currency. Pairs on other chains, against other quote assets, or below the
 * liquidity/volume floors yield null.
 */
export function toObservation(
  pair: DexScreenerPair,
  token: string,
  options: PriceFeedOptions,
  observedAt: number = Date.now()
): PoolObservation | null {
  if (pair.chainId !== options.chainId) return null;

  const quoted = Number(pair.priceNative);
  if (!(quoted > 0)) return null;

  let priceNative: number;
  let priceUsd: number | undefined;
  if (same(pair.baseToken.address, token) && same(pair.quoteToken.address, options.baseCurrency)) {
    priceNative = quoted;
    priceUsd = pair.priceUsd !== undefined ? Number(pair.priceUsd) : undefined;
  } else if (
    same(pair.baseToken.address, options.baseCurrency) &&
    same(pair.quoteToken.address, token)
  ) {
    // Inverted pair: the feed prices the base currency in the token.
    priceNative = 1 / quoted;
    priceUsd =
      pair.priceUsd !== undefined ? Number(pair.priceUsd) * priceNative : undefined;
  } else {
    return null;
  }

  const liquidityUsd = pair.liquidity?.usd ?? 0;
  const volume24hUsd = pair.volume?.h24 ?? 0;
  if (liquidityUsd < options.minLiquidityUsd || volume24hUsd < options.minVolumeUsd) {
    return null;
  }

  const labels = (pair.labels ?? []).map((label) => label.toLowerCase());
  const stableFlag = labels.includes("stable")
    ? true
    : labels.includes("volatile")
      ? false
      : undefined;

  return {
    venueId: pair.dexId,
    priceNative,
    priceUsd: priceUsd !== undefined && Number.isFinite(priceUsd) ? priceUsd : undefined,
    liquidityUsd,
    volume24hUsd,
    feeBasisPoints: labels.includes("v3") ? options.v3FeeBps : options.v2FeeBps,
    pairOrPoolAddress: pair.pairAddress,
    stableFlag,
    observedAt,
  };
}

export class PriceService {
  private isRunning: boolean = false;

  constructor(
    private readonly store: ObservationStore,
    private readonly tokens: string[],
    private readonly options: PriceFeedOptions
  ) {}

  async fetchObservations(token: string): Promise<PoolObservation[]> {
    const response = await axios.get<DexScreenerResponse>(
      `${this.options.apiUrl}/latest/dex/tokens/${token}`,
      { timeout: 10_000 }
    );
    const now = Date.now();
    return (response.data.pairs ?? [])
      .map((pair) => toObservation(pair, token, this.options, now))
      .filter((observation): observation is PoolObservation => observation !== null);
  }

  async startPriceUpdates(interval: number = 1000): Promise<void> {
    if (this.isRunning) {
      logFeedWarn("Price updates already running");
      return;
    }

    this.isRunning = true;
    logFeedInfo("Starting price feed");

    while (this.isRunning) {
      try {
        await this.updateAllPrices();
        await new Promise((resolve) => setTimeout(resolve, interval));
      } catch (error) {
        logFeedError("Error in price update loop", error);
        await new Promise((resolve) => setTimeout(resolve, interval * 2));
      }
    }
  }

  async updateAllPrices(): Promise<void> {
    for (const token of this.tokens) {
      try {
        const observations = await this.fetchObservations(token);
        await this.store.save(token, observations, this.options.ttlSeconds);
        logFeedDebug(`Stored ${observations.length} pools for ${token}`);
      } catch (err) {
        if (axios.isAxiosError(err) && err.response) {
          logFeedError(`Feed API error for ${token}`, err.response.status);
        } else {
          logFeedError(`Error fetching pools for ${token}`, err);
        }
      }
    }
  }

  stop(): void {
    this.isRunning = false;
    logFeedInfo("Stopping price feed");
  }
}
