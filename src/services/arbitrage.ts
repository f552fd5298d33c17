import { PoolObservation } from "../types/dex";
import { ArbitrageOpportunity, TradeOutcome } from "../types/trade";
import { ObservationStore } from "./store";
import { TradeExecutor } from "./trade";
import {
  logError,
  logInfo,
  logTrade,
  logTradeDebug,
  logTradeError,
  logTradeWarn,
} from "../utils/logger";

export interface SpreadCandidate {
  buy: PoolObservation;
  sell: PoolObservation;
  spreadPercent: number;
}

/**
 * Percentage gained by buying on `buy` and selling on `sell` after both
 * pools' swap fees.
 */
export function feeAdjustedSpread(buy: PoolObservation, sell: PoolObservation): number {
  const cost = buy.priceNative * (1 + buy.feeBasisPoints / 10_000);
  const proceeds = sell.priceNative * (1 - sell.feeBasisPoints / 10_000);
  return ((proceeds - cost) / cost) * 100;
}

/** Best buy/sell pairing across distinct pools, or undefined with fewer than two. */
export function findBestSpread(
  observations: PoolObservation[],
  minLiquidityUsd: number = 0
): SpreadCandidate | undefined {
  const pools = observations.filter(
    (p) => p.priceNative > 0 && p.liquidityUsd >= minLiquidityUsd
  );

  let best: SpreadCandidate | undefined;
  for (const buy of pools) {
    for (const sell of pools) {
      if (buy.pairOrPoolAddress.toLowerCase() === sell.pairOrPoolAddress.toLowerCase()) {
        continue;
      }
      const spreadPercent = feeAdjustedSpread(buy, sell);
      if (!best || spreadPercent > best.spreadPercent) {
        best = { buy, sell, spreadPercent };
      }
    }
  }
  return best;
}

export interface ArbitrageOptions {
  minSpreadPercent: number;
  minLiquidityUsd: number;
  /** Observations older than this are ignored. */
  maxObservationAgeMs: number;
  now?: () => number;
}

/** The part of the orchestrator the scanner drives. */
export type AttemptRunner = Pick<TradeExecutor, "canStartAttempt" | "execute">;

export class ArbitrageService {
  private isRunning: boolean = false;
  private cursor: number = 0;
  private readonly now: () => number;

  constructor(
    private readonly store: ObservationStore,
    private readonly executor: AttemptRunner,
    private readonly tokens: string[],
    private readonly options: ArbitrageOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Evaluates one token's observations and starts a trade attempt when the
   * fee-adjusted spread reaches the threshold.
   */
  async evaluate(
    token: string,
    observations: PoolObservation[]
  ): Promise<TradeOutcome | undefined> {
    const now = this.now();
    if (!this.executor.canStartAttempt(now)) {
      logTradeDebug(`Skipping ${token}: executor busy or cooling down`);
      return undefined;
    }

    const fresh = observations.filter(
      (p) => now - p.observedAt <= this.options.maxObservationAgeMs
    );
    const candidate = findBestSpread(fresh, this.options.minLiquidityUsd);
    if (!candidate) {
      logTradeDebug(`Not enough pools for ${token}`);
      return undefined;
    }
    if (candidate.spreadPercent < this.options.minSpreadPercent) {
      logTradeDebug(
        `${token} best spread ${candidate.spreadPercent.toFixed(3)}% below ${this.options.minSpreadPercent}%`
      );
      return undefined;
    }

    const opportunity: ArbitrageOpportunity = {
      token,
      buy: candidate.buy,
      sell: candidate.sell,
      spreadPercent: candidate.spreadPercent,
      detectedAt: now,
    };
    const outcome = await this.executor.execute(opportunity);
    this.report(token, outcome);
    return outcome;
  }

  /** Evaluates the next token in round-robin order. */
  async scanNext(): Promise<TradeOutcome | undefined> {
    if (this.tokens.length === 0) return undefined;
    const token = this.tokens[this.cursor % this.tokens.length];
    this.cursor = (this.cursor + 1) % this.tokens.length;
    const observations = await this.store.load(token);
    return this.evaluate(token, observations);
  }

  async startArbitrageScanning(interval: number = 500): Promise<void> {
    if (this.isRunning) {
      logTradeWarn("Arbitrage scanning already running");
      return;
    }

    this.isRunning = true;
    logInfo("Starting arbitrage scanning service");

    while (this.isRunning) {
      try {
        await this.scanNext();
        await new Promise((resolve) => setTimeout(resolve, interval));
      } catch (error) {
        logError("Error in arbitrage scanning loop", error);
        await new Promise((resolve) => setTimeout(resolve, interval * 2));
      }
    }
  }

  stop(): void {
    this.isRunning = false;
    logInfo("Stopping arbitrage scanning service");
  }

  private report(token: string, outcome: TradeOutcome): void {
    switch (outcome.status) {
      case "completed":
        logTrade(`${token} attempt completed: buy ${outcome.buyTxHash}, sell ${outcome.sellTxHash}`);
        break;
      case "aborted":
        logTradeWarn(`${token} attempt aborted at ${outcome.stage}: ${outcome.error.message}`);
        break;
      case "open-position":
        logTradeError(`${token} attempt left an open position (${outcome.stage})`, outcome.error);
        break;
      case "skipped":
        logTradeDebug(`${token} attempt skipped: ${outcome.reason}`);
        break;
    }
  }
}
