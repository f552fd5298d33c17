import { ethers } from "ethers";
import {
  PoolObservation,
  PreparedSwap,
  RouterDescriptor,
  RouterDirectory,
} from "../types/dex";
import { SwapReceipt } from "../types/chain";
import {
  ArbitrageOpportunity,
  TradeAttempt,
  TradeOutcome,
  TradeState,
} from "../types/trade";
import { HandlerSet, selectHandler } from "./handlers";
import { nowInSeconds } from "./handlers/BaseQuoteHandler";
import { resolveRouter } from "./routers";
import { SettlementVerifier } from "./settlement";
import { LegSubmitter } from "./submitter";
import { TokenReader } from "./erc20";
import {
  InsufficientBalanceError,
  LegRevertedError,
  LegSubmissionFailedError,
  LegUnconfirmedError,
  LiquidityImpactTooHighError,
  VenueNotTradeableError,
} from "../utils/errors";
import {
  describeError,
  logTrade,
  logTradeDebug,
  logTradeError,
  logTradeInfo,
  logTradeWarn,
} from "../utils/logger";

export interface TradeExecutorOptions {
  baseCurrency: string;
  /** Trade size in whole base-currency units, e.g. "0.05". */
  tradeAmount: string;
  routers: RouterDirectory;
  cooldownMs: number;
  maxLiquidityImpactPercent: number;
  /** Used when the observations carry no USD price. */
  baseCurrencyUsdPrice?: number;
  now?: () => number;
}

export interface TradeExecutorDeps {
  handlers: HandlerSet;
  submitter: LegSubmitter;
  tokens: TokenReader;
  settlement: SettlementVerifier;
}

interface TradePlan {
  buyRouter: RouterDescriptor;
  sellRouter: RouterDescriptor;
  amountIn: bigint;
}

type Transition = (state: TradeState) => void;

const asError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(describeError(error));

/** USD value of one unit of base currency, as implied by a pool. */
function baseUsdPrice(pool: PoolObservation): number | undefined {
  if (pool.priceUsd === undefined || !(pool.priceNative > 0)) return undefined;
  return pool.priceUsd / pool.priceNative;
}

/**
 * Runs one buy-then-sell cycle at a time. The two legs are independent
 * transactions: a failure after the buy leaves the bought token in the
 * wallet and is reported as an open position.
 */
export class TradeExecutor {
  private currentState = TradeState.Idle;
  private lastStartedAt?: number;
  private readonly now: () => number;

  constructor(
    private readonly options: TradeExecutorOptions,
    private readonly deps: TradeExecutorDeps
  ) {
    this.now = options.now ?? Date.now;
  }

  get state(): TradeState {
    return this.currentState;
  }

  get lastAttemptStartedAt(): number | undefined {
    return this.lastStartedAt;
  }

  canStartAttempt(now: number = this.now()): boolean {
    if (this.currentState !== TradeState.Idle) return false;
    return (
      this.lastStartedAt === undefined ||
      now - this.lastStartedAt >= this.options.cooldownMs
    );
  }

  async execute(opportunity: ArbitrageOpportunity): Promise<TradeOutcome> {
    const now = this.now();
    if (this.currentState !== TradeState.Idle) {
      logTradeDebug(`Attempt for ${opportunity.token} skipped: another attempt in flight`);
      return { status: "skipped", reason: "in-flight" };
    }
    if (!this.canStartAttempt(now)) {
      logTradeDebug(`Attempt for ${opportunity.token} skipped: cooldown`);
      return { status: "skipped", reason: "cooldown" };
    }

    // The only write to the cooldown timestamp.
    this.lastStartedAt = now;
    const attempt: TradeAttempt = { opportunity, startedAt: now };
    const states: TradeState[] = [];
    const transition: Transition = (state) => {
      this.currentState = state;
      states.push(state);
      logTradeDebug(`Attempt ${opportunity.token}: -> ${state}`);
    };

    let outcome: TradeOutcome;
    try {
      outcome = await this.runAttempt(attempt, transition, states);
    } finally {
      transition(TradeState.Idle);
    }
    return outcome;
  }

  private async runAttempt(
    attempt: TradeAttempt,
    transition: Transition,
    states: TradeState[]
  ): Promise<TradeOutcome> {
    const { opportunity } = attempt;
    const { token, buy, sell } = opportunity;
    const base = this.options.baseCurrency;
    const wallet = this.deps.submitter.address;

    logTrade(
      `Spread ${opportunity.spreadPercent.toFixed(2)}% on ${token}: buy on ${buy.venueId} @ ${buy.priceNative}, sell on ${sell.venueId} @ ${sell.priceNative}`
    );

    transition(TradeState.PreflightChecking);
    let plan: TradePlan;
    try {
      plan = await this.preflight(opportunity, wallet);
    } catch (error) {
      logTradeWarn(`Pre-flight rejected: ${describeError(error)}`);
      return { status: "aborted", stage: "preflight", error: asError(error), states };
    }

    let buyQuote: PreparedSwap;
    try {
      buyQuote = await selectHandler(plan.buyRouter, this.deps.handlers).prepare(
        plan.buyRouter,
        plan.amountIn,
        base,
        token,
        buy
      );
    } catch (error) {
      logTradeWarn(`Buy quote on ${plan.buyRouter.name} failed: ${describeError(error)}`);
      return { status: "aborted", stage: "quote", error: asError(error), states };
    }

    // Leg 1
    transition(TradeState.BuyingPending);
    const builtBuy = buyQuote.buildLeg(wallet, nowInSeconds());
    attempt.buyLeg = builtBuy.leg;
    let buyReceipt: SwapReceipt;
    try {
      buyReceipt = await this.deps.submitter.submit(builtBuy.request, `buy ${token}`);
    } catch (error) {
      transition(TradeState.BuyFailed);
      if (error instanceof LegUnconfirmedError) {
        // Broadcast went out; the buy may still land.
        return this.openPosition("buy-unconfirmed", error, states, error.transactionHash);
      }
      const failure = new LegSubmissionFailedError("buy", error);
      logTradeError("Buy leg failed before confirmation", failure);
      return { status: "aborted", stage: "buy", error: failure, states };
    }
    if (buyReceipt.status !== 1) {
      transition(TradeState.BuyFailed);
      const failure = new LegRevertedError("buy", buyReceipt.hash);
      logTradeError("Buy leg reverted; aborting attempt", failure);
      return {
        status: "aborted",
        stage: "buy",
        error: failure,
        states,
        buyTxHash: buyReceipt.hash,
      };
    }
    transition(TradeState.BuyConfirmed);

    let received: bigint;
    try {
      received = this.deps.settlement.amountReceived(
        buyReceipt,
        plan.buyRouter,
        wallet,
        token
      );
    } catch (error) {
      return this.openPosition("settlement", asError(error), states, buyReceipt.hash);
    }
    logTradeInfo(`Buy ${buyReceipt.hash} settled ${received} of ${token}`);

    // Leg 2, sized by what actually arrived.
    let sellQuote: PreparedSwap;
    try {
      sellQuote = await selectHandler(plan.sellRouter, this.deps.handlers).prepare(
        plan.sellRouter,
        received,
        token,
        base,
        sell
      );
    } catch (error) {
      return this.openPosition("sell-quote", asError(error), states, buyReceipt.hash, received);
    }

    transition(TradeState.SellingPending);
    const builtSell = sellQuote.buildLeg(wallet, nowInSeconds());
    attempt.sellLeg = builtSell.leg;
    let sellReceipt: SwapReceipt;
    try {
      sellReceipt = await this.deps.submitter.submit(builtSell.request, `sell ${token}`);
    } catch (error) {
      transition(TradeState.SellFailed);
      if (error instanceof LegUnconfirmedError) {
        return this.openPosition(
          "sell",
          error,
          states,
          buyReceipt.hash,
          received,
          error.transactionHash
        );
      }
      return this.openPosition(
        "sell",
        new LegSubmissionFailedError("sell", error),
        states,
        buyReceipt.hash,
        received
      );
    }
    if (sellReceipt.status !== 1) {
      transition(TradeState.SellFailed);
      return this.openPosition(
        "sell",
        new LegRevertedError("sell", sellReceipt.hash),
        states,
        buyReceipt.hash,
        received,
        sellReceipt.hash
      );
    }
    transition(TradeState.SellConfirmed);

    let baseReturned: bigint | undefined;
    try {
      baseReturned = this.deps.settlement.amountReceived(
        sellReceipt,
        plan.sellRouter,
        wallet,
        base
      );
    } catch (error) {
      logTradeWarn(`Sell ${sellReceipt.hash} confirmed but proceeds unknown: ${describeError(error)}`);
    }

    const gasCost =
      buyReceipt.gasUsed * buyReceipt.gasPrice + sellReceipt.gasUsed * sellReceipt.gasPrice;
    logTrade(
      `Attempt complete:\n` +
        `  Buy: ${buyReceipt.hash} (${plan.amountIn} in, ${received} ${token} out)\n` +
        `  Sell: ${sellReceipt.hash} (${baseReturned ?? "unknown"} out)\n` +
        `  Gas Cost: ${gasCost}`
    );

    return {
      status: "completed",
      states,
      buyTxHash: buyReceipt.hash,
      sellTxHash: sellReceipt.hash,
      amountIn: plan.amountIn,
      tokenReceived: received,
      baseReturned,
      gasCost,
    };
  }

  /**
   * Checks that must all pass before any transaction is built. The
   * liquidity and router checks make no chain calls.
   */
  private async preflight(
    opportunity: ArbitrageOpportunity,
    wallet: string
  ): Promise<TradePlan> {
    const { buy, sell } = opportunity;
    const notionalUsd = this.notionalUsd(opportunity);
    for (const pool of [buy, sell]) {
      const limit = (pool.liquidityUsd * this.options.maxLiquidityImpactPercent) / 100;
      if (!(notionalUsd <= limit)) {
        throw new LiquidityImpactTooHighError(
          pool.venueId,
          notionalUsd,
          pool.liquidityUsd,
          this.options.maxLiquidityImpactPercent
        );
      }
    }

    const buyRouter = resolveRouter(buy.venueId, this.options.routers);
    if (!buyRouter) throw new VenueNotTradeableError(buy.venueId);
    const sellRouter = resolveRouter(sell.venueId, this.options.routers);
    if (!sellRouter) throw new VenueNotTradeableError(sell.venueId);
    if (
      buyRouter.address === sellRouter.address &&
      buyRouter.protocolFamily !== "Aggregator"
    ) {
      // Both legs would hit the same pool.
      throw new VenueNotTradeableError(
        sell.venueId,
        `Buy and sell on '${buy.venueId}'/'${sell.venueId}' both resolve to router ${buyRouter.name}`
      );
    }

    const base = this.options.baseCurrency;
    const decimals = await this.deps.tokens.decimals(base);
    const amountIn = ethers.parseUnits(this.options.tradeAmount, decimals);
    const balance = await this.deps.tokens.balanceOf(base, wallet);
    if (balance < amountIn) {
      throw new InsufficientBalanceError(balance, amountIn);
    }

    return { buyRouter, sellRouter, amountIn };
  }

  private notionalUsd(opportunity: ArbitrageOpportunity): number {
    const usdPrice =
      baseUsdPrice(opportunity.buy) ??
      baseUsdPrice(opportunity.sell) ??
      this.options.baseCurrencyUsdPrice;
    // Unknown price fails the impact check.
    if (usdPrice === undefined) return Number.POSITIVE_INFINITY;
    return Number(this.options.tradeAmount) * usdPrice;
  }

  private openPosition(
    stage: "buy-unconfirmed" | "settlement" | "sell-quote" | "sell",
    error: Error,
    states: TradeState[],
    buyTxHash: string,
    amountHeld?: bigint,
    sellTxHash?: string
  ): TradeOutcome {
    logTradeError(
      `OPEN POSITION after buy ${buyTxHash}: ${stage} failed, wallet still holds ${
        amountHeld ?? "an unknown amount of"
      } bought token`,
      error
    );
    return {
      status: "open-position",
      stage,
      error,
      states,
      buyTxHash,
      amountHeld,
      sellTxHash,
    };
  }
}
