import { ethers } from "ethers";
import {
  PoolObservation,
  PreparedSwap,
  QuoteAttempt,
  QuoteHandler,
  QuoteSource,
  RouterDescriptor,
} from "../../types/dex";
import { ChainReader } from "../../types/chain";
import { ResilientCallExecutor } from "../rpc";
import { QuoteUnavailableError } from "../../utils/errors";
import {
  describeError,
  logQuote,
  logQuoteWarn,
} from "../../utils/logger";

export interface HandlerContext {
  chain: ChainReader;
  rpc: ResilientCallExecutor;
  walletAddress: string;
  slippageTolerancePercent: number;
  deadlineSeconds: number;
}

export interface QuoteStep {
  source: QuoteSource;
  run(): Promise<bigint>;
}

// Percentages are carried as 18-decimal fixed point.
const PERCENT_DECIMALS = 18;
const HUNDRED_PERCENT = 100n * 10n ** BigInt(PERCENT_DECIMALS);

function scaledPercent(percent: number): bigint {
  const text = /e/i.test(String(percent)) ? percent.toFixed(PERCENT_DECIMALS) : String(percent);
  const [whole, fraction] = text.split(".");
  return ethers.parseUnits(
    fraction ? `${whole}.${fraction.slice(0, PERCENT_DECIMALS)}` : whole,
    PERCENT_DECIMALS
  );
}

/** floor(amount * (1 - percent / 100)) */
export function applySlippage(amount: bigint, percent: number): bigint {
  if (!(percent > 0)) return amount;
  if (percent >= 100) return 0n;
  return (amount * (HUNDRED_PERCENT - scaledPercent(percent))) / HUNDRED_PERCENT;
}

export function deadlineFrom(nowSeconds: number, windowSeconds: number): bigint {
  return BigInt(Math.floor(nowSeconds) + windowSeconds);
}

export const nowInSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Runs quote steps in order and returns the first positive result, or the
 * list of failed attempts when none produced one.
 */
export async function firstQuote(
  steps: QuoteStep[],
  label: string
): Promise<{ quote?: Extract<QuoteAttempt, { ok: true }>; failures: QuoteAttempt[] }> {
  const failures: QuoteAttempt[] = [];
  for (const step of steps) {
    let attempt: QuoteAttempt;
    try {
      const amountOut = await step.run();
      attempt =
        amountOut > 0n
          ? { ok: true, amountOut, source: step.source }
          : { ok: false, source: step.source, reason: "zero output" };
    } catch (error) {
      attempt = { ok: false, source: step.source, reason: describeError(error) };
    }

    if (attempt.ok) {
      if (failures.length > 0) {
        logQuoteWarn(
          `${label}: fell back to ${attempt.source} after ${failures
            .map((f) => f.source)
            .join(", ")}`
        );
      }
      return { quote: attempt, failures };
    }
    logQuoteWarn(`${label}: ${attempt.source} failed (${attempt.reason})`);
    failures.push(attempt);
  }
  return { failures };
}

export abstract class BaseQuoteHandler implements QuoteHandler {
  protected readonly context: HandlerContext;

  constructor(context: HandlerContext) {
    this.context = context;
  }

  protected get chain(): ChainReader {
    return this.context.chain;
  }

  protected get rpc(): ResilientCallExecutor {
    return this.context.rpc;
  }

  protected contract(address: string, abi: ethers.InterfaceAbi): ethers.Contract {
    return new ethers.Contract(address, abi, this.context.chain);
  }

  protected minAmountOut(expected: bigint, extraSlippagePercent = 0): bigint {
    return applySlippage(
      expected,
      this.context.slippageTolerancePercent + extraSlippagePercent
    );
  }

  protected deadline(nowSeconds?: number): bigint {
    return deadlineFrom(nowSeconds ?? nowInSeconds(), this.context.deadlineSeconds);
  }

  protected async hasCode(address: string, label: string): Promise<boolean> {
    const code = await this.rpc.call(() => this.chain.getCode(address), label);
    return code !== "0x" && code !== "";
  }

  protected async runQuoteSteps(
    steps: QuoteStep[],
    label: string
  ): Promise<Extract<QuoteAttempt, { ok: true }>> {
    const { quote, failures } = await firstQuote(steps, label);
    if (!quote) {
      throw new QuoteUnavailableError(
        `${label}: all quote sources failed`,
        failures.map((f) => (f.ok ? f.source : `${f.source}: ${f.reason}`))
      );
    }
    logQuote(`${label}: ${quote.amountOut} via ${quote.source}`);
    return quote;
  }

  abstract prepare(
    router: RouterDescriptor,
    amountIn: bigint,
    tokenIn: string,
    tokenOut: string,
    observedPool: PoolObservation
  ): Promise<PreparedSwap>;
}
