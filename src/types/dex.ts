import type { ethers } from "ethers";

export type ProtocolFamily = "V2" | "V3" | "Solidly" | "Aggregator";

export interface RouterDescriptor {
  name: string;
  address: string;
  protocolFamily: ProtocolFamily;
  version: number;
  factoryAddress?: string;
  quoterAddress?: string;
  feeTiers?: number[]; // V3 override, hundredths of a bip
  supportsFeeOnTransfer?: boolean; // Solidly; probed from bytecode when unset
}

export type RouterDirectory = Record<string, RouterDescriptor>;

/**
 * One pool as reported by the price feed. `priceNative` is the token price
 * expressed in the base currency.
 */
export interface PoolObservation {
  venueId: string;
  priceNative: number;
  priceUsd?: number;
  liquidityUsd: number;
  volume24hUsd?: number;
  feeBasisPoints: number;
  pairOrPoolAddress: string;
  stableFlag?: boolean;
  observedAt: number;
}

export interface SwapLeg {
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  minAmountOut: bigint;
  router: RouterDescriptor;
  deadline: bigint;
}

export type QuoteSource =
  | "router-getAmountsOut"
  | "quoter-exactInputSingle"
  | "quoter-exactInput"
  | "pool-estimate"
  | "solidly-getAmountsOut"
  | "aggregator-simulation";

export type QuoteAttempt =
  | { ok: true; amountOut: bigint; source: QuoteSource }
  | { ok: false; source: QuoteSource; reason: string };

export interface BuiltLeg {
  leg: SwapLeg;
  request: ethers.TransactionRequest;
}

/** A quoted swap, ready to be turned into exactly one transaction. */
export interface PreparedSwap {
  expectedAmountOut: bigint;
  minAmountOut: bigint;
  quoteSource: QuoteSource;
  approximate: boolean;
  poolAddress?: string;
  buildLeg(recipient: string, nowSeconds?: number): BuiltLeg;
}

export interface QuoteHandler {
  prepare(
    router: RouterDescriptor,
    amountIn: bigint,
    tokenIn: string,
    tokenOut: string,
    observedPool: PoolObservation
  ): Promise<PreparedSwap>;
}
