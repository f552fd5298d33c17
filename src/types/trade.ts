import { PoolObservation, SwapLeg } from "./dex";

export enum TradeState {
  Idle = "Idle",
  PreflightChecking = "PreflightChecking",
  BuyingPending = "BuyingPending",
  BuyConfirmed = "BuyConfirmed",
  BuyFailed = "BuyFailed",
  SellingPending = "SellingPending",
  SellConfirmed = "SellConfirmed",
  SellFailed = "SellFailed",
}

export interface ArbitrageOpportunity {
  token: string;
  buy: PoolObservation;
  sell: PoolObservation;
  spreadPercent: number;
  detectedAt: number;
}

export interface TradeAttempt {
  opportunity: ArbitrageOpportunity;
  startedAt: number;
  buyLeg?: SwapLeg;
  sellLeg?: SwapLeg;
}

export type TradeOutcome =
  | { status: "skipped"; reason: "cooldown" | "in-flight" }
  | {
      status: "aborted";
      stage: "preflight" | "quote" | "buy";
      error: Error;
      states: TradeState[];
      buyTxHash?: string;
    }
  | {
      // Buy executed but the position was not closed.
      status: "open-position";
      stage: "buy-unconfirmed" | "settlement" | "sell-quote" | "sell";
      error: Error;
      states: TradeState[];
      buyTxHash: string;
      amountHeld?: bigint;
      sellTxHash?: string;
    }
  | {
      status: "completed";
      states: TradeState[];
      buyTxHash: string;
      sellTxHash: string;
      amountIn: bigint;
      tokenReceived: bigint;
      baseReturned?: bigint;
      gasCost: bigint;
    };
