export type TradeErrorKind =
  | "RpcExhausted"
  | "LogicReverted"
  | "PoolNotFound"
  | "NoLiquidity"
  | "QuoteUnavailable"
  | "VenueNotTradeable"
  | "InsufficientBalance"
  | "LiquidityImpactTooHigh"
  | "SettlementUnknown"
  | "LegReverted"
  | "LegSubmissionFailed"
  | "LegUnconfirmed";

export abstract class TradeError extends Error {
  abstract readonly kind: TradeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transient RPC failures persisted past the retry budget. */
export class RpcExhaustedError extends TradeError {
  readonly kind = "RpcExhausted";

  constructor(
    readonly label: string,
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`${label} failed after ${attempts} attempts`, { cause: lastError });
  }
}

/** Deterministic revert; retrying cannot change the outcome. */
export class LogicRevertedError extends TradeError {
  readonly kind = "LogicReverted";

  constructor(
    readonly label: string,
    readonly revertData: string | null,
    cause?: unknown
  ) {
    super(
      revertData && revertData !== "0x"
        ? `${label} reverted with data ${revertData}`
        : `${label} reverted without data`,
      { cause }
    );
  }
}

export class PoolNotFoundError extends TradeError {
  readonly kind = "PoolNotFound";
}

export class NoLiquidityError extends TradeError {
  readonly kind = "NoLiquidity";
}

export class QuoteUnavailableError extends TradeError {
  readonly kind = "QuoteUnavailable";

  constructor(message: string, readonly reasons: string[] = []) {
    super(reasons.length ? `${message}: ${reasons.join("; ")}` : message);
  }
}

export class VenueNotTradeableError extends TradeError {
  readonly kind = "VenueNotTradeable";

  constructor(readonly venueId: string, detail?: string) {
    super(detail ?? `No router configured for venue '${venueId}'`);
  }
}

export class InsufficientBalanceError extends TradeError {
  readonly kind = "InsufficientBalance";

  constructor(readonly balance: bigint, readonly required: bigint) {
    super(`Balance ${balance} is below trade size ${required}`);
  }
}

export class LiquidityImpactTooHighError extends TradeError {
  readonly kind = "LiquidityImpactTooHigh";

  constructor(
    readonly venueId: string,
    readonly notionalUsd: number,
    readonly liquidityUsd: number,
    readonly maxImpactPercent: number
  ) {
    super(
      `Trade notional $${notionalUsd.toFixed(2)} exceeds ${maxImpactPercent}% of ` +
        `${venueId} liquidity ($${liquidityUsd.toFixed(2)})`
    );
  }
}

export class SettlementUnknownError extends TradeError {
  readonly kind = "SettlementUnknown";

  constructor(readonly transactionHash: string, readonly token: string) {
    super(`Could not determine ${token} received in ${transactionHash}`);
  }
}

export class LegRevertedError extends TradeError {
  readonly kind = "LegReverted";

  constructor(readonly leg: "buy" | "sell", readonly transactionHash: string) {
    super(`${leg} transaction ${transactionHash} was mined but reverted`);
  }
}

export class LegSubmissionFailedError extends TradeError {
  readonly kind = "LegSubmissionFailed";

  constructor(readonly leg: "buy" | "sell", cause: unknown) {
    super(
      `${leg} transaction could not be submitted or confirmed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
  }
}

/** Broadcast succeeded but no receipt arrived; the transaction may still be mined. */
export class LegUnconfirmedError extends TradeError {
  readonly kind = "LegUnconfirmed";

  constructor(
    readonly label: string,
    readonly transactionHash: string,
    cause?: unknown
  ) {
    super(
      cause === undefined
        ? `${label}: no receipt for ${transactionHash}`
        : `${label}: no receipt for ${transactionHash} (${
            cause instanceof Error ? cause.message : String(cause)
          })`,
      { cause }
    );
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
