import { ethers } from "ethers";
import { LogicRevertedError, RpcExhaustedError } from "../utils/errors";
import {
  describeError,
  logRpcDebug,
  logRpcError,
  logRpcWarn,
} from "../utils/logger";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export type RpcErrorCategory = "transient" | "reverted";

/** Turns a revert payload into a result, or null when it is not one. */
export type RevertDecoder<T> = (data: string) => T | null;

const QUOTE_PAYLOAD_BYTES = 128;
const UINT160_MAX = (1n << 160n) - 1n;
const UINT32_MAX = (1n << 32n) - 1n;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export function classifyRpcError(error: unknown): RpcErrorCategory {
  return ethers.isError(error, "CALL_EXCEPTION") ? "reverted" : "transient";
}

/**
 * Revert data of a call exception, "0x" when the node reported an empty
 * revert, null when there was none at all.
 */
export function revertDataOf(error: unknown): string | null {
  if (!ethers.isError(error, "CALL_EXCEPTION")) {
    return null;
  }
  return typeof error.data === "string" ? error.data : null;
}

/**
 * Quoters that report `(amountOut, sqrtPriceX96After, ticksCrossed,
 * gasEstimate)` through revert data rather than a return value.
 */
export const decodeQuoteRevert: RevertDecoder<bigint> = (data) => {
  if (!ethers.isHexString(data) || ethers.dataLength(data) !== QUOTE_PAYLOAD_BYTES) {
    return null;
  }
  const [amountOut, priceMarker, ticksCrossed] = ethers.AbiCoder.defaultAbiCoder()
    .decode(["uint256", "uint256", "uint256", "uint256"], data)
    .toArray()
    .map((value) => BigInt(value));
  if (priceMarker > UINT160_MAX || ticksCrossed > UINT32_MAX) {
    return null;
  }
  return amountOut;
};

export class ResilientCallExecutor {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async call<T>(
    operation: () => Promise<T>,
    label: string,
    revertDecoder?: RevertDecoder<T>
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (classifyRpcError(error) === "reverted") {
          const data = revertDataOf(error);
          if (data && data !== "0x" && revertDecoder) {
            const decoded = revertDecoder(data);
            if (decoded !== null) {
              logRpcDebug(`${label}: result recovered from revert payload`);
              return decoded;
            }
          }
          logRpcDebug(`${label}: deterministic revert, not retrying`);
          throw new LogicRevertedError(label, data, error);
        }

        lastError = error;
        if (attempt === this.maxAttempts) {
          break;
        }

        const delay = this.baseDelayMs * 2 ** (attempt - 1);
        logRpcWarn(
          `${label}: attempt ${attempt}/${this.maxAttempts} failed (${describeError(
            error
          )}), retrying in ${delay}ms`
        );
        await this.sleep(delay);
      }
    }

    logRpcError(`${label}: retries exhausted`, lastError);
    throw new RpcExhaustedError(label, this.maxAttempts, lastError);
  }

  /** `call` for quoting functions whose result may arrive as revert data. */
  callQuote(operation: () => Promise<bigint>, label: string): Promise<bigint> {
    return this.call(operation, label, decodeQuoteRevert);
  }
}
