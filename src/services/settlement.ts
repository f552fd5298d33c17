import { ethers } from "ethers";
import { RouterDescriptor } from "../types/dex";
import { ReceiptLog, SwapReceipt } from "../types/chain";
import { SettlementUnknownError } from "../utils/errors";
import { logTradeDebug, logTradeInfo, logTradeWarn } from "../utils/logger";

const EVENTS_INTERFACE = new ethers.Interface([
  "event Transfer(address indexed from, address indexed to, uint256 value)",
  "event Swap(address indexed sender, address indexed recipient, int256 amount0, int256 amount1, uint160 sqrtPriceX96, uint128 liquidity, int24 tick)",
]);

// Pancake V3 pools append protocol fees to the Swap event.
const PANCAKE_SWAP_INTERFACE = new ethers.Interface([
  "event Swap(address indexed sender, address indexed recipient, int256 amount0, int256 amount1, uint160 sqrtPriceX96, uint128 liquidity, int24 tick, uint128 protocolFeesToken0, uint128 protocolFeesToken1)",
]);

export const TRANSFER_TOPIC = ethers.id("Transfer(address,address,uint256)");
export const V3_SWAP_TOPIC = ethers.id(
  "Swap(address,address,int256,int256,uint160,uint128,int24)"
);
export const PANCAKE_V3_SWAP_TOPIC = ethers.id(
  "Swap(address,address,int256,int256,uint160,uint128,int24,uint128,uint128)"
);

interface TransferLog {
  token: string;
  from: string;
  to: string;
  value: bigint;
}

const sameAddress = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

function parseTransfer(log: ReceiptLog): TransferLog | null {
  if (log.topics[0] !== TRANSFER_TOPIC || log.topics.length !== 3) {
    return null;
  }
  try {
    const parsed = EVENTS_INTERFACE.parseLog({ topics: [...log.topics], data: log.data });
    if (!parsed) return null;
    return {
      token: log.address,
      from: String(parsed.args.from),
      to: String(parsed.args.to),
      value: BigInt(parsed.args.value),
    };
  } catch {
    // Same topic, different layout (e.g. ERC-721 with indexed tokenId).
    return null;
  }
}

function parseSwapDeltas(log: ReceiptLog): [bigint, bigint] | null {
  const iface =
    log.topics[0] === V3_SWAP_TOPIC
      ? EVENTS_INTERFACE
      : log.topics[0] === PANCAKE_V3_SWAP_TOPIC
        ? PANCAKE_SWAP_INTERFACE
        : null;
  if (!iface) return null;
  const parsed = iface.parseLog({ topics: [...log.topics], data: log.data });
  if (!parsed) return null;
  return [BigInt(parsed.args.amount0), BigInt(parsed.args.amount1)];
}

export class SettlementVerifier {
  constructor(private readonly baseCurrency: string) {}

  /**
   * Amount of `outputToken` the receipt actually delivered to `recipient`.
   * Throws SettlementUnknownError when no log establishes it.
   */
  amountReceived(
    receipt: SwapReceipt,
    router: RouterDescriptor,
    recipient: string,
    outputToken: string
  ): bigint {
    if (router.protocolFamily === "V3") {
      const fromSwap = this.fromPoolSwapEvent(receipt, recipient);
      if (fromSwap > 0n) {
        logTradeInfo(`Settlement ${receipt.hash}: ${fromSwap} from pool Swap event`);
        return fromSwap;
      }
      logTradeWarn(
        `Settlement ${receipt.hash}: no conclusive Swap event, falling back to Transfer logs`
      );
    }

    const fromTransfer = this.fromTransferLogs(receipt, recipient, outputToken);
    if (fromTransfer > 0n) {
      logTradeInfo(`Settlement ${receipt.hash}: ${fromTransfer} from Transfer log`);
      return fromTransfer;
    }

    throw new SettlementUnknownError(receipt.hash, outputToken);
  }

  private fromPoolSwapEvent(receipt: SwapReceipt, recipient: string): bigint {
    const pool = this.inferPool(receipt, recipient);
    if (!pool) {
      logTradeDebug(`Settlement ${receipt.hash}: no base-currency transfer involving wallet`);
      return 0n;
    }

    for (const log of receipt.logs) {
      if (!sameAddress(log.address, pool)) continue;
      const deltas = parseSwapDeltas(log);
      if (!deltas) continue;
      const negative = deltas.find((delta) => delta < 0n);
      if (negative !== undefined) {
        return -negative;
      }
    }
    return 0n;
  }

  /** The pool is the wallet's counterparty in the base-currency transfer. */
  private inferPool(receipt: SwapReceipt, recipient: string): string | null {
    for (const log of receipt.logs) {
      if (!sameAddress(log.address, this.baseCurrency)) continue;
      const transfer = parseTransfer(log);
      if (!transfer) continue;
      if (sameAddress(transfer.to, recipient)) return transfer.from;
      if (sameAddress(transfer.from, recipient)) return transfer.to;
    }
    return null;
  }

  private fromTransferLogs(
    receipt: SwapReceipt,
    recipient: string,
    outputToken: string
  ): bigint {
    for (const log of receipt.logs) {
      if (!sameAddress(log.address, outputToken)) continue;
      const transfer = parseTransfer(log);
      if (transfer && sameAddress(transfer.to, recipient)) {
        return transfer.value;
      }
    }
    return 0n;
  }
}
