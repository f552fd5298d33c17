import { ethers } from "ethers";
import { SwapReceipt } from "../types/chain";
import { ResilientCallExecutor } from "./rpc";
import { LegUnconfirmedError } from "../utils/errors";
import { logTrade, logTradeDebug } from "../utils/logger";

const DEFAULT_PRIORITY_FEE = ethers.parseUnits("0.001", "gwei");
const GAS_BUFFER_PERCENT = 120n;

/** Signs, submits and waits for exactly one transaction per call. */
export interface LegSubmitter {
  readonly address: string;
  submit(request: ethers.TransactionRequest, label: string): Promise<SwapReceipt>;
}

export interface SubmitterOptions {
  maxGasLimit: bigint;
  confirmationTimeoutMs: number;
}

/**
 * The provider calls a submission makes. Any ethers Provider satisfies it.
 */
export interface SubmissionProvider {
  getNetwork(): Promise<{ chainId: bigint }>;
  getTransactionCount(address: string, blockTag: "pending"): Promise<number>;
  getFeeData(): Promise<{ maxPriorityFeePerGas: bigint | null; gasPrice: bigint | null }>;
  getBlock(blockTag: "latest"): Promise<{ baseFeePerGas: bigint | null } | null>;
  estimateGas(tx: ethers.TransactionRequest): Promise<bigint>;
  broadcastTransaction(signedTx: string): Promise<{ hash: string }>;
  waitForTransaction(
    hash: string,
    confirms: number,
    timeout: number
  ): Promise<SwapReceipt | null>;
}

export interface FeeParams {
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
}

/** EIP-1559 fees: twice the latest base fee plus the priority fee. */
export function computeFeeParams(
  baseFeePerGas: bigint,
  maxPriorityFeePerGas: bigint
): FeeParams {
  return {
    maxFeePerGas: baseFeePerGas * 2n + maxPriorityFeePerGas,
    maxPriorityFeePerGas,
  };
}

export function bufferedGasLimit(estimate: bigint, cap: bigint): bigint {
  const buffered = (estimate * GAS_BUFFER_PERCENT) / 100n;
  return buffered < cap ? buffered : cap;
}

export class TransactionSubmitter implements LegSubmitter {
  private chainId?: bigint;

  constructor(
    private readonly wallet: ethers.Wallet,
    private readonly provider: SubmissionProvider,
    private readonly rpc: ResilientCallExecutor,
    private readonly options: SubmitterOptions
  ) {}

  get address(): string {
    return this.wallet.address;
  }

  async submit(
    request: ethers.TransactionRequest,
    label: string
  ): Promise<SwapReceipt> {
    const chainId = await this.getChainId();
    // Fetched per transaction; never reused across legs.
    const nonce = await this.rpc.call(
      () => this.provider.getTransactionCount(this.wallet.address, "pending"),
      `${label} nonce`
    );
    const fees = await this.fetchFees(label);

    const tx: ethers.TransactionRequest = {
      ...request,
      from: this.wallet.address,
      chainId,
      nonce,
      type: 2,
      ...fees,
    };
    const estimate = await this.rpc.call(
      () => this.provider.estimateGas(tx),
      `${label} estimateGas`
    );
    tx.gasLimit = bufferedGasLimit(estimate, this.options.maxGasLimit);
    logTradeDebug(
      `${label}: nonce ${nonce}, gas ${tx.gasLimit}, maxFee ${fees.maxFeePerGas}, priority ${fees.maxPriorityFeePerGas}`
    );

    const signed = await this.wallet.signTransaction(tx);
    const response = await this.provider.broadcastTransaction(signed);
    logTrade(`${label}: sent ${response.hash}`);

    let receipt: SwapReceipt | null;
    try {
      receipt = await this.provider.waitForTransaction(
        response.hash,
        1,
        this.options.confirmationTimeoutMs
      );
    } catch (error) {
      throw new LegUnconfirmedError(label, response.hash, error);
    }
    if (!receipt) {
      throw new LegUnconfirmedError(label, response.hash);
    }
    logTrade(`${label}: ${response.hash} mined with status ${receipt.status}`);
    return receipt;
  }

  private async fetchFees(label: string): Promise<FeeParams> {
    const [feeData, block] = await Promise.all([
      this.rpc.call(() => this.provider.getFeeData(), `${label} feeData`),
      this.rpc.call(() => this.provider.getBlock("latest"), `${label} latest block`),
    ]);
    const priority = feeData.maxPriorityFeePerGas ?? DEFAULT_PRIORITY_FEE;
    const baseFee = block?.baseFeePerGas ?? feeData.gasPrice ?? 0n;
    return computeFeeParams(baseFee, priority);
  }

  private async getChainId(): Promise<bigint> {
    if (this.chainId === undefined) {
      const network = await this.rpc.call(() => this.provider.getNetwork(), "network");
      this.chainId = network.chainId;
    }
    return this.chainId;
  }
}
