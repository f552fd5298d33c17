import type { ethers } from "ethers";

/**
 * Read-only view of the chain used by the quote handlers. Any ethers
 * Provider satisfies it.
 */
export interface ChainReader extends ethers.ContractRunner {
  call(tx: ethers.TransactionRequest): Promise<string>;
  getCode(address: string): Promise<string>;
}

export interface ReceiptLog {
  address: string;
  topics: readonly string[];
  data: string;
}

/** The parts of a transaction receipt the engine reads. */
export interface SwapReceipt {
  hash: string;
  status: number | null;
  gasUsed: bigint;
  gasPrice: bigint;
  logs: readonly ReceiptLog[];
}
