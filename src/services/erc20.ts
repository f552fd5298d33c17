import { ethers } from "ethers";
import { ChainReader } from "../types/chain";
import { ResilientCallExecutor } from "./rpc";
import { LegSubmitter } from "./submitter";
import { logInfo } from "../utils/logger";

export const ERC20_ABI = [
  "function approve(address spender, uint256 amount) external returns (bool)",
  "function allowance(address owner, address spender) external view returns (uint256)",
  "function balanceOf(address owner) external view returns (uint256)",
  "function decimals() external view returns (uint8)",
];

const ERC20_INTERFACE = new ethers.Interface(ERC20_ABI);

export interface TokenReader {
  decimals(token: string): Promise<number>;
  balanceOf(token: string, owner: string): Promise<bigint>;
}

export class Erc20Service implements TokenReader {
  private readonly decimalsCache = new Map<string, number>();

  constructor(
    private readonly chain: ChainReader,
    private readonly rpc: ResilientCallExecutor
  ) {}

  private token(address: string): ethers.Contract {
    return new ethers.Contract(address, ERC20_ABI, this.chain);
  }

  async decimals(token: string): Promise<number> {
    const key = token.toLowerCase();
    const cached = this.decimalsCache.get(key);
    if (cached !== undefined) return cached;

    const contract = this.token(token);
    const value: bigint = await this.rpc.call(
      () => contract.decimals(),
      `decimals(${token})`
    );
    const decimals = Number(value);
    this.decimalsCache.set(key, decimals);
    return decimals;
  }

  async balanceOf(token: string, owner: string): Promise<bigint> {
    const contract = this.token(token);
    return this.rpc.call(() => contract.balanceOf(owner), `balanceOf(${token})`);
  }

  async allowance(token: string, owner: string, spender: string): Promise<bigint> {
    const contract = this.token(token);
    return this.rpc.call(
      () => contract.allowance(owner, spender),
      `allowance(${token}, ${spender})`
    );
  }

  /**
   * Approves `spender` for the maximum amount when the current allowance is
   * below `amount`. Runs once at startup, before any trade.
   */
  async ensureAllowance(
    submitter: LegSubmitter,
    token: string,
    spender: string,
    amount: bigint
  ): Promise<void> {
    const current = await this.allowance(token, submitter.address, spender);
    if (current >= amount) {
      logInfo(`Allowance for ${token} -> ${spender} already sufficient`);
      return;
    }

    logInfo(`Setting allowance for ${token} -> ${spender}`);
    const receipt = await submitter.submit(
      {
        to: token,
        data: ERC20_INTERFACE.encodeFunctionData("approve", [spender, ethers.MaxUint256]),
      },
      `approve ${token}`
    );
    if (receipt.status !== 1) {
      throw new Error(`Approval of ${token} for ${spender} reverted (${receipt.hash})`);
    }
  }
}
