import { ethers } from "ethers";
import { PoolObservation, PreparedSwap, RouterDescriptor } from "../../types/dex";
import { BaseQuoteHandler, QuoteStep } from "./BaseQuoteHandler";
import { NoLiquidityError, PoolNotFoundError } from "../../utils/errors";
import { logQuoteDebug, logQuoteInfo, logQuoteWarn } from "../../utils/logger";

// 0.01%, 0.05%, 0.25%, 0.30%, 1%
export const DEFAULT_FEE_TIERS = [100, 500, 2500, 3000, 10000];

const FEE_DENOMINATOR = 1_000_000n;
const Q96 = 1n << 96n;

export const V3_FACTORY_ABI = [
  "function getPool(address tokenA, address tokenB, uint24 fee) view returns (address pool)",
];

// Only the leading slot0 fields; Uniswap and Pancake differ further down.
export const V3_POOL_ABI = [
  "function slot0() view returns (uint160 sqrtPriceX96, int24 tick)",
  "function liquidity() view returns (uint128)",
];

export const V3_QUOTER_ABI = [
  "function quoteExactInputSingle((address tokenIn, address tokenOut, uint256 amountIn, uint24 fee, uint160 sqrtPriceLimitX96) params) returns (uint256 amountOut, uint160 sqrtPriceX96After, uint32 initializedTicksCrossed, uint256 gasEstimate)",
  "function quoteExactInput(bytes path, uint256 amountIn) returns (uint256 amountOut)",
];

export const V3_ROUTER_ABI = [
  "function exactInputSingle((address tokenIn, address tokenOut, uint24 fee, address recipient, uint256 deadline, uint256 amountIn, uint256 amountOutMinimum, uint160 sqrtPriceLimitX96) params) payable returns (uint256 amountOut)",
];

const V3_ROUTER_INTERFACE = new ethers.Interface(V3_ROUTER_ABI);

interface LivePool {
  address: string;
  fee: number;
  sqrtPriceX96: bigint;
  liquidity: bigint;
}

/**
 * Constant-product estimate over the virtual reserves implied by the
 * pool's current price and in-range liquidity. Ignores tick crossings.
 */
export function estimateFromPoolState(
  pool: Pick<LivePool, "fee" | "sqrtPriceX96" | "liquidity">,
  amountIn: bigint,
  tokenIn: string,
  tokenOut: string
): bigint {
  const reserve0 = (pool.liquidity * Q96) / pool.sqrtPriceX96;
  const reserve1 = (pool.liquidity * pool.sqrtPriceX96) / Q96;
  const zeroForOne = tokenIn.toLowerCase() < tokenOut.toLowerCase();
  const [reserveIn, reserveOut] = zeroForOne
    ? [reserve0, reserve1]
    : [reserve1, reserve0];

  const amountInAfterFee =
    (amountIn * (FEE_DENOMINATOR - BigInt(pool.fee))) / FEE_DENOMINATOR;
  if (reserveIn + amountInAfterFee === 0n) return 0n;
  return (amountInAfterFee * reserveOut) / (reserveIn + amountInAfterFee);
}

export class UniswapV3Handler extends BaseQuoteHandler {
  async prepare(
    router: RouterDescriptor,
    amountIn: bigint,
    tokenIn: string,
    tokenOut: string,
    observedPool: PoolObservation
  ): Promise<PreparedSwap> {
    const label = `${router.name} ${tokenIn}->${tokenOut}`;
    const pool = await this.findLivePool(router, tokenIn, tokenOut, label);

    if (
      observedPool.pairOrPoolAddress &&
      observedPool.pairOrPoolAddress.toLowerCase() !== pool.address.toLowerCase()
    ) {
      logQuoteWarn(
        `${label}: executing on ${pool.address} (fee ${pool.fee}), feed observed ${observedPool.pairOrPoolAddress}`
      );
    }

    const quote = await this.runQuoteSteps(
      this.quoteSteps(router, pool, amountIn, tokenIn, tokenOut, label),
      label
    );
    const approximate = quote.source === "pool-estimate";
    if (approximate) {
      logQuoteWarn(`${label}: using pool-state estimate, low confidence`);
    }

    const minAmountOut = this.minAmountOut(quote.amountOut);
    logQuoteInfo(
      `${label}: expected ${quote.amountOut}, minOut ${minAmountOut} (fee ${pool.fee})`
    );

    return {
      expectedAmountOut: quote.amountOut,
      minAmountOut,
      quoteSource: quote.source,
      approximate,
      poolAddress: pool.address,
      buildLeg: (recipient, nowSeconds) => {
        const deadline = this.deadline(nowSeconds);
        return {
          leg: { tokenIn, tokenOut, amountIn, minAmountOut, router, deadline },
          request: {
            to: router.address,
            data: V3_ROUTER_INTERFACE.encodeFunctionData("exactInputSingle", [
              {
                tokenIn,
                tokenOut,
                fee: pool.fee,
                recipient,
                deadline,
                amountIn,
                amountOutMinimum: minAmountOut,
                sqrtPriceLimitX96: 0n,
              },
            ]),
          },
        };
      },
    };
  }

  private async findLivePool(
    router: RouterDescriptor,
    tokenIn: string,
    tokenOut: string,
    label: string
  ): Promise<LivePool> {
    if (!router.factoryAddress) {
      throw new PoolNotFoundError(`${label}: router has no factory configured`);
    }
    const factory = this.contract(router.factoryAddress, V3_FACTORY_ABI);

    for (const fee of router.feeTiers ?? DEFAULT_FEE_TIERS) {
      const address: string = await this.rpc.call(
        () => factory.getPool(tokenIn, tokenOut, fee),
        `${label} getPool(${fee})`
      );
      if (address === ethers.ZeroAddress) {
        logQuoteDebug(`${label}: no pool at fee ${fee}`);
        continue;
      }
      if (!(await this.hasCode(address, `${label} getCode(${address})`))) {
        logQuoteDebug(`${label}: pool ${address} at fee ${fee} has no code`);
        continue;
      }

      logQuoteInfo(`${label}: found pool ${address} at fee ${fee}`);
      const poolContract = this.contract(address, V3_POOL_ABI);
      const slot0: { sqrtPriceX96: bigint } = await this.rpc.call(
        () => poolContract.slot0(),
        `${label} slot0`
      );
      if (slot0.sqrtPriceX96 === 0n) {
        throw new PoolNotFoundError(`${label}: pool ${address} is not initialized`);
      }
      const liquidity: bigint = await this.rpc.call(
        () => poolContract.liquidity(),
        `${label} liquidity`
      );
      if (liquidity === 0n) {
        throw new NoLiquidityError(`${label}: pool ${address} has no active liquidity`);
      }
      return { address, fee, sqrtPriceX96: slot0.sqrtPriceX96, liquidity };
    }

    throw new PoolNotFoundError(`${label}: no live pool in any fee tier`);
  }

  private quoteSteps(
    router: RouterDescriptor,
    pool: LivePool,
    amountIn: bigint,
    tokenIn: string,
    tokenOut: string,
    label: string
  ): QuoteStep[] {
    const steps: QuoteStep[] = [];

    if (router.quoterAddress) {
      const quoter = this.contract(router.quoterAddress, V3_QUOTER_ABI);
      steps.push(
        {
          source: "quoter-exactInputSingle",
          run: () =>
            this.rpc.callQuote(async () => {
              const result: { amountOut: bigint } =
                await quoter.quoteExactInputSingle.staticCall({
                  tokenIn,
                  tokenOut,
                  amountIn,
                  fee: pool.fee,
                  sqrtPriceLimitX96: 0n,
                });
              return result.amountOut;
            }, `${label} quoteExactInputSingle`),
        },
        {
          source: "quoter-exactInput",
          run: () => {
            const path = ethers.solidityPacked(
              ["address", "uint24", "address"],
              [tokenIn, pool.fee, tokenOut]
            );
            return this.rpc.callQuote(async () => {
              const amountOut: bigint = await quoter.quoteExactInput.staticCall(
                path,
                amountIn
              );
              return amountOut;
            }, `${label} quoteExactInput`);
          },
        }
      );
    }

    steps.push({
      source: "pool-estimate",
      run: async () => estimateFromPoolState(pool, amountIn, tokenIn, tokenOut),
    });
    return steps;
  }
}
