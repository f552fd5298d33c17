import { ethers } from "ethers";
import { PoolObservation, PreparedSwap, RouterDescriptor } from "../../types/dex";
import { BaseQuoteHandler } from "./BaseQuoteHandler";
import { NoLiquidityError, PoolNotFoundError } from "../../utils/errors";
import { logQuoteDebug, logQuoteInfo, logQuoteWarn } from "../../utils/logger";

// Extra percentage points of slippage when the router lacks a
// fee-on-transfer entry point.
export const STANDARD_ENTRY_EXTRA_SLIPPAGE = 3;

const ROUTE_TUPLE = "(address from, address to, bool stable, address factory)[] routes";

export const SOLIDLY_ROUTER_ABI = [
  `function getAmountsOut(uint256 amountIn, ${ROUTE_TUPLE}) view returns (uint256[] amounts)`,
  `function swapExactTokensForTokens(uint256 amountIn, uint256 amountOutMin, ${ROUTE_TUPLE}, address to, uint256 deadline) returns (uint256[] amounts)`,
  `function swapExactTokensForTokensSupportingFeeOnTransferTokens(uint256 amountIn, uint256 amountOutMin, ${ROUTE_TUPLE}, address to, uint256 deadline)`,
];

export const SOLIDLY_FACTORY_ABI = [
  "function getPool(address tokenA, address tokenB, bool stable) view returns (address pool)",
];

export const SOLIDLY_PAIR_ABI = [
  "function getReserves() view returns (uint256 reserve0, uint256 reserve1, uint256 blockTimestampLast)",
];

const SOLIDLY_ROUTER_INTERFACE = new ethers.Interface(SOLIDLY_ROUTER_ABI);

export const FEE_ON_TRANSFER_SELECTOR = SOLIDLY_ROUTER_INTERFACE.getFunction(
  "swapExactTokensForTokensSupportingFeeOnTransferTokens"
)?.selector;

interface SolidlyRoute {
  from: string;
  to: string;
  stable: boolean;
  factory: string;
}

export class SolidlyHandler extends BaseQuoteHandler {
  async prepare(
    router: RouterDescriptor,
    amountIn: bigint,
    tokenIn: string,
    tokenOut: string,
    observedPool: PoolObservation
  ): Promise<PreparedSwap> {
    const label = `${router.name} ${tokenIn}->${tokenOut}`;
    const factoryAddress = router.factoryAddress;
    if (!factoryAddress) {
      // Without the factory the stable/volatile variant would be a guess.
      throw new PoolNotFoundError(`${label}: router has no factory configured`);
    }

    const { pool, stable } = await this.discoverPool(
      factoryAddress,
      tokenIn,
      tokenOut,
      label
    );
    if (observedPool.stableFlag !== undefined && observedPool.stableFlag !== stable) {
      logQuoteWarn(
        `${label}: feed reported stable=${observedPool.stableFlag}, factory resolved stable=${stable}`
      );
    }
    await this.requireReserves(pool, label);

    const route: SolidlyRoute = { from: tokenIn, to: tokenOut, stable, factory: factoryAddress };
    const routerContract = this.contract(router.address, SOLIDLY_ROUTER_ABI);
    const quote = await this.runQuoteSteps(
      [
        {
          source: "solidly-getAmountsOut",
          run: async () => {
            const amounts: bigint[] = await this.rpc.call(
              () => routerContract.getAmountsOut(amountIn, [route]),
              `${label} getAmountsOut`
            );
            return amounts[amounts.length - 1] ?? 0n;
          },
        },
      ],
      label
    );

    const feeOnTransfer = await this.supportsFeeOnTransfer(router, label);
    const minAmountOut = feeOnTransfer
      ? this.minAmountOut(quote.amountOut)
      : this.minAmountOut(quote.amountOut, STANDARD_ENTRY_EXTRA_SLIPPAGE);
    if (!feeOnTransfer) {
      logQuoteWarn(
        `${label}: no fee-on-transfer entry point, widening slippage by ${STANDARD_ENTRY_EXTRA_SLIPPAGE}%`
      );
    }
    logQuoteInfo(
      `${label}: expected ${quote.amountOut}, minOut ${minAmountOut} (${
        stable ? "stable" : "volatile"
      } pool ${pool})`
    );

    const method = feeOnTransfer
      ? "swapExactTokensForTokensSupportingFeeOnTransferTokens"
      : "swapExactTokensForTokens";

    return {
      expectedAmountOut: quote.amountOut,
      minAmountOut,
      quoteSource: quote.source,
      approximate: false,
      poolAddress: pool,
      buildLeg: (recipient, nowSeconds) => {
        const deadline = this.deadline(nowSeconds);
        return {
          leg: { tokenIn, tokenOut, amountIn, minAmountOut, router, deadline },
          request: {
            to: router.address,
            data: SOLIDLY_ROUTER_INTERFACE.encodeFunctionData(method, [
              amountIn,
              minAmountOut,
              [route],
              recipient,
              deadline,
            ]),
          },
        };
      },
    };
  }

  /** Volatile first, then stable; a zero address means "not this variant". */
  private async discoverPool(
    factoryAddress: string,
    tokenIn: string,
    tokenOut: string,
    label: string
  ): Promise<{ pool: string; stable: boolean }> {
    const factory = this.contract(factoryAddress, SOLIDLY_FACTORY_ABI);
    for (const stable of [false, true]) {
      const pool: string = await this.rpc.call(
        () => factory.getPool(tokenIn, tokenOut, stable),
        `${label} getPool(stable=${stable})`
      );
      if (pool !== ethers.ZeroAddress) {
        logQuoteInfo(`${label}: found ${stable ? "stable" : "volatile"} pool ${pool}`);
        return { pool, stable };
      }
      logQuoteDebug(`${label}: no ${stable ? "stable" : "volatile"} pool`);
    }
    throw new PoolNotFoundError(`${label}: factory has neither variant`);
  }

  private async requireReserves(pool: string, label: string): Promise<void> {
    const pair = this.contract(pool, SOLIDLY_PAIR_ABI);
    const reserves: { reserve0: bigint; reserve1: bigint } = await this.rpc.call(
      () => pair.getReserves(),
      `${label} getReserves`
    );
    if (reserves.reserve0 === 0n || reserves.reserve1 === 0n) {
      throw new NoLiquidityError(`${label}: pool ${pool} has an empty reserve`);
    }
  }

  private async supportsFeeOnTransfer(
    router: RouterDescriptor,
    label: string
  ): Promise<boolean> {
    if (router.supportsFeeOnTransfer !== undefined) {
      return router.supportsFeeOnTransfer;
    }
    if (!FEE_ON_TRANSFER_SELECTOR) return false;
    const code = await this.rpc.call(
      () => this.chain.getCode(router.address),
      `${label} getCode(router)`
    );
    return code.toLowerCase().includes(FEE_ON_TRANSFER_SELECTOR.slice(2).toLowerCase());
  }
}
