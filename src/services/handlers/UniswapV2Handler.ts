import { ethers } from "ethers";
import { PoolObservation, PreparedSwap, RouterDescriptor } from "../../types/dex";
import { BaseQuoteHandler } from "./BaseQuoteHandler";
import { logQuoteInfo } from "../../utils/logger";

export const V2_ROUTER_ABI = [
  "function getAmountsOut(uint amountIn, address[] memory path) view returns (uint[] memory amounts)",
  "function swapExactTokensForTokens(uint amountIn, uint amountOutMin, address[] calldata path, address to, uint deadline) external returns (uint[] memory amounts)",
];

const V2_ROUTER_INTERFACE = new ethers.Interface(V2_ROUTER_ABI);

export class UniswapV2Handler extends BaseQuoteHandler {
  async prepare(
    router: RouterDescriptor,
    amountIn: bigint,
    tokenIn: string,
    tokenOut: string,
    observedPool: PoolObservation
  ): Promise<PreparedSwap> {
    const path = [tokenIn, tokenOut];
    const label = `${router.name} ${tokenIn}->${tokenOut}`;
    const routerContract = this.contract(router.address, V2_ROUTER_ABI);

    const quote = await this.runQuoteSteps(
      [
        {
          source: "router-getAmountsOut",
          run: async () => {
            const amounts: bigint[] = await this.rpc.call(
              () => routerContract.getAmountsOut(amountIn, path),
              `${label} getAmountsOut`
            );
            return amounts[amounts.length - 1] ?? 0n;
          },
        },
      ],
      label
    );

    const minAmountOut = this.minAmountOut(quote.amountOut);
    logQuoteInfo(
      `${label}: expected ${quote.amountOut}, minOut ${minAmountOut} (pool ${observedPool.pairOrPoolAddress})`
    );

    return {
      expectedAmountOut: quote.amountOut,
      minAmountOut,
      quoteSource: quote.source,
      approximate: false,
      poolAddress: observedPool.pairOrPoolAddress,
      buildLeg: (recipient, nowSeconds) => {
        const deadline = this.deadline(nowSeconds);
        return {
          leg: { tokenIn, tokenOut, amountIn, minAmountOut, router, deadline },
          request: {
            to: router.address,
            data: V2_ROUTER_INTERFACE.encodeFunctionData("swapExactTokensForTokens", [
              amountIn,
              minAmountOut,
              path,
              recipient,
              deadline,
            ]),
          },
        };
      },
    };
  }
}
