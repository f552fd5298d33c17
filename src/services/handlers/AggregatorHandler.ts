import axios from "axios";
import { ethers } from "ethers";
import { PoolObservation, PreparedSwap, RouterDescriptor } from "../../types/dex";
import { BaseQuoteHandler, HandlerContext } from "./BaseQuoteHandler";
import { QuoteUnavailableError } from "../../utils/errors";
import { logQuoteDebug, logQuoteInfo } from "../../utils/logger";

export const AGGREGATOR_ROUTER_ABI = [
  "function swap(address executor, (address srcToken, address dstToken, address srcReceiver, address dstReceiver, uint256 amount, uint256 minReturn, uint256 flags) desc, bytes data) payable returns (uint256 returnAmount, uint256 spentAmount)",
];

const AGGREGATOR_ROUTER_INTERFACE = new ethers.Interface(AGGREGATOR_ROUTER_ABI);

// Smallest acceptable output, used only while simulating.
const SIMULATION_MIN_RETURN = 1n;

export interface SwapDescription {
  srcToken: string;
  dstToken: string;
  srcReceiver: string;
  dstReceiver: string;
  amount: bigint;
  minReturn: bigint;
  flags: bigint;
}

export interface AggregatorRoute {
  executor: string;
  description: SwapDescription;
  data: string;
}

export interface RouteRequest {
  router: RouterDescriptor;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  from: string;
  slippageTolerancePercent: number;
}

/** Supplies the executor calldata an aggregator router needs for a swap. */
export interface AggregatorRouteSource {
  fetchRoute(request: RouteRequest): Promise<AggregatorRoute>;
}

/** Decodes `swap(executor, desc, data)` calldata into its parts. */
export function decodeSwapCalldata(calldata: string): AggregatorRoute | null {
  const parsed = AGGREGATOR_ROUTER_INTERFACE.parseTransaction({ data: calldata });
  if (!parsed || parsed.name !== "swap") {
    return null;
  }
  const [executor, desc, data] = parsed.args;
  return {
    executor: ethers.getAddress(String(executor)),
    description: {
      srcToken: ethers.getAddress(String(desc.srcToken)),
      dstToken: ethers.getAddress(String(desc.dstToken)),
      srcReceiver: ethers.getAddress(String(desc.srcReceiver)),
      dstReceiver: ethers.getAddress(String(desc.dstReceiver)),
      amount: BigInt(desc.amount),
      minReturn: BigInt(desc.minReturn),
      flags: BigInt(desc.flags),
    },
    data: ethers.hexlify(data),
  };
}

export function encodeSwapCalldata(route: AggregatorRoute): string {
  return AGGREGATOR_ROUTER_INTERFACE.encodeFunctionData("swap", [
    route.executor,
    route.description,
    route.data,
  ]);
}

/** Rejects a route whose swap description is not the swap that was asked for. */
export function assertRouteMatches(route: AggregatorRoute, request: RouteRequest): void {
  const label = `${request.router.name} ${request.tokenIn}->${request.tokenOut}`;
  const { srcToken, dstToken, amount } = route.description;
  if (srcToken.toLowerCase() !== request.tokenIn.toLowerCase()) {
    throw new QuoteUnavailableError(`${label}: route sells ${srcToken}`);
  }
  if (dstToken.toLowerCase() !== request.tokenOut.toLowerCase()) {
    throw new QuoteUnavailableError(`${label}: route buys ${dstToken}`);
  }
  if (amount !== request.amountIn) {
    throw new QuoteUnavailableError(
      `${label}: route spends ${amount}, requested ${request.amountIn}`
    );
  }
}

interface SwapApiResponse {
  tx?: { to?: string; data?: string };
}

/** Route source backed by an aggregator's HTTP swap API (1inch v6 layout). */
export class HttpAggregatorRouteSource implements AggregatorRouteSource {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey?: string
  ) {}

  async fetchRoute(request: RouteRequest): Promise<AggregatorRoute> {
    const label = `${request.router.name} ${request.tokenIn}->${request.tokenOut}`;
    try {
      const response = await axios.get<SwapApiResponse>(`${this.baseUrl}/swap`, {
        params: {
          src: request.tokenIn,
          dst: request.tokenOut,
          amount: request.amountIn.toString(),
          from: request.from,
          origin: request.from,
          slippage: request.slippageTolerancePercent,
          disableEstimate: true,
        },
        headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : undefined,
        timeout: 10_000,
      });

      const tx = response.data.tx;
      if (!tx?.data || !tx.to) {
        throw new QuoteUnavailableError(`${label}: route response carried no transaction`);
      }
      if (ethers.getAddress(tx.to) !== request.router.address) {
        throw new QuoteUnavailableError(
          `${label}: route targets ${tx.to}, expected ${request.router.address}`
        );
      }
      const route = decodeSwapCalldata(tx.data);
      if (!route) {
        throw new QuoteUnavailableError(`${label}: route calldata is not a swap call`);
      }
      assertRouteMatches(route, request);
      return route;
    } catch (err) {
      if (err instanceof QuoteUnavailableError) throw err;
      if (axios.isAxiosError(err) && err.response) {
        throw new QuoteUnavailableError(
          `${label}: aggregator API responded ${err.response.status}`
        );
      }
      throw new QuoteUnavailableError(
        `${label}: aggregator API unreachable (${
          err instanceof Error ? err.message : "Unknown error"
        })`
      );
    }
  }
}

export class AggregatorHandler extends BaseQuoteHandler {
  constructor(
    context: HandlerContext,
    private readonly routeSource: AggregatorRouteSource
  ) {
    super(context);
  }

  async prepare(
    router: RouterDescriptor,
    amountIn: bigint,
    tokenIn: string,
    tokenOut: string,
    _observedPool: PoolObservation
  ): Promise<PreparedSwap> {
    const label = `${router.name} ${tokenIn}->${tokenOut}`;
    const request: RouteRequest = {
      router,
      tokenIn,
      tokenOut,
      amountIn,
      from: this.context.walletAddress,
      slippageTolerancePercent: this.context.slippageTolerancePercent,
    };
    const route = await this.routeSource.fetchRoute(request);
    assertRouteMatches(route, request);
    logQuoteDebug(`${label}: route via executor ${route.executor}`);

    const routerContract = this.contract(router.address, AGGREGATOR_ROUTER_ABI);
    const quote = await this.runQuoteSteps(
      [
        {
          source: "aggregator-simulation",
          run: async () => {
            const simulated: { returnAmount: bigint } = await this.rpc.call(
              () =>
                routerContract.swap.staticCall(
                  route.executor,
                  { ...route.description, minReturn: SIMULATION_MIN_RETURN },
                  route.data,
                  { from: this.context.walletAddress }
                ),
              `${label} simulate swap`
            );
            return simulated.returnAmount;
          },
        },
      ],
      label
    );

    const minAmountOut = this.minAmountOut(quote.amountOut);
    logQuoteInfo(`${label}: simulated ${quote.amountOut}, minOut ${minAmountOut}`);

    return {
      expectedAmountOut: quote.amountOut,
      minAmountOut,
      quoteSource: quote.source,
      approximate: false,
      buildLeg: (recipient, nowSeconds) => ({
        leg: {
          tokenIn,
          tokenOut,
          amountIn,
          minAmountOut,
          router,
          deadline: this.deadline(nowSeconds),
        },
        request: {
          to: router.address,
          data: encodeSwapCalldata({
            ...route,
            description: {
              ...route.description,
              dstReceiver: recipient,
              minReturn: minAmountOut,
            },
          }),
        },
      }),
    };
  }
}
