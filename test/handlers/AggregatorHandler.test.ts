import axios, { AxiosError } from "axios";
import { ethers } from "ethers";
import {
  AGGREGATOR_ROUTER_ABI,
  AggregatorHandler,
  AggregatorRoute,
  AggregatorRouteSource,
  HttpAggregatorRouteSource,
  RouteRequest,
  SwapDescription,
  decodeSwapCalldata,
  encodeSwapCalldata,
} from "../../src/services/handlers/AggregatorHandler";
import { RouterDescriptor } from "../../src/types/dex";
import { QuoteUnavailableError } from "../../src/utils/errors";
import { FakeChain, instantRpc } from "../helpers/fakeChain";
import { AGGREGATOR_ROUTER, BASE, TOKEN, WALLET, observation } from "../helpers/fixtures";
import { axiosResponse } from "../helpers/http";

const EXECUTOR = "0x8800000000000000000000000000000000000088";
const RECIPIENT = "0x9100000000000000000000000000000000000091";

const aggregator: RouterDescriptor = {
  name: "oneinch",
  address: AGGREGATOR_ROUTER,
  protocolFamily: "Aggregator",
  version: 6,
};

const route: AggregatorRoute = {
  executor: EXECUTOR,
  description: {
    srcToken: BASE,
    dstToken: TOKEN,
    srcReceiver: EXECUTOR,
    dstReceiver: WALLET,
    amount: 1_000n,
    minReturn: 950n,
    flags: 4n,
  },
  data: "0x1234",
};

const routerInterface = new ethers.Interface(AGGREGATOR_ROUTER_ABI);

describe("AggregatorHandler", () => {
  let chain: FakeChain;
  let requests: RouteRequest[];
  let served: AggregatorRoute;
  let handler: AggregatorHandler;

  beforeEach(() => {
    chain = new FakeChain();
    requests = [];
    served = route;
    const source: AggregatorRouteSource = {
      fetchRoute: async (request) => {
        requests.push(request);
        return served;
      },
    };
    handler = new AggregatorHandler(
      {
        chain,
        rpc: instantRpc(),
        walletAddress: WALLET,
        slippageTolerancePercent: 1,
        deadlineSeconds: 300,
      },
      source
    );
  });

  it("simulates the swap with a placeholder minimum and reads the output", async () => {
    chain.on(AGGREGATOR_ROUTER, AGGREGATOR_ROUTER_ABI, "swap", () => [2_000n, 1_000n]);

    const prepared = await handler.prepare(aggregator, 1_000n, BASE, TOKEN, observation());

    expect(requests[0]).toEqual({
      router: aggregator,
      tokenIn: BASE,
      tokenOut: TOKEN,
      amountIn: 1_000n,
      from: WALLET,
      slippageTolerancePercent: 1,
    });
    const [simulation] = chain.calls;
    expect(simulation.method).toBe("swap");
    expect(simulation.args?.[1].minReturn).toBe(1n);
    expect(prepared.quoteSource).toBe("aggregator-simulation");
    expect(prepared.expectedAmountOut).toBe(2_000n);
    expect(prepared.minAmountOut).toBe(1_980n);
  });

  it("rebuilds the real call with the slippage-adjusted minimum and recipient", async () => {
    chain.on(AGGREGATOR_ROUTER, AGGREGATOR_ROUTER_ABI, "swap", () => [2_000n, 1_000n]);
    const prepared = await handler.prepare(aggregator, 1_000n, BASE, TOKEN, observation());

    const built = prepared.buildLeg(RECIPIENT, 10);
    expect(built.request.to).toBe(AGGREGATOR_ROUTER);
    expect(built.leg.minAmountOut).toBe(1_980n);

    const decoded = routerInterface.parseTransaction({ data: String(built.request.data) });
    expect(decoded?.args[0]).toBe(EXECUTOR);
    expect(decoded?.args[1].minReturn).toBe(1_980n);
    expect(decoded?.args[1].dstReceiver).toBe(RECIPIENT);
    expect(decoded?.args[1].flags).toBe(4n);
    expect(decoded?.args[2]).toBe("0x1234");
  });

  const mismatches: Array<[string, Partial<SwapDescription>, string]> = [
    ["sells another token", { srcToken: TOKEN }, `route sells ${TOKEN}`],
    ["buys another token", { dstToken: BASE }, `route buys ${BASE}`],
    ["spends another amount", { amount: 2_000n }, "route spends 2000, requested 1000"],
  ];

  it.each(mismatches)("refuses a route that %s before simulating it", async (_l, change, message) => {
    served = { ...route, description: { ...route.description, ...change } };
    chain.on(AGGREGATOR_ROUTER, AGGREGATOR_ROUTER_ABI, "swap", () => [2_000n, 1_000n]);

    const prepare = handler.prepare(aggregator, 1_000n, BASE, TOKEN, observation());

    await expect(prepare).rejects.toBeInstanceOf(QuoteUnavailableError);
    await expect(prepare).rejects.toThrow(message);
    expect(chain.calls).toEqual([]);
  });

  it("reports a reverting simulation as QuoteUnavailable", async () => {
    await expect(
      handler.prepare(aggregator, 1_000n, BASE, TOKEN, observation())
    ).rejects.toBeInstanceOf(QuoteUnavailableError);
  });
});

describe("swap calldata", () => {
  it("decodes what it encodes", () => {
    expect(decodeSwapCalldata(encodeSwapCalldata(route))).toEqual(route);
  });

  it("rejects calldata for other functions", () => {
    expect(decodeSwapCalldata("0xdeadbeef")).toBeNull();
  });
});

describe("HttpAggregatorRouteSource", () => {
  const request: RouteRequest = {
    router: aggregator,
    tokenIn: BASE,
    tokenOut: TOKEN,
    amountIn: 1_000n,
    from: WALLET,
    slippageTolerancePercent: 1,
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("requests a swap route and decodes its calldata", async () => {
    const get = jest
      .spyOn(axios, "get")
      .mockResolvedValue(
        axiosResponse({ tx: { to: AGGREGATOR_ROUTER, data: encodeSwapCalldata(route) } })
      );

    const source = new HttpAggregatorRouteSource("https://aggregator.test/v6", "test-key");
    await expect(source.fetchRoute(request)).resolves.toEqual(route);

    expect(get).toHaveBeenCalledWith("https://aggregator.test/v6/swap", {
      params: {
        src: BASE,
        dst: TOKEN,
        amount: "1000",
        from: WALLET,
        origin: WALLET,
        slippage: 1,
        disableEstimate: true,
      },
      headers: { Authorization: "Bearer test-key" },
      timeout: 10_000,
    });
  });

  it("rejects a route aimed at a different router", async () => {
    jest
      .spyOn(axios, "get")
      .mockResolvedValue(axiosResponse({ tx: { to: EXECUTOR, data: encodeSwapCalldata(route) } }));

    const source = new HttpAggregatorRouteSource("https://aggregator.test/v6");
    await expect(source.fetchRoute(request)).rejects.toBeInstanceOf(QuoteUnavailableError);
  });

  it("rejects a route for a different amount", async () => {
    const doubled = { ...route, description: { ...route.description, amount: 2_000n } };
    jest
      .spyOn(axios, "get")
      .mockResolvedValue(
        axiosResponse({ tx: { to: AGGREGATOR_ROUTER, data: encodeSwapCalldata(doubled) } })
      );

    const source = new HttpAggregatorRouteSource("https://aggregator.test/v6");
    await expect(source.fetchRoute(request)).rejects.toThrow(
      "oneinch 0x4200000000000000000000000000000000000006->0x7000000000000000000000000000000000000007: route spends 2000, requested 1000"
    );
  });

  it("maps HTTP errors to QuoteUnavailable", async () => {
    const error = new AxiosError(
      "Request failed",
      "ERR_BAD_REQUEST",
      undefined,
      undefined,
      axiosResponse({ description: "insufficient liquidity" }, 400)
    );
    jest.spyOn(axios, "get").mockRejectedValue(error);

    const source = new HttpAggregatorRouteSource("https://aggregator.test/v6");
    await expect(source.fetchRoute(request)).rejects.toThrow(
      "oneinch 0x4200000000000000000000000000000000000006->0x7000000000000000000000000000000000000007: aggregator API responded 400"
    );
  });
});
