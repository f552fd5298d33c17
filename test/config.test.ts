import { loadConfig } from "../src/utils/config";
import { ConfigError } from "../src/utils/errors";
import { BASE, TOKEN, V2_ROUTER } from "./helpers/fixtures";

const TEST_KEY = "11".repeat(32);

const baseEnv = (overrides: Record<string, string | undefined> = {}) => ({
  RPC_URL: "http://localhost:8545",
  PRIVATE_KEY: TEST_KEY,
  TOKEN_ADDRESSES: `${TOKEN}, 0x52908400098527886e0f7030069857d2e4169ee7`,
  BASE_CURRENCY_ADDRESS: BASE,
  TRADE_AMOUNT_BASE_TOKEN: "0.01",
  ...overrides,
});

describe("loadConfig", () => {
  it("applies defaults and normalizes addresses and the key", () => {
    const config = loadConfig(baseEnv());

    expect(config.privateKey).toBe(`0x${TEST_KEY}`);
    expect(config.tokens).toEqual([TOKEN, "0x52908400098527886E0F7030069857D2E4169EE7"]);
    expect(config.chainId).toBe("base");
    expect(config.slippageTolerancePercent).toBe(1);
    expect(config.minSpreadPercent).toBe(1);
    expect(config.minLiquidityUsd).toBe(1000);
    expect(config.cooldownMs).toBe(60_000);
    expect(config.maxGasLimit).toBe(500_000n);
    expect(config.rpcMaxRetries).toBe(5);
    expect(config.maxLiquidityImpactPercent).toBe(10);
    expect(config.deadlineSeconds).toBe(300);
    expect(config.txTimeoutMs).toBe(120_000);
    expect(config.observationTtlSeconds).toBe(30);
    expect(config.baseCurrencyUsdPrice).toBeUndefined();
    expect(config.routers).toEqual({});
    expect(config.redisPort).toBe(6379);
  });

  it("reads overrides", () => {
    const config = loadConfig(
      baseEnv({
        TRADE_COOLDOWN_SECONDS: "5",
        MAX_GAS_LIMIT: "800000",
        BASE_CURRENCY_USD_PRICE: "3000",
        AGGREGATOR_API_KEY: "test-secret",
      })
    );

    expect(config.cooldownMs).toBe(5_000);
    expect(config.maxGasLimit).toBe(800_000n);
    expect(config.baseCurrencyUsdPrice).toBe(3000);
    expect(config.aggregatorApiKey).toBe("test-secret");
  });

  it("parses the router directory", () => {
    const config = loadConfig(
      baseEnv({
        DEX_ROUTERS: JSON.stringify({
          uniswap_v2: { address: V2_ROUTER.toLowerCase(), version: 2 },
        }),
      })
    );

    expect(config.routers.uniswap_v2).toEqual({
      name: "uniswap_v2",
      address: V2_ROUTER,
      protocolFamily: "V2",
      version: 2,
      factoryAddress: undefined,
      quoterAddress: undefined,
    });
  });

  it.each([
    ["a missing RPC_URL", { RPC_URL: undefined }, "Missing RPC_URL in environment variables"],
    ["a short key", { PRIVATE_KEY: "0x1234" }, "PRIVATE_KEY must be a 32-byte hex string"],
    [
      "a bad token",
      { TOKEN_ADDRESSES: "0xnope" },
      "TOKEN_ADDRESSES contains an invalid address '0xnope'",
    ],
    [
      "an empty token list",
      { TOKEN_ADDRESSES: " , " },
      "TOKEN_ADDRESSES must list at least one token",
    ],
    [
      "a non-decimal amount",
      { TRADE_AMOUNT_BASE_TOKEN: "1e3" },
      "TRADE_AMOUNT_BASE_TOKEN must be a positive decimal, got '1e3'",
    ],
    [
      "a zero amount",
      { TRADE_AMOUNT_BASE_TOKEN: "0.0" },
      "TRADE_AMOUNT_BASE_TOKEN must be a positive decimal, got '0.0'",
    ],
    [
      "full slippage",
      { SLIPPAGE_TOLERANCE_PERCENT: "100" },
      "SLIPPAGE_TOLERANCE_PERCENT must be below 100",
    ],
    [
      "a negative spread",
      { MIN_SPREAD_PERCENT: "-1" },
      "MIN_SPREAD_PERCENT must be a number >= 0, got '-1'",
    ],
    [
      "a fractional gas limit",
      { MAX_GAS_LIMIT: "21000.5" },
      "MAX_GAS_LIMIT must be an integer, got '21000.5'",
    ],
    ["malformed router JSON", { DEX_ROUTERS: "{" }, /^DEX_ROUTERS is not valid JSON/],
  ])("rejects %s", (_label, overrides, message) => {
    const load = () => loadConfig(baseEnv(overrides));
    expect(load).toThrow(ConfigError);
    expect(load).toThrow(message);
  });
});
