import { ethers } from "ethers";
import Redis from "ioredis";
import { BotConfig, loadConfigFromEnv } from "./utils/config";
import { ResilientCallExecutor } from "./services/rpc";
import { createHandlers } from "./services/handlers";
import { HttpAggregatorRouteSource } from "./services/handlers/AggregatorHandler";
import { Erc20Service } from "./services/erc20";
import { TransactionSubmitter } from "./services/submitter";
import { SettlementVerifier } from "./services/settlement";
import { TradeExecutor } from "./services/trade";
import { RedisObservationStore } from "./services/store";
import { PriceService } from "./services/price";
import { ArbitrageService } from "./services/arbitrage";
import { logError, logInfo, logWarn } from "./utils/logger";

// Allowances below this are topped up to the maximum.
const ALLOWANCE_FLOOR = ethers.MaxUint256 / 2n;

class SpreadArbitrageBot {
  private readonly redis: Redis;
  private readonly erc20: Erc20Service;
  private readonly submitter: TransactionSubmitter;
  private readonly priceService: PriceService;
  private readonly arbitrageService: ArbitrageService;

  constructor(private readonly config: BotConfig) {
    this.redis = new Redis({
      host: config.redisHost,
      port: config.redisPort,
    });

    const provider = new ethers.JsonRpcProvider(config.rpcUrl);
    const wallet = new ethers.Wallet(config.privateKey, provider);
    const rpc = new ResilientCallExecutor({
      maxAttempts: config.rpcMaxRetries,
      baseDelayMs: config.rpcBackoffMs,
    });

    this.erc20 = new Erc20Service(provider, rpc);
    this.submitter = new TransactionSubmitter(wallet, provider, rpc, {
      maxGasLimit: config.maxGasLimit,
      confirmationTimeoutMs: config.txTimeoutMs,
    });

    const handlers = createHandlers(
      {
        chain: provider,
        rpc,
        walletAddress: wallet.address,
        slippageTolerancePercent: config.slippageTolerancePercent,
        deadlineSeconds: config.deadlineSeconds,
      },
      new HttpAggregatorRouteSource(config.aggregatorApiUrl, config.aggregatorApiKey)
    );

    const executor = new TradeExecutor(
      {
        baseCurrency: config.baseCurrency,
        tradeAmount: config.tradeAmount,
        routers: config.routers,
        cooldownMs: config.cooldownMs,
        maxLiquidityImpactPercent: config.maxLiquidityImpactPercent,
        baseCurrencyUsdPrice: config.baseCurrencyUsdPrice,
      },
      {
        handlers,
        submitter: this.submitter,
        tokens: this.erc20,
        settlement: new SettlementVerifier(config.baseCurrency),
      }
    );

    const store = new RedisObservationStore(this.redis);
    this.priceService = new PriceService(store, config.tokens, {
      apiUrl: config.feedApiUrl,
      chainId: config.chainId,
      baseCurrency: config.baseCurrency,
      minLiquidityUsd: config.minLiquidityUsd,
      minVolumeUsd: config.minVolumeUsd,
      v2FeeBps: config.v2FeeBps,
      v3FeeBps: config.v3FeeBps,
      ttlSeconds: config.observationTtlSeconds,
    });
    this.arbitrageService = new ArbitrageService(store, executor, config.tokens, {
      minSpreadPercent: config.minSpreadPercent,
      minLiquidityUsd: config.minLiquidityUsd,
      maxObservationAgeMs: config.observationTtlSeconds * 1000,
    });
  }

  /** Lets every configured router spend the base currency and the traded tokens. */
  async ensureAllowances(): Promise<void> {
    const routers = Object.values(this.config.routers);
    if (routers.length === 0) {
      logWarn("DEX_ROUTERS is empty; no venue is tradeable");
      return;
    }
    for (const router of routers) {
      for (const token of [this.config.baseCurrency, ...this.config.tokens]) {
        await this.erc20.ensureAllowance(this.submitter, token, router.address, ALLOWANCE_FLOOR);
      }
    }
  }

  async start() {
    logInfo(`Starting spread arbitrage bot for ${this.config.tokens.length} token(s)`);
    logInfo(`Trading wallet ${this.submitter.address}`);

    try {
      await this.ensureAllowances();
      await Promise.all([
        this.priceService.startPriceUpdates(this.config.pollIntervalMs),
        this.arbitrageService.startArbitrageScanning(),
      ]);
    } catch (error) {
      logError("Fatal error in main loop", error);
      process.exit(1);
    }
  }

  async cleanup() {
    this.priceService.stop();
    this.arbitrageService.stop();
    await this.redis.quit();
  }
}

const main = async () => {
  const bot = new SpreadArbitrageBot(loadConfigFromEnv());

  process.on("SIGINT", async () => {
    logInfo("Shutting down...");
    await bot.cleanup();
    process.exit();
  });

  await bot.start();
};

main().catch((error) => {
  logError("Failed to start bot", error);
  process.exit(1);
});
