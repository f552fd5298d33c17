import winston from "winston";
import { format } from "winston";

const { combine, timestamp, colorize, printf } = format;

const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    trade: 3,
    quote: 4,
    debug: 5,
  },
  colors: {
    error: "red",
    warn: "yellow",
    info: "white",
    trade: "green",
    quote: "cyan",
    debug: "blue",
  },
};

winston.addColors(customLevels.colors);

const logFormat = printf((info) => {
  const { timestamp, level, message } = info;
  return `${timestamp} [${level}]: ${message}`;
});

const silent = process.env.NODE_ENV === "test";

const createLogger = (filename: string) => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: combine(timestamp(), colorize({ all: true }), logFormat),
    }),
  ];
  if (!silent && process.env.LOG_TO_FILE !== "false") {
    transports.push(
      new winston.transports.File({
        filename: `logs/${filename}.log`,
        format: combine(timestamp(), format.uncolorize(), logFormat),
      })
    );
  }

  return winston.createLogger({
    levels: customLevels.levels,
    level: process.env.LOG_LEVEL || "debug",
    silent,
    format: combine(timestamp(), colorize({ all: true }), logFormat),
    transports,
  });
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : JSON.stringify(error);
};

const rpcLogger = createLogger("rpc");
const quoteLogger = createLogger("quote");
const tradeLogger = createLogger("trade");
const feedLogger = createLogger("feed");
const mainLogger = createLogger("main");

const withError =
  (logger: winston.Logger) => (message: string, error?: unknown) => {
    if (error !== undefined) {
      logger.error(message, { error: describeError(error) });
    } else {
      logger.error(message);
    }
  };

// RPC resilience
export const logRpcWarn = (message: string) => rpcLogger.warn(message);
export const logRpcDebug = (message: string) => rpcLogger.debug(message);
export const logRpcError = withError(rpcLogger);

// Quote strategies
export const logQuote = (message: string) => quoteLogger.log("quote", message);
export const logQuoteInfo = (message: string) => quoteLogger.info(message);
export const logQuoteWarn = (message: string) => quoteLogger.warn(message);
export const logQuoteDebug = (message: string) => quoteLogger.debug(message);

// Trade orchestration
export const logTrade = (message: string) => tradeLogger.log("trade", message);
export const logTradeInfo = (message: string) => tradeLogger.info(message);
export const logTradeWarn = (message: string) => tradeLogger.warn(message);
export const logTradeDebug = (message: string) => tradeLogger.debug(message);
export const logTradeError = withError(tradeLogger);

// Price feed
export const logFeedInfo = (message: string) => feedLogger.info(message);
export const logFeedDebug = (message: string) => feedLogger.debug(message);
export const logFeedWarn = (message: string) => feedLogger.warn(message);
export const logFeedError = withError(feedLogger);

// General
export const logError = withError(mainLogger);
export const logInfo = (message: string) => mainLogger.info(message);
export const logWarn = (message: string) => mainLogger.warn(message);
