import { ProtocolFamily, QuoteHandler, RouterDescriptor } from "../../types/dex";
import { HandlerContext } from "./BaseQuoteHandler";
import { UniswapV2Handler } from "./UniswapV2Handler";
import { UniswapV3Handler } from "./UniswapV3Handler";
import { SolidlyHandler } from "./SolidlyHandler";
import { AggregatorHandler, AggregatorRouteSource } from "./AggregatorHandler";

export type HandlerSet = Record<ProtocolFamily, QuoteHandler>;

export function createHandlers(
  context: HandlerContext,
  routeSource: AggregatorRouteSource
): HandlerSet {
  return {
    V2: new UniswapV2Handler(context),
    V3: new UniswapV3Handler(context),
    Solidly: new SolidlyHandler(context),
    Aggregator: new AggregatorHandler(context, routeSource),
  };
}

export function selectHandler(
  router: RouterDescriptor,
  handlers: HandlerSet
): QuoteHandler {
  switch (router.protocolFamily) {
    case "V2":
      return handlers.V2;
    case "V3":
      return handlers.V3;
    case "Solidly":
      return handlers.Solidly;
    case "Aggregator":
      return handlers.Aggregator;
  }
}
