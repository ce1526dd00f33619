/**
 * ╔══════════════════════════════════════════════════════════════╗
 * ║  Price Overlays — library entry point                       ║
 * ║                                                              ║
 * ║  Indicators, restricted formulas and event annotations       ║
 * ║  computed over OHLCV bar series for charting.                ║
 * ╚══════════════════════════════════════════════════════════════╝
 */

export * from "./types/market.js";
export * from "./types/events.js";
export {
  parsePriceBars,
  toPriceFrame,
  frameToBars,
  frameColumn,
  toSeries,
  SeriesValidationError,
} from "./series/frame.js";
export * from "./indicators/index.js";
export * from "./formula/index.js";
export * from "./events/index.js";
export * from "./metrics/index.js";
export * from "./export/csv.js";
export * from "./batch/index.js";
export * from "./providers/index.js";
export {
  TickerSchema,
  PriceBarSchema,
  PriceBarsSchema,
  IndicatorRequestSchema,
  DateRangeSchema,
  EarningsRecordSchema,
  SplitRecordSchema,
  HoldingSchema,
  type IndicatorRequest,
  type IndicatorKind,
  type Holding,
} from "./utils/validation.js";
export { createHandlers, type HandlerResult, type Handlers } from "./api/handlers.js";
export { logger, moduleLogger } from "./utils/logger.js";
