export * from "./batch-analyzer.js";
export { parseTickerList, intervalForTimeframe } from "./tickers.js";
