export { keyMetrics, type KeyMetrics } from "./key-metrics.js";
export * from "./portfolio.js";
