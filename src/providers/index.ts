export type { BarProvider, CorporateActionSource } from "./types.js";
export { InMemoryMarketData } from "./in-memory.js";
