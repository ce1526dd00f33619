/**
 * Indicator Library — barrel export
 */

export * from "./rolling.js";
export * from "./moving-averages.js";
export * from "./momentum.js";
export * from "./volatility.js";
export * from "./volume.js";
export * from "./ichimoku.js";
export * from "./overlays.js";
