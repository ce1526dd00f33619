/**
 * Overlay assembly
 *
 * Turns validated indicator requests into labelled, chart-ready groups of
 * named series. Price-scale indicators go on the price pane; bounded or
 * differently scaled ones go on an oscillator pane below it.
 */

import { evaluateFormula, type FormulaOptions } from "../formula/evaluator.js";
import { ema, sma } from "./moving-averages.js";
import { macd, rsi, stochastic } from "./momentum.js";
import { atr, bollingerBands } from "./volatility.js";
import { vwap } from "./volume.js";
import { ichimoku } from "./ichimoku.js";
import type { IndicatorKind, IndicatorRequest } from "../utils/validation.js";
import type { PriceFrame, Series } from "../types/market.js";

export type OverlayPane = "price" | "oscillator";

export interface Overlay {
  kind: IndicatorKind;
  label: string;
  pane: OverlayPane;
  series: Record<string, Series>;
}

/**
 * Compute one overlay.
 * Returns null only for a formula that yields no result.
 */
export function computeOverlay(
  frame: PriceFrame,
  request: IndicatorRequest,
  formulaOptions: FormulaOptions = {}
): Overlay | null {
  switch (request.kind) {
    case "sma":
      return {
        kind: request.kind,
        label: `SMA(${request.window})`,
        pane: "price",
        series: { sma: sma(frame, request.window) },
      };
    case "ema":
      return {
        kind: request.kind,
        label: `EMA(${request.window})`,
        pane: "price",
        series: { ema: ema(frame, request.window) },
      };
    case "rsi":
      return {
        kind: request.kind,
        label: `RSI(${request.window})`,
        pane: "oscillator",
        series: { rsi: rsi(frame, request.window) },
      };
    case "macd": {
      const result = macd(frame, request.fast, request.slow, request.signal);
      return {
        kind: request.kind,
        label: `MACD(${request.fast},${request.slow},${request.signal})`,
        pane: "oscillator",
        series: { ...result },
      };
    }
    case "bollinger": {
      const result = bollingerBands(frame, request.window, request.multiplier);
      return {
        kind: request.kind,
        label: `Bollinger(${request.window},${request.multiplier})`,
        pane: "price",
        series: { ...result },
      };
    }
    case "stochastic": {
      const result = stochastic(frame, request.kWindow, request.dWindow);
      return {
        kind: request.kind,
        label: `Stochastic(${request.kWindow},${request.dWindow})`,
        pane: "oscillator",
        series: { ...result },
      };
    }
    case "atr":
      return {
        kind: request.kind,
        label: `ATR(${request.window})`,
        pane: "oscillator",
        series: { atr: atr(frame, request.window) },
      };
    case "vwap":
      return {
        kind: request.kind,
        label: "VWAP",
        pane: "price",
        series: { vwap: vwap(frame) },
      };
    case "ichimoku":
      return {
        kind: request.kind,
        label: "Ichimoku(9,26,52)",
        pane: "price",
        series: { ...ichimoku(frame) },
      };
    case "formula": {
      const series = evaluateFormula(frame, request.formula, formulaOptions);
      if (series === null) return null;
      return {
        kind: request.kind,
        label: `Custom: ${request.formula}`,
        pane: "price",
        series: { value: series },
      };
    }
  }
}

/** Compute every requested overlay, dropping formulas with no result */
export function computeOverlays(
  frame: PriceFrame,
  requests: readonly IndicatorRequest[],
  formulaOptions: FormulaOptions = {}
): Overlay[] {
  const overlays: Overlay[] = [];
  for (const request of requests) {
    const overlay = computeOverlay(frame, request, formulaOptions);
    if (overlay !== null) overlays.push(overlay);
  }
  return overlays;
}
