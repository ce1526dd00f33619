/**
 * Rolling-window primitives shared by every indicator and the formula evaluator.
 *
 * All functions take and return plain value arrays (null = not available) and
 * never mutate their input. A window containing a null yields null.
 */

import type { SeriesValue } from "../types/market.js";

export type Aggregate = "mean" | "std" | "min" | "max" | "sum";

export function assertWindow(window: number, name: string = "window"): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${window}`);
  }
}

function finiteOrNull(value: number): SeriesValue {
  return Number.isFinite(value) ? value : null;
}

/**
 * Aggregate a list of numbers. std is the sample standard deviation (n − 1),
 * so a single observation has no std.
 */
export function aggregate(values: readonly number[], kind: Aggregate): SeriesValue {
  const n = values.length;
  if (n === 0) return null;

  switch (kind) {
    case "sum":
      return finiteOrNull(values.reduce((s, v) => s + v, 0));
    case "mean":
      return finiteOrNull(values.reduce((s, v) => s + v, 0) / n);
    case "min":
      return Math.min(...values);
    case "max":
      return Math.max(...values);
    case "std": {
      if (n < 2) return null;
      const mean = values.reduce((s, v) => s + v, 0) / n;
      const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / (n - 1);
      return finiteOrNull(Math.sqrt(variance));
    }
  }
}

/** Aggregate over all available points, skipping nulls */
export function aggregateAll(values: readonly SeriesValue[], kind: Aggregate): SeriesValue {
  return aggregate(
    values.filter((v): v is number => v !== null),
    kind
  );
}

/**
 * Trailing-window aggregate. Output i covers inputs [i − window + 1, i];
 * the first window − 1 points are null.
 *
 * Runs in O(n) for any window: running sums for sum/mean/std, a monotonic
 * deque for min/max. A null restarts the running state.
 */
export function rolling(
  values: readonly SeriesValue[],
  window: number,
  kind: Aggregate
): SeriesValue[] {
  assertWindow(window);
  switch (kind) {
    case "min":
      return rollingExtreme(values, window, (incoming, kept) => incoming <= kept);
    case "max":
      return rollingExtreme(values, window, (incoming, kept) => incoming >= kept);
    case "sum":
    case "mean":
    case "std":
      return rollingMoments(values, window, kind);
  }
}

/**
 * `evicts(incoming, kept)` is true when a newer value makes an older one
 * irrelevant. The deque front is always the window's extreme.
 */
function rollingExtreme(
  values: readonly SeriesValue[],
  window: number,
  evicts: (incoming: number, kept: number) => boolean
): SeriesValue[] {
  const result: SeriesValue[] = new Array<SeriesValue>(values.length).fill(null);
  const deque: { index: number; value: number }[] = [];
  let head = 0;
  let runStart = 0;

  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v === null) {
      deque.length = 0;
      head = 0;
      runStart = i + 1;
      continue;
    }

    while (deque.length > head && evicts(v, deque[deque.length - 1].value)) deque.pop();
    deque.push({ index: i, value: v });
    if (deque[head].index <= i - window) head++;

    if (i - runStart + 1 >= window) result[i] = deque[head].value;
  }

  return result;
}

/**
 * Sums are kept relative to a pivot (the first value of the window they were
 * last rebuilt from) and rebuilt every `window` steps, O(n) amortized.
 * A window of identical values is reported exactly.
 */
function rollingMoments(
  values: readonly SeriesValue[],
  window: number,
  kind: "sum" | "mean" | "std"
): SeriesValue[] {
  const result: SeriesValue[] = new Array<SeriesValue>(values.length).fill(null);
  let runStart = 0;
  let pivot = 0;
  let sum = 0;
  let sumSq = 0;
  let sameRun = 0;

  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v === null) {
      runStart = i + 1;
      continue;
    }

    const count = i - runStart + 1;
    sameRun = count > 1 && values[i - 1] === v ? sameRun + 1 : 1;

    if (count === 1 || (count > window && (count - 1) % window === 0)) {
      const from = Math.max(runStart, i - window + 1);
      pivot = values[from] ?? v;
      sum = 0;
      sumSq = 0;
      for (let j = from; j <= i; j++) {
        const d = (values[j] ?? pivot) - pivot;
        sum += d;
        sumSq += d * d;
      }
    } else {
      const d = v - pivot;
      sum += d;
      sumSq += d * d;
      if (count > window) {
        const out = (values[i - window] ?? pivot) - pivot;
        sum -= out;
        sumSq -= out * out;
      }
    }

    if (count < window) continue;

    if (sameRun >= window) {
      result[i] = kind === "sum" ? finiteOrNull(v * window) : kind === "mean" ? v : window < 2 ? null : 0;
      continue;
    }

    switch (kind) {
      case "sum":
        result[i] = finiteOrNull(pivot * window + sum);
        break;
      case "mean":
        result[i] = finiteOrNull(pivot + sum / window);
        break;
      case "std": {
        if (window < 2) break;
        const variance = Math.max(0, (sumSq - (sum * sum) / window) / (window - 1));
        result[i] = finiteOrNull(Math.sqrt(variance));
        break;
      }
    }
  }

  return result;
}

/**
 * Exponentially weighted mean with α = 2 / (span + 1), seeded with the first
 * available value. A null input after seeding carries the previous mean.
 */
export function ewm(values: readonly SeriesValue[], span: number): SeriesValue[] {
  if (!Number.isFinite(span) || span < 1) {
    throw new RangeError(`span must be >= 1, got ${span}`);
  }
  const alpha = 2 / (span + 1);
  const result: SeriesValue[] = [];
  let prev: number | null = null;

  for (const v of values) {
    if (v === null) {
      result.push(prev);
      continue;
    }
    prev = prev === null ? v : alpha * v + (1 - alpha) * prev;
    result.push(prev);
  }

  return result;
}

/**
 * Shift values by `periods` positions. Positive moves values later in time
 * (out[i] = in[i − periods]); negative moves them earlier. Vacated slots are null.
 */
export function shift(values: readonly SeriesValue[], periods: number = 1): SeriesValue[] {
  if (!Number.isInteger(periods)) {
    throw new RangeError(`periods must be an integer, got ${periods}`);
  }
  return values.map((_, i) => {
    const src = i - periods;
    return src >= 0 && src < values.length ? values[src] : null;
  });
}

/** out[i] = in[i] − in[i − periods] */
export function diff(values: readonly SeriesValue[], periods: number = 1): SeriesValue[] {
  return combine(values, shift(values, periods), (a, b) => a - b);
}

/** Running total from the first point; a null input makes every later total null */
export function cumulativeSum(values: readonly SeriesValue[]): SeriesValue[] {
  const result: SeriesValue[] = [];
  let total: number | null = 0;
  for (const v of values) {
    total = total === null || v === null ? null : total + v;
    result.push(total);
  }
  return result;
}

/**
 * Element-wise binary operation. Null on either side, or a non-finite result
 * (division by zero), yields null.
 */
export function combine(
  a: readonly SeriesValue[],
  b: readonly SeriesValue[],
  fn: (x: number, y: number) => number
): SeriesValue[] {
  if (a.length !== b.length) {
    throw new RangeError(`Cannot combine series of length ${a.length} and ${b.length}`);
  }
  return a.map((x, i) => {
    const y = b[i];
    if (x === null || y === null) return null;
    return finiteOrNull(fn(x, y));
  });
}

/** Element-wise unary operation with the same null rules as combine */
export function mapValues(
  values: readonly SeriesValue[],
  fn: (x: number) => number
): SeriesValue[] {
  return values.map((x) => (x === null ? null : finiteOrNull(fn(x))));
}
