/**
 * Corporate event type definitions.
 * Raw records come from a corporate-action source; CorporateEvent is what charts annotate.
 */

export type CorporateEventKind = "Earnings" | "Split";

/** Chart annotation for a single corporate action */
export interface CorporateEvent {
  readonly date: Date;
  readonly kind: CorporateEventKind;
  readonly description: string;
}

/** Earnings report as delivered by the corporate-action source */
export interface EarningsRecord {
  date: Date;
  actualEps?: number | null;
  estimatedEps?: number | null;
}

/** Stock split; ratio is new shares per old share (4 = 4-for-1, 0.5 = 1-for-2) */
export interface SplitRecord {
  date: Date;
  ratio: number;
}
