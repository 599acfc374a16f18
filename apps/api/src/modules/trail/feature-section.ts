import type { TradeCandidate, TrailSection } from "@tradegate/shared";

export const FEATURE_SECTIONS = Symbol("FEATURE_SECTIONS");

export type SectionReading = Record<string, number | null>;

export type SampleContext = {
  candidate: TradeCandidate;
  minuteOffset: number;
  atMs: number;
};

/**
 * One group of trail columns. `read` may throw or stall; the recorder bounds it
 * with a timeout and writes null for every declared column when it does.
 * Columns missing from the reading are stored as null.
 */
export interface FeatureSection {
  readonly section: TrailSection;
  readonly columns: readonly string[];
  read(context: SampleContext): Promise<SectionReading> | SectionReading;
}
