import { z } from "zod";

export const TrailSectionSchema = z.enum([
  "price_movements",
  "order_book",
  "transactions",
  "whale_activity",
  "session",
  "btc_correlation",
  "eth_correlation",
  "patterns",
  "pre_entry"
]);
export type TrailSection = z.infer<typeof TrailSectionSchema>;

export const SECTION_PREFIXES: ReadonlyArray<{ prefix: string; section: TrailSection }> = [
  { prefix: "pm_", section: "price_movements" },
  { prefix: "ob_", section: "order_book" },
  { prefix: "tx_", section: "transactions" },
  { prefix: "wh_", section: "whale_activity" },
  { prefix: "ss_", section: "session" },
  { prefix: "btc_", section: "btc_correlation" },
  { prefix: "eth_", section: "eth_correlation" },
  { prefix: "pat_", section: "patterns" },
  { prefix: "pre_", section: "pre_entry" }
];

export function sectionForColumn(columnName: string): TrailSection | null {
  const match = SECTION_PREFIXES.find((p) => columnName.startsWith(p.prefix));
  return match ? match.section : null;
}

export const TrailSnapshotSchema = z.object({
  candidateId: z.string().min(1),
  minuteOffset: z.number().int(),
  columnName: z.string().min(1),
  value: z.number().nullable(),
  section: TrailSectionSchema,
  capturedAt: z.string().min(1)
});
export type TrailSnapshot = z.infer<typeof TrailSnapshotSchema>;

export type SnapshotWriteResult = "inserted" | "duplicate";

export function snapshotKey(row: Pick<TrailSnapshot, "candidateId" | "minuteOffset" | "columnName">): string {
  return `${row.candidateId}|${row.minuteOffset}|${row.columnName}`;
}
