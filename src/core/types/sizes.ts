/**
 * Size parsing and classification types
 */

export type ClothingParse = {
  kind: "clothing";
  label: string;
  rank: number;
  /** Rank of the upper member for combinations like "S/M", else equal to rank */
  upperRank: number;
  /** Numeric suffix of mixed tokens like "S/46"; metadata only */
  measure: number | null;
};

export type RangeParse = { kind: "range"; low: number; high: number };

export type AgeParse = { kind: "age"; low: number; high: number };

export type UnparseableParse = { kind: "unparseable"; raw: string };

export type ParsedSize = ClothingParse | RangeParse | AgeParse | UnparseableParse;

export type NonSequentialReason = "descending" | "skipped_rank" | "mixed_scales";

export type NotApplicableReason =
  | "no_variant_axis"
  | "too_few_sizes"
  | "unparseable_token"
  | "customization";

export type SequenceVerdict =
  | { kind: "sequential" }
  | { kind: "non_sequential"; reason: NonSequentialReason; index: number }
  | { kind: "not_applicable"; reason: NotApplicableReason };

export type VerdictKind = SequenceVerdict["kind"];
