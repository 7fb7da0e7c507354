/**
 * Size token parsing
 *
 * Turns one raw variant title ("XL", "36/37", "5-6A", "910A", "S/46",
 * "S/M") into a tagged, comparable form. Rules are tried in a fixed order
 * and the first match wins; reordering them changes how short numerics and
 * slash tokens are read.
 */

import type { ClothingParse, ParsedSize } from "../types";

/** Clothing labels and their rank. XXL/2XL and XXXL/3XL share a rank. */
export const CLOTHING_RANKS: Readonly<Record<string, number>> = {
  XXXS: 1,
  XXS: 2,
  XS: 3,
  S: 4,
  M: 5,
  L: 6,
  XL: 7,
  XXL: 8,
  "2XL": 8,
  XXXL: 9,
  "3XL": 9,
  "4XL": 10,
};

const NUMERIC_RANGE = /^(\d+)[/-](\d+)$/;
const AGE_SEPARATED = /^(\d{1,2})[/-](\d{1,2})[A-Z]?$/;
const AGE_RUN = /^(\d{3,4})[A-Z]?$/;
const LETTER_WITH_MEASURE = /^(\d?X*[SML])\/(\d+)$/;
const LETTER_PAIR = /^([0-9A-Z]+)\/([0-9A-Z]+)$/;

function clothing(label: string): ClothingParse | null {
  const rank = CLOTHING_RANKS[label];
  if (rank === undefined) return null;
  return { kind: "clothing", label, rank, upperRank: rank, measure: null };
}

/**
 * Splits a separator-less age run: 3 digits as 1+2 or 2+1, 4 digits as 2+2.
 * Both parts must be 1-2 digits without a leading zero and first <= second.
 */
export function splitAgeRun(run: string): [number, number] | null {
  const cuts = run.length === 3 ? [1, 2] : run.length === 4 ? [2] : [];
  for (const cut of cuts) {
    const a = run.slice(0, cut);
    const b = run.slice(cut);
    if (a.startsWith("0") || b.startsWith("0")) continue;
    const low = Number(a);
    const high = Number(b);
    if (low <= high) return [low, high];
  }
  return null;
}

function parseAge(token: string): ParsedSize | null {
  const sep = AGE_SEPARATED.exec(token);
  if (sep) {
    const low = Number(sep[1]);
    const high = Number(sep[2]);
    return low <= high ? { kind: "age", low, high } : null;
  }
  const run = AGE_RUN.exec(token);
  if (run) {
    const pair = splitAgeRun(run[1]);
    return pair ? { kind: "age", low: pair[0], high: pair[1] } : null;
  }
  return null;
}

/**
 * Parses one size token. Never throws; anything it cannot read comes back
 * as `unparseable`.
 */
export function parseSizeToken(raw: string): ParsedSize {
  const token = raw.replace(/\s+/g, "").toUpperCase();
  if (!token) return { kind: "unparseable", raw };

  const exact = clothing(token);
  if (exact) return exact;

  const range = NUMERIC_RANGE.exec(token);
  if (range) {
    const a = Number(range[1]);
    const b = Number(range[2]);
    return { kind: "range", low: Math.min(a, b), high: Math.max(a, b) };
  }

  const age = parseAge(token);
  if (age) return age;

  const mixed = LETTER_WITH_MEASURE.exec(token);
  if (mixed) {
    const base = clothing(mixed[1]);
    if (base) return { ...base, label: token, measure: Number(mixed[2]) };
  }

  const pair = LETTER_PAIR.exec(token);
  if (pair) {
    const first = clothing(pair[1]);
    const second = clothing(pair[2]);
    if (first && second) {
      return {
        kind: "clothing",
        label: token,
        rank: Math.min(first.rank, second.rank),
        upperRank: Math.max(first.rank, second.rank),
        measure: null,
      };
    }
  }

  return { kind: "unparseable", raw };
}

/** Ordering key: clothing rank, or the lower bound of a numeric pair */
export function comparisonKey(parsed: ParsedSize): number | null {
  switch (parsed.kind) {
    case "clothing":
      return parsed.rank;
    case "range":
    case "age":
      return parsed.low;
    case "unparseable":
      return null;
  }
}
