import { describe, it, expect } from "vitest";
import { diffSnapshots, EMPTY_DIFF, isEmptyDiff } from "../core/diff/engine";
import { buildSnapshot, hasDiscount } from "../core/diff/snapshot";
import { discounted, makeProduct, snapshotOf } from "./helpers";

describe("buildSnapshot", () => {
  it("keeps catalog order and attaches a verdict to each product", () => {
    const { snapshot, rejected } = buildSnapshot(
      [
        makeProduct({ id: "b", sizes: ["S", "M"] }),
        makeProduct({ id: "a", sizes: ["M", "S"] }),
      ],
      "2025-01-01T10:00:00.000Z",
    );
    expect(rejected).toEqual([]);
    expect(Array.from(snapshot.entries.keys())).toEqual(["b", "a"]);
    expect(snapshot.entries.get("b")?.verdict).toEqual({ kind: "sequential" });
    expect(snapshot.entries.get("a")?.verdict.kind).toBe("non_sequential");
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it("rejects products without an id and repeated ids", () => {
    const { snapshot, rejected } = buildSnapshot(
      [
        makeProduct({ id: "" }),
        makeProduct({ id: "x", title: "First" }),
        makeProduct({ id: "x", title: "Second" }),
      ],
      "2025-01-01T10:00:00.000Z",
    );
    expect(rejected).toEqual([
      { id: null, reason: "missing id" },
      { id: "x", reason: "duplicate id" },
    ]);
    expect(snapshot.entries.size).toBe(1);
    expect(snapshot.entries.get("x")?.product.title).toBe("First");
  });
});

describe("hasDiscount", () => {
  it("is true only with a positive discount amount", () => {
    expect(hasDiscount(makeProduct())).toBe(false);
    expect(
      hasDiscount(discounted({ priceMinor: 4000, originalPriceMinor: 5000 })),
    ).toBe(true);
  });
});

describe("diffSnapshots", () => {
  it("returns an empty result on the first run", () => {
    const current = snapshotOf([makeProduct({ id: "a" }), makeProduct({ id: "b" })]);
    expect(diffSnapshots(null, current)).toBe(EMPTY_DIFF);
    expect(diffSnapshots(undefined, current)).toBe(EMPTY_DIFF);
  });

  it("returns an empty result when comparing a snapshot with itself", () => {
    const s = snapshotOf([
      makeProduct({ id: "a" }),
      discounted({ id: "b", priceMinor: 4000, originalPriceMinor: 5000 }),
      makeProduct({ id: "c", sizes: ["L", "S"] }),
    ]);
    expect(isEmptyDiff(diffSnapshots(s, s))).toBe(true);
  });

  it("reports new products, new discounts and verdict transitions", () => {
    const previous = snapshotOf([
      makeProduct({ id: "A", title: "Product A", priceMinor: 2000 }),
      discounted({
        id: "B",
        title: "Product B",
        priceMinor: 3000,
        originalPriceMinor: 4000,
        sizes: ["S", "M", "L"],
      }),
    ]);
    const current = snapshotOf([
      discounted({
        id: "A",
        title: "Product A",
        priceMinor: 1500,
        originalPriceMinor: 2000,
      }),
      discounted({
        id: "B",
        title: "Product B",
        priceMinor: 3000,
        originalPriceMinor: 4000,
        sizes: ["S", "L", "M"],
      }),
      makeProduct({ id: "C", title: "Product C" }),
    ]);

    const diff = diffSnapshots(previous, current);

    expect(diff.newProducts.map((p) => p.id)).toEqual(["C"]);
    expect(diff.newDiscounts.map((p) => p.id)).toEqual(["A"]);
    expect(diff.sequenceTransitions).toHaveLength(1);
    expect(diff.sequenceTransitions[0].product.id).toBe("B");
    expect(diff.sequenceTransitions[0].from).toEqual({ kind: "sequential" });
    expect(diff.sequenceTransitions[0].to).toEqual({
      kind: "non_sequential",
      reason: "skipped_rank",
      index: 1,
    });
  });

  it("ignores discounts that only changed magnitude", () => {
    const previous = snapshotOf([
      discounted({ id: "a", priceMinor: 4500, originalPriceMinor: 5000 }),
    ]);
    const current = snapshotOf([
      discounted({ id: "a", priceMinor: 2500, originalPriceMinor: 5000 }),
    ]);
    expect(diffSnapshots(previous, current).newDiscounts).toEqual([]);
  });

  it("does not report removed products", () => {
    const previous = snapshotOf([makeProduct({ id: "a" }), makeProduct({ id: "b" })]);
    const current = snapshotOf([makeProduct({ id: "a" })]);
    expect(isEmptyDiff(diffSnapshots(previous, current))).toBe(true);
  });

  it("reports transitions into and out of not applicable", () => {
    const previous = snapshotOf([
      makeProduct({ id: "a", sizes: ["S"] }),
      makeProduct({ id: "b", sizes: ["S", "M"] }),
    ]);
    const current = snapshotOf([
      makeProduct({ id: "a", sizes: ["S", "M"] }),
      makeProduct({ id: "b", sizes: ["M"] }),
    ]);
    const diff = diffSnapshots(previous, current);
    expect(
      diff.sequenceTransitions.map((t) => [t.product.id, t.from.kind, t.to.kind]),
    ).toEqual([
      ["a", "not_applicable", "sequential"],
      ["b", "sequential", "not_applicable"],
    ]);
  });

  it("follows the current snapshot's order in every list", () => {
    const previous = snapshotOf([makeProduct({ id: "old" })]);
    const current = snapshotOf([
      makeProduct({ id: "z" }),
      makeProduct({ id: "old" }),
      makeProduct({ id: "m" }),
      makeProduct({ id: "a" }),
    ]);
    expect(diffSnapshots(previous, current).newProducts.map((p) => p.id)).toEqual([
      "z",
      "m",
      "a",
    ]);
  });

  it("skips entries without an id instead of failing", () => {
    const previous = snapshotOf([makeProduct({ id: "a" })]);
    const current = {
      takenAt: "2025-01-02T10:00:00.000Z",
      entries: new Map([
        ["", { product: makeProduct({ id: "" }), verdict: { kind: "sequential" as const } }],
        ["n", { product: makeProduct({ id: "n" }), verdict: { kind: "sequential" as const } }],
      ]),
    };
    expect(diffSnapshots(previous, current).newProducts.map((p) => p.id)).toEqual([
      "n",
    ]);
  });

  it("produces identical output for identical input", () => {
    const previous = snapshotOf([makeProduct({ id: "a" })]);
    const current = snapshotOf([makeProduct({ id: "a" }), makeProduct({ id: "b" })]);
    expect(JSON.stringify(diffSnapshots(previous, current))).toBe(
      JSON.stringify(diffSnapshots(previous, current)),
    );
  });

  it("freezes the result", () => {
    const previous = snapshotOf([makeProduct({ id: "a" })]);
    const current = snapshotOf([makeProduct({ id: "b" })]);
    const diff = diffSnapshots(previous, current);
    expect(Object.isFrozen(diff)).toBe(true);
    expect(Object.isFrozen(diff.newProducts)).toBe(true);
  });
});
