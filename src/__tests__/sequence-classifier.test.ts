import { describe, it, expect } from "vitest";
import {
  classifyProduct,
  classifySizes,
  isCustomizationProduct,
  verdictLabel,
} from "../core/sizes/classifier";

const sizes = (list: string) => list.split(",");

describe("classifySizes", () => {
  it("accepts clothing sizes in rank order", () => {
    expect(classifySizes("Size", sizes("XS,S,M,L,XL"))).toEqual({
      kind: "sequential",
    });
    expect(classifySizes("Taglia", sizes("S,M,L,XL,XXL,3XL"))).toEqual({
      kind: "sequential",
    });
  });

  it("flags descending clothing sizes at the first drop", () => {
    expect(classifySizes("Size", sizes("XS,XXS,XXXS"))).toEqual({
      kind: "non_sequential",
      reason: "descending",
      index: 1,
    });
    expect(classifySizes("Size", sizes("S,M,L,M"))).toEqual({
      kind: "non_sequential",
      reason: "descending",
      index: 3,
    });
  });

  it("accepts numeric ranges and age tokens in order", () => {
    expect(classifySizes("Size", sizes("36/37,38/39,40/41"))).toEqual({
      kind: "sequential",
    });
    expect(classifySizes("Size", sizes("5-6A,7-8A,910A"))).toEqual({
      kind: "sequential",
    });
    expect(classifySizes("Size", sizes("910A,1112A,1314"))).toEqual({
      kind: "sequential",
    });
  });

  it("flags a missing intermediate letter size in mixed tokens", () => {
    expect(classifySizes("Size", sizes("S/46,L/48"))).toEqual({
      kind: "non_sequential",
      reason: "skipped_rank",
      index: 1,
    });
  });

  it("flags a skipped rank in plain letter sizes", () => {
    expect(classifySizes("Size", sizes("S,L,XL"))).toEqual({
      kind: "non_sequential",
      reason: "skipped_rank",
      index: 1,
    });
  });

  it("does not treat equal neighbours as a break", () => {
    expect(classifySizes("Size", sizes("XL,XXL,2XL,3XL"))).toEqual({
      kind: "sequential",
    });
  });

  it("lets combinations cover the rank they span", () => {
    expect(classifySizes("Size", sizes("XS/S,M/L,XL/XXL"))).toEqual({
      kind: "sequential",
    });
  });

  it("flags lists mixing letter and numeric sizes", () => {
    expect(classifySizes("Size", sizes("S,M,40/41"))).toEqual({
      kind: "non_sequential",
      reason: "mixed_scales",
      index: 2,
    });
  });

  it("is not applicable without a variant axis", () => {
    expect(classifySizes("Default Title", sizes("S,M,L"))).toEqual({
      kind: "not_applicable",
      reason: "no_variant_axis",
    });
  });

  it("is not applicable for empty and single-token lists", () => {
    expect(classifySizes("Size", [])).toEqual({
      kind: "not_applicable",
      reason: "too_few_sizes",
    });
    expect(classifySizes("Size", ["Default"])).toEqual({
      kind: "not_applicable",
      reason: "too_few_sizes",
    });
  });

  it("is not applicable when any token is not a size", () => {
    expect(classifySizes("option", ["Add name/number", "No name"])).toEqual({
      kind: "not_applicable",
      reason: "unparseable_token",
    });
    expect(classifySizes("Size", ["S", "M", "Gift wrap"])).toEqual({
      kind: "not_applicable",
      reason: "unparseable_token",
    });
  });

  it("returns identical verdicts for identical input", () => {
    const a = JSON.stringify(classifySizes("Size", sizes("S,L,M")));
    const b = JSON.stringify(classifySizes("Size", sizes("S,L,M")));
    expect(a).toBe(b);
  });
});

describe("classifyProduct", () => {
  it("never judges customization add-ons", () => {
    expect(
      classifyProduct({
        title: "Shirt Printing - Add Your Name/Number",
        sizeType: "Size",
        sizes: ["L", "S"],
      }),
    ).toEqual({ kind: "not_applicable", reason: "customization" });
  });

  it("classifies ordinary products by their sizes", () => {
    expect(
      classifyProduct({ title: "Away Shirt", sizeType: "Size", sizes: ["L", "S"] }),
    ).toEqual({ kind: "non_sequential", reason: "descending", index: 1 });
  });
});

describe("isCustomizationProduct", () => {
  it("matches keywords case-insensitively", () => {
    expect(isCustomizationProduct("Badge - choose a patch")).toBe(true);
    expect(isCustomizationProduct("Training Jacket")).toBe(false);
  });
});

describe("verdictLabel", () => {
  it("names each verdict kind", () => {
    expect(verdictLabel({ kind: "sequential" })).toBe("Sequential");
    expect(
      verdictLabel({ kind: "non_sequential", reason: "descending", index: 1 }),
    ).toBe("Non-sequential");
    expect(verdictLabel({ kind: "not_applicable", reason: "too_few_sizes" })).toBe(
      "N/A",
    );
  });
});
