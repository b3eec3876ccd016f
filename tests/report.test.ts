import { describe, it, expect } from "@jest/globals";
import { formatFitLine, formatSequenceHeader, formatSummary, RULE } from "@/lib/omori/report";
import { summarizeResults } from "@/lib/omori/analyzer";
import { fitStub, fittedStub, insufficientStub, mainshockStub } from "./helpers/results";

describe("formatSequenceHeader", () => {
  it("numbers from one and truncates the place", () => {
    const result = fittedStub({ mainshock: mainshockStub({ place: "123 km ENE of A Very Long Place Name, Region" }) });
    expect(formatSequenceHeader(result, 0, 12)).toBe("[1/12] Analyzing M6.5 - 123 km ENE of A Very Long Plac...");
  });

  it("falls back to the id without a place", () => {
    expect(formatSequenceHeader(insufficientStub(3), 4, 5)).toBe("[5/5] Analyzing M6.5 - ms2...");
  });
});

describe("formatFitLine", () => {
  it("prints fitted parameters", () => {
    expect(formatFitLine(fittedStub())).toBe("    K=12.35, c=0.057, p=1.09, R²=0.951");
  });

  it("flags a fit under the threshold", () => {
    const result = fittedStub({
      status: "fit-failed",
      success: false,
      modified: fitStub({ r_squared: 0.3, success: false, failure_reason: "below-threshold" }),
    });
    expect(formatFitLine(result)).toBe("    K=12.35, c=0.057, p=1.09, R²=0.300 (below threshold)");
  });

  it("names the failure reason", () => {
    const result = fittedStub({
      status: "fit-failed",
      success: false,
      modified: fitStub({ params: null, r_squared: null, success: false, failure_reason: "iteration-limit" }),
    });
    expect(formatFitLine(result)).toBe("    Fitting failed (iteration-limit)");
  });

  it("reports skipped sequences", () => {
    expect(formatFitLine(insufficientStub(7))).toBe("    Skipping (only 7 aftershocks)");
  });
});

describe("formatSummary", () => {
  it("stops after the counts when nothing was fitted", () => {
    expect(formatSummary(summarizeResults([insufficientStub(4)]), 0.5)).toEqual([
      RULE,
      "ANALYSIS SUMMARY",
      RULE,
      "Total sequences analyzed: 1",
      "Insufficient data: 1",
      "Successful fits (R² > 0.5): 0",
    ]);
  });

  it("adds parameter statistics and the literature comparison", () => {
    const summary = summarizeResults([fittedStub(), insufficientStub(2)]);
    expect(formatSummary(summary, 0.5)).toEqual([
      RULE,
      "ANALYSIS SUMMARY",
      RULE,
      "Total sequences analyzed: 2",
      "Insufficient data: 1",
      "Successful fits (R² > 0.5): 1",
      "",
      "Omori's Law Parameters (n=1):",
      "  p (decay exponent): 1.09 ± 0.00",
      "  p range: [1.09, 1.09]",
      "  Average R²: 0.951",
      "  Original Omori (p=1) mean R²: 0.900 vs modified 0.951 (n=1)",
      "",
      "Comparison to literature:",
      "  Our mean p = 1.09 vs. literature p ≈ 1.0-1.3",
    ]);
  });
});
