import { describe, expect, it } from "vitest";
import { formatReport, summarize } from "./report";
import { createIssue, IssueType, ValidationResult } from "./types";

describe("formatReport", () => {
  it("says so when there is nothing to report", () => {
    expect(formatReport(new ValidationResult())).toBe("No validation issues found.");
  });

  it("groups issues by severity, then by metric", () => {
    const result = new ValidationResult([
      createIssue(IssueType.DuplicateMeasure, undefined, "Duplicate gmv", []),
      createIssue(IssueType.UnreachableMeasure, "m1", "Line one\n\nLine three", ["Do a", "Do b"]),
      createIssue(IssueType.ExceedsHopLimit, "m1", "Too deep", ["Join less"]),
    ]);

    expect(formatReport(result)).toBe(
      [
        "Validation Errors (1)",
        "",
        "[m1]",
        "✗ Line one",
        "",
        "  Line three",
        "  Suggestions:",
        "    - Do a",
        "    - Do b",
        "",
        "Validation Warnings (2)",
        "",
        "[semantic models]",
        "⚠ Duplicate gmv",
        "",
        "[m1]",
        "⚠ Too deep",
        "  Suggestions:",
        "    - Join less",
      ].join("\n")
    );
  });

  it("keeps metrics in the order their issues were found", () => {
    const result = new ValidationResult([
      createIssue(IssueType.MissingMeasure, "zeta", "z", []),
      createIssue(IssueType.MissingMeasure, "alpha", "a", []),
      createIssue(IssueType.MissingMeasure, "zeta", "z2", []),
    ]);

    expect(formatReport(result)).toBe(
      ["Validation Errors (3)", "", "[zeta]", "✗ z", "", "✗ z2", "", "[alpha]", "✗ a"].join("\n")
    );
  });
});

describe("summarize", () => {
  it("pluralizes counts", () => {
    const result = new ValidationResult([
      createIssue(IssueType.MissingMeasure, "a", "x", []),
      createIssue(IssueType.ExceedsHopLimit, "a", "y", []),
      createIssue(IssueType.UnsupportedMetricType, "b", "z", []),
    ]);

    expect(summarize(result)).toBe("1 error, 2 warnings");
    expect(summarize(new ValidationResult())).toBe("0 errors, 0 warnings");
  });
});
