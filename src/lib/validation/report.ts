// Plain-text report for validation results

import type { ValidationIssue, ValidationResult, ValidationSeverity } from "./types";

const MODEL_GROUP = "semantic models";

const SECTIONS: Array<{ severity: ValidationSeverity; title: string; marker: string }> = [
  { severity: "error", title: "Validation Errors", marker: "✗" },
  { severity: "warning", title: "Validation Warnings", marker: "⚠" },
];

function formatIssue(issue: ValidationIssue, marker: string): string[] {
  const [first, ...rest] = issue.message.split("\n");
  const lines = [`${marker} ${first}`, ...rest.map((l) => (l ? `  ${l}` : ""))];
  if (issue.suggestions.length > 0) {
    lines.push("  Suggestions:");
    for (const s of issue.suggestions) lines.push(`    - ${s}`);
  }
  return lines;
}

// Group by metric name, keeping first-seen order
function groupByMetric(issues: ValidationIssue[]): Map<string, ValidationIssue[]> {
  const groups = new Map<string, ValidationIssue[]>();
  for (const issue of issues) {
    const key = issue.metricName ?? MODEL_GROUP;
    const group = groups.get(key);
    if (group) group.push(issue);
    else groups.set(key, [issue]);
  }
  return groups;
}

export function formatReport(result: ValidationResult): string {
  if (result.issues.length === 0) {
    return "No validation issues found.";
  }

  const lines: string[] = [];
  for (const { severity, title, marker } of SECTIONS) {
    const issues = result.issues.filter((i) => i.severity === severity);
    if (issues.length === 0) continue;

    lines.push(`${title} (${issues.length})`, "");
    for (const [metric, group] of groupByMetric(issues)) {
      lines.push(`[${metric}]`);
      for (const issue of group) {
        lines.push(...formatIssue(issue, marker), "");
      }
    }
  }

  return lines.join("\n").trimEnd();
}

export function summarize(result: ValidationResult): string {
  const errors = result.errors().length;
  const warnings = result.warnings().length;
  return `${errors} error${errors === 1 ? "" : "s"}, ${warnings} warning${warnings === 1 ? "" : "s"}`;
}
