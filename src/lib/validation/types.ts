// Validation issue model for metric connectivity checks

export type ValidationSeverity = "error" | "warning";

/**
 * Every kind of problem the connectivity validator can report.
 */
export const IssueType = {
  InvalidPrimaryEntity: "invalid_primary_entity",
  MissingPrimaryEntity: "missing_primary_entity",
  MissingMeasure: "missing_measure",
  UnreachableMeasure: "unreachable_measure",
  InvalidMetricFilter: "invalid_metric_filter",
  DuplicateMetric: "duplicate_metric",
  ExceedsHopLimit: "exceeds_hop_limit",
  UnsupportedMetricType: "unsupported_metric_type",
  DuplicatePrimaryEntity: "duplicate_primary_entity",
  DuplicateMeasure: "duplicate_measure",
} as const;

export type IssueType = (typeof IssueType)[keyof typeof IssueType];

export const ISSUE_SEVERITY = {
  invalid_primary_entity: "error",
  missing_primary_entity: "error",
  missing_measure: "error",
  unreachable_measure: "error",
  invalid_metric_filter: "error",
  duplicate_metric: "error",
  exceeds_hop_limit: "warning",
  unsupported_metric_type: "warning",
  duplicate_primary_entity: "warning",
  duplicate_measure: "warning",
} as const satisfies Record<IssueType, ValidationSeverity>;

export interface IssueContext {
  primaryEntity?: string;
  baseModel?: string;
  measureName?: string;
  measureModel?: string;
  hopCount?: number;
  /** `entity__dimension` named in a metric filter */
  dimensionName?: string;
  availableEntities?: readonly string[];
  /** Models involved in a duplicate declaration, in declaration order */
  modelNames?: readonly string[];
}

export interface ValidationIssue extends Readonly<IssueContext> {
  readonly severity: ValidationSeverity;
  readonly issueType: IssueType;
  /** Undefined for issues about the semantic models themselves */
  readonly metricName?: string;
  readonly message: string;
  readonly suggestions: readonly string[];
}

export function createIssue(
  issueType: IssueType,
  metricName: string | undefined,
  message: string,
  suggestions: string[],
  context: IssueContext = {}
): ValidationIssue {
  return Object.freeze({
    ...context,
    severity: ISSUE_SEVERITY[issueType],
    issueType,
    metricName,
    message,
    suggestions: Object.freeze([...suggestions]),
  });
}

/**
 * Append-only collection of issues from one validation run.
 */
export class ValidationResult {
  private readonly _issues: ValidationIssue[] = [];

  constructor(issues: Iterable<ValidationIssue> = []) {
    for (const issue of issues) this._issues.push(issue);
  }

  get issues(): readonly ValidationIssue[] {
    return this._issues;
  }

  add(issue: ValidationIssue): void {
    this._issues.push(issue);
  }

  merge(other: ValidationResult): void {
    this._issues.push(...other.issues);
  }

  hasErrors(): boolean {
    return this._issues.some((i) => i.severity === "error");
  }

  hasWarnings(): boolean {
    return this._issues.some((i) => i.severity === "warning");
  }

  errors(): ValidationIssue[] {
    return this._issues.filter((i) => i.severity === "error");
  }

  warnings(): ValidationIssue[] {
    return this._issues.filter((i) => i.severity === "warning");
  }

  issuesFor(metricName: string): ValidationIssue[] {
    return this._issues.filter((i) => i.metricName === metricName);
  }
}
