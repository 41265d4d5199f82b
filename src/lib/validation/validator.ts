// Entity connectivity validation for metrics spanning several semantic models

import { DEFAULT_MAX_HOPS, JoinGraph } from "@/lib/joins/graph";
import {
  buildSemanticIndex,
  primaryEntityOf,
  type SemanticIndex,
} from "@/lib/joins/semantic-index";
import { SemanticContractError } from "@/lib/semantic/errors";
import { filterKey, filterReferences, unsupportedTemplates } from "@/lib/semantic/filters";
import type { Metric, SemanticModel } from "@/lib/semantic/types";
import { extractMeasureDependencies } from "./dependencies";
import {
  createIssue,
  IssueType,
  ValidationResult,
  type ValidationIssue,
} from "./types";

// Number of example names listed when a reference is unknown
const SAMPLE_SIZE = 10;

function sampleList(names: string[]): string {
  const remaining = names.length - SAMPLE_SIZE;
  return names.slice(0, SAMPLE_SIZE).join(", ") + (remaining > 0 ? ` (and ${remaining} more)` : "");
}

export interface ValidatorOptions {
  /** Traversal ceiling for join graphs (default 2) */
  maxHops?: number;
  /** Reachable measures deeper than this are warned about (default 2) */
  hopWarningThreshold?: number;
}

type PrimaryEntityResolution =
  | { ok: true; entity: string }
  | { ok: false; issue: ValidationIssue };

/**
 * Checks that every measure a metric depends on can be joined to the metric's
 * primary entity. The indexes are built once from the model set given at
 * construction; build a new validator when the models change.
 */
export class EntityConnectivityValidator {
  readonly index: SemanticIndex;
  readonly maxHops: number;
  readonly hopWarningThreshold: number;

  constructor(models: readonly SemanticModel[], options: ValidatorOptions = {}) {
    this.index = buildSemanticIndex(models);
    this.maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
    this.hopWarningThreshold = options.hopWarningThreshold ?? DEFAULT_MAX_HOPS;

    if (!Number.isInteger(this.maxHops) || this.maxHops < 1) {
      throw new SemanticContractError(
        `maxHops must be a positive integer, got ${this.maxHops}.`
      );
    }
    if (!Number.isInteger(this.hopWarningThreshold) || this.hopWarningThreshold < 0) {
      throw new SemanticContractError(
        `hopWarningThreshold must be a non-negative integer, got ${this.hopWarningThreshold}.`
      );
    }
  }

  validateMetric(metric: Metric): ValidationResult {
    return this.validateMetrics([metric]);
  }

  /**
   * Validate every metric, continuing past failures. Index issues come first,
   * then each metric's issues in input order. A repeated metric name is
   * reported and only its first declaration is checked.
   */
  validateMetrics(metrics: readonly Metric[]): ValidationResult {
    const result = new ValidationResult(this.index.issues);
    const graphs = new Map<string, JoinGraph>();
    const seen = new Set<string>();

    for (const metric of metrics) {
      if (seen.has(metric.name)) {
        result.add(
          createIssue(
            IssueType.DuplicateMetric,
            metric.name,
            `Metric '${metric.name}' is declared more than once. Only the first declaration is checked and rendered.`,
            ["Rename or remove the repeated metric"]
          )
        );
        continue;
      }
      seen.add(metric.name);
      this.checkMetric(metric, result, graphs);
    }
    return result;
  }

  /**
   * The explicit primary entity when it is known, otherwise the entity
   * inferred for ratio metrics; undefined when neither applies.
   */
  primaryEntityFor(metric: Metric): string | undefined {
    const resolution = this.resolvePrimaryEntity(metric);
    return resolution.ok ? resolution.entity : undefined;
  }

  joinGraphFor(baseEntity: string): JoinGraph {
    return new JoinGraph(baseEntity, this.index, this.maxHops);
  }

  private checkMetric(
    metric: Metric,
    result: ValidationResult,
    graphs: Map<string, JoinGraph>
  ): void {
    assertMetricShape(metric);

    const resolution = this.resolvePrimaryEntity(metric);
    if (!resolution.ok) {
      result.add(resolution.issue);
      return;
    }
    const primaryEntity = resolution.entity;

    const deps = extractMeasureDependencies(metric);
    if (!deps.supported) {
      result.add(
        createIssue(
          IssueType.UnsupportedMetricType,
          metric.name,
          `Metric '${metric.name}' was not checked for connectivity: ${deps.reason}.`,
          [
            "Check by hand that every metric or measure it builds on is reachable from " +
              `'${primaryEntity}'`,
          ],
          { primaryEntity }
        )
      );
      return;
    }

    const missing = deps.measures.filter((m) => !this.index.measureToModel.has(m));
    if (missing.length > 0) {
      for (const name of missing) {
        result.add(this.missingMeasureIssue(metric, name));
      }
      return;
    }

    let graph = graphs.get(primaryEntity);
    if (!graph) {
      graph = this.joinGraphFor(primaryEntity);
      graphs.set(primaryEntity, graph);
    }

    for (const measureName of deps.measures) {
      const measureModel = this.index.measureToModel.get(measureName);
      if (!measureModel) continue;

      const hops = graph.getHopCount(measureModel.name);
      if (hops === undefined) {
        result.add(
          this.unreachableMeasureIssue(metric, measureName, measureModel, primaryEntity, graph)
        );
      } else if (hops > this.hopWarningThreshold) {
        result.add(
          createIssue(
            IssueType.ExceedsHopLimit,
            metric.name,
            `Metric '${metric.name}' requires ${hops} join hops to reach measure '${measureName}'.\n\n` +
              `This exceeds the recommended ${this.hopWarningThreshold}-hop limit and may cause performance issues.`,
            [
              "Consider changing the primary_entity to reduce join depth",
              "Consider creating a derived table to pre-join the required data",
              "Review the join graph to optimize the relationship structure",
            ],
            {
              primaryEntity,
              measureName,
              measureModel: measureModel.name,
              hopCount: hops,
            }
          )
        );
      }
    }

    this.checkFilters(metric, primaryEntity, graph, result);
  }

  // Filter dimensions must exist and be joinable to the primary entity
  private checkFilters(
    metric: Metric,
    primaryEntity: string,
    graph: JoinGraph,
    result: ValidationResult
  ): void {
    for (const expr of metric.filters ?? []) {
      for (const template of unsupportedTemplates(expr)) {
        result.add(
          createIssue(
            IssueType.InvalidMetricFilter,
            metric.name,
            `Metric '${metric.name}' filter uses an unsupported expression: ${template}`,
            [
              "Filter with {{ Dimension('entity__dimension') }} or " +
                "{{ TimeDimension('entity__dimension', 'grain') }}",
            ],
            { primaryEntity }
          )
        );
      }

      for (const ref of filterReferences(expr)) {
        const key = filterKey(ref);
        const model = this.index.entityToModel.get(ref.entity);

        if (!model || !model.dimensions.some((d) => d.name === ref.dimension)) {
          result.add(
            createIssue(
              IssueType.InvalidMetricFilter,
              metric.name,
              `Metric '${metric.name}' filter references unknown dimension '${key}'.\n\n` +
                `Available dimensions: ${sampleList(this.dimensionKeys())}`,
              [
                "Name the dimension as <primary entity>__<dimension>",
                "Check that the dimension is declared on the model owning that primary entity",
              ],
              { primaryEntity, dimensionName: key }
            )
          );
          continue;
        }

        if (!graph.isModelReachable(model.name)) {
          const baseModel = graph.baseModel?.name ?? "unknown";
          result.add(
            createIssue(
              IssueType.InvalidMetricFilter,
              metric.name,
              `Metric '${metric.name}' filter references dimension '${key}' from the '${model.name}' model, ` +
                `which is not reachable from '${baseModel}' within ${this.maxHops} foreign key joins.`,
              [
                "Filter on a dimension of a model joined to the primary entity",
                `Add a foreign key relationship between ${baseModel} and ${model.name}`,
              ],
              { primaryEntity, baseModel, dimensionName: key }
            )
          );
        }
      }
    }
  }

  private resolvePrimaryEntity(metric: Metric): PrimaryEntityResolution {
    if (metric.primaryEntity !== undefined) {
      if (this.index.entityToModel.has(metric.primaryEntity)) {
        return { ok: true, entity: metric.primaryEntity };
      }
      return { ok: false, issue: this.invalidPrimaryEntityIssue(metric, metric.primaryEntity) };
    }

    // Ratio metrics are owned by their denominator's entity
    if (metric.type === "ratio") {
      const denominatorModel = this.index.measureToModel.get(metric.typeParams.denominator);
      const entity = denominatorModel ? primaryEntityOf(denominatorModel) : undefined;
      if (entity) {
        return { ok: true, entity: entity.name };
      }
    }

    return { ok: false, issue: this.missingPrimaryEntityIssue(metric) };
  }

  private availableEntities(): string[] {
    return [...this.index.entityToModel.keys()].sort();
  }

  private dimensionKeys(): string[] {
    const keys: string[] = [];
    for (const [entity, model] of this.index.entityToModel) {
      for (const dim of model.dimensions) keys.push(`${entity}__${dim.name}`);
    }
    return keys.sort();
  }

  private invalidPrimaryEntityIssue(metric: Metric, entity: string): ValidationIssue {
    const available = this.availableEntities();
    return createIssue(
      IssueType.InvalidPrimaryEntity,
      metric.name,
      `Metric '${metric.name}' has invalid primary_entity: '${entity}'.\n\n` +
        `No semantic model has '${entity}' as a primary entity.\n\n` +
        `Available entities: ${available.join(", ")}`,
      [
        "Fix the primary_entity name in the metric's meta block",
        `Use one of the available entities: ${available.slice(0, 3).join(", ")}`,
        "Verify the entity name matches exactly (case-sensitive)",
      ],
      { primaryEntity: entity, availableEntities: available }
    );
  }

  private missingPrimaryEntityIssue(metric: Metric): ValidationIssue {
    const available = this.availableEntities();
    const deps = extractMeasureDependencies(metric);
    const measures = deps.supported ? deps.measures : [];

    const owners: string[] = [];
    const lines = measures.map((name) => {
      const model = this.index.measureToModel.get(name);
      if (!model) return `  - ${name} (not declared in any semantic model)`;
      const entity = primaryEntityOf(model);
      if (!entity) return `  - ${name} (model ${model.name}, no primary entity)`;
      owners.push(entity.name);
      return `  - ${name} (model ${model.name}, entity ${entity.name})`;
    });

    let message =
      `Metric '${metric.name}' has no primary_entity specified.\n\n` +
      "Cross-entity metrics require an explicit primary_entity in the meta block " +
      "to determine which semantic model owns the metric.";
    if (lines.length > 0) {
      message += `\n\nReferenced measures:\n${lines.join("\n")}`;
    }
    message += `\n\nAvailable entities: ${available.join(", ")}`;

    const example = owners[0] ?? available[0] ?? "<entity>";
    return createIssue(
      IssueType.MissingPrimaryEntity,
      metric.name,
      message,
      [
        "Add 'primary_entity' to the metric's meta block",
        "For ratio metrics, the primary_entity should typically be the denominator's entity",
        `Example: meta: {primary_entity: '${example}'}`,
      ],
      { availableEntities: available }
    );
  }

  private missingMeasureIssue(metric: Metric, measureName: string): ValidationIssue {
    const available = [...this.index.measureToModel.keys()].sort();

    return createIssue(
      IssueType.MissingMeasure,
      metric.name,
      `Metric '${metric.name}' references non-existent measure '${measureName}'.\n\n` +
        `Available measures: ${sampleList(available)}`,
      [
        "Verify the measure names are spelled correctly",
        "Check that the semantic models defining these measures are included",
        "Ensure measure definitions exist in the semantic model YAML files",
      ],
      { measureName }
    );
  }

  private unreachableMeasureIssue(
    metric: Metric,
    measureName: string,
    measureModel: SemanticModel,
    primaryEntity: string,
    graph: JoinGraph
  ): ValidationIssue {
    const baseModel = graph.baseModel?.name ?? "unknown";
    return createIssue(
      IssueType.UnreachableMeasure,
      metric.name,
      `Metric '${metric.name}' cannot be generated.\n\n` +
        `Primary Entity: ${primaryEntity}\n` +
        `Base Model: ${baseModel}\n` +
        `Unreachable Measure: ${measureName} (from ${measureModel.name} model)\n\n` +
        `The '${measureModel.name}' model is not reachable from '${baseModel}' ` +
        `within ${this.maxHops} foreign key joins.`,
      [
        "Change primary_entity to an entity that connects both models",
        `Add a foreign key relationship between ${baseModel} and ${measureModel.name}`,
        "Consider using a derived table approach for this metric",
      ],
      {
        primaryEntity,
        baseModel,
        measureName,
        measureModel: measureModel.name,
      }
    );
  }
}

function assertMetricShape(metric: Metric): void {
  if (!metric.name) {
    throw new SemanticContractError("Metric with an empty name.");
  }
  const refs =
    metric.type === "simple"
      ? [metric.typeParams.measure]
      : metric.type === "ratio"
        ? [metric.typeParams.numerator, metric.typeParams.denominator]
        : [];
  for (const ref of refs) {
    if (typeof ref !== "string" || ref.length === 0) {
      throw new SemanticContractError(
        `Metric "${metric.name}" of type ${metric.type} has an empty measure reference.`
      );
    }
  }
}
