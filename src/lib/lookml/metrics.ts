// Metric measures: simple and ratio metrics rendered into their owning view

import type { SemanticIndex } from "@/lib/joins/semantic-index";
import { filterKey, substituteReferences } from "@/lib/semantic/filters";
import type { Measure, Metric, SemanticModel } from "@/lib/semantic/types";
import { extractMeasureDependencies } from "@/lib/validation/dependencies";
import { block, optionalStrings, ref, sql, value, type LookmlBlock } from "./types";
import { MEASURE_SUFFIX, qualifySql, viewName } from "./views";

/** A raw measure a metric aggregates, and the field the metric reads it through */
export interface MeasureUse {
  model: SemanticModel;
  measure: Measure;
  field: string;
}

/**
 * Field name for `measureName` as used by `metric`. Filtered metrics read
 * their own filtered copy of each measure.
 */
export function measureField(measureName: string, metric?: Metric): string {
  return metric?.filters?.length
    ? `${metric.name}__${measureName}${MEASURE_SUFFIX}`
    : `${measureName}${MEASURE_SUFFIX}`;
}

/**
 * Reference to a raw measure as seen from `ownerModel`'s view: bare inside the
 * same view, view-qualified otherwise.
 */
export function measureReference(
  measureName: string,
  ownerModel: string,
  index: SemanticIndex,
  viewPrefix = "",
  field = measureField(measureName)
): string {
  const model = index.measureToModel.get(measureName);
  if (!model) {
    throw new Error(`Measure "${measureName}" is not declared in any semantic model.`);
  }
  return model.name === ownerModel ? ref(field) : ref(`${viewName(model, viewPrefix)}.${field}`);
}

export function measureUses(metric: Metric, index: SemanticIndex): MeasureUse[] {
  const deps = extractMeasureDependencies(metric);
  if (!deps.supported) return [];

  return deps.measures.map((name) => {
    const model = index.measureToModel.get(name);
    const measure = model?.measures.find((m) => m.name === name);
    if (!model || !measure) {
      throw new Error(`Measure "${name}" is not declared in any semantic model.`);
    }
    return { model, measure, field: measureField(name, metric) };
  });
}

export type FilterCondition = { ok: true; sql: string } | { ok: false; reason: string };

/**
 * SQL condition for a metric's filters evaluated inside `model`'s view.
 * Every dimension must belong to that model, since the filtered measure is
 * computed there.
 */
export function filterCondition(
  metric: Metric,
  model: SemanticModel,
  index: SemanticIndex
): FilterCondition {
  const problems: string[] = [];
  const conditions = (metric.filters ?? []).map((expr) =>
    substituteReferences(expr, (reference) => {
      const key = filterKey(reference);
      const owner = index.entityToModel.get(reference.entity);
      const dim = owner?.dimensions.find((d) => d.name === reference.dimension);
      if (!owner || !dim) {
        problems.push(`unknown filter dimension '${key}'`);
      } else if (owner !== model) {
        problems.push(`filter dimension '${key}' is not on model '${model.name}'`);
      } else {
        return qualifySql(dim.expr, dim.name);
      }
      return reference.text;
    }).trim()
  );

  if (problems.length > 0) return { ok: false, reason: problems.join("; ") };
  return {
    ok: true,
    sql: conditions.length === 1 ? conditions[0] : conditions.map((c) => `(${c})`).join(" AND "),
  };
}

export function metricSql(
  metric: Metric,
  ownerModel: string,
  index: SemanticIndex,
  viewPrefix = ""
): string {
  const reference = (name: string) =>
    measureReference(name, ownerModel, index, viewPrefix, measureField(name, metric));

  switch (metric.type) {
    case "simple":
      return reference(metric.typeParams.measure);
    case "ratio":
      return `1.0 * ${reference(metric.typeParams.numerator)} / NULLIF(${reference(metric.typeParams.denominator)}, 0)`;
    default:
      throw new Error(
        `Metric "${metric.name}" of type ${metric.type} cannot be rendered as a LookML measure.`
      );
  }
}

export function buildMetricMeasure(
  metric: Metric,
  ownerModel: string,
  index: SemanticIndex,
  viewPrefix = ""
): LookmlBlock {
  return block("measure", metric.name, [
    value("type", "number"),
    sql("sql", metricSql(metric, ownerModel, index, viewPrefix)),
    ...optionalStrings({ label: metric.label, description: metric.description }),
  ]);
}
