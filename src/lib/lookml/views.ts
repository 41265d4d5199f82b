// View generation: semantic model -> LookML view block

import type {
  AggregationType,
  Dimension,
  Entity,
  Measure,
  SemanticModel,
} from "@/lib/semantic/types";
import {
  block,
  list,
  optionalStrings,
  sql,
  value,
  type LookmlBlock,
  type LookmlNode,
} from "./types";

export const DIMENSIONS_ONLY_SET = "dimensions_only";
export const MEASURE_SUFFIX = "_measure";

const LOOKML_MEASURE_TYPE: Record<AggregationType, string> = {
  count: "count",
  count_distinct: "count_distinct",
  sum: "sum",
  average: "average",
  min: "min",
  max: "max",
  median: "median",
  sum_boolean: "sum",
  percentile: "percentile",
};

const DEFAULT_TIMEFRAMES = ["date", "week", "month", "quarter", "year"];
const FINE_TIMEFRAMES = ["time", "hour", "date", "week", "month", "quarter", "year"];

const SIMPLE_COLUMN_RE = /^[A-Za-z0-9_]+$/;
const NUMERIC_LITERAL_RE = /^-?\d+(\.\d+)?$/;

export interface ViewOptions {
  viewPrefix?: string;
  schema?: string;
  /** Extra measures appended to the view, e.g. rendered metrics */
  extraMeasures?: LookmlNode[];
}

export function viewName(model: SemanticModel | string, prefix = ""): string {
  return `${prefix}${typeof model === "string" ? model : model.name}`;
}

/**
 * Qualify bare column names with ${TABLE} so joined views never produce
 * ambiguous references. Expressions and existing references pass through.
 */
export function qualifySql(expr: string | undefined, fieldName: string): string {
  if (expr === undefined) return "${TABLE}." + fieldName;
  const trimmed = expr.trim();
  if (trimmed.includes("${")) return trimmed;
  if (NUMERIC_LITERAL_RE.test(trimmed)) return trimmed;
  if (SIMPLE_COLUMN_RE.test(trimmed)) return "${TABLE}." + trimmed;
  return trimmed;
}

export function tableName(model: SemanticModel, schema = ""): string {
  const match = model.model.match(/ref\(\s*['"]([^'"]+)['"]\s*\)/);
  const table = match ? match[1] : model.model;
  return schema ? `${schema}.${table}` : table;
}

export function timeframesFor(dim: Dimension): string[] {
  return dim.timeGranularity === "hour" || dim.timeGranularity === "minute"
    ? FINE_TIMEFRAMES
    : DEFAULT_TIMEFRAMES;
}

function entityDimension(entity: Entity): LookmlBlock {
  const body: LookmlNode[] = [
    value("type", "string"),
    sql("sql", qualifySql(entity.expr, entity.name)),
  ];
  if (entity.type === "primary") body.push(value("primary_key", "yes"));
  // Entities are surrogate keys; natural keys belong in dimensions
  body.push(value("hidden", "yes"));
  body.push(...optionalStrings({ description: entity.description }));
  return block("dimension", entity.name, body);
}

function dimensionBlock(dim: Dimension): LookmlBlock {
  if (dim.type === "time") {
    return block("dimension_group", dim.name, [
      value("type", "time"),
      list("timeframes", timeframesFor(dim)),
      sql("sql", qualifySql(dim.expr, dim.name)),
      ...optionalStrings({ label: dim.label, description: dim.description }),
    ]);
  }
  return block("dimension", dim.name, [
    value("type", "string"),
    sql("sql", qualifySql(dim.expr, dim.name)),
    ...optionalStrings({ label: dim.label, description: dim.description }),
  ]);
}

function measureBlock(measure: Measure): LookmlBlock {
  const body: LookmlNode[] = [value("type", LOOKML_MEASURE_TYPE[measure.agg])];
  // LookML count measures count rows and take no sql
  if (measure.agg !== "count") {
    body.push(sql("sql", qualifySql(measure.expr, measure.name)));
  }
  body.push(...optionalStrings({ label: measure.label, description: measure.description }));
  // Raw measures are building blocks for metrics
  body.push(value("hidden", "yes"));
  return block("measure", `${measure.name}${MEASURE_SUFFIX}`, body);
}

/**
 * Hidden copy of a raw measure that only aggregates rows matching
 * `condition`. Counts become a sum over 1/0.
 */
export function filteredMeasureBlock(
  measure: Measure,
  fieldName: string,
  condition: string
): LookmlBlock {
  const isCount = measure.agg === "count";
  const sqlText = isCount
    ? `CASE WHEN ${condition} THEN 1 ELSE 0 END`
    : `CASE WHEN ${condition} THEN ${qualifySql(measure.expr, measure.name)} END`;
  return block("measure", fieldName, [
    value("type", isCount ? "sum" : LOOKML_MEASURE_TYPE[measure.agg]),
    sql("sql", sqlText),
    value("hidden", "yes"),
  ]);
}

/** Fields listed in the dimensions_only set joins expose */
export function dimensionFieldNames(model: SemanticModel): string[] {
  const names = model.entities.map((e) => e.name);
  for (const dim of model.dimensions) {
    if (dim.type === "time") {
      for (const tf of timeframesFor(dim)) names.push(`${dim.name}_${tf}`);
    } else {
      names.push(dim.name);
    }
  }
  return names;
}

export function buildView(model: SemanticModel, options: ViewOptions = {}): LookmlBlock {
  const body: LookmlNode[] = [sql("sql_table_name", tableName(model, options.schema))];
  body.push(...model.entities.map(entityDimension));
  body.push(...model.dimensions.filter((d) => d.type !== "time").map(dimensionBlock));
  body.push(...model.dimensions.filter((d) => d.type === "time").map(dimensionBlock));
  body.push(...model.measures.map(measureBlock));
  body.push(...(options.extraMeasures ?? []));

  const fields = dimensionFieldNames(model);
  if (fields.length > 0) {
    body.push(block("set", DIMENSIONS_ONLY_SET, [list("fields", fields)]));
  }

  return block("view", viewName(model, options.viewPrefix), body);
}
