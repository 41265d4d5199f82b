// Small builders for semantic models and metrics used across tests

import type {
  Dimension,
  Entity,
  Measure,
  Metric,
  RatioMetric,
  SemanticModel,
  SimpleMetric,
} from "@/lib/semantic/types";

export interface ModelShape {
  primary?: string;
  foreign?: string[];
  measures?: string[];
  dimensions?: Dimension[];
}

export function model(name: string, shape: ModelShape = {}): SemanticModel {
  const entities: Entity[] = [];
  if (shape.primary) entities.push({ name: shape.primary, type: "primary" });
  for (const fk of shape.foreign ?? []) entities.push({ name: fk, type: "foreign" });

  const measures: Measure[] = (shape.measures ?? []).map((m) => ({ name: m, agg: "sum" }));
  return {
    name,
    model: `ref('${name}')`,
    entities,
    dimensions: shape.dimensions ?? [],
    measures,
  };
}

export function simpleMetric(name: string, measure: string, primaryEntity?: string): SimpleMetric {
  return { name, type: "simple", typeParams: { measure }, primaryEntity };
}

export function ratioMetric(
  name: string,
  numerator: string,
  denominator: string,
  primaryEntity?: string
): RatioMetric {
  return { name, type: "ratio", typeParams: { numerator, denominator }, primaryEntity };
}

export function derivedMetric(name: string, primaryEntity?: string): Metric {
  return {
    name,
    type: "derived",
    typeParams: { expr: "a - b", metrics: [{ name: "a" }, { name: "b" }] },
    primaryEntity,
  };
}
