// Core TypeScript types for dbt semantic models and metrics

export type EntityType = "primary" | "foreign" | "unique" | "natural";

export type JoinCardinality =
  | "one_to_one"
  | "one_to_many"
  | "many_to_one"
  | "many_to_many";

export type DimensionType = "categorical" | "time";

export type TimeGranularity =
  | "minute"
  | "hour"
  | "day"
  | "week"
  | "month"
  | "quarter"
  | "year";

export type AggregationType =
  | "count"
  | "count_distinct"
  | "sum"
  | "average"
  | "min"
  | "max"
  | "median"
  | "sum_boolean"
  | "percentile";

export type MetricType = "simple" | "ratio" | "derived" | "conversion";

export interface Entity {
  name: string;
  type: EntityType;
  expr?: string;
  description?: string;
  joinCardinality?: JoinCardinality; // from config.meta.join_cardinality
}

export interface Dimension {
  name: string;
  type: DimensionType;
  expr?: string;
  label?: string;
  description?: string;
  timeGranularity?: TimeGranularity;
}

export interface Measure {
  name: string;
  agg: AggregationType;
  expr?: string;
  label?: string;
  description?: string;
}

export interface SemanticModel {
  name: string;
  model: string; // ref('table') or a bare table name
  description?: string;
  entities: Entity[];
  dimensions: Dimension[];
  measures: Measure[];
}

export interface MetricReference {
  name: string;
  alias?: string;
  offsetWindow?: string;
}

interface MetricBase {
  name: string;
  label?: string;
  description?: string;
  primaryEntity?: string;
  /** dbt filter expressions, AND-ed together */
  filters?: string[];
}

export interface SimpleMetric extends MetricBase {
  type: "simple";
  typeParams: { measure: string };
}

export interface RatioMetric extends MetricBase {
  type: "ratio";
  typeParams: { numerator: string; denominator: string };
}

export interface DerivedMetric extends MetricBase {
  type: "derived";
  typeParams: { expr: string; metrics: MetricReference[] };
}

export interface ConversionMetric extends MetricBase {
  type: "conversion";
  typeParams: { conversionTypeParams: Record<string, unknown> };
}

export type Metric = SimpleMetric | RatioMetric | DerivedMetric | ConversionMetric;

export interface SemanticProject {
  models: SemanticModel[];
  metrics: Metric[];
}
