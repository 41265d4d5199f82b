// Measure dependency extraction per metric type

import type { Metric } from "@/lib/semantic/types";

export type MeasureDependencies =
  | { supported: true; measures: string[] }
  | { supported: false; reason: string };

/**
 * Measures a metric aggregates directly, in declaration order without repeats.
 * Derived metrics depend on other metrics and conversion metrics on event
 * pairs; neither has a measure-level extraction yet.
 */
export function extractMeasureDependencies(metric: Metric): MeasureDependencies {
  switch (metric.type) {
    case "simple":
      return { supported: true, measures: [metric.typeParams.measure] };
    case "ratio": {
      const { numerator, denominator } = metric.typeParams;
      return {
        supported: true,
        measures: numerator === denominator ? [numerator] : [numerator, denominator],
      };
    }
    case "derived":
      return {
        supported: false,
        reason: "derived metrics reference other metrics rather than measures",
      };
    case "conversion":
      return {
        supported: false,
        reason: "conversion metrics reference event measures that are not resolved yet",
      };
  }
}
