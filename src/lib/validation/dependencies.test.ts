import { describe, expect, it } from "vitest";
import type { Metric } from "@/lib/semantic/types";
import { derivedMetric, ratioMetric, simpleMetric } from "@/test/fixtures";
import { extractMeasureDependencies } from "./dependencies";

describe("extractMeasureDependencies", () => {
  it("returns the measures simple and ratio metrics aggregate", () => {
    expect(extractMeasureDependencies(simpleMetric("a", "gmv"))).toEqual({
      supported: true,
      measures: ["gmv"],
    });
    expect(extractMeasureDependencies(ratioMetric("b", "gmv", "rental_count"))).toEqual({
      supported: true,
      measures: ["gmv", "rental_count"],
    });
    expect(extractMeasureDependencies(ratioMetric("c", "gmv", "gmv"))).toEqual({
      supported: true,
      measures: ["gmv"],
    });
  });

  it("flags derived and conversion metrics as unsupported", () => {
    const conversion: Metric = {
      name: "visit_to_buy",
      type: "conversion",
      typeParams: { conversionTypeParams: { entity: "user" } },
    };

    expect(extractMeasureDependencies(derivedMetric("d"))).toEqual({
      supported: false,
      reason: "derived metrics reference other metrics rather than measures",
    });
    expect(extractMeasureDependencies(conversion)).toEqual({
      supported: false,
      reason: "conversion metrics reference event measures that are not resolved yet",
    });
  });
});
