// Zod schemas for validating dbt semantic layer YAML structures

import { z } from "zod";

export const entityTypeSchema = z.enum(["primary", "foreign", "unique", "natural"]);

export const joinCardinalitySchema = z.enum([
  "one_to_one",
  "one_to_many",
  "many_to_one",
  "many_to_many",
]);

export const entitySchema = z.object({
  name: z.string().min(1),
  type: entityTypeSchema,
  expr: z.string().min(1).optional(),
  description: z.string().optional(),
  config: z
    .object({
      meta: z
        .looseObject({
          join_cardinality: joinCardinalitySchema.optional(),
        })
        .optional(),
    })
    .optional(),
});

export const dimensionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["categorical", "time"]),
  expr: z.string().min(1).optional(),
  label: z.string().optional(),
  description: z.string().optional(),
  type_params: z
    .object({
      time_granularity: z
        .enum(["minute", "hour", "day", "week", "month", "quarter", "year"])
        .optional(),
    })
    .optional(),
});

export const measureSchema = z.object({
  name: z.string().min(1),
  agg: z.enum([
    "count",
    "count_distinct",
    "sum",
    "average",
    "min",
    "max",
    "median",
    "sum_boolean",
    "percentile",
  ]),
  expr: z.union([z.string().min(1), z.number()]).optional(),
  label: z.string().optional(),
  description: z.string().optional(),
});

export const semanticModelSchema = z.object({
  name: z.string().min(1),
  model: z.string().min(1),
  description: z.string().optional(),
  entities: z.array(entitySchema).default([]),
  dimensions: z.array(dimensionSchema).default([]),
  measures: z.array(measureSchema).default([]),
});

// dbt accepts either `measure: revenue` or `measure: { name: revenue }`
const measureRefSchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1) }).transform((ref) => ref.name),
]);

const metricMetaSchema = z.looseObject({
  primary_entity: z.string().min(1).optional(),
});

const metricCommon = {
  name: z.string().min(1),
  label: z.string().optional(),
  description: z.string().optional(),
  meta: metricMetaSchema.optional(),
  config: z.object({ meta: metricMetaSchema.optional() }).optional(),
  // "{{ Dimension('rental__status') }} = 'completed'", or a list of such
  filter: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
};

export const metricSchema = z.discriminatedUnion("type", [
  z.object({
    ...metricCommon,
    type: z.literal("simple"),
    type_params: z.object({ measure: measureRefSchema }),
  }),
  z.object({
    ...metricCommon,
    type: z.literal("ratio"),
    type_params: z.object({
      numerator: measureRefSchema,
      denominator: measureRefSchema,
    }),
  }),
  z.object({
    ...metricCommon,
    type: z.literal("derived"),
    type_params: z.object({
      expr: z.string().min(1),
      metrics: z
        .array(
          z.object({
            name: z.string().min(1),
            alias: z.string().optional(),
            offset_window: z.string().optional(),
          })
        )
        .default([]),
    }),
  }),
  z.object({
    ...metricCommon,
    type: z.literal("conversion"),
    type_params: z.object({
      conversion_type_params: z.record(z.string(), z.unknown()).default({}),
    }),
  }),
]);

export const semanticFileSchema = z.object({
  semantic_models: z.array(semanticModelSchema).default([]),
  metrics: z.array(metricSchema).default([]),
});

export type SemanticModelYaml = z.infer<typeof semanticModelSchema>;
export type MetricYaml = z.infer<typeof metricSchema>;
export type SemanticFileYaml = z.infer<typeof semanticFileSchema>;
