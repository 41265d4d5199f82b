import { z } from "zod";
import {
  DEFAULT_HOP_WARNING_THRESHOLD,
  DEFAULT_LOOKER_CONNECTION,
  DEFAULT_LOOKML_OUTPUT_DIR,
  DEFAULT_MAX_JOIN_HOPS,
  DEFAULT_METRICS_DIR,
  DEFAULT_SEMANTIC_MODELS_DIR,
} from "./constants";

const flag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

/**
 * Environment variable schema for semantic-lookml
 * Single source of truth for all configuration
 */
export const configSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Input
  SEMANTIC_MODELS_DIR: z.string().min(1).default(DEFAULT_SEMANTIC_MODELS_DIR),
  METRICS_DIR: z.string().min(1).default(DEFAULT_METRICS_DIR),

  // Output
  LOOKML_OUTPUT_DIR: z.string().min(1).default(DEFAULT_LOOKML_OUTPUT_DIR),
  LOOKER_CONNECTION: z.string().min(1).default(DEFAULT_LOOKER_CONNECTION),
  LOOKML_SCHEMA: z.string().default(""),
  VIEW_PREFIX: z.string().default(""),
  EXPLORE_PREFIX: z.string().default(""),

  // Join validation
  MAX_JOIN_HOPS: z.coerce
    .number()
    .int()
    .min(1, "MAX_JOIN_HOPS must be at least 1")
    .default(DEFAULT_MAX_JOIN_HOPS),
  HOP_WARNING_THRESHOLD: z.coerce
    .number()
    .int()
    .min(0, "HOP_WARNING_THRESHOLD must not be negative")
    .default(DEFAULT_HOP_WARNING_THRESHOLD),
  STRICT_VALIDATION: flag.default(false),
});

export type Config = z.infer<typeof configSchema>;
