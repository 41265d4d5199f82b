/**
 * Defaults for the semantic-lookml configuration (used in schema.ts)
 */

export const DEFAULT_SEMANTIC_MODELS_DIR = "src/semantic/models";
export const DEFAULT_METRICS_DIR = "src/semantic/metrics";
export const DEFAULT_LOOKML_OUTPUT_DIR = "lookml";
export const DEFAULT_LOOKER_CONNECTION = "database";

// Join depth: traversal ceiling and the depth above which warnings are raised
export const DEFAULT_MAX_JOIN_HOPS = 2;
export const DEFAULT_HOP_WARNING_THRESHOLD = 2;
