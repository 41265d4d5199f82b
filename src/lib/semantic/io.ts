// I/O functions for loading and validating dbt semantic layer YAML files
import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { SemanticLoadError } from "./errors";
import { semanticFileSchema } from "./schemas";
import type { MetricYaml, SemanticModelYaml } from "./schemas";
import type { Metric, SemanticModel, SemanticProject } from "./types";

// Cache for parsed files to avoid redundant file I/O
const fileCache = new Map<string, SemanticProject>();

function toSemanticModel(raw: SemanticModelYaml): SemanticModel {
  return {
    name: raw.name,
    model: raw.model,
    description: raw.description,
    entities: raw.entities.map((e) => ({
      name: e.name,
      type: e.type,
      expr: e.expr,
      description: e.description,
      joinCardinality: e.config?.meta?.join_cardinality,
    })),
    dimensions: raw.dimensions.map((d) => ({
      name: d.name,
      type: d.type,
      expr: d.expr?.trim(),
      label: d.label,
      description: d.description,
      timeGranularity: d.type_params?.time_granularity,
    })),
    measures: raw.measures.map((m) => ({
      name: m.name,
      agg: m.agg,
      expr: m.expr === undefined ? undefined : String(m.expr).trim(),
      label: m.label,
      description: m.description,
    })),
  };
}

function toMetric(raw: MetricYaml): Metric {
  // config.meta is the dbt convention; a top-level meta block is still accepted
  const primaryEntity =
    raw.config?.meta?.primary_entity ?? raw.meta?.primary_entity;
  const base = {
    name: raw.name,
    label: raw.label,
    description: raw.description,
    primaryEntity,
    filters: typeof raw.filter === "string" ? [raw.filter] : raw.filter,
  };

  switch (raw.type) {
    case "simple":
      return { ...base, type: "simple", typeParams: { measure: raw.type_params.measure } };
    case "ratio":
      return {
        ...base,
        type: "ratio",
        typeParams: {
          numerator: raw.type_params.numerator,
          denominator: raw.type_params.denominator,
        },
      };
    case "derived":
      return {
        ...base,
        type: "derived",
        typeParams: {
          expr: raw.type_params.expr,
          metrics: raw.type_params.metrics.map((ref) => ({
            name: ref.name,
            alias: ref.alias,
            offsetWindow: ref.offset_window,
          })),
        },
      };
    case "conversion":
      return {
        ...base,
        type: "conversion",
        typeParams: {
          conversionTypeParams: raw.type_params.conversion_type_params,
        },
      };
  }
}

/**
 * Parse one YAML document holding `semantic_models:` and/or `metrics:`.
 * `source` is only used in error messages.
 */
export function parseSemanticYaml(raw: string, source: string): SemanticProject {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (e) {
    throw new SemanticLoadError(
      `YAML parse error for ${source}: ${e instanceof Error ? e.message : String(e)}`,
      source
    );
  }

  // Empty files are legal in dbt projects
  if (doc === undefined || doc === null) {
    return { models: [], metrics: [] };
  }

  const parsed = semanticFileSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")} — ${i.message}`)
      .join("; ");
    throw new SemanticLoadError(`${source} failed validation: ${issues}`, source);
  }

  return {
    models: parsed.data.semantic_models.map(toSemanticModel),
    metrics: parsed.data.metrics.map(toMetric),
  };
}

export async function listYamlFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir, { recursive: true });
  } catch (error) {
    throw new SemanticLoadError(
      `Failed to list YAML files in ${dir}: ${error instanceof Error ? error.message : String(error)}`,
      dir
    );
  }
  return entries
    .filter((f) => f.endsWith(".yml") || f.endsWith(".yaml"))
    .map((f) => path.resolve(dir, f))
    .sort();
}

export async function loadSemanticFile(fp: string): Promise<SemanticProject> {
  const cached = fileCache.get(fp);
  if (cached) {
    console.log(`[Cache] Returning ${path.basename(fp)} from cache`);
    return cached;
  }

  let raw: string;
  try {
    raw = await fs.readFile(fp, "utf8");
  } catch {
    throw new SemanticLoadError(`Missing semantic file at ${fp}`, fp);
  }

  const project = parseSemanticYaml(raw, path.basename(fp));
  fileCache.set(fp, project);
  return project;
}

/**
 * Load every semantic model and metric found under the given directories.
 * A file reachable from more than one directory is read once.
 */
export async function loadSemanticProject(dirs: string[]): Promise<SemanticProject> {
  const files = new Set<string>();
  for (const dir of dirs) {
    for (const fp of await listYamlFiles(dir)) {
      files.add(fp);
    }
  }

  const project: SemanticProject = { models: [], metrics: [] };
  for (const fp of files) {
    const { models, metrics } = await loadSemanticFile(fp);
    project.models.push(...models);
    project.metrics.push(...metrics);
  }

  console.log(
    `[Semantic] Loaded ${project.models.length} semantic models and ${project.metrics.length} metrics from ${files.size} files`
  );
  return project;
}

export async function loadSemanticModels(dir: string): Promise<SemanticModel[]> {
  return (await loadSemanticProject([dir])).models;
}

export async function loadMetrics(dir: string): Promise<Metric[]> {
  return (await loadSemanticProject([dir])).metrics;
}

// Clear cache (useful for development/hot-reload)
export function clearSemanticCache() {
  fileCache.clear();
  console.log("[Cache] Cleared semantic file cache");
}
