// LookML project generation from semantic models and validated metrics
import fs from "node:fs/promises";
import path from "node:path";
import type { Metric, SemanticModel } from "@/lib/semantic/types";
import { MetricValidationError } from "@/lib/validation/errors";
import { summarize } from "@/lib/validation/report";
import { IssueType, type ValidationResult } from "@/lib/validation/types";
import { EntityConnectivityValidator } from "@/lib/validation/validator";
import { buildExplores } from "./explores";
import { buildMetricMeasure, filterCondition, measureUses } from "./metrics";
import { serializeLookml } from "./serialize";
import { str, type LookmlNode } from "./types";
import { buildView, filteredMeasureBlock, viewName } from "./views";

export const EXPLORES_FILE = "explores.lkml";
export const MODEL_FILE = "model.lkml";

export interface GenerateOptions {
  connection?: string;
  schema?: string;
  viewPrefix?: string;
  explorePrefix?: string;
  maxHops?: number;
  hopWarningThreshold?: number;
  /** Throw instead of skipping metrics when validation has errors */
  strict?: boolean;
}

export interface SkippedMetric {
  name: string;
  reason: string;
}

export interface GeneratedProject {
  files: Map<string, string>;
  validation: ValidationResult;
  skippedMetrics: SkippedMetric[];
}

export function viewFileName(model: SemanticModel, prefix = ""): string {
  return `${viewName(model, prefix)}.view.lkml`;
}

export function generateProject(
  models: readonly SemanticModel[],
  metrics: readonly Metric[],
  options: GenerateOptions = {}
): GeneratedProject {
  const validator = new EntityConnectivityValidator(models, {
    maxHops: options.maxHops,
    hopWarningThreshold: options.hopWarningThreshold,
  });
  const validation = validator.validateMetrics(metrics);
  console.log(`[LookML] Validated ${metrics.length} metrics: ${summarize(validation)}`);

  if (options.strict && validation.hasErrors()) {
    throw new MetricValidationError(validation);
  }

  // Repeats are reported once per extra declaration; other errors belong to
  // the first declaration of a name
  const failed = new Set(
    validation
      .errors()
      .filter((i) => i.issueType !== IssueType.DuplicateMetric)
      .map((i) => i.metricName)
  );
  const seen = new Set<string>();

  // Extra measures per view: filtered raw measures and metric measures
  const metricMeasures = new Map<string, LookmlNode[]>();
  const addMeasure = (modelName: string, node: LookmlNode) => {
    const measures = metricMeasures.get(modelName) ?? [];
    measures.push(node);
    metricMeasures.set(modelName, measures);
  };
  // Owner model -> joined model -> raw measure fields its metrics read
  const exposedFields = new Map<string, Map<string, string[]>>();
  const skippedMetrics: SkippedMetric[] = [];

  for (const metric of metrics) {
    if (seen.has(metric.name)) {
      skippedMetrics.push({ name: metric.name, reason: "duplicate metric name" });
      continue;
    }
    seen.add(metric.name);

    if (failed.has(metric.name)) {
      skippedMetrics.push({ name: metric.name, reason: "failed validation" });
      continue;
    }
    if (metric.type !== "simple" && metric.type !== "ratio") {
      skippedMetrics.push({ name: metric.name, reason: `${metric.type} metrics are not rendered` });
      continue;
    }

    const entity = validator.primaryEntityFor(metric);
    const owner = entity ? validator.index.entityToModel.get(entity) : undefined;
    if (!owner) {
      skippedMetrics.push({ name: metric.name, reason: "no owning semantic model" });
      continue;
    }

    const uses = measureUses(metric, validator.index);
    const filtered: Array<{ modelName: string; node: LookmlNode }> = [];
    let filterProblem: string | undefined;
    if (metric.filters?.length) {
      for (const use of uses) {
        const condition = filterCondition(metric, use.model, validator.index);
        if (!condition.ok) {
          filterProblem = condition.reason;
          break;
        }
        filtered.push({
          modelName: use.model.name,
          node: filteredMeasureBlock(use.measure, use.field, condition.sql),
        });
      }
    }
    if (filterProblem) {
      skippedMetrics.push({ name: metric.name, reason: filterProblem });
      continue;
    }

    for (const { modelName, node } of filtered) addMeasure(modelName, node);
    addMeasure(owner.name, buildMetricMeasure(metric, owner.name, validator.index, options.viewPrefix));

    for (const use of uses) {
      if (use.model === owner) continue;
      const joins = exposedFields.get(owner.name) ?? new Map<string, string[]>();
      const fields = joins.get(use.model.name) ?? [];
      if (!fields.includes(use.field)) fields.push(use.field);
      joins.set(use.model.name, fields);
      exposedFields.set(owner.name, joins);
    }
  }

  for (const skipped of skippedMetrics) {
    console.warn(`[LookML] Skipping metric "${skipped.name}": ${skipped.reason}`);
  }

  const files = new Map<string, string>();
  for (const model of validator.index.models) {
    const view = buildView(model, {
      viewPrefix: options.viewPrefix,
      schema: options.schema,
      extraMeasures: metricMeasures.get(model.name),
    });
    files.set(viewFileName(model, options.viewPrefix), serializeLookml([view]));
  }

  if (models.length > 0) {
    const includes: LookmlNode[] = models.map((m) =>
      str("include", viewFileName(m, options.viewPrefix))
    );
    const explores = buildExplores(validator.index, {
      viewPrefix: options.viewPrefix,
      explorePrefix: options.explorePrefix,
      maxHops: options.maxHops,
      exposedFields,
    });
    files.set(EXPLORES_FILE, serializeLookml([...includes, ...explores]));

    files.set(
      MODEL_FILE,
      serializeLookml([
        str("connection", options.connection ?? "database"),
        str("include", EXPLORES_FILE),
        str("include", "*.view.lkml"),
      ])
    );
  }

  console.log(`[LookML] Generated ${files.size} files`);
  return { files, validation, skippedMetrics };
}

export async function writeProject(
  files: Map<string, string>,
  outputDir: string
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });

  const written: string[] = [];
  for (const [name, content] of files) {
    const fp = path.join(outputDir, name);
    await fs.writeFile(fp, content, "utf8");
    written.push(fp);
  }
  console.log(`[LookML] Wrote ${written.length} files to ${outputDir}`);
  return written;
}
