#!/usr/bin/env tsx
/**
 * Generate LookML views, explores and a model file from the dbt project
 *
 * Honours STRICT_VALIDATION: when true, any validation error aborts the run
 * before files are written.
 */

import { loadConfig } from "@/config/index";
import { generateProject, writeProject } from "@/lib/lookml/generator";
import { loadSemanticProject } from "@/lib/semantic/io";
import { MetricValidationError } from "@/lib/validation/errors";
import { formatReport } from "@/lib/validation/report";

async function main() {
  const config = loadConfig();
  console.log("🔧 Generating LookML...\n");

  const { models, metrics } = await loadSemanticProject([
    config.SEMANTIC_MODELS_DIR,
    config.METRICS_DIR,
  ]);

  try {
    const { files, validation, skippedMetrics } = generateProject(models, metrics, {
      connection: config.LOOKER_CONNECTION,
      schema: config.LOOKML_SCHEMA,
      viewPrefix: config.VIEW_PREFIX,
      explorePrefix: config.EXPLORE_PREFIX,
      maxHops: config.MAX_JOIN_HOPS,
      hopWarningThreshold: config.HOP_WARNING_THRESHOLD,
      strict: config.STRICT_VALIDATION,
    });

    if (validation.issues.length > 0) {
      console.log("\n" + formatReport(validation) + "\n");
    }

    const written = await writeProject(files, config.LOOKML_OUTPUT_DIR);

    console.log("\n" + "=".repeat(80));
    console.log("SUMMARY");
    console.log("=".repeat(80) + "\n");
    console.log(`Semantic models: ${models.length}`);
    console.log(`Metrics rendered: ${metrics.length - skippedMetrics.length} / ${metrics.length}`);
    console.log(`Files written: ${written.length} ✅`);
  } catch (err) {
    if (err instanceof MetricValidationError) {
      console.error("\n" + formatReport(err.result) + "\n");
      console.error(`❌ ${err.message} (STRICT_VALIDATION=true)`);
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
