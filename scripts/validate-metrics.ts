#!/usr/bin/env tsx
/**
 * Validate metric connectivity for the configured dbt project
 *
 * 1. Loads semantic models and metrics from SEMANTIC_MODELS_DIR / METRICS_DIR
 * 2. Checks every metric's measures are reachable from its primary entity
 * 3. Prints the report; exits 1 on errors (or on warnings with --strict)
 */

import { loadConfig } from "@/config/index";
import { loadSemanticProject } from "@/lib/semantic/io";
import { formatReport, summarize } from "@/lib/validation/report";
import { EntityConnectivityValidator } from "@/lib/validation/validator";

async function main() {
  const config = loadConfig();
  const strict = process.argv.includes("--strict");

  console.log("🔍 Validating metric connectivity...\n");

  const { models, metrics } = await loadSemanticProject([
    config.SEMANTIC_MODELS_DIR,
    config.METRICS_DIR,
  ]);

  const validator = new EntityConnectivityValidator(models, {
    maxHops: config.MAX_JOIN_HOPS,
    hopWarningThreshold: config.HOP_WARNING_THRESHOLD,
  });
  const result = validator.validateMetrics(metrics);

  console.log("\n" + formatReport(result) + "\n");
  console.log(`Metrics: ${metrics.length}, ${summarize(result)}`);

  const failed = result.hasErrors() || (strict && result.hasWarnings());
  console.log(failed ? "❌ Validation failed" : "✅ Validation passed");
  process.exit(failed ? 1 : 0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
