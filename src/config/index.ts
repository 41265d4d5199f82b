import { configSchema, type Config } from "@/config/schema";
import * as constants from "@/config/constants";
import { config as loadDotenv } from "dotenv";

let cachedConfig: Config | null = null;

/**
 * Load and validate configuration from environment variables
 * Throws on validation failure with detailed error messages
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  // Load .env file (never overrides variables already set)
  loadDotenv();

  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")} — ${i.message}`)
      .join("; ");
    console.error("❌ Configuration validation failed:");
    console.error(issues);

    if (issues.includes("HOP")) {
      console.error(
        "💡 MAX_JOIN_HOPS takes a whole number of at least 1, HOP_WARNING_THRESHOLD a whole number of at least 0"
      );
    }
    if (issues.includes("STRICT_VALIDATION")) {
      console.error("💡 Set STRICT_VALIDATION to true or false");
    }
    throw new Error(`Invalid configuration: ${issues}`);
  }

  cachedConfig = Object.freeze(result.data);
  return cachedConfig;
}

/**
 * Get current configuration (loads if not already cached)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached config (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

// Export constants for convenience
export { constants };
