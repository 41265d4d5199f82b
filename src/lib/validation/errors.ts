// Raised when strict mode turns validation errors into a failed run

import { summarize } from "./report";
import type { ValidationResult } from "./types";

export class MetricValidationError extends Error {
  constructor(readonly result: ValidationResult) {
    super(`Metric validation failed: ${summarize(result)}`);
    this.name = "MetricValidationError";
  }
}
