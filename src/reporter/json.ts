import type { ValidationReport, ValidationResult } from "../types.js";

export function formatJsonReport(result: ValidationResult | ValidationReport): string {
  return JSON.stringify(result, null, 2);
}
