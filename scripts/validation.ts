import { promises as fs } from "node:fs";
import path from "node:path";

// Shared validation utilities for data processing pipeline

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  metrics?: Record<string, unknown>;
}

export interface ProcessingResult<T> {
  success: boolean;
  data?: T;
  errors: string[];
  warnings: string[];
  metrics: Record<string, unknown>;
}

/**
 * Structured error handling wrapper for async functions
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string
): Promise<ProcessingResult<T>> {
  try {
    const data = await operation();
    return {
      success: true,
      data,
      errors: [],
      warnings: [],
      metrics: {}
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${context} failed:`, errorMessage);

    return {
      success: false,
      errors: [`${context}: ${errorMessage}`],
      warnings: [],
      metrics: {}
    };
  }
}

export function summarizeResults(results: ValidationResult[], context: string) {
  return {
    timestamp: new Date().toISOString(),
    context,
    total_checks: results.length,
    passed: results.filter(r => r.isValid).length,
    failed: results.filter(r => !r.isValid).length,
    total_errors: results.reduce((sum, r) => sum + r.errors.length, 0),
    total_warnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
    details: results
  };
}

/**
 * Write validation report to file
 */
export async function writeValidationReport(
  reportPath: string,
  results: ValidationResult[],
  context: string
): Promise<void> {
  const summary = summarizeResults(results, context);

  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(summary, null, 2), "utf8");

  console.log(`📊 Validation report written to ${reportPath}`);
  console.log(`   ✅ ${summary.passed}/${summary.total_checks} checks passed`);
  if (summary.failed > 0) {
    console.log(`   ❌ ${summary.failed} checks failed`);
  }
  if (summary.total_warnings > 0) {
    console.log(`   ⚠️  ${summary.total_warnings} warnings`);
  }
}
