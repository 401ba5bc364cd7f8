import type { ValidationReport } from '../types/reports.js';

/**
 * Collects errors and warnings while the checks run. Only errors make a
 * workflow invalid.
 */
export class ValidationResult {
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];

  addError(message: string): void {
    this.errors.push(message);
  }

  addWarning(message: string): void {
    this.warnings.push(message);
  }

  get valid(): boolean {
    return this.errors.length === 0;
  }

  /** Snapshot the collected messages; later additions do not leak into it */
  toReport(): ValidationReport {
    return Object.freeze({
      valid: this.valid,
      errors: Object.freeze([...this.errors]),
      warnings: Object.freeze([...this.warnings]),
      error_count: this.errors.length,
      warning_count: this.warnings.length,
    });
  }
}
