/**
 * Base class for analysis results
 */

import type { ResultMetadata } from './ResultMetadata';

/**
 * Common functionality for serialization and export
 */
export abstract class AnalysisResult {
  protected readonly metadata: Readonly<ResultMetadata>;

  /**
   * Takes a frozen copy; later changes to the caller's object do not leak in
   */
  constructor(metadata: ResultMetadata) {
    this.metadata = Object.freeze({
      ...metadata,
      timestamp: new Date(metadata.timestamp.getTime()),
      motifCounts: metadata.motifCounts && Object.freeze({ ...metadata.motifCounts }),
      warnings: metadata.warnings && Object.freeze([...metadata.warnings]),
    });
  }

  getMetadata(): Readonly<ResultMetadata> {
    return this.metadata;
  }

  /**
   * Convert the result to a JSON-serializable object
   */
  abstract toJSON(): object;

  /**
   * Export the result in the specified format
   */
  export(format: 'json' | 'csv'): string {
    return format === 'json' ? this.exportJSON() : this.exportCSV();
  }

  private exportJSON(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }

  protected abstract exportCSV(): string;

  /**
   * Quote a CSV field when it holds a delimiter, quote or newline
   */
  protected csvField(value: string): string {
    return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
  }
}
