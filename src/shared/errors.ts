/**
 * Q2S Error Types
 *
 * Thrown only for conditions the caller must fix. Data inconsistencies
 * inside a scenario are reported as diagnostics instead (see diagnostics.ts).
 */

/**
 * Thrown when the Hurwicz weight lies outside [0, 1]
 */
export class InvalidAlphaError extends Error {
  constructor(public readonly alpha: number) {
    super(`Alpha must be between 0 and 1, got ${alpha}`);
    this.name = 'InvalidAlphaError';
  }
}

/**
 * Thrown when an experiment configuration file cannot be read or fails validation
 */
export class ExperimentConfigError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: string[]
  ) {
    super(`Invalid experiment configuration '${source}':\n  ${issues.join('\n  ')}`);
    this.name = 'ExperimentConfigError';
  }
}

/**
 * Thrown when a plans or contributions file is missing or malformed
 */
export class DataLoadError extends Error {
  constructor(
    public readonly source: string,
    public readonly detail: string,
    public readonly row?: number
  ) {
    super(`Cannot load '${source}'${row !== undefined ? ` (row ${row})` : ''}: ${detail}`);
    this.name = 'DataLoadError';
  }
}
