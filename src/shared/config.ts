/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with sensible defaults.
 * Experiment-specific settings (plans, goals, scenario options) live in the
 * experiment JSON instead; see src/experiment/experiment-config.ts.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

/**
 * Logging
 * /tmp unless TMP_DIR is set (not os.tmpdir())
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'q2s-robustness.log');
export const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();

/**
 * Application Configuration
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const SUPPRESS_TEST_LOGS =
  process.env.SUPPRESS_TEST_LOGS !== undefined
    ? process.env.SUPPRESS_TEST_LOGS === 'true'
    : NODE_ENV === 'test' || Boolean(process.env.VITEST);

/**
 * Sweep Defaults
 */
export const Q2S_RANDOM_RUNS = parseInt(process.env.Q2S_RANDOM_RUNS || '10', 10);
export const Q2S_RANDOM_SEED = parseInt(process.env.Q2S_RANDOM_SEED || '42', 10);
export const Q2S_DISTANCE_PRECISION = parseInt(process.env.Q2S_DISTANCE_PRECISION || '3', 10);
export const Q2S_MARGIN_PRECISION = parseInt(process.env.Q2S_MARGIN_PRECISION || '4', 10);

/**
 * Output
 */
export const RESULTS_DIR = process.env.RESULTS_DIR || path.join(process.cwd(), 'results');
export const DEFAULT_RESULTS_FILENAME = process.env.DEFAULT_RESULTS_FILENAME || 'scenario_results.csv';

/**
 * Validate environment-derived settings
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(Q2S_RANDOM_RUNS) || Q2S_RANDOM_RUNS < 1) {
    errors.push(`Q2S_RANDOM_RUNS must be an integer >= 1, got ${process.env.Q2S_RANDOM_RUNS}`);
  }

  if (!Number.isInteger(Q2S_RANDOM_SEED)) {
    errors.push(`Q2S_RANDOM_SEED must be an integer, got ${process.env.Q2S_RANDOM_SEED}`);
  }

  for (const [name, value] of [
    ['Q2S_DISTANCE_PRECISION', Q2S_DISTANCE_PRECISION],
    ['Q2S_MARGIN_PRECISION', Q2S_MARGIN_PRECISION]
  ] as const) {
    if (!Number.isInteger(value) || value < 0 || value > 10) {
      errors.push(`${name} must be an integer between 0 and 10, got ${process.env[name]}`);
    }
  }

  if (!['INFO', 'DEBUG'].includes(LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be 'INFO' or 'DEBUG', got '${LOG_LEVEL}'`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
