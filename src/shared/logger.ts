/**
 * Q2S Logger
 *
 * Centralized logging for experiment runs.
 * Tracks sweep progress, per-scenario selections and data diagnostics.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from './config.js';
import type { Diagnostic } from './diagnostics.js';

/**
 * Log levels for Q2S operations
 */
export enum Q2SLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  WARN = 'WARN',
  SCENARIO = 'SCENARIO',
  METRICS = 'METRICS',
  ERROR = 'ERROR',
}

/**
 * Q2S logger utility
 */
export class Q2SLogger {
  private static enabled = true;

  /**
   * Log a message with timestamp and category
   */
  private static log(level: Q2SLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [Q2S:${level}] ${message}`;

    fs.appendFileSync(LOG_PATH, logMsg + '\n');
  }

  /**
   * Log experiment data loaded
   */
  static dataLoaded(plans: number, domainVariables: number, qualityGoals: number): void {
    this.log(
      Q2SLogLevel.INFO,
      `📂 DATA plans=${plans} domain_variables=${domainVariables} quality_goals=${qualityGoals}`
    );
  }

  /**
   * Log sweep start
   */
  static sweepStarted(scenarios: number, randomRuns: number, seed: number): void {
    this.log(
      Q2SLogLevel.INFO,
      `🚀 SWEEP started scenarios=${scenarios} random_runs=${randomRuns} seed=${seed}`
    );
  }

  /**
   * Log one evaluated scenario
   */
  static scenarioEvaluated(
    scenarioId: number,
    alpha: number,
    validPlans: number,
    selections: Record<string, string | null>
  ): void {
    const picks = Object.entries(selections)
      .map(([strategy, planId]) => `${strategy}=${planId ?? '-'}`)
      .join(' ');
    this.log(
      Q2SLogLevel.SCENARIO,
      `#${scenarioId} alpha=${alpha} valid=${validPlans} ${picks}`
    );
  }

  /**
   * Log sweep completion
   */
  static sweepCompleted(scenarios: number, emptyScenarios: number, diagnostics: number, durationMs: number): void {
    this.log(
      Q2SLogLevel.METRICS,
      `📊 SWEEP completed scenarios=${scenarios} empty=${emptyScenarios} diagnostics=${diagnostics} duration=${durationMs}ms`
    );
  }

  /**
   * Log data diagnostics reported by the scoring core
   */
  static diagnostics(scope: string, diagnostics: readonly Diagnostic[]): void {
    for (const d of diagnostics) {
      this.log(Q2SLogLevel.WARN, `⚠️ [${scope}] ${d.code}: ${d.message}`);
    }
  }

  /**
   * Log results file written
   */
  static resultsWritten(filePath: string, rows: number): void {
    this.log(Q2SLogLevel.INFO, `💾 RESULTS rows=${rows} file="${filePath}"`);
  }

  /**
   * Log error
   */
  static error(message: string, error?: Error): void {
    this.log(Q2SLogLevel.ERROR, `❌ ${message}`);
    if (error) {
      this.log(Q2SLogLevel.ERROR, `   ${error.message}`);
    }
  }

  /**
   * Log info message
   */
  static info(message: string): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(Q2SLogLevel.INFO, message);
  }

  /**
   * Log debug message
   */
  static debug(message: string): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(Q2SLogLevel.DEBUG, message);
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  static isEnabled(): boolean {
    return this.enabled;
  }
}
