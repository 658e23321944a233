#!/usr/bin/env node
/**
 * Q2S Robustness Sweep - Main Entry Point
 * Evaluates every scenario of an experiment and writes the results CSV
 *
 * Usage: npm run sweep -- data/experiment.json [--seed 7] [--runs 10]
 */

import * as path from 'path';
import { validateConfig, RESULTS_DIR, DEFAULT_RESULTS_FILENAME, LOG_PATH } from './shared/config.js';
import { Q2SLogger } from './shared/logger.js';
import { STRATEGY_IDS, isMaterialized, type ScenarioQualityGoal } from './shared/types/q2s.js';
import { SELECTION_STRATEGIES } from './q2s-core/selection-strategies.js';
import { formatExtendedMatrix } from './q2s-core/format.js';
import { scenarioRandomSource } from './q2s-core/random-source.js';
import { parseCliArgs, USAGE, type CliArgs } from './experiment/cli-args.js';
import { loadExperimentConfig, type LoadedExperimentConfig } from './experiment/experiment-config.js';
import { prepareExperiment, runSweep, type SweepOptions } from './experiment/sweep-runner.js';
import { traceScenario } from './experiment/scenario-evaluator.js';
import { countScenarios } from './experiment/scenario-enumerator.js';
import { writeResultsCsv } from './experiment/results-writer.js';
import {
  formatSummary,
  summarizeByAlpha,
  summarizeByPerturbation,
  summarizeByStrategy
} from './experiment/summary.js';

function overridesFrom(args: CliArgs): Partial<SweepOptions> {
  const overrides: Partial<SweepOptions> = {};
  if (args.seed !== undefined) overrides.seed = args.seed;
  if (args.randomRuns !== undefined) overrides.randomRuns = args.randomRuns;
  return overrides;
}

function formatGoal(goal: ScenarioQualityGoal): string {
  const bound = isMaterialized(goal) ? String(goal.constraint) : `<${goal.constraintField}?>`;
  return `  ${goal.id}: ${goal.domainVariable} ${goal.relation} ${bound}`;
}

// ============================================================================
// Single-scenario trace
// ============================================================================

function printTrace(loaded: LoadedExperimentConfig, args: CliArgs, scenarioId: number): void {
  const prepared = prepareExperiment(loaded.config, loaded.baseDir, overridesFrom(args));
  const scenario = prepared.scenarios.find(s => s.id === scenarioId);
  if (!scenario) {
    throw new Error(`Scenario ${scenarioId} not found (1..${prepared.scenarios.length})`);
  }

  const trace = traceScenario(prepared.context, scenario, {
    rng: scenarioRandomSource(prepared.options.seed, scenario.id),
    randomRuns: prepared.options.randomRuns,
    distancePrecision: prepared.options.distancePrecision,
    marginPrecision: prepared.options.marginPrecision
  });

  console.log(`=== Scenario ${scenario.id} (alpha=${scenario.alpha}) ===\n`);

  console.log('Plan impacts:');
  for (const planId of prepared.context.planIds) {
    const impact = prepared.context.impacts[planId] ?? {};
    const values = Object.entries(impact).map(([k, v]) => `${k}=${v}`).join(' ');
    console.log(`  ${planId.padEnd(10)} ${values}`);
  }

  console.log('\nQuality goals:');
  trace.goals.forEach(g => console.log(formatGoal(g)));

  console.log(`\nValid plans: ${trace.validPlanIds.length}/${prepared.context.planIds.length}`);
  if (trace.matrix) {
    console.log('\n' + formatExtendedMatrix(trace.matrix));
  }

  console.log('\nPerturbed quality goals:');
  trace.perturbedGoals.forEach(g => console.log(formatGoal(g)));

  console.log('\nOutcomes:');
  for (const id of STRATEGY_IDS) {
    const o = trace.record.outcomes[id];
    console.log(
      `  ${SELECTION_STRATEGIES[id].label.padEnd(8)} plan=${o.planId ?? '-'} success=${o.success} margin=${o.margin} (runs=${o.runs})`
    );
  }

  if (trace.record.diagnostics.length > 0) {
    console.log(`\nDiagnostics (${trace.record.diagnostics.length}):`);
    for (const d of trace.record.diagnostics) {
      console.log(`  [${d.code}] ${d.message}`);
    }
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help || args.configPath === null) {
    console.log(USAGE);
    if (args.configPath === null && !args.help) process.exitCode = 1;
    return;
  }

  const envCheck = validateConfig();
  if (!envCheck.valid) {
    throw new Error(`Invalid environment configuration:\n  ${envCheck.errors.join('\n  ')}`);
  }

  const loaded = loadExperimentConfig(args.configPath);

  if (args.scenarioId !== undefined) {
    printTrace(loaded, args, args.scenarioId);
    return;
  }

  console.log('=== Q2S Robustness Sweep ===\n');
  console.log(`Experiment: ${loaded.source}`);
  console.log(`Scenario grid: ${countScenarios(loaded.config.scenarioGenerator)}`);

  const prepared = prepareExperiment(loaded.config, loaded.baseDir, overridesFrom(args));
  console.log(`Plans: ${prepared.context.planIds.length}, quality goals: ${loaded.config.qualityGoals.length}`);
  console.log(`Random runs: ${prepared.options.randomRuns}, seed: ${prepared.options.seed}\n`);

  const result = runSweep(prepared.context, prepared.scenarios, prepared.options, {
    onScenario: (_record, index, total) => {
      if (!args.quiet && ((index + 1) % 100 === 0 || index + 1 === total)) {
        console.log(`Processed scenario ${index + 1}/${total}`);
      }
    }
  });

  const simulation = loaded.config.simulation;
  const outFile =
    args.outFile ??
    path.join(
      simulation.outputDirectory ?? RESULTS_DIR,
      simulation.resultsFilename ?? DEFAULT_RESULTS_FILENAME
    );
  const fields = loaded.config.scenarioGenerator.constraintOptions.map(o => o.field);
  const written = writeResultsCsv(outFile, result.records, fields);

  console.log(`\nResults written to ${written}`);
  console.log(`Empty scenarios: ${result.stats.emptyScenarios}/${result.stats.scenarios}`);
  console.log(`Duration: ${result.stats.durationMs}ms`);

  const diagnosticCount = Object.values(result.stats.diagnostics).reduce((sum, n) => sum + (n ?? 0), 0);
  if (diagnosticCount > 0) {
    console.log(`Diagnostics: ${diagnosticCount} (details in ${LOG_PATH})`);
  }

  console.log('\n' + formatSummary(summarizeByStrategy(result.records)));
  for (const group of summarizeByAlpha(result.records)) {
    console.log('\n' + formatSummary(group.strategies, `alpha=${group.alpha}`));
  }
  for (const field of fields) {
    for (const group of summarizeByPerturbation(result.records, field)) {
      console.log('\n' + formatSummary(group.strategies, `${field}=${group.level}`));
    }
  }
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  Q2SLogger.error('Sweep failed', err);
  console.error(err.message);
  process.exitCode = 1;
});
