/**
 * Sweep Runner
 *
 * Evaluates every scenario of an experiment. Each scenario gets its own
 * random source derived from (seed, scenario id), so a record depends only
 * on its scenario and the seed, never on evaluation order.
 */

import { STRATEGY_IDS, type Scenario } from '../shared/types/q2s.js';
import { Q2SLogger } from '../shared/logger.js';
import { countByCode, type DiagnosticCode } from '../shared/diagnostics.js';
import {
  Q2S_DISTANCE_PRECISION,
  Q2S_MARGIN_PRECISION,
  Q2S_RANDOM_RUNS,
  Q2S_RANDOM_SEED
} from '../shared/config.js';
import { scenarioRandomSource } from '../q2s-core/random-source.js';
import {
  createExperimentContext,
  evaluateScenario,
  type ExperimentContext,
  type ScenarioRecord
} from './scenario-evaluator.js';
import { loadContributions, loadPlans } from './data-loader.js';
import { enumerateScenarios } from './scenario-enumerator.js';
import { resolveDataPath, type ExperimentConfig } from './experiment-config.js';

export interface SweepOptions {
  randomRuns: number;
  seed: number;
  distancePrecision: number | null;
  marginPrecision: number | null;
}

export const DEFAULT_SWEEP_OPTIONS: SweepOptions = {
  randomRuns: Q2S_RANDOM_RUNS,
  seed: Q2S_RANDOM_SEED,
  distancePrecision: Q2S_DISTANCE_PRECISION,
  marginPrecision: Q2S_MARGIN_PRECISION
};

export interface SweepCallbacks {
  onScenario?: (record: ScenarioRecord, index: number, total: number) => void;
}

export interface SweepStats {
  scenarios: number;
  emptyScenarios: number;
  diagnostics: Partial<Record<DiagnosticCode, number>>;
  durationMs: number;
}

export interface SweepResult {
  records: ScenarioRecord[];
  stats: SweepStats;
}

export function runSweep(
  context: ExperimentContext,
  scenarios: readonly Scenario[],
  options: Partial<SweepOptions> = {},
  callbacks: SweepCallbacks = {}
): SweepResult {
  const opts: SweepOptions = { ...DEFAULT_SWEEP_OPTIONS, ...options };
  const startedAt = Date.now();
  const records: ScenarioRecord[] = [];

  Q2SLogger.sweepStarted(scenarios.length, opts.randomRuns, opts.seed);

  scenarios.forEach((scenario, index) => {
    const record = evaluateScenario(context, scenario, {
      rng: scenarioRandomSource(opts.seed, scenario.id),
      randomRuns: opts.randomRuns,
      distancePrecision: opts.distancePrecision,
      marginPrecision: opts.marginPrecision
    });

    Q2SLogger.scenarioEvaluated(
      scenario.id,
      scenario.alpha,
      record.validPlanCount,
      Object.fromEntries(Object.entries(record.outcomes).map(([id, o]) => [id, o.planId]))
    );
    Q2SLogger.debug(
      `#${scenario.id} ` +
        STRATEGY_IDS.map(id => {
          const o = record.outcomes[id];
          return `${id}=${o.planId ?? '-'}:${o.score}/${o.success}/${o.margin}`;
        }).join(' ')
    );
    Q2SLogger.diagnostics(`scenario ${scenario.id}`, record.diagnostics);

    records.push(record);
    callbacks.onScenario?.(record, index, scenarios.length);
  });

  const stats: SweepStats = {
    scenarios: records.length,
    emptyScenarios: records.filter(r => r.validPlanCount === 0).length,
    diagnostics: countByCode(records.flatMap(r => r.diagnostics)),
    durationMs: Date.now() - startedAt
  };

  Q2SLogger.sweepCompleted(
    stats.scenarios,
    stats.emptyScenarios,
    Object.values(stats.diagnostics).reduce((sum, n) => sum + (n ?? 0), 0),
    stats.durationMs
  );

  return { records, stats };
}

export interface PreparedExperiment {
  context: ExperimentContext;
  scenarios: Scenario[];
  options: SweepOptions;
}

/**
 * Load data files and expand the scenario grid. Explicit overrides win over
 * the experiment's simulation settings, which win over the environment.
 */
export function prepareExperiment(
  config: ExperimentConfig,
  baseDir: string,
  overrides: Partial<SweepOptions> = {}
): PreparedExperiment {
  const plans = loadPlans(resolveDataPath(baseDir, config.files.plans));
  const contributions = loadContributions(resolveDataPath(baseDir, config.files.contributions));

  Q2SLogger.dataLoaded(plans.length, Object.keys(contributions).length, config.qualityGoals.length);

  const options: SweepOptions = {
    ...DEFAULT_SWEEP_OPTIONS,
    ...(config.simulation.randomRuns !== undefined ? { randomRuns: config.simulation.randomRuns } : {}),
    ...(config.simulation.seed !== undefined ? { seed: config.simulation.seed } : {}),
    ...overrides
  };

  const scenarios = enumerateScenarios(config.scenarioGenerator);
  Q2SLogger.info(
    `Experiment prepared: scenarios=${scenarios.length} random_runs=${options.randomRuns} seed=${options.seed}` +
      ` distance_precision=${options.distancePrecision ?? 'off'} margin_precision=${options.marginPrecision ?? 'off'}`
  );

  return {
    context: createExperimentContext(plans, contributions, config.qualityGoals),
    scenarios,
    options
  };
}

export function runExperiment(
  config: ExperimentConfig,
  baseDir: string,
  overrides: Partial<SweepOptions> = {},
  callbacks: SweepCallbacks = {}
): SweepResult {
  const prepared = prepareExperiment(config, baseDir, overrides);
  return runSweep(prepared.context, prepared.scenarios, prepared.options, callbacks);
}
