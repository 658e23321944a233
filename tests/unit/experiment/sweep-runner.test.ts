/**
 * Unit tests for the sweep runner
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import {
  DEFAULT_SWEEP_OPTIONS,
  prepareExperiment,
  runExperiment,
  runSweep
} from '../../../src/experiment/sweep-runner.js';
import { createExperimentContext } from '../../../src/experiment/scenario-evaluator.js';
import { enumerateScenarios } from '../../../src/experiment/scenario-enumerator.js';
import { loadExperimentConfig } from '../../../src/experiment/experiment-config.js';
import { Q2SLogger } from '../../../src/shared/logger.js';
import { createSampleDefinitions, createSamplePlans } from '../../setup.js';

const EXPERIMENT_FILE = fileURLToPath(new URL('../../../data/experiment.json', import.meta.url));

function sampleContext() {
  const { plans, contributions } = createSamplePlans();
  return createExperimentContext(plans, contributions, createSampleDefinitions());
}

// 2 alphas × 2 cost values × 2 cost perturbations
const scenarios = enumerateScenarios({
  alphaOptions: [0, 1],
  constraintOptions: [
    {
      field: 'cost_constraint',
      values: [100, 270],
      perturbations: [
        { level: 'none', delta: 0 },
        { level: 'tight', delta: -60 }
      ]
    },
    { field: 'effort_constraint', values: [6], perturbations: [{ level: 'none', delta: 0 }] },
    { field: 'time_constraint', values: [9], perturbations: [{ level: 'none', delta: 0 }] }
  ]
});

describe('sweep-runner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('runSweep', () => {
    it('evaluates every scenario in order', () => {
      const { records } = runSweep(sampleContext(), scenarios, { randomRuns: 3, seed: 1 });

      expect(records.map(r => r.scenario.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
      expect(records.map(r => r.validPlanCount)).toEqual([0, 0, 2, 2, 0, 0, 2, 2]);
      expect(records.every(r => r.outcomes.random.runs === 3)).toBe(true);
    });

    it('collects sweep statistics', () => {
      const { stats } = runSweep(sampleContext(), scenarios, { randomRuns: 1, seed: 1 });

      expect(stats.scenarios).toBe(8);
      expect(stats.emptyScenarios).toBe(4);
      expect(stats.diagnostics).toEqual({ 'empty-candidate-set': 4 });
      expect(stats.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('reports progress per scenario', () => {
      const onScenario = vi.fn();

      runSweep(sampleContext(), scenarios.slice(0, 3), { randomRuns: 1, seed: 1 }, { onScenario });

      expect(onScenario).toHaveBeenCalledTimes(3);
      expect(onScenario.mock.calls.map(([, index, total]) => [index, total])).toEqual([
        [0, 3],
        [1, 3],
        [2, 3]
      ]);
    });

    it('replays identically for the same seed', () => {
      const first = runSweep(sampleContext(), scenarios, { randomRuns: 5, seed: 9 });
      const second = runSweep(sampleContext(), scenarios, { randomRuns: 5, seed: 9 });

      expect(second.records).toEqual(first.records);
    });

    it('gives each scenario the same record regardless of sweep order', () => {
      const forward = runSweep(sampleContext(), scenarios, { randomRuns: 5, seed: 9 }).records;
      const backward = runSweep(sampleContext(), [...scenarios].reverse(), { randomRuns: 5, seed: 9 }).records;

      for (const record of backward) {
        expect(record).toEqual(forward.find(r => r.scenario.id === record.scenario.id));
      }
    });

    it('keeps the deterministic strategies independent of the seed', () => {
      const a = runSweep(sampleContext(), scenarios, { randomRuns: 2, seed: 1 }).records;
      const b = runSweep(sampleContext(), scenarios, { randomRuns: 2, seed: 2 }).records;

      expect(b.map(r => r.outcomes.score)).toEqual(a.map(r => r.outcomes.score));
      expect(b.map(r => r.outcomes.min_only)).toEqual(a.map(r => r.outcomes.min_only));
    });

    it('logs each scenario outcome at debug level', () => {
      const debug = vi.spyOn(Q2SLogger, 'debug');

      // alpha 0, cost 270, nothing perturbed: Plan0 has the best AvgSat and MinSat
      runSweep(sampleContext(), scenarios.slice(2, 3), { randomRuns: 1, seed: 1 });

      expect(debug).toHaveBeenCalledTimes(1);
      const [message] = debug.mock.calls[0];
      expect(message.startsWith('#3 score=Plan0:0.222/1/0.2716 avg_only=Plan0:0.271/1/0.2716 ')).toBe(true);
      expect(message).toContain(' min_only=Plan0:0.222/1/0.2716 random=Plan');
    });

    it('falls back to the default options', () => {
      const { records } = runSweep(sampleContext(), scenarios.slice(2, 3));

      expect(records[0].outcomes.random.runs).toBe(DEFAULT_SWEEP_OPTIONS.randomRuns);
    });
  });

  describe('prepareExperiment', () => {
    it('loads the data files relative to the experiment file', () => {
      const { config, baseDir } = loadExperimentConfig(EXPERIMENT_FILE);

      const prepared = prepareExperiment(config, baseDir);

      expect(prepared.context.planIds).toEqual(['Plan0', 'Plan1', 'Plan2', 'Plan3', 'Plan4']);
      expect(prepared.context.impacts.Plan3).toEqual({ TotalCost: 80, TotalEffort: 4, TimeSpent: 4 });
      expect(prepared.context.impacts.Plan4).toEqual({ TotalCost: 10, TotalEffort: 0, TimeSpent: 5 });
      expect(prepared.scenarios).toHaveLength(96);
    });

    it('logs the resolved options', () => {
      const info = vi.spyOn(Q2SLogger, 'info');
      const { config, baseDir } = loadExperimentConfig(EXPERIMENT_FILE);

      prepareExperiment(config, baseDir, { seed: 7, distancePrecision: null });

      expect(info).toHaveBeenCalledWith(
        'Experiment prepared: scenarios=96 random_runs=10 seed=7 distance_precision=off ' +
          `margin_precision=${DEFAULT_SWEEP_OPTIONS.marginPrecision ?? 'off'}`
      );
    });

    it('prefers overrides over the simulation block over the environment', () => {
      const { config, baseDir } = loadExperimentConfig(EXPERIMENT_FILE);

      const fromConfig = prepareExperiment(config, baseDir).options;
      const overridden = prepareExperiment(config, baseDir, { seed: 7 }).options;

      expect(fromConfig).toEqual({ ...DEFAULT_SWEEP_OPTIONS, randomRuns: 10, seed: 42 });
      expect(overridden).toEqual({ ...DEFAULT_SWEEP_OPTIONS, randomRuns: 10, seed: 7 });
    });
  });

  describe('runExperiment', () => {
    it('runs every scenario of a loaded experiment', () => {
      const { config, baseDir } = loadExperimentConfig(EXPERIMENT_FILE);

      const { stats } = runExperiment(config, baseDir, { randomRuns: 2 });

      expect(stats.scenarios).toBe(96);
      expect(stats.emptyScenarios).toBe(48);
    });
  });
});
