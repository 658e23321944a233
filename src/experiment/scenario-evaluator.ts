/**
 * Scenario Evaluator
 *
 * Runs one scenario end to end:
 *   quality goals → validity filter → Q2S matrix → scoring →
 *   four selections → perturbed goals → (success, margin) per strategy
 *
 * The Random strategy is repeated `randomRuns` times and averaged, so its
 * success is a rate in [0, 1]; the other three record 1 or 0.
 */

import {
  STRATEGY_IDS,
  type ContributionTable,
  type ExtendedQ2SMatrix,
  type Plan,
  type PlanImpacts,
  type QualityGoalDefinition,
  type Scenario,
  type ScenarioQualityGoal,
  type StrategyId,
  type StrategyOutcome,
  type StrategySelection
} from '../shared/types/q2s.js';
import { mergeDiagnostics, type Diagnostic } from '../shared/diagnostics.js';
import { calculatePlanImpacts } from '../q2s-core/impact-calculator.js';
import { constraintValuesOf, materializeQualityGoals } from '../q2s-core/quality-goals.js';
import { filterValidPlans } from '../q2s-core/validity-filter.js';
import { DEFAULT_DISTANCE_PRECISION, buildQ2SMatrix, roundTo } from '../q2s-core/q2s-matrix.js';
import { assertAlpha, extendQ2SMatrix } from '../q2s-core/scoring.js';
import { SELECTION_STRATEGIES, randomStrategy } from '../q2s-core/selection-strategies.js';
import { DEFAULT_MARGIN_PRECISION, evaluateUnderPerturbation } from '../q2s-core/perturbation-evaluator.js';
import type { RandomSource } from '../q2s-core/random-source.js';

// ============================================================================
// Context & Options
// ============================================================================

/**
 * Read-only data shared by every scenario of an experiment
 */
export interface ExperimentContext {
  planIds: readonly string[];
  impacts: PlanImpacts;
  qualityGoals: readonly QualityGoalDefinition[];
}

export function createExperimentContext(
  plans: readonly Plan[],
  contributions: ContributionTable,
  qualityGoals: readonly QualityGoalDefinition[]
): ExperimentContext {
  return {
    planIds: plans.map(p => p.id),
    impacts: calculatePlanImpacts(plans, contributions),
    qualityGoals
  };
}

export interface EvaluationOptions {
  rng: RandomSource;
  randomRuns: number;
  distancePrecision?: number | null;
  marginPrecision?: number | null;
}

// ============================================================================
// Records
// ============================================================================

export interface ScenarioRecord {
  scenario: Scenario;
  validPlanCount: number;
  outcomes: Record<StrategyId, StrategyOutcome>;
  diagnostics: Diagnostic[];
}

export interface ScenarioTrace {
  record: ScenarioRecord;
  goals: ScenarioQualityGoal[];
  perturbedGoals: ScenarioQualityGoal[];
  validPlanIds: string[];
  matrix: ExtendedQ2SMatrix | null;
  /** Every Random pick, in run order */
  randomSelections: StrategySelection[];
}

function emptyOutcome(runs: number): StrategyOutcome {
  return { planId: null, success: 0, margin: 0, score: 0, runs };
}

function emptyOutcomes(randomRuns: number): Record<StrategyId, StrategyOutcome> {
  return {
    score: emptyOutcome(1),
    avg_only: emptyOutcome(1),
    min_only: emptyOutcome(1),
    random: emptyOutcome(randomRuns)
  };
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ============================================================================
// Evaluation
// ============================================================================

export function traceScenario(
  context: ExperimentContext,
  scenario: Scenario,
  options: EvaluationOptions
): ScenarioTrace {
  assertAlpha(scenario.alpha);
  if (!Number.isInteger(options.randomRuns) || options.randomRuns < 1) {
    throw new RangeError(`randomRuns must be an integer >= 1, got ${options.randomRuns}`);
  }

  const values = constraintValuesOf(scenario);
  const goals = materializeQualityGoals(context.qualityGoals, values, false);
  const perturbedGoals = materializeQualityGoals(context.qualityGoals, values, true);
  const valid = filterValidPlans(context.planIds, context.impacts, goals.value);

  if (valid.value.length === 0) {
    const diagnostics = mergeDiagnostics(goals.diagnostics, valid.diagnostics, [
      { code: 'empty-candidate-set', message: `No valid plans for scenario ${scenario.id}` }
    ]);
    return {
      record: { scenario, validPlanCount: 0, outcomes: emptyOutcomes(options.randomRuns), diagnostics },
      goals: goals.value,
      perturbedGoals: perturbedGoals.value,
      validPlanIds: [],
      matrix: null,
      randomSelections: []
    };
  }

  const distanceOpts = { precision: options.distancePrecision };
  const marginOpts = { precision: options.marginPrecision };

  const matrix = buildQ2SMatrix(valid.value, context.impacts, goals.value, distanceOpts);
  const extended = extendQ2SMatrix(matrix.value, scenario.alpha, distanceOpts);
  const evaluationDiagnostics: Diagnostic[][] = [];

  const evaluate = (selection: StrategySelection) => {
    const result = evaluateUnderPerturbation(selection.planId, context.impacts, perturbedGoals.value, marginOpts);
    evaluationDiagnostics.push(result.diagnostics);
    return result.value;
  };

  const outcomes = emptyOutcomes(options.randomRuns);

  for (const id of STRATEGY_IDS) {
    if (id === 'random') continue;
    const selection = SELECTION_STRATEGIES[id].select(extended.value, valid.value, options.rng);
    const outcome = evaluate(selection);
    outcomes[id] = {
      planId: selection.planId,
      success: outcome.success ? 1 : 0,
      margin: outcome.margin,
      score: selection.score,
      runs: 1
    };
  }

  const randomSelections: StrategySelection[] = [];
  const successes: number[] = [];
  const margins: number[] = [];
  for (let run = 0; run < options.randomRuns; run++) {
    const selection = randomStrategy.select(extended.value, valid.value, options.rng);
    const outcome = evaluate(selection);
    randomSelections.push(selection);
    successes.push(outcome.success ? 1 : 0);
    margins.push(outcome.margin);
  }

  const marginPrecision = options.marginPrecision === undefined ? DEFAULT_MARGIN_PRECISION : options.marginPrecision;
  const distancePrecision = options.distancePrecision === undefined ? DEFAULT_DISTANCE_PRECISION : options.distancePrecision;
  outcomes.random = {
    planId: randomSelections[0]?.planId ?? null,
    success: roundTo(mean(successes), marginPrecision),
    margin: roundTo(mean(margins), marginPrecision),
    score: roundTo(mean(randomSelections.map(s => s.score)), distancePrecision),
    runs: options.randomRuns
  };

  return {
    record: {
      scenario,
      validPlanCount: valid.value.length,
      outcomes,
      diagnostics: mergeDiagnostics(
        goals.diagnostics,
        valid.diagnostics,
        matrix.diagnostics,
        extended.diagnostics,
        ...evaluationDiagnostics
      )
    },
    goals: goals.value,
    perturbedGoals: perturbedGoals.value,
    validPlanIds: valid.value,
    matrix: extended.value,
    randomSelections
  };
}

export function evaluateScenario(
  context: ExperimentContext,
  scenario: Scenario,
  options: EvaluationOptions
): ScenarioRecord {
  return traceScenario(context, scenario, options).record;
}
