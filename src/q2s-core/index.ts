/**
 * Q2S scoring core
 *
 * Pure functions from (plans, contributions, quality goals, scenario) to
 * selections and perturbation outcomes. No I/O, no logging, no hidden state.
 */

// Types
export type {
  Plan,
  ContributionTable,
  PlanImpact,
  PlanImpacts,
  QualityGoalDefinition,
  MaterializedQualityGoal,
  ScenarioQualityGoal,
  PerturbationLevel,
  Scenario,
  Q2SMatrix,
  ExtendedQ2SRow,
  ExtendedQ2SMatrix,
  StrategyId,
  StrategySelection,
  PerturbationOutcome,
  StrategyOutcome
} from '../shared/types/q2s.js';

export { MAX_RELATION, STRATEGY_IDS, isMaterialized } from '../shared/types/q2s.js';

export type { Diagnostic, DiagnosticCode, Diagnosed } from '../shared/diagnostics.js';
export { InvalidAlphaError } from '../shared/errors.js';

// Impact calculator
export { calculatePlanImpact, calculatePlanImpacts } from './impact-calculator.js';

// Quality goals
export {
  materializeQualityGoals,
  constraintValuesOf,
  type ConstraintValues
} from './quality-goals.js';

// Validity filter
export { checkPlanValidity, filterValidPlans } from './validity-filter.js';

// Matrix & scoring
export {
  buildQ2SMatrix,
  satisfactionDistance,
  roundTo,
  DEFAULT_DISTANCE_PRECISION,
  type PrecisionOptions
} from './q2s-matrix.js';

export { extendQ2SMatrix, hurwiczScore, assertAlpha } from './scoring.js';

// Strategies
export {
  SELECTION_STRATEGIES,
  scoreStrategy,
  avgOnlyStrategy,
  minOnlyStrategy,
  randomStrategy,
  comparePlanIds,
  NO_SELECTION,
  type SelectionStrategy
} from './selection-strategies.js';

export { createRandomSource, scenarioRandomSource, type RandomSource } from './random-source.js';

// Perturbation
export { evaluateUnderPerturbation, DEFAULT_MARGIN_PRECISION } from './perturbation-evaluator.js';

// Formatting
export { formatQ2SMatrix, formatExtendedMatrix } from './format.js';
