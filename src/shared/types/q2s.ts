/**
 * Q2S Domain Types
 *
 * Plans, contributions, quality goals, satisfaction matrices and the
 * per-strategy outcomes that a scenario evaluation produces.
 */

// ============================================================================
// Plans & Contributions (loaded once per experiment, read-only afterwards)
// ============================================================================

export interface Plan {
  readonly id: string;
  readonly goals: ReadonlySet<string>;
}

/** domain variable → goal → contribution */
export type ContributionTable = Readonly<Record<string, Readonly<Record<string, number>>>>;

/** domain variable → summed contribution of the plan's active goals */
export type PlanImpact = Readonly<Record<string, number>>;

/** plan id → impact */
export type PlanImpacts = Readonly<Record<string, PlanImpact>>;

// ============================================================================
// Quality Goals
// ============================================================================

/** Upper bound: actual ≤ constraint. The only relation scored. */
export const MAX_RELATION = 'max';

export interface QualityGoalDefinition {
  id: string;
  domainVariable: string;
  relation: string;
  /** Scenario field holding this goal's constraint value */
  constraintField: string;
}

export interface MaterializedQualityGoal {
  id: string;
  domainVariable: string;
  relation: string;
  constraint: number;
}

/**
 * A goal as handed to the filter, matrix and evaluator. Definitions whose
 * scenario field is missing stay unmaterialized.
 */
export type ScenarioQualityGoal = MaterializedQualityGoal | QualityGoalDefinition;

export function isMaterialized(goal: ScenarioQualityGoal): goal is MaterializedQualityGoal {
  return 'constraint' in goal;
}

// ============================================================================
// Scenarios
// ============================================================================

export interface PerturbationLevel {
  level: string;
  delta: number;
}

export interface Scenario {
  id: number;
  alpha: number;
  /** constraint field → constraint value */
  constraints: Record<string, number>;
  /** constraint field → perturbation applied after selection */
  perturbations: Record<string, PerturbationLevel>;
}

// ============================================================================
// Q2S Matrix
// ============================================================================

export interface Q2SMatrix {
  plans: string[];
  qualityGoals: string[];
  /** plan id → quality goal id → satisfaction distance */
  rows: Record<string, Record<string, number>>;
}

export interface ExtendedQ2SRow {
  distances: Record<string, number>;
  avgSat: number;
  minSat: number;
  score: number;
}

export interface ExtendedQ2SMatrix {
  plans: string[];
  qualityGoals: string[];
  alpha: number;
  rows: Record<string, ExtendedQ2SRow>;
}

// ============================================================================
// Strategies & Outcomes
// ============================================================================

export type StrategyId = 'score' | 'avg_only' | 'min_only' | 'random';

export const STRATEGY_IDS: readonly StrategyId[] = ['score', 'avg_only', 'min_only', 'random'];

export interface StrategySelection {
  planId: string | null;
  score: number;
}

export interface PerturbationOutcome {
  success: boolean;
  margin: number;
}

/**
 * Recorded per strategy and scenario. `success` is 1/0 for the
 * deterministic strategies and the success rate over runs for Random.
 */
export interface StrategyOutcome {
  planId: string | null;
  success: number;
  margin: number;
  score: number;
  runs: number;
}
