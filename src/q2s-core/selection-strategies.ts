/**
 * Selection Strategies
 *
 * Four independent policies that commit to one plan from the candidate set:
 * - score:    highest Hurwicz Score (depends on the scenario's alpha)
 * - avg_only: highest AvgSat (Score at alpha = 1)
 * - min_only: highest MinSat (Score at alpha = 0)
 * - random:   uniform pick, baseline for the other three
 *
 * Ties go to the lowest plan id in natural order (Plan2 before Plan10).
 * No strategy mutates the matrix. An empty candidate set yields
 * { planId: null, score: 0 }.
 */

import type {
  ExtendedQ2SMatrix,
  ExtendedQ2SRow,
  StrategyId,
  StrategySelection
} from '../shared/types/q2s.js';
import type { RandomSource } from './random-source.js';

export interface SelectionStrategy {
  id: StrategyId;
  label: string;
  select(matrix: ExtendedQ2SMatrix, candidates: readonly string[], rng: RandomSource): StrategySelection;
}

const planIdCollator = new Intl.Collator('en', { numeric: true });

export function comparePlanIds(a: string, b: string): number {
  return planIdCollator.compare(a, b);
}

export const NO_SELECTION: Readonly<StrategySelection> = Object.freeze({ planId: null, score: 0 });

function selectByMetric(
  matrix: ExtendedQ2SMatrix,
  candidates: readonly string[],
  metric: (row: ExtendedQ2SRow) => number
): StrategySelection {
  let bestPlan: string | null = null;
  let bestValue = -Infinity;

  for (const planId of candidates) {
    const row = matrix.rows[planId];
    if (!row) continue;

    const value = metric(row);
    if (
      value > bestValue ||
      (value === bestValue && bestPlan !== null && comparePlanIds(planId, bestPlan) < 0)
    ) {
      bestPlan = planId;
      bestValue = value;
    }
  }

  return bestPlan === null ? { ...NO_SELECTION } : { planId: bestPlan, score: bestValue };
}

export const scoreStrategy: SelectionStrategy = {
  id: 'score',
  label: 'Score',
  select: (matrix, candidates) => selectByMetric(matrix, candidates, row => row.score)
};

export const avgOnlyStrategy: SelectionStrategy = {
  id: 'avg_only',
  label: 'AvgOnly',
  select: (matrix, candidates) => selectByMetric(matrix, candidates, row => row.avgSat)
};

export const minOnlyStrategy: SelectionStrategy = {
  id: 'min_only',
  label: 'MinOnly',
  select: (matrix, candidates) => selectByMetric(matrix, candidates, row => row.minSat)
};

export const randomStrategy: SelectionStrategy = {
  id: 'random',
  label: 'Random',
  select: (matrix, candidates, rng) => {
    if (candidates.length === 0) return { ...NO_SELECTION };

    // sorted so the pick depends on the seed only
    const ordered = [...candidates].sort(comparePlanIds);
    const planId = rng.choice(ordered);
    return { planId, score: matrix.rows[planId]?.avgSat ?? 0 };
  }
};

export const SELECTION_STRATEGIES: Readonly<Record<StrategyId, SelectionStrategy>> = {
  score: scoreStrategy,
  avg_only: avgOnlyStrategy,
  min_only: minOnlyStrategy,
  random: randomStrategy
};
