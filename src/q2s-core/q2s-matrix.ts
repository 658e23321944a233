/**
 * Q2S Matrix Builder
 *
 * For each valid plan and each 'max' quality goal, the satisfaction distance
 *
 *   d = (constraint − actual) / constraint
 *
 * is the normalized slack left under the bound: 1 when the plan uses nothing,
 * 0 when it sits exactly on the bound.
 *
 * Distances are rounded (3 decimals by default) so that matrices print and
 * compare stably; pass `precision: null` to keep full precision.
 */

import {
  MAX_RELATION,
  isMaterialized,
  type PlanImpacts,
  type Q2SMatrix,
  type ScenarioQualityGoal
} from '../shared/types/q2s.js';
import { diagnosed, type Diagnosed, type Diagnostic } from '../shared/diagnostics.js';

export const DEFAULT_DISTANCE_PRECISION = 3;

export interface PrecisionOptions {
  /** Decimal places, or null for no rounding */
  precision?: number | null;
}

export function roundTo(value: number, precision: number | null): number {
  if (precision === null) return value;
  const factor = 10 ** precision;
  const rounded = Math.round(value * factor) / factor;
  // normalize -0
  return rounded === 0 ? 0 : rounded;
}

/**
 * Normalized slack of an upper bound. Callers guarantee constraint > 0.
 */
export function satisfactionDistance(constraint: number, actual: number): number {
  return (constraint - actual) / constraint;
}

export function buildQ2SMatrix(
  validPlanIds: readonly string[],
  impacts: PlanImpacts,
  goals: readonly ScenarioQualityGoal[],
  options: PrecisionOptions = {}
): Diagnosed<Q2SMatrix> {
  const precision = options.precision === undefined ? DEFAULT_DISTANCE_PRECISION : options.precision;
  const diagnostics: Diagnostic[] = [];

  const matrix: Q2SMatrix = {
    plans: [...validPlanIds],
    qualityGoals: goals.map(g => g.id),
    rows: {}
  };

  for (const planId of validPlanIds) {
    const row: Record<string, number> = {};
    matrix.rows[planId] = row;

    const impact = impacts[planId];
    if (impact === undefined) {
      diagnostics.push({
        code: 'missing-plan-impact',
        message: `No impact data found for plan '${planId}'`,
        planId
      });
      continue;
    }

    for (const goal of goals) {
      if (!isMaterialized(goal)) {
        diagnostics.push({
          code: 'unmaterialized-goal',
          message: `Quality goal '${goal.id}' has no constraint in this scenario`,
          planId,
          qualityGoalId: goal.id
        });
        continue;
      }

      const actual = impact[goal.domainVariable];
      if (actual === undefined) {
        diagnostics.push({
          code: 'missing-domain-variable',
          message: `Domain variable '${goal.domainVariable}' not found in impact for plan '${planId}'`,
          planId,
          qualityGoalId: goal.id
        });
        continue;
      }

      if (goal.relation !== MAX_RELATION) {
        diagnostics.push({
          code: 'unsupported-relation',
          message: `Unsupported relation type '${goal.relation}' in quality goal '${goal.id}'`,
          planId,
          qualityGoalId: goal.id
        });
        continue;
      }

      if (goal.constraint <= 0) {
        diagnostics.push({
          code: 'non-positive-constraint',
          message: `Quality goal '${goal.id}' has constraint ${goal.constraint}; no distance for plan '${planId}'`,
          planId,
          qualityGoalId: goal.id
        });
        continue;
      }

      row[goal.id] = roundTo(satisfactionDistance(goal.constraint, actual), precision);
    }
  }

  return diagnosed(matrix, diagnostics);
}
