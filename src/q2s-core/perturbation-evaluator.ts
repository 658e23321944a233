/**
 * Perturbation & Margin Evaluator
 *
 * Re-checks a committed plan against the perturbed constraints. A plan that
 * survives gets a margin: the mean satisfaction distance under the perturbed
 * bounds. A failed or missing selection scores (false, 0).
 */

import {
  MAX_RELATION,
  isMaterialized,
  type PerturbationOutcome,
  type PlanImpacts,
  type ScenarioQualityGoal
} from '../shared/types/q2s.js';
import { diagnosed, type Diagnosed, type Diagnostic } from '../shared/diagnostics.js';
import { checkPlanValidity } from './validity-filter.js';
import { roundTo, satisfactionDistance, type PrecisionOptions } from './q2s-matrix.js';

export const DEFAULT_MARGIN_PRECISION = 4;

const FAILED: Readonly<PerturbationOutcome> = Object.freeze({ success: false, margin: 0 });

export function evaluateUnderPerturbation(
  planId: string | null,
  impacts: PlanImpacts,
  perturbedGoals: readonly ScenarioQualityGoal[],
  options: PrecisionOptions = {}
): Diagnosed<PerturbationOutcome> {
  if (planId === null) {
    return diagnosed({ ...FAILED });
  }

  const impact = impacts[planId];
  if (impact === undefined) {
    return diagnosed({ ...FAILED }, [
      { code: 'missing-plan-impact', message: `No impact data found for plan '${planId}'`, planId }
    ]);
  }

  const check = checkPlanValidity(planId, impact, perturbedGoals);
  if (!check.value) {
    return diagnosed({ ...FAILED }, check.diagnostics);
  }

  const precision = options.precision === undefined ? DEFAULT_MARGIN_PRECISION : options.precision;
  const diagnostics: Diagnostic[] = [...check.diagnostics];
  const margins: number[] = [];

  for (const goal of perturbedGoals) {
    if (!isMaterialized(goal) || goal.relation !== MAX_RELATION) continue;

    const actual = impact[goal.domainVariable];
    if (actual === undefined) continue;

    if (goal.constraint <= 0) {
      diagnostics.push({
        code: 'non-positive-constraint',
        message: `Perturbed quality goal '${goal.id}' has constraint ${goal.constraint}; excluded from margin of plan '${planId}'`,
        planId,
        qualityGoalId: goal.id
      });
      continue;
    }

    margins.push(satisfactionDistance(goal.constraint, actual));
  }

  const mean = margins.length > 0 ? margins.reduce((sum, m) => sum + m, 0) / margins.length : 0;

  return diagnosed({ success: true, margin: roundTo(mean, precision) }, diagnostics);
}
