/**
 * Validity Filter
 *
 * A plan is valid when every applicable quality goal holds:
 * actual ≤ constraint for 'max' goals. Goals that cannot be checked
 * (unmaterialized, unknown domain variable, unsupported relation) are
 * treated as satisfied and reported.
 */

import {
  MAX_RELATION,
  isMaterialized,
  type PlanImpact,
  type PlanImpacts,
  type ScenarioQualityGoal
} from '../shared/types/q2s.js';
import { diagnosed, type Diagnosed, type Diagnostic } from '../shared/diagnostics.js';

export function checkPlanValidity(
  planId: string,
  impact: PlanImpact,
  goals: readonly ScenarioQualityGoal[]
): Diagnosed<boolean> {
  const diagnostics: Diagnostic[] = [];
  let valid = true;

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
        message: `Domain variable '${goal.domainVariable}' from quality goal '${goal.id}' not found in impact of plan '${planId}'`,
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

    if (actual > goal.constraint) {
      valid = false;
    }
  }

  return diagnosed(valid, diagnostics);
}

/**
 * Keep the plans (in the given order) that satisfy all quality goals.
 * An empty result is a normal outcome, not an error.
 */
export function filterValidPlans(
  planIds: readonly string[],
  impacts: PlanImpacts,
  goals: readonly ScenarioQualityGoal[]
): Diagnosed<string[]> {
  const valid: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const planId of planIds) {
    const impact = impacts[planId];
    if (impact === undefined) {
      diagnostics.push({
        code: 'missing-plan-impact',
        message: `No impact data found for plan '${planId}'`,
        planId
      });
      continue;
    }

    const check = checkPlanValidity(planId, impact, goals);
    diagnostics.push(...check.diagnostics);
    if (check.value) {
      valid.push(planId);
    }
  }

  return diagnosed(valid, diagnostics);
}
