/**
 * Impact Calculator
 *
 * A plan's impact on a domain variable is the sum of the contributions of
 * the goals it activates. Impacts do not depend on the scenario, so they are
 * computed once per experiment.
 */

import type { ContributionTable, Plan, PlanImpact, PlanImpacts } from '../shared/types/q2s.js';

export function calculatePlanImpact(plan: Plan, contributions: ContributionTable): PlanImpact {
  const impact: Record<string, number> = {};

  for (const [domainVariable, goalContributions] of Object.entries(contributions)) {
    let total = 0;
    for (const [goal, contribution] of Object.entries(goalContributions)) {
      if (plan.goals.has(goal)) {
        total += contribution;
      }
    }
    impact[domainVariable] = total;
  }

  return impact;
}

export function calculatePlanImpacts(
  plans: readonly Plan[],
  contributions: ContributionTable
): PlanImpacts {
  const impacts: Record<string, PlanImpact> = {};
  for (const plan of plans) {
    impacts[plan.id] = calculatePlanImpact(plan, contributions);
  }
  return impacts;
}
