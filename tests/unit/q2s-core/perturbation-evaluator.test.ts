/**
 * Unit tests for post-selection perturbation checks and margins
 */

import { describe, it, expect } from 'vitest';
import { evaluateUnderPerturbation } from '../../../src/q2s-core/perturbation-evaluator.js';
import type { PlanImpacts, ScenarioQualityGoal } from '../../../src/shared/types/q2s.js';
import { createSampleGoals, createSampleImpacts } from '../../setup.js';

describe('perturbation-evaluator', () => {
  const impacts = createSampleImpacts();

  it('returns the mean distance under the perturbed constraints', () => {
    // Plan0 (200, 4, 7) against (250, 5, 8): 0.2, 0.2, 0.125
    const result = evaluateUnderPerturbation('Plan0', impacts, createSampleGoals(250, 5, 8));

    expect(result.value).toEqual({ success: true, margin: 0.175 });
    expect(result.diagnostics).toEqual([]);
  });

  it('differs from the margin under the unperturbed constraints', () => {
    const unperturbed = evaluateUnderPerturbation('Plan0', impacts, createSampleGoals());
    const perturbed = evaluateUnderPerturbation('Plan0', impacts, createSampleGoals(250, 5, 8));

    expect(unperturbed.value.margin).toBe(0.2716);
    expect(perturbed.value.margin).not.toBe(unperturbed.value.margin);
  });

  it('fails a plan that violates a perturbed bound', () => {
    const result = evaluateUnderPerturbation('Plan0', impacts, createSampleGoals(190));

    expect(result.value).toEqual({ success: false, margin: 0 });
  });

  it('keeps a plan that lands exactly on a perturbed bound', () => {
    // 0, 0, 0
    const result = evaluateUnderPerturbation('Plan0', impacts, createSampleGoals(200, 4, 7));

    expect(result.value).toEqual({ success: true, margin: 0 });
  });

  it('fails without a selection', () => {
    const result = evaluateUnderPerturbation(null, impacts, createSampleGoals());

    expect(result.value).toEqual({ success: false, margin: 0 });
    expect(result.diagnostics).toEqual([]);
  });

  it('fails and reports a plan without impact data', () => {
    const result = evaluateUnderPerturbation('Ghost', impacts, createSampleGoals());

    expect(result.value).toEqual({ success: false, margin: 0 });
    expect(result.diagnostics.map(d => [d.code, d.planId])).toEqual([['missing-plan-impact', 'Ghost']]);
  });

  it('excludes goals with a non-positive constraint from the margin', () => {
    const zeroEffort: PlanImpacts = { Lean: { TotalCost: 100, TotalEffort: 0 } };
    const goals: ScenarioQualityGoal[] = [
      { id: 'QG0', domainVariable: 'TotalCost', relation: 'max', constraint: 200 },
      { id: 'QG1', domainVariable: 'TotalEffort', relation: 'max', constraint: 0 }
    ];

    const result = evaluateUnderPerturbation('Lean', zeroEffort, goals);

    expect(result.value).toEqual({ success: true, margin: 0.5 });
    expect(result.diagnostics.map(d => [d.code, d.qualityGoalId])).toEqual([['non-positive-constraint', 'QG1']]);
  });

  it('averages only the goals it can measure', () => {
    const goals: ScenarioQualityGoal[] = [
      { id: 'QG0', domainVariable: 'TotalCost', relation: 'max', constraint: 400 },
      { id: 'QG3', domainVariable: 'Unknown', relation: 'max', constraint: 10 },
      { id: 'QG4', domainVariable: 'TimeSpent', relation: 'min', constraint: 1 }
    ];

    const result = evaluateUnderPerturbation('Plan0', impacts, goals);

    expect(result.value).toEqual({ success: true, margin: 0.5 });
    expect(result.diagnostics.map(d => d.code)).toEqual(['missing-domain-variable', 'unsupported-relation']);
  });

  it('yields margin 0 when no goal is measurable', () => {
    const goals: ScenarioQualityGoal[] = [
      { id: 'QG4', domainVariable: 'TimeSpent', relation: 'min', constraint: 1 }
    ];

    expect(evaluateUnderPerturbation('Plan0', impacts, goals).value).toEqual({ success: true, margin: 0 });
  });

  it('honours the margin precision', () => {
    const result = evaluateUnderPerturbation('Plan0', impacts, createSampleGoals(), { precision: 2 });

    expect(result.value.margin).toBe(0.27);
  });
});
