/**
 * Constraint / Quality-Goal Model
 *
 * Turns quality-goal definitions into concrete upper bounds for one scenario.
 * The perturbed variant adds the scenario's perturbation delta for the goal's
 * constraint field.
 */

import type {
  QualityGoalDefinition,
  Scenario,
  ScenarioQualityGoal
} from '../shared/types/q2s.js';
import { diagnosed, type Diagnosed, type Diagnostic } from '../shared/diagnostics.js';

export interface ConstraintValues {
  constraints: Readonly<Record<string, number>>;
  /** constraint field → delta; absent fields perturb by 0 */
  deltas: Readonly<Record<string, number>>;
}

/**
 * Split a scenario into constraint values and perturbation deltas
 */
export function constraintValuesOf(scenario: Scenario): ConstraintValues {
  const deltas: Record<string, number> = {};
  for (const [field, perturbation] of Object.entries(scenario.perturbations)) {
    deltas[field] = perturbation.delta;
  }
  return { constraints: scenario.constraints, deltas };
}

export function materializeQualityGoals(
  definitions: readonly QualityGoalDefinition[],
  values: ConstraintValues,
  perturbed: boolean
): Diagnosed<ScenarioQualityGoal[]> {
  const goals: ScenarioQualityGoal[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const def of definitions) {
    const base = values.constraints[def.constraintField];

    if (base === undefined) {
      diagnostics.push({
        code: 'missing-scenario-field',
        message: `No constraint option found for field '${def.constraintField}' in quality goal '${def.id}'`,
        qualityGoalId: def.id,
        field: def.constraintField
      });
      goals.push({ ...def });
      continue;
    }

    const delta = perturbed ? values.deltas[def.constraintField] ?? 0 : 0;

    goals.push({
      id: def.id,
      domainVariable: def.domainVariable,
      relation: def.relation,
      constraint: base + delta
    });
  }

  return diagnosed(goals, diagnostics);
}
