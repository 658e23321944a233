/**
 * Scenario Enumerator
 *
 * Expands alpha × constraint values × perturbation levels into the full
 * scenario grid. Alpha varies slowest, then the constraint values, then the
 * perturbation levels; within each product the last field varies fastest.
 */

import type { PerturbationLevel, Scenario } from '../shared/types/q2s.js';
import type { ScenarioGeneratorConfig } from './experiment-config.js';

/**
 * Cartesian product, last list varying fastest
 */
export function cartesianProduct<T>(lists: readonly (readonly T[])[]): T[][] {
  return lists.reduce<T[][]>(
    (acc, list) => acc.flatMap(prefix => list.map(item => [...prefix, item])),
    [[]]
  );
}

export function countScenarios(generator: ScenarioGeneratorConfig): number {
  let count = generator.alphaOptions.length;
  for (const option of generator.constraintOptions) {
    count *= option.values.length * option.perturbations.length;
  }
  return count;
}

export function enumerateScenarios(generator: ScenarioGeneratorConfig): Scenario[] {
  const fields = generator.constraintOptions.map(o => o.field);
  const valueCombos = cartesianProduct<number>(generator.constraintOptions.map(o => o.values));
  const perturbationCombos = cartesianProduct<PerturbationLevel>(
    generator.constraintOptions.map(o => o.perturbations)
  );

  const scenarios: Scenario[] = [];
  let id = 1;

  for (const alpha of generator.alphaOptions) {
    for (const values of valueCombos) {
      for (const levels of perturbationCombos) {
        const constraints: Record<string, number> = {};
        const perturbations: Record<string, PerturbationLevel> = {};

        fields.forEach((field, i) => {
          constraints[field] = values[i];
          perturbations[field] = { ...levels[i] };
        });

        scenarios.push({ id: id++, alpha, constraints, perturbations });
      }
    }
  }

  return scenarios;
}
