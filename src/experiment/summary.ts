/**
 * Strategy Summary
 * Success rate and mean margin per strategy across a sweep, overall and
 * broken down by alpha or by the perturbation level of one constraint field
 */

import { STRATEGY_IDS, type PerturbationLevel, type StrategyId } from '../shared/types/q2s.js';
import { SELECTION_STRATEGIES } from '../q2s-core/selection-strategies.js';
import type { ScenarioRecord } from './scenario-evaluator.js';

export interface StrategyStats {
  scenarios: number;
  /** Mean success value, 0..1 */
  successRate: number;
  meanMargin: number;
}

export type StrategySummary = Record<StrategyId, StrategyStats>;

export interface AlphaSummary {
  alpha: number;
  strategies: StrategySummary;
}

export interface PerturbationSummary {
  field: string;
  level: string;
  strategies: StrategySummary;
}

function strategyStats(records: readonly ScenarioRecord[], id: StrategyId): StrategyStats {
  const n = records.length;
  const success = records.reduce((sum, r) => sum + r.outcomes[id].success, 0);
  const margin = records.reduce((sum, r) => sum + r.outcomes[id].margin, 0);
  return {
    scenarios: n,
    successRate: n === 0 ? 0 : success / n,
    meanMargin: n === 0 ? 0 : margin / n
  };
}

export function summarizeByStrategy(records: readonly ScenarioRecord[]): StrategySummary {
  return {
    score: strategyStats(records, 'score'),
    avg_only: strategyStats(records, 'avg_only'),
    min_only: strategyStats(records, 'min_only'),
    random: strategyStats(records, 'random')
  };
}

export function summarizeByAlpha(records: readonly ScenarioRecord[]): AlphaSummary[] {
  const groups = new Map<number, ScenarioRecord[]>();
  for (const record of records) {
    const group = groups.get(record.scenario.alpha) ?? [];
    group.push(record);
    groups.set(record.scenario.alpha, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([alpha, group]) => ({ alpha, strategies: summarizeByStrategy(group) }));
}

/**
 * Group records by the perturbation level applied to `field`, in first-seen
 * order. Records whose scenario does not perturb `field` are left out.
 */
export function summarizeByPerturbation(
  records: readonly ScenarioRecord[],
  field: string
): PerturbationSummary[] {
  const groups = new Map<string, ScenarioRecord[]>();
  for (const record of records) {
    const perturbation: PerturbationLevel | undefined = record.scenario.perturbations[field];
    if (!perturbation) continue;
    const group = groups.get(perturbation.level) ?? [];
    group.push(record);
    groups.set(perturbation.level, group);
  }

  return [...groups.entries()].map(([level, group]) => ({
    field,
    level,
    strategies: summarizeByStrategy(group)
  }));
}

/**
 * Format a summary for display
 */
export function formatSummary(summary: StrategySummary, title = 'Strategy summary'): string {
  const lines: string[] = [`${title}:`];

  for (const id of STRATEGY_IDS) {
    const stats = summary[id];
    const label = SELECTION_STRATEGIES[id].label.padEnd(8);
    lines.push(
      `  ${label} success=${(stats.successRate * 100).toFixed(1)}% margin=${stats.meanMargin.toFixed(4)} (n=${stats.scenarios})`
    );
  }

  return lines.join('\n');
}
