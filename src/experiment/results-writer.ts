/**
 * Results Writer
 *
 * One CSV row per scenario; this column layout is the contract with the
 * downstream aggregation and plotting scripts:
 *
 *   ID, alpha, <field>..., <field>_perturbation..., num_valid_plans,
 *   ScorePlan_ID, ScorePlan_success, ScorePlan_margins,
 *   AvgPlan_..., MinPlan_..., RndPlan_...
 */

import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import type { StrategyId } from '../shared/types/q2s.js';
import { STRATEGY_IDS } from '../shared/types/q2s.js';
import { Q2SLogger } from '../shared/logger.js';
import type { ScenarioRecord } from './scenario-evaluator.js';

export const STRATEGY_COLUMN_PREFIX: Readonly<Record<StrategyId, string>> = {
  score: 'ScorePlan',
  avg_only: 'AvgPlan',
  min_only: 'MinPlan',
  random: 'RndPlan'
};

export type ResultCell = string | number;

export function resultHeader(fields: readonly string[]): string[] {
  return [
    'ID',
    'alpha',
    ...fields,
    ...fields.map(f => `${f}_perturbation`),
    'num_valid_plans',
    ...STRATEGY_IDS.flatMap(id => {
      const prefix = STRATEGY_COLUMN_PREFIX[id];
      return [`${prefix}_ID`, `${prefix}_success`, `${prefix}_margins`];
    })
  ];
}

/**
 * Constraint fields in first-seen order across the records
 */
export function fieldsOf(records: readonly ScenarioRecord[]): string[] {
  const fields: string[] = [];
  for (const record of records) {
    for (const field of Object.keys(record.scenario.constraints)) {
      if (!fields.includes(field)) fields.push(field);
    }
  }
  return fields;
}

export function toResultRows(records: readonly ScenarioRecord[], fields: readonly string[]): ResultCell[][] {
  return records.map(record => {
    const { scenario, outcomes } = record;
    return [
      scenario.id,
      scenario.alpha,
      ...fields.map(f => scenario.constraints[f] ?? ''),
      ...fields.map(f => scenario.perturbations[f]?.level ?? ''),
      record.validPlanCount,
      ...STRATEGY_IDS.flatMap(id => {
        const outcome = outcomes[id];
        return [outcome.planId ?? '', outcome.success, outcome.margin];
      })
    ];
  });
}

export function formatResultsCsv(
  records: readonly ScenarioRecord[],
  fields: readonly string[] = fieldsOf(records)
): string {
  // unparse ends a header-only document with a newline
  return Papa.unparse(
    { fields: resultHeader(fields), data: toResultRows(records, fields) },
    { newline: '\n' }
  ).replace(/\n$/, '');
}

export function writeResultsCsv(
  filePath: string,
  records: readonly ScenarioRecord[],
  fields: readonly string[] = fieldsOf(records)
): string {
  const target = path.resolve(filePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, formatResultsCsv(records, fields) + '\n', 'utf-8');
  Q2SLogger.resultsWritten(target, records.length);
  return target;
}
