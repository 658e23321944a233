/**
 * Text rendering of Q2S matrices for traces and the CLI
 */

import type { ExtendedQ2SMatrix, Q2SMatrix } from '../shared/types/q2s.js';

const CELL_WIDTH = 10;

function border(columns: number): string {
  return '+' + Array.from({ length: columns }, () => '-'.repeat(CELL_WIDTH + 2)).join('+') + '+';
}

function line(cells: string[]): string {
  return '| ' + cells.map(c => c.padEnd(CELL_WIDTH)).join(' | ') + ' |';
}

function cell(value: number | undefined): string {
  return value === undefined || Number.isNaN(value) ? 'N/A' : value.toFixed(4);
}

function table(header: string[], body: string[][]): string {
  const sep = border(header.length);
  return [sep, line(header), sep, ...body.map(line), sep].join('\n');
}

/**
 * Format the plain matrix (one column per quality goal)
 */
export function formatQ2SMatrix(matrix: Q2SMatrix): string {
  if (matrix.plans.length === 0) {
    return 'No plans in the Q2S matrix.';
  }

  const body = matrix.plans.map(planId => [
    planId,
    ...matrix.qualityGoals.map(goalId => cell(matrix.rows[planId]?.[goalId]))
  ]);

  return table(['Plan ID', ...matrix.qualityGoals], body);
}

/**
 * Format the extended matrix (quality goals, then AvgSat / MinSat / Score)
 */
export function formatExtendedMatrix(matrix: ExtendedQ2SMatrix): string {
  if (matrix.plans.length === 0) {
    return 'No plans in the Q2S matrix.';
  }

  const body = matrix.plans.map(planId => {
    const row = matrix.rows[planId];
    return [
      planId,
      ...matrix.qualityGoals.map(goalId => cell(row?.distances[goalId])),
      cell(row?.avgSat),
      cell(row?.minSat),
      cell(row?.score)
    ];
  });

  return [
    `Q2S Matrix (extended, alpha=${matrix.alpha}):`,
    table(['Plan ID', ...matrix.qualityGoals, 'AvgSat', 'MinSat', 'Score'], body)
  ].join('\n');
}
