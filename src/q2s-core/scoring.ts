/**
 * Scoring Extension
 *
 * Adds three columns to every matrix row:
 * - AvgSat: mean distance (optimistic view)
 * - MinSat: smallest distance (pessimistic view)
 * - Score:  alpha·AvgSat + (1 − alpha)·MinSat (Hurwicz criterion)
 *
 * AvgSat is rounded before it enters Score, so the printed columns add up.
 */

import type { ExtendedQ2SMatrix, ExtendedQ2SRow, Q2SMatrix } from '../shared/types/q2s.js';
import { InvalidAlphaError } from '../shared/errors.js';
import { diagnosed, type Diagnosed, type Diagnostic } from '../shared/diagnostics.js';
import { DEFAULT_DISTANCE_PRECISION, roundTo, type PrecisionOptions } from './q2s-matrix.js';

export function assertAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new InvalidAlphaError(alpha);
  }
}

export function hurwiczScore(alpha: number, avgSat: number, minSat: number): number {
  return alpha * avgSat + (1 - alpha) * minSat;
}

export function extendQ2SMatrix(
  matrix: Q2SMatrix,
  alpha: number,
  options: PrecisionOptions = {}
): Diagnosed<ExtendedQ2SMatrix> {
  assertAlpha(alpha);
  const precision = options.precision === undefined ? DEFAULT_DISTANCE_PRECISION : options.precision;
  const diagnostics: Diagnostic[] = [];
  const goalIds = new Set(matrix.qualityGoals);

  const rows: Record<string, ExtendedQ2SRow> = {};

  for (const planId of matrix.plans) {
    const distances: Record<string, number> = {};
    for (const [goalId, value] of Object.entries(matrix.rows[planId] ?? {})) {
      if (goalIds.has(goalId)) {
        distances[goalId] = value;
      }
    }

    const values = Object.values(distances);
    if (values.length === 0) {
      diagnostics.push({
        code: 'no-distances',
        message: `No satisfaction distances for plan '${planId}'; AvgSat, MinSat and Score default to 0`,
        planId
      });
      rows[planId] = { distances, avgSat: 0, minSat: 0, score: 0 };
      continue;
    }

    const avgSat = roundTo(values.reduce((sum, v) => sum + v, 0) / values.length, precision);
    const minSat = Math.min(...values);
    const score = roundTo(hurwiczScore(alpha, avgSat, minSat), precision);

    rows[planId] = { distances, avgSat, minSat, score };
  }

  return diagnosed(
    {
      plans: [...matrix.plans],
      qualityGoals: [...matrix.qualityGoals],
      alpha,
      rows
    },
    diagnostics
  );
}
