/**
 * Non-fatal diagnostics
 *
 * Core operations that recover from inconsistent data return their value
 * together with the list of what they skipped, so callers decide whether
 * to log, count or ignore them.
 */

export type DiagnosticCode =
  | 'missing-scenario-field'   // quality goal names a constraint field the scenario lacks
  | 'missing-domain-variable'  // quality goal's domain variable absent from a plan impact
  | 'unsupported-relation'     // relation other than 'max'
  | 'unmaterialized-goal'      // goal has no constraint value in this scenario
  | 'non-positive-constraint'  // constraint <= 0, no normalized distance
  | 'missing-plan-impact'      // plan id without computed impact
  | 'no-distances'             // plan row without a single distance
  | 'empty-candidate-set';     // no plan satisfies the scenario's constraints

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  planId?: string;
  qualityGoalId?: string;
  field?: string;
}

export interface Diagnosed<T> {
  value: T;
  diagnostics: Diagnostic[];
}

export function diagnosed<T>(value: T, diagnostics: Diagnostic[] = []): Diagnosed<T> {
  return { value, diagnostics };
}

/**
 * Count diagnostics per code (for sweep statistics)
 */
export function countByCode(diagnostics: readonly Diagnostic[]): Partial<Record<DiagnosticCode, number>> {
  const counts: Partial<Record<DiagnosticCode, number>> = {};
  for (const d of diagnostics) {
    counts[d.code] = (counts[d.code] ?? 0) + 1;
  }
  return counts;
}

/**
 * Concatenate diagnostic lists, dropping repeats of the same issue
 * (same code, plan, goal and field)
 */
export function mergeDiagnostics(...lists: readonly (readonly Diagnostic[])[]): Diagnostic[] {
  const seen = new Set<string>();
  const merged: Diagnostic[] = [];
  for (const list of lists) {
    for (const d of list) {
      const key = [d.code, d.planId ?? '', d.qualityGoalId ?? '', d.field ?? ''].join('|');
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(d);
    }
  }
  return merged;
}
