/**
 * Plans & Contributions Loader
 *
 * Input CSV layouts:
 *
 *   PLANS,G1,G5,G7           DomainVariable,G1,G5,G7
 *   Plan0,1,1,0              TotalCost,10,100,30
 *   Plan1,1,0,1              TotalEffort,0,,1
 *
 * A plan activates the goals whose cell is 1. An empty contribution cell
 * means the goal is not listed for that domain variable.
 */

import * as fs from 'fs';
import Papa from 'papaparse';
import type { ContributionTable, Plan } from '../shared/types/q2s.js';
import { DataLoadError } from '../shared/errors.js';

interface CsvTable {
  header: string[];
  rows: string[][];
}

function parseCsv(content: string, source: string): CsvTable {
  const result = Papa.parse<string[]>(content, { skipEmptyLines: 'greedy' });

  if (result.errors.length > 0) {
    const first = result.errors[0];
    throw new DataLoadError(source, first.message, first.row === undefined ? undefined : first.row + 1);
  }

  const [header, ...rows] = result.data;
  if (!header || header.length < 2) {
    throw new DataLoadError(source, 'expected a header with an id column and at least one goal column');
  }

  return { header: header.map(h => h.trim()), rows };
}

function parseNumber(cell: string, source: string, row: number, column: string): number {
  const value = Number(cell);
  if (!Number.isFinite(value)) {
    throw new DataLoadError(source, `non-numeric value '${cell}' in column '${column}'`, row);
  }
  return value;
}

export function parsePlansCsv(content: string, source = 'plans'): Plan[] {
  const { header, rows } = parseCsv(content, source);
  const goalColumns = header.slice(1);
  const plans: Plan[] = [];
  const seen = new Set<string>();

  rows.forEach((row, i) => {
    const rowNumber = i + 2; // 1-based, after the header
    const id = (row[0] ?? '').trim();
    if (!id) {
      throw new DataLoadError(source, 'empty plan id', rowNumber);
    }
    if (seen.has(id)) {
      throw new DataLoadError(source, `duplicate plan id '${id}'`, rowNumber);
    }
    seen.add(id);

    const goals = new Set<string>();
    goalColumns.forEach((goal, j) => {
      const cell = (row[j + 1] ?? '').trim();
      if (cell === '') return;
      if (parseNumber(cell, source, rowNumber, goal) === 1) {
        goals.add(goal);
      }
    });

    plans.push({ id, goals });
  });

  return plans;
}

export function parseContributionsCsv(content: string, source = 'contributions'): ContributionTable {
  const { header, rows } = parseCsv(content, source);
  const goalColumns = header.slice(1);
  const table: Record<string, Record<string, number>> = {};

  rows.forEach((row, i) => {
    const rowNumber = i + 2;
    const domainVariable = (row[0] ?? '').trim();
    if (!domainVariable) {
      throw new DataLoadError(source, 'empty domain variable', rowNumber);
    }

    const contributions: Record<string, number> = {};
    goalColumns.forEach((goal, j) => {
      const cell = (row[j + 1] ?? '').trim();
      if (cell === '') return;
      contributions[goal] = parseNumber(cell, source, rowNumber, goal);
    });

    table[domainVariable] = contributions;
  });

  return table;
}

function readSource(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new DataLoadError(filePath, 'file not found');
  }
  return fs.readFileSync(filePath, 'utf-8');
}

export function loadPlans(filePath: string): Plan[] {
  return parsePlansCsv(readSource(filePath), filePath);
}

export function loadContributions(filePath: string): ContributionTable {
  return parseContributionsCsv(readSource(filePath), filePath);
}
