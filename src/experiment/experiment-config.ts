/**
 * Experiment Configuration Loader
 *
 * Loads and validates the experiment JSON: data files, quality-goal
 * definitions, scenario options and simulation settings.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ExperimentConfigError } from '../shared/errors.js';

const perturbationSchema = z.object({
  level: z.string().min(1),
  delta: z.number().finite()
});

const constraintOptionSchema = z.object({
  field: z.string().min(1),
  values: z.array(z.number().finite()),
  perturbations: z.array(perturbationSchema)
});

const qualityGoalSchema = z.object({
  id: z.string().min(1),
  domainVariable: z.string().min(1),
  relation: z.string().min(1).default('max'),
  constraintField: z.string().min(1)
});

export const experimentConfigSchema = z
  .object({
    files: z.object({
      plans: z.string().min(1),
      contributions: z.string().min(1)
    }),
    qualityGoals: z.array(qualityGoalSchema).min(1),
    scenarioGenerator: z.object({
      alphaOptions: z.array(z.number().min(0).max(1)),
      constraintOptions: z.array(constraintOptionSchema).min(1)
    }),
    simulation: z
      .object({
        randomRuns: z.number().int().min(1).optional(),
        seed: z.number().int().optional(),
        outputDirectory: z.string().min(1).optional(),
        resultsFilename: z.string().min(1).optional()
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    const seenFields = new Set<string>();
    config.scenarioGenerator.constraintOptions.forEach((option, i) => {
      if (seenFields.has(option.field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['scenarioGenerator', 'constraintOptions', i, 'field'],
          message: `Duplicate constraint field '${option.field}'`
        });
      }
      seenFields.add(option.field);
    });

    const seenGoals = new Set<string>();
    config.qualityGoals.forEach((goal, i) => {
      if (seenGoals.has(goal.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['qualityGoals', i, 'id'],
          message: `Duplicate quality goal id '${goal.id}'`
        });
      }
      seenGoals.add(goal.id);
    });
  });

export type ExperimentConfig = z.infer<typeof experimentConfigSchema>;
export type ScenarioGeneratorConfig = ExperimentConfig['scenarioGenerator'];
export type ConstraintOption = ScenarioGeneratorConfig['constraintOptions'][number];

export interface LoadedExperimentConfig {
  config: ExperimentConfig;
  /** Directory relative data paths resolve against */
  baseDir: string;
  source: string;
}

export function parseExperimentConfig(raw: unknown, source: string): ExperimentConfig {
  const result = experimentConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ExperimentConfigError(
      source,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function loadExperimentConfig(filePath: string): LoadedExperimentConfig {
  const source = path.resolve(filePath);

  if (!fs.existsSync(source)) {
    throw new ExperimentConfigError(source, ['file not found']);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(source, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ExperimentConfigError(source, [`invalid JSON: ${detail}`]);
  }

  return {
    config: parseExperimentConfig(raw, source),
    baseDir: path.dirname(source),
    source
  };
}

/**
 * Resolve a data path from the config against the config's directory
 */
export function resolveDataPath(baseDir: string, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(baseDir, filePath);
}
