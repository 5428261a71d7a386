/**
 * Application configuration, read once from the Vite environment.
 */

import { z } from 'zod';
import type { AgeRange } from './types/appointment';

export const DEFAULT_AGE_RANGE: AgeRange = [0, 100];
export const TOP_NEIGHBOURHOOD_LIMIT = 10;

const configSchema = z.object({
  VITE_DATASET_URL: z.string().min(1).default('/data/appointments.csv'),
  VITE_EXPORT_FILENAME: z
    .string()
    .regex(/^[^/\\]+\.csv$/i, 'must be a plain file name ending in .csv')
    .default('filtered_medical_appointments.csv'),
  VITE_TABLE_PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(10),
});

export interface AppConfig {
  datasetUrl: string;
  exportFilename: string;
  tablePageSize: number;
}

/**
 * Invalid environment settings. Thrown at startup, never at filter time.
 */
export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function parseConfig(env: Record<string, unknown>): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    datasetUrl: result.data.VITE_DATASET_URL,
    exportFilename: result.data.VITE_EXPORT_FILENAME,
    tablePageSize: result.data.VITE_TABLE_PAGE_SIZE,
  };
}

export const config: AppConfig = parseConfig({ ...import.meta.env });
