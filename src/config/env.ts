import dotenv from 'dotenv';
import path from 'path';
import type { PageUnit } from '../types/calendar';

// Load .env from project root so it works regardless of process.cwd()
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

export interface ScrapeConfig {
  startDate: string;
  endDate: string;
  targetTimezone: string;
  /** Timezone the calendar session displays times in. */
  sourceTimezone: string;
  outputPath: string;
  pageUnit: PageUnit;
  diagnosticsDb?: string;
  headless: boolean;
  chromiumPath?: string;
}

type Env = Record<string, string | undefined>;

const ENV_KEYS = {
  startDate: 'START_DATE',
  endDate: 'END_DATE',
  targetTimezone: 'TARGET_TIMEZONE',
  sourceTimezone: 'SOURCE_TIMEZONE',
  outputPath: 'OUTPUT_PATH',
} as const;

function getEnvVar(
  key: keyof typeof ENV_KEYS,
  overrides: Partial<ScrapeConfig>,
  env: Env
): string {
  const value = overrides[key] ?? env[ENV_KEYS[key]];
  if (!value) {
    throw new Error(`Missing required setting: ${key} (or environment variable ${ENV_KEYS[key]})`);
  }
  return value;
}

export function parsePageUnit(value: string | undefined): PageUnit {
  if (!value) return 'day';
  if (value === 'day' || value === 'month') return value;
  throw new Error(`Invalid page unit "${value}", expected "day" or "month"`);
}

/**
 * Merge explicit settings (CLI flags) over environment variables.
 * start/end date, both timezones and the output path are required.
 */
export function resolveConfig(overrides: Partial<ScrapeConfig> = {}, env: Env = process.env): ScrapeConfig {
  return {
    startDate: getEnvVar('startDate', overrides, env),
    endDate: getEnvVar('endDate', overrides, env),
    targetTimezone: getEnvVar('targetTimezone', overrides, env),
    sourceTimezone: getEnvVar('sourceTimezone', overrides, env),
    outputPath: getEnvVar('outputPath', overrides, env),
    pageUnit: overrides.pageUnit ?? parsePageUnit(env.PAGE_UNIT),
    diagnosticsDb: overrides.diagnosticsDb ?? (env.DIAGNOSTICS_DB || undefined),
    headless: overrides.headless ?? env.HEADLESS !== 'false',
    chromiumPath: overrides.chromiumPath ?? (env.CHROMIUM_PATH || undefined),
  };
}
