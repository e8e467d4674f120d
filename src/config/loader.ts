import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, ConfigValidationError, describeIssues } from './validator';
import type { Config } from './validator';
import { defaults } from './defaults';

/**
 * Recursive partial of Config, used for YAML and CLI overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? U[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding `codemender.yaml` and `.env` (default: cwd) */
  cwd?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip loading `.env` into process.env */
  skipDotenv?: boolean;
}

export const CONFIG_FILE_NAME = 'codemender.yaml';

export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  if (!options.skipDotenv) {
    dotenv.config({ path: path.join(cwd, '.env') });
  }
  const env = options.env ?? process.env;

  // 1. Start with a deep copy of the defaults so merging never mutates them
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with codemender.yaml (if exists)
  const yamlPath = path.join(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with environment variables
  deepMerge(config, {
    backend: {
      api_key: env.OPENROUTER_API_KEY,
      models: parseList(env.CODEMENDER_MODELS),
    },
    pipeline: {
      max_iterations: parseInteger(env.CODEMENDER_MAX_ITERATIONS),
      cooldown_ms: parseInteger(env.CODEMENDER_COOLDOWN_MS),
    },
  });

  // 4. Override with CLI arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(describeIssues(result.error));
  }

  return result.data;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

function parseInteger(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  // Non-numeric input stays a string so validation reports it
  return Number.isFinite(n) ? n : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects. Arrays and scalars replace, undefined is skipped.
 */
function deepMerge(target: Record<string, unknown>, source: object): void {
  const entries: [string, unknown][] = Object.entries(source);
  for (const [key, sourceValue] of entries) {
    if (isRecord(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
