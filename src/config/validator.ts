import { z } from 'zod';

export const BackendConfigSchema = z.object({
  api_key: z.string().default(''),
  base_url: z.string().url(),
  models: z.array(z.string().min(1)).min(1, 'At least one backend model is required'),
  temperature: z.number().min(0).max(2),
  timeout_ms: z.number().int().positive(),
  max_tokens: z.number().int().positive(),
});

export const PipelineConfigSchema = z.object({
  max_iterations: z.number().int().min(1),
  cooldown_ms: z.number().int().min(0),
  fallback_delay_ms: z.number().int().min(0),
  max_backend_attempts: z.number().int().min(1).optional(),
});

export const StorageConfigSchema = z.object({
  root_dir: z.string().min(1),
  log_file: z.string().min(1),
  strict_logging: z.boolean(),
});

export const ConfigSchema = z.object({
  backend: BackendConfigSchema,
  pipeline: PipelineConfigSchema,
  storage: StorageConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/** Flatten zod issues into `path: message` strings */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
