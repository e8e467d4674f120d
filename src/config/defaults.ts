import type { Config } from './validator';

/** Free OpenRouter models that accept plain chat completions, in priority order */
export const DEFAULT_MODELS = ['mistralai/devstral-2512:free', 'meta-llama/llama-3.3-70b-instruct:free'];

export const defaults: Config = {
  backend: {
    api_key: '',
    base_url: 'https://openrouter.ai/api/v1',
    models: DEFAULT_MODELS,
    temperature: 0,
    timeout_ms: 120000,
    max_tokens: 4096,
  },
  pipeline: {
    max_iterations: 3,
    cooldown_ms: 60000,
    fallback_delay_ms: 0,
  },
  storage: {
    root_dir: '.codemender',
    log_file: 'logs/experiment_data.jsonl',
    strict_logging: false,
  },
};
