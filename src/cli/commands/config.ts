import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import { ConfigValidationError } from '../../config/validator';
import { OpenRouterClient } from '../../llm/client';

/** Copy of the configuration with secrets masked */
export function maskConfig(config: Config): Config {
  const masked = structuredClone(config);
  if (masked.backend.api_key) masked.backend.api_key = '********';
  return masked;
}

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Inspect configuration');

  configCommand
    .command('validate')
    .description('Validate the configuration and check each backend model')
    .option('--offline', 'Only validate the configuration structure', false)
    .action(async (options: { offline?: boolean }) => {
      let config: Config;
      try {
        config = loadConfig();
      } catch (error) {
        console.log(chalk.red('✗ Configuration is invalid:'));
        if (error instanceof ConfigValidationError) {
          error.issues.forEach((issue) => console.log(chalk.red(`  - ${issue}`)));
        } else {
          console.log(chalk.red(`  - ${error instanceof Error ? error.message : String(error)}`));
        }
        process.exitCode = 1;
        return;
      }

      console.log(chalk.green('✓ Configuration structure is valid.'));
      if (options.offline) return;

      if (!config.backend.api_key) {
        console.log(chalk.yellow('! OPENROUTER_API_KEY is not set; skipping backend checks.'));
        process.exitCode = 1;
        return;
      }

      const client = new OpenRouterClient({
        apiKey: config.backend.api_key,
        baseUrl: config.backend.base_url,
        timeoutMs: config.backend.timeout_ms,
      });

      let failures = 0;
      for (const model of config.backend.models) {
        try {
          await client.checkModel(model);
          console.log(chalk.green(`✓ ${model}`));
        } catch (error) {
          failures += 1;
          console.log(chalk.red(`✗ ${model}: ${error instanceof Error ? error.message : String(error)}`));
        }
      }
      if (failures === config.backend.models.length) {
        process.exitCode = 1;
      }
    });

  configCommand
    .command('show')
    .description('Show the effective configuration')
    .action(() => {
      try {
        console.log(JSON.stringify(maskConfig(loadConfig()), null, 2));
      } catch (error) {
        console.error(chalk.red('Failed to load configuration:'));
        if (error instanceof Error) {
          console.error(chalk.red(error.message));
        }
        process.exitCode = 1;
      }
    });
}
