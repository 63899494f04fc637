/**
 * Config Command
 *
 *   radv config get <key>          Print one value (dot notation)
 *   radv config set <key> <value>  Validate and write one value
 *   radv config list               Print every value, grouped by section
 *   radv config path               Print the config file location
 *   radv config reset --force      Restore the commented default file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, setConfigValue, listConfig, resetConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { CommandContext } from '../types.js';

/** Keys whose change invalidates the persisted vectors */
const REINGEST_KEYS = new Set(['embedding.provider', 'embedding.model']);

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Report a failed config operation and mark the process as failed.
 */
function fail(ctx: CommandContext, message: string): void {
  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }
  process.exitCode = 1;
}

/**
 * Run a config action, turning loader errors into a failed exit.
 */
function guarded<A extends unknown[]>(
  getContext: () => CommandContext,
  action: (ctx: CommandContext, ...args: A) => void
): (...args: A) => void {
  return (...args: A) => {
    const ctx = getContext();
    try {
      action(ctx, ...args);
    } catch (error) {
      fail(ctx, error instanceof Error ? error.message : String(error));
    }
  };
}

function printGroupedEntries(ctx: CommandContext, entries: Array<[string, unknown]>): void {
  ctx.log(chalk.bold('Configuration:'));

  let section: string | undefined;
  for (const [key, value] of entries) {
    const keySection = key.includes('.') ? key.slice(0, key.indexOf('.')) : '';
    if (keySection !== section) {
      ctx.log('');
      section = keySection;
    }
    ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
  }

  ctx.log('');
  ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., radv config get embedding.model)')
    .action(
      guarded(getContext, (ctx, key: string) => {
        const value = getConfigValue(key);
        if (value === undefined) {
          fail(ctx, `Unknown config key: ${key}`);
          ctx.log(`Run ${chalk.cyan('radv config list')} to see all available keys.`);
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      })
    );

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., radv config set retrieval.top_k 5)')
    .action(
      guarded(getContext, (ctx, key: string, value: string) => {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
          return;
        }
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        if (REINGEST_KEYS.has(key)) {
          ctx.log(chalk.yellow('The review index must be rebuilt: radv ingest <reviews.csv>'));
        }
      })
    );

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(
      guarded(getContext, (ctx) => {
        const entries = listConfig();
        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        } else {
          printGroupedEntries(ctx, entries);
        }
      })
    );

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(
      guarded(getContext, (ctx) => {
        const configPath = getConfigPath();
        if (ctx.options.json) {
          console.log(JSON.stringify({ path: configPath }));
        } else {
          ctx.log(configPath);
        }
      })
    );

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(
      guarded(getContext, (ctx, options: { force?: boolean }) => {
        if (!options.force && !ctx.options.json) {
          ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
          ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
          process.exitCode = 1;
          return;
        }

        resetConfig();
        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      })
    );

  return configCmd;
}
