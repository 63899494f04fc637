/**
 * Status Command
 *
 * Displays index statistics and configuration:
 *   radv status         - Show system status
 *   radv status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { runMigrations, getDatabase } from '../../database/index.js';
import type { IndexMeta } from '../../database/index.js';
import { loadConfig } from '../../config/loader.js';
import { getConfigPath, getDbPath } from '../../config/paths.js';
import { DatabaseError } from '../../errors/index.js';

interface IndexStats {
  reviewCount: number;
  productCount: number;
  meta?: IndexMeta;
  sizeBytes: number;
}

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? 'TB'}`;
}

/**
 * Format a path with ~ for home directory
 */
function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

function getIndexStats(): IndexStats {
  try {
    runMigrations();
    const db = getDatabase();
    return {
      reviewCount: db.countDocuments(),
      productCount: db.countProducts(),
      meta: db.getIndexMeta(),
      sizeBytes: db.getDatabaseSize(),
    };
  } catch (error) {
    throw new DatabaseError(
      'Failed to query index statistics',
      error instanceof Error ? error : undefined
    );
  }
}

export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show index statistics and configuration')
    .action(() => {
      const ctx = getContext();
      ctx.debug('Fetching system status...');

      const stats = getIndexStats();
      const config = loadConfig();
      const dbPath = getDbPath();
      const configPath = getConfigPath();

      const configuredModel = `${config.embedding.provider}/${config.embedding.model}`;
      const indexedModel = stats.meta
        ? `${stats.meta.embeddingProvider}/${stats.meta.embeddingModel}`
        : undefined;
      const stale = indexedModel !== undefined && indexedModel !== configuredModel;

      if (ctx.options.json) {
        const jsonOutput = {
          reviews: stats.reviewCount,
          products: stats.productCount,
          index: stats.meta
            ? {
                embeddingProvider: stats.meta.embeddingProvider,
                embeddingModel: stats.meta.embeddingModel,
                dimensions: stats.meta.dimensions,
                source: stats.meta.source,
                ingestedAt: stats.meta.ingestedAt,
                matchesConfig: !stale,
              }
            : null,
          database: {
            path: dbPath,
            size: stats.sizeBytes,
            sizeFormatted: formatBytes(stats.sizeBytes),
          },
          embedding: {
            provider: config.embedding.provider,
            model: config.embedding.model,
          },
          llm: {
            provider: config.default_provider,
            model: config.default_model,
          },
          config: {
            path: configPath,
          },
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      const lines: string[] = [];

      lines.push(chalk.bold('Review Advisor Status'));
      lines.push(chalk.dim('─'.repeat(35)));

      lines.push(`${chalk.cyan('Reviews:')}      ${stats.reviewCount.toLocaleString()}`);
      lines.push(`${chalk.cyan('Products:')}     ${stats.productCount.toLocaleString()}`);
      if (stats.meta) {
        lines.push(`${chalk.cyan('Ingested:')}     ${stats.meta.ingestedAt}`);
        if (stats.meta.source) {
          lines.push(`${chalk.cyan('Source:')}       ${formatPath(stats.meta.source)}`);
        }
      }
      lines.push(`${chalk.cyan('Database:')}     ${formatBytes(stats.sizeBytes)} (${formatPath(dbPath)})`);

      lines.push('');
      lines.push(`${chalk.cyan('Embeddings:')}   ${config.embedding.model} (${config.embedding.provider})`);
      lines.push(`${chalk.cyan('Provider:')}     ${config.default_provider} (${config.default_model})`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      if (stale) {
        lines.push('');
        lines.push(chalk.yellow(`Index was built with ${indexedModel}; the configured model is ${configuredModel}.`));
        lines.push(`Run ${chalk.cyan('radv ingest <reviews.csv>')} to rebuild it.`);
      } else if (stats.reviewCount === 0) {
        lines.push('');
        lines.push(chalk.yellow('No reviews indexed.'));
        lines.push(`Run ${chalk.cyan('radv ingest <reviews.csv>')} to get started.`);
      }

      ctx.log(lines.join('\n'));
    });
}
