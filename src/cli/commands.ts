/**
 * Command runners behind the dam-upload CLI
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { DamClient } from '../client.js';
import { formatBytes, sanitizeFileName } from '../lib/validation.js';
import type { FileListResponse } from '../types/api.js';
import type { BatchReport, UploadItem } from '../types/batch.js';
import type { CliCommand } from './args.js';

export interface CommandContext {
  client: DamClient;
  /** Progress spinner factory */
  spinner?: (text: string) => Ora;
}

export type UploadCommand = Extract<CliCommand, { command: 'upload' }>;

export async function runUpload(context: CommandContext, command: UploadCommand): Promise<number> {
  const { client } = context;
  const items: UploadItem[] = command.files.map((filePath) => ({
    filePath,
    destinationPath: command.destinationPath,
    metadata: command.metadata,
    maxRetries: command.maxRetries,
  }));

  const spinner = startSpinner(context, `Uploading ${items.length} files...`);
  const controller = new AbortController();
  const onSigint = () => {
    spinner.warn('Cancelling: waiting for in-flight uploads');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let report: BatchReport;
  try {
    report = await client.uploadBatch(items, {
      concurrencyLimit: command.concurrencyLimit,
      signal: controller.signal,
      onProgress: (progress) => {
        spinner.text = `Uploading ${progress.filesCompleted + progress.filesFailed}/${progress.filesTotal} files (${formatBytes(progress.bytesUploaded)} of ${formatBytes(progress.bytesTotal)})`;
      },
    });
  } catch (error) {
    spinner.fail('Upload could not start');
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  const { summary } = report;
  if (summary.failed === 0 && summary.cancelled === 0) {
    spinner.succeed(`${summary.succeeded} files uploaded`);
  } else {
    spinner.warn(
      `${summary.succeeded} uploaded, ${summary.failed} failed, ${summary.cancelled} cancelled`
    );
  }

  for (const outcome of report.outcomes) {
    const name = sanitizeFileName(items[outcome.index].filePath);
    if (outcome.status === 'success') {
      console.log(chalk.green(`  ✓ ${name}`) + chalk.gray(` ${outcome.assetId} ${outcome.url}`));
    } else {
      console.log(
        chalk.red(`  ✗ ${name}`) +
          chalk.gray(` [${outcome.errorKind}] ${outcome.message} (${outcome.attempts} attempts)`)
      );
    }
  }
  console.log(chalk.gray(`Batch ID: ${report.batchId}`));

  return summary.failed + summary.cancelled > 0 ? 1 : 0;
}

export async function runStats(context: CommandContext): Promise<number> {
  const spinner = startSpinner(context, 'Fetching statistics...');
  let dashboard: Record<string, unknown>;
  let storage: Record<string, unknown>;
  try {
    [dashboard, storage] = await Promise.all([
      context.client.getDashboardStats(),
      context.client.getStorageStats(),
    ]);
  } catch (error) {
    spinner.fail('Could not fetch statistics');
    throw error;
  }
  spinner.stop();

  console.log(chalk.bold('Dashboard'));
  console.log(JSON.stringify(dashboard, null, 2));
  console.log(chalk.bold('Storage'));
  console.log(JSON.stringify(storage, null, 2));
  return 0;
}

export async function runList(context: CommandContext, limit?: number): Promise<number> {
  const spinner = startSpinner(context, 'Fetching files...');
  let listing: FileListResponse;
  try {
    listing = await context.client.listFiles({ limit });
  } catch (error) {
    spinner.fail('Could not list files');
    throw error;
  }
  spinner.stop();

  const { files, pagination } = listing;
  for (const file of files) {
    console.log(
      `${chalk.cyan(file.id)}  ${file.originalName || file.filename}  ` +
        chalk.gray(`${file.mimeType}, ${formatBytes(file.size)}`)
    );
  }
  console.log(chalk.gray(`${files.length} of ${pagination.total} files`));
  return 0;
}

function startSpinner(context: CommandContext, text: string): Ora {
  return (context.spinner ?? ora)(text).start();
}
