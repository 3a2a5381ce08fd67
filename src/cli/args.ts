/**
 * Command-line argument parsing
 */

import { parseArgs } from 'node:util';
import { ValidationError } from '../utils/errors.js';

export type CliCommand =
  | {
      command: 'upload';
      files: string[];
      destinationPath: string;
      metadata: Record<string, string>;
      concurrencyLimit?: number;
      maxRetries?: number;
    }
  | { command: 'stats' }
  | { command: 'list'; limit?: number }
  | { command: 'help' };

export const USAGE = `Usage: dam-upload <command> [options]

Commands:
  upload <files...>   Upload files to the asset library
  stats               Show dashboard and storage statistics
  list                List recent files

Options:
  -d, --dest <path>         Destination path for uploads (default: /)
  -m, --meta <key=value>    Metadata entry, repeatable
  -c, --concurrency <n>     Parallel uploads
      --max-retries <n>     Retries per file
      --limit <n>           Files to list (default: 50)
  -h, --help                Show this help

Environment:
  DAM_API_URL, DAM_API_KEY, DAM_API_KEY_ID, DAM_TIMEOUT_MS,
  DAM_CONCURRENCY, DAM_MAX_RETRIES, DAM_DEBUG`;

function parseCount(value: string | undefined, option: string, min: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ValidationError(`--${option} must be an integer >= ${min}`, option);
  }
  return parsed;
}

function parseMetadata(entries: string[]): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`--meta expects key=value, got "${entry}"`, 'meta');
    }
    metadata[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return metadata;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      dest: { type: 'string', short: 'd' },
      meta: { type: 'string', short: 'm', multiple: true },
      concurrency: { type: 'string', short: 'c' },
      'max-retries': { type: 'string' },
      limit: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command, ...rest] = positionals;

  if (values.help || command === undefined || command === 'help') {
    return { command: 'help' };
  }

  switch (command) {
    case 'upload':
      if (rest.length === 0) {
        throw new ValidationError('upload needs at least one file', 'files');
      }
      return {
        command: 'upload',
        files: rest,
        destinationPath: values.dest ?? '/',
        metadata: parseMetadata(values.meta ?? []),
        concurrencyLimit: parseCount(values.concurrency, 'concurrency', 1),
        maxRetries: parseCount(values['max-retries'], 'max-retries', 0),
      };
    case 'stats':
      return { command: 'stats' };
    case 'list':
      return { command: 'list', limit: parseCount(values.limit, 'limit', 1) };
    default:
      throw new ValidationError(`Unknown command: ${command}`, 'command');
  }
}
