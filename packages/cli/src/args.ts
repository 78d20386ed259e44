import { ConfigError } from './config.js';

export type ReportFormat = 'text' | 'json';

export interface CliArgs {
  configPath: string;
  dryRun: boolean;
  format: ReportFormat;
}

export const USAGE = [
  'Usage: opendata-linker --config <config.json> [--dry-run] [--format text|json]',
  '',
  '  --config   JSON config naming the catalog database and the roster sheet',
  '  --dry-run  match and report without writing to the catalog',
  '  --format   report format on stdout (default: text)',
].join('\n');

/**
 * Parse command-line flags; unknown flags are rejected
 */
export function parseArgs(args: string[]): CliArgs {
  let configPath: string | undefined;
  let dryRun = false;
  let format: ReportFormat = 'text';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        configPath = args[++i];
        break;
      case '--dry-run':
        dryRun = true;
        break;
      case '--format': {
        const value = args[++i];
        if (value !== 'text' && value !== 'json') {
          throw new ConfigError(`--format must be text or json, got ${value ?? 'nothing'}`);
        }
        format = value;
        break;
      }
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  if (!configPath) {
    throw new ConfigError('--config <path> is required');
  }

  return { configPath, dryRun, format };
}
