import { describe, expect, it } from 'vitest';
import { parseArgs } from '../src/args.js';

describe('parseArgs', () => {
  it('defaults to an applying run with a text report', () => {
    expect(parseArgs(['--config', 'linker.json'])).toEqual({
      configPath: 'linker.json',
      dryRun: false,
      format: 'text',
    });
  });

  it('reads every flag in any order', () => {
    expect(parseArgs(['--format', 'json', '--dry-run', '--config', 'c.json'])).toEqual({
      configPath: 'c.json',
      dryRun: true,
      format: 'json',
    });
  });

  it('requires --config', () => {
    expect(() => parseArgs(['--dry-run'])).toThrow('--config <path> is required');
  });

  it('rejects an unknown format', () => {
    expect(() => parseArgs(['--config', 'c.json', '--format', 'csv'])).toThrow(
      '--format must be text or json, got csv'
    );
  });

  it('rejects unknown flags', () => {
    expect(() => parseArgs(['--config', 'c.json', '--force'])).toThrow('Unknown argument: --force');
  });
});
