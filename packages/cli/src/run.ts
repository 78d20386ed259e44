/**
 * One CLI invocation: parse flags, load config, reconcile, print the report
 */

import {
  ConnectorError,
  errorMessage,
  type CatalogDatabase,
  type SpreadsheetHandle,
} from '@opendata-linker/core';
import {
  CatalogReader,
  CatalogUpdater,
  ReconcileError,
  RosterReader,
  formatReconciliationReport,
  runReconciliation,
  toJsonReport,
} from '@opendata-linker/reconcile';
import { USAGE, parseArgs, type CliArgs } from './args.js';
import { loadConfig, type CatalogEntry, type ConfigFile, type RosterConfigEntry } from './config.js';
import { createCatalogDatabase, createSpreadsheetHandle } from './handles.js';
import { Logger, createRunId } from './logger.js';

/** Run completed and every update applied */
export const EXIT_OK = 0;
/** Run aborted: bad configuration or an unreadable source */
export const EXIT_ABORTED = 1;
/** Run completed but some updates failed */
export const EXIT_PARTIAL = 2;

export interface CliDeps {
  loadConfig?: (configPath: string) => Promise<ConfigFile>;
  createCatalogDatabase?: (entry: CatalogEntry) => CatalogDatabase;
  createSpreadsheetHandle?: (entry: RosterConfigEntry) => SpreadsheetHandle;
  /** Report sink */
  stdout?: (text: string) => void;
  /** Log and usage sink */
  stderr?: (text: string) => void;
}

function errorFields(error: unknown): Record<string, unknown> {
  if (error instanceof ReconcileError || error instanceof ConnectorError) {
    return error.toJSON();
  }
  return { error: errorMessage(error) };
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    stderr(`${errorMessage(error)}\n\n${USAGE}\n`);
    return EXIT_ABORTED;
  }

  let logger = new Logger({ write: stderr });
  let config: ConfigFile;
  let db: CatalogDatabase;
  let sheets: SpreadsheetHandle;
  try {
    config = await (deps.loadConfig ?? loadConfig)(args.configPath);
    db = (deps.createCatalogDatabase ?? createCatalogDatabase)(config.catalog);
    sheets = (deps.createSpreadsheetHandle ?? createSpreadsheetHandle)(config.roster);
  } catch (error) {
    logger.error('Invalid configuration', errorFields(error));
    return EXIT_ABORTED;
  }

  const runId = createRunId();
  logger = new Logger({
    level: config.logging?.level,
    format: config.logging?.format,
    write: stderr,
  }).child({ runId });

  const table = config.catalog.table;
  try {
    const report = await runReconciliation({
      catalogReader: new CatalogReader(db, {
        table,
        exclude: config.catalog.exclude,
        timeoutMs: config.catalog.timeoutMs,
      }),
      rosterReader: new RosterReader(sheets, {
        sheet: config.roster.sheet,
        timeoutMs: config.roster.timeoutMs,
      }),
      updater: new CatalogUpdater(db, {
        table,
        timeoutMs: config.updates?.timeoutMs,
        logger,
      }),
      dryRun: args.dryRun,
      logger,
      runId,
    });

    stdout(
      args.format === 'json'
        ? `${JSON.stringify(toJsonReport(report), null, 2)}\n`
        : `${formatReconciliationReport(report)}\n`
    );
    return report.summary.failed > 0 ? EXIT_PARTIAL : EXIT_OK;
  } catch (error) {
    logger.error('Reconciliation aborted', errorFields(error));
    return EXIT_ABORTED;
  } finally {
    const closed = await Promise.allSettled([db.disconnect(), sheets.disconnect()]);
    for (const result of closed) {
      if (result.status === 'rejected') {
        logger.warn('Disconnect failed', { error: errorMessage(result.reason) });
      }
    }
  }
}
