import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { catalogTableSchema, rosterSheetSchema } from '@opendata-linker/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const timeoutSchema = z.number().int().min(1).max(600_000);

const catalogBase = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  ssl: sslSchema.optional(),
  table: catalogTableSchema.strict(),
  exclude: z
    .object({
      column: z.string().min(1),
      values: z.array(z.string()).min(1),
    })
    .strict()
    .optional(),
  /** Bound on opening a database connection */
  connectTimeoutMs: timeoutSchema.optional(),
  /** Bound on the catalog read */
  timeoutMs: timeoutSchema.optional(),
});

const postgresCatalog = catalogBase
  .extend({
    type: z.literal('postgresql'),
    connectionString: z.string().min(1).optional(),
  })
  .strict();

const mysqlCatalog = catalogBase
  .extend({
    type: z.literal('mysql'),
    uri: z.string().min(1).optional(),
  })
  .strict();

export const catalogEntrySchema = z.discriminatedUnion('type', [postgresCatalog, mysqlCatalog]);

const googleSheetsRoster = z
  .object({
    type: z.literal('google-sheets'),
    spreadsheetId: z.string().min(1),
    keyFile: z.string().min(1).optional(),
    credentials: z
      .object({
        client_email: z.string().min(1),
        private_key: z.string().min(1),
      })
      .optional(),
    sheet: rosterSheetSchema.strict(),
    timeoutMs: timeoutSchema.optional(),
  })
  .strict();

const excelRoster = z
  .object({
    type: z.literal('excel'),
    filePath: z.string().min(1),
    sheet: rosterSheetSchema.strict(),
    timeoutMs: timeoutSchema.optional(),
  })
  .strict();

export const rosterEntrySchema = z.discriminatedUnion('type', [googleSheetsRoster, excelRoster]);

export const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['text', 'json']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    catalog: catalogEntrySchema,
    roster: rosterEntrySchema,
    updates: z
      .object({
        /** Bound on each row write */
        timeoutMs: timeoutSchema.optional(),
      })
      .strict()
      .optional(),
    logging: loggingSchema.optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    const { roster } = config;
    if (roster.type === 'google-sheets' && !roster.keyFile && !roster.credentials) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['roster', 'keyFile'],
        message: 'google-sheets roster requires keyFile or credentials',
      });
    }
  });

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;
export type RosterConfigEntry = z.infer<typeof rosterEntrySchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

/**
 * Validate a parsed config object after expanding its env placeholders
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(parsed, options);
}
