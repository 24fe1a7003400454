/**
 * Host configuration: defaults, then config.json, then command-line flags.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { getLogger } from './utils/logger.js';
import { ValidationError } from './utils/errors.js';
import { isValidRolloverTime, isValidTimezone } from './utils/business-date.js';

const logger = getLogger('Config');

const printerSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(9100),
  timeoutMs: z.number().int().positive().default(10000),
});

export const hostConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(3001),
  dataDir: z.string().min(1).default(path.resolve('data')),
  taxRate: z.number().min(0).max(1).default(0),
  currency: z
    .object({
      code: z.string().min(1).default('XAF'),
      decimals: z.number().int().min(0).max(4).default(0),
    })
    .default({}),
  business: z
    .object({
      name: z.string().default('Restaurant'),
      address: z.string().default(''),
      taxId: z.string().default(''),
    })
    .default({}),
  businessDate: z
    .object({
      timezone: z.string().refine(isValidTimezone, 'Unknown IANA timezone').default('UTC'),
      rolloverTime: z.string().refine(isValidRolloverTime, 'Expected HH:MM').default('00:00'),
    })
    .default({}),
  shifts: z
    .object({
      varianceThreshold: z.number().int().min(0).default(10),
      requireShiftForPayments: z.boolean().default(true),
    })
    .default({}),
  audit: z
    .object({
      retentionDays: z.number().int().min(1).default(90),
    })
    .default({}),
  signals: z
    .object({
      kitchenTtlSeconds: z.number().int().positive().default(60),
      drawerTtlSeconds: z.number().int().positive().default(60),
      lowStockTtlSeconds: z.number().int().positive().default(3600),
    })
    .default({}),
  sessions: z
    .object({
      ttlHours: z.number().positive().default(12),
    })
    .default({}),
  printer: printerSchema.optional(),
  alerts: z
    .object({
      lowStockIntervalMs: z.number().int().min(1000).default(300000),
    })
    .default({}),
  logging: z
    .object({
      minLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL']).default('INFO'),
      consoleOutput: z.boolean().default(true),
      fileOutput: z.boolean().default(true),
      maxFileSizeMB: z.number().positive().default(10),
      maxFiles: z.number().int().positive().default(5),
    })
    .default({}),
  /** Created on first start when no admin exists yet. */
  bootstrapAdmin: z
    .object({
      username: z.string().min(1),
      pin: z.string().regex(/^\d{4,8}$/, 'PIN must be 4 to 8 digits'),
    })
    .optional(),
});

export type HostConfig = z.infer<typeof hostConfigSchema>;

interface ParsedArgs {
  configPath?: string;
  overrides: Record<string, unknown>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const overrides: Record<string, unknown> = {};
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    switch (argv[i]) {
      case '--config':
        configPath = value;
        i++;
        break;
      case '--port':
        overrides.port = Number(value);
        i++;
        break;
      case '--data-dir':
        overrides.dataDir = value;
        i++;
        break;
      case '--tax-rate':
        overrides.taxRate = Number(value);
        i++;
        break;
      case '--printer': {
        const [host, port] = (value ?? '').split(':');
        overrides.printer = port ? { host, port: Number(port) } : { host };
        i++;
        break;
      }
    }
  }

  return { configPath, overrides };
}

export function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (e) {
    throw new ValidationError(`Failed to read ${configPath}`, { error: e instanceof Error ? e.message : String(e) });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`${configPath} must contain a JSON object`);
  }
  logger.info('Loaded configuration file', { path: configPath });
  return { ...parsed };
}

/** Resolves the effective configuration; invalid values fail fast. */
export function loadConfig(argv: string[] = process.argv.slice(2)): HostConfig {
  const args = parseArgs(argv);
  const fileConfig = loadConfigFile(path.resolve(args.configPath ?? 'config.json'));

  const result = hostConfigSchema.safeParse({ ...fileConfig, ...args.overrides });
  if (!result.success) {
    throw new ValidationError('Invalid configuration', {
      issues: result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}
