/**
 * Daemon Configuration
 * 
 * Environment variables (optionally from a .env file in the working
 * directory) validated with zod. Command line flags take precedence over the
 * environment.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, type ChecksumMode } from '@tiersync/core';
import { isBelowRemotePath, normalizeRemotePath } from '@tiersync/renter';

export interface CliOptions {
  root?: string;
  address?: string;
  password?: string;
  agent?: string;
  stagingDir?: string;
  productionDir?: string;
  archive?: boolean;
  dryRun?: boolean;
  dataPieces?: string;
  parityPieces?: string;
  interval?: string;
  threshold?: string;
  categories?: string;
  checksum?: string;
  logLevel?: string;
}

function isRemotePath(value: string): boolean {
  try {
    normalizeRemotePath(value);
    return true;
  } catch {
    return false;
  }
}

const remotePath = z.string()
  .refine(isRemotePath, 'must be a remote path without empty, "." or ".." segments')
  .transform(normalizeRemotePath);

const booleanFlag = z.enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.string()
  .regex(/^\d+$/, 'must be a whole number')
  .transform(Number)
  .refine(value => value > 0, 'must be greater than 0');

const nonNegativeInt = z.string()
  .regex(/^\d+$/, 'must be a whole number')
  .transform(Number);

const nonNegativeNumber = z.string()
  .regex(/^\d+(\.\d+)?$/, 'must be a non-negative number')
  .transform(Number);

const categoryList = z.string()
  .transform(value => value.split(',').map(c => c.trim()).filter(c => c.length > 0))
  .refine(list => list.length > 0, 'at least one category is required')
  .refine(
    list => list.every(c => c === '.' || isRemotePath(c)),
    'categories must be remote paths below the staging prefix, or "."'
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  TIERSYNC_ROOT: z.string({ required_error: 'synchronized root directory is required' })
    .min(1, 'synchronized root directory is required'),

  // Renter API
  SIA_ADDRESS: z.string().min(1).default('127.0.0.1:9980'),
  SIA_API_PASSWORD: z.string().default(''),
  SIA_AGENT: z.string().min(1).default('Sia-Agent'),
  TIERSYNC_REQUEST_TIMEOUT_MS: positiveInt.default('30000'),

  // Namespaces
  TIERSYNC_STAGING_DIR: remotePath.default('fuse/staging'),
  TIERSYNC_PRODUCTION_DIR: remotePath.default('fuse/prod'),

  // Sync behaviour
  TIERSYNC_ARCHIVE: booleanFlag.default('true'),
  TIERSYNC_DRY_RUN: booleanFlag.default('false'),
  TIERSYNC_DATA_PIECES: positiveInt.default('10'),
  TIERSYNC_PARITY_PIECES: positiveInt.default('30'),
  TIERSYNC_CHECKSUM: z.enum(['size', 'sha256']).default('size'),
  TIERSYNC_DEBOUNCE_MS: nonNegativeInt.default('100'),
  TIERSYNC_CREATE_RETRY_ATTEMPTS: positiveInt.default('2'),
  TIERSYNC_CREATE_RETRY_DELAY_MS: nonNegativeInt.default('500'),

  // Promotion
  TIERSYNC_PROMOTION_INTERVAL_MS: positiveInt.default('5000'),
  TIERSYNC_PROMOTION_THRESHOLD: nonNegativeNumber.default('1'),
  TIERSYNC_CATEGORIES: categoryList.default('movies,tv'),
}).superRefine((env, ctx) => {
  if (
    isBelowRemotePath(env.TIERSYNC_STAGING_DIR, env.TIERSYNC_PRODUCTION_DIR) ||
    isBelowRemotePath(env.TIERSYNC_PRODUCTION_DIR, env.TIERSYNC_STAGING_DIR)
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TIERSYNC_PRODUCTION_DIR'],
      message: 'staging and production prefixes must differ and must not be nested',
    });
  }
});

export interface DaemonConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  root: string;

  sia: {
    address: string;
    password: string;
    agent: string;
    timeoutMs: number;
  };

  sync: {
    stagingPrefix: string;
    productionPrefix: string;
    archive: boolean;
    dryRun: boolean;
    redundancy: {
      dataPieces: number;
      parityPieces: number;
    };
    checksum: ChecksumMode;
    debounceMs: number;
    createRetryAttempts: number;
    createRetryDelayMs: number;
  };

  promotion: {
    intervalMs: number;
    threshold: number;
    categories: string[];
  };
}

/**
 * Load .env from the working directory into process.env. Variables already
 * set are kept.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') });
}

/**
 * Merge command line options over the environment and validate the result
 */
export function loadConfig(cli: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): DaemonConfig {
  const flag = (value: boolean | undefined, fallback: string | undefined) =>
    value === undefined ? fallback : String(value);

  const parseResult = envSchema.safeParse({
    ...env,
    LOG_LEVEL: cli.logLevel ?? env['LOG_LEVEL'],
    TIERSYNC_ROOT: cli.root ?? env['TIERSYNC_ROOT'],
    SIA_ADDRESS: cli.address ?? env['SIA_ADDRESS'],
    SIA_API_PASSWORD: cli.password ?? env['SIA_API_PASSWORD'],
    SIA_AGENT: cli.agent ?? env['SIA_AGENT'],
    TIERSYNC_STAGING_DIR: cli.stagingDir ?? env['TIERSYNC_STAGING_DIR'],
    TIERSYNC_PRODUCTION_DIR: cli.productionDir ?? env['TIERSYNC_PRODUCTION_DIR'],
    TIERSYNC_ARCHIVE: flag(cli.archive, env['TIERSYNC_ARCHIVE']),
    TIERSYNC_DRY_RUN: flag(cli.dryRun, env['TIERSYNC_DRY_RUN']),
    TIERSYNC_DATA_PIECES: cli.dataPieces ?? env['TIERSYNC_DATA_PIECES'],
    TIERSYNC_PARITY_PIECES: cli.parityPieces ?? env['TIERSYNC_PARITY_PIECES'],
    TIERSYNC_PROMOTION_INTERVAL_MS: cli.interval ?? env['TIERSYNC_PROMOTION_INTERVAL_MS'],
    TIERSYNC_PROMOTION_THRESHOLD: cli.threshold ?? env['TIERSYNC_PROMOTION_THRESHOLD'],
    TIERSYNC_CATEGORIES: cli.categories ?? env['TIERSYNC_CATEGORIES'],
    TIERSYNC_CHECKSUM: cli.checksum ?? env['TIERSYNC_CHECKSUM'],
  });

  if (!parseResult.success) {
    throw new ConfigError(
      'Invalid configuration',
      parseResult.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  const data = parseResult.data;

  return {
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    root: resolve(data.TIERSYNC_ROOT),

    sia: {
      address: data.SIA_ADDRESS,
      password: data.SIA_API_PASSWORD,
      agent: data.SIA_AGENT,
      timeoutMs: data.TIERSYNC_REQUEST_TIMEOUT_MS,
    },

    sync: {
      stagingPrefix: data.TIERSYNC_STAGING_DIR,
      productionPrefix: data.TIERSYNC_PRODUCTION_DIR,
      archive: data.TIERSYNC_ARCHIVE,
      dryRun: data.TIERSYNC_DRY_RUN,
      redundancy: {
        dataPieces: data.TIERSYNC_DATA_PIECES,
        parityPieces: data.TIERSYNC_PARITY_PIECES,
      },
      checksum: data.TIERSYNC_CHECKSUM,
      debounceMs: data.TIERSYNC_DEBOUNCE_MS,
      createRetryAttempts: data.TIERSYNC_CREATE_RETRY_ATTEMPTS,
      createRetryDelayMs: data.TIERSYNC_CREATE_RETRY_DELAY_MS,
    },

    promotion: {
      intervalMs: data.TIERSYNC_PROMOTION_INTERVAL_MS,
      threshold: data.TIERSYNC_PROMOTION_THRESHOLD,
      categories: data.TIERSYNC_CATEGORIES,
    },
  };
}
