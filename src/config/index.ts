/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Values are sourced from environment variables (a local `.env` file is loaded
 * first) and validated with Zod so the rest of the code can rely on their types.
 *
 * @module src/config/index
 */
import { homedir } from 'os';

import dotenv from 'dotenv';
import { z } from 'zod';

import packageJson from '../../package.json' with { type: 'json' };
import { JsonRpcErrorCode, McpError } from '../types-global/errors.js';

type PackageManifest = {
  name?: string;
  version?: string;
  description?: string;
};

const packageManifest: PackageManifest = packageJson;

dotenv.config({ quiet: true });

// --- Helper Functions ---
const emptyStringAsUndefined = (val: unknown) => {
  if (typeof val === 'string' && val.trim() === '') {
    return undefined;
  }
  return val;
};

/**
 * Expands a leading `~` to the user's home directory.
 *
 * @example
 * expandTildePath('~/logs') // '/Users/username/logs'
 * expandTildePath('') // undefined
 */
const expandTildePath = (path: unknown): string | undefined => {
  if (typeof path !== 'string' || path.trim() === '') {
    return undefined;
  }

  const trimmed = path.trim();
  if (trimmed.startsWith('~/')) {
    return `${homedir()}${trimmed.slice(1)}`;
  }
  if (trimmed === '~') {
    return homedir();
  }
  return trimmed;
};

const booleanFromEnv = (val: unknown) => {
  const str = emptyStringAsUndefined(val);
  if (typeof str === 'string') {
    return !['false', '0', 'no', 'off'].includes(str.trim().toLowerCase());
  }
  return str;
};

// --- Schema Definition ---
const ConfigSchema = z.object({
  pkg: z.object({
    name: z.string(),
    version: z.string(),
    description: z.string().optional(),
  }),
  logLevel: z
    .preprocess(
      (val) => {
        const str = emptyStringAsUndefined(val);
        if (typeof str === 'string') {
          const lower = str.toLowerCase();
          const aliasMap: Record<string, string> = {
            warn: 'warning',
            err: 'error',
            information: 'info',
          };
          return aliasMap[lower] ?? lower;
        }
        return str;
      },
      z.enum([
        'debug',
        'info',
        'notice',
        'warning',
        'error',
        'crit',
        'alert',
        'emerg',
      ]),
    )
    .default('info'),
  logsPath: z.preprocess(expandTildePath, z.string().optional()),
  environment: z
    .preprocess(
      (val) => {
        const str = emptyStringAsUndefined(val);
        if (typeof str === 'string') {
          const lower = str.toLowerCase();
          const aliasMap: Record<string, string> = {
            dev: 'development',
            prod: 'production',
            test: 'testing',
          };
          return aliasMap[lower] ?? lower;
        }
        return str;
      },
      z.enum(['development', 'production', 'testing']),
    )
    .default('development'),
  daemon: z.object({
    enabled: z.preprocess(booleanFromEnv, z.boolean().default(true)),
    pollIntervalSeconds: z.preprocess(
      emptyStringAsUndefined,
      z.coerce.number().int().positive().default(60),
    ),
    workerId: z.preprocess(
      emptyStringAsUndefined,
      z.string().min(1).default('publisher-daemon'),
    ),
  }),
  upstream: z.object({
    tokenKey: z.preprocess(
      emptyStringAsUndefined,
      z.string().min(1).default('linkedin_access_token'),
    ),
    apiBaseUrl: z.preprocess(
      emptyStringAsUndefined,
      z.string().url().default('https://api.linkedin.com'),
    ),
    requestTimeoutMs: z.preprocess(
      emptyStringAsUndefined,
      z.coerce.number().int().positive().default(10_000),
    ),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// --- Parsing Logic ---
const parseConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const rawConfig = {
    pkg: {
      name: env.PACKAGE_NAME ?? packageManifest.name,
      version: env.PACKAGE_VERSION ?? packageManifest.version,
      description: env.PACKAGE_DESCRIPTION ?? packageManifest.description,
    },
    logLevel: env.MCP_LOG_LEVEL,
    logsPath: env.LOGS_DIR,
    environment: env.NODE_ENV,
    daemon: {
      enabled: env.PUBLISHER_DAEMON_ENABLED,
      pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
      workerId: env.PUBLISHER_DAEMON_WORKER_ID,
    },
    upstream: {
      tokenKey: env.UPSTREAM_TOKEN_KEY,
      apiBaseUrl: env.UPSTREAM_API_BASE_URL,
      requestTimeoutMs: env.UPSTREAM_REQUEST_TIMEOUT_MS,
    },
  };

  const parsedConfig = ConfigSchema.safeParse(rawConfig);

  if (!parsedConfig.success) {
    if (process.stdout.isTTY) {
      console.error(
        'Invalid configuration found. Please check your environment variables.',
        parsedConfig.error.flatten().fieldErrors,
      );
    }
    throw new McpError(
      JsonRpcErrorCode.ConfigurationError,
      'Invalid application configuration.',
      {
        validationErrors: parsedConfig.error.flatten().fieldErrors,
      },
    );
  }

  return parsedConfig.data;
};

const config = parseConfig();

export { config, ConfigSchema, parseConfig };
