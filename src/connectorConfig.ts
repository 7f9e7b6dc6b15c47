// ============================================================================
// Connector Config: YAML-based persistent configuration
// ============================================================================
// Loads from ~/.sd-connector/config.yaml (or SD_CONNECTOR_CONFIG). Precedence:
// CLI flags > SD_USERNAME / SD_PASSWORD > config file > defaults.
// ============================================================================

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import YAML from 'yaml';
import { z } from 'zod';
import { getConfig, log } from './config.js';
import { ConfigError } from './errors.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './invoker/retry.js';
import type { Credentials } from './client/sessions.js';
import type { ConnectorOptions } from './client/types.js';

// ============================================================================
// Config Schema
// ============================================================================

const ConnectorConfigSchema = z
  .object({
    credentials: z
      .object({
        username: z.string().min(1).optional(),
        password: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    connection: z
      .object({
        wsdl_prefix: z.string().url().optional(),
        timeout_ms: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    retry: z
      .object({
        attempts: z.number().int().positive().optional(),
        multiplier_ms: z.number().nonnegative().optional(),
        min_delay_ms: z.number().nonnegative().optional(),
        max_delay_ms: z.number().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export interface ConnectorConfig {
  credentials: {
    username?: string;
    password?: string;
  };
  connection: {
    wsdl_prefix: string;
    timeout_ms: number;
  };
  retry: RetryPolicy;
}

function defaultConfig(): ConnectorConfig {
  const env = getConfig();
  return {
    credentials: {},
    connection: {
      wsdl_prefix: env.wsdlPrefix,
      timeout_ms: env.timeoutMs,
    },
    retry: { ...DEFAULT_RETRY_POLICY },
  };
}

// ============================================================================
// Config Path
// ============================================================================

/**
 * Get the config file path (for display purposes).
 */
export function getConfigPath(): string {
  return process.env.SD_CONNECTOR_CONFIG || join(homedir(), '.sd-connector', 'config.yaml');
}

// ============================================================================
// Load & Parse
// ============================================================================

function applyEnvCredentials(config: ConnectorConfig): ConnectorConfig {
  return {
    ...config,
    credentials: {
      username: process.env.SD_USERNAME || config.credentials.username,
      password: process.env.SD_PASSWORD || config.credentials.password,
    },
  };
}

/**
 * Load config from `configPath`, merged with defaults and environment
 * credentials. A missing file yields the defaults; a file that does not parse
 * or does not match the schema is a ConfigError.
 */
export function loadConnectorConfig(configPath: string = getConfigPath()): ConnectorConfig {
  const defaults = defaultConfig();

  if (!existsSync(configPath)) {
    return applyEnvCredentials(defaults);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${err instanceof Error ? err.message : err}`);
  }

  // An empty file parses to null
  const parsed = ConnectorConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config ${configPath}: ${issues.join('; ')}`);
  }

  const file = parsed.data;
  log(`Config: loaded ${configPath}`);

  return applyEnvCredentials({
    credentials: {
      username: file.credentials?.username,
      password: file.credentials?.password,
    },
    connection: {
      wsdl_prefix: file.connection?.wsdl_prefix ?? defaults.connection.wsdl_prefix,
      timeout_ms: file.connection?.timeout_ms ?? defaults.connection.timeout_ms,
    },
    retry: {
      attempts: file.retry?.attempts ?? defaults.retry.attempts,
      multiplierMs: file.retry?.multiplier_ms ?? defaults.retry.multiplierMs,
      minDelayMs: file.retry?.min_delay_ms ?? defaults.retry.minDelayMs,
      maxDelayMs: file.retry?.max_delay_ms ?? defaults.retry.maxDelayMs,
    },
  });
}

/**
 * Merge CLI flags over config file values. CLI takes precedence.
 */
export function mergeCliOverrides(
  config: ConnectorConfig,
  overrides: {
    username?: string;
    password?: string;
    wsdlPrefix?: string;
    timeoutMs?: number;
  }
): ConnectorConfig {
  return {
    ...config,
    credentials: {
      ...config.credentials,
      ...(overrides.username !== undefined && { username: overrides.username }),
      ...(overrides.password !== undefined && { password: overrides.password }),
    },
    connection: {
      ...config.connection,
      ...(overrides.wsdlPrefix !== undefined && { wsdl_prefix: overrides.wsdlPrefix }),
      ...(overrides.timeoutMs !== undefined && { timeout_ms: overrides.timeoutMs }),
    },
  };
}

/**
 * Credentials from a resolved config, or null when either half is missing.
 */
export function resolveCredentials(config: ConnectorConfig): Credentials | null {
  const { username, password } = config.credentials;
  if (!username || !password) return null;
  return { username, password };
}

/** Connector options equivalent to a resolved config. */
export function toConnectorOptions(config: ConnectorConfig): ConnectorOptions {
  return {
    wsdlPrefix: config.connection.wsdl_prefix,
    timeoutMs: config.connection.timeout_ms,
    retry: config.retry,
  };
}
