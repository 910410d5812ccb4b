/**
 * Client configuration.
 *
 * Usage:
 *   const config = createClientConfig(configFromEnv());
 *   const result = validateClientConfig(config);
 *   if (!result.valid) console.error(result.errors);
 *   const connection = createConnection(config);
 */

import { ComfyConnection } from './connection/types';
import { FetchLike, LocalConnection, SocketFactory } from './connection/local';
import { AttachedWorkerProvisioner, RemoteConnection, WorkerProvisioner } from './connection/remote';
import { ReadinessConfig } from './connection/readiness';
import { invalidConfigError } from './domain/errors';
import { LogLevel, logger, parseLogLevel, setLogLevel } from './logger';

export interface RemoteWorkerConfig {
  /** URL of the rented worker. */
  baseUrl: string;
  apiKey?: string;
  readiness?: Partial<ReadinessConfig>;
}

export interface ClientConfig {
  /** Local server address; ignored when `remote` is set. */
  baseUrl: string;
  /** Default deadline for `wait()`, in ms. */
  timeoutMs: number;
  /** Extra attempts for artifact downloads. */
  fetchRetries: number;
  /** Events buffered per job before its submission is acknowledged. */
  maxBufferedEvents: number;
  remote?: RemoteWorkerConfig;
  logLevel?: LogLevel;
}

export const DEFAULT_CLIENT_CONFIG: Readonly<ClientConfig> = {
  baseUrl: 'http://127.0.0.1:8188',
  timeoutMs: 600_000,
  fetchRetries: 2,
  maxBufferedEvents: 256,
};

export function createClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return { ...DEFAULT_CLIENT_CONFIG, ...definedOnly(overrides) };
}

/**
 * Read overrides from COMFY_* variables. Malformed numbers are passed through
 * as NaN so validation reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
  const config: Partial<ClientConfig> = {};
  if (env.COMFY_URL) config.baseUrl = env.COMFY_URL;
  if (env.COMFY_TIMEOUT_MS) config.timeoutMs = Number(env.COMFY_TIMEOUT_MS);
  if (env.COMFY_FETCH_RETRIES) config.fetchRetries = Number(env.COMFY_FETCH_RETRIES);
  if (env.COMFY_REMOTE_URL) {
    config.remote = { baseUrl: env.COMFY_REMOTE_URL, apiKey: env.COMFY_REMOTE_API_KEY || undefined };
  }
  const level = parseLogLevel(env.COMFY_LOG_LEVEL);
  if (level) config.logLevel = level;
  return config;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateClientConfig(config: ClientConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isHttpUrl(config.baseUrl)) {
    errors.push(`baseUrl must be an http(s) URL, got "${config.baseUrl}"`);
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    errors.push('timeoutMs must be a positive number');
  } else if (config.timeoutMs < 10_000) {
    warnings.push(`timeoutMs of ${config.timeoutMs}ms is shorter than most generation jobs take`);
  }
  if (!Number.isInteger(config.fetchRetries) || config.fetchRetries < 0) {
    errors.push('fetchRetries must be a non-negative integer');
  } else if (config.fetchRetries > 10) {
    warnings.push(`fetchRetries of ${config.fetchRetries} may delay failure reporting considerably`);
  }
  if (!Number.isInteger(config.maxBufferedEvents) || config.maxBufferedEvents < 1) {
    errors.push('maxBufferedEvents must be at least 1');
  }

  if (config.remote) {
    if (!isHttpUrl(config.remote.baseUrl)) {
      errors.push(`remote.baseUrl must be an http(s) URL, got "${config.remote.baseUrl}"`);
    } else if (config.remote.baseUrl.startsWith('http://') && config.remote.apiKey) {
      warnings.push('remote.apiKey will be sent over plain http');
    }
    if (config.baseUrl !== DEFAULT_CLIENT_CONFIG.baseUrl) {
      warnings.push('baseUrl is ignored when a remote worker is configured');
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Test and embedding seams for the connection. */
export interface ConnectionDeps {
  fetch?: FetchLike;
  socketFactory?: SocketFactory;
  /** Replaces the attached-worker provisioner built from `config.remote`. */
  provisioner?: WorkerProvisioner;
}

/**
 * Build the connection the configuration describes: remote when a remote
 * worker (or a provisioner) is given, local otherwise.
 */
export function createConnection(config: ClientConfig, deps: ConnectionDeps = {}): ComfyConnection {
  const result = validateClientConfig(config);
  if (!result.valid) throw invalidConfigError(result.errors);
  for (const warning of result.warnings) {
    logger.warn('Client configuration warning', { warning });
  }
  if (config.logLevel) setLogLevel(config.logLevel);

  const transport = {
    fetch: deps.fetch,
    socketFactory: deps.socketFactory,
    fetchRetry: { retries: config.fetchRetries },
    maxBufferedEvents: config.maxBufferedEvents,
  };

  const remote = config.remote;
  const provisioner = deps.provisioner ?? (remote
    ? new AttachedWorkerProvisioner({
        baseUrl: remote.baseUrl,
        apiKey: remote.apiKey,
        readiness: remote.readiness,
        fetch: deps.fetch,
      })
    : undefined);
  if (provisioner) {
    return new RemoteConnection(provisioner, {
      ...transport,
      secrets: remote?.apiKey ? [remote.apiKey] : [],
    });
  }
  return new LocalConnection({ ...transport, baseUrl: config.baseUrl });
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function definedOnly<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) result[key] = value[key];
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}
