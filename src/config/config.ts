/**
 * mediasync configuration
 *
 * Manages the config file at ~/.mediasync/config.json.
 * Supports environment variable overrides and dotted-key updates from the CLI.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigurationError } from '../errors/sync-error.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export interface MediaSyncConfig {
  server: {
    host: string;
    /** Default: 8096 */
    port: number;
    ssl: boolean;
    /** Prefer MEDIASYNC_API_KEY over storing the key in the file. */
    apiKey: string;
    /** Identifies this client to the server. Default: mediasync-<hostname> */
    deviceId: string;
  };
  sync: {
    /** 5–300. Default: 10 */
    pollIntervalSeconds: number;
    pushEnabled: boolean;
    /** Poll interval while the push connection is up. Default: 60 */
    pushPollIntervalSeconds: number;
    /** At most pollIntervalSeconds. Default: 10 */
    requestTimeoutSeconds: number;
    /** Default: 5 */
    failureThreshold: number;
    /** Push messages in a row before interval polling stops; 0 keeps polling. Default: 5 */
    pushStableThreshold: number;
    /** Default: 300 */
    healthCheckIntervalSeconds: number;
    excludedDevices: string[];
    ignoreWebPlayers: boolean;
    /** Interval the server pushes session lists at. Default: 1500 */
    sessionsIntervalMs: number;
    /** When non-empty, a session must support all of these commands. */
    requiredCapabilities: string[];
  };
  cache: {
    /** Default: 1000 */
    maxEntries: number;
    /** Default: 300 */
    ttlSeconds: number;
    /** Default: 60 */
    sweepIntervalSeconds: number;
  };
  logging: {
    level: string;
    pretty: boolean;
  };
}

const ConfigFileSchema = z.object({
  server: z
    .object({
      host: z.string(),
      port: z.number(),
      ssl: z.boolean(),
      apiKey: z.string(),
      deviceId: z.string(),
    })
    .partial()
    .optional(),
  sync: z
    .object({
      pollIntervalSeconds: z.number(),
      pushEnabled: z.boolean(),
      pushPollIntervalSeconds: z.number(),
      requestTimeoutSeconds: z.number(),
      failureThreshold: z.number(),
      pushStableThreshold: z.number(),
      healthCheckIntervalSeconds: z.number(),
      excludedDevices: z.array(z.string()),
      ignoreWebPlayers: z.boolean(),
      sessionsIntervalMs: z.number(),
      requiredCapabilities: z.array(z.string()),
    })
    .partial()
    .optional(),
  cache: z
    .object({
      maxEntries: z.number(),
      ttlSeconds: z.number(),
      sweepIntervalSeconds: z.number(),
    })
    .partial()
    .optional(),
  logging: z.object({ level: z.string(), pretty: z.boolean() }).partial().optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ─── Value parsing ────────────────────────────────────────────────────────────

function parseInteger(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${key} must be an integer, got: ${value}`, { key });
  }
  return parsed;
}

function parseBoolean(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${key} must be true or false, got: ${value}`, { key });
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

type Setter = (config: MediaSyncConfig, value: string) => void;

const SETTERS: Record<string, Setter> = {
  'server.host': (c, v) => {
    c.server.host = v;
  },
  'server.port': (c, v) => {
    c.server.port = parseInteger('server.port', v);
  },
  'server.ssl': (c, v) => {
    c.server.ssl = parseBoolean('server.ssl', v);
  },
  'server.apiKey': (c, v) => {
    c.server.apiKey = v;
  },
  'server.deviceId': (c, v) => {
    c.server.deviceId = v;
  },
  'sync.pollIntervalSeconds': (c, v) => {
    c.sync.pollIntervalSeconds = parseInteger('sync.pollIntervalSeconds', v);
  },
  'sync.pushEnabled': (c, v) => {
    c.sync.pushEnabled = parseBoolean('sync.pushEnabled', v);
  },
  'sync.pushPollIntervalSeconds': (c, v) => {
    c.sync.pushPollIntervalSeconds = parseInteger('sync.pushPollIntervalSeconds', v);
  },
  'sync.requestTimeoutSeconds': (c, v) => {
    c.sync.requestTimeoutSeconds = parseInteger('sync.requestTimeoutSeconds', v);
  },
  'sync.failureThreshold': (c, v) => {
    c.sync.failureThreshold = parseInteger('sync.failureThreshold', v);
  },
  'sync.pushStableThreshold': (c, v) => {
    c.sync.pushStableThreshold = parseInteger('sync.pushStableThreshold', v);
  },
  'sync.healthCheckIntervalSeconds': (c, v) => {
    c.sync.healthCheckIntervalSeconds = parseInteger('sync.healthCheckIntervalSeconds', v);
  },
  'sync.excludedDevices': (c, v) => {
    c.sync.excludedDevices = parseList(v);
  },
  'sync.ignoreWebPlayers': (c, v) => {
    c.sync.ignoreWebPlayers = parseBoolean('sync.ignoreWebPlayers', v);
  },
  'sync.sessionsIntervalMs': (c, v) => {
    c.sync.sessionsIntervalMs = parseInteger('sync.sessionsIntervalMs', v);
  },
  'sync.requiredCapabilities': (c, v) => {
    c.sync.requiredCapabilities = parseList(v);
  },
  'cache.maxEntries': (c, v) => {
    c.cache.maxEntries = parseInteger('cache.maxEntries', v);
  },
  'cache.ttlSeconds': (c, v) => {
    c.cache.ttlSeconds = parseInteger('cache.ttlSeconds', v);
  },
  'cache.sweepIntervalSeconds': (c, v) => {
    c.cache.sweepIntervalSeconds = parseInteger('cache.sweepIntervalSeconds', v);
  },
  'logging.level': (c, v) => {
    c.logging.level = v;
  },
  'logging.pretty': (c, v) => {
    c.logging.pretty = parseBoolean('logging.pretty', v);
  },
};

/** Keys accepted by `ConfigManager.set` and `mediasync config set`. */
export const CONFIG_KEYS: readonly string[] = Object.keys(SETTERS);

/** Environment variable → config key. Applied in this order. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string]> = [
  ['MEDIASYNC_HOST', 'server.host'],
  ['MEDIASYNC_PORT', 'server.port'],
  ['MEDIASYNC_SSL', 'server.ssl'],
  ['MEDIASYNC_API_KEY', 'server.apiKey'],
  ['MEDIASYNC_DEVICE_ID', 'server.deviceId'],
  ['MEDIASYNC_POLL_INTERVAL', 'sync.pollIntervalSeconds'],
  ['MEDIASYNC_PUSH_ENABLED', 'sync.pushEnabled'],
  ['MEDIASYNC_REQUEST_TIMEOUT', 'sync.requestTimeoutSeconds'],
  ['MEDIASYNC_FAILURE_THRESHOLD', 'sync.failureThreshold'],
  ['MEDIASYNC_EXCLUDED_DEVICES', 'sync.excludedDevices'],
  ['MEDIASYNC_IGNORE_WEB_PLAYERS', 'sync.ignoreWebPlayers'],
  ['MEDIASYNC_CACHE_MAX_ENTRIES', 'cache.maxEntries'],
  ['MEDIASYNC_CACHE_TTL', 'cache.ttlSeconds'],
  ['MEDIASYNC_LOG_LEVEL', 'logging.level'],
];

// ─── ConfigManager ────────────────────────────────────────────────────────────

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.mediasync', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): MediaSyncConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }

    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ConfigurationError(`Failed to read config at ${this.configPath}: ${detail}`, {
        path: this.configPath,
      });
    }
    return this.merge(ConfigManager.defaults(), result.data);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: MediaSyncConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns errors array, empty means valid.
   */
  validate(config: MediaSyncConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { server, sync, cache, logging } = config;

    if (!server.host) {
      errors.push('server.host is required');
    }
    if (!server.apiKey) {
      errors.push('server.apiKey is required (or set MEDIASYNC_API_KEY)');
    }
    if (!Number.isInteger(server.port) || server.port < 1 || server.port > 65535) {
      errors.push(`server.port must be an integer between 1 and 65535, got: ${server.port}`);
    }
    if (!server.deviceId) {
      errors.push('server.deviceId must not be empty');
    }

    if (!(sync.pollIntervalSeconds >= 5 && sync.pollIntervalSeconds <= 300)) {
      errors.push(`sync.pollIntervalSeconds must be between 5 and 300, got: ${sync.pollIntervalSeconds}`);
    }
    if (!(sync.pushPollIntervalSeconds >= sync.pollIntervalSeconds)) {
      errors.push('sync.pushPollIntervalSeconds must not be shorter than sync.pollIntervalSeconds');
    }
    if (!(sync.requestTimeoutSeconds > 0 && sync.requestTimeoutSeconds <= sync.pollIntervalSeconds)) {
      errors.push('sync.requestTimeoutSeconds must be positive and at most sync.pollIntervalSeconds');
    }
    if (!Number.isInteger(sync.failureThreshold) || sync.failureThreshold < 1) {
      errors.push(`sync.failureThreshold must be a positive integer, got: ${sync.failureThreshold}`);
    }
    if (!Number.isInteger(sync.pushStableThreshold) || sync.pushStableThreshold < 0) {
      errors.push(`sync.pushStableThreshold must be 0 or a positive integer, got: ${sync.pushStableThreshold}`);
    }
    if (!(sync.healthCheckIntervalSeconds > 0)) {
      errors.push('sync.healthCheckIntervalSeconds must be positive');
    }
    if (!(sync.sessionsIntervalMs > 0)) {
      errors.push('sync.sessionsIntervalMs must be positive');
    }

    if (!Number.isInteger(cache.maxEntries) || cache.maxEntries < 1) {
      errors.push(`cache.maxEntries must be a positive integer, got: ${cache.maxEntries}`);
    }
    if (!(cache.ttlSeconds > 0)) {
      errors.push('cache.ttlSeconds must be positive');
    }
    if (!(cache.sweepIntervalSeconds > 0)) {
      errors.push('cache.sweepIntervalSeconds must be positive');
    }

    if (!LOG_LEVELS.some((level) => level === logging.level)) {
      errors.push(`logging.level must be one of ${LOG_LEVELS.join(' | ')}, got: ${logging.level}`);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   MEDIASYNC_HOST, MEDIASYNC_PORT, MEDIASYNC_SSL, MEDIASYNC_API_KEY, MEDIASYNC_DEVICE_ID,
   *   MEDIASYNC_POLL_INTERVAL, MEDIASYNC_PUSH_ENABLED, MEDIASYNC_REQUEST_TIMEOUT,
   *   MEDIASYNC_FAILURE_THRESHOLD, MEDIASYNC_EXCLUDED_DEVICES (comma-separated),
   *   MEDIASYNC_IGNORE_WEB_PLAYERS, MEDIASYNC_CACHE_MAX_ENTRIES, MEDIASYNC_CACHE_TTL,
   *   MEDIASYNC_LOG_LEVEL
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): MediaSyncConfig {
    const config = this.load();
    for (const [variable, key] of ENV_OVERRIDES) {
      const value = env[variable];
      if (value) ConfigManager.apply(config, key, value);
    }
    return config;
  }

  /**
   * Load with env overrides and validate.
   *
   * @throws ConfigurationError listing every problem found
   */
  loadValidated(env: NodeJS.ProcessEnv = process.env): MediaSyncConfig {
    const config = this.loadWithEnvOverrides(env);
    const { valid, errors } = this.validate(config);
    if (!valid) {
      throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, {
        path: this.configPath,
        errors,
      });
    }
    return config;
  }

  /**
   * Update one dotted key in the stored file and return the new config.
   * The value is parsed according to the key (integers, booleans, comma lists).
   */
  set(key: string, value: string): MediaSyncConfig {
    const config = this.load();
    ConfigManager.apply(config, key, value);
    this.save(config);
    return config;
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): MediaSyncConfig {
    return {
      server: {
        host: '',
        port: 8096,
        ssl: false,
        apiKey: '',
        deviceId: `mediasync-${os.hostname()}`,
      },
      sync: {
        pollIntervalSeconds: 10,
        pushEnabled: true,
        pushPollIntervalSeconds: 60,
        requestTimeoutSeconds: 10,
        failureThreshold: 5,
        pushStableThreshold: 5,
        healthCheckIntervalSeconds: 300,
        excludedDevices: [],
        ignoreWebPlayers: false,
        sessionsIntervalMs: 1500,
        requiredCapabilities: [],
      },
      cache: {
        maxEntries: 1000,
        ttlSeconds: 300,
        sweepIntervalSeconds: 60,
      },
      logging: {
        level: 'info',
        pretty: false,
      },
    };
  }

  /** Copy with the API key masked, for display. */
  static redact(config: MediaSyncConfig): MediaSyncConfig {
    return {
      ...config,
      server: { ...config.server, apiKey: config.server.apiKey ? '********' : '' },
    };
  }

  private static apply(config: MediaSyncConfig, key: string, value: string): void {
    const setter = SETTERS[key];
    if (!setter) {
      throw new ConfigurationError(`Unknown config key: ${key}`, { key, known: CONFIG_KEYS });
    }
    setter(config, value);
  }

  /** Deep-merge source into target (non-destructive). */
  private merge(target: MediaSyncConfig, source: ConfigFile): MediaSyncConfig {
    return {
      server: { ...target.server, ...source.server },
      sync: { ...target.sync, ...source.sync },
      cache: { ...target.cache, ...source.cache },
      logging: { ...target.logging, ...source.logging },
    };
  }
}
