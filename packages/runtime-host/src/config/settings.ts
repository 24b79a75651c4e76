/**
 * Cyberdeck Runtime Host — Settings
 *
 * Settings are read from `<home>/config.json` and validated with zod. A
 * missing file means all defaults; a present but invalid file is an error,
 * never silently replaced by defaults.
 *
 * Environment overrides:
 *   CYBERDECK_LOG_LEVEL — debug | info | warning | error
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { INTERFACE_NAMES, LogLevel, isValidIpOrCidr, isValidPortRange } from '@cyberdeck/kernel';
import { isNodeError } from '../util/errors.js';

export const CONFIG_FILENAME = 'config.json';
export const LOG_LEVEL_ENV_VAR = 'CYBERDECK_LOG_LEVEL';

const MiB = 1024 * 1024;

/** Node's timers overflow past this many milliseconds and fire at once. */
export const MAX_TIMER_MS = 2_147_483_647;

const interfaceName = z
  .string()
  .refine((name) => INTERFACE_NAMES.includes(name), {
    message: `must be one of ${INTERFACE_NAMES.join(', ')}`,
  });

const timerMs = z.number().int().max(MAX_TIMER_MS);

const LEVEL_BY_NAME = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
} as const;

const logLevel = z
  .enum(['debug', 'info', 'warning', 'error'])
  .transform((level) => LEVEL_BY_NAME[level]);

export const settingsSchema = z
  .object({
    tools: z
      .object({
        defaultTimeoutMs: timerMs.positive().default(30_000),
        portScanDefaultPorts: z.string().refine(isValidPortRange, 'must be a port or port range').default('1-1024'),
        minScanIntervalMs: timerMs.nonnegative().default(2_000),
        scanCacheSize: z.number().int().positive().default(5),
        scanCacheTtlMs: timerMs.positive().default(3_600_000),
        hostCacheSize: z.number().int().positive().default(3),
        hostCacheMaxBytes: z.number().int().positive().default(256 * 1024),
        hostCacheTtlMs: timerMs.positive().default(300_000),
        maxOutputBytes: z.number().int().positive().default(10 * MiB),
      })
      .strict()
      .default({}),
    processes: z
      .object({
        maxProcesses: z.number().int().positive().default(10),
        maxMemoryMb: z.number().int().positive().default(256),
        cpuBufferSeconds: z.number().int().nonnegative().default(5),
        killGraceMs: timerMs.nonnegative().default(5_000),
        enforceLimits: z.boolean().default(true),
        prlimitPath: z.string().startsWith('/').default('/usr/bin/prlimit'),
      })
      .strict()
      .default({}),
    workers: z
      .object({
        poolSize: z.number().int().positive().default(2),
      })
      .strict()
      .default({}),
    sudo: z
      .object({
        tokenTtlSeconds: z.number().int().positive().default(900),
      })
      .strict()
      .default({}),
    privileges: z
      .object({
        drop: z.boolean().default(false),
        uid: z.number().int().nonnegative().default(1000),
        gid: z.number().int().nonnegative().default(1000),
      })
      .strict()
      .default({}),
    network: z
      .object({
        defaultInterface: interfaceName.default('eth0'),
        wirelessInterface: interfaceName.default('wlan0'),
        monitorInterface: interfaceName.default('wlan0mon'),
        defaultNetwork: z.string().refine(isValidIpOrCidr, 'must be an IPv4 address or CIDR').default('192.168.1.0/24'),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        level: logLevel.default('info'),
        console: z.boolean().default(true),
        appLogMaxBytes: z.number().int().positive().default(2 * MiB),
        appLogBackups: z.number().int().nonnegative().default(3),
        auditLogMaxBytes: z.number().int().positive().default(1 * MiB),
        auditLogBackups: z.number().int().nonnegative().default(2),
      })
      .strict()
      .default({}),
  })
  .strict();

export type Settings = z.output<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

/** Raised when config.json or an override cannot be used. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    readonly path: string,
    readonly issues: ReadonlyArray<string>,
  ) {
    super(`Invalid configuration in ${path}:\n  ${issues.join('\n  ')}`);
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a settings object and fill in defaults.
 *
 * @param source - Label used in error messages
 * @throws {ConfigError}
 */
export function parseSettings(input: unknown, source = '<inline>'): Settings {
  const parsed = settingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

/** All defaults. */
export function defaultSettings(): Settings {
  return parseSettings({});
}

/**
 * Load `<home>/config.json`, apply environment overrides and validate.
 *
 * @throws {ConfigError} Unreadable JSON, schema violations, bad overrides
 */
export function loadSettings(home: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const path = join(home, CONFIG_FILENAME);

  let raw: unknown = {};
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(path, [`not valid JSON: ${err.message}`]);
    }
    if (!isNodeError(err, 'ENOENT')) throw err;
  }

  const settings = parseSettings(raw, path);

  const levelOverride = env[LOG_LEVEL_ENV_VAR];
  if (levelOverride !== undefined && levelOverride !== '') {
    const level = logLevel.safeParse(levelOverride.toLowerCase());
    if (!level.success) {
      throw new ConfigError(LOG_LEVEL_ENV_VAR, formatIssues(level.error));
    }
    return { ...settings, logging: { ...settings.logging, level: level.data } };
  }
  return settings;
}
