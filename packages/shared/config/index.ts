/**
 * Mnemo Configuration — YAML file + environment overrides.
 *
 * Location: $MNEMO_HOME/config.yaml (default ~/.mnemo/config.yaml).
 * Every key is optional; a missing file means all defaults.
 * Environment variables win over the file.
 */

import yaml from 'js-yaml';
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';
import { LOCAL_CIRCLE_ID } from '../types/index.js';
import { ValidationError, errorMessage } from '../errors/index.js';

export interface CircleConfig {
  id: string;
  name: string;
  localOnly: boolean;
}

export interface MnemoConfig {
  home: string;
  dbPath: string;
  ttlSeconds: number;
  sweepIntervalSeconds: number;
  recallWindow: number;
  embeddingTimeoutMs: number;
  busyTimeoutMs: number;
  defaultCircle: string;
  circles: CircleConfig[];
  inspector: {
    port: number;
  };
}

export type ConfigParseResult =
  | { ok: true; config: MnemoConfig }
  | { ok: false; errors: string[] };

export interface LoadConfigOptions {
  home?: string;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULTS = {
  ttlSeconds: 86_400,
  sweepIntervalSeconds: 60,
  recallWindow: 15,
  embeddingTimeoutMs: 5_000,
  busyTimeoutMs: 0,
  inspectorPort: 3017,
} as const;

/** Longest delay setTimeout and setInterval honour; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_SWEEP_INTERVAL_SECONDS = Math.floor(MAX_TIMER_MS / 1000);
/** Longest TTL for which createdAt + ttl is still a representable Date. */
export const MAX_TTL_SECONDS = 8_640_000_000;

export function resolveHome(opts?: LoadConfigOptions): string {
  const env = opts?.env ?? process.env;
  return opts?.home ?? env.MNEMO_HOME ?? join(homedir(), '.mnemo');
}

/**
 * Load configuration from disk and environment.
 * Throws ValidationError listing every problem when the result is invalid.
 */
export function loadConfig(opts?: LoadConfigOptions): MnemoConfig {
  const env = opts?.env ?? process.env;
  const home = resolveHome(opts);
  const configPath = join(home, 'config.yaml');

  const source = existsSync(configPath) ? readFileSync(configPath, 'utf-8') : '';
  const result = parseConfig(source, home, env);
  if (!result.ok) {
    throw new ValidationError('config', `${configPath}: ${result.errors.join('; ')}`);
  }
  return result.config;
}

/**
 * Parse a YAML document into a validated config, applying environment overrides.
 */
export function parseConfig(yamlSource: string, home: string, env: NodeJS.ProcessEnv = {}): ConfigParseResult {
  let raw: unknown;
  try {
    raw = yamlSource.trim() ? yaml.load(yamlSource) : {};
  } catch (err) {
    return { ok: false, errors: [`YAML parse error: ${errorMessage(err)}`] };
  }

  if (raw === null || raw === undefined) raw = {};
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Config must be a mapping'] };
  }

  const errors: string[] = [];

  const ttlSeconds = readNumber(raw, 'ttlSeconds', DEFAULTS.ttlSeconds, errors, { min: 0, max: MAX_TTL_SECONDS });
  const sweepIntervalSeconds = readNumber(raw, 'sweepIntervalSeconds', DEFAULTS.sweepIntervalSeconds, errors, {
    min: 1, max: MAX_SWEEP_INTERVAL_SECONDS,
  });
  const recallWindow = readNumber(raw, 'recallWindow', DEFAULTS.recallWindow, errors, { min: 1, integer: true });
  const embeddingTimeoutMs = readNumber(raw, 'embeddingTimeoutMs', DEFAULTS.embeddingTimeoutMs, errors, {
    min: 1, max: MAX_TIMER_MS,
  });
  const busyTimeoutMs = readNumber(raw, 'busyTimeoutMs', DEFAULTS.busyTimeoutMs, errors, { min: 0, integer: true });
  const defaultCircle = readString(raw, 'defaultCircle', LOCAL_CIRCLE_ID, errors);
  const dbPathRaw = readString(raw, 'dbPath', join(home, 'mnemo.db'), errors);

  let inspectorPort: number = DEFAULTS.inspectorPort;
  if (raw.inspector !== undefined) {
    if (!isRecord(raw.inspector)) {
      errors.push('"inspector" must be a mapping');
    } else {
      inspectorPort = readNumber(raw.inspector, 'port', DEFAULTS.inspectorPort, errors, {
        min: 0, max: 65_535, integer: true, label: 'inspector.port',
      });
    }
  }

  const circles = readCircles(raw.circles, errors);

  const config: MnemoConfig = {
    home,
    dbPath: isAbsolute(dbPathRaw) ? dbPathRaw : resolve(home, dbPathRaw),
    ttlSeconds,
    sweepIntervalSeconds,
    recallWindow,
    embeddingTimeoutMs,
    busyTimeoutMs,
    defaultCircle,
    circles,
    inspector: { port: inspectorPort },
  };

  applyEnvOverrides(config, env, errors);

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, config };
}

// ─── Environment ─────────────────────────────────────────────────

interface NumericEnv {
  name: string;
  key: 'ttlSeconds' | 'sweepIntervalSeconds' | 'recallWindow' | 'embeddingTimeoutMs';
  min: number;
  max: number;
}

const NUMERIC_ENV: NumericEnv[] = [
  { name: 'MNEMO_TTL_SECONDS', key: 'ttlSeconds', min: 0, max: MAX_TTL_SECONDS },
  { name: 'MNEMO_SWEEP_INTERVAL_SECONDS', key: 'sweepIntervalSeconds', min: 1, max: MAX_SWEEP_INTERVAL_SECONDS },
  { name: 'MNEMO_RECALL_WINDOW', key: 'recallWindow', min: 1, max: Number.MAX_SAFE_INTEGER },
  { name: 'MNEMO_EMBEDDING_TIMEOUT_MS', key: 'embeddingTimeoutMs', min: 1, max: MAX_TIMER_MS },
];

function applyEnvOverrides(config: MnemoConfig, env: NodeJS.ProcessEnv, errors: string[]): void {
  if (env.MNEMO_DB_PATH) {
    config.dbPath = resolve(env.MNEMO_DB_PATH);
  }
  if (env.MNEMO_DEFAULT_CIRCLE) {
    config.defaultCircle = env.MNEMO_DEFAULT_CIRCLE;
  }

  for (const { name, key, min, max } of NUMERIC_ENV) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
      errors.push(`${name} must be a number between ${min} and ${max}, got "${value}"`);
      continue;
    }
    config[key] = parsed;
  }

  const port = env.MNEMO_INSPECTOR_PORT;
  if (port !== undefined && port !== '') {
    const parsed = Number(port);
    if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65_535) {
      errors.push(`MNEMO_INSPECTOR_PORT must be a port number, got "${port}"`);
    } else {
      config.inspector.port = parsed;
    }
  }
}

// ─── Field Readers ───────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  errors: string[],
  rules: { min?: number; max?: number; integer?: boolean; label?: string }
): number {
  const value = raw[key];
  const label = rules.label ?? key;
  if (value === undefined) return fallback;

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`"${label}" must be a number`);
    return fallback;
  }
  if (rules.integer && !Number.isInteger(value)) {
    errors.push(`"${label}" must be an integer`);
    return fallback;
  }
  if (rules.min !== undefined && value < rules.min) {
    errors.push(`"${label}" must be >= ${rules.min}`);
    return fallback;
  }
  if (rules.max !== undefined && value > rules.max) {
    errors.push(`"${label}" must be <= ${rules.max}`);
    return fallback;
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string, fallback: string, errors: string[]): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push(`"${key}" must be a non-empty string`);
    return fallback;
  }
  return value;
}

function readCircles(value: unknown, errors: string[]): CircleConfig[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    errors.push('"circles" must be a list');
    return [];
  }

  const circles: CircleConfig[] = [];
  const seen = new Set<string>();
  value.forEach((entry: unknown, i) => {
    // shorthand: "- work"
    const item: unknown = typeof entry === 'string' && entry.trim() ? { id: entry } : entry;
    if (!isRecord(item) || typeof item.id !== 'string' || !item.id.trim()) {
      errors.push(`circles[${i}] must have a non-empty "id"`);
      return;
    }
    const id = item.id;
    if (seen.has(id)) {
      errors.push(`circles[${i}]: duplicate circle "${id}"`);
      return;
    }
    seen.add(id);

    const name = typeof item.name === 'string' && item.name.trim() ? item.name : id;
    let localOnly = true;
    if (item.localOnly !== undefined) {
      if (typeof item.localOnly !== 'boolean') {
        errors.push(`circles[${i}].localOnly must be a boolean`);
      } else {
        localOnly = item.localOnly;
      }
    }
    circles.push({ id, name, localOnly });
  });
  return circles;
}
