/**
 * Mnemo CLI Utilities — Arguments, Store Access & Formatting
 */

import { existsSync } from 'fs';
import { NodeStore, loadConfig } from '@mnemo/shared';
import type { MnemoConfig } from '@mnemo/shared';

// ─── Options ─────────────────────────────────────────────────────

export interface CommandOptions {
  /** Resolved config; loaded from $MNEMO_HOME and the environment when absent. */
  config?: MnemoConfig;
  now?: () => Date;
}

export function resolveConfig(opts?: CommandOptions): MnemoConfig {
  return opts?.config ?? loadConfig();
}

// ─── Store ───────────────────────────────────────────────────────

/**
 * Open the configured store, or null when the database file does not exist yet.
 * Read-only handles never create the file and never block the daemon's writes.
 */
export function openStore(config: MnemoConfig, opts: { readonly: boolean; now?: () => Date }): NodeStore | null {
  if (!existsSync(config.dbPath)) return null;
  return new NodeStore(config.dbPath, {
    readonly: opts.readonly,
    busyTimeoutMs: config.busyTimeoutMs,
    now: opts.now,
  });
}

export function missingStoreReport(config: MnemoConfig): string {
  return `No memory store at ${config.dbPath}. Nothing has been captured yet.`;
}

// ─── Arguments ───────────────────────────────────────────────────

export interface ParsedArgs {
  command: string | undefined;
  positional: string[];
  flags: Record<string, string | true>;
}

/**
 * Split argv (without node and script) into command, positionals and flags.
 * "--name value" and "--name=value" set a value; a bare "--name" is true.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const positional: string[] = [];
  const flags: Record<string, string | true> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
    } else if (i + 1 < rest.length && !rest[i + 1].startsWith('--')) {
      flags[body] = rest[++i];
    } else {
      flags[body] = true;
    }
  }

  return { command, positional, flags };
}

export function flagString(flags: ParsedArgs['flags'], name: string): string | undefined {
  const value = flags[name];
  return typeof value === 'string' ? value : undefined;
}

export function flagNumber(flags: ParsedArgs['flags'], name: string): number | undefined {
  const value = flagString(flags, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number, got "${value}"`);
  }
  return parsed;
}

// ─── Formatting ──────────────────────────────────────────────────

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
