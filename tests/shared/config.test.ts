import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join, resolve } from 'path';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import {
  DEFAULTS,
  MAX_SWEEP_INTERVAL_SECONDS,
  MAX_TIMER_MS,
  MAX_TTL_SECONDS,
  loadConfig,
  parseConfig,
} from '../../packages/shared/config/index.js';
import { ValidationError } from '../../packages/shared/errors/index.js';

const HOME = resolve('/srv/mnemo-home');

describe('parseConfig', () => {
  it('uses defaults for an empty document', () => {
    const result = parseConfig('', HOME);
    expect(result).toEqual({
      ok: true,
      config: {
        home: HOME,
        dbPath: join(HOME, 'mnemo.db'),
        ttlSeconds: 86_400,
        sweepIntervalSeconds: 60,
        recallWindow: 15,
        embeddingTimeoutMs: 5_000,
        busyTimeoutMs: 0,
        defaultCircle: 'local',
        circles: [],
        inspector: { port: DEFAULTS.inspectorPort },
      },
    });
  });

  it('reads values and circles, including the string shorthand', () => {
    const result = parseConfig([
      'ttlSeconds: 3600',
      'recallWindow: 20',
      'defaultCircle: work',
      'dbPath: data/memory.db',
      'inspector:',
      '  port: 4000',
      'circles:',
      '  - work',
      '  - id: family',
      '    name: Family',
      '    localOnly: false',
    ].join('\n'), HOME);

    if (!result.ok) throw new Error(result.errors.join('; '));
    expect(result.config.ttlSeconds).toBe(3600);
    expect(result.config.recallWindow).toBe(20);
    expect(result.config.defaultCircle).toBe('work');
    expect(result.config.dbPath).toBe(resolve(HOME, 'data/memory.db'));
    expect(result.config.inspector.port).toBe(4000);
    expect(result.config.circles).toEqual([
      { id: 'work', name: 'work', localOnly: true },
      { id: 'family', name: 'Family', localOnly: false },
    ]);
  });

  it('collects every validation error', () => {
    const result = parseConfig([
      'ttlSeconds: -1',
      'recallWindow: 2.5',
      'sweepIntervalSeconds: often',
      'circles:',
      '  - work',
      '  - work',
      '  - 42',
    ].join('\n'), HOME);

    expect(result).toEqual({
      ok: false,
      errors: [
        '"ttlSeconds" must be >= 0',
        '"sweepIntervalSeconds" must be a number',
        '"recallWindow" must be an integer',
        'circles[1]: duplicate circle "work"',
        'circles[2] must have a non-empty "id"',
      ],
    });
  });

  it('caps timer delays and the TTL', () => {
    const result = parseConfig([
      'ttlSeconds: 10000000000000',
      'sweepIntervalSeconds: 3000000',
      'embeddingTimeoutMs: 3000000000',
    ].join('\n'), HOME);

    expect(result).toEqual({
      ok: false,
      errors: [
        '"ttlSeconds" must be <= 8640000000',
        '"sweepIntervalSeconds" must be <= 2147483',
        '"embeddingTimeoutMs" must be <= 2147483647',
      ],
    });
  });

  it('accepts values at the caps', () => {
    const result = parseConfig([
      `ttlSeconds: ${MAX_TTL_SECONDS}`,
      `sweepIntervalSeconds: ${MAX_SWEEP_INTERVAL_SECONDS}`,
      `embeddingTimeoutMs: ${MAX_TIMER_MS}`,
    ].join('\n'), HOME);

    if (!result.ok) throw new Error(result.errors.join('; '));
    expect(result.config.ttlSeconds).toBe(8_640_000_000);
    expect(result.config.sweepIntervalSeconds).toBe(2_147_483);
    expect(result.config.embeddingTimeoutMs).toBe(2_147_483_647);
  });

  it('rejects documents that are not a mapping', () => {
    expect(parseConfig('- a\n- b', HOME)).toEqual({ ok: false, errors: ['Config must be a mapping'] });
  });

  it('reports YAML syntax errors', () => {
    const result = parseConfig('ttlSeconds: [1, 2', HOME);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].startsWith('YAML parse error:')).toBe(true);
    }
  });

  it('lets environment variables win over the file', () => {
    const result = parseConfig('ttlSeconds: 3600', HOME, {
      MNEMO_TTL_SECONDS: '120',
      MNEMO_RECALL_WINDOW: '5',
      MNEMO_DEFAULT_CIRCLE: 'home',
      MNEMO_DB_PATH: '/var/lib/mnemo/other.db',
      MNEMO_INSPECTOR_PORT: '0',
    });

    if (!result.ok) throw new Error(result.errors.join('; '));
    expect(result.config.ttlSeconds).toBe(120);
    expect(result.config.recallWindow).toBe(5);
    expect(result.config.defaultCircle).toBe('home');
    expect(result.config.dbPath).toBe(resolve('/var/lib/mnemo/other.db'));
    expect(result.config.inspector.port).toBe(0);
  });

  it('caps environment overrides the same way', () => {
    expect(parseConfig('', HOME, {
      MNEMO_SWEEP_INTERVAL_SECONDS: '3000000',
      MNEMO_EMBEDDING_TIMEOUT_MS: '3000000000',
    })).toEqual({
      ok: false,
      errors: [
        'MNEMO_SWEEP_INTERVAL_SECONDS must be a number between 1 and 2147483, got "3000000"',
        'MNEMO_EMBEDDING_TIMEOUT_MS must be a number between 1 and 2147483647, got "3000000000"',
      ],
    });
  });

  it('rejects malformed environment overrides', () => {
    expect(parseConfig('', HOME, { MNEMO_TTL_SECONDS: 'abc', MNEMO_INSPECTOR_PORT: '70000' })).toEqual({
      ok: false,
      errors: [
        'MNEMO_TTL_SECONDS must be a number between 0 and 8640000000, got "abc"',
        'MNEMO_INSPECTOR_PORT must be a port number, got "70000"',
      ],
    });
  });
});

describe('loadConfig', () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'mnemo-config-'));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it('falls back to defaults when there is no config file', () => {
    const config = loadConfig({ env: { MNEMO_HOME: home } });
    expect(config.home).toBe(home);
    expect(config.dbPath).toBe(join(home, 'mnemo.db'));
    expect(config.ttlSeconds).toBe(86_400);
  });

  it('reads config.yaml from the home directory', () => {
    writeFileSync(join(home, 'config.yaml'), 'sweepIntervalSeconds: 30\n');
    expect(loadConfig({ home, env: {} }).sweepIntervalSeconds).toBe(30);
  });

  it('throws a ValidationError naming the file and the problems', () => {
    writeFileSync(join(home, 'config.yaml'), 'ttlSeconds: -5\n');
    expect(() => loadConfig({ home, env: {} })).toThrow(ValidationError);
    expect(() => loadConfig({ home, env: {} })).toThrow(
      `config: ${join(home, 'config.yaml')}: "ttlSeconds" must be >= 0`
    );
  });
});
