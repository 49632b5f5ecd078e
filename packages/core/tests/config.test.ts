import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, readConfigFile, getDefaultStorePath, getDataDir } from '../src/config.js';
import { DEFAULT_BOOST_TAGS, DEFAULT_WEIGHTS } from '../src/scoring/weights.js';
import { ErrorCode, isTaskrankError } from '../src/errors.js';

describe('config', () => {
  let dir: string;
  let configPath: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'taskrank-config-'));
    configPath = join(dir, 'config.json');
    env = { TASKRANK_CONFIG: configPath, XDG_DATA_HOME: join(dir, 'data') };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(value: unknown): void {
    writeFileSync(configPath, JSON.stringify(value));
  }

  it('uses defaults without a config file', () => {
    expect(loadConfig({}, env)).toEqual({
      storePath: getDefaultStorePath(env),
      logLevel: 'warn',
      boostTags: DEFAULT_BOOST_TAGS,
      weights: DEFAULT_WEIGHTS,
    });
  });

  it('places the default store under the data directory', () => {
    expect(getDataDir(env, 'linux')).toBe(join(dir, 'data', 'taskrank'));
    expect(getDefaultStorePath(env, 'linux')).toBe(join(dir, 'data', 'taskrank', 'tasks.json'));
    expect(getDataDir({ APPDATA: 'C:\\Users\\me\\AppData\\Roaming' }, 'win32')).toBe(join('C:\\Users\\me\\AppData\\Roaming', 'taskrank'));
  });

  it('reads values from the config file', () => {
    writeConfig({
      storePath: '/srv/tasks.json',
      logLevel: 'info',
      boostTags: ['release'],
      weights: { tagBoost: 20 },
    });
    const config = loadConfig({}, env);
    expect(config.storePath).toBe('/srv/tasks.json');
    expect(config.logLevel).toBe('info');
    expect(config.boostTags).toEqual(['release']);
    expect(config.weights).toEqual({ ...DEFAULT_WEIGHTS, tagBoost: 20 });
  });

  it('resolves a relative store path against the config file directory', () => {
    writeConfig({ storePath: 'my-tasks.json' });
    expect(loadConfig({}, env).storePath).toBe(join(dir, 'my-tasks.json'));
  });

  it('lets the environment override the file', () => {
    writeConfig({ storePath: '/srv/tasks.json', logLevel: 'info' });
    const config = loadConfig({}, { ...env, TASKRANK_STORE: '/env/tasks.json', TASKRANK_LOG_LEVEL: 'error' });
    expect(config.storePath).toBe('/env/tasks.json');
    expect(config.logLevel).toBe('error');
  });

  it('ignores an unknown log level in the environment', () => {
    expect(loadConfig({}, { ...env, TASKRANK_LOG_LEVEL: 'loud' }).logLevel).toBe('warn');
  });

  it('lets overrides win over everything', () => {
    writeConfig({ storePath: '/srv/tasks.json' });
    const config = loadConfig(
      { storePath: '/flag/tasks.json', logLevel: 'debug' },
      { ...env, TASKRANK_STORE: '/env/tasks.json', TASKRANK_LOG_LEVEL: 'error' },
    );
    expect(config.storePath).toBe('/flag/tasks.json');
    expect(config.logLevel).toBe('debug');
  });

  it('rejects unknown keys', () => {
    writeConfig({ colour: 'blue' });
    expect(() => readConfigFile(configPath)).toThrow(`Invalid config file ${configPath}`);
  });

  it('rejects invalid JSON with CONFIG_ERROR', () => {
    writeFileSync(configPath, '{');
    let caught: unknown;
    try {
      loadConfig({}, env);
    } catch (err: unknown) {
      caught = err;
    }
    expect(isTaskrankError(caught, ErrorCode.ConfigError)).toBe(true);
  });

  it.each([
    ['priorityMultiplier', -10],
    ['priorityMultiplier', 0],
    ['dueMaxBonus', -30],
    ['statusDone', 100],
    ['statusInProgress', -5],
    ['statusReview', -3],
    ['tagBoost', -8],
    ['stalenessPerDay', -1],
  ])('rejects %s = %d, which would invert the ranking', (key, value) => {
    writeConfig({ weights: { [key]: value } });
    let caught: unknown;
    try {
      loadConfig({}, env);
    } catch (err: unknown) {
      caught = err;
    }
    expect(isTaskrankError(caught, ErrorCode.ConfigError)).toBe(true);
    expect(() => readConfigFile(configPath)).toThrow(`Invalid config file ${configPath} at weights.${key}`);
  });

  it('accepts a zero bonus and a zero Done penalty', () => {
    writeConfig({ weights: { dueMaxBonus: 0, statusDone: 0, tagBoost: 0 } });
    expect(loadConfig({}, env).weights).toEqual({ ...DEFAULT_WEIGHTS, dueMaxBonus: 0, statusDone: 0, tagBoost: 0 });
  });

  it('rejects a bad weight', () => {
    writeConfig({ weights: { dueHorizonHours: 0 } });
    expect(() => readConfigFile(configPath)).toThrow(`Invalid config file ${configPath} at weights.dueHorizonHours`);
  });
});
