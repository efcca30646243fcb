import { describe, it, expect, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { loadConfig, ConfigError, createLogger, getLogger, setLogger } from '../../src/index.js';
import { resolveSettings } from '../../src/solver/index.js';

describe('loadConfig', () => {
  it('defaults to a silent logger and no time limit', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'silent', solver: { timeLimit: undefined, verbose: false } });
  });

  it('reads environment values', () => {
    const config = loadConfig({
      LINDSL_LOG_LEVEL: 'debug',
      LINDSL_SOLVER_TIME_LIMIT: '2.5',
      LINDSL_SOLVER_VERBOSE: '1',
    });
    expect(config).toEqual({ logLevel: 'debug', solver: { timeLimit: 2.5, verbose: true } });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LINDSL_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig({ LINDSL_SOLVER_TIME_LIMIT: '-1' })).toThrow(/^Invalid configuration: LINDSL_SOLVER_TIME_LIMIT: /);
    expect(() => loadConfig({ LINDSL_SOLVER_VERBOSE: 'yes' })).toThrow(ConfigError);
  });
});

describe('logger', () => {
  afterEach(() => {
    setLogger(null);
  });

  it('writes JSON lines tagged with the library name', () => {
    const lines: string[] = [];
    const destination = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    const logger = createLogger({ level: 'info', destination });
    logger.info({ rows: 2 }, 'generated LP');
    logger.debug('hidden');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({ lib: 'lindsl', rows: 2, msg: 'generated LP', level: 30 });
  });

  it('replaces and resets the shared logger', () => {
    const custom = createLogger({ level: 'warn' });
    setLogger(custom);
    expect(getLogger()).toBe(custom);
    setLogger(null);
    expect(getLogger()).not.toBe(custom);
  });
});

describe('solver settings', () => {
  it('validates settings', () => {
    expect(resolveSettings({ maxIter: 10, verbose: true })).toMatchObject({ maxIter: 10, verbose: true });
    expect(() => resolveSettings({ maxIter: 0.5 })).toThrow(/^Invalid solver settings: maxIter: /);
  });
});
