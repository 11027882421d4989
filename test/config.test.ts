import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigService, DEFAULT_ROOT_LABEL, LogLevel as ConfigLogLevel } from '../src/config.js';
import { Logger, LogLevel, createLogger } from '../src/logger.js';

const saved = { level: process.env.LOG_LEVEL, root: process.env.TREEBANK_ROOT_LABEL };

function restore(name: string, value: string | undefined): void {
  if (value === undefined) delete process.env[name];
  else process.env[name] = value;
}

describe('ConfigService', () => {
  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.TREEBANK_ROOT_LABEL;
    ConfigService.resetForTesting();
  });

  afterEach(() => {
    restore('LOG_LEVEL', saved.level);
    restore('TREEBANK_ROOT_LABEL', saved.root);
    ConfigService.resetForTesting();
  });

  it('owns the log levels the logger re-exports', () => {
    expect(LogLevel).toBe(ConfigLogLevel);
    expect(ConfigService.getInstance().logLevel).toBe(ConfigLogLevel.INFO);
  });

  it('defaults to INFO and the ROOT label', () => {
    const config = ConfigService.getInstance();
    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.rootLabel).toBe(DEFAULT_ROOT_LABEL);
  });

  it('reads the environment', () => {
    process.env.LOG_LEVEL = ' warn ';
    process.env.TREEBANK_ROOT_LABEL = 'TOP';
    const config = ConfigService.getInstance();
    expect(config.logLevel).toBe(LogLevel.WARN);
    expect(config.rootLabel).toBe('TOP');
  });

  it('falls back on unknown or blank values', () => {
    process.env.LOG_LEVEL = 'verbose';
    process.env.TREEBANK_ROOT_LABEL = '   ';
    const config = ConfigService.getInstance();
    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.rootLabel).toBe('ROOT');
  });

  it('caches until reset', () => {
    const first = ConfigService.getInstance();
    process.env.LOG_LEVEL = 'ERROR';
    expect(ConfigService.getInstance()).toBe(first);
    ConfigService.resetForTesting();
    expect(ConfigService.getInstance().logLevel).toBe(LogLevel.ERROR);
  });

  it('sets the level of new loggers', () => {
    process.env.LOG_LEVEL = 'ERROR';
    const lines: string[] = [];
    const logger = createLogger('test', line => lines.push(line));
    logger.warn('dropped');
    logger.error('kept');
    expect(lines.map(l => JSON.parse(l).message)).toEqual(['kept']);
  });
});

describe('Logger', () => {
  it('writes one JSON object per entry', () => {
    const lines: string[] = [];
    new Logger('parser', LogLevel.DEBUG, line => lines.push(line)).debug('skipping', { depth: 2 });
    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 'DEBUG', component: 'parser', message: 'skipping', depth: 2 });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('filters entries below the minimum level', () => {
    const lines: string[] = [];
    const logger = new Logger('cli', LogLevel.WARN, line => lines.push(line));
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    expect(lines).toHaveLength(1);
  });

  it('adds error details', () => {
    const lines: string[] = [];
    new Logger('cli', LogLevel.INFO, line => lines.push(line)).error('failed', new TypeError('bad'), { file: 'x' });
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'ERROR', message: 'failed', error: 'bad', errorName: 'TypeError', file: 'x',
    });
  });
});
