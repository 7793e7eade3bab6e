import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { ConsoleLogger, MemoryLogger, SilentLogger } from './logger.ts';

describe('ConsoleLogger', () => {
  let logSpy: MockInstance;
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;
  let infoSpy: MockInstance;
  let debugSpy: MockInstance;
  const originalDebug = process.env.DEBUG;
  const originalVerbose = process.env.VERBOSE;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug === undefined) {
      delete process.env.DEBUG;
    } else {
      process.env.DEBUG = originalDebug;
    }
    if (originalVerbose === undefined) {
      delete process.env.VERBOSE;
    } else {
      process.env.VERBOSE = originalVerbose;
    }
  });

  it('writes to console methods', () => {
    const logger = new ConsoleLogger();
    logger.log('log');
    logger.warn('warn');
    logger.error('error');
    logger.info('info');

    expect(logSpy).toHaveBeenCalledWith('log');
    expect(warnSpy).toHaveBeenCalledWith('warn');
    expect(errorSpy).toHaveBeenCalledWith('error');
    expect(infoSpy).toHaveBeenCalledWith('info');
  });

  it('logs debug only when DEBUG or VERBOSE is set', () => {
    const logger = new ConsoleLogger();

    delete process.env.DEBUG;
    delete process.env.VERBOSE;
    logger.debug('quiet');
    expect(debugSpy).not.toHaveBeenCalled();

    process.env.DEBUG = '1';
    logger.debug('loud');
    expect(debugSpy).toHaveBeenCalledWith('loud');
  });
});

describe('SilentLogger', () => {
  it('does not touch the console', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new SilentLogger();
    logger.log('log');
    logger.debug('debug');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});

describe('MemoryLogger', () => {
  it('records entries by level', () => {
    const logger = new MemoryLogger();
    logger.log('one');
    logger.warn('two');
    logger.log('three');

    expect(logger.messages()).toEqual(['one', 'two', 'three']);
    expect(logger.messages('log')).toEqual(['one', 'three']);
    expect(logger.entries[1]).toEqual({ level: 'warn', message: 'two' });
  });
});
