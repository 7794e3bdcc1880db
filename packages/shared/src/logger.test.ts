import { describe, it, expect } from 'vitest';
import { createLogger, parseLogLevel } from './logger.js';

describe('parseLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
  });

  it('should fall back for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'warn')).toBe('warn');
  });
});

describe('Logger', () => {
  it('should keep the service name on child loggers', () => {
    const logger = createLogger({ service: 'test', file: false, silent: true });
    const child = logger.child({ requestId: 'abc' });

    expect(child.service).toBe('test');
    expect(() => child.info('hello', { field: 1 })).not.toThrow();
  });
});
