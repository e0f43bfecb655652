/**
 * Tests for the console logger.
 */

import { describe, it, expect, vi, beforeEach, type MockInstance } from 'vitest';
import { ConsoleLogger, NoopLogger, formatLogLine, isLevelEnabled } from '../observability/logging.js';

describe('ConsoleLogger', () => {
  let output: MockInstance;

  beforeEach(() => {
    output = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('should write compact lines', () => {
    const logger = new ConsoleLogger({ format: 'compact' });
    logger.info('Loading the trustStore', { bundled: true });

    expect(output).toHaveBeenCalledWith('[INFO] Loading the trustStore {"bundled":true}');
  });

  it('should write json lines', () => {
    const logger = new ConsoleLogger({ format: 'json', timestamps: false });
    logger.warn('Deleting a dns record with ref', { ref: 'record:a/abc' });

    expect(output).toHaveBeenCalledWith(
      '{"level":"warn","target":"infoblox","message":"Deleting a dns record with ref","ref":"record:a/abc"}'
    );
  });

  it('should write pretty lines with the target', () => {
    const logger = new ConsoleLogger({ timestamps: false });
    logger.error('Request failed');

    expect(output).toHaveBeenCalledWith('[ERROR] infoblox: Request failed');
  });

  it('should drop messages below the level', () => {
    const logger = new ConsoleLogger({ level: 'warn', format: 'compact' });
    logger.info('Querying next page id');
    logger.debug('Creating A record');

    expect(output).not.toHaveBeenCalled();
  });
});

describe('formatLogLine', () => {
  it('should put pretty context as key=value pairs', () => {
    const line = formatLogLine(
      { format: 'pretty', target: 'infoblox' },
      'info',
      'Loading the trustStore',
      { path: 'classpath:cacerts.p12', bundled: true },
      '2024-01-01T00:00:00.000Z'
    );

    expect(line).toBe(
      '[2024-01-01T00:00:00.000Z] [INFO] infoblox: Loading the trustStore path="classpath:cacerts.p12" bundled=true'
    );
  });

  it('should leave out a missing target', () => {
    expect(formatLogLine({ format: 'pretty' }, 'warn', 'Skipping TLS certs verification.', undefined)).toBe(
      '[WARN] Skipping TLS certs verification.'
    );
  });
});

describe('isLevelEnabled', () => {
  it('should compare against the threshold', () => {
    expect(isLevelEnabled('warn', 'info')).toBe(true);
    expect(isLevelEnabled('info', 'info')).toBe(true);
    expect(isLevelEnabled('debug', 'info')).toBe(false);
  });
});

describe('custom sink', () => {
  it('should receive the formatted line instead of the console', () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger({ format: 'compact', sink: (line) => lines.push(line) });

    logger.warn('Modifying A record');

    expect(lines).toEqual(['[WARN] Modifying A record']);
  });
});

describe('NoopLogger', () => {
  it('should write nothing', () => {
    const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    new NoopLogger().error('ignored');

    expect(output).not.toHaveBeenCalled();
  });
});
