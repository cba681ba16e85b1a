import { createLogger, verbosityFrom } from '../../src/logger.js';

describe('logger', () => {
  const capture = (verbosity: 'quiet' | 'default' | 'verbose') => {
    const lines: string[] = [];
    const logger = createLogger(verbosity, (line) => lines.push(line));
    logger.info('info');
    logger.warn('careful');
    logger.error('broken');
    logger.debug('details');
    return lines;
  };

  test('should prefix each level', () => {
    expect(capture('default')).toEqual([
      '[INFO] info',
      '[WARN] careful',
      '[ERROR] broken',
    ]);
  });

  test('should print debug lines only when verbose', () => {
    expect(capture('verbose')).toContain('[DEBUG] details');
  });

  test('should keep warnings and errors when quiet', () => {
    expect(capture('quiet')).toEqual(['[WARN] careful', '[ERROR] broken']);
  });

  test('should derive verbosity from CLI flags', () => {
    expect(verbosityFrom({})).toBe('default');
    expect(verbosityFrom({ verbose: true })).toBe('verbose');
    expect(verbosityFrom({ quiet: true })).toBe('quiet');
    expect(() => verbosityFrom({ verbose: true, quiet: true })).toThrow(
      '--verbose and --quiet cannot be used together'
    );
  });
});
