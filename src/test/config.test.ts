import { describe, it, expect, afterEach } from 'vitest';
import { getRuntimeConfig, validateEnvConfig } from '../lib/config';
import { addLogHandler, configureLogger, createLogger, getLogConfig, type LogEntry } from '../lib/logger';
import { CELL_SCREENING_PROTOCOL, DEVICE_ROSTER, MOTION } from '../config/workcell';

describe('runtime config', () => {
  it('should read settings from the environment', () => {
    expect(getRuntimeConfig({
      WORKCELL_LOG_LEVEL: 'info',
      WORKCELL_SPEED: '2.5',
      WORKCELL_SKIP_WAIT: 'true',
    })).toEqual({ logLevel: 'info', speedMultiplier: 2.5, skipWait: true });
  });

  it('should fall back to defaults', () => {
    const config = getRuntimeConfig({ WORKCELL_SPEED: 'fast', WORKCELL_LOG_LEVEL: 'loud' });
    expect(config.logLevel).toBeUndefined();
    expect(config.speedMultiplier).toBe(1);
    expect(config.skipWait).toBe(false);
  });

  it('should report invalid values', () => {
    const result = validateEnvConfig({ WORKCELL_LOG_LEVEL: 'loud', WORKCELL_SPEED: '-1', WORKCELL_SKIP_WAIT: 'yes' });
    expect(result.errors).toEqual([
      'WORKCELL_LOG_LEVEL must be one of debug, info, warn, error (got "loud")',
      'WORKCELL_SPEED must be a positive number (got "-1")',
    ]);
    expect(result.warnings).toEqual(['WORKCELL_SKIP_WAIT should be "true" or "false" (got "yes")']);
  });

  it('should accept an empty environment', () => {
    expect(validateEnvConfig({})).toEqual({ errors: [], warnings: [] });
  });
});

describe('workcell config', () => {
  it('should define five devices with unique names', () => {
    const names = DEVICE_ROSTER.map(d => d.name);
    expect(new Set(names).size).toBe(5);
  });

  it('should end the screening protocol by returning home', () => {
    expect(CELL_SCREENING_PROTOCOL).toHaveLength(10);
    expect(CELL_SCREENING_PROTOCOL[9].action).toBe('RETURN_HOME');
    expect(CELL_SCREENING_PROTOCOL.filter(s => s.action === 'PROCESS').map(s => s.durationSeconds))
      .toEqual([3, 2, 4, 2]);
  });

  it('should travel at 100 mm/s', () => {
    expect(1000 / MOTION.MS_PER_MM).toBe(100);
  });
});

describe('logger', () => {
  let remove: (() => void) | undefined;

  afterEach(() => {
    remove?.();
    remove = undefined;
    configureLogger({ minLevel: 'debug', enabled: true });
  });

  it('should deliver entries at or above the minimum level', () => {
    const entries: LogEntry[] = [];
    remove = addLogHandler(entry => entries.push(entry));
    configureLogger({ minLevel: 'warn' });

    const log = createLogger('Test');
    log.info('hidden');
    log.warn('shown', { device: 'Storage' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'warn', namespace: 'Test', message: 'shown', data: { device: 'Storage' } });
  });

  it('should drop everything when disabled', () => {
    const entries: LogEntry[] = [];
    remove = addLogHandler(entry => entries.push(entry));
    configureLogger({ enabled: false });

    createLogger('Test').error('nope');

    expect(entries).toEqual([]);
  });

  it('should unregister handlers', () => {
    const before = getLogConfig().handlers;
    const unregister = addLogHandler(() => undefined);
    expect(getLogConfig().handlers).toBe(before + 1);
    unregister();
    expect(getLogConfig().handlers).toBe(before);
  });
});
