import { LogManager } from '../../core/logging/log-manager';
import { resetLogLevelConfig } from '../../core/logging/logLevelConfig';
import { LogEntry } from '../../core/logging/types';
import { resetDebugFlags, setDebugFlag } from '../../utils/logging/debugFlags';
import { LoggerEvent, logger } from '../../utils/logging/logger';

describe('LogManager', () => {
  const manager = LogManager.getInstance();
  let entries: LogEntry[];
  let removeAdapter: () => void;

  beforeEach(() => {
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    entries = [];
    removeAdapter = manager.addAdapter({ log: entry => entries.push(entry) });
    manager.clearLogs();
  });

  afterEach(() => {
    removeAdapter();
    resetLogLevelConfig();
    resetDebugFlags();
    jest.restoreAllMocks();
  });

  it('should be a singleton with a stable instance id', () => {
    expect(LogManager.getInstance()).toBe(manager);
    expect(manager.getInstanceId()).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should route logger calls to adapters with their source', () => {
    manager.setLogLevel('debug');
    logger.info('Corridor built', { halfWidthMeters: 50 }, { source: 'BufferZoneGenerator' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'info',
      source: 'BufferZoneGenerator',
      message: 'Corridor built',
      data: { halfWidthMeters: 50 }
    });
    expect(manager.getLogs()).toHaveLength(1);
  });

  it('should drop entries below the global level', () => {
    manager.setLogLevel('warn');
    logger.debug('hidden', undefined, { source: 'SpatialFilter' });
    logger.warn('shown', undefined, { source: 'SpatialFilter' });

    expect(entries.map(entry => entry.message)).toEqual(['shown']);
  });

  it('should apply per-source levels', () => {
    manager.setLogLevel('debug');
    manager.setComponentLogLevel('Projector', 'error');
    logger.warn('quiet', undefined, { source: 'Projector' });
    logger.warn('loud', undefined, { source: 'SpatialFilter' });

    expect(manager.getComponentLogLevel('Projector')).toBe('error');
    expect(entries.map(entry => entry.message)).toEqual(['loud']);
  });

  it('should let debug flags lower a source threshold', () => {
    manager.setLogLevel('error');
    setDebugFlag('SectionLineBuilder', true);
    logger.debug('flagged', undefined, { source: 'SectionLineBuilder' });
    logger.debug('unflagged', undefined, { source: 'Projector' });

    expect(entries.map(entry => entry.message)).toEqual(['flagged']);
  });

  it('should stop delivering to removed adapters', () => {
    manager.setLogLevel('debug');
    removeAdapter();
    logger.info('after removal', undefined, { source: 'Test' });

    expect(entries).toEqual([]);
  });

  it('should format entries on one line', () => {
    expect(manager.formatLogEntry({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'info',
      source: 'Test',
      message: 'hello',
      data: { a: 1 }
    })).toBe('[2026-01-01T00:00:00.000Z] [info] [Test] hello {"a":1}');
  });

  describe('safeStringify', () => {
    it('should mark circular references', () => {
      const value: Record<string, unknown> = { name: 'loop' };
      value.self = value;

      expect(manager.safeStringify(value)).toBe('{"name":"loop","self":"[Circular]"}');
    });

    it('should truncate long arrays', () => {
      const value = { items: Array.from({ length: 12 }, (_, index) => index) };

      expect(manager.safeStringify(value)).toBe('{"items":[0,1,2,3,4,5,6,7,8,9,"...2 more items"]}');
    });
  });

  it('should export buffered entries with a header', () => {
    manager.setLogLevel('debug');
    logger.info('exported', undefined, { source: 'Test' });

    const report = manager.exportLogs();
    expect(report.startsWith('=== Section Engine Logs ===\n')).toBe(true);
    expect(report).toContain('Total Logs: 1');
    expect(report).toContain('[info] [Test] exported');
  });
});

describe('logger listeners', () => {
  afterEach(() => {
    resetLogLevelConfig();
  });

  it('should emit events with normalized data regardless of level', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const events: LoggerEvent[] = [];
    const unsubscribe = logger.addLogListener(event => events.push(event));

    logger.warn('scalar payload', 5, { source: 'Test' });
    unsubscribe();
    logger.warn('not received', undefined, { source: 'Test' });
    jest.restoreAllMocks();

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      level: 'warn',
      message: 'scalar payload',
      data: { value: 5 },
      context: { source: 'Test' }
    });
  });
});
