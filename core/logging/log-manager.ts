// NOTE: LogManager is the logger system's internal sink. Library code logs through `logger` from utils/logging/logger.
import { v4 as uuidv4 } from 'uuid';
import { LoggingConfig, LogEntry, LogEntryLevel, ILogAdapter, LogContext } from './types';
import { isLogLevelEnabled, setLogLevel, getLogLevel, parseLogLevel, LogLevel } from './logLevelConfig';

/**
 * Singleton log sink for the section engine
 */
export class LogManager {
  private static instance: LogManager;
  private logs: LogEntry[] = [];
  private readonly MAX_LOGS = 10000;
  private readonly config: LoggingConfig = loadLoggingConfig();
  private adapters: ILogAdapter[] = resolveAdapters(this.config.adapters);
  private readonly instanceId: string;

  private constructor() {
    this.instanceId = uuidv4();
    applyLevelOverrides(this.config);
  }

  public static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  public getInstanceId(): string {
    return this.instanceId;
  }

  // Level management delegates to logLevelConfig
  public setLogLevel(level: LogLevel): void {
    setLogLevel(level);
  }

  public getLogLevel(): LogLevel {
    return getLogLevel();
  }

  public setComponentLogLevel(component: string, level: LogLevel): void {
    setLogLevel(level, component);
  }

  public getComponentLogLevel(component: string): LogLevel {
    return getLogLevel(component);
  }

  public addAdapter(adapter: ILogAdapter): () => void {
    this.adapters.push(adapter);
    return () => {
      this.adapters = this.adapters.filter(a => a !== adapter);
    };
  }

  /**
   * Safely stringify log data, handling circular references and large values
   */
  public safeStringify(obj: unknown, indent?: number): string {
    const MAX_ARRAY_LENGTH = 10;
    const TRUNCATE_LENGTH = 200;
    const seen = new WeakSet<object>();

    const serialized = JSON.stringify(obj, (key, value: unknown) => {
      if (typeof value === 'function') return '[Function]';
      if (typeof value === 'string' && value.length > TRUNCATE_LENGTH) {
        return value.slice(0, TRUNCATE_LENGTH) + '...';
      }
      if (typeof value === 'number' && !Number.isFinite(value)) {
        return String(value);
      }
      if (value instanceof Error) {
        return {
          name: value.name,
          message: value.message,
          stack: value.stack?.split('\n').slice(0, 3).join('\n')
        };
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
        if (value instanceof Map) return `[Map(${value.size})]`;
        if (value instanceof Set) return `[Set(${value.size})]`;
        if (Array.isArray(value) && value.length > MAX_ARRAY_LENGTH) {
          return [...value.slice(0, MAX_ARRAY_LENGTH), `...${value.length - MAX_ARRAY_LENGTH} more items`];
        }
      }
      return value;
    }, indent);
    return serialized === undefined ? '' : serialized;
  }

  public formatLogEntry(entry: LogEntry): string {
    let dataStr = '';
    if (entry.data !== undefined) {
      try {
        dataStr = ' ' + this.safeStringify(entry.data);
      } catch {
        dataStr = ' [Error stringifying data]';
      }
    }
    return `[${entry.timestamp}] [${entry.level}] [${entry.source}] ${entry.message}${dataStr}`;
  }

  private addLog(entry: LogEntry): void {
    this.logs.push(entry);
    if (this.logs.length > this.MAX_LOGS) {
      this.logs = this.logs.slice(-this.MAX_LOGS);
    }

    for (const adapter of this.adapters) {
      try {
        adapter.log(entry);
      } catch (error) {
        console.error('[LogManager] Log adapter failed:', error);
      }
    }
  }

  private write(level: LogEntryLevel, source: string, message: string, data?: unknown, context?: LogContext): void {
    if (!isLogLevelEnabled(source, level)) return;
    this.addLog({
      timestamp: new Date().toISOString(),
      level, source, message, data, context
    });
  }

  public trace(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.write('trace', source, message, data, context);
  }

  public debug(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.write('debug', source, message, data, context);
  }

  public info(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.write('info', source, message, data, context);
  }

  public warn(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.write('warn', source, message, data, context);
  }

  public error(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.write('error', source, message, data, context);
  }

  public getLogs(): LogEntry[] {
    return [...this.logs];
  }

  public clearLogs(): void {
    this.logs = [];
  }

  /**
   * Render the buffered entries as a plain-text report
   */
  public exportLogs(): string {
    const header = [
      '=== Section Engine Logs ===',
      `Generated: ${new Date().toISOString()}`,
      `Environment: ${process.env.NODE_ENV ?? 'development'}`,
      `Log Level: ${this.getLogLevel()}`,
      `Total Logs: ${this.logs.length}`,
      '==========================='
    ].join('\n');
    return [header, ...this.logs.map(entry => this.formatLogEntry(entry))].join('\n') + '\n';
  }
}

// Config loader (env): LOG_LEVEL, LOG_SOURCES=Source:level,..., LOG_ADAPTERS=console
function loadLoggingConfig(): LoggingConfig {
  const logLevel = process.env.LOG_LEVEL;
  let sourceFilters: LoggingConfig['sourceFilters'] = undefined;
  if (process.env.LOG_SOURCES) {
    sourceFilters = process.env.LOG_SOURCES.split(',').reduce<Record<string, string>>((acc, pair) => {
      const [src, lvl] = pair.split(':');
      if (src && lvl) acc[src.trim()] = lvl.trim();
      return acc;
    }, {});
  }
  const adapters = process.env.LOG_ADAPTERS
    ? process.env.LOG_ADAPTERS.split(',').map(a => a.trim()).filter(Boolean)
    : ['console'];
  return { logLevel, sourceFilters, adapters };
}

function applyLevelOverrides(config: LoggingConfig): void {
  const globalLevel = parseLogLevel(config.logLevel);
  if (globalLevel) {
    setLogLevel(globalLevel);
  }
  Object.entries(config.sourceFilters ?? {}).forEach(([source, value]) => {
    const level = parseLogLevel(value);
    if (level) setLogLevel(level, source);
  });
}

// Console adapter (default)
class ConsoleAdapter implements ILogAdapter {
  log(entry: LogEntry): void {
    const line = LogManager.getInstance().formatLogEntry(entry);
    switch (entry.level) {
      case 'trace':
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

// Silent adapter: entries are only kept in the in-memory buffer
class SilentAdapter implements ILogAdapter {
  log(): void {}
}

const adapterRegistry: Record<string, ILogAdapter> = {
  console: new ConsoleAdapter(),
  silent: new SilentAdapter()
};

function resolveAdapters(names: string[] | undefined): ILogAdapter[] {
  const resolved = (names ?? ['console'])
    .map(name => adapterRegistry[name])
    .filter((adapter): adapter is ILogAdapter => adapter !== undefined);
  return resolved.length > 0 ? resolved : [adapterRegistry.console];
}
