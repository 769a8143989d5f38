import { LogContext } from '../../core/logging/types';
import { LogManager } from '../../core/logging/log-manager';

type LogEventListener = (log: LoggerEvent) => void;

export interface LoggerEvent {
  timestamp: string;
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  context?: LogContext;
}

class LogEventEmitter {
  private listeners: LogEventListener[] = [];

  addListener(listener: LogEventListener) {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  emit(log: LoggerEvent) {
    this.listeners.forEach(listener => listener(log));
  }
}

const logEmitter = new LogEventEmitter();

function isRecord(data: unknown): data is Record<string, unknown> {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

function normalizeData(data?: unknown): Record<string, unknown> | undefined {
  if (data === undefined) return undefined;
  if (isRecord(data)) return data;
  return { value: data };
}

function getSource(context?: LogContext): string {
  return typeof context?.source === 'string' ? context.source : 'unknown';
}

function emit(level: LoggerEvent['level'], message: string, data?: unknown, context?: LogContext) {
  logEmitter.emit({
    timestamp: new Date().toISOString(),
    level,
    message,
    data: normalizeData(data),
    context
  });
}

export const logger = {
  addLogListener: (listener: LogEventListener) => logEmitter.addListener(listener),

  debug(message: string, data?: unknown, context?: LogContext) {
    LogManager.getInstance().debug(getSource(context), message, data, context);
    emit('debug', message, data, context);
  },

  info(message: string, data?: unknown, context?: LogContext) {
    LogManager.getInstance().info(getSource(context), message, data, context);
    emit('info', message, data, context);
  },

  warn(message: string, data?: unknown, context?: LogContext) {
    LogManager.getInstance().warn(getSource(context), message, data, context);
    emit('warn', message, data, context);
  },

  error(message: string, data?: unknown, context?: LogContext) {
    LogManager.getInstance().error(getSource(context), message, data, context);
    emit('error', message, data, context);
  }
};
