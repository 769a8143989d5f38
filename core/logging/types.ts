export type LogContext = {
  source?: string;
  requestId?: string;
  [key: string]: unknown;
};

export type LogEntryLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogEntryLevel;
  source: string;
  message: string;
  data?: unknown;
  context?: LogContext;
}

export interface ILogAdapter {
  log(entry: LogEntry): void;
}

export type LoggingConfig = {
  logLevel?: string;
  sourceFilters?: Record<string, string>;
  adapters?: string[]; // e.g., ['console', 'memory']
};
