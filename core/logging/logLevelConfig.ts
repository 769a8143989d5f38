import { isDebugEnabled } from '../../utils/logging/debugFlags';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'none';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'none'];
const LOG_LEVEL_NUM: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 5,
};

interface LogLevelConfig {
  global: LogLevel;
  modules: Record<string, LogLevel>;
  environment: 'development' | 'production' | 'test';
}

function resolveEnvironment(): LogLevelConfig['environment'] {
  const nodeEnv = process.env.NODE_ENV;
  if (nodeEnv === 'production' || nodeEnv === 'test') {
    return nodeEnv;
  }
  return 'development';
}

const env = resolveEnvironment();

function defaultGlobalLevel(environment: LogLevelConfig['environment']): LogLevel {
  switch (environment) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

const defaultConfig: LogLevelConfig = {
  global: defaultGlobalLevel(env),
  modules: {},
  environment: env,
};

let config: LogLevelConfig = { ...defaultConfig, modules: {} };

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Parses a level name case-insensitively; unknown names yield undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export function getLogLevel(moduleName?: string): LogLevel {
  if (moduleName && config.modules[moduleName]) {
    return config.modules[moduleName];
  }
  return config.global;
}

export function setLogLevel(level: LogLevel, moduleName?: string) {
  if (moduleName) {
    config.modules[moduleName] = level;
  } else {
    config.global = level;
  }
}

export function isLogLevelEnabled(moduleName: string, level: LogLevel): boolean {
  if (level === 'none') return false;
  // A debug flag lowers the module threshold to at least 'debug'
  if (isDebugEnabled(moduleName)) {
    return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM['debug'];
  }
  const configuredLevel = config.modules[moduleName] || config.global;
  return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM[configuredLevel];
}

export function resetLogLevelConfig(): void {
  config = { ...defaultConfig, modules: {} };
}
