import type { LogLevel } from '@quill/types';
// packages/infra/src/logger.ts
import { Logger as TsLogger } from 'tslog';
import { isTruthyEnvValue } from './env.js';

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  console?: {
    enabled: boolean;
    pretty?: boolean; // 기본: !isCI
  };
  redactKeys?: string[];
}

export interface QuillLogger {
  trace(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  fatal(msg: string, ...args: unknown[]): void;
  child(name: string): QuillLogger;
}

const DEFAULT_REDACT_KEYS = ['token', 'password', 'secret', 'apiKey', 'api_key', 'authorization'];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** Quill 로거 팩토리 (기본 구현) */
export function createLogger(config: LoggerConfig): QuillLogger {
  const isCI = isTruthyEnvValue(process.env.CI);
  const enabled = config.console?.enabled ?? true;
  const pretty = config.console?.pretty ?? !isCI;

  const tsLogger = new TsLogger({
    name: config.name,
    minLevel: LOG_LEVEL_MAP[config.level ?? 'info'],
    type: enabled ? (pretty ? 'pretty' : 'json') : 'hidden',
    maskValuesOfKeys: config.redactKeys ?? DEFAULT_REDACT_KEYS,
    hideLogPositionForProduction: true,
  });

  return wrapLogger(tsLogger);
}

/** tslog 인스턴스를 QuillLogger로 래핑 */
function wrapLogger(tsLogger: TsLogger<unknown>): QuillLogger {
  return {
    trace: (msg, ...args) => tsLogger.trace(msg, ...args),
    debug: (msg, ...args) => tsLogger.debug(msg, ...args),
    info: (msg, ...args) => tsLogger.info(msg, ...args),
    warn: (msg, ...args) => tsLogger.warn(msg, ...args),
    error: (msg, ...args) => tsLogger.error(msg, ...args),
    fatal: (msg, ...args) => tsLogger.fatal(msg, ...args),
    child: (name: string) => wrapLogger(tsLogger.getSubLogger({ name })),
  };
}
