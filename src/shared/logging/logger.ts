import type { LogLevel } from '../config/index';
import { getCurrentConfig } from '../config/index';

/**
 * ロガー
 *
 * console への薄いラッパー。出力レベルは observability.logging.level に従う。
 * ドメイン層からは使わない（アプリケーション層・プレゼンテーション層専用）。
 */

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export type LogContext = Record<string, unknown>;

/**
 * 出力先（テストで差し替え可能）
 */
export interface LogSink {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const consoleSink: LogSink = {
  debug: (message, context) => console.debug(message, context ?? ''),
  info: (message, context) => console.info(message, context ?? ''),
  warn: (message, context) => console.warn(message, context ?? ''),
  error: (message, context) => console.error(message, context ?? '')
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** 監査ログ（enableAuditLog が false なら出力しない） */
  audit(action: string, context: LogContext): void;
}

export interface LoggerOptions {
  /** 指定しない場合は呼び出しごとに現在の設定を参照する */
  level?: LogLevel;
  enableAuditLog?: boolean;
  sink?: LogSink;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;

  const currentLevel = (): LogLevel =>
    options.level ?? getCurrentConfig().observability.logging.level;

  const auditEnabled = (): boolean =>
    options.enableAuditLog ?? getCurrentConfig().observability.logging.enableAuditLog;

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) {
      return;
    }
    sink[level](`[${scope}] ${message}`, context);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    audit: (action, context) => {
      if (!auditEnabled() || currentLevel() === 'silent') {
        return;
      }
      sink.info(`[${scope}] audit: ${action}`, context);
    }
  };
}
