/**
 * ロガー
 *
 * - 標準エラー出力（画面の本文出力を汚さない）
 * - <logDir>/persona-desk.log への追記
 */

import * as path from 'path';
import winston from 'winston';
import type { AgentLogger, LogLevel } from '@persona-desk/persona-spec';
import { redactRecord, redactSecrets } from './redact';

const { combine, timestamp, printf, errors, json } = winston.format;

export const LOG_FILE_NAME = 'persona-desk.log';

export interface LoggerOptions {
  level?: LogLevel;
  /** 未指定ならファイル出力なし */
  logDir?: string;
  /** テスト等で全出力を止める */
  silent?: boolean;
}

/**
 * 画面向けの1行: "<時刻> <level>: [component][traceId] message {残りのメタ}"
 */
export function formatConsoleLine(
  timestamp: unknown,
  level: string,
  message: unknown,
  meta: Record<string, unknown>
): string {
  const { component, traceId, ...rest } = meta;
  const prefix = [component, traceId].filter((p) => typeof p === 'string' && p.length > 0);
  const contextPrefix = prefix.length > 0 ? `[${prefix.join('][')}] ` : '';
  const extraData = Object.keys(rest).length > 0 ? ` ${JSON.stringify(redactSecrets(rest))}` : '';
  return `${String(timestamp)} ${level}: ${contextPrefix}${String(message)}${extraData}`;
}

const consoleFormat = printf(({ level, message, timestamp, ...meta }) =>
  formatConsoleLine(timestamp, level, message, meta)
);

/**
 * winston ロガーを AgentLogger に包む
 */
function wrap(logger: winston.Logger): AgentLogger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (data) {
      logger.log(level, message, redactRecord(data));
    } else {
      logger.log(level, message);
    }
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (meta) => wrap(logger.child(meta)),
  };
}

/**
 * ロガー作成
 */
export function createLogger(options: LoggerOptions = {}): AgentLogger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), consoleFormat),
    }),
  ];

  if (options.logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, LOG_FILE_NAME),
        format: combine(timestamp(), json()),
      })
    );
  }

  const logger = winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: errors({ stack: true }),
    transports,
  });

  return wrap(logger);
}

/**
 * 何も出力しないロガー
 */
export function createSilentLogger(): AgentLogger {
  return createLogger({ silent: true });
}
