/**
 * Logger - console 기반 scope 로거
 * 출력 형식: [Scope] message
 * 레벨은 인자 > NODEPICK_LOG_LEVEL 환경변수 > DEFAULTS.LOG_LEVEL 순으로 결정
 */
import { DEFAULTS, LOG_LEVELS } from '@nodepick/shared';
import type { LogLevel } from '@nodepick/shared';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** 환경변수에서 로그 레벨 조회 (잘못된 값은 기본값) */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = (env[DEFAULTS.LOG_LEVEL_ENV] ?? '').toLowerCase();
  return isLogLevel(value) ? value : DEFAULTS.LOG_LEVEL;
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (target: LogLevel) => LOG_LEVELS.indexOf(target) >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled('info')) console.info(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`);
    },
    error: (message) => {
      if (enabled('error')) console.error(`${prefix} ${message}`);
    },
  };
}
