// packages/infra/src/env.ts
import type { LogLevel } from '@quill/types';

const QUILL_PREFIX = 'QUILL_';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * 환경 변수 조회
 *
 * QUILL_ 접두사를 우선 검색하고, 없으면 접두사 없는 키를 검색.
 * 빈 문자열은 설정되지 않은 것으로 취급한다.
 */
export function getEnv(
  key: string,
  env: NodeJS.ProcessEnv = process.env,
  fallback?: string,
): string | undefined {
  return nonEmpty(env[`${QUILL_PREFIX}${key}`]) ?? nonEmpty(env[key]) ?? fallback;
}

/** truthy 환경 변수 판별 ('1', 'true', 'yes') */
export function isTruthyEnvValue(value: string | undefined): boolean {
  return value != null && ['1', 'true', 'yes'].includes(value.toLowerCase());
}

/** 로그 레벨 문자열 판별 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** QUILL_LOG_LEVEL 조회. 잘못된 값이면 fallback */
export function getLogLevelEnv(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = 'info',
): LogLevel {
  const value = getEnv('LOG_LEVEL', env)?.toLowerCase();
  return isLogLevel(value) ? value : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}
