/** 결과 타입 -- 에러 핸들링의 명시적 표현 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/** 로그 레벨 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** 설정 문서 계층 -- 전역(global) 또는 워크스페이스(local) */
export type ConfigLayer = 'global' | 'local';

