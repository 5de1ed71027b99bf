// packages/infra/src/errors.ts

/** Quill 기본 에러 — 모든 커스텀 에러의 상위 클래스 */
export class QuillError extends Error {
  readonly code: string;
  readonly isOperational: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    opts: {
      isOperational?: boolean;
      cause?: Error;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = 'QuillError';
    this.code = code;
    this.isOperational = opts.isOperational ?? true;
    this.details = opts.details;
  }
}

// ──────────────────────────────────────────────
// 도메인 에러 co-location 원칙:
//   KeymapError → packages/keymap/src/errors.ts
//   ConfigError → packages/config/src/errors.ts
// ──────────────────────────────────────────────

/** unknown 값을 Error로 정규화 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
