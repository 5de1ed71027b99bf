// packages/keymap/src/errors.ts
import { QuillError } from '@quill/infra';

/** 키맵 파싱 실패 — 잘못된 키 이름, 알 수 없는 명령 등 */
export class KeymapError extends QuillError {
  /** 문제가 된 항목의 트라이 경로 (예: ['normal', 'g', 'x']) */
  readonly path: readonly string[];

  constructor(message: string, path: readonly string[] = [], opts: { cause?: Error } = {}) {
    super(path.length > 0 ? `${path.join('.')}: ${message}` : message, 'KEYMAP_INVALID', {
      cause: opts.cause,
      details: { path },
    });
    this.name = 'KeymapError';
    this.path = path;
  }
}
