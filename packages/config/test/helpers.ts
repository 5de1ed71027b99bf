// packages/config/test/helpers.ts
import type { Result } from '@quill/types';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/** 성공 값 추출 (실패면 테스트 실패) */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${String(result.error)}`);
  }
  return result.value;
}

/** 실패 값 추출 (성공이면 테스트 실패) */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('expected failure');
  }
  return result.error;
}

/**
 * 임시 디렉토리에서 콜백 실행
 *
 * 콜백 종료 후 디렉토리 정리.
 */
export function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quill-config-test-'));
  try {
    return fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** 상위 디렉토리까지 만들며 파일 쓰기 */
export function writeFile(filePath: string, content: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
