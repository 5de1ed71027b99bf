// packages/config/src/validation.ts
import type { ConfigLayer, Result } from '@quill/types';
import { toError } from '@quill/infra';
import { applyEditorDefaults } from './defaults.js';
import { ConfigParseError, describeTarget, type ConfigIssue } from './errors.js';
import { findReservedKeys, type SettingsValue } from './settings-value.js';
import { EditorConfigSchema, type EditorConfig } from './zod-schema.js';

/** zod 이슈 중 평탄화에 필요한 부분 */
interface IssueLike {
  readonly path: readonly PropertyKey[];
  readonly message: string;
}

/** 이슈 경로 문자열화 (예: `languages[0].theme`) */
export function formatIssuePath(path: readonly PropertyKey[]): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${String(segment)}` : String(segment);
    }
  }
  return out || '(root)';
}

/** zod 이슈를 ConfigIssue[]로 평탄화 */
export function collectIssues(
  issues: readonly IssueLike[],
  prefix: readonly PropertyKey[] = [],
): ConfigIssue[] {
  return issues.map((issue) => ({
    path: formatIssuePath([...prefix, ...issue.path]),
    message: issue.message,
  }));
}

export function summarizeIssues(issues: readonly ConfigIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

/**
 * 편집기 설정 구체화
 *
 * 1. 예약 키 거부 (병합 단계는 예약 키를 건너뛰므로 먼저 검사)
 * 2. 기본값 위에 병합
 * 3. EditorConfigSchema로 검증
 * 4. 실패 시 대상(layer/language) 정보를 붙인 ConfigParseError
 */
export function materializeEditorConfig(
  value: SettingsValue | undefined,
  target: { layer?: ConfigLayer; language?: string } = {},
): Result<EditorConfig, ConfigParseError> {
  const reserved = findReservedKeys(value);
  if (reserved.length > 0) {
    return { ok: false, error: editorError(collectIssues(reserved, ['editor']), target) };
  }

  const result = EditorConfigSchema.safeParse(applyEditorDefaults(value));

  if (result.success) {
    return { ok: true, value: result.data };
  }

  return {
    ok: false,
    error: editorError(collectIssues(result.error.issues, ['editor']), target, toError(result.error)),
  };
}

function editorError(
  issues: ConfigIssue[],
  target: { layer?: ConfigLayer; language?: string },
  cause?: Error,
): ConfigParseError {
  return new ConfigParseError(
    `Invalid editor settings in ${describeTarget(target.layer, target.language)}: ${summarizeIssues(issues)}`,
    { ...target, issues, cause },
  );
}
