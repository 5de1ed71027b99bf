// packages/config/src/parse.ts
import type { ConfigLayer, Result } from '@quill/types';
import { toError } from '@quill/infra';
import JSON5 from 'json5';
import { ConfigParseError, describeTarget } from './errors.js';
import { collectIssues, summarizeIssues } from './validation.js';
import { RawConfigSchema, type RawConfig } from './zod-schema.js';

/**
 * 설정 문서 하나를 파싱
 *
 * 빈 문서(공백만 있는 경우 포함)는 `{}`와 같다.
 * 문법 오류와 스키마 위반 모두 구조 오류.
 */
export function parseConfigDocument(
  text: string,
  layer: ConfigLayer,
): Result<RawConfig, ConfigParseError> {
  let data: unknown = {};

  if (text.trim() !== '') {
    try {
      data = JSON5.parse(text);
    } catch (err) {
      const cause = toError(err);
      return {
        ok: false,
        error: new ConfigParseError(`Invalid ${describeTarget(layer)}: ${cause.message}`, {
          layer,
          cause,
        }),
      };
    }
  }

  const result = RawConfigSchema.safeParse(data);
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const issues = collectIssues(result.error.issues);
  return {
    ok: false,
    error: new ConfigParseError(`Invalid ${describeTarget(layer)}: ${summarizeIssues(issues)}`, {
      layer,
      issues,
      cause: toError(result.error),
    }),
  };
}
