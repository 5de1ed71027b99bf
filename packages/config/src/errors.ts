// packages/config/src/errors.ts
import type { ConfigLayer } from '@quill/types';
import { QuillError } from '@quill/infra';

/** 검증 이슈 (경로 + 메시지) */
export interface ConfigIssue {
  path: string;
  message: string;
}

/** 설정 시스템 기본 에러 */
export class ConfigError extends QuillError {
  constructor(
    message: string,
    opts: { code?: string; cause?: Error; details?: Record<string, unknown> } = {},
  ) {
    super(message, opts.code ?? 'CONFIG_ERROR', { cause: opts.cause, details: opts.details });
    this.name = 'ConfigError';
  }
}

/**
 * 구조 오류: 문법 오류, 스키마 위반, 설정 구체화(materialize) 실패
 *
 * 항상 로드 전체를 중단시킨다.
 */
export class ConfigParseError extends ConfigError {
  readonly kind = 'parse';
  /** 오류가 난 문서. 병합 결과에서 발생했으면 undefined */
  readonly layer?: ConfigLayer;
  readonly language?: string;
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    opts: { layer?: ConfigLayer; language?: string; issues?: ConfigIssue[]; cause?: Error } = {},
  ) {
    const issues = opts.issues ?? [];
    super(message, {
      code: 'CONFIG_INVALID',
      cause: opts.cause,
      details: { layer: opts.layer, language: opts.language, issues },
    });
    this.name = 'ConfigParseError';
    this.layer = opts.layer;
    this.language = opts.language;
    this.issues = issues;
  }
}

/**
 * 가용성 오류: 파일 없음, 읽기 실패
 *
 * 해당 문서는 아무것도 기여하지 않는 것으로 취급된다.
 */
export class ConfigUnavailableError extends ConfigError {
  readonly kind = 'unavailable';
  readonly path?: string;

  constructor(path?: string, opts: { cause?: Error } = {}) {
    super(path ? `Config file not available: ${path}` : 'Config file not available', {
      code: 'CONFIG_UNAVAILABLE',
      cause: opts.cause,
      details: { path },
    });
    this.name = 'ConfigUnavailableError';
    this.path = path;
  }
}

export type ConfigLoadError = ConfigParseError | ConfigUnavailableError;

const LAYER_LABELS: Record<ConfigLayer, string> = {
  global: 'global config',
  local: 'workspace config',
};

/** 에러 메시지용 대상 설명 (예: `workspace config (language "rust")`) */
export function describeTarget(layer?: ConfigLayer, language?: string): string {
  const target = layer ? LAYER_LABELS[layer] : 'merged config';
  return language !== undefined ? `${target} (language "${language}")` : target;
}
