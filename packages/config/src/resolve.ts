// packages/config/src/resolve.ts
import type { ConfigLayer, Result } from '@quill/types';
import { toError } from '@quill/infra';
import { defaultKeymap } from '@quill/keymap';
import type { ConfigSource, ResolveDeps, ResolvedConfig } from './types.js';
import type { RawConfig } from './zod-schema.js';
import { getEditorDefaults } from './defaults.js';
import {
  ConfigUnavailableError,
  type ConfigLoadError,
  type ConfigParseError,
} from './errors.js';
import { resolveLanguageOverrides } from './languages.js';
import { lastDefined, layerKeys, type LayeredConfig } from './layering.js';
import { layerSettings } from './merge-config.js';
import { parseConfigDocument } from './parse.js';
import { materializeEditorConfig } from './validation.js';

/** 문서 하나를 파싱까지 마친 상태 */
type DocumentOutcome =
  | { kind: 'parsed'; config: RawConfig }
  | { kind: 'malformed'; error: ConfigParseError }
  | { kind: 'unavailable'; error: ConfigUnavailableError };

/**
 * 두 문서 결과의 조합 (닫힌 4가지 경우)
 *
 * 1. malformed: 어느 쪽이든 구조 오류면 실패 (global 우선)
 * 2. both: 둘 다 파싱됨
 * 3. single: 한쪽만 파싱됨, 다른 쪽은 가용성 오류
 * 4. none: 둘 다 가용성 오류 (global의 오류)
 */
type Precedence =
  | { case: 'malformed'; error: ConfigParseError }
  | { case: 'both'; global: RawConfig; local: RawConfig }
  | { case: 'single'; layered: LayeredConfig }
  | { case: 'none'; error: ConfigUnavailableError };

export function availableSource(text: string): ConfigSource {
  return { ok: true, value: text };
}

export function unavailableSource(path?: string, cause?: unknown): ConfigSource {
  return {
    ok: false,
    error: new ConfigUnavailableError(path, {
      cause: cause === undefined ? undefined : toError(cause),
    }),
  };
}

function readDocument(source: ConfigSource, layer: ConfigLayer): DocumentOutcome {
  if (!source.ok) {
    return { kind: 'unavailable', error: source.error };
  }
  const parsed = parseConfigDocument(source.value, layer);
  return parsed.ok
    ? { kind: 'parsed', config: parsed.value }
    : { kind: 'malformed', error: parsed.error };
}

function classify(global: DocumentOutcome, local: DocumentOutcome): Precedence {
  if (global.kind === 'malformed') {
    return { case: 'malformed', error: global.error };
  }
  if (local.kind === 'malformed') {
    return { case: 'malformed', error: local.error };
  }
  if (global.kind === 'parsed' && local.kind === 'parsed') {
    return { case: 'both', global: global.config, local: local.config };
  }
  if (global.kind === 'parsed') {
    return { case: 'single', layered: { layer: 'global', config: global.config } };
  }
  if (local.kind === 'parsed') {
    return { case: 'single', layered: { layer: 'local', config: local.config } };
  }
  return { case: 'none', error: global.error };
}

/** 파싱된 문서들을 순서대로 쌓아 최종 설정 생성 */
function resolveLayers(
  layers: readonly LayeredConfig[],
  deps: ResolveDeps,
): Result<ResolvedConfig, ConfigParseError> {
  const theme = lastDefined(layers.map(({ config }) => config.theme));
  const keys = layerKeys(
    defaultKeymap(),
    layers.map(({ config }) => config.keys),
  );
  const editorRaw = layerSettings(
    undefined,
    layers.map(({ config }) => config.editor),
  );

  const editorLayers = layers.filter(({ config }) => config.editor !== undefined);
  const editor = materializeEditorConfig(editorRaw, {
    layer: editorLayers.length === 1 ? editorLayers[0].layer : undefined,
  });
  if (!editor.ok) {
    return editor;
  }

  const languages = resolveLanguageOverrides(layers, { keys, editorRaw }, deps);
  if (!languages.ok) {
    return languages;
  }

  return {
    ok: true,
    value: { theme, keys, editor: editor.value, ...languages.value },
  };
}

/**
 * global/workspace 문서를 하나의 설정으로 해석
 *
 * 구조 오류는 항상 전체 실패. 가용성 오류는 해당 문서가 기여하지 않는 것으로 취급하되,
 * 둘 다 가용성 오류면 global 쪽 오류를 돌려준다.
 */
export function resolveConfig(
  global: ConfigSource,
  local: ConfigSource,
  deps: ResolveDeps = {},
): Result<ResolvedConfig, ConfigLoadError> {
  const precedence = classify(readDocument(global, 'global'), readDocument(local, 'local'));

  switch (precedence.case) {
    case 'malformed':
    case 'none':
      return { ok: false, error: precedence.error };
    case 'both':
      return resolveLayers(
        [
          { layer: 'global', config: precedence.global },
          { layer: 'local', config: precedence.local },
        ],
        deps,
      );
    case 'single':
      return resolveLayers([precedence.layered], deps);
  }
}

/** 가용성 오류만 있는 경우 기본 설정으로 대체. 구조 오류는 그대로 전달 */
export function resolveConfigOrDefault(
  global: ConfigSource,
  local: ConfigSource,
  deps: ResolveDeps = {},
): Result<ResolvedConfig, ConfigParseError> {
  const result = resolveConfig(global, local, deps);
  if (result.ok) {
    return result;
  }

  const { error } = result;
  if (error.kind === 'parse') {
    return { ok: false, error };
  }

  deps.logger?.debug(`${error.message}; using built-in defaults`);
  return { ok: true, value: defaultConfig() };
}

/** 문서 없이 해석한 설정 (기본 키맵, 기본 편집기 설정, 빈 언어 맵) */
export function defaultConfig(): ResolvedConfig {
  return {
    theme: undefined,
    themeLang: new Map(),
    keys: defaultKeymap(),
    keysLang: new Map(),
    editor: getEditorDefaults(),
    editorLang: new Map(),
  };
}
