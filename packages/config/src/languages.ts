// packages/config/src/languages.ts
import type { ConfigLayer, Keymaps, Result } from '@quill/types';
import type { ConfigParseError } from './errors.js';
import type { ResolveDeps } from './types.js';
import type { EditorConfig, LanguageOverride } from './zod-schema.js';
import { describeTarget } from './errors.js';
import { isSupplied, lastDefined, layerKeys, type LayeredConfig } from './layering.js';
import { layerSettings } from './merge-config.js';
import type { SettingsValue } from './settings-value.js';
import { materializeEditorConfig } from './validation.js';

/** 언어별 override가 얹힐 기본 해석 결과 */
export interface LanguageBase {
  keys: Keymaps;
  editorRaw?: SettingsValue;
}

export interface LanguageResolution {
  themeLang: Map<string, string>;
  keysLang: Map<string, Keymaps>;
  editorLang: Map<string, EditorConfig>;
}

interface ScopedOverride {
  layer: ConfigLayer;
  override: LanguageOverride;
}

/**
 * 문서의 languages 목록을 이름으로 색인
 *
 * 같은 이름이 여러 번 나오면 마지막 엔트리가 이긴다.
 */
export function indexLanguageOverrides(
  layered: LayeredConfig,
  deps: ResolveDeps = {},
): Map<string, LanguageOverride> {
  const index = new Map<string, LanguageOverride>();
  for (const override of layered.config.languages ?? []) {
    if (index.has(override.name)) {
      deps.logger?.warn(
        `Duplicate language "${override.name}" in ${describeTarget(layered.layer)}; the last entry wins`,
      );
    }
    index.set(override.name, override);
  }
  return index;
}

/**
 * 언어별 override 해석
 *
 * 이름은 처음 등장한 순서(global → local)로 방문한다.
 * 각 필드는 어떤 override가 그 필드를 비어 있지 않게 지정했을 때만 결과에 들어간다.
 * 구체화 실패는 언어 이름이 붙은 구조 오류로 전체 로드를 중단시킨다.
 */
export function resolveLanguageOverrides(
  layers: readonly LayeredConfig[],
  base: LanguageBase,
  deps: ResolveDeps = {},
): Result<LanguageResolution, ConfigParseError> {
  const indexes = layers.map((layered) => ({
    layer: layered.layer,
    overrides: indexLanguageOverrides(layered, deps),
  }));
  const names = new Set(indexes.flatMap((index) => [...index.overrides.keys()]));

  const resolution: LanguageResolution = {
    themeLang: new Map(),
    keysLang: new Map(),
    editorLang: new Map(),
  };

  for (const name of names) {
    const scoped = indexes.flatMap((index): ScopedOverride[] => {
      const override = index.overrides.get(name);
      return override ? [{ layer: index.layer, override }] : [];
    });

    const theme = lastDefined(scoped.map(({ override }) => override.theme));
    if (theme !== undefined) {
      resolution.themeLang.set(name, theme);
    }

    if (scoped.some(({ override }) => isSupplied(override.keys))) {
      resolution.keysLang.set(
        name,
        layerKeys(
          base.keys,
          scoped.map(({ override }) => override.keys),
        ),
      );
    }

    const editorLayers = scoped.filter(({ override }) => isSupplied(override.editor));
    if (editorLayers.length > 0) {
      const editor = materializeEditorConfig(
        layerSettings(
          base.editorRaw,
          scoped.map(({ override }) => override.editor),
        ),
        {
          layer: editorLayers.length === 1 ? editorLayers[0].layer : undefined,
          language: name,
        },
      );
      if (!editor.ok) {
        return editor;
      }
      resolution.editorLang.set(name, editor.value);
    }
  }

  return { ok: true, value: resolution };
}
