// packages/config/src/lookup.ts
import type { Keymaps } from '@quill/types';
import type { ResolvedConfig } from './types.js';
import type { EditorConfig } from './zod-schema.js';

// 언어 전용 값이 있으면 그것, 없으면 기본값

export function themeFor(config: ResolvedConfig, language?: string): string | undefined {
  return (language !== undefined ? config.themeLang.get(language) : undefined) ?? config.theme;
}

export function keymapsFor(config: ResolvedConfig, language?: string): Keymaps {
  return (language !== undefined ? config.keysLang.get(language) : undefined) ?? config.keys;
}

export function editorConfigFor(config: ResolvedConfig, language?: string): EditorConfig {
  return (language !== undefined ? config.editorLang.get(language) : undefined) ?? config.editor;
}
