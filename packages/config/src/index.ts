// @quill/config — barrel export

// 타입
export type {
  ConfigDeps,
  ConfigSource,
  ResolveDeps,
  ResolvedConfig,
} from './types.js';
export type { ConfigIO } from './io.js';
export type { SettingsTable, SettingsValue } from './settings-value.js';
export type { LanguageBase, LanguageResolution } from './languages.js';
export type { LayeredConfig } from './layering.js';

// 에러
export {
  ConfigError,
  ConfigParseError,
  ConfigUnavailableError,
  describeTarget,
  type ConfigIssue,
  type ConfigLoadError,
} from './errors.js';

// 스키마
export {
  EditorConfigSchema,
  RawConfigSchema,
  type EditorConfig,
  type LanguageOverride,
  type RawConfig,
} from './zod-schema.js';
export { SettingsValueSchema } from './settings-value.js';

// 병합 / 구체화
export { SETTINGS_MERGE_DEPTH, mergeSettings, layerSettings } from './merge-config.js';
export { applyEditorDefaults, getEditorDefaults } from './defaults.js';
export {
  collectIssues,
  formatIssuePath,
  materializeEditorConfig,
  summarizeIssues,
} from './validation.js';

// 해석
export { parseConfigDocument } from './parse.js';
export { isSupplied, lastDefined, layerKeys } from './layering.js';
export { indexLanguageOverrides, resolveLanguageOverrides } from './languages.js';
export {
  availableSource,
  defaultConfig,
  resolveConfig,
  resolveConfigOrDefault,
  unavailableSource,
} from './resolve.js';
export { editorConfigFor, keymapsFor, themeFor } from './lookup.js';

// IO
export { resolveGlobalConfigPath, resolveWorkspaceConfigPath } from './paths.js';
export { createConfigIO, loadDefaultConfig, readConfigSource } from './io.js';
