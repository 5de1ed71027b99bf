// packages/config/src/defaults.ts
import { mergeSettings } from './merge-config.js';
import type { SettingsValue } from './settings-value.js';
import { EditorConfigSchema, type EditorConfig } from './zod-schema.js';

/**
 * 편집기 설정 기본값
 *
 * 문서의 editor 테이블은 이 위에 무제한 깊이로 병합된다.
 */
const EDITOR_DEFAULTS = {
  scrolloff: 5,
  scrollLines: 3,
  mouse: true,
  middleClickPaste: true,
  shell: ['sh', '-c'],
  lineNumber: 'absolute',
  cursorline: false,
  cursorcolumn: false,
  gutters: ['diagnostics', 'spacer', 'lineNumbers', 'spacer', 'diff'],
  autoPairs: true,
  autoCompletion: true,
  autoFormat: true,
  autoSave: false,
  idleTimeout: 250,
  completionTriggerLen: 2,
  autoInfo: true,
  trueColor: false,
  rulers: [],
  bufferline: 'never',
  colorModes: false,
  textWidth: 80,
  cursorShape: {
    normal: 'block',
    insert: 'block',
    select: 'block',
  },
  filePicker: {
    hidden: true,
    followSymlinks: true,
    parents: true,
    ignore: true,
    gitIgnore: true,
    gitGlobal: true,
    gitExclude: true,
  },
  statusline: {
    left: ['mode', 'spinner', 'fileName', 'fileModificationIndicator'],
    center: [],
    right: ['diagnostics', 'selections', 'position', 'fileEncoding'],
    separator: '│',
  },
  lsp: {
    enable: true,
    displayMessages: false,
    autoSignatureHelp: true,
    displaySignatureHelpDocs: true,
  },
  search: {
    smartCase: true,
    wrapAround: true,
  },
  whitespace: {
    render: { space: 'none', nbsp: 'none', tab: 'none', newline: 'none' },
    characters: { space: '·', nbsp: '⍽', tab: '→', newline: '⏎', tabpad: ' ' },
  },
  indentGuides: {
    render: false,
    character: '│',
    skipLevels: 0,
  },
  softWrap: {
    enable: false,
    maxWrap: 20,
    maxIndentRetain: 40,
    wrapIndicator: '↪ ',
  },
} satisfies EditorConfig;

/** 기본값 위에 값을 병합 (값 우선, 무제한 깊이) */
export function applyEditorDefaults(value: SettingsValue | undefined): SettingsValue {
  return mergeSettings(EDITOR_DEFAULTS, value, Infinity) ?? EDITOR_DEFAULTS;
}

/** 기본 편집기 설정 (매 호출마다 새 객체) */
export function getEditorDefaults(): EditorConfig {
  return EditorConfigSchema.parse(EDITOR_DEFAULTS);
}
