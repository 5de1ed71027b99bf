// packages/config/src/zod-schema.ts
import { z } from 'zod/v4';
import { KeymapOverridesSchema } from '@quill/keymap';
import { SettingsDocumentSchema } from './settings-value.js';

/** 단일 문자 (공백 렌더링 문자, 자동 괄호 쌍 등) */
const CharSchema = z.string().length(1);

/** 커서 모양 */
const CursorKindSchema = z.enum(['block', 'bar', 'underline', 'hidden']);

const GutterSchema = z.enum(['diagnostics', 'spacer', 'lineNumbers', 'diff']);

/** 상태줄 요소 */
const StatusLineElementSchema = z.enum([
  'mode',
  'spinner',
  'fileName',
  'fileModificationIndicator',
  'fileEncoding',
  'fileType',
  'diagnostics',
  'selections',
  'position',
  'positionPercentage',
  'totalLineNumbers',
  'separator',
  'spacer',
]);

const WhitespaceRenderValueSchema = z.enum(['none', 'all']);

/** 'all' | 'none' 일괄 지정 또는 문자 종류별 지정 */
const WhitespaceRenderSchema = z.union([
  WhitespaceRenderValueSchema,
  z.strictObject({
    space: WhitespaceRenderValueSchema,
    nbsp: WhitespaceRenderValueSchema,
    tab: WhitespaceRenderValueSchema,
    newline: WhitespaceRenderValueSchema,
  }),
]);

const FilePickerSchema = z.strictObject({
  hidden: z.boolean(),
  followSymlinks: z.boolean(),
  parents: z.boolean(),
  ignore: z.boolean(),
  gitIgnore: z.boolean(),
  gitGlobal: z.boolean(),
  gitExclude: z.boolean(),
});

const StatusLineSchema = z.strictObject({
  left: z.array(StatusLineElementSchema),
  center: z.array(StatusLineElementSchema),
  right: z.array(StatusLineElementSchema),
  separator: z.string(),
});

const LspSchema = z.strictObject({
  enable: z.boolean(),
  displayMessages: z.boolean(),
  autoSignatureHelp: z.boolean(),
  displaySignatureHelpDocs: z.boolean(),
});

const SearchSchema = z.strictObject({
  smartCase: z.boolean(),
  wrapAround: z.boolean(),
});

const WhitespaceSchema = z.strictObject({
  render: WhitespaceRenderSchema,
  characters: z.strictObject({
    space: CharSchema,
    nbsp: CharSchema,
    tab: CharSchema,
    newline: CharSchema,
    tabpad: CharSchema,
  }),
});

const IndentGuidesSchema = z.strictObject({
  render: z.boolean(),
  character: CharSchema,
  skipLevels: z.number().int().min(0),
});

const SoftWrapSchema = z.strictObject({
  enable: z.boolean(),
  maxWrap: z.number().int().min(0),
  maxIndentRetain: z.number().int().min(0),
  wrapIndicator: z.string(),
});

/**
 * 구체화된 편집기 설정 스키마
 *
 * 모든 필드 필수. 기본값 병합 후에 검증한다.
 */
export const EditorConfigSchema = z.strictObject({
  scrolloff: z.number().int().min(0),
  scrollLines: z.number().int(),
  mouse: z.boolean(),
  middleClickPaste: z.boolean(),
  shell: z.array(z.string()).min(1),
  lineNumber: z.enum(['absolute', 'relative']),
  cursorline: z.boolean(),
  cursorcolumn: z.boolean(),
  gutters: z.array(GutterSchema),
  autoPairs: z.union([z.boolean(), z.record(CharSchema, CharSchema)]),
  autoCompletion: z.boolean(),
  autoFormat: z.boolean(),
  autoSave: z.boolean(),
  idleTimeout: z.number().int().min(0),
  completionTriggerLen: z.number().int().min(1),
  autoInfo: z.boolean(),
  trueColor: z.boolean(),
  rulers: z.array(z.number().int().min(1)),
  bufferline: z.enum(['never', 'always', 'multiple']),
  colorModes: z.boolean(),
  textWidth: z.number().int().min(1),
  cursorShape: z.strictObject({
    normal: CursorKindSchema,
    insert: CursorKindSchema,
    select: CursorKindSchema,
  }),
  filePicker: FilePickerSchema,
  statusline: StatusLineSchema,
  lsp: LspSchema,
  search: SearchSchema,
  whitespace: WhitespaceSchema,
  indentGuides: IndentGuidesSchema,
  softWrap: SoftWrapSchema,
});

export type EditorConfig = z.infer<typeof EditorConfigSchema>;

const ThemeNameSchema = z.string().min(1);

/** 언어별 override 엔트리 */
const LanguageOverrideSchema = z.strictObject({
  name: z.string().min(1),
  theme: ThemeNameSchema.optional(),
  keys: KeymapOverridesSchema.optional(),
  editor: SettingsDocumentSchema.optional(),
});

/**
 * 설정 문서 스키마 (global / workspace 공통)
 *
 * editor는 구조와 예약 키만 검사하고 필드 검증은 병합 후 구체화 단계에서 한다.
 */
export const RawConfigSchema = z.strictObject({
  theme: ThemeNameSchema.optional(),
  keys: KeymapOverridesSchema.optional(),
  editor: SettingsDocumentSchema.optional(),
  languages: z.array(LanguageOverrideSchema).optional(),
});

export type RawConfig = z.output<typeof RawConfigSchema>;
export type LanguageOverride = z.output<typeof LanguageOverrideSchema>;
