// packages/config/src/types.ts
import type { QuillLogger } from '@quill/infra';
import type { Keymaps, Result } from '@quill/types';
import type { ConfigUnavailableError } from './errors.js';
import type { EditorConfig } from './zod-schema.js';

/** 문서 하나의 읽기 결과: 텍스트 또는 가용성 오류 */
export type ConfigSource = Result<string, ConfigUnavailableError>;

/**
 * 최종 해석된 설정
 *
 * *Lang 맵에는 해당 필드를 실제로 지정한 언어만 들어간다.
 */
export interface ResolvedConfig {
  theme?: string;
  themeLang: Map<string, string>;
  keys: Keymaps;
  keysLang: Map<string, Keymaps>;
  editor: EditorConfig;
  editorLang: Map<string, EditorConfig>;
}

/** resolveConfig()에 주입하는 의존성 */
export interface ResolveDeps {
  logger?: Pick<QuillLogger, 'warn' | 'debug'>;
}

/**
 * ConfigDeps -- createConfigIO()에 주입하는 의존성 인터페이스
 *
 * 모두 sync. 경로를 직접 주면 탐색을 건너뛴다.
 */
export interface ConfigDeps extends ResolveDeps {
  fs?: Pick<typeof import('node:fs'), 'readFileSync' | 'existsSync'>;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  cwd?: () => string;
  globalConfigPath?: string;
  workspaceConfigPath?: string;
}
