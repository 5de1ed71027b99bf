// packages/infra/src/paths.ts
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { getEnv } from './env.js';

/** 워크스페이스 루트를 표시하는 디렉토리 */
export const WORKSPACE_MARKERS = ['.git', '.svn', '.jj', '.quill'] as const;

/** 워크스페이스 설정 디렉토리 이름 */
export const WORKSPACE_CONFIG_DIR = '.quill';

/** 설정 파일 이름 (전역/워크스페이스 공통) */
export const CONFIG_FILE_NAME = 'config.json5';

/**
 * 전역 설정 디렉토리
 *
 * 우선순위:
 *   1. QUILL_CONFIG_DIR
 *   2. $XDG_CONFIG_HOME/quill
 *   3. ~/.config/quill
 */
export function getConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const explicit = getEnv('CONFIG_DIR', env);
  if (explicit) {
    return path.resolve(explicit);
  }
  const xdg = env.XDG_CONFIG_HOME;
  if (xdg) {
    return path.join(xdg, 'quill');
  }
  return path.join(homedir(), '.config', 'quill');
}

/** 전역 설정 파일 경로 */
export function getConfigFilePath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  return path.join(getConfigDir(env, homedir), CONFIG_FILE_NAME);
}

/**
 * 워크스페이스 루트 탐색
 *
 * cwd에서 상위로 올라가며 WORKSPACE_MARKERS 중 하나를 포함한 첫 디렉토리를 반환.
 * 찾지 못하면 cwd.
 */
export function findWorkspaceRoot(
  cwd: string,
  exists: (p: string) => boolean = fs.existsSync,
): string {
  const start = path.resolve(cwd);
  let dir = start;
  for (;;) {
    if (WORKSPACE_MARKERS.some((marker) => exists(path.join(dir, marker)))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return start;
    }
    dir = parent;
  }
}

/** 워크스페이스 설정 파일 경로 */
export function getWorkspaceConfigFilePath(workspaceRoot: string): string {
  return path.join(workspaceRoot, WORKSPACE_CONFIG_DIR, CONFIG_FILE_NAME);
}
