// packages/config/src/paths.ts
import { findWorkspaceRoot, getConfigFilePath, getWorkspaceConfigFilePath } from '@quill/infra';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * 전역 설정 파일 경로 해석
 *
 * 우선순위:
 *   1. QUILL_CONFIG 환경변수
 *   2. <설정 디렉토리>/config.json5 (infra getConfigDir 참고)
 */
export function resolveGlobalConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const envPath = env.QUILL_CONFIG;
  if (envPath) {
    return path.resolve(envPath);
  }
  return getConfigFilePath(env, homedir);
}

/** 워크스페이스 설정 파일 경로: <워크스페이스 루트>/.quill/config.json5 */
export function resolveWorkspaceConfigPath(
  cwd: string = process.cwd(),
  exists: (p: string) => boolean = fs.existsSync,
): string {
  return getWorkspaceConfigFilePath(findWorkspaceRoot(cwd, exists));
}
