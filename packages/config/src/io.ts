// packages/config/src/io.ts
import type { ConfigLayer, Result } from '@quill/types';
import { createLogger, getLogLevelEnv } from '@quill/infra';
import * as fs from 'node:fs';
import type { ConfigDeps, ConfigSource, ResolvedConfig } from './types.js';
import { describeTarget, type ConfigLoadError, type ConfigParseError } from './errors.js';
import { resolveGlobalConfigPath, resolveWorkspaceConfigPath } from './paths.js';
import { resolveConfig, resolveConfigOrDefault, unavailableSource } from './resolve.js';

/** ConfigIO — 설정 파일 읽기 파사드 */
export interface ConfigIO {
  /** 두 파일을 읽어 해석. 둘 다 없으면 가용성 오류 */
  loadConfig(): Result<ResolvedConfig, ConfigLoadError>;
  /** 두 파일을 읽어 해석. 가용성 오류만 있으면 기본 설정 */
  loadConfigOrDefault(): Result<ResolvedConfig, ConfigParseError>;
  readonly globalConfigPath: string;
  readonly workspaceConfigPath: string;
}

/** 파일 읽기. 어떤 읽기 실패든 가용성 오류 */
export function readConfigSource(
  filePath: string,
  fsModule: Pick<typeof fs, 'readFileSync'> = fs,
): ConfigSource {
  try {
    return { ok: true, value: fsModule.readFileSync(filePath, 'utf-8') };
  } catch (err) {
    return unavailableSource(filePath, err);
  }
}

/**
 * ConfigIO 팩토리
 *
 * 1. 경로 결정 (주입값 → 환경변수 → 디렉토리 탐색)
 * 2. 파일 읽기 (없음 = 가용성 오류)
 * 3. resolveConfig
 */
export function createConfigIO(deps: ConfigDeps = {}): ConfigIO {
  const fsModule = deps.fs ?? fs;
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? (() => process.cwd());
  const globalConfigPath = deps.globalConfigPath ?? resolveGlobalConfigPath(env, deps.homedir);
  const workspaceConfigPath =
    deps.workspaceConfigPath ??
    resolveWorkspaceConfigPath(cwd(), (p) => fsModule.existsSync(p));
  const logger = deps.logger;

  function readSource(filePath: string, layer: ConfigLayer): ConfigSource {
    const source = readConfigSource(filePath, fsModule);
    if (!source.ok) {
      logger?.debug(`${describeTarget(layer)} not available: ${filePath}`);
    }
    return source;
  }

  function readSources(): [ConfigSource, ConfigSource] {
    return [readSource(globalConfigPath, 'global'), readSource(workspaceConfigPath, 'local')];
  }

  function loadConfig(): Result<ResolvedConfig, ConfigLoadError> {
    const [global, local] = readSources();
    const result = resolveConfig(global, local, { logger });
    if (!result.ok && result.error.kind === 'parse') {
      logger?.warn(result.error.message);
    }
    return result;
  }

  function loadConfigOrDefault(): Result<ResolvedConfig, ConfigParseError> {
    const [global, local] = readSources();
    const result = resolveConfigOrDefault(global, local, { logger });
    if (!result.ok) {
      logger?.warn(result.error.message);
    }
    return result;
  }

  return {
    loadConfig,
    loadConfigOrDefault,
    get globalConfigPath() {
      return globalConfigPath;
    },
    get workspaceConfigPath() {
      return workspaceConfigPath;
    },
  };
}

/**
 * 기본 경로에서 설정 로드
 *
 * logger를 주지 않으면 QUILL_LOG_LEVEL 레벨의 'config' 로거를 만든다.
 */
export function loadDefaultConfig(deps: ConfigDeps = {}): Result<ResolvedConfig, ConfigLoadError> {
  const logger =
    deps.logger ?? createLogger({ name: 'config', level: getLogLevelEnv(deps.env ?? process.env) });
  return createConfigIO({ ...deps, logger }).loadConfig();
}
