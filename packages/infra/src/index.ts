// @quill/infra — barrel export

// 에러
export { QuillError, toError } from './errors.js';

// 환경/설정
export { getEnv, isTruthyEnvValue, isLogLevel, getLogLevelEnv } from './env.js';
export {
  WORKSPACE_MARKERS,
  WORKSPACE_CONFIG_DIR,
  CONFIG_FILE_NAME,
  getConfigDir,
  getConfigFilePath,
  findWorkspaceRoot,
  getWorkspaceConfigFilePath,
} from './paths.js';

// 로깅
export {
  createLogger,
  type LoggerConfig,
  type QuillLogger,
} from './logger.js';
