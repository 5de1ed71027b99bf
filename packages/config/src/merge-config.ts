// packages/config/src/merge-config.ts
import {
  isSettingsTable,
  RESERVED_KEYS,
  type SettingsTable,
  type SettingsValue,
} from './settings-value.js';

/** 편집기 설정 병합 깊이 */
export const SETTINGS_MERGE_DEPTH = 3;

/**
 * 깊이 제한 deep merge
 *
 * - 한쪽이 undefined: 다른 쪽 그대로
 * - 테이블 + 테이블, 남은 깊이 > 0: 키별 재귀 병합 (깊이 - 1)
 * - 그 외 (깊이 소진, 배열, 원시값): override 우선
 * - 프로토타입 오염 방지, 입력 불변
 */
export function mergeSettings(
  base: SettingsValue | undefined,
  override: SettingsValue | undefined,
  depth: number,
): SettingsValue | undefined {
  if (override === undefined) {
    return base;
  }
  if (base === undefined) {
    return override;
  }
  return mergeDefined(base, override, depth);
}

function mergeDefined(base: SettingsValue, override: SettingsValue, depth: number): SettingsValue {
  if (depth <= 0 || !isSettingsTable(base) || !isSettingsTable(override)) {
    return override;
  }

  const result: SettingsTable = { ...base };
  for (const key of Object.keys(override)) {
    if (RESERVED_KEYS.has(key)) {
      continue;
    }
    const value = override[key];
    result[key] = Object.hasOwn(result, key) ? mergeDefined(result[key], value, depth - 1) : value;
  }
  return result;
}

/** 여러 override를 순서대로 base 위에 쌓는다 */
export function layerSettings(
  base: SettingsValue | undefined,
  overrides: readonly (SettingsValue | undefined)[],
  depth: number = SETTINGS_MERGE_DEPTH,
): SettingsValue | undefined {
  return overrides.reduce<SettingsValue | undefined>(
    (acc, override) => mergeSettings(acc, override, depth),
    base,
  );
}
