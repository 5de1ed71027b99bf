// packages/config/src/layering.ts
import type { ConfigLayer, KeymapOverrides, Keymaps } from '@quill/types';
import { mergeKeys } from '@quill/keymap';
import type { RawConfig } from './zod-schema.js';

/** 파싱된 문서 + 출처. 배열 순서 = 우선순위 오름차순 ([global, local]) */
export interface LayeredConfig {
  layer: ConfigLayer;
  config: RawConfig;
}

/** 마지막으로 정의된 값 */
export function lastDefined<T>(values: readonly (T | undefined)[]): T | undefined {
  return values.reduce<T | undefined>((acc, value) => value ?? acc, undefined);
}

/** 키맵 override를 순서대로 base 위에 쌓는다 */
export function layerKeys(base: Keymaps, overrides: readonly (KeymapOverrides | undefined)[]): Keymaps {
  return overrides.reduce<Keymaps>((acc, override) => mergeKeys(acc, override), base);
}

/**
 * 언어 필드가 실제로 지정됐는지 여부
 *
 * 없거나 빈 테이블(`{}`)이면 지정되지 않은 것으로 본다.
 */
export function isSupplied(value: unknown): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}
