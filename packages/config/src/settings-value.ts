// packages/config/src/settings-value.ts
import { z } from 'zod/v4';

/** 타입이 정해지지 않은 구조화 설정 값 (스칼라/시퀀스/테이블 트리) */
export type SettingsValue = string | number | boolean | null | SettingsValue[] | SettingsTable;

export interface SettingsTable {
  [key: string]: SettingsValue;
}

export const SettingsValueSchema: z.ZodType<SettingsValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(SettingsValueSchema),
    z.record(z.string(), SettingsValueSchema),
  ]),
);

/** 설정 트리에 쓸 수 없는 키 (객체 프로토타입 관련) */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([
  '__proto__',
  'constructor',
  'prototype',
]);

export interface ReservedKeyIssue {
  readonly path: PropertyKey[];
  readonly message: string;
}

/** 입력 트리 전체에서 예약 키를 찾아 경로와 함께 나열 */
export function findReservedKeys(value: unknown, path: PropertyKey[] = []): ReservedKeyIssue[] {
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => findReservedKeys(item, [...path, index]));
  }
  if (typeof value !== 'object' || value === null) {
    return [];
  }
  const issues: ReservedKeyIssue[] = [];
  for (const [key, child] of Object.entries(value)) {
    if (RESERVED_KEYS.has(key)) {
      issues.push({ path: [...path, key], message: `Reserved key "${key}" is not allowed` });
      continue;
    }
    issues.push(...findReservedKeys(child, [...path, key]));
  }
  return issues;
}

/**
 * 문서의 editor 값 스키마
 *
 * 예약 키가 있으면 해당 경로의 이슈로 거부하고, 없으면 SettingsValue로 검사.
 */
export const SettingsDocumentSchema = z
  .unknown()
  .superRefine((value, ctx) => {
    for (const issue of findReservedKeys(value)) {
      ctx.addIssue({ code: 'custom', message: issue.message, path: issue.path, input: value });
    }
  })
  .pipe(SettingsValueSchema);

export function isSettingsTable(value: SettingsValue | undefined): value is SettingsTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
