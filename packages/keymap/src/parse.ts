// packages/keymap/src/parse.ts
import type { KeyTrie, KeyTrieNode, KeymapOverrides, Mode } from '@quill/types';
import { z } from 'zod/v4';
import { isKnownCommand } from './commands.js';
import { KeymapError } from './errors.js';
import { normalizeKey } from './key-event.js';
import { MODES } from './modes.js';
import { createNode } from './trie.js';

/**
 * 설정 문서의 키맵 입력 형태: 문자열=명령, 배열=시퀀스, 객체=노드
 *
 * 불리언은 `$sticky` 메타 항목에서만 의미가 있다.
 */
export type KeyTrieInput = string | string[] | boolean | { [key: string]: KeyTrieInput };

export type KeyTableInput = Record<string, KeyTrieInput>;

const KeyTrieInputSchema: z.ZodType<KeyTrieInput> = z.lazy(() =>
  z.union([
    z.string(),
    z.array(z.string()),
    z.boolean(),
    z.record(z.string(), KeyTrieInputSchema),
  ]),
);

/** 모드 루트는 반드시 테이블 */
export const KeyTableInputSchema = z.record(z.string(), KeyTrieInputSchema);

export interface ParseKeymapOptions {
  /** `$name`(노드 이름), `$sticky` 메타 항목 허용 (내장 기본 키맵 전용) */
  allowMeta?: boolean;
}

const META_NAME = '$name';
const META_STICKY = '$sticky';

/** 테이블 입력 → 노드 */
export function parseKeyTable(
  input: KeyTableInput,
  path: readonly string[],
  options: ParseKeymapOptions = {},
): KeyTrieNode {
  const node = createNode('');
  for (const [rawKey, value] of Object.entries(input)) {
    if (options.allowMeta && rawKey === META_NAME) {
      if (typeof value !== 'string') {
        throw new KeymapError(`"${META_NAME}" must be a string`, path);
      }
      node.name = value;
      continue;
    }
    if (options.allowMeta && rawKey === META_STICKY) {
      if (typeof value !== 'boolean') {
        throw new KeymapError(`"${META_STICKY}" must be a boolean`, path);
      }
      node.sticky = value;
      continue;
    }
    const key = parseKeyAt(rawKey, path);
    node.map.set(key, parseKeyTrie(value, [...path, key], options));
  }
  return node;
}

/** 단일 입력 → 트라이 */
export function parseKeyTrie(
  input: KeyTrieInput,
  path: readonly string[],
  options: ParseKeymapOptions = {},
): KeyTrie {
  if (typeof input === 'boolean') {
    throw new KeymapError('Expected a command, a command sequence or a key table', path);
  }
  if (typeof input === 'string') {
    return { kind: 'command', command: checkCommand(input, path) };
  }
  if (Array.isArray(input)) {
    if (input.length === 0) {
      throw new KeymapError('Command sequence must not be empty', path);
    }
    return { kind: 'sequence', commands: input.map((cmd) => checkCommand(cmd, path)) };
  }
  return parseKeyTable(input, path, options);
}

/** 모드별 테이블 입력 → 모드별 노드 (입력에 있는 모드만) */
export function parseKeymapOverrides(
  input: Partial<Record<Mode, KeyTableInput>>,
  options: ParseKeymapOptions = {},
): KeymapOverrides {
  const overrides: KeymapOverrides = {};
  for (const mode of MODES) {
    const table = input[mode];
    if (table) {
      overrides[mode] = parseKeyTable(table, [mode], options);
    }
  }
  return overrides;
}

/**
 * 설정 문서의 `keys` 스키마
 *
 * - 알 수 없는 모드 거부 (strictObject)
 * - 키/명령 검증 실패는 zod 이슈로 변환 → 문서 구조 오류로 전파
 */
export const KeymapOverridesSchema = z
  .strictObject({
    normal: KeyTableInputSchema.optional(),
    select: KeyTableInputSchema.optional(),
    insert: KeyTableInputSchema.optional(),
  })
  .transform((input, ctx): KeymapOverrides => {
    try {
      return parseKeymapOverrides(input);
    } catch (err) {
      if (err instanceof KeymapError) {
        ctx.issues.push({ code: 'custom', message: err.message, input });
        return z.NEVER;
      }
      throw err;
    }
  });

function parseKeyAt(rawKey: string, path: readonly string[]): string {
  try {
    return normalizeKey(rawKey);
  } catch (err) {
    if (err instanceof KeymapError) {
      throw new KeymapError(err.message, path, { cause: err });
    }
    throw err;
  }
}

function checkCommand(command: string, path: readonly string[]): string {
  if (!isKnownCommand(command)) {
    throw new KeymapError(`Unknown command "${command}"`, path);
  }
  return command;
}
