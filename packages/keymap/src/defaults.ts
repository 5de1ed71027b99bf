// packages/keymap/src/defaults.ts
import type { Keymaps } from '@quill/types';
import { z } from 'zod/v4';
import defaultKeymapData from './default-keymap.json' with { type: 'json' };
import { MODE_NAMES } from './modes.js';
import { KeyTableInputSchema, parseKeyTable } from './parse.js';
import { cloneKeymaps, mergeNodes } from './trie.js';

const DefaultKeymapSchema = z.strictObject({
  normal: KeyTableInputSchema,
  selectOverrides: KeyTableInputSchema,
  insert: KeyTableInputSchema,
});

/**
 * 내장 키맵 빌드
 *
 * select 모드는 normal 모드 복사본에 selectOverrides를 덮어쓴 것.
 */
function buildDefaultKeymap(): Keymaps {
  const input = DefaultKeymapSchema.parse(defaultKeymapData);
  const meta = { allowMeta: true };

  const normal = parseKeyTable(input.normal, ['normal'], meta);
  normal.name = MODE_NAMES.normal;

  const select = mergeNodes(normal, parseKeyTable(input.selectOverrides, ['select'], meta));
  select.name = MODE_NAMES.select;

  const insert = parseKeyTable(input.insert, ['insert'], meta);
  insert.name = MODE_NAMES.insert;

  return { normal, select, insert };
}

const DEFAULT_KEYMAP = buildDefaultKeymap();

/** 내장 기본 키맵 (호출마다 새 복사본) */
export function defaultKeymap(): Keymaps {
  return cloneKeymaps(DEFAULT_KEYMAP);
}
