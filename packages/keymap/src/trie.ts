// packages/keymap/src/trie.ts
import type {
  KeyTrie,
  KeyTrieCommand,
  KeyTrieNode,
  KeyTrieSequence,
  KeymapOverrides,
  Keymaps,
} from '@quill/types';
import { normalizeKey } from './key-event.js';
import { MODES } from './modes.js';

/** 노드 생성 (entries의 키는 이미 정규화되어 있어야 한다) */
export function createNode(
  name: string,
  entries: Iterable<[string, KeyTrie]> = [],
  sticky = false,
): KeyTrieNode {
  return { kind: 'node', name, sticky, map: new Map(entries) };
}

function cloneTrie(trie: KeyTrie): KeyTrie {
  switch (trie.kind) {
    case 'command':
      return { kind: 'command', command: trie.command };
    case 'sequence':
      return { kind: 'sequence', commands: [...trie.commands] };
    case 'node':
      return cloneNode(trie);
  }
}

export function cloneNode(node: KeyTrieNode): KeyTrieNode {
  return createNode(
    node.name,
    [...node.map].map(([key, child]): [string, KeyTrie] => [key, cloneTrie(child)]),
    node.sticky,
  );
}

export function cloneKeymaps(keymaps: Keymaps): Keymaps {
  return {
    normal: cloneNode(keymaps.normal),
    select: cloneNode(keymaps.select),
    insert: cloneNode(keymaps.insert),
  };
}

/**
 * 노드 병합 (입력은 변경하지 않음)
 *
 * - 양쪽 모두 노드인 키: 재귀 병합
 * - 그 외: overrides 값으로 교체
 * - 기존 키는 위치 유지, 새 키는 뒤에 추가
 * - 이름과 sticky는 base 노드의 것을 유지
 */
export function mergeNodes(base: KeyTrieNode, overrides: KeyTrieNode): KeyTrieNode {
  const merged = cloneNode(base);
  mergeInto(merged, overrides);
  return merged;
}

/**
 * 모드별 키맵 레이어링
 *
 * overrides에 있는 모드만 병합하고 나머지 모드는 복사한다.
 * 결과는 항상 모든 모드를 포함한다.
 */
export function mergeKeys(base: Keymaps, overrides?: KeymapOverrides): Keymaps {
  const result = cloneKeymaps(base);
  if (!overrides) {
    return result;
  }
  for (const mode of MODES) {
    const node = overrides[mode];
    if (node) {
      mergeInto(result[mode], node);
    }
  }
  return result;
}

function mergeInto(target: KeyTrieNode, overrides: KeyTrieNode): void {
  for (const [key, trie] of overrides.map) {
    const existing = target.map.get(key);
    if (existing?.kind === 'node' && trie.kind === 'node') {
      mergeInto(existing, trie);
    } else {
      target.map.set(key, cloneTrie(trie));
    }
  }
}

/** 키 시퀀스로 트라이 탐색 (각 키는 정규화 후 조회) */
export function lookupKeys(node: KeyTrieNode, keys: readonly string[]): KeyTrie | undefined {
  let current: KeyTrie = node;
  for (const key of keys) {
    if (current.kind !== 'node') {
      return undefined;
    }
    const next = current.map.get(normalizeKey(key));
    if (!next) {
      return undefined;
    }
    current = next;
  }
  return current;
}

/** 모든 리프 바인딩을 `[경로, 바인딩]`으로 나열 (경로 예: `g g`) */
export function flattenBindings(
  node: KeyTrieNode,
  prefix: readonly string[] = [],
): Array<[string, KeyTrieCommand | KeyTrieSequence]> {
  const bindings: Array<[string, KeyTrieCommand | KeyTrieSequence]> = [];
  for (const [key, trie] of node.map) {
    const path = [...prefix, key];
    if (trie.kind === 'node') {
      bindings.push(...flattenBindings(trie, path));
    } else {
      bindings.push([path.join(' '), trie]);
    }
  }
  return bindings;
}
