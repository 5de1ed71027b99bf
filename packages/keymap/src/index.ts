// @quill/keymap — barrel export

export { KeymapError } from './errors.js';
export { MODES, MODE_NAMES } from './modes.js';

// 키 입력
export { parseKeyEvent, formatKeyEvent, normalizeKey, type KeyEvent } from './key-event.js';

// 명령
export { isKnownCommand, describeCommand, staticCommandNames } from './commands.js';

// 트라이
export {
  createNode,
  cloneNode,
  cloneKeymaps,
  mergeNodes,
  mergeKeys,
  lookupKeys,
  flattenBindings,
} from './trie.js';

// 파싱
export {
  KeyTableInputSchema,
  KeymapOverridesSchema,
  parseKeyTable,
  parseKeyTrie,
  parseKeymapOverrides,
  type KeyTrieInput,
  type KeyTableInput,
  type ParseKeymapOptions,
} from './parse.js';

// 기본 키맵
export { defaultKeymap } from './defaults.js';
