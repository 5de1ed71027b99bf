// packages/config/test/resolve.test.ts
import type { KeyTrie } from '@quill/types';
import { defaultKeymap, lookupKeys } from '@quill/keymap';
import { describe, it, expect } from 'vitest';
import { getEditorDefaults } from '../src/defaults.js';
import {
  availableSource,
  defaultConfig,
  resolveConfig,
  resolveConfigOrDefault,
  unavailableSource,
} from '../src/resolve.js';
import { unwrap, unwrapErr } from './helpers.js';

const cmd = (command: string): KeyTrie => ({ kind: 'command', command });

describe('resolveConfig: 문서 우선순위', () => {
  it('둘 다 가용성 오류면 global 쪽 오류를 돌려준다', () => {
    const global = unavailableSource('/home/u/.config/quill/config.json5');
    const local = unavailableSource('/w/.quill/config.json5');
    const error = unwrapErr(resolveConfig(global, local));

    expect(error.kind).toBe('unavailable');
    expect(global.ok ? undefined : global.error).toBe(error);
  });

  it('global 구조 오류는 올바른 local보다 우선한다', () => {
    const error = unwrapErr(
      resolveConfig(availableSource('{ theme: 42 }'), availableSource('{ theme: "nord" }')),
    );
    expect(error.kind).toBe('parse');
    expect(error.kind === 'parse' ? error.layer : undefined).toBe('global');
  });

  it('둘 다 구조 오류면 global 쪽 오류', () => {
    const error = unwrapErr(resolveConfig(availableSource('{'), availableSource('{ nope: 1 }')));
    expect(error.kind === 'parse' ? error.layer : undefined).toBe('global');
  });

  it('local 구조 오류는 global 가용성 오류보다 우선한다', () => {
    const error = unwrapErr(resolveConfig(unavailableSource('/g'), availableSource('{ nope: 1 }')));
    expect(error.kind === 'parse' ? error.layer : undefined).toBe('local');
  });

  it('한쪽만 있으면 그 문서만으로 해석한다', () => {
    const onlyLocal = unwrap(resolveConfig(unavailableSource('/g'), availableSource('{ theme: "nord" }')));
    expect(onlyLocal.theme).toBe('nord');

    const onlyGlobal = unwrap(resolveConfig(availableSource('{ theme: "nord" }'), unavailableSource('/l')));
    expect(onlyGlobal.theme).toBe('nord');
  });

  it('테마는 local이 이긴다', () => {
    const config = unwrap(
      resolveConfig(availableSource('{ theme: "dracula" }'), availableSource('{ theme: "nord" }')),
    );
    expect(config.theme).toBe('nord');
  });

  it('local에 테마가 없으면 global 테마', () => {
    const config = unwrap(resolveConfig(availableSource('{ theme: "dracula" }'), availableSource('{}')));
    expect(config.theme).toBe('dracula');
  });

  it('단일 문서 해석은 빈 문서와 함께 해석한 것과 같다', () => {
    const doc = '{ theme: "nord", keys: { normal: { x: "yank" } }, editor: { scrolloff: 1 } }';
    const single = unwrap(resolveConfig(availableSource(doc), unavailableSource('/l')));
    const paired = unwrap(resolveConfig(availableSource(doc), availableSource('')));

    expect(single.theme).toBe(paired.theme);
    expect(single.keys).toEqual(paired.keys);
    expect(single.editor).toEqual(paired.editor);
  });
});

describe('resolveConfig: 키맵', () => {
  it('global/local 키맵을 기본 키맵 위에 순서대로 쌓는다', () => {
    const config = unwrap(
      resolveConfig(
        availableSource('{ keys: { insert: { y: "move_line_down" } } }'),
        availableSource('{ keys: { normal: { "A-F12": "move_next_word_end" } } }'),
      ),
    );

    expect(lookupKeys(config.keys.insert, ['y'])).toEqual(cmd('move_line_down'));
    expect(lookupKeys(config.keys.normal, ['A-F12'])).toEqual(cmd('move_next_word_end'));

    const expected = defaultKeymap();
    expected.insert.map.set('y', cmd('move_line_down'));
    expected.normal.map.set('A-F12', cmd('move_next_word_end'));
    expect(config.keys).toEqual(expected);
  });

  it('같은 키는 local 바인딩이 이긴다', () => {
    const config = unwrap(
      resolveConfig(
        availableSource('{ keys: { normal: { x: "yank" } } }'),
        availableSource('{ keys: { normal: { x: "paste_after" } } }'),
      ),
    );
    expect(lookupKeys(config.keys.normal, ['x'])).toEqual(cmd('paste_after'));
  });

  it('중첩 노드는 병합하고 기존 바인딩을 유지한다', () => {
    const config = unwrap(
      resolveConfig(availableSource('{ keys: { normal: { g: { x: "yank" } } } }'), unavailableSource()),
    );
    expect(lookupKeys(config.keys.normal, ['g', 'x'])).toEqual(cmd('yank'));
    expect(lookupKeys(config.keys.normal, ['g', 'g'])).toEqual(cmd('goto_file_start'));
  });
});

describe('resolveConfig: 편집기 설정', () => {
  it('global/local editor를 병합한 뒤 구체화한다', () => {
    const config = unwrap(
      resolveConfig(
        availableSource('{ editor: { scrolloff: 1, softWrap: { enable: true } } }'),
        availableSource('{ editor: { softWrap: { maxWrap: 5 } } }'),
      ),
    );
    expect(config.editor.scrolloff).toBe(1);
    expect(config.editor.softWrap).toEqual({
      enable: true,
      maxWrap: 5,
      maxIndentRetain: 40,
      wrapIndicator: '↪ ',
    });
  });

  it('editor가 없으면 기본값', () => {
    const config = unwrap(resolveConfig(availableSource('{}'), availableSource('{}')));
    expect(config.editor).toEqual(getEditorDefaults());
  });

  it('한 문서의 editor가 잘못되면 그 layer의 구조 오류', () => {
    const error = unwrapErr(
      resolveConfig(availableSource('{ editor: { scrolloff: -1 } }'), availableSource('{}')),
    );
    expect(error.kind).toBe('parse');
    expect(error.kind === 'parse' ? error.layer : 'n/a').toBe('global');
    expect(error.kind === 'parse' ? error.issues.map((issue) => issue.path) : []).toEqual([
      'editor.scrolloff',
    ]);
  });

  it('알 수 없는 editor 키는 그 layer의 구조 오류', () => {
    const error = unwrapErr(
      resolveConfig(availableSource('{ editor: { scrollof: 3 } }'), unavailableSource('/l')),
    );
    expect(error.kind).toBe('parse');
    if (error.kind === 'parse') {
      expect(error.layer).toBe('global');
      expect(error.issues.map((issue) => issue.path)).toEqual(['editor']);
      expect(error.issues[0]?.message).toContain('scrollof');
    }
  });

  it('중첩 테이블의 알 수 없는 키도 구조 오류', () => {
    const error = unwrapErr(
      resolveConfig(unavailableSource('/g'), availableSource('{ editor: { softWrap: { foo: 1 } } }')),
    );
    expect(error.kind).toBe('parse');
    if (error.kind === 'parse') {
      expect(error.layer).toBe('local');
      expect(error.issues.map((issue) => issue.path)).toEqual(['editor.softWrap']);
    }
  });

  it('예약 키는 무시하지 않고 경로와 함께 구조 오류로 보고한다', () => {
    const error = unwrapErr(
      resolveConfig(availableSource('{ editor: { constructor: 1 } }'), unavailableSource('/l')),
    );
    expect(error.kind).toBe('parse');
    if (error.kind === 'parse') {
      expect(error.layer).toBe('global');
      expect(error.issues).toEqual([
        { path: 'editor.constructor', message: 'Reserved key "constructor" is not allowed' },
      ]);
      expect(error.message).toBe(
        'Invalid global config: editor.constructor: Reserved key "constructor" is not allowed',
      );
    }
  });

  it('중첩 테이블의 예약 키도 구조 오류', () => {
    const error = unwrapErr(
      resolveConfig(
        availableSource('{}'),
        availableSource('{ editor: { softWrap: { prototype: true } } }'),
      ),
    );
    expect(error.kind).toBe('parse');
    if (error.kind === 'parse') {
      expect(error.layer).toBe('local');
      expect(error.issues.map((issue) => issue.path)).toEqual(['editor.softWrap.prototype']);
    }
  });

  it('병합 결과가 잘못되면 layer 없는 구조 오류', () => {
    const error = unwrapErr(
      resolveConfig(
        availableSource('{ editor: { lineNumber: "relative" } }'),
        availableSource('{ editor: { mouse: "yes" } }'),
      ),
    );
    expect(error.kind === 'parse' ? error.layer : 'n/a').toBeUndefined();
    expect(error.message.startsWith('Invalid editor settings in merged config: editor.mouse: ')).toBe(
      true,
    );
  });
});

describe('resolveConfigOrDefault', () => {
  it('둘 다 가용성 오류면 기본 설정', () => {
    const config = unwrap(resolveConfigOrDefault(unavailableSource('/g'), unavailableSource('/l')));

    expect(config.keys).toEqual(defaultKeymap());
    expect(config.editor).toEqual(getEditorDefaults());
    expect(config.theme).toBeUndefined();
    expect(config.themeLang.size).toBe(0);
    expect(config.keysLang.size).toBe(0);
    expect(config.editorLang.size).toBe(0);
  });

  it('구조 오류는 그대로 전달한다', () => {
    const error = unwrapErr(resolveConfigOrDefault(availableSource('{'), unavailableSource('/l')));
    expect(error.kind).toBe('parse');
  });

  it('문서가 있으면 resolveConfig와 같다', () => {
    const config = unwrap(resolveConfigOrDefault(unavailableSource('/g'), availableSource('{ theme: "nord" }')));
    expect(config.theme).toBe('nord');
  });
});

describe('defaultConfig', () => {
  it('기본 키맵과 기본 편집기 설정, 빈 언어 맵', () => {
    const config = defaultConfig();
    expect(config.keys).toEqual(defaultKeymap());
    expect(config.editor).toEqual(getEditorDefaults());
    expect(config.theme).toBeUndefined();
    expect([...config.themeLang]).toEqual([]);
    expect([...config.keysLang]).toEqual([]);
    expect([...config.editorLang]).toEqual([]);
  });
});
