// packages/config/test/merge-config.test.ts
import { describe, it, expect } from 'vitest';
import { layerSettings, mergeSettings, SETTINGS_MERGE_DEPTH } from '../src/merge-config.js';

describe('mergeSettings', () => {
  it('테이블을 재귀 병합한다', () => {
    const base = { a: { b: 1, c: 2 }, d: 'keep' };
    const override = { a: { c: 3, e: 4 } };
    expect(mergeSettings(base, override, 3)).toEqual({
      a: { b: 1, c: 3, e: 4 },
      d: 'keep',
    });
  });

  it('배열은 연결하지 않고 교체한다', () => {
    expect(mergeSettings({ arr: [1, 2] }, { arr: [3] }, 3)).toEqual({ arr: [3] });
  });

  it('원시값은 override가 우선한다', () => {
    expect(mergeSettings({ key: 'old' }, { key: 'new' }, 3)).toEqual({ key: 'new' });
    expect(mergeSettings({ key: 'old' }, { key: null }, 3)).toEqual({ key: null });
  });

  it('한쪽이 undefined면 다른 쪽을 그대로 반환한다', () => {
    const value = { a: 1 };
    expect(mergeSettings(undefined, value, 3)).toBe(value);
    expect(mergeSettings(value, undefined, 3)).toBe(value);
    expect(mergeSettings(undefined, undefined, 3)).toBeUndefined();
  });

  it('깊이 0이면 override가 통째로 이긴다', () => {
    expect(mergeSettings({ a: 1 }, { b: 2 }, 0)).toEqual({ b: 2 });
  });

  it('테이블과 스칼라는 서로를 교체한다', () => {
    expect(mergeSettings({ render: { tab: 'all' } }, { render: 'none' }, 3)).toEqual({
      render: 'none',
    });
    expect(mergeSettings({ render: 'none' }, { render: { tab: 'all' } }, 3)).toEqual({
      render: { tab: 'all' },
    });
  });

  it('깊이 3까지의 차이는 병합한다', () => {
    const base = { a: { b: { c: 1, d: 2 } } };
    const override = { a: { b: { d: 3 } } };
    expect(mergeSettings(base, override, SETTINGS_MERGE_DEPTH)).toEqual({
      a: { b: { c: 1, d: 3 } },
    });
  });

  it('깊이 4의 차이는 하위 트리를 통째로 교체한다', () => {
    const base = { a: { b: { c: { x: 1, y: 2 } } } };
    const override = { a: { b: { c: { x: 9 } } } };
    expect(mergeSettings(base, override, SETTINGS_MERGE_DEPTH)).toEqual({
      a: { b: { c: { x: 9 } } },
    });
  });

  it('자기 자신과 병합하면 그대로다', () => {
    const tree = { a: { b: { c: { d: 1 } } }, e: [1, 2], f: 'x', g: true };
    expect(mergeSettings(tree, tree, SETTINGS_MERGE_DEPTH)).toEqual(tree);
  });

  it('프로토타입 오염 키를 무시한다', () => {
    const override = JSON.parse('{"__proto__": {"polluted": 1}, "constructor": "bad"}');
    expect(mergeSettings({}, override, 3)).toEqual({});
    expect(Object.prototype).not.toHaveProperty('polluted');
  });

  it('입력을 변경하지 않는다 (불변)', () => {
    const base = { a: { b: 1 } };
    const override = { a: { c: 2 } };
    mergeSettings(base, override, 3);
    expect(base).toEqual({ a: { b: 1 } });
    expect(override).toEqual({ a: { c: 2 } });
  });
});

describe('layerSettings', () => {
  it('override를 순서대로 쌓고 undefined는 건너뛴다', () => {
    expect(layerSettings(undefined, [{ a: { b: 1 } }, undefined, { a: { c: 2 } }])).toEqual({
      a: { b: 1, c: 2 },
    });
  });

  it('override가 없으면 base를 반환한다', () => {
    expect(layerSettings({ a: 1 }, [])).toEqual({ a: 1 });
    expect(layerSettings(undefined, [undefined])).toBeUndefined();
  });
});
