import { describe, it, expect } from 'vitest';
import { getEnv, isTruthyEnvValue, isLogLevel, getLogLevelEnv } from '../src/env.js';

describe('getEnv', () => {
  const env = { QUILL_PORT: '8080', PORT: '3000', HOST: 'localhost', QUILL_EMPTY: '' };

  it('QUILL_ 접두사 변수를 우선 반환한다', () => {
    expect(getEnv('PORT', env)).toBe('8080');
  });

  it('QUILL_ 없으면 접두사 없는 키를 반환한다', () => {
    expect(getEnv('HOST', env)).toBe('localhost');
  });

  it('빈 문자열은 없는 값으로 취급한다', () => {
    expect(getEnv('EMPTY', env)).toBeUndefined();
  });

  it('둘 다 없으면 fallback을 반환한다', () => {
    expect(getEnv('MISSING', env, 'default')).toBe('default');
  });

  it('fallback도 없으면 undefined를 반환한다', () => {
    expect(getEnv('MISSING', env)).toBeUndefined();
  });
});

describe('isTruthyEnvValue', () => {
  it.each([
    ['1', true],
    ['true', true],
    ['TRUE', true],
    ['yes', true],
    ['0', false],
    ['false', false],
    ['', false],
    [undefined, false],
  ])('isTruthyEnvValue(%j) → %s', (input, expected) => {
    expect(isTruthyEnvValue(input)).toBe(expected);
  });
});

describe('isLogLevel', () => {
  it('정의된 레벨만 허용한다', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('getLogLevelEnv', () => {
  it('QUILL_LOG_LEVEL을 대소문자 무시하고 읽는다', () => {
    expect(getLogLevelEnv({ QUILL_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('잘못된 값이면 fallback을 반환한다', () => {
    expect(getLogLevelEnv({ QUILL_LOG_LEVEL: 'loud' })).toBe('info');
    expect(getLogLevelEnv({}, 'warn')).toBe('warn');
  });
});
