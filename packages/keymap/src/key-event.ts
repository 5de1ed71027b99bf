// packages/keymap/src/key-event.ts
import { KeymapError } from './errors.js';

/** 파싱된 키 입력 */
export interface KeyEvent {
  /** 단일 문자, 이름 있는 키(`ret`, `pageup` 등), 또는 `F1`~`F12` */
  code: string;
  shift: boolean;
  alt: boolean;
  ctrl: boolean;
}

/** 문자를 가리키는 키 이름 */
const CHAR_NAMES = new Map<string, string>([
  ['space', ' '],
  ['minus', '-'],
  ['lt', '<'],
  ['gt', '>'],
]);

const CHAR_DISPLAY = new Map([...CHAR_NAMES].map(([name, char]) => [char, name]));

const NAMED_KEYS = new Set([
  'ret',
  'esc',
  'tab',
  'backspace',
  'del',
  'ins',
  'null',
  'left',
  'right',
  'up',
  'down',
  'home',
  'end',
  'pageup',
  'pagedown',
]);

const FUNCTION_KEY = /^F([1-9]|1[0-2])$/;

/**
 * 키 문자열 파싱
 *
 * 형식: `[S-][A-][C-]<code>` (수식자 순서 무관, 중복 불가).
 * `-` 키는 `minus`로 표기해야 한다.
 */
export function parseKeyEvent(text: string): KeyEvent {
  const tokens = text.split('-');
  const codeToken = tokens.pop() ?? '';
  if (codeToken === '') {
    throw new KeymapError(`Invalid key "${text}" (write "minus" for the - key)`);
  }

  const event: KeyEvent = { code: parseCode(codeToken, text), shift: false, alt: false, ctrl: false };

  for (const modifier of tokens) {
    const flag = modifierFlag(modifier);
    if (!flag) {
      throw new KeymapError(`Invalid key modifier "${modifier}" in "${text}"`);
    }
    if (event[flag]) {
      throw new KeymapError(`Repeated key modifier "${modifier}" in "${text}"`);
    }
    event[flag] = true;
  }

  return event;
}

/** 키 입력을 정규 문자열로 (수식자 순서: S- A- C-) */
export function formatKeyEvent(event: KeyEvent): string {
  const prefix = `${event.shift ? 'S-' : ''}${event.alt ? 'A-' : ''}${event.ctrl ? 'C-' : ''}`;
  return `${prefix}${CHAR_DISPLAY.get(event.code) ?? event.code}`;
}

/** 키 문자열 정규화 — `C-S-a`와 `S-C-a`는 같은 키 */
export function normalizeKey(text: string): string {
  return formatKeyEvent(parseKeyEvent(text));
}

function parseCode(token: string, text: string): string {
  const char = CHAR_NAMES.get(token);
  if (char !== undefined) {
    return char;
  }
  if (NAMED_KEYS.has(token) || FUNCTION_KEY.test(token)) {
    return token;
  }
  if ([...token].length === 1) {
    return token;
  }
  throw new KeymapError(`Invalid key "${text}"`);
}

function modifierFlag(token: string): 'shift' | 'alt' | 'ctrl' | undefined {
  switch (token) {
    case 'S':
      return 'shift';
    case 'A':
      return 'alt';
    case 'C':
      return 'ctrl';
    default:
      return undefined;
  }
}
