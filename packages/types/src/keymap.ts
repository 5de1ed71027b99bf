/** 에디터 모드 */
export type Mode = 'normal' | 'select' | 'insert';

/** 단일 명령 바인딩 */
export interface KeyTrieCommand {
  kind: 'command';
  command: string;
}

/** 명령 시퀀스 바인딩 (순서대로 실행) */
export interface KeyTrieSequence {
  kind: 'sequence';
  commands: string[];
}

/**
 * 하위 키를 가진 노드
 *
 * map의 키는 정규화된 키 문자열 (예: `S-C-a`).
 * Map 삽입 순서가 곧 표시 순서다.
 */
export interface KeyTrieNode {
  kind: 'node';
  name: string;
  /** 명령 실행 후에도 이 노드에 머무는지 여부 */
  sticky: boolean;
  map: Map<string, KeyTrie>;
}

export type KeyTrie = KeyTrieCommand | KeyTrieSequence | KeyTrieNode;

/** 모든 모드가 채워진 키맵 테이블 */
export type Keymaps = Record<Mode, KeyTrieNode>;

/** 설정 문서가 제공하는 모드별 오버라이드 (일부 모드만) */
export type KeymapOverrides = Partial<Record<Mode, KeyTrieNode>>;
