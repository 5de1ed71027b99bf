import type { Mode } from '@quill/types';

/** 시스템이 정의하는 모든 모드 (표시 순서) */
export const MODES: readonly Mode[] = ['normal', 'select', 'insert'];

/** 모드별 루트 노드 이름 */
export const MODE_NAMES: Readonly<Record<Mode, string>> = {
  normal: 'Normal mode',
  select: 'Select mode',
  insert: 'Insert mode',
};
