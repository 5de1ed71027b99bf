// @quill/types — barrel export
export type * from './common.js';
export type * from './keymap.js';
