// core-ttk91 パッケージの公開 API 入口。
export * from './emulator';
export * from './errors';
export * from './instructions';
export * from './memory';
export * from './types';
