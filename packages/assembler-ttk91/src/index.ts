// assembler-ttk91 パッケージの公開 API 入口。
export * from './compiler';
export * from './layout';
export * from './lexer';
export * from './parser';
export * from './suggest';
export * from './types';
