// debug-bridge パッケージの公開 API 入口。
export * from './bridge';
export * from './device-queue';
export * from './diagnostics';
export * from './error-catalog';
export * from './errors';
export * from './event-relay';
export * from './source-map';
export * from './span';
export * from './stepper';
export * from './types';
