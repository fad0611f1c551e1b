import {
  getErrorCatalogEntry,
  getUnknownErrorCatalogEntry,
  type BridgeErrorCode,
  type ErrorCatalogEntry,
  type NumericErrorCode
} from './error-catalog';
import type { Diagnostic } from './types';

export interface DebugBridgeErrorOptions {
  diagnostics?: readonly Diagnostic[];
  address?: number;
  device?: number;
  cause?: unknown;
}

export class DebugBridgeError extends Error {
  readonly code: BridgeErrorCode;

  readonly diagnostics: readonly Diagnostic[];

  readonly address: number | undefined;

  readonly device: number | undefined;

  constructor(code: BridgeErrorCode, detail?: string, options: DebugBridgeErrorOptions = {}) {
    super(detail ?? code, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DebugBridgeError';
    this.code = code;
    this.diagnostics = options.diagnostics ?? [];
    this.address = options.address;
    this.device = options.device;
  }

  getCatalogEntry(): ErrorCatalogEntry {
    return getErrorCatalogEntry(this.code);
  }

  getNumericCode(): NumericErrorCode {
    return this.getCatalogEntry().numericCode;
  }

  isRecoverable(): boolean {
    return this.getCatalogEntry().recoverable;
  }

  toDisplayString(): string {
    const entry = this.getCatalogEntry();
    return `${entry.message}: ${this.message} (${entry.numericCode})`;
  }
}

export function isBridgeError(error: unknown, code?: BridgeErrorCode): error is DebugBridgeError {
  return error instanceof DebugBridgeError && (code === undefined || error.code === code);
}

// ホスト表示向けに unknown を文字列化する共通入口。
export function asDisplayError(error: unknown): string {
  if (error instanceof DebugBridgeError) {
    return error.toDisplayString();
  }
  const unknownEntry = getUnknownErrorCatalogEntry();
  if (error instanceof Error) {
    const message = error.message.length > 0 ? error.message : unknownEntry.message;
    return `${message} (${unknownEntry.numericCode})`;
  }
  return `${unknownEntry.message} (${unknownEntry.numericCode})`;
}
