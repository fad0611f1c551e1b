// ブリッジがホストへ返すエラーコード定義。
export type BridgeErrorCode =
  | 'PARSE_FAILURE'
  | 'QUEUE_UNDERFLOW'
  | 'EMULATION_FAULT'
  | 'MEMORY_ACCESS'
  | 'RUNAWAY'
  | 'REENTRANT_STEP'
  | 'INVALID_INPUT';

export type NumericErrorCode = `E${string}`;

export interface ErrorCatalogEntry {
  bridgeCode?: BridgeErrorCode;
  numericCode: NumericErrorCode;
  message: string;
  // ホストが入力の追加などで続行できるか。
  recoverable: boolean;
}

export const ERROR_CATALOG: readonly ErrorCatalogEntry[] = [
  { bridgeCode: 'PARSE_FAILURE', numericCode: 'E01', message: 'PARSE FAILURE', recoverable: true },
  { bridgeCode: 'QUEUE_UNDERFLOW', numericCode: 'E02', message: 'QUEUE UNDERFLOW', recoverable: true },
  { bridgeCode: 'EMULATION_FAULT', numericCode: 'E03', message: 'EMULATION FAULT', recoverable: false },
  { bridgeCode: 'MEMORY_ACCESS', numericCode: 'E04', message: 'MEMORY ACCESS', recoverable: true },
  { bridgeCode: 'RUNAWAY', numericCode: 'E05', message: 'RUNAWAY', recoverable: false },
  { bridgeCode: 'REENTRANT_STEP', numericCode: 'E06', message: 'REENTRANT STEP', recoverable: true },
  { bridgeCode: 'INVALID_INPUT', numericCode: 'E07', message: 'INVALID INPUT', recoverable: true },

  { numericCode: 'E99', message: 'UNKNOWN', recoverable: false }
];

const UNKNOWN_ENTRY = ERROR_CATALOG.find((entry) => entry.numericCode === 'E99');

const ENTRY_BY_CODE = new Map<BridgeErrorCode, ErrorCatalogEntry>();
for (const entry of ERROR_CATALOG) {
  if (entry.bridgeCode !== undefined) {
    ENTRY_BY_CODE.set(entry.bridgeCode, entry);
  }
}

export function getErrorCatalogEntry(code: BridgeErrorCode): ErrorCatalogEntry {
  return ENTRY_BY_CODE.get(code) ?? getUnknownErrorCatalogEntry();
}

export function getUnknownErrorCatalogEntry(): ErrorCatalogEntry {
  if (UNKNOWN_ENTRY) {
    return UNKNOWN_ENTRY;
  }
  return {
    numericCode: 'E99',
    message: 'UNKNOWN',
    recoverable: false
  };
}
