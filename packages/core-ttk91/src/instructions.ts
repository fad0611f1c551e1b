// 命令が取るオペランドの形。
export type OperandShape =
  | 'none'
  | 'register'
  | 'address'
  | 'register-value'
  | 'register-address'
  | 'register-register';

export interface OpcodeSpec {
  mnemonic: string;
  code: number;
  shape: OperandShape;
}

export const OPCODE_SPECS: readonly OpcodeSpec[] = [
  { mnemonic: 'NOP', code: 0x00, shape: 'none' },
  { mnemonic: 'STORE', code: 0x01, shape: 'register-address' },
  { mnemonic: 'LOAD', code: 0x02, shape: 'register-value' },
  { mnemonic: 'IN', code: 0x03, shape: 'register-value' },
  { mnemonic: 'OUT', code: 0x04, shape: 'register-value' },
  { mnemonic: 'ADD', code: 0x11, shape: 'register-value' },
  { mnemonic: 'SUB', code: 0x12, shape: 'register-value' },
  { mnemonic: 'MUL', code: 0x13, shape: 'register-value' },
  { mnemonic: 'DIV', code: 0x14, shape: 'register-value' },
  { mnemonic: 'MOD', code: 0x15, shape: 'register-value' },
  { mnemonic: 'AND', code: 0x16, shape: 'register-value' },
  { mnemonic: 'OR', code: 0x17, shape: 'register-value' },
  { mnemonic: 'XOR', code: 0x18, shape: 'register-value' },
  { mnemonic: 'SHL', code: 0x19, shape: 'register-value' },
  { mnemonic: 'SHR', code: 0x1a, shape: 'register-value' },
  { mnemonic: 'NOT', code: 0x1b, shape: 'register' },
  { mnemonic: 'SHRA', code: 0x1c, shape: 'register-value' },
  { mnemonic: 'COMP', code: 0x1f, shape: 'register-value' },
  { mnemonic: 'JUMP', code: 0x20, shape: 'address' },
  { mnemonic: 'JNEG', code: 0x21, shape: 'register-address' },
  { mnemonic: 'JZER', code: 0x22, shape: 'register-address' },
  { mnemonic: 'JPOS', code: 0x23, shape: 'register-address' },
  { mnemonic: 'JNNEG', code: 0x24, shape: 'register-address' },
  { mnemonic: 'JNZER', code: 0x25, shape: 'register-address' },
  { mnemonic: 'JNPOS', code: 0x26, shape: 'register-address' },
  { mnemonic: 'JLES', code: 0x27, shape: 'address' },
  { mnemonic: 'JEQU', code: 0x28, shape: 'address' },
  { mnemonic: 'JGRE', code: 0x29, shape: 'address' },
  { mnemonic: 'JNLES', code: 0x2a, shape: 'address' },
  { mnemonic: 'JNEQU', code: 0x2b, shape: 'address' },
  { mnemonic: 'JNGRE', code: 0x2c, shape: 'address' },
  { mnemonic: 'CALL', code: 0x31, shape: 'register-address' },
  { mnemonic: 'EXIT', code: 0x32, shape: 'register-value' },
  { mnemonic: 'PUSH', code: 0x33, shape: 'register-value' },
  { mnemonic: 'POP', code: 0x34, shape: 'register-register' },
  { mnemonic: 'PUSHR', code: 0x35, shape: 'register' },
  { mnemonic: 'POPR', code: 0x36, shape: 'register' },
  { mnemonic: 'SVC', code: 0x70, shape: 'register-value' }
];

export const TTK91_MNEMONICS = OPCODE_SPECS.map((spec) => spec.mnemonic);

const SPEC_BY_MNEMONIC = new Map(OPCODE_SPECS.map((spec) => [spec.mnemonic, spec]));
const SPEC_BY_CODE = new Map(OPCODE_SPECS.map((spec) => [spec.code, spec]));

export function findOpcodeByMnemonic(mnemonic: string): OpcodeSpec | undefined {
  return SPEC_BY_MNEMONIC.get(mnemonic.toUpperCase());
}

export function findOpcodeByCode(code: number): OpcodeSpec | undefined {
  return SPEC_BY_CODE.get(code);
}

// アドレスを取る命令はメモリ参照回数が 1 つ少ない。
export function takesAddressOperand(shape: OperandShape): boolean {
  return shape === 'address' || shape === 'register-address';
}

export const ADDRESSING_IMMEDIATE = 0;
export const ADDRESSING_DIRECT = 1;
export const ADDRESSING_INDIRECT = 2;

export const DEVICES: ReadonlyMap<string, number> = new Map([
  ['CRT', 0],
  ['KBD', 1],
  ['STDIN', 6],
  ['STDOUT', 7]
]);

export const SVC_HALT = 11;

export const SUPERVISOR_CALLS: ReadonlyMap<string, number> = new Map([
  ['HALT', SVC_HALT],
  ['READ', 12],
  ['WRITE', 13],
  ['TIME', 14],
  ['DATE', 15]
]);

export const ADDR_MIN = -0x8000;
export const ADDR_MAX = 0x7fff;

export interface DecodedInstruction {
  opcode: number;
  rj: number;
  mode: number;
  ri: number;
  addr: number;
}

export function encodeInstruction(fields: DecodedInstruction): number {
  const word =
    ((fields.opcode & 0xff) << 24) |
    ((fields.rj & 0x7) << 21) |
    ((fields.mode & 0x3) << 19) |
    ((fields.ri & 0x7) << 16) |
    (fields.addr & 0xffff);
  return word | 0;
}

export function decodeInstruction(word: number): DecodedInstruction {
  return {
    opcode: (word >>> 24) & 0xff,
    rj: (word >>> 21) & 0x7,
    mode: (word >>> 19) & 0x3,
    ri: (word >>> 16) & 0x7,
    addr: (word << 16) >> 16
  };
}
