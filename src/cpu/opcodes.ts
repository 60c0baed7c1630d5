import { UnknownOpcodeError } from '../emulator/errors';

// Opcode kinds grouped by operand layout.
export const NO_OPERAND_KINDS = ['CLS', 'RET'] as const;
export const ADDRESS_KINDS = ['JP', 'CALL', 'LD_I', 'JP_V0'] as const;
export const REG_IMM_KINDS = ['SE_IMM', 'SNE_IMM', 'LD_IMM', 'ADD_IMM', 'RND'] as const;
export const REG_REG_KINDS = [
  'SE_REG', 'SNE_REG', 'LD_REG', 'OR', 'AND', 'XOR', 'ADD_REG', 'SUB', 'SHR', 'SUBN', 'SHL',
] as const;
export const REG_KINDS = [
  'SKP', 'SKNP', 'LD_VX_DT', 'LD_KEY', 'LD_DT', 'LD_ST', 'ADD_I', 'LD_FONT', 'BCD', 'STORE', 'LOAD',
] as const;

type NoOperandKind = typeof NO_OPERAND_KINDS[number];
type AddressKind = typeof ADDRESS_KINDS[number];
type RegImmKind = typeof REG_IMM_KINDS[number];
type RegRegKind = typeof REG_REG_KINDS[number];
type RegKind = typeof REG_KINDS[number];

export type Instruction =
  | { [K in NoOperandKind]: { kind: K } }[NoOperandKind]
  | { [K in AddressKind]: { kind: K; nnn: number } }[AddressKind]
  | { [K in RegImmKind]: { kind: K; x: number; nn: number } }[RegImmKind]
  | { [K in RegRegKind]: { kind: K; x: number; y: number } }[RegRegKind]
  | { [K in RegKind]: { kind: K; x: number } }[RegKind]
  | { kind: 'DRW'; x: number; y: number; n: number };

export type InstructionKind = Instruction['kind'];

export const INSTRUCTION_KINDS: readonly InstructionKind[] = [
  ...NO_OPERAND_KINDS, ...ADDRESS_KINDS, ...REG_IMM_KINDS, ...REG_REG_KINDS, ...REG_KINDS, 'DRW',
];

const ALU_BY_LOW_NIBBLE: Partial<Record<number, RegRegKind>> = {
  0x0: 'LD_REG', 0x1: 'OR', 0x2: 'AND', 0x3: 'XOR', 0x4: 'ADD_REG',
  0x5: 'SUB', 0x6: 'SHR', 0x7: 'SUBN', 0xe: 'SHL',
};

const F_BY_LOW_BYTE: Partial<Record<number, RegKind>> = {
  0x07: 'LD_VX_DT', 0x0a: 'LD_KEY', 0x15: 'LD_DT', 0x18: 'LD_ST', 0x1e: 'ADD_I',
  0x29: 'LD_FONT', 0x33: 'BCD', 0x55: 'STORE', 0x65: 'LOAD',
};

// Decode one 16-bit instruction word. `address` is only used for error reporting.
export function decode(opcode: number, address: number): Instruction {
  const op = opcode & 0xffff;
  const x = (op >>> 8) & 0xf;
  const y = (op >>> 4) & 0xf;
  const n = op & 0xf;
  const nn = op & 0xff;
  const nnn = op & 0xfff;

  switch (op >>> 12) {
    case 0x0:
      if (op === 0x00e0) return { kind: 'CLS' };
      if (op === 0x00ee) return { kind: 'RET' };
      break;
    case 0x1: return { kind: 'JP', nnn };
    case 0x2: return { kind: 'CALL', nnn };
    case 0x3: return { kind: 'SE_IMM', x, nn };
    case 0x4: return { kind: 'SNE_IMM', x, nn };
    case 0x5:
      if (n === 0) return { kind: 'SE_REG', x, y };
      break;
    case 0x6: return { kind: 'LD_IMM', x, nn };
    case 0x7: return { kind: 'ADD_IMM', x, nn };
    case 0x8: {
      const kind = ALU_BY_LOW_NIBBLE[n];
      if (kind) return { kind, x, y };
      break;
    }
    case 0x9:
      if (n === 0) return { kind: 'SNE_REG', x, y };
      break;
    case 0xa: return { kind: 'LD_I', nnn };
    case 0xb: return { kind: 'JP_V0', nnn };
    case 0xc: return { kind: 'RND', x, nn };
    case 0xd: return { kind: 'DRW', x, y, n };
    case 0xe:
      if (nn === 0x9e) return { kind: 'SKP', x };
      if (nn === 0xa1) return { kind: 'SKNP', x };
      break;
    case 0xf: {
      const kind = F_BY_LOW_BYTE[nn];
      if (kind) return { kind, x };
      break;
    }
  }
  throw new UnknownOpcodeError(address, op);
}
