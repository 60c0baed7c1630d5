import type { Instruction } from './opcodes';

const V = (r: number): string => `V${r.toString(16).toUpperCase()}`;
const byte = (v: number): string => `0x${v.toString(16).toUpperCase().padStart(2, '0')}`;
const addr = (v: number): string => `0x${v.toString(16).toUpperCase().padStart(3, '0')}`;

// Mnemonics follow the common CHIP-8 technical reference notation.
export function disassemble(ins: Instruction): string {
  switch (ins.kind) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'JP': return `JP ${addr(ins.nnn)}`;
    case 'CALL': return `CALL ${addr(ins.nnn)}`;
    case 'LD_I': return `LD I, ${addr(ins.nnn)}`;
    case 'JP_V0': return `JP V0, ${addr(ins.nnn)}`;
    case 'SE_IMM': return `SE ${V(ins.x)}, ${byte(ins.nn)}`;
    case 'SNE_IMM': return `SNE ${V(ins.x)}, ${byte(ins.nn)}`;
    case 'LD_IMM': return `LD ${V(ins.x)}, ${byte(ins.nn)}`;
    case 'ADD_IMM': return `ADD ${V(ins.x)}, ${byte(ins.nn)}`;
    case 'RND': return `RND ${V(ins.x)}, ${byte(ins.nn)}`;
    case 'SE_REG': return `SE ${V(ins.x)}, ${V(ins.y)}`;
    case 'SNE_REG': return `SNE ${V(ins.x)}, ${V(ins.y)}`;
    case 'LD_REG': return `LD ${V(ins.x)}, ${V(ins.y)}`;
    case 'OR': return `OR ${V(ins.x)}, ${V(ins.y)}`;
    case 'AND': return `AND ${V(ins.x)}, ${V(ins.y)}`;
    case 'XOR': return `XOR ${V(ins.x)}, ${V(ins.y)}`;
    case 'ADD_REG': return `ADD ${V(ins.x)}, ${V(ins.y)}`;
    case 'SUB': return `SUB ${V(ins.x)}, ${V(ins.y)}`;
    case 'SHR': return `SHR ${V(ins.x)}, ${V(ins.y)}`;
    case 'SUBN': return `SUBN ${V(ins.x)}, ${V(ins.y)}`;
    case 'SHL': return `SHL ${V(ins.x)}, ${V(ins.y)}`;
    case 'DRW': return `DRW ${V(ins.x)}, ${V(ins.y)}, ${ins.n}`;
    case 'SKP': return `SKP ${V(ins.x)}`;
    case 'SKNP': return `SKNP ${V(ins.x)}`;
    case 'LD_VX_DT': return `LD ${V(ins.x)}, DT`;
    case 'LD_KEY': return `LD ${V(ins.x)}, K`;
    case 'LD_DT': return `LD DT, ${V(ins.x)}`;
    case 'LD_ST': return `LD ST, ${V(ins.x)}`;
    case 'ADD_I': return `ADD I, ${V(ins.x)}`;
    case 'LD_FONT': return `LD F, ${V(ins.x)}`;
    case 'BCD': return `LD B, ${V(ins.x)}`;
    case 'STORE': return `LD [I], ${V(ins.x)}`;
    case 'LOAD': return `LD ${V(ins.x)}, [I]`;
  }
}
