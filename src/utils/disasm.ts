import type { Byte, CPUState, Instruction, Word } from '@core/cpu/types';
import { decode } from '@core/cpu/decode';

export type ReadByteFn = (addr: Word) => Byte;

export interface DisasmResult {
  mnemonic: string;
  operand: string;
}

export interface DisasmLine extends DisasmResult {
  opcode: Word;
  instruction: Instruction;
}

function hex1(v: number) { return v.toString(16).toUpperCase(); }
function hex2(v: number) { return v.toString(16).toUpperCase().padStart(2, '0'); }
function hex3(v: number) { return v.toString(16).toUpperCase().padStart(3, '0'); }
function hex4(v: number) { return v.toString(16).toUpperCase().padStart(4, '0'); }

const V = (n: number): string => `V${hex1(n)}`;

// Cowgod-style mnemonics: LD/ADD/SE/... with the destination first
export function disasmInstruction(ins: Instruction): DisasmResult {
  switch (ins.kind) {
    case 'CLS': return { mnemonic: 'CLS', operand: '' };
    case 'RET': return { mnemonic: 'RET', operand: '' };
    case 'JP': return { mnemonic: 'JP', operand: `$${hex3(ins.nnn)}` };
    case 'CALL': return { mnemonic: 'CALL', operand: `$${hex3(ins.nnn)}` };
    case 'SE_VX_NN': return { mnemonic: 'SE', operand: `${V(ins.x)}, #$${hex2(ins.nn)}` };
    case 'SNE_VX_NN': return { mnemonic: 'SNE', operand: `${V(ins.x)}, #$${hex2(ins.nn)}` };
    case 'SE_VX_VY': return { mnemonic: 'SE', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'SNE_VX_VY': return { mnemonic: 'SNE', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'LD_VX_NN': return { mnemonic: 'LD', operand: `${V(ins.x)}, #$${hex2(ins.nn)}` };
    case 'ADD_VX_NN': return { mnemonic: 'ADD', operand: `${V(ins.x)}, #$${hex2(ins.nn)}` };
    case 'LD_VX_VY': return { mnemonic: 'LD', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'OR': return { mnemonic: 'OR', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'AND': return { mnemonic: 'AND', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'XOR': return { mnemonic: 'XOR', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'ADD_VX_VY': return { mnemonic: 'ADD', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'SUB': return { mnemonic: 'SUB', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'SHR': return { mnemonic: 'SHR', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'SUBN': return { mnemonic: 'SUBN', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'SHL': return { mnemonic: 'SHL', operand: `${V(ins.x)}, ${V(ins.y)}` };
    case 'LD_I': return { mnemonic: 'LD', operand: `I, $${hex3(ins.nnn)}` };
    case 'JP_V0': return { mnemonic: 'JP', operand: `V0, $${hex3(ins.nnn)}` };
    case 'RND': return { mnemonic: 'RND', operand: `${V(ins.x)}, #$${hex2(ins.nn)}` };
    case 'DRW': return { mnemonic: 'DRW', operand: `${V(ins.x)}, ${V(ins.y)}, ${ins.n}` };
    case 'SKP': return { mnemonic: 'SKP', operand: V(ins.x) };
    case 'SKNP': return { mnemonic: 'SKNP', operand: V(ins.x) };
    case 'LD_VX_DT': return { mnemonic: 'LD', operand: `${V(ins.x)}, DT` };
    case 'LD_VX_K': return { mnemonic: 'LD', operand: `${V(ins.x)}, K` };
    case 'LD_DT_VX': return { mnemonic: 'LD', operand: `DT, ${V(ins.x)}` };
    case 'LD_ST_VX': return { mnemonic: 'LD', operand: `ST, ${V(ins.x)}` };
    case 'ADD_I_VX': return { mnemonic: 'ADD', operand: `I, ${V(ins.x)}` };
    case 'LD_F_VX': return { mnemonic: 'LD', operand: `F, ${V(ins.x)}` };
    case 'LD_B_VX': return { mnemonic: 'LD', operand: `B, ${V(ins.x)}` };
    case 'LD_MEM_VX': return { mnemonic: 'LD', operand: `[I], ${V(ins.x)}` };
    case 'LD_VX_MEM': return { mnemonic: 'LD', operand: `${V(ins.x)}, [I]` };
    case 'UNKNOWN': return { mnemonic: '???', operand: '' };
  }
}

export function disasmAt(read: ReadByteFn, pc: Word): DisasmLine {
  const opcode = ((read(pc) & 0xFF) << 8) | (read(pc + 1) & 0xFF);
  const instruction = decode(opcode);
  return { opcode, instruction, ...disasmInstruction(instruction) };
}

// Listing of a program image loaded at `origin` (two bytes per line)
export function disasmProgram(bytes: Uint8Array, origin = 0x200): string[] {
  const out: string[] = [];
  for (let off = 0; off + 1 < bytes.length; off += 2) {
    const d = disasmAt((addr) => bytes[addr - origin], origin + off);
    const text = (d.mnemonic + (d.operand ? ' ' + d.operand : '')).trim();
    out.push(`${hex3(origin + off)}  ${hex4(d.opcode)}  ${text}`);
  }
  return out;
}

export function formatTraceLine(pc: Word, opcode: Word, res: DisasmResult, st: CPUState): string {
  const dis = (res.mnemonic + (res.operand ? ' ' + res.operand : '')).trim();
  const left = `${hex3(pc)}  ${hex4(opcode)}  ${dis}`;
  const regCol = 28;
  const pad = left.length < regCol ? ' '.repeat(regCol - left.length) : ' ';
  const regs = st.v.map((b) => hex2(b)).join(' ');
  return `${left}${pad}I:${hex3(st.i)} V:${regs} SP:${st.sp} DT:${hex2(st.delay)} ST:${hex2(st.sound)}`;
}
