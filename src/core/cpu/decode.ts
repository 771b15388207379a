import type { Instruction, Word } from './types';

// Decode a 16-bit opcode by nibble pattern. Anything not in the base Chip-8 set is UNKNOWN.
export function decode(opcode: Word): Instruction {
  const op = opcode & 0xFFFF;
  const x = (op >> 8) & 0xF;
  const y = (op >> 4) & 0xF;
  const n = op & 0xF;
  const nn = op & 0xFF;
  const nnn = op & 0xFFF;

  switch (op >> 12) {
    case 0x0:
      if (op === 0x00E0) return { kind: 'CLS' };
      if (op === 0x00EE) return { kind: 'RET' };
      break; // 0NNN (machine-code SYS call) is not supported
    case 0x1: return { kind: 'JP', nnn };
    case 0x2: return { kind: 'CALL', nnn };
    case 0x3: return { kind: 'SE_VX_NN', x, nn };
    case 0x4: return { kind: 'SNE_VX_NN', x, nn };
    case 0x5:
      if (n === 0) return { kind: 'SE_VX_VY', x, y };
      break;
    case 0x6: return { kind: 'LD_VX_NN', x, nn };
    case 0x7: return { kind: 'ADD_VX_NN', x, nn };
    case 0x8:
      switch (n) {
        case 0x0: return { kind: 'LD_VX_VY', x, y };
        case 0x1: return { kind: 'OR', x, y };
        case 0x2: return { kind: 'AND', x, y };
        case 0x3: return { kind: 'XOR', x, y };
        case 0x4: return { kind: 'ADD_VX_VY', x, y };
        case 0x5: return { kind: 'SUB', x, y };
        case 0x6: return { kind: 'SHR', x, y };
        case 0x7: return { kind: 'SUBN', x, y };
        case 0xE: return { kind: 'SHL', x, y };
      }
      break;
    case 0x9:
      if (n === 0) return { kind: 'SNE_VX_VY', x, y };
      break;
    case 0xA: return { kind: 'LD_I', nnn };
    case 0xB: return { kind: 'JP_V0', nnn };
    case 0xC: return { kind: 'RND', x, nn };
    case 0xD: return { kind: 'DRW', x, y, n };
    case 0xE:
      if (nn === 0x9E) return { kind: 'SKP', x };
      if (nn === 0xA1) return { kind: 'SKNP', x };
      break;
    case 0xF:
      switch (nn) {
        case 0x07: return { kind: 'LD_VX_DT', x };
        case 0x0A: return { kind: 'LD_VX_K', x };
        case 0x15: return { kind: 'LD_DT_VX', x };
        case 0x18: return { kind: 'LD_ST_VX', x };
        case 0x1E: return { kind: 'ADD_I_VX', x };
        case 0x29: return { kind: 'LD_F_VX', x };
        case 0x33: return { kind: 'LD_B_VX', x };
        case 0x55: return { kind: 'LD_MEM_VX', x };
        case 0x65: return { kind: 'LD_VX_MEM', x };
      }
      break;
  }
  return { kind: 'UNKNOWN', opcode: op };
}
