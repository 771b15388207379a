export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Nibble = number; // 0..15

// Register operand: V0..VF by index, or the index register
export type RegisterName = Nibble | 'I';

export interface CPUState {
  v: Byte[]; // V0..VF
  i: Word;
  pc: Word;
  sp: number; // number of return addresses on the stack
  stack: Word[]; // bottom..top, length === sp
  delay: Byte;
  sound: Byte;
}

// Decoded instruction forms. Mnemonics follow the common Chip-8 assembler names.
export type Instruction =
  | { kind: 'CLS' }
  | { kind: 'RET' }
  | { kind: 'JP'; nnn: Word }
  | { kind: 'CALL'; nnn: Word }
  | { kind: 'SE_VX_NN'; x: Nibble; nn: Byte }
  | { kind: 'SNE_VX_NN'; x: Nibble; nn: Byte }
  | { kind: 'SE_VX_VY'; x: Nibble; y: Nibble }
  | { kind: 'LD_VX_NN'; x: Nibble; nn: Byte }
  | { kind: 'ADD_VX_NN'; x: Nibble; nn: Byte }
  | { kind: 'LD_VX_VY'; x: Nibble; y: Nibble }
  | { kind: 'OR'; x: Nibble; y: Nibble }
  | { kind: 'AND'; x: Nibble; y: Nibble }
  | { kind: 'XOR'; x: Nibble; y: Nibble }
  | { kind: 'ADD_VX_VY'; x: Nibble; y: Nibble }
  | { kind: 'SUB'; x: Nibble; y: Nibble }
  | { kind: 'SHR'; x: Nibble; y: Nibble }
  | { kind: 'SUBN'; x: Nibble; y: Nibble }
  | { kind: 'SHL'; x: Nibble; y: Nibble }
  | { kind: 'SNE_VX_VY'; x: Nibble; y: Nibble }
  | { kind: 'LD_I'; nnn: Word }
  | { kind: 'JP_V0'; nnn: Word }
  | { kind: 'RND'; x: Nibble; nn: Byte }
  | { kind: 'DRW'; x: Nibble; y: Nibble; n: Nibble }
  | { kind: 'SKP'; x: Nibble }
  | { kind: 'SKNP'; x: Nibble }
  | { kind: 'LD_VX_DT'; x: Nibble }
  | { kind: 'LD_VX_K'; x: Nibble }
  | { kind: 'LD_DT_VX'; x: Nibble }
  | { kind: 'LD_ST_VX'; x: Nibble }
  | { kind: 'ADD_I_VX'; x: Nibble }
  | { kind: 'LD_F_VX'; x: Nibble }
  | { kind: 'LD_B_VX'; x: Nibble }
  | { kind: 'LD_MEM_VX'; x: Nibble }
  | { kind: 'LD_VX_MEM'; x: Nibble }
  | { kind: 'UNKNOWN'; opcode: Word };

export type InstructionKind = Instruction['kind'];

// Historically divergent opcode behaviors. All off = modern convention.
export interface Quirks {
  // 8XY6/8XYE shift VY into VX instead of shifting VX in place
  shiftUsesVy: boolean;
  // FX55/FX65 leave I pointing past the last register transferred
  loadStoreIncrementsI: boolean;
  // 8XY1/8XY2/8XY3 clear VF after the logic op
  logicResetsVf: boolean;
}

export const DEFAULT_QUIRKS: Readonly<Quirks> = Object.freeze({
  shiftUsesVy: false,
  loadStoreIncrementsI: false,
  logicResetsVf: false,
});

// 'strict' halts on an undecodable opcode, 'lenient' treats it as a 2-byte no-op
export type UnknownOpcodeMode = 'strict' | 'lenient';
