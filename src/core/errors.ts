import type { Word } from '@core/cpu/types';

export type MachineFaultKind =
  | 'stack-overflow'
  | 'stack-underflow'
  | 'address-out-of-range'
  | 'protected-write';

export type VMFaultKind = MachineFaultKind | 'unknown-opcode';

export type RomErrorKind = 'rom-too-large' | 'rom-empty';

const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, '0');

// Raised by MachineState primitives. Carries no PC/opcode; the engine adds that context.
export class MachineFault extends Error {
  readonly kind: MachineFaultKind;
  readonly detail: string;

  constructor(kind: MachineFaultKind, detail: string) {
    super(`${kind}: ${detail}`);
    this.name = 'MachineFault';
    this.kind = kind;
    this.detail = detail;
  }
}

// Fatal fault raised from step(); the engine halts after one of these.
export class VMFault extends Error {
  readonly kind: VMFaultKind;
  readonly pc: Word;
  readonly opcode: Word;

  constructor(kind: VMFaultKind, pc: Word, opcode: Word, detail: string, options?: { cause?: unknown }) {
    super(`${kind} at PC=$${hex(pc, 4)} op=$${hex(opcode, 4)}: ${detail}`, options);
    this.name = 'VMFault';
    this.kind = kind;
    this.pc = pc;
    this.opcode = opcode;
  }

  static fromMachineFault(fault: MachineFault, pc: Word, opcode: Word): VMFault {
    return new VMFault(fault.kind, pc, opcode, fault.detail, { cause: fault });
  }
}

// Load-time faults, surfaced before any instruction runs
export class RomError extends Error {
  readonly kind: RomErrorKind;

  constructor(kind: RomErrorKind, message: string) {
    super(message);
    this.name = 'RomError';
    this.kind = kind;
  }
}
