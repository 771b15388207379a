import type { Byte, Instruction, Nibble, Quirks, UnknownOpcodeMode, Word } from './types';
import { DEFAULT_QUIRKS } from './types';
import { decode } from './decode';
import type { MachineState } from '@core/machine/state';
import { MachineFault, VMFault } from '@core/errors';
import { glyphAddress } from '@core/font/font';
import { disasmInstruction, formatTraceLine } from '@utils/disasm';

const VF = 0xF;

export type TraceHook = (pc: Word, opcode: Word, ins: Instruction) => void;

export interface CPUOptions {
  quirks?: Partial<Quirks>;
  unknownOpcodes?: UnknownOpcodeMode;
  // Source of CXNN random bytes; injectable for deterministic runs
  rng?: () => Byte;
}

export const randomByte = (): Byte => Math.floor(Math.random() * 256) & 0xFF;

const hex4 = (v: number): string => v.toString(16).toUpperCase().padStart(4, '0');

// Fetch-decode-execute engine bound to one MachineState.
export class Chip8CPU {
  private quirks: Quirks;
  private unknownMode: UnknownOpcodeMode;
  private rng: () => Byte;
  private _fault: VMFault | null = null;
  private executed = 0;
  // optional external per-instruction trace hook
  private traceHook: TraceHook | null = null;
  // CHIP8_TRACE console tracing, optionally limited to an instruction-count window
  private envTrace = false;
  private envTraceStart = 0;
  private envTraceEnd = Number.MAX_SAFE_INTEGER;

  constructor(private state: MachineState, opts: CPUOptions = {}) {
    this.quirks = { ...DEFAULT_QUIRKS, ...opts.quirks };
    this.unknownMode = opts.unknownOpcodes ?? 'strict';
    this.rng = opts.rng ?? randomByte;
    const env = typeof process !== 'undefined' ? process.env : undefined;
    if (env && env.CHIP8_TRACE === '1') {
      this.envTrace = true;
      const m = /^(\d+)-(\d+)$/.exec(env.CHIP8_TRACE_WINDOW ?? '');
      if (m) {
        this.envTraceStart = parseInt(m[1], 10);
        this.envTraceEnd = parseInt(m[2], 10);
      }
    }
  }

  setTraceHook(fn: TraceHook | null): void { this.traceHook = fn; }
  setUnknownOpcodeMode(mode: UnknownOpcodeMode): void { this.unknownMode = mode; }
  getQuirks(): Readonly<Quirks> { return this.quirks; }

  get halted(): boolean { return this._fault !== null; }
  get fault(): VMFault | null { return this._fault; }
  // Instructions fully executed (key-wait polls are not counted)
  get instructionCount(): number { return this.executed; }

  step(): void {
    if (this._fault) return;
    const s = this.state;

    // FX0A suspension: no fetch until a key goes down
    if (s.awaitingKey) {
      const target = s.keyWaitTarget;
      const key = s.takeLatchedKey();
      if (key === null || target === null) return;
      s.setRegister(target, key);
      s.pc = (s.pc + 2) & 0xFFFF;
      this.executed++;
      return;
    }

    const pc = s.pc;
    let opcode = 0;
    try {
      opcode = (s.readByte(pc) << 8) | s.readByte(pc + 1);
      s.pc = (pc + 2) & 0xFFFF;
      const ins = decode(opcode);
      this.trace(pc, opcode, ins);
      this.execute(ins, pc, opcode);
      this.executed++;
    } catch (e) {
      if (e instanceof MachineFault) throw this.halt(VMFault.fromMachineFault(e, pc, opcode), pc);
      if (e instanceof VMFault) throw this.halt(e, pc);
      throw e;
    }
  }

  private halt(fault: VMFault, pc: Word): VMFault {
    this._fault = fault;
    // leave PC on the failing instruction
    this.state.pc = pc;
    return fault;
  }

  private trace(pc: Word, opcode: Word, ins: Instruction): void {
    if (this.traceHook) this.traceHook(pc, opcode, ins);
    if (this.envTrace && this.executed >= this.envTraceStart && this.executed <= this.envTraceEnd) {
      // eslint-disable-next-line no-console
      console.log(formatTraceLine(pc, opcode, disasmInstruction(ins), this.state.snapshot()));
    }
  }

  private v(x: Nibble): Byte { return this.state.getRegister(x); }
  private setV(x: Nibble, value: number): void { this.state.setRegister(x, value); }
  private skip(): void { this.state.pc = (this.state.pc + 2) & 0xFFFF; }
  private get i(): Word { return this.state.getRegister('I'); }
  private set i(value: Word) { this.state.setRegister('I', value); }

  private shiftSource(x: Nibble, y: Nibble): Byte {
    return this.quirks.shiftUsesVy ? this.v(y) : this.v(x);
  }

  // When VF is also an operand or the destination, the result is written first and VF last.
  private execute(ins: Instruction, pc: Word, opcode: Word): void {
    const s = this.state;
    switch (ins.kind) {
      case 'CLS': s.framebuffer.clear(); return;
      case 'RET': s.pc = s.pop(); return;
      case 'JP': s.pc = ins.nnn; return;
      case 'CALL': s.push(s.pc); s.pc = ins.nnn; return;
      case 'SE_VX_NN': if (this.v(ins.x) === ins.nn) this.skip(); return;
      case 'SNE_VX_NN': if (this.v(ins.x) !== ins.nn) this.skip(); return;
      case 'SE_VX_VY': if (this.v(ins.x) === this.v(ins.y)) this.skip(); return;
      case 'SNE_VX_VY': if (this.v(ins.x) !== this.v(ins.y)) this.skip(); return;
      case 'LD_VX_NN': this.setV(ins.x, ins.nn); return;
      case 'ADD_VX_NN': this.setV(ins.x, (this.v(ins.x) + ins.nn) & 0xFF); return;
      case 'LD_VX_VY': this.setV(ins.x, this.v(ins.y)); return;
      case 'OR':
        this.setV(ins.x, this.v(ins.x) | this.v(ins.y));
        if (this.quirks.logicResetsVf) this.setV(VF, 0);
        return;
      case 'AND':
        this.setV(ins.x, this.v(ins.x) & this.v(ins.y));
        if (this.quirks.logicResetsVf) this.setV(VF, 0);
        return;
      case 'XOR':
        this.setV(ins.x, this.v(ins.x) ^ this.v(ins.y));
        if (this.quirks.logicResetsVf) this.setV(VF, 0);
        return;
      case 'ADD_VX_VY': {
        const sum = this.v(ins.x) + this.v(ins.y);
        this.setV(ins.x, sum & 0xFF);
        this.setV(VF, sum > 0xFF ? 1 : 0);
        return;
      }
      case 'SUB': {
        const a = this.v(ins.x), b = this.v(ins.y);
        this.setV(ins.x, (a - b) & 0xFF);
        this.setV(VF, a >= b ? 1 : 0);
        return;
      }
      case 'SUBN': {
        const a = this.v(ins.x), b = this.v(ins.y);
        this.setV(ins.x, (b - a) & 0xFF);
        this.setV(VF, b >= a ? 1 : 0);
        return;
      }
      case 'SHR': {
        const src = this.shiftSource(ins.x, ins.y);
        this.setV(ins.x, src >> 1);
        this.setV(VF, src & 0x01);
        return;
      }
      case 'SHL': {
        const src = this.shiftSource(ins.x, ins.y);
        this.setV(ins.x, (src << 1) & 0xFF);
        this.setV(VF, (src >> 7) & 0x01);
        return;
      }
      case 'LD_I': this.i = ins.nnn; return;
      case 'JP_V0': s.pc = ins.nnn + this.v(0); return;
      case 'RND': this.setV(ins.x, this.rng() & ins.nn); return;
      case 'DRW': {
        const collided = s.drawSprite(this.v(ins.x), this.v(ins.y), ins.n);
        this.setV(VF, collided ? 1 : 0);
        return;
      }
      case 'SKP': if (s.isKeyDown(this.v(ins.x) & 0xF)) this.skip(); return;
      case 'SKNP': if (!s.isKeyDown(this.v(ins.x) & 0xF)) this.skip(); return;
      case 'LD_VX_DT': this.setV(ins.x, s.delay); return;
      case 'LD_DT_VX': s.delay = this.v(ins.x); return;
      case 'LD_ST_VX': s.sound = this.v(ins.x); return;
      case 'LD_VX_K':
        // PC stays on this instruction until a key is latched
        s.beginKeyWait(ins.x);
        s.pc = pc;
        return;
      case 'ADD_I_VX': this.i = (this.i + this.v(ins.x)) & 0xFFF; return;
      case 'LD_F_VX': this.i = glyphAddress(this.v(ins.x)); return;
      case 'LD_B_VX': {
        const val = this.v(ins.x);
        const base = this.i;
        s.writeByte(base, Math.floor(val / 100));
        s.writeByte(base + 1, Math.floor(val / 10) % 10);
        s.writeByte(base + 2, val % 10);
        return;
      }
      case 'LD_MEM_VX': {
        const base = this.i;
        for (let r = 0; r <= ins.x; r++) s.writeByte(base + r, this.v(r));
        if (this.quirks.loadStoreIncrementsI) this.i = (base + ins.x + 1) & 0xFFF;
        return;
      }
      case 'LD_VX_MEM': {
        const base = this.i;
        for (let r = 0; r <= ins.x; r++) this.setV(r, s.readByte(base + r));
        if (this.quirks.loadStoreIncrementsI) this.i = (base + ins.x + 1) & 0xFFF;
        return;
      }
      case 'UNKNOWN':
        if (this.unknownMode === 'strict') {
          throw new VMFault('unknown-opcode', pc, opcode, `$${hex4(opcode)} is not a Chip-8 instruction`);
        }
        if (this.envTrace) {
          // eslint-disable-next-line no-console
          console.log(`[cpu] unknown opcode $${hex4(opcode)} at PC=$${hex4(pc)} skipped`);
        }
        return;
      default: {
        const unreachable: never = ins;
        throw new Error(`Unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
