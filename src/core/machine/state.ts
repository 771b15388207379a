import type { Byte, CPUState, Nibble, RegisterName, Word } from '@core/cpu/types';
import { Memory, PROGRAM_START } from '@core/bus/memory';
import { Framebuffer } from '@core/video/framebuffer';
import { Keypad } from '@core/input/keypad';
import { MachineFault } from '@core/errors';

export const STACK_DEPTH = 16;
export const REGISTER_COUNT = 16;

// All mutable VM data for one session. The engine is the only ISA-level mutator;
// the host writes key state and ticks timers between steps.
export class MachineState {
  readonly memory: Memory;
  readonly framebuffer = new Framebuffer();
  readonly keypad = new Keypad();

  private v = new Uint8Array(REGISTER_COUNT);
  private i: Word = 0;
  pc: Word = PROGRAM_START;
  private stack = new Uint16Array(STACK_DEPTH);
  private sp = 0;
  private _delay: Byte = 0;
  private _sound: Byte = 0;
  // Destination register of a pending FX0A, null when not waiting
  private keyWaitRegister: Nibble | null = null;

  constructor(memory: Memory = new Memory()) {
    this.memory = memory;
  }

  readByte(addr: Word): Byte { return this.memory.read(addr); }
  writeByte(addr: Word, value: Byte): void { this.memory.write(addr, value); }

  getRegister(r: RegisterName): number {
    if (r === 'I') return this.i;
    return this.v[checkRegister(r)];
  }

  setRegister(r: RegisterName, value: number): void {
    if (r === 'I') { this.i = value & 0xFFFF; return; }
    this.v[checkRegister(r)] = value & 0xFF;
  }

  push(addr: Word): void {
    if (this.sp >= STACK_DEPTH) {
      throw new MachineFault('stack-overflow', `call depth exceeds ${STACK_DEPTH}`);
    }
    this.stack[this.sp++] = addr & 0xFFFF;
  }

  pop(): Word {
    if (this.sp === 0) {
      throw new MachineFault('stack-underflow', 'return with an empty call stack');
    }
    return this.stack[--this.sp];
  }

  get stackDepth(): number { return this.sp; }

  get delay(): Byte { return this._delay; }
  set delay(value: Byte) { this._delay = value & 0xFF; }
  get sound(): Byte { return this._sound; }
  set sound(value: Byte) { this._sound = value & 0xFF; }

  // 60Hz decay, floored at zero
  tickTimers(): void {
    if (this._delay > 0) this._delay--;
    if (this._sound > 0) this._sound--;
  }

  setKey(index: number, down: boolean): void { this.keypad.setKey(index, down); }
  isKeyDown(index: number): boolean { return this.keypad.isKeyDown(index); }

  // XOR `rows` bytes of sprite data read at I; true when any lit pixel was cleared
  drawSprite(x: number, y: number, rows: number): boolean {
    const data = new Uint8Array(rows);
    for (let r = 0; r < rows; r++) data[r] = this.readByte(this.i + r);
    return this.framebuffer.drawSprite(x, y, data);
  }

  beginKeyWait(register: Nibble): void {
    this.keyWaitRegister = checkRegister(register);
    this.keypad.armWait();
  }

  get awaitingKey(): boolean { return this.keyWaitRegister !== null; }
  get keyWaitTarget(): Nibble | null { return this.keyWaitRegister; }

  // Consume a latched key press; returns null while the wait is still pending
  takeLatchedKey(): number | null {
    if (this.keyWaitRegister === null) return null;
    const key = this.keypad.takeLatched();
    if (key !== null) this.keyWaitRegister = null;
    return key;
  }

  snapshot(): CPUState {
    return {
      v: Array.from(this.v),
      i: this.i,
      pc: this.pc,
      sp: this.sp,
      stack: Array.from(this.stack.subarray(0, this.sp)),
      delay: this._delay,
      sound: this._sound,
    };
  }
}

function checkRegister(r: number): Nibble {
  if (!Number.isInteger(r) || r < 0 || r >= REGISTER_COUNT) {
    throw new RangeError(`register V${r} does not exist`);
  }
  return r;
}
