import { Memory } from '@core/bus/memory';
import { Chip8CPU } from '@core/cpu/cpu';
import { MachineState } from '@core/machine/state';
import type { Framebuffer } from '@core/video/framebuffer';
import { resolveConfig } from './config';
import type { SystemConfig, SystemOptions } from './config';

export interface FrameResult {
  instructions: number; // instructions completed this frame
  halted: boolean;
}

// One emulation session: a MachineState plus the engine bound to it.
export class Chip8System {
  readonly config: SystemConfig;
  public state: MachineState;
  public cpu: Chip8CPU;
  private rom: Uint8Array = new Uint8Array(0);

  constructor(opts: SystemOptions = {}) {
    this.config = resolveConfig(opts);
    this.state = new MachineState(new Memory());
    this.cpu = this.makeCpu();
  }

  // Validates the size first; a rejected ROM leaves the current session as it was
  loadRom(bytes: Uint8Array): void {
    const fresh = new MachineState(new Memory());
    fresh.memory.loadRom(bytes);
    this.rom = bytes.slice();
    this.state = fresh;
    this.cpu = this.makeCpu();
  }

  // Fresh state (font, PC=$200) with the current ROM reloaded
  reset(): void {
    this.state = new MachineState(new Memory());
    this.state.memory.loadRom(this.rom);
    this.cpu = this.makeCpu();
  }

  stepInstruction(): void {
    this.cpu.step();
  }

  // Run one 60Hz frame: the configured instruction budget, then one timer tick.
  // Stops early when the engine halts. A VMFault from step() propagates before the timer tick.
  runFrame(): FrameResult {
    const before = this.cpu.instructionCount;
    for (let n = 0; n < this.config.instructionsPerFrame && !this.cpu.halted; n++) {
      this.cpu.step();
    }
    this.state.tickTimers();
    return { instructions: this.cpu.instructionCount - before, halted: this.cpu.halted };
  }

  tickTimers(): void { this.state.tickTimers(); }
  setKey(index: number, down: boolean): void { this.state.setKey(index, down); }
  isSoundActive(): boolean { return this.state.sound > 0; }
  get framebuffer(): Framebuffer { return this.state.framebuffer; }

  private makeCpu(): Chip8CPU {
    const { quirks, unknownOpcodes, rng } = this.config;
    return new Chip8CPU(this.state, { quirks, unknownOpcodes, rng });
  }
}
