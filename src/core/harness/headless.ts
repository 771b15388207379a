import { Chip8System } from '@core/system/system';
import type { SystemOptions } from '@core/system/config';
import { VMFault } from '@core/errors';

export interface RunResult {
  frames: number;
  instructions: number;
  reason: 'halt' | 'fault' | 'timeout' | 'stopped';
  message?: string;
  system: Chip8System;
}

export interface RunOptions extends SystemOptions {
  maxFrames: number;
  // Checked after every frame; returning true ends the run with reason 'stopped'
  stopWhen?: (sys: Chip8System, frame: number) => boolean;
  // Key presses applied at the start of the given frame
  keyEvents?: ReadonlyArray<{ frame: number; key: number; down: boolean }>;
}

// A `1NNN` that targets its own address: the usual way test programs park themselves
export function isSpinning(sys: Chip8System): boolean {
  const pc = sys.state.pc;
  if (pc + 1 > 0xFFF) return false;
  const opcode = (sys.state.readByte(pc) << 8) | sys.state.readByte(pc + 1);
  return opcode === (0x1000 | pc);
}

export function runRom(bytes: Uint8Array, opts: RunOptions): RunResult {
  const sys = new Chip8System(opts);
  sys.loadRom(bytes);

  let frames = 0;
  while (frames < opts.maxFrames) {
    for (const ev of opts.keyEvents ?? []) {
      if (ev.frame === frames) sys.setKey(ev.key, ev.down);
    }
    try {
      sys.runFrame();
    } catch (e) {
      if (e instanceof VMFault) {
        return { frames: frames + 1, instructions: sys.cpu.instructionCount, reason: 'fault', message: e.message, system: sys };
      }
      throw e;
    }
    frames++;
    if (isSpinning(sys)) {
      return { frames, instructions: sys.cpu.instructionCount, reason: 'halt', system: sys };
    }
    if (opts.stopWhen && opts.stopWhen(sys, frames)) {
      return { frames, instructions: sys.cpu.instructionCount, reason: 'stopped', system: sys };
    }
  }
  return { frames, instructions: sys.cpu.instructionCount, reason: 'timeout', system: sys };
}
