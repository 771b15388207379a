import { describe, it, expect } from 'vitest';
import { cpuWithProgram, steps } from '../helpers/chip8h';
import { VMFault } from '@core/errors';

describe('CPU flow control', () => {
  it('runs straight-line code: V0 := 5; V0 += 3', () => {
    const { cpu, state } = cpuWithProgram([0x6005, 0x7003]);
    steps(cpu, 2);
    expect(state.getRegister(0)).toBe(8);
    expect(state.pc).toBe(0x204);
  });

  it('1NNN jumps without auto-advance', () => {
    const { cpu, state } = cpuWithProgram([0x1234]);
    cpu.step();
    expect(state.pc).toBe(0x234);
  });

  it('2NNN pushes the address after the call and 00EE returns to it', () => {
    // $200: CALL $206; $202: LD V1,#01; $204: JP $204; $206: LD V2,#02; $208: RET
    const { cpu, state } = cpuWithProgram([0x2206, 0x6101, 0x1204, 0x6202, 0x00EE]);
    cpu.step(); // CALL
    expect(state.pc).toBe(0x206);
    expect(state.snapshot().stack).toEqual([0x202]);
    cpu.step(); // LD V2
    cpu.step(); // RET
    expect(state.pc).toBe(0x202);
    expect(state.stackDepth).toBe(0);
    cpu.step(); // LD V1
    expect(state.getRegister(1)).toBe(1);
    expect(state.getRegister(2)).toBe(2);
  });

  it('nested calls unwind in reverse order', () => {
    // $200: CALL $206; $202: JP $202; $204: (pad); $206: CALL $20A; $208: RET; $20A: RET
    const { cpu, state } = cpuWithProgram([0x2206, 0x1202, 0x0000, 0x220A, 0x00EE, 0x00EE]);
    cpu.step();
    cpu.step();
    expect(state.pc).toBe(0x20A);
    expect(state.snapshot().stack).toEqual([0x202, 0x208]);
    cpu.step();
    expect(state.pc).toBe(0x208);
    cpu.step();
    expect(state.pc).toBe(0x202);
  });

  it('00EE with an empty stack is a fatal fault carrying PC and opcode', () => {
    const { cpu, state } = cpuWithProgram([0x00EE]);
    let caught: unknown = null;
    try { cpu.step(); } catch (e) { caught = e; }
    expect(caught).toBeInstanceOf(VMFault);
    if (!(caught instanceof VMFault)) return;
    const fault = caught;
    expect(fault.kind).toBe('stack-underflow');
    expect(fault.pc).toBe(0x200);
    expect(fault.opcode).toBe(0x00EE);
    expect(fault.message).toBe('stack-underflow at PC=$0200 op=$00EE: return with an empty call stack');
    expect(cpu.halted).toBe(true);
    expect(state.pc).toBe(0x200);
  });

  it('a halted engine makes no further progress', () => {
    const { cpu, state } = cpuWithProgram([0x00EE, 0x6001]);
    expect(() => cpu.step()).toThrow(VMFault);
    cpu.step();
    cpu.step();
    expect(state.pc).toBe(0x200);
    expect(state.getRegister(0)).toBe(0);
    expect(cpu.instructionCount).toBe(0);
  });

  it('the 17th nested call overflows the stack', () => {
    // $200: CALL $200 recurses forever
    const { cpu, state } = cpuWithProgram([0x2200]);
    steps(cpu, 16);
    expect(state.stackDepth).toBe(16);
    expect(() => cpu.step()).toThrow(/^stack-overflow at PC=\$0200 op=\$2200/);
    expect(cpu.fault?.kind).toBe('stack-overflow');
  });

  it('3XNN/4XNN skip on equal / not equal', () => {
    const { cpu, state } = cpuWithProgram([0x6042, 0x3042, 0x0000, 0x4042, 0x6101]);
    steps(cpu, 2); // LD, SE (skips)
    expect(state.pc).toBe(0x206);
    cpu.step(); // SNE V0,#42 does not skip
    expect(state.pc).toBe(0x208);
    cpu.step();
    expect(state.getRegister(1)).toBe(1);
  });

  it('5XY0/9XY0 compare registers', () => {
    const { cpu, state } = cpuWithProgram([0x6007, 0x6107, 0x5010, 0x0000, 0x9010, 0x6203]);
    steps(cpu, 3);
    expect(state.pc).toBe(0x208); // 5XY0 skipped
    cpu.step(); // 9XY0 equal -> no skip
    expect(state.pc).toBe(0x20A);
    cpu.step();
    expect(state.getRegister(2)).toBe(3);
  });

  it('9XY0 skips when registers differ', () => {
    const { cpu, state } = cpuWithProgram([0x6001, 0x9010]);
    steps(cpu, 2);
    expect(state.pc).toBe(0x206);
  });

  it('BNNN jumps to NNN + V0', () => {
    const { cpu, state } = cpuWithProgram([0x6010, 0xB300]);
    steps(cpu, 2);
    expect(state.pc).toBe(0x310);
  });

  it('BNNN past the end of memory faults on the next fetch', () => {
    const { cpu } = cpuWithProgram([0x60FF, 0xBFFF]);
    steps(cpu, 2);
    expect(() => cpu.step()).toThrow(VMFault);
    expect(cpu.fault?.kind).toBe('address-out-of-range');
    expect(cpu.fault?.pc).toBe(0x10FE);
  });
});
