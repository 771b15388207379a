import { describe, it, expect } from 'vitest';
import { cpuWithProgram } from '../helpers/chip8h';

describe('CPU quirks', () => {
  it('shiftUsesVy: 8XY6 shifts VY into VX', () => {
    const { cpu, state } = cpuWithProgram([0x8016], { quirks: { shiftUsesVy: true } });
    state.setRegister(0, 0xF0);
    state.setRegister(1, 0x03);
    cpu.step();
    expect(state.getRegister(0)).toBe(0x01);
    expect(state.getRegister(1)).toBe(0x03);
    expect(state.getRegister(0xF)).toBe(1);
  });

  it('shiftUsesVy: 8XYE shifts VY into VX', () => {
    const { cpu, state } = cpuWithProgram([0x801E], { quirks: { shiftUsesVy: true } });
    state.setRegister(0, 0x01);
    state.setRegister(1, 0x80);
    cpu.step();
    expect(state.getRegister(0)).toBe(0x00);
    expect(state.getRegister(0xF)).toBe(1);
  });

  it('loadStoreIncrementsI: FX55 leaves I past the last register', () => {
    const { cpu, state } = cpuWithProgram([0xA300, 0xF255], { quirks: { loadStoreIncrementsI: true } });
    cpu.step(); cpu.step();
    expect(state.getRegister('I')).toBe(0x303);
  });

  it('loadStoreIncrementsI: FX65 leaves I past the last register', () => {
    const { cpu, state } = cpuWithProgram([0xA300, 0xF065], { quirks: { loadStoreIncrementsI: true } });
    cpu.step(); cpu.step();
    expect(state.getRegister('I')).toBe(0x301);
  });

  it('logicResetsVf: 8XY1/8XY2/8XY3 clear VF after the result', () => {
    for (const op of [0x8011, 0x8012, 0x8013]) {
      const { cpu, state } = cpuWithProgram([op], { quirks: { logicResetsVf: true } });
      state.setRegister(0, 0x0C);
      state.setRegister(1, 0x0A);
      state.setRegister(0xF, 0x77);
      cpu.step();
      expect(state.getRegister(0xF)).toBe(0);
    }
  });

  it('defaults are the modern conventions', () => {
    const { cpu } = cpuWithProgram([]);
    expect(cpu.getQuirks()).toEqual({ shiftUsesVy: false, loadStoreIncrementsI: false, logicResetsVf: false });
  });
});
