import { describe, it, expect } from 'vitest';
import { Memory, MAX_ROM_SIZE, PROGRAM_START } from '@core/bus/memory';
import { MachineFault, RomError } from '@core/errors';
import { FONT_BASE, FONT_DATA } from '@core/font/font';

describe('Memory', () => {
  it('installs the font at $050 and protects $000-$1FF', () => {
    const mem = new Memory();
    expect(mem.reservedRegionProtected).toBe(true);
    expect(Array.from(mem.view().slice(FONT_BASE, FONT_BASE + FONT_DATA.length))).toEqual(Array.from(FONT_DATA));
    expect(() => mem.write(0x1FF, 1)).toThrow('protected-write: write of $01 to reserved address $1FF');
    mem.write(PROGRAM_START, 0xAB);
    expect(mem.read(PROGRAM_START)).toBe(0xAB);
  });

  it('the last font glyph is F', () => {
    const mem = new Memory();
    const f = [0, 1, 2, 3, 4].map((k) => mem.read(FONT_BASE + 15 * 5 + k));
    expect(f).toEqual([0xF0, 0x80, 0xF0, 0x80, 0x80]);
  });

  it('without a font the low region is writable', () => {
    const mem = new Memory({ font: false });
    expect(mem.reservedRegionProtected).toBe(false);
    mem.write(0x010, 0x42);
    expect(mem.read(0x010)).toBe(0x42);
  });

  it('faults outside $000-$FFF', () => {
    const mem = new Memory();
    expect(() => mem.read(0x1000)).toThrow(MachineFault);
    expect(() => mem.read(-1)).toThrow('address-out-of-range: address -1 is outside $000-$FFF');
    expect(() => mem.write(0x1000, 0)).toThrow('address-out-of-range: address $1000 is outside $000-$FFF');
  });

  it('masks written values to a byte', () => {
    const mem = new Memory();
    mem.write(0x300, 0x1FE);
    expect(mem.read(0x300)).toBe(0xFE);
  });

  it('loadRom copies the image to $200 and clears what a previous image left', () => {
    const mem = new Memory();
    mem.loadRom(new Uint8Array([1, 2, 3, 4]));
    mem.loadRom(new Uint8Array([9]));
    expect([mem.read(0x200), mem.read(0x201), mem.read(0x203)]).toEqual([9, 0, 0]);
  });

  it('accepts a ROM that exactly fills memory and rejects one byte more', () => {
    const mem = new Memory();
    const full = new Uint8Array(MAX_ROM_SIZE).fill(0x11);
    mem.loadRom(full);
    expect(mem.read(0xFFF)).toBe(0x11);

    const fresh = new Memory();
    let caught: unknown = null;
    try { fresh.loadRom(new Uint8Array(MAX_ROM_SIZE + 1).fill(0x22)); } catch (e) { caught = e; }
    expect(caught).toBeInstanceOf(RomError);
    if (!(caught instanceof RomError)) return;
    expect(caught.kind).toBe('rom-too-large');
    expect(fresh.read(0x200)).toBe(0);
  });
});
