import { describe, it, expect } from 'vitest';
import { DEFAULT_KEYMAP, keyForCode, parseKeymap } from '@host/keymap';

describe('keymap', () => {
  it('maps the left-hand 4x4 block onto the hex keypad', () => {
    expect(keyForCode('Digit1')).toBe(0x1);
    expect(keyForCode('Digit4')).toBe(0xC);
    expect(keyForCode('KeyQ')).toBe(0x4);
    expect(keyForCode('KeyX')).toBe(0x0);
    expect(keyForCode('KeyV')).toBe(0xF);
    expect(keyForCode('KeyZ')).toBe(0xA);
    expect(keyForCode('KeyY')).toBe(0xA);
  });

  it('returns null for unmapped codes', () => {
    expect(keyForCode('KeyP')).toBe(null);
  });

  it('covers all sixteen keys', () => {
    expect(new Set(DEFAULT_KEYMAP.values()).size).toBe(16);
  });

  it('parseKeymap overrides entries on top of the defaults', () => {
    const map = parseKeymap('KeyP=a, ArrowUp=5');
    expect(keyForCode('KeyP', map)).toBe(0xA);
    expect(keyForCode('ArrowUp', map)).toBe(0x5);
    expect(keyForCode('KeyW', map)).toBe(0x5);
    expect(keyForCode('KeyP')).toBe(null);
  });

  it('parseKeymap rejects malformed entries', () => {
    expect(() => parseKeymap('KeyP')).toThrow('keymap entry "KeyP" must look like Code=HexDigit');
    expect(() => parseKeymap('KeyP=10')).toThrow(RangeError);
  });
});
