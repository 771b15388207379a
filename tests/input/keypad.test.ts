import { describe, it, expect } from 'vitest';
import { Keypad } from '@core/input/keypad';

describe('Keypad', () => {
  it('tracks key state and exposes it as a bitmask', () => {
    const kp = new Keypad();
    kp.setKey(0x0, true);
    kp.setKey(0xF, true);
    expect(kp.isKeyDown(0x0)).toBe(true);
    expect(kp.isKeyDown(0x1)).toBe(false);
    expect(kp.mask()).toBe(0x8001);
    kp.setKey(0x0, false);
    expect(kp.mask()).toBe(0x8000);
  });

  it('rejects indices outside 0-F', () => {
    const kp = new Keypad();
    expect(() => kp.setKey(16, true)).toThrow('key index 16 is outside 0x0-0xF');
    expect(() => kp.isKeyDown(1.5)).toThrow(RangeError);
  });

  it('latches only while a wait is armed', () => {
    const kp = new Keypad();
    kp.setKey(2, true);
    expect(kp.takeLatched()).toBe(null);
    kp.setKey(2, false);
    kp.armWait();
    expect(kp.isWaiting).toBe(true);
    expect(kp.takeLatched()).toBe(null);
    kp.setKey(5, true);
    expect(kp.takeLatched()).toBe(5);
    expect(kp.isWaiting).toBe(false);
    expect(kp.takeLatched()).toBe(null);
  });

  it('holding a key is not a transition', () => {
    const kp = new Keypad();
    kp.setKey(8, true);
    kp.armWait();
    kp.setKey(8, true);
    expect(kp.takeLatched()).toBe(null);
  });

  it('re-arming discards a stale latch', () => {
    const kp = new Keypad();
    kp.armWait();
    kp.setKey(1, true);
    kp.armWait();
    expect(kp.takeLatched()).toBe(null);
  });

  it('releaseAll lifts every key', () => {
    const kp = new Keypad();
    for (let k = 0; k < 16; k++) kp.setKey(k, true);
    kp.releaseAll();
    expect(kp.mask()).toBe(0);
  });
});
