export const KEY_COUNT = 16;

// Hex keypad, keys 0x0..0xF:
//   1 2 3 C
//   4 5 6 D
//   7 8 9 E
//   A 0 B F
// While a key-wait is armed, the first up->down transition is latched until taken.
export class Keypad {
  private pressed = new Array<boolean>(KEY_COUNT).fill(false);
  private waiting = false;
  private latched: number | null = null;

  setKey(index: number, down: boolean): void {
    checkKey(index);
    const was = this.pressed[index];
    this.pressed[index] = down;
    if (this.waiting && down && !was && this.latched === null) this.latched = index;
  }

  isKeyDown(index: number): boolean {
    checkKey(index);
    return this.pressed[index];
  }

  // Bitmask of keys currently down (bit n = key n)
  mask(): number {
    let m = 0;
    for (let i = 0; i < KEY_COUNT; i++) if (this.pressed[i]) m |= 1 << i;
    return m;
  }

  armWait(): void {
    this.waiting = true;
    this.latched = null;
  }

  get isWaiting(): boolean { return this.waiting; }

  // Returns the latched key and disarms the wait, or null while still waiting
  takeLatched(): number | null {
    if (!this.waiting || this.latched === null) return null;
    const key = this.latched;
    this.waiting = false;
    this.latched = null;
    return key;
  }

  releaseAll(): void {
    this.pressed.fill(false);
  }
}

function checkKey(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= KEY_COUNT) {
    throw new RangeError(`key index ${index} is outside 0x0-0xF`);
  }
}
