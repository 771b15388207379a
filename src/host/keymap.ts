// Physical keyboard -> hex keypad. Keys are KeyboardEvent.code values so the
// layout follows key positions rather than the characters they type.
//   1 2 3 4      1 2 3 C
//   Q W E R  ->  4 5 6 D
//   A S D F      7 8 9 E
//   Z X C V      A 0 B F
// KeyY doubles as A for QWERTZ keyboards where Y and Z swap places.
export type Keymap = ReadonlyMap<string, number>;

export const DEFAULT_KEYMAP: Keymap = new Map<string, number>([
  ['Digit1', 0x1], ['Digit2', 0x2], ['Digit3', 0x3], ['Digit4', 0xC],
  ['KeyQ', 0x4], ['KeyW', 0x5], ['KeyE', 0x6], ['KeyR', 0xD],
  ['KeyA', 0x7], ['KeyS', 0x8], ['KeyD', 0x9], ['KeyF', 0xE],
  ['KeyZ', 0xA], ['KeyY', 0xA], ['KeyX', 0x0], ['KeyC', 0xB], ['KeyV', 0xF],
]);

export const keyForCode = (code: string, map: Keymap = DEFAULT_KEYMAP): number | null => map.get(code) ?? null;

// Parse "KeyQ=4,KeyW=5" overrides on top of a base map
export const parseKeymap = (list: string, base: Keymap = DEFAULT_KEYMAP): Keymap => {
  const out = new Map(base);
  for (const part of list.split(',')) {
    const entry = part.trim();
    if (!entry) continue;
    const m = /^([A-Za-z0-9]+)=([0-9a-fA-F])$/.exec(entry);
    if (!m) throw new RangeError(`keymap entry "${entry}" must look like Code=HexDigit`);
    out.set(m[1], parseInt(m[2], 16));
  }
  return out;
};
