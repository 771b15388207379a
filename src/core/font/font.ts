// Built-in hexadecimal digit sprites, 4 pixels wide and 5 rows tall (high nibble of each byte)
export const FONT_BASE = 0x050;
export const GLYPH_BYTES = 5;

export const FONT_GLYPHS: readonly (readonly number[])[] = [
  [0xF0, 0x90, 0x90, 0x90, 0xF0], // 0
  [0x20, 0x60, 0x20, 0x20, 0x70], // 1
  [0xF0, 0x10, 0xF0, 0x80, 0xF0], // 2
  [0xF0, 0x10, 0xF0, 0x10, 0xF0], // 3
  [0x90, 0x90, 0xF0, 0x10, 0x10], // 4
  [0xF0, 0x80, 0xF0, 0x10, 0xF0], // 5
  [0xF0, 0x80, 0xF0, 0x90, 0xF0], // 6
  [0xF0, 0x10, 0x20, 0x40, 0x40], // 7
  [0xF0, 0x90, 0xF0, 0x90, 0xF0], // 8
  [0xF0, 0x90, 0xF0, 0x10, 0xF0], // 9
  [0xF0, 0x90, 0xF0, 0x90, 0x90], // A
  [0xE0, 0x90, 0xE0, 0x90, 0xE0], // B
  [0xF0, 0x80, 0x80, 0x80, 0xF0], // C
  [0xE0, 0x90, 0x90, 0x90, 0xE0], // D
  [0xF0, 0x80, 0xF0, 0x80, 0xF0], // E
  [0xF0, 0x80, 0xF0, 0x80, 0x80], // F
];

export const FONT_DATA: Uint8Array = Uint8Array.from(FONT_GLYPHS.flat());

export const glyphAddress = (digit: number): number => FONT_BASE + (digit & 0x0F) * GLYPH_BYTES;
