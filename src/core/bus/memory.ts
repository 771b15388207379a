import type { Byte, Word } from '@core/cpu/types';
import { MachineFault, RomError } from '@core/errors';
import { FONT_BASE, FONT_DATA } from '@core/font/font';

export const MEMORY_SIZE = 0x1000; // 4KB
export const PROGRAM_START = 0x200;
export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START;

const hex3 = (v: number): string => `$${v.toString(16).toUpperCase().padStart(3, '0')}`;

// 4KB address space. $000-$1FF holds interpreter data (the font); programs start at $200.
// After the font is installed the low region is read-only.
export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);
  private protectLow = false;

  constructor(opts: { font?: boolean } = {}) {
    if (opts.font ?? true) this.installFont();
  }

  installFont(data: Uint8Array = FONT_DATA): void {
    this.ram.set(data, FONT_BASE);
    this.protectLow = true;
  }

  get reservedRegionProtected(): boolean { return this.protectLow; }

  read(addr: Word): Byte {
    this.checkAddress(addr);
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.checkAddress(addr);
    if (this.protectLow && addr < PROGRAM_START) {
      throw new MachineFault('protected-write', `write of $${(value & 0xFF).toString(16).toUpperCase().padStart(2, '0')} to reserved address ${hex3(addr)}`);
    }
    this.ram[addr] = value & 0xFF;
  }

  // Size is validated before anything is written so a rejected ROM leaves memory untouched
  loadRom(bytes: Uint8Array): void {
    if (bytes.length > MAX_ROM_SIZE) {
      throw new RomError('rom-too-large', `ROM is ${bytes.length} bytes; at most ${MAX_ROM_SIZE} bytes fit at ${hex3(PROGRAM_START)}`);
    }
    this.ram.fill(0, PROGRAM_START);
    this.ram.set(bytes, PROGRAM_START);
  }

  // Read-only view for disassembly and tests
  view(): Readonly<Uint8Array> { return this.ram; }

  private checkAddress(addr: Word): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) {
      throw new MachineFault('address-out-of-range', `address ${addr < 0 ? addr : '$' + addr.toString(16).toUpperCase()} is outside $000-$FFF`);
    }
  }
}
