import fs from 'node:fs';
import path from 'node:path';
import { MAX_ROM_SIZE } from '@core/bus/memory';
import { RomError } from '@core/errors';

// Read a raw ROM image from disk. Size problems surface here, before a session starts.
export function readRomFile(romPath: string): Uint8Array {
  const abs = path.resolve(romPath);
  const bytes = new Uint8Array(fs.readFileSync(abs));
  if (bytes.length === 0) throw new RomError('rom-empty', `ROM file is empty: ${abs}`);
  if (bytes.length > MAX_ROM_SIZE) {
    throw new RomError('rom-too-large', `ROM file ${abs} is ${bytes.length} bytes; at most ${MAX_ROM_SIZE} bytes fit`);
  }
  return bytes;
}
