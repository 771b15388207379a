import type { Byte, Quirks, UnknownOpcodeMode } from '@core/cpu/types';
import { DEFAULT_QUIRKS } from '@core/cpu/types';
import { randomByte } from '@core/cpu/cpu';

export interface SystemOptions {
  // Instructions executed per 60Hz frame (the timer tick rate is fixed)
  instructionsPerFrame?: number;
  unknownOpcodes?: UnknownOpcodeMode;
  quirks?: Partial<Quirks>;
  rng?: () => Byte;
}

export interface SystemConfig {
  instructionsPerFrame: number;
  unknownOpcodes: UnknownOpcodeMode;
  quirks: Quirks;
  rng: () => Byte;
}

export type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_INSTRUCTIONS_PER_FRAME = 10;
export const TIMER_HZ = 60;

// Names accepted in CHIP8_QUIRKS (comma-separated)
const QUIRK_NAMES = new Map<string, keyof Quirks>([
  ['shift-vy', 'shiftUsesVy'],
  ['memory-increments-i', 'loadStoreIncrementsI'],
  ['vf-reset', 'logicResetsVf'],
]);

export const parseQuirkList = (list: string): Partial<Quirks> => {
  const out: Partial<Quirks> = {};
  for (const raw of list.split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const key = QUIRK_NAMES.get(name);
    if (!key) throw new RangeError(`CHIP8_QUIRKS: unknown quirk "${name}" (expected ${[...QUIRK_NAMES.keys()].join(', ')})`);
    out[key] = true;
  }
  return out;
};

const parseIpf = (raw: string, source: string): number => {
  if (!/^\d+$/.test(raw.trim())) throw new RangeError(`${source}: expected a positive integer, got "${raw}"`);
  const n = parseInt(raw, 10);
  if (n < 1) throw new RangeError(`${source}: must be at least 1`);
  return n;
};

const parseUnknownMode = (raw: string): UnknownOpcodeMode => {
  const v = raw.trim().toLowerCase();
  if (v === 'strict' || v === 'lenient') return v;
  throw new RangeError(`CHIP8_UNKNOWN_OPCODES: expected "strict" or "lenient", got "${raw}"`);
};

const processEnv = (): Env => (typeof process !== 'undefined' ? process.env : {});

// Precedence: explicit options > environment > defaults
export function resolveConfig(opts: SystemOptions = {}, env: Env = processEnv()): SystemConfig {
  let instructionsPerFrame = DEFAULT_INSTRUCTIONS_PER_FRAME;
  let unknownOpcodes: UnknownOpcodeMode = 'strict';
  let quirks: Quirks = { ...DEFAULT_QUIRKS };

  if (env.CHIP8_IPF) instructionsPerFrame = parseIpf(env.CHIP8_IPF, 'CHIP8_IPF');
  if (env.CHIP8_UNKNOWN_OPCODES) unknownOpcodes = parseUnknownMode(env.CHIP8_UNKNOWN_OPCODES);
  if (env.CHIP8_QUIRKS) quirks = { ...quirks, ...parseQuirkList(env.CHIP8_QUIRKS) };

  if (opts.instructionsPerFrame !== undefined) {
    instructionsPerFrame = parseIpf(String(opts.instructionsPerFrame), 'instructionsPerFrame');
  }
  if (opts.unknownOpcodes) unknownOpcodes = opts.unknownOpcodes;
  if (opts.quirks) quirks = { ...quirks, ...opts.quirks };

  return { instructionsPerFrame, unknownOpcodes, quirks, rng: opts.rng ?? randomByte };
}
