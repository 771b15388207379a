#!/usr/bin/env tsx
/* eslint-disable no-console */
/*
  Run a Chip-8 ROM headless and print the final screen.
  Usage:
    npm run rom -- --rom=game.ch8 [--frames=600] [--ipf=10] [--png=out/screen.png] [--scale=8]
                   [--lenient] [--shift-vy] [--memory-increments-i] [--vf-reset]
*/
import path from 'node:path'
import { runRom } from '@core/harness/headless'
import type { Quirks } from '@core/cpu/types'
import { RomError } from '@core/errors'
import { readRomFile } from '@host/node/rom-file'
import { writeFramebufferPng } from '@host/node/png'
import { crc32Hex } from '@utils/crc32'

interface CliOptions {
  rom: string
  frames: number
  ipf?: number
  png: string | null
  scale: number
  lenient: boolean
  quirks: Partial<Quirks>
}

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function usage(msg?: string): never {
  if (msg) console.error(msg)
  console.error('Usage: run-rom --rom=<file> [--frames=N] [--ipf=N] [--png=<out>] [--scale=N] [--lenient] [--shift-vy] [--memory-increments-i] [--vf-reset]')
  process.exit(2)
}

const positiveInt = (raw: string, flag: string): number => {
  const n = parseInt(raw, 10)
  if (!Number.isFinite(n) || n < 1) usage(`${flag} expects a positive integer, got "${raw}"`)
  return n
}

function parseArgs(): CliOptions {
  const opts: CliOptions = { rom: getEnv('CHIP8_ROM') ?? '', frames: 600, png: null, scale: 8, lenient: false, quirks: {} }
  for (const a of process.argv.slice(2)) {
    if (a.startsWith('--rom=')) opts.rom = a.slice(6)
    else if (a.startsWith('--frames=')) opts.frames = positiveInt(a.slice(9), '--frames')
    else if (a.startsWith('--ipf=')) opts.ipf = positiveInt(a.slice(6), '--ipf')
    else if (a.startsWith('--png=')) opts.png = path.resolve(a.slice(6))
    else if (a.startsWith('--scale=')) opts.scale = positiveInt(a.slice(8), '--scale')
    else if (a === '--lenient') opts.lenient = true
    else if (a === '--shift-vy') opts.quirks.shiftUsesVy = true
    else if (a === '--memory-increments-i') opts.quirks.loadStoreIncrementsI = true
    else if (a === '--vf-reset') opts.quirks.logicResetsVf = true
    else if (!a.startsWith('-') && !opts.rom) opts.rom = a
    else usage(`Unknown argument: ${a}`)
  }
  if (!opts.rom) usage('Missing ROM path')
  return opts
}

async function main(): Promise<void> {
  const args = parseArgs()
  let bytes: Uint8Array
  try {
    bytes = readRomFile(args.rom)
  } catch (e) {
    if (e instanceof RomError) { console.error(e.message); process.exit(2) }
    throw e
  }

  const res = runRom(bytes, {
    maxFrames: args.frames,
    instructionsPerFrame: args.ipf,
    unknownOpcodes: args.lenient ? 'lenient' : undefined,
    quirks: args.quirks,
  })

  console.log(res.system.framebuffer.toText())
  console.log(JSON.stringify({ rom: args.rom, reason: res.reason, frames: res.frames, instructions: res.instructions, screenCrc: crc32Hex(res.system.framebuffer.pixels()), message: res.message ?? null }))
  if (args.png) {
    await writeFramebufferPng(args.png, res.system.framebuffer, { scale: args.scale })
    console.log(`Wrote ${args.png}`)
  }
  process.exit(res.reason === 'fault' ? 1 : 0)
}

main().catch((e) => { console.error(e); process.exit(1) })
