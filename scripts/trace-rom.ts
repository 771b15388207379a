#!/usr/bin/env tsx
/* eslint-disable no-console */
import { Chip8System } from '@core/system/system'
import { VMFault } from '@core/errors'
import { readRomFile } from '@host/node/rom-file'
import { disasmAt, disasmProgram, formatTraceLine } from '@utils/disasm'

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('CHIP8_ROM') || ''
  let max = parseInt(getEnv('TRACE_MAX') || '1000', 10)
  let listing = false
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a === '--listing') listing = true
    else if (!a.startsWith('-')) rom = a
  }
  if (!Number.isFinite(max) || max < 1) max = 1000
  return { rom, max, listing }
}

async function main() {
  const args = parseArgs()
  if (!args.rom) { console.error('Usage: trace-rom --rom=<file> [--max=N] [--listing]'); process.exit(2) }
  const bytes = readRomFile(args.rom)

  if (args.listing) {
    for (const line of disasmProgram(bytes)) console.log(line)
    return
  }

  const sys = new Chip8System()
  sys.loadRom(bytes)
  const read = (addr: number) => sys.state.readByte(addr)

  for (let i = 0; i < args.max; i++) {
    if (sys.state.awaitingKey) { console.log('-- waiting for key; trace stops'); break }
    const pc = sys.state.pc
    const dis = disasmAt(read, pc)
    console.log(formatTraceLine(pc, dis.opcode, dis, sys.state.snapshot()))
    try {
      sys.stepInstruction()
    } catch (e) {
      if (e instanceof VMFault) { console.log(`-- ${e.message}`); process.exit(1) }
      throw e
    }
    // Timers advance at 60Hz against the default instruction rate
    if ((i + 1) % sys.config.instructionsPerFrame === 0) sys.tickTimers()
  }
}

main().catch((e) => { console.error(e); process.exit(1) })
