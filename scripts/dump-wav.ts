#!/usr/bin/env tsx
/*
  Render a ROM's beeper to WAV (PCM16LE mono) by running the emulator headless.
  The tone sounds for every frame in which the sound timer is non-zero.
  Usage:
    npm run dump:wav -- <rom_path> [--seconds 10] [--sr 48000] [--freq 440] [--out out.wav]
*/
import { writeFile, mkdir } from 'node:fs/promises'
import { basename, dirname, resolve } from 'node:path'
import { Chip8System } from '@core/system/system'
import { TIMER_HZ } from '@core/system/config'
import { VMFault } from '@core/errors'
import { SquareWave } from '@host/audio/square-wave'
import { encodeWavPCM16 } from '@host/audio/wav'
import { readRomFile } from '@host/node/rom-file'

interface CliOptions { romPath: string; seconds: number; sampleRate: number; frequency: number; outPath: string }

const parseArgs = (): CliOptions => {
  const argv = process.argv.slice(2)
  if (argv.length === 0) {
    console.error('Usage: dump-wav <rom_path> [--seconds 10] [--sr 48000] [--freq 440] [--out out.wav]')
    process.exit(1)
  }
  let romPath = ''
  let seconds = 10
  let sampleRate = 48000
  let frequency = 440
  let outPath = ''
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (a === '--seconds' || a === '-s') { seconds = Math.max(1, Number(argv[++i] || 10)) }
    else if (a === '--sr' || a === '--sample-rate' || a === '-r') { sampleRate = Math.max(8000, Number(argv[++i] || 48000)) }
    else if (a === '--freq' || a === '-f') { frequency = Math.max(20, Number(argv[++i] || 440)) }
    else if (a === '--out' || a === '-o') { outPath = String(argv[++i] || '') }
    else if (a.startsWith('-')) { console.error(`Unknown flag: ${a}`); process.exit(1) }
    else { romPath = a }
  }
  if (!romPath) { console.error('Missing rom_path'); process.exit(1) }
  if (!outPath) {
    const base = basename(romPath).replace(/\.[^.]+$/, '')
    outPath = resolve(`out/${base}_${sampleRate}Hz_${seconds}s.wav`)
  } else {
    outPath = resolve(outPath)
  }
  return { romPath, seconds, sampleRate, frequency, outPath }
}

const main = async (): Promise<void> => {
  const opts = parseArgs()
  const sys = new Chip8System()
  sys.loadRom(readRomFile(opts.romPath))
  const wave = new SquareWave(opts.sampleRate, { frequency: opts.frequency })

  const frames = opts.seconds * TIMER_HZ
  const samplesPerFrame = opts.sampleRate / TIMER_HZ
  const out = new Float32Array(Math.ceil(frames * samplesPerFrame))
  let written = 0
  let beepFrames = 0
  for (let f = 0; f < frames; f++) {
    const active = sys.isSoundActive()
    if (active) beepFrames++
    const end = Math.min(out.length, Math.round((f + 1) * samplesPerFrame))
    wave.fill(out.subarray(written, end), active)
    written = end
    try {
      sys.runFrame()
    } catch (e) {
      if (e instanceof VMFault) { console.error(`Stopped at frame ${f}: ${e.message}`); break }
      throw e
    }
  }

  await mkdir(dirname(opts.outPath), { recursive: true })
  await writeFile(opts.outPath, encodeWavPCM16(out.subarray(0, written), opts.sampleRate))
  console.log(`Wrote ${opts.outPath} (${(written / opts.sampleRate).toFixed(2)}s, tone in ${beepFrames} frames)`)
}

main().catch((e) => { console.error(e); process.exit(1) })
