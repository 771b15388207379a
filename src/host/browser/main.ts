import { Chip8System } from '@core/system/system'
import { TIMER_HZ } from '@core/system/config'
import { VMFault, RomError } from '@core/errors'
import { DEFAULT_KEYMAP, keyForCode, parseKeymap } from '@host/keymap'
import { SquareWave } from '@host/audio/square-wave'

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e))

// Query flags (read once)
const query = new URL(window.location.href).searchParams
const ipfParam = (() => { const v = Number(query.get('ipf')); return Number.isFinite(v) && v > 0 ? Math.floor(v) : undefined })()
const lenient = query.get('lenient') === '1'
const keymap = (() => {
  const raw = query.get('keys')
  if (!raw) return DEFAULT_KEYMAP
  try { return parseKeymap(raw) } catch (e) { console.warn('[main] ignoring bad keys= parameter:', errorMessage(e)); return DEFAULT_KEYMAP }
})()

const $ = <T extends HTMLElement>(sel: string, ctor: { new (): T }): T => {
  const el = document.querySelector(sel)
  if (!(el instanceof ctor)) throw new Error(`missing element ${sel}`)
  return el
}

const canvas = $('#screen', HTMLCanvasElement)
const statusEl = $('#status', HTMLSpanElement)
const romInput = $('#rom', HTMLInputElement)
const pauseBtn = $('#pause', HTMLButtonElement)
const resetBtn = $('#reset', HTMLButtonElement)

const ctx = (() => {
  const c = canvas.getContext('2d', { alpha: false })
  if (!c) throw new Error('2D canvas context unavailable')
  return c
})()

let sys: Chip8System | null = null
let running = false
let frameTimer: number | null = null
const image = ctx.createImageData(64, 32)

// Beeper: a looping one-second square wave buffer gated by a gain node
let audioCtx: AudioContext | null = null
let gainNode: GainNode | null = null
const ensureAudio = (): void => {
  if (audioCtx) return
  audioCtx = new AudioContext()
  const wave = new SquareWave(audioCtx.sampleRate)
  const buffer = audioCtx.createBuffer(1, audioCtx.sampleRate, audioCtx.sampleRate)
  wave.fill(buffer.getChannelData(0))
  const src = audioCtx.createBufferSource()
  src.buffer = buffer
  src.loop = true
  gainNode = audioCtx.createGain()
  gainNode.gain.value = 0
  src.connect(gainNode).connect(audioCtx.destination)
  src.start()
}

const setStatus = (s: string): void => { statusEl.textContent = s }

const draw = (): void => {
  if (!sys) return
  const px = sys.framebuffer.pixels()
  const d = image.data
  for (let i = 0; i < px.length; i++) {
    const v = px[i] ? 255 : 0
    const o = i << 2
    d[o] = v; d[o + 1] = v; d[o + 2] = v; d[o + 3] = 255
  }
  ctx.putImageData(image, 0, 0)
}

const frame = (): void => {
  if (!sys || !running) return
  try {
    sys.runFrame()
  } catch (e) {
    stop()
    if (e instanceof VMFault) { setStatus(`Halted: ${e.message}`); return }
    throw e
  }
  if (gainNode) gainNode.gain.value = sys.isSoundActive() ? 1 : 0
  draw()
}

const start = (): void => {
  if (running || !sys) return
  running = true
  frameTimer = window.setInterval(frame, 1000 / TIMER_HZ)
  pauseBtn.textContent = 'Pause'
  setStatus('Running')
}

const stop = (): void => {
  running = false
  if (frameTimer !== null) { window.clearInterval(frameTimer); frameTimer = null }
  if (gainNode) gainNode.gain.value = 0
  pauseBtn.textContent = 'Resume'
}

romInput.addEventListener('change', () => {
  const file = romInput.files?.[0]
  if (!file) return
  void file.arrayBuffer().then((buf) => {
    stop()
    const next = new Chip8System({ instructionsPerFrame: ipfParam, unknownOpcodes: lenient ? 'lenient' : undefined })
    try {
      next.loadRom(new Uint8Array(buf))
    } catch (e) {
      if (e instanceof RomError) { setStatus(e.message); return }
      throw e
    }
    sys = next
    ensureAudio()
    audioCtx?.resume().catch((e: unknown) => { console.warn('[main] audio unavailable:', errorMessage(e)) })
    draw()
    start()
  }).catch((e: unknown) => { setStatus(`Failed to read ROM: ${errorMessage(e)}`) })
})

pauseBtn.addEventListener('click', () => { if (running) { stop(); setStatus('Paused') } else start() })
resetBtn.addEventListener('click', () => {
  if (!sys) return
  sys.reset()
  draw()
  start()
})

const onKey = (down: boolean) => (e: KeyboardEvent): void => {
  const key = keyForCode(e.code, keymap)
  if (key === null || !sys) return
  e.preventDefault()
  sys.setKey(key, down)
}
window.addEventListener('keydown', onKey(true))
window.addEventListener('keyup', onKey(false))

setStatus('Load a ROM to start')
