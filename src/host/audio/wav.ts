// Mono 16-bit PCM WAV encoding for rendered beeper audio
const clamp = (v: number): number => v < -1 ? -1 : (v > 1 ? 1 : v)

export const encodeWavPCM16 = (samples: Float32Array, sampleRate: number): Buffer => {
  const dataBytes = samples.length * 2
  const out = Buffer.alloc(44 + dataBytes)
  out.write('RIFF', 0)
  out.writeUInt32LE(36 + dataBytes, 4)
  out.write('WAVE', 8)
  out.write('fmt ', 12)
  out.writeUInt32LE(16, 16) // PCM fmt chunk size
  out.writeUInt16LE(1, 20) // PCM
  out.writeUInt16LE(1, 22) // mono
  out.writeUInt32LE(sampleRate, 24)
  out.writeUInt32LE(sampleRate * 2, 28) // byte rate
  out.writeUInt16LE(2, 32) // block align
  out.writeUInt16LE(16, 34) // bits per sample
  out.write('data', 36)
  out.writeUInt32LE(dataBytes, 40)
  for (let i = 0; i < samples.length; i++) out.writeInt16LE(Math.round(clamp(samples[i]) * 32767), 44 + i * 2)
  return out
}
