// Beeper tone: a plain square wave, played while the sound timer is non-zero.
export interface SquareWaveOptions {
  frequency?: number; // Hz
  volume?: number; // peak amplitude, 0..1
}

export class SquareWave {
  readonly sampleRate: number;
  private phaseInc: number;
  private phase = 0;
  private volume: number;

  constructor(sampleRate: number, opts: SquareWaveOptions = {}) {
    if (!(sampleRate > 0)) throw new RangeError(`sample rate must be positive, got ${sampleRate}`);
    this.sampleRate = sampleRate;
    this.phaseInc = (opts.frequency ?? 440) / sampleRate;
    this.volume = opts.volume ?? 0.05;
  }

  // Fill `out` with samples. When `active` is false the block is silent and the phase holds.
  fill(out: Float32Array, active = true): Float32Array {
    if (!active) { out.fill(0); return out; }
    for (let i = 0; i < out.length; i++) {
      out[i] = this.phase <= 0.5 ? this.volume : -this.volume;
      this.phase = (this.phase + this.phaseInc) % 1.0;
    }
    return out;
  }

  reset(): void { this.phase = 0; }
}
