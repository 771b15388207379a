import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import type { Framebuffer } from '@core/video/framebuffer';

export type RGB = [number, number, number];

export interface PngOptions {
  scale?: number;
  on?: RGB;
  off?: RGB;
}

export const framebufferToPng = (fb: Framebuffer, opts: PngOptions = {}): PNG => {
  const scale = Math.max(1, Math.floor(opts.scale ?? 8));
  const [onR, onG, onB] = opts.on ?? [255, 255, 255];
  const [offR, offG, offB] = opts.off ?? [0, 0, 0];
  const W = fb.width * scale, H = fb.height * scale;
  const png = new PNG({ width: W, height: H });
  const px = fb.pixels();
  for (let y = 0; y < fb.height; y++) {
    for (let x = 0; x < fb.width; x++) {
      const lit = px[y * fb.width + x] === 1;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2;
          png.data[o + 0] = lit ? onR : offR;
          png.data[o + 1] = lit ? onG : offG;
          png.data[o + 2] = lit ? onB : offB;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return png;
};

export const encodeFramebufferPng = (fb: Framebuffer, opts: PngOptions = {}): Buffer => PNG.sync.write(framebufferToPng(fb, opts));

export const writeFramebufferPng = async (outPath: string, fb: Framebuffer, opts: PngOptions = {}): Promise<void> => {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    framebufferToPng(fb, opts).pack().pipe(stream);
  });
};
