import { describe, it, expect, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PNG } from 'pngjs';
import { Framebuffer } from '@core/video/framebuffer';
import { RomError } from '@core/errors';
import { MAX_ROM_SIZE } from '@core/bus/memory';
import { encodeFramebufferPng, framebufferToPng, writeFramebufferPng } from '@host/node/png';
import { readRomFile } from '@host/node/rom-file';

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'chip8-host-'));
afterAll(() => fs.rmSync(tmp, { recursive: true, force: true }));

describe('framebuffer PNG output', () => {
  it('scales each pixel into a block of the on/off colours', () => {
    const fb = new Framebuffer();
    fb.xorPixel(1, 0, true);
    const png = framebufferToPng(fb, { scale: 2, on: [10, 20, 30] });
    expect([png.width, png.height]).toEqual([128, 64]);
    const at = (x: number, y: number) => Array.from(png.data.subarray((y * 128 + x) * 4, (y * 128 + x) * 4 + 4));
    expect(at(0, 0)).toEqual([0, 0, 0, 255]);
    expect(at(2, 0)).toEqual([10, 20, 30, 255]);
    expect(at(3, 1)).toEqual([10, 20, 30, 255]);
    expect(at(4, 0)).toEqual([0, 0, 0, 255]);
  });

  it('encodes a decodable PNG', () => {
    const fb = new Framebuffer();
    fb.drawSprite(0, 0, [0xF0]);
    const buf = encodeFramebufferPng(fb, { scale: 1 });
    expect(Array.from(buf.subarray(0, 4))).toEqual([0x89, 0x50, 0x4E, 0x47]);
    const decoded = PNG.sync.read(buf);
    expect([decoded.width, decoded.height]).toEqual([64, 32]);
    expect(decoded.data[3 * 4]).toBe(255);
    expect(decoded.data[4 * 4]).toBe(0);
  });

  it('writes the PNG to disk, creating directories', async () => {
    const out = path.join(tmp, 'nested', 'screen.png');
    await writeFramebufferPng(out, new Framebuffer(), { scale: 1 });
    expect(PNG.sync.read(fs.readFileSync(out)).width).toBe(64);
  });
});

describe('readRomFile', () => {
  it('reads the raw bytes', () => {
    const p = path.join(tmp, 'ok.ch8');
    fs.writeFileSync(p, Buffer.from([0x60, 0x05]));
    expect(Array.from(readRomFile(p))).toEqual([0x60, 0x05]);
  });

  it('rejects an empty file', () => {
    const p = path.join(tmp, 'empty.ch8');
    fs.writeFileSync(p, Buffer.alloc(0));
    expect(() => readRomFile(p)).toThrow(RomError);
  });

  it('rejects a file that does not fit above $200', () => {
    const p = path.join(tmp, 'big.ch8');
    fs.writeFileSync(p, Buffer.alloc(MAX_ROM_SIZE + 1));
    let caught: unknown = null;
    try { readRomFile(p); } catch (e) { caught = e; }
    expect(caught).toBeInstanceOf(RomError);
    if (!(caught instanceof RomError)) return;
    expect(caught.kind).toBe('rom-too-large');
  });
});
