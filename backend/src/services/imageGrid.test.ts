import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { composeImageGrid, computeGridLayout, loadImageBytes } from './imageGrid.js';

function solidPng(width: number, height: number, color: { r: number; g: number; b: number }): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 4, background: { ...color, alpha: 1 } } }).png().toBuffer();
}

describe('computeGridLayout', () => {
  it('places two images side by side', () => {
    const layout = computeGridLayout([{ width: 64, height: 32 }, { width: 64, height: 32 }]);

    expect(layout).toMatchObject({ columns: 2, rows: 1, width: 128, height: 32 });
    expect(layout.positions).toEqual([{ left: 0, top: 0 }, { left: 64, top: 0 }]);
  });

  it('uses ceil(sqrt(n)) columns, row-major', () => {
    const sizes = Array.from({ length: 5 }, () => ({ width: 10, height: 20 }));
    const layout = computeGridLayout(sizes);

    expect(layout.columns).toBe(3);
    expect(layout.rows).toBe(2);
    expect(layout.positions[3]).toEqual({ left: 0, top: 20 });
    expect(layout.positions[4]).toEqual({ left: 10, top: 20 });
  });

  it('sizes cells to the largest image', () => {
    const layout = computeGridLayout([{ width: 10, height: 40 }, { width: 30, height: 20 }, { width: 5, height: 5 }]);

    expect(layout.cellWidth).toBe(30);
    expect(layout.cellHeight).toBe(40);
    expect(layout.width).toBe(60);
    expect(layout.height).toBe(80);
  });

  it('rejects an empty grid', () => {
    expect(() => computeGridLayout([])).toThrow('Cannot lay out an empty image grid');
  });
});

describe('composeImageGrid', () => {
  it('composites images into a transparent PNG', async () => {
    const red = await solidPng(4, 4, { r: 255, g: 0, b: 0 });
    const blue = await solidPng(4, 2, { r: 0, g: 0, b: 255 });

    const grid = await composeImageGrid([red, blue]);
    const { data, info } = await sharp(grid).raw().toBuffer({ resolveWithObject: true });

    expect(info.width).toBe(8);
    expect(info.height).toBe(4);
    expect(info.channels).toBe(4);
    const pixel = (x: number, y: number) => [...data.subarray((y * 8 + x) * 4, (y * 8 + x) * 4 + 4)];
    expect(pixel(0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixel(4, 0)).toEqual([0, 0, 255, 255]);
    expect(pixel(4, 3)[3]).toBe(0);
  });
});

describe('loadImageBytes', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    vi.unstubAllGlobals();
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it('reads a local image', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'grid-test-'));
    const file = path.join(tmpDir, 'a.png');
    fs.writeFileSync(file, Buffer.from([1, 2, 3]));

    const bytes = await loadImageBytes({ kind: 'output', name: 'a.png', localPath: file });

    expect([...bytes]).toEqual([1, 2, 3]);
  });

  it('downloads a remote image', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(new Uint8Array([7, 8])));
    vi.stubGlobal('fetch', fetchMock);

    const bytes = await loadImageBytes({ kind: 'output', name: 'b.png', url: 'http://comfy.test/view?filename=b.png' });

    expect([...bytes]).toEqual([7, 8]);
    expect(fetchMock.mock.calls[0][0]).toBe('http://comfy.test/view?filename=b.png');
  });

  it('fails on an unsuccessful download', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('missing', { status: 404 })));

    await expect(
      loadImageBytes({ kind: 'output', name: 'c.png', url: 'http://comfy.test/view?filename=c.png' }),
    ).rejects.toThrow('Downloading c.png failed: HTTP 404');
  });
});
