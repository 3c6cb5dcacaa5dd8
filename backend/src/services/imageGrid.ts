/** Composites several generated images into one grid image. */

import fs from 'node:fs/promises';
import sharp from 'sharp';
import type { ImageSource } from '../models/generation.js';
import { REQUEST_TIMEOUT_MS } from '../utils/constants.js';
import { withTimeout } from '../utils/withTimeout.js';

export interface ImageSize {
  width: number;
  height: number;
}

export interface GridLayout {
  columns: number;
  rows: number;
  cellWidth: number;
  cellHeight: number;
  width: number;
  height: number;
  /** Top-left corner of each image, in input order. */
  positions: Array<{ left: number; top: number }>;
}

/**
 * Row-major layout with ceil(sqrt(n)) columns. Every cell is as large as the
 * widest and tallest image; each image sits at its cell's top-left.
 */
export function computeGridLayout(sizes: readonly ImageSize[]): GridLayout {
  if (sizes.length === 0) {
    throw new Error('Cannot lay out an empty image grid');
  }
  const columns = Math.ceil(Math.sqrt(sizes.length));
  const rows = Math.ceil(sizes.length / columns);
  const cellWidth = Math.max(...sizes.map((s) => s.width));
  const cellHeight = Math.max(...sizes.map((s) => s.height));

  return {
    columns,
    rows,
    cellWidth,
    cellHeight,
    width: columns * cellWidth,
    height: rows * cellHeight,
    positions: sizes.map((_, i) => ({
      left: (i % columns) * cellWidth,
      top: Math.floor(i / columns) * cellHeight,
    })),
  };
}

/** Composite encoded images into a PNG grid on a transparent background. */
export async function composeImageGrid(images: readonly Buffer[]): Promise<Buffer> {
  const sizes = await Promise.all(images.map(async (input) => {
    const meta = await sharp(input).metadata();
    if (!meta.width || !meta.height) {
      throw new Error('Image has no readable dimensions');
    }
    return { width: meta.width, height: meta.height };
  }));
  const layout = computeGridLayout(sizes);

  return sharp({
    create: {
      width: layout.width,
      height: layout.height,
      channels: 4,
      background: { r: 0, g: 0, b: 0, alpha: 0 },
    },
  })
    .composite(images.map((input, i) => ({ input, ...layout.positions[i] })))
    .png()
    .toBuffer();
}

/** Read a published image from disk or download it from the backend. */
export async function loadImageBytes(source: ImageSource, signal?: AbortSignal): Promise<Buffer> {
  if (source.localPath) {
    return fs.readFile(source.localPath, { signal });
  }
  if (!source.url) {
    throw new Error(`Image ${source.name} has neither a path nor a URL`);
  }
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const res = await withTimeout(fetch(source.url, { signal: controller.signal }), REQUEST_TIMEOUT_MS, {
      abortController: controller,
      message: `Downloading ${source.name} timed out`,
    });
    if (!res.ok) {
      throw new Error(`Downloading ${source.name} failed: HTTP ${res.status}`);
    }
    return Buffer.from(await res.arrayBuffer());
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}
