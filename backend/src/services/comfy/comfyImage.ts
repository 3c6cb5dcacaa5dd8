/** Resolution of output image references to local paths or backend URLs. */

import path from 'node:path';
import type { ComfyImage } from '../../models/comfy.js';

export function imageToFilePath(image: ComfyImage, outputDir: string): string {
  return path.join(outputDir, image.subfolder, image.filename);
}

export function imageToUri(image: ComfyImage, baseAddress: string): string {
  const url = new URL('view', withTrailingSlash(baseAddress));
  url.searchParams.set('filename', image.filename);
  url.searchParams.set('subfolder', image.subfolder);
  url.searchParams.set('type', image.type);
  return url.toString();
}

export function withTrailingSlash(address: string): string {
  return address.endsWith('/') ? address : `${address}/`;
}
