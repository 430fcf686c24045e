/**
 * PNG region comparison for the visual-similarity strategy
 */

import { PNG } from 'pngjs';
import type { ImageComparator } from './types.js';
import { normalizedCrossCorrelation } from './similarity.js';

interface GrayImage {
  width: number;
  height: number;
  pixels: Float64Array;
}

function toGray(buffer: Buffer): GrayImage {
  const png = PNG.sync.read(buffer);
  const pixels = new Float64Array(png.width * png.height);
  for (let i = 0; i < pixels.length; i++) {
    const offset = i * 4;
    pixels[i] = 0.299 * png.data[offset] + 0.587 * png.data[offset + 1] + 0.114 * png.data[offset + 2];
  }
  return { width: png.width, height: png.height, pixels };
}

/**
 * Nearest-neighbour resample to the given size
 */
function resample(image: GrayImage, width: number, height: number): Float64Array {
  if (image.width === width && image.height === height) {
    return image.pixels;
  }
  const out = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    const sy = Math.min(image.height - 1, Math.floor((y * image.height) / height));
    for (let x = 0; x < width; x++) {
      const sx = Math.min(image.width - 1, Math.floor((x * image.width) / width));
      out[y * width + x] = image.pixels[sy * image.width + sx];
    }
  }
  return out;
}

/**
 * Grayscale normalized cross-correlation. The candidate is resampled to the
 * reference size. Throws when either buffer is not a PNG.
 */
export class PngImageComparator implements ImageComparator {
  compare(reference: Buffer, candidate: Buffer): number {
    const ref = toGray(reference);
    const cand = toGray(candidate);
    if (ref.width === 0 || ref.height === 0 || cand.width === 0 || cand.height === 0) {
      return 0;
    }
    return normalizedCrossCorrelation(ref.pixels, resample(cand, ref.width, ref.height));
  }
}

export function createImageComparator(): ImageComparator {
  return new PngImageComparator();
}
