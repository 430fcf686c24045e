/**
 * Small PNG regions for the visual tests
 */

import { PNG } from 'pngjs';

/**
 * Encode a grayscale image given as a function of the pixel position
 */
export function grayPng(width: number, height: number, level: (x: number, y: number) => number): Buffer {
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * 4;
      const value = Math.max(0, Math.min(255, Math.round(level(x, y))));
      png.data[offset] = value;
      png.data[offset + 1] = value;
      png.data[offset + 2] = value;
      png.data[offset + 3] = 255;
    }
  }
  return PNG.sync.write(png);
}

export function solidPng(width: number, height: number, value: number): Buffer {
  return grayPng(width, height, () => value);
}

/**
 * Left half dark, right half light
 */
export function splitPng(width: number, height: number): Buffer {
  return grayPng(width, height, (x) => (x < width / 2 ? 20 : 230));
}

/**
 * Top half dark, bottom half light
 */
export function horizontalSplitPng(width: number, height: number): Buffer {
  return grayPng(width, height, (_x, y) => (y < height / 2 ? 20 : 230));
}

/**
 * Left half light, right half dark
 */
export function invertedSplitPng(width: number, height: number): Buffer {
  return grayPng(width, height, (x) => (x < width / 2 ? 230 : 20));
}
