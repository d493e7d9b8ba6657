/**
 * Grayscale image transforms used to give the barcode decoder a second
 * (third, fourth) chance on hard frames.
 *
 * All transforms take and return 8-bit single-channel frames and never
 * modify their input.
 */

import type { GrayFrame, RasterFrame } from "./types.js";

type Border = 'reflect101' | 'replicate';

const BLUR_KERNEL_5 = [1 / 16, 4 / 16, 6 / 16, 4 / 16, 1 / 16];

function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

function borderIndex(i: number, size: number, border: Border): number {
  if (size === 1) return 0;
  if (border === 'replicate') return Math.max(0, Math.min(size - 1, i));
  let j = i;
  while (j < 0 || j >= size) {
    j = j < 0 ? -j : 2 * (size - 1) - j;
  }
  return j;
}

/** Sampled Gaussian kernel normalized to sum 1. A non-positive sigma is derived from the size. */
export function gaussianKernel(size: number, sigma = 0): number[] {
  const s = sigma > 0 ? sigma : 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const half = (size - 1) / 2;
  const kernel = Array.from({ length: size }, (_, i) => Math.exp(-((i - half) ** 2) / (2 * s * s)));
  const sum = kernel.reduce((a, b) => a + b, 0);
  return kernel.map((k) => k / sum);
}

/** Horizontal then vertical pass of the same kernel; float intermediates, rounded once. */
function convolveSeparable(frame: GrayFrame, kernel: readonly number[], border: Border): Float64Array {
  const { width, height, data } = frame;
  const half = (kernel.length - 1) / 2;
  const horizontal = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < kernel.length; k++) {
        acc += kernel[k] * data[row + borderIndex(x + k - half, width, border)];
      }
      horizontal[row + x] = acc;
    }
  }
  const out = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < kernel.length; k++) {
        acc += kernel[k] * horizontal[borderIndex(y + k - half, height, border) * width + x];
      }
      out[y * width + x] = acc;
    }
  }
  return out;
}

function grayFrame(width: number, height: number, data: Uint8ClampedArray): GrayFrame {
  return { width, height, channels: 1, data };
}

/** BT.601 luma for colour frames (RGB sample order); single-channel frames are copied. */
export function toGrayscale(frame: RasterFrame): GrayFrame {
  const { width, height, channels, data } = frame;
  const out = new Uint8ClampedArray(width * height);
  if (channels === 1) {
    out.set(data.subarray(0, width * height));
    return grayFrame(width, height, out);
  }
  for (let i = 0, p = 0; i < out.length; i++, p += channels) {
    out[i] = clampByte(0.299 * data[p] + 0.587 * data[p + 1] + 0.114 * data[p + 2]);
  }
  return grayFrame(width, height, out);
}

/** Spread the intensity histogram over the full 0..255 range. */
export function equalizeHistogram(frame: GrayFrame): GrayFrame {
  const { width, height, data } = frame;
  const total = width * height;
  const histogram = new Array<number>(256).fill(0);
  for (let i = 0; i < total; i++) histogram[data[i]]++;

  const first = histogram.findIndex((count) => count > 0);
  if (first < 0 || histogram[first] === total) {
    return grayFrame(width, height, Uint8ClampedArray.from(data.subarray(0, total)));
  }

  const cdfMin = histogram[first];
  const lut = new Uint8ClampedArray(256);
  let cdf = 0;
  for (let v = 0; v < 256; v++) {
    cdf += histogram[v];
    lut[v] = clampByte(((cdf - cdfMin) * 255) / (total - cdfMin));
  }

  const out = new Uint8ClampedArray(total);
  for (let i = 0; i < total; i++) out[i] = lut[data[i]];
  return grayFrame(width, height, out);
}

/** 5×5 Gaussian blur with the binomial kernel [1 4 6 4 1]/16, mirrored borders. */
export function gaussianBlur(frame: GrayFrame): GrayFrame {
  const blurred = convolveSeparable(frame, BLUR_KERNEL_5, 'reflect101');
  return grayFrame(frame.width, frame.height, Uint8ClampedArray.from(blurred, clampByte));
}

/**
 * Binarize against a Gaussian-weighted local mean: a pixel turns white when
 * it is brighter than `mean - constant` over a `blockSize` neighbourhood.
 */
export function adaptiveThreshold(frame: GrayFrame, blockSize = 91, constant = 11): GrayFrame {
  if (blockSize < 3 || blockSize % 2 === 0) {
    throw new RangeError(`blockSize must be an odd number >= 3, got ${blockSize}`);
  }
  const mean = convolveSeparable(frame, gaussianKernel(blockSize), 'replicate');
  const out = new Uint8ClampedArray(frame.width * frame.height);
  for (let i = 0; i < out.length; i++) {
    out[i] = frame.data[i] > clampByte(mean[i]) - constant ? 255 : 0;
  }
  return grayFrame(frame.width, frame.height, out);
}
