/**
 * Barcode acquisition.
 *
 * In "preprocessed" mode a frame is converted to grayscale and decoded against
 * an ordered list of variants, cheapest first: plain, histogram-equalized,
 * blurred, adaptive-thresholded. The first variant with any detection wins.
 * In "raw" mode the frame goes to the decoder untouched.
 */

import sharp from "sharp";
import type { ScanMode } from "../config.js";
import { describeError } from "./errors.js";
import { adaptiveThreshold, equalizeHistogram, gaussianBlur, toGrayscale } from "./image-variants.js";
import type { GrayFrame, RasterFrame, SymbolDecoder } from "./types.js";

export interface FrameVariant {
  name: string;
  apply(frame: GrayFrame): GrayFrame;
}

export const FRAME_VARIANTS: readonly FrameVariant[] = [
  { name: 'grayscale', apply: (frame) => frame },
  { name: 'equalized', apply: equalizeHistogram },
  { name: 'blurred', apply: gaussianBlur },
  { name: 'thresholded', apply: (frame) => adaptiveThreshold(frame, 91, 11) },
];

export interface ScanOptions {
  mode?: ScanMode;
  variants?: readonly FrameVariant[];
}

/** Longest side of a decoded frame; larger photos are downscaled before scanning. */
export const MAX_FRAME_DIMENSION = 1600;

const utf8 = new TextDecoder('utf-8');

function firstPayload(decoder: SymbolDecoder, frame: RasterFrame): string | null {
  const symbols = decoder.decode(frame);
  return symbols.length > 0 ? utf8.decode(symbols[0].data) : null;
}

/** Payload of the first barcode found in the frame, or null. Never throws. */
export function scanFrame(frame: RasterFrame, decoder: SymbolDecoder, options: ScanOptions = {}): string | null {
  try {
    if (options.mode === 'raw') {
      return firstPayload(decoder, frame);
    }
    const gray = toGrayscale(frame);
    for (const variant of options.variants ?? FRAME_VARIANTS) {
      const payload = firstPayload(decoder, variant.apply(gray));
      if (payload != null) return payload;
    }
    return null;
  } catch (err) {
    console.error('[scanner] Error decoding frame:', describeError(err));
    return null;
  }
}

/** Decode an encoded image (JPEG, PNG, WebP, ...) into an RGB raster frame no larger than 1600 px a side. */
export async function loadFrame(image: Buffer | Uint8Array): Promise<RasterFrame> {
  const { data, info } = await sharp(image)
    .rotate()
    .resize({ width: MAX_FRAME_DIMENSION, height: MAX_FRAME_DIMENSION, fit: sharp.fit.inside, withoutEnlargement: true })
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 1 && info.channels !== 3 && info.channels !== 4) {
    throw new Error(`Unsupported channel count ${info.channels}`);
  }
  return { width: info.width, height: info.height, channels: info.channels, data };
}

/** Scan an encoded image. Unreadable images yield null. */
export async function scanImage(
  image: Buffer | Uint8Array,
  decoder: SymbolDecoder,
  options: ScanOptions = {}
): Promise<string | null> {
  let frame: RasterFrame;
  try {
    frame = await loadFrame(image);
  } catch (err) {
    console.error('[scanner] Could not read image:', describeError(err));
    return null;
  }
  return scanFrame(frame, decoder, options);
}
