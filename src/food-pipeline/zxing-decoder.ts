/**
 * Barcode decoder backed by ZXing (`@zxing/library`).
 *
 * Handles the common retail 1D formats (EAN, UPC, Code 128, ...) and QR codes.
 * ZXing signals "no barcode" by throwing; that becomes an empty result here.
 */

import {
  BarcodeFormat,
  BinaryBitmap,
  ChecksumException,
  DecodeHintType,
  FormatException,
  HybridBinarizer,
  MultiFormatReader,
  NotFoundException,
  RGBLuminanceSource,
  type Result,
} from "@zxing/library";
import type { BoundingRect, DetectedSymbol, RasterFrame, SymbolDecoder } from "./types.js";

const textEncoder = new TextEncoder();

function luminanceSource(frame: RasterFrame): RGBLuminanceSource {
  const { width, height, channels, data } = frame;
  if (channels === 1) {
    return new RGBLuminanceSource(Uint8ClampedArray.from(data.subarray(0, width * height)), width, height);
  }
  // Packed 0xRRGGBB pixels; ZXing does its own luminance conversion.
  const pixels = new Int32Array(width * height);
  for (let i = 0, p = 0; i < pixels.length; i++, p += channels) {
    pixels[i] = (data[p] << 16) | (data[p + 1] << 8) | data[p + 2];
  }
  return new RGBLuminanceSource(pixels, width, height);
}

function boundingRect(result: Result): BoundingRect {
  const points = result.getResultPoints() ?? [];
  if (points.length === 0) return { x: 0, y: 0, width: 0, height: 0 };
  const xs = points.map((p) => p.getX());
  const ys = points.map((p) => p.getY());
  const x = Math.floor(Math.min(...xs));
  const y = Math.floor(Math.min(...ys));
  return {
    x,
    y,
    width: Math.ceil(Math.max(...xs)) - x,
    height: Math.ceil(Math.max(...ys)) - y,
  };
}

function isNoDetection(err: unknown): boolean {
  return err instanceof NotFoundException || err instanceof ChecksumException || err instanceof FormatException;
}

export class ZxingDecoder implements SymbolDecoder {
  private readonly reader = new MultiFormatReader();

  constructor(options: { tryHarder?: boolean } = {}) {
    const hints = new Map<DecodeHintType, unknown>();
    if (options.tryHarder ?? true) hints.set(DecodeHintType.TRY_HARDER, true);
    this.reader.setHints(hints);
  }

  decode(frame: RasterFrame): DetectedSymbol[] {
    if (frame.width <= 0 || frame.height <= 0 || frame.data.length < frame.width * frame.height * frame.channels) {
      return [];
    }
    try {
      const bitmap = new BinaryBitmap(new HybridBinarizer(luminanceSource(frame)));
      const result = this.reader.decodeWithState(bitmap);
      return [
        {
          format: BarcodeFormat[result.getBarcodeFormat()],
          rect: boundingRect(result),
          data: textEncoder.encode(result.getText()),
        },
      ];
    } catch (err) {
      if (isNoDetection(err)) return [];
      throw err;
    } finally {
      this.reader.reset();
    }
  }
}
