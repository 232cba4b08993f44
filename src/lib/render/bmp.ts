import type { GrayImage } from "./types";

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const PALETTE_SIZE = 256 * 4;
/** 72 dpi. */
const PIXELS_PER_METER = 2835;

export const GRAY_LEVELS = [0, 85, 170, 255] as const;

/** Snaps every pixel to the nearest of {@link GRAY_LEVELS}. */
export function quantizeGray(image: GrayImage): GrayImage {
  const pixels = new Uint8Array(image.pixels.length);
  for (let i = 0; i < pixels.length; i += 1) {
    pixels[i] = Math.min(255, Math.round(image.pixels[i] / 85) * 85);
  }
  return { width: image.width, height: image.height, pixels };
}

/** Rows are padded to a multiple of four bytes. */
export function bmpRowSize(width: number): number {
  return (width + 3) & ~3;
}

/**
 * 8-bit palettized BMP (BITMAPINFOHEADER, uncompressed, bottom-up) whose 256-entry palette maps
 * index `i` to gray `i`.
 */
export function encodeGrayscaleBmp(image: GrayImage): Buffer {
  const { width, height, pixels } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`invalid bitmap size ${width}x${height}`);
  }
  if (pixels.length !== width * height) {
    throw new Error(`expected ${width * height} pixels, got ${pixels.length}`);
  }

  const rowSize = bmpRowSize(width);
  const dataOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE + PALETTE_SIZE;
  const imageSize = rowSize * height;
  const buf = Buffer.alloc(dataOffset + imageSize);

  buf.write("BM", 0, "ascii");
  buf.writeUInt32LE(buf.length, 2);
  buf.writeUInt32LE(0, 6);
  buf.writeUInt32LE(dataOffset, 10);

  buf.writeUInt32LE(INFO_HEADER_SIZE, 14);
  buf.writeInt32LE(width, 18);
  buf.writeInt32LE(height, 22);
  buf.writeUInt16LE(1, 26);
  buf.writeUInt16LE(8, 28);
  buf.writeUInt32LE(0, 30);
  buf.writeUInt32LE(imageSize, 34);
  buf.writeInt32LE(PIXELS_PER_METER, 38);
  buf.writeInt32LE(PIXELS_PER_METER, 42);
  buf.writeUInt32LE(256, 46);
  buf.writeUInt32LE(0, 50);

  for (let i = 0; i < 256; i += 1) {
    const at = FILE_HEADER_SIZE + INFO_HEADER_SIZE + i * 4;
    buf[at] = i;
    buf[at + 1] = i;
    buf[at + 2] = i;
    buf[at + 3] = 0;
  }

  for (let y = 0; y < height; y += 1) {
    const rowStart = dataOffset + (height - 1 - y) * rowSize;
    buf.set(pixels.subarray(y * width, (y + 1) * width), rowStart);
  }

  return buf;
}
