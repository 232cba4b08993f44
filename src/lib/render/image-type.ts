export type ImageType = {
  mimeType: string;
  ext: string;
};

const JPEG: ImageType = { mimeType: "image/jpeg", ext: "jpg" };
const PNG: ImageType = { mimeType: "image/png", ext: "png" };
const GIF: ImageType = { mimeType: "image/gif", ext: "gif" };
const WEBP: ImageType = { mimeType: "image/webp", ext: "webp" };
const SVG: ImageType = { mimeType: "image/svg+xml", ext: "svg" };
const AVIF: ImageType = { mimeType: "image/avif", ext: "avif" };
const BMP: ImageType = { mimeType: "image/bmp", ext: "bmp" };

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((b, i) => bytes[offset + i] === b);
}

function ascii(bytes: Uint8Array, start: number, end: number): string {
  return String.fromCharCode(...bytes.subarray(start, end));
}

/** Identifies an image by its leading bytes; `null` when it is none of the known formats. */
export function sniffImageType(bytes: Uint8Array): ImageType | null {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return JPEG;
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return PNG;
  if (ascii(bytes, 0, 6) === "GIF87a" || ascii(bytes, 0, 6) === "GIF89a") return GIF;
  if (ascii(bytes, 0, 4) === "RIFF" && ascii(bytes, 8, 12) === "WEBP") return WEBP;
  if (ascii(bytes, 4, 8) === "ftyp" && /^avi[fs]$/.test(ascii(bytes, 8, 12))) return AVIF;
  if (ascii(bytes, 0, 2) === "BM" && bytes.length > 26) return BMP;

  const head = Buffer.from(bytes.subarray(0, 512)).toString("utf-8").replace(/^\uFEFF/, "").trimStart();
  if (/^(<\?xml[^>]*>\s*)?(<!--[\s\S]*?-->\s*)*(<!DOCTYPE svg[^>]*>\s*)?<svg[\s>]/i.test(head)) return SVG;
  return null;
}

const BY_MIME: Record<string, ImageType> = {
  "image/jpeg": JPEG,
  "image/jpg": JPEG,
  "image/pjpeg": JPEG,
  "image/png": PNG,
  "image/gif": GIF,
  "image/webp": WEBP,
  "image/svg+xml": SVG,
  "image/avif": AVIF,
  "image/bmp": BMP
};

const BY_EXT: Record<string, ImageType> = {
  jpg: JPEG,
  jpeg: JPEG,
  png: PNG,
  gif: GIF,
  webp: WEBP,
  svg: SVG,
  avif: AVIF,
  bmp: BMP
};

export function imageTypeFromContentType(contentType: string | null): ImageType | null {
  if (!contentType) return null;
  const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return BY_MIME[mime] ?? null;
}

export function imageTypeFromUrl(url: string): ImageType | null {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    path = url;
  }
  const match = /\.([a-z0-9]+)$/i.exec(path);
  return match ? (BY_EXT[match[1].toLowerCase()] ?? null) : null;
}

/** Formats every EPUB reading system has to display. */
export function isEpubCoreImage(type: ImageType | null): type is ImageType {
  return type === JPEG || type === PNG || type === GIF || type === WEBP || type === SVG;
}
