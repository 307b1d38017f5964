// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Low-level TIFF builder for plane stacks.
 *
 * Writes a chain of single-sample IFDs, one per plane, little-endian.
 * Classic TIFF (32-bit offsets) is used unless the data would pass the
 * 4 GB limit, in which case the file is written as BigTIFF.
 *
 * File layout:
 *   [Header 8 or 16 bytes]
 *   [IFD 0 entries][IFD 0 out-of-line values][IFD 0 strips/tiles]
 *   [IFD 1 entries][IFD 1 out-of-line values][IFD 1 strips/tiles]
 *   ...
 */

import { zlibSync } from "fflate";

// ── TIFF constants ──────────────────────────────────────────────────

export const TIFF_TYPE_ASCII = 2;
export const TIFF_TYPE_SHORT = 3;
export const TIFF_TYPE_LONG = 4;
export const TIFF_TYPE_LONG8 = 16;

const TYPE_SIZES: Record<number, number> = {
  [TIFF_TYPE_ASCII]: 1,
  [TIFF_TYPE_SHORT]: 2,
  [TIFF_TYPE_LONG]: 4,
  [TIFF_TYPE_LONG8]: 8,
};

export const TAG_IMAGE_WIDTH = 256;
export const TAG_IMAGE_LENGTH = 257;
export const TAG_BITS_PER_SAMPLE = 258;
export const TAG_COMPRESSION = 259;
export const TAG_PHOTOMETRIC = 262;
export const TAG_IMAGE_DESCRIPTION = 270;
export const TAG_STRIP_OFFSETS = 273;
export const TAG_SAMPLES_PER_PIXEL = 277;
export const TAG_ROWS_PER_STRIP = 278;
export const TAG_STRIP_BYTE_COUNTS = 279;
export const TAG_PLANAR_CONFIGURATION = 284;
export const TAG_SOFTWARE = 305;
export const TAG_TILE_WIDTH = 322;
export const TAG_TILE_LENGTH = 323;
export const TAG_TILE_OFFSETS = 324;
export const TAG_TILE_BYTE_COUNTS = 325;
export const TAG_SAMPLE_FORMAT = 339;

export const COMPRESSION_NONE = 1;
export const COMPRESSION_DEFLATE = 8;

/** Default tile size. Must be a multiple of 16. */
export const DEFAULT_TILE_SIZE = 256;

// ── Public types ────────────────────────────────────────────────────

export interface TiffTag {
  tag: number;
  type: number;
  /** For ASCII tags, pass a string. */
  values: number[] | string;
}

/** One plane to be written. */
export interface WritableIfd {
  /** Tags without offset/byte-count entries; those are generated. */
  tags: TiffTag[];
  /** Strips or tiles, row-major. A strip-based plane is a single entry. */
  blocks: Uint8Array[];
}

export type TiffCompression = "none" | "deflate";

export interface BuildTiffOptions {
  /** Default: "none". */
  compression?: TiffCompression;
  /** Deflate level (1-9). Default: 6. */
  compressionLevel?: number;
  /** Default: "auto" (BigTIFF only when needed). */
  format?: "auto" | "classic" | "bigtiff";
}

// ── Internal types ──────────────────────────────────────────────────

interface Layout {
  headerSize: number;
  entrySize: number;
  countSize: number;
  offsetSize: number;
  offsetType: number;
  magic: 42 | 43;
}

const CLASSIC: Layout = {
  headerSize: 8,
  entrySize: 12,
  countSize: 2,
  offsetSize: 4,
  offsetType: TIFF_TYPE_LONG,
  magic: 42,
};

const BIGTIFF: Layout = {
  headerSize: 16,
  entrySize: 20,
  countSize: 8,
  offsetSize: 8,
  offsetType: TIFF_TYPE_LONG8,
  magic: 43,
};

interface EncodedTag {
  tag: number;
  type: number;
  count: number;
  bytes: Uint8Array;
}

interface PlacedIfd {
  offset: number;
  tags: EncodedTag[];
  overflowOffset: number;
  blockOffset: number;
  blocks: Uint8Array[];
  next: number;
}

const CLASSIC_LIMIT = 0xffff_fffe;

// ── Public API ──────────────────────────────────────────────────────

/**
 * Build a complete TIFF file from a chain of IFDs.
 *
 * @returns The file contents.
 */
export function buildTiff(ifds: WritableIfd[], options: BuildTiffOptions = {}): ArrayBuffer {
  const compression = options.compression ?? "none";
  const level = options.compressionLevel ?? 6;

  const prepared = ifds.map((ifd) => compressIfd(ifd, compression, level));
  const rawSize = prepared.reduce(
    (sum, ifd) => sum + 512 + ifd.blocks.reduce((s, b) => s + b.length, 0),
    16,
  );

  let layout: Layout;
  switch (options.format ?? "auto") {
    case "bigtiff":
      layout = BIGTIFF;
      break;
    case "classic":
      if (rawSize > CLASSIC_LIMIT) {
        throw new Error(
          `File size (~${(rawSize / 1e9).toFixed(1)} GB) exceeds the classic TIFF 4 GB limit`,
        );
      }
      layout = CLASSIC;
      break;
    default:
      layout = rawSize > 3.9e9 ? BIGTIFF : CLASSIC;
  }

  const placed = placeIfds(prepared, layout);
  const last = placed[placed.length - 1];
  const totalSize = last
    ? last.blockOffset + last.blocks.reduce((s, b) => s + b.length, 0)
    : layout.headerSize;

  const buffer = new ArrayBuffer(totalSize);
  const view = new DataView(buffer);
  writeHeader(view, layout, placed[0]?.offset ?? 0);
  for (const ifd of placed) {
    writeIfd(view, ifd, layout);
  }
  return buffer;
}

/** Deflate (zlib-wrapped, TIFF compression 8). */
export function compressDeflate(data: Uint8Array, level = 6): Uint8Array {
  return zlibSync(data, { level: clampLevel(level) });
}

/**
 * Tags for a single-sample grayscale plane.
 *
 * Planes wider or taller than `tileSize` are tiled; smaller ones are one
 * strip. A `tileSize` of 0 always writes one strip.
 */
export function makeImageTags(
  width: number,
  height: number,
  bitsPerSample: number,
  sampleFormat: number,
  tileSize: number = DEFAULT_TILE_SIZE,
  imageDescription?: string,
  software?: string,
): TiffTag[] {
  const tags: TiffTag[] = [
    { tag: TAG_IMAGE_WIDTH, type: TIFF_TYPE_LONG, values: [width] },
    { tag: TAG_IMAGE_LENGTH, type: TIFF_TYPE_LONG, values: [height] },
    { tag: TAG_BITS_PER_SAMPLE, type: TIFF_TYPE_SHORT, values: [bitsPerSample] },
    { tag: TAG_COMPRESSION, type: TIFF_TYPE_SHORT, values: [COMPRESSION_NONE] },
    { tag: TAG_PHOTOMETRIC, type: TIFF_TYPE_SHORT, values: [1] }, // MinIsBlack
    { tag: TAG_SAMPLES_PER_PIXEL, type: TIFF_TYPE_SHORT, values: [1] },
    { tag: TAG_PLANAR_CONFIGURATION, type: TIFF_TYPE_SHORT, values: [1] },
    { tag: TAG_SAMPLE_FORMAT, type: TIFF_TYPE_SHORT, values: [sampleFormat] },
  ];

  if (isTiled(width, height, tileSize)) {
    tags.push({ tag: TAG_TILE_WIDTH, type: TIFF_TYPE_LONG, values: [tileSize] });
    tags.push({ tag: TAG_TILE_LENGTH, type: TIFF_TYPE_LONG, values: [tileSize] });
  } else {
    tags.push({ tag: TAG_ROWS_PER_STRIP, type: TIFF_TYPE_LONG, values: [height] });
  }

  if (imageDescription) {
    tags.push({ tag: TAG_IMAGE_DESCRIPTION, type: TIFF_TYPE_ASCII, values: imageDescription });
  }
  if (software) {
    tags.push({ tag: TAG_SOFTWARE, type: TIFF_TYPE_ASCII, values: software });
  }
  return tags;
}

export function isTiled(width: number, height: number, tileSize: number): boolean {
  return tileSize > 0 && (width > tileSize || height > tileSize);
}

/**
 * Cut a plane into `tileSize` square tiles, row-major. Edge tiles are
 * zero-padded to the full tile size. Planes that are not tiled come back
 * as a single block.
 */
export function slicePlane(
  plane: Uint8Array,
  width: number,
  height: number,
  bytesPerPixel: number,
  tileSize: number,
): Uint8Array[] {
  if (!isTiled(width, height, tileSize)) return [plane];

  const tiles: Uint8Array[] = [];
  const rowBytes = width * bytesPerPixel;
  const tileRowBytes = tileSize * bytesPerPixel;

  for (let top = 0; top < height; top += tileSize) {
    for (let left = 0; left < width; left += tileSize) {
      const tile = new Uint8Array(tileRowBytes * tileSize);
      const rows = Math.min(tileSize, height - top);
      const cols = Math.min(tileSize, width - left) * bytesPerPixel;
      for (let row = 0; row < rows; row++) {
        const src = (top + row) * rowBytes + left * bytesPerPixel;
        tile.set(plane.subarray(src, src + cols), row * tileRowBytes);
      }
      tiles.push(tile);
    }
  }
  return tiles;
}

// ── Internal helpers ────────────────────────────────────────────────

function clampLevel(level: number): 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 {
  switch (Math.round(level)) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    case 7:
      return 7;
    case 8:
      return 8;
    case 9:
      return 9;
    default:
      return 6;
  }
}

function compressIfd(ifd: WritableIfd, compression: TiffCompression, level: number): WritableIfd {
  if (compression === "none") return ifd;
  const tags = ifd.tags.map((t) =>
    t.tag === TAG_COMPRESSION ? { ...t, values: [COMPRESSION_DEFLATE] } : t,
  );
  return { tags, blocks: ifd.blocks.map((block) => compressDeflate(block, level)) };
}

function encodeTag(tag: TiffTag): EncodedTag {
  if (typeof tag.values === "string") {
    const text = new TextEncoder().encode(tag.values);
    const bytes = new Uint8Array(text.length + 1); // null-terminated
    bytes.set(text);
    return { tag: tag.tag, type: TIFF_TYPE_ASCII, count: bytes.length, bytes };
  }

  const size = TYPE_SIZES[tag.type];
  if (!size) throw new Error(`Unsupported TIFF type: ${tag.type}`);
  const bytes = new Uint8Array(tag.values.length * size);
  const view = new DataView(bytes.buffer);
  tag.values.forEach((value, i) => writeNumber(view, i * size, value, tag.type));
  return { tag: tag.tag, type: tag.type, count: tag.values.length, bytes };
}

function offsetTag(tag: number, values: number[], layout: Layout): EncodedTag {
  return encodeTag({ tag, type: layout.offsetType, values });
}

function overflowBytes(tags: EncodedTag[], layout: Layout): number {
  return tags.reduce((sum, t) => {
    if (t.bytes.length <= layout.offsetSize) return sum;
    return sum + t.bytes.length + (t.bytes.length % 2);
  }, 0);
}

function placeIfds(ifds: WritableIfd[], layout: Layout): PlacedIfd[] {
  const placed: PlacedIfd[] = [];
  let cursor = layout.headerSize;

  for (const ifd of ifds) {
    const tiled = ifd.tags.some((t) => t.tag === TAG_TILE_WIDTH);
    const offsetsTagId = tiled ? TAG_TILE_OFFSETS : TAG_STRIP_OFFSETS;
    const countsTagId = tiled ? TAG_TILE_BYTE_COUNTS : TAG_STRIP_BYTE_COUNTS;
    const counts = ifd.blocks.map((b) => b.length);
    const placeholder = counts.map(() => 0);

    // Offsets are patched once the block position is known; the encoded
    // size does not depend on the values.
    const tags = [
      ...ifd.tags.map(encodeTag),
      offsetTag(offsetsTagId, placeholder, layout),
      offsetTag(countsTagId, counts, layout),
    ].sort((a, b) => a.tag - b.tag);

    const offset = cursor;
    const entryBlock = layout.countSize + tags.length * layout.entrySize + layout.offsetSize;
    const overflowOffset = offset + entryBlock;
    const blockOffset = overflowOffset + overflowBytes(tags, layout);

    const blockOffsets: number[] = [];
    let blockCursor = blockOffset;
    for (const count of counts) {
      blockOffsets.push(blockCursor);
      blockCursor += count;
    }
    const index = tags.findIndex((t) => t.tag === offsetsTagId);
    tags[index] = offsetTag(offsetsTagId, blockOffsets, layout);

    const entry: PlacedIfd = {
      offset,
      tags,
      overflowOffset,
      blockOffset,
      blocks: ifd.blocks,
      next: 0,
    };
    const previous = placed[placed.length - 1];
    if (previous) previous.next = offset;
    placed.push(entry);

    cursor = blockCursor;
    // IFDs start on a word boundary.
    if (cursor % 2 !== 0) cursor += 1;
  }

  return placed;
}

function writeHeader(view: DataView, layout: Layout, firstIfd: number): void {
  view.setUint16(0, 0x4949, true); // "II"
  view.setUint16(2, layout.magic, true);
  if (layout.magic === 42) {
    view.setUint32(4, firstIfd, true);
  } else {
    view.setUint16(4, 8, true);
    view.setUint16(6, 0, true);
    setUint64(view, 8, firstIfd);
  }
}

function writeIfd(view: DataView, ifd: PlacedIfd, layout: Layout): void {
  const bytes = new Uint8Array(view.buffer);
  let pos = ifd.offset;
  writeCount(view, pos, ifd.tags.length, layout);
  pos += layout.countSize;

  let overflow = ifd.overflowOffset;
  for (const tag of ifd.tags) {
    view.setUint16(pos, tag.tag, true);
    view.setUint16(pos + 2, tag.type, true);
    writeCount(view, pos + 4, tag.count, layout, true);
    const valuePos = pos + 4 + layout.offsetSize;

    if (tag.bytes.length <= layout.offsetSize) {
      bytes.set(tag.bytes, valuePos);
    } else {
      writeOffset(view, valuePos, overflow, layout);
      bytes.set(tag.bytes, overflow);
      overflow += tag.bytes.length + (tag.bytes.length % 2);
    }
    pos += layout.entrySize;
  }
  writeOffset(view, pos, ifd.next, layout);

  let blockPos = ifd.blockOffset;
  for (const block of ifd.blocks) {
    bytes.set(block, blockPos);
    blockPos += block.length;
  }
}

/** Entry count (IFD header) or value count (tag entry). */
function writeCount(
  view: DataView,
  pos: number,
  value: number,
  layout: Layout,
  inEntry = false,
): void {
  if (layout.magic === 43) {
    setUint64(view, pos, value);
  } else if (inEntry) {
    view.setUint32(pos, value, true);
  } else {
    view.setUint16(pos, value, true);
  }
}

function writeOffset(view: DataView, pos: number, value: number, layout: Layout): void {
  if (layout.magic === 43) setUint64(view, pos, value);
  else view.setUint32(pos, value, true);
}

function writeNumber(view: DataView, pos: number, value: number, type: number): void {
  switch (type) {
    case TIFF_TYPE_SHORT:
      view.setUint16(pos, value, true);
      break;
    case TIFF_TYPE_LONG:
      view.setUint32(pos, value, true);
      break;
    case TIFF_TYPE_LONG8:
      setUint64(view, pos, value);
      break;
  }
}

/** Two 32-bit writes; offsets stay below 2^53. */
function setUint64(view: DataView, pos: number, value: number): void {
  view.setUint32(pos, value >>> 0, true);
  view.setUint32(pos + 4, Math.floor(value / 0x1_0000_0000) >>> 0, true);
}
