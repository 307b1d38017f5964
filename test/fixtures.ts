// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Test fixture helpers: small TIFF planes built in memory, temporary
 * plate directories, and a logger that records what it is given.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { fromArrayBuffer } from "geotiff";

import type { Group } from "../src/coordinates.js";
import { tiffSampleLayout } from "../src/dtypes.js";
import type { LogContext, Logger, LogLevel } from "../src/logger.js";
import { buildTiff, makeImageTags } from "../src/tiff-writer.js";

/**
 * A single-sample strip TIFF.
 *
 * @param value - Constant pixel value, or a function of (x, y).
 */
export function createPlaneTiff(
  width: number,
  height: number,
  value: number | ((x: number, y: number) => number),
  pixelType: "uint8" | "uint16" = "uint16",
): Uint8Array {
  const values = pixelType === "uint8" ? new Uint8Array(width * height) : new Uint16Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      values[y * width + x] = typeof value === "number" ? value : value(x, y);
    }
  }
  const { bitsPerSample, sampleFormat } = tiffSampleLayout(pixelType);
  const buffer = buildTiff([
    {
      tags: makeImageTags(width, height, bitsPerSample, sampleFormat, 0),
      blocks: [new Uint8Array(values.buffer)],
    },
  ]);
  return new Uint8Array(buffer);
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "wellstack-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write 8x6 uint16 planes; plane i is filled with i + 1. */
export async function writePlanes(dir: string, names: string[]): Promise<void> {
  for (const [i, name] of names.entries()) {
    await writeFile(join(dir, name), createPlaneTiff(8, 6, i + 1));
  }
}

/** Write empty files, for runs that never decode them. */
export async function writeEmptyFiles(dir: string, names: string[]): Promise<void> {
  for (const name of names) {
    await writeFile(join(dir, name), "");
  }
}

/** Read every IFD of a TIFF: its size and first pixel value. */
export async function readStack(
  bytes: Uint8Array,
): Promise<{ width: number; height: number; firstPixel: number; description: string }[]> {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  const tiff = await fromArrayBuffer(buffer);
  const count = await tiff.getImageCount();

  const planes = [];
  for (let i = 0; i < count; i++) {
    const image = await tiff.getImage(i);
    const rasters = await image.readRasters({ samples: [0] });
    const band = Array.isArray(rasters) ? rasters[0] : rasters;
    const description: unknown = image.fileDirectory.ImageDescription;
    planes.push({
      width: image.getWidth(),
      height: image.getHeight(),
      firstPixel: Number(band[0]),
      description: typeof description === "string" ? description.replace(/\0+$/, "") : "",
    });
  }
  return planes;
}

/**
 * Level bits (FLEVEL) of the zlib header of the first strip or tile:
 * 1 for levels 1-5, 2 for 6-8, 3 for 9.
 */
export async function firstBlockLevel(bytes: Uint8Array): Promise<number> {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  const image = await (await fromArrayBuffer(buffer)).getImage(0);
  const offsets: unknown = image.fileDirectory.StripOffsets ?? image.fileDirectory.TileOffsets;
  const first = Array.isArray(offsets) || offsets instanceof Uint32Array ? offsets[0] : offsets;
  if (typeof first !== "number") throw new Error("no strip or tile offsets");
  return (bytes[first + 1] ?? 0) >> 6;
}

export function makeGroup(overrides: Partial<Group> = {}): Group {
  return {
    well: "B2",
    readStep: "02",
    position: 1,
    name: "B2 SP1",
    firstFileName: "B2_02_SP1_Z0_C1_T001.tif",
    importPattern: "B2_02_SP1_Z<0-0>_C<1-1>_T<001-001>.tif",
    ...overrides,
  };
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export function createRecordingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const record = (level: LogLevel) => (message: string, context?: LogContext) => {
    records.push({ level, message, context });
  };
  return {
    records,
    logger: {
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
    },
  };
}
