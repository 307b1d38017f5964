// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Canonical first-file names and multi-file import patterns.
 *
 * An import pattern writes the varying fields as inclusive ranges:
 *
 *   B2_02_SP1_Z<0-4>_C<1-3>_T<001-012>.tif
 *
 * The width of the low bound sets the zero padding of every value in
 * the range (`<001-012>` yields 001, 002, ... 012; `<0-4>` is unpadded).
 */

import { padTimepoint, SEPARATOR, TIFF_EXTENSION } from "./filename.js";

/** Suffix appended to a group's first-file name for its joined stack. */
export const JOINT_SUFFIX = "_jointTIF.tif";

export interface GroupKey {
  well: string;
  readStep: string;
  position: number;
}

export interface PatternExtent {
  maxZ: number;
  channelCount: number;
  maxTimepoint: number;
}

/** Plane coordinates are 0-based indices into the stack. */
export interface PatternPlane {
  fileName: string;
  c: number;
  z: number;
  t: number;
}

const RANGE_RE = /([A-Za-z]?)<(\d+)-(\d+)>/g;

type Dimension = "c" | "z" | "t";

const TAG_DIMENSIONS: Record<string, Dimension | undefined> = { C: "c", Z: "z", T: "t" };

function groupPrefix(key: GroupKey): string {
  return [key.well, key.readStep, `SP${key.position}`].join(SEPARATOR);
}

/** `<Well>_<ReadStep>_SP<p>_Z0_C1_T001.tif` */
export function formatFirstFileName(key: GroupKey): string {
  return [groupPrefix(key), "Z0", "C1", "T001"].join(SEPARATOR) + TIFF_EXTENSION;
}

/** `<Well>_<ReadStep>_SP<p>_Z<0-maxZ>_C<1-n>_T<001-maxT>.tif` */
export function formatImportPattern(key: GroupKey, extent: PatternExtent): string {
  return (
    [
      groupPrefix(key),
      `Z<0-${extent.maxZ}>`,
      `C<1-${extent.channelCount}>`,
      `T<001-${padTimepoint(extent.maxTimepoint)}>`,
    ].join(SEPARATOR) + TIFF_EXTENSION
  );
}

/** File name of the joined stack for a group. */
export function jointFileName(firstFileName: string): string {
  return firstFileName + JOINT_SUFFIX;
}

interface Range {
  dimension: Dimension;
  low: number;
  high: number;
  width: number;
  start: number;
  end: number;
}

function parseRanges(pattern: string): Range[] {
  const ranges: Range[] = [];
  for (const match of pattern.matchAll(RANGE_RE)) {
    const [whole, tag, lowText, highText] = match;
    const dimension = TAG_DIMENSIONS[tag.toUpperCase()];
    if (!dimension) {
      throw new Error(`Range ${whole} in "${pattern}" is not tagged with Z, C or T`);
    }
    const low = Number.parseInt(lowText, 10);
    const high = Number.parseInt(highText, 10);
    if (high < low) {
      throw new Error(`Range ${whole} in "${pattern}" is empty`);
    }
    if (ranges.some((r) => r.dimension === dimension)) {
      throw new Error(`Pattern "${pattern}" has more than one ${tag} range`);
    }
    const start = (match.index ?? 0) + tag.length;
    ranges.push({
      dimension,
      low,
      high,
      width: lowText.length,
      start,
      end: (match.index ?? 0) + whole.length,
    });
  }
  return ranges;
}

/**
 * Expand an import pattern into its member file names.
 *
 * Planes are ordered channel fastest, then Z, then time (XYCZT).
 */
export function expandImportPattern(pattern: string): PatternPlane[] {
  const ranges = parseRanges(pattern);
  const byDim = (dim: Dimension) => ranges.find((r) => r.dimension === dim);
  const c = byDim("c");
  const z = byDim("z");
  const t = byDim("t");
  const count = (r?: Range) => (r ? r.high - r.low + 1 : 1);

  const planes: PatternPlane[] = [];
  for (let ti = 0; ti < count(t); ti++) {
    for (let zi = 0; zi < count(z); zi++) {
      for (let ci = 0; ci < count(c); ci++) {
        const offsets: Record<Dimension, number> = { c: ci, z: zi, t: ti };
        let fileName = "";
        let cursor = 0;
        for (const range of ranges) {
          const value = String(range.low + offsets[range.dimension]).padStart(range.width, "0");
          fileName += pattern.slice(cursor, range.start) + value;
          cursor = range.end;
        }
        fileName += pattern.slice(cursor);
        planes.push({ fileName, c: ci, z: zi, t: ti });
      }
    }
  }
  return planes;
}
