// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Pixel types of single-sample microscopy planes, and their TIFF and
 * OME-XML encodings.
 *
 * TIFF SampleFormat values:
 *   1 = unsigned integer
 *   2 = signed integer (two's complement)
 *   3 = IEEE floating point
 */

export type PixelType =
  | "int8"
  | "int16"
  | "int32"
  | "uint8"
  | "uint16"
  | "uint32"
  | "float32"
  | "float64";

/** TIFF SampleFormat tag values. */
export const SAMPLE_FORMAT_UINT = 1;
export const SAMPLE_FORMAT_INT = 2;
export const SAMPLE_FORMAT_FLOAT = 3;

export interface TiffSampleLayout {
  bitsPerSample: number;
  sampleFormat: number;
}

const LAYOUTS: Record<PixelType, TiffSampleLayout> = {
  uint8: { bitsPerSample: 8, sampleFormat: SAMPLE_FORMAT_UINT },
  uint16: { bitsPerSample: 16, sampleFormat: SAMPLE_FORMAT_UINT },
  uint32: { bitsPerSample: 32, sampleFormat: SAMPLE_FORMAT_UINT },
  int8: { bitsPerSample: 8, sampleFormat: SAMPLE_FORMAT_INT },
  int16: { bitsPerSample: 16, sampleFormat: SAMPLE_FORMAT_INT },
  int32: { bitsPerSample: 32, sampleFormat: SAMPLE_FORMAT_INT },
  float32: { bitsPerSample: 32, sampleFormat: SAMPLE_FORMAT_FLOAT },
  float64: { bitsPerSample: 64, sampleFormat: SAMPLE_FORMAT_FLOAT },
};

/**
 * Map TIFF SampleFormat + BitsPerSample to a pixel type.
 *
 * @param sampleFormat - TIFF SampleFormat tag value (1=uint, 2=int, 3=float).
 * @param bitsPerSample - Bits per sample (8, 16, 32, 64).
 * @throws If the combination is unsupported.
 */
export function tiffPixelType(sampleFormat: number, bitsPerSample: number): PixelType {
  for (const [type, layout] of Object.entries(LAYOUTS)) {
    if (layout.sampleFormat === sampleFormat && layout.bitsPerSample === bitsPerSample) {
      return pixelTypeOf(type);
    }
  }
  throw new Error(
    `Unsupported TIFF sample layout: SampleFormat ${sampleFormat}, ${bitsPerSample} bits`,
  );
}

function pixelTypeOf(name: string): PixelType {
  switch (name) {
    case "int8":
    case "int16":
    case "int32":
    case "uint8":
    case "uint16":
    case "uint32":
    case "float32":
    case "float64":
      return name;
  }
  throw new Error(`Unknown pixel type: ${name}`);
}

export function tiffSampleLayout(pixelType: PixelType): TiffSampleLayout {
  return LAYOUTS[pixelType];
}

/** OME-XML Pixels Type attribute value. */
export function omePixelType(pixelType: PixelType): string {
  if (pixelType === "float32") return "float";
  if (pixelType === "float64") return "double";
  return pixelType;
}

export function bytesPerElement(pixelType: PixelType): number {
  return LAYOUTS[pixelType].bitsPerSample / 8;
}
