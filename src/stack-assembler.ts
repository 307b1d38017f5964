// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Stack assembler: joins every plane of a group into one OME-TIFF.
 *
 * The member files are listed by expanding the group's import pattern,
 * decoded with geotiff.js, and written back as a chain of IFDs in
 * XYCZT order (channel fastest, then Z, then time).
 *
 * @example
 * ```ts
 * const assembler = new TiffStackAssembler({ compression: "deflate" });
 * await assembler.assemble({ group, sourceDir, outputPath });
 * ```
 */

import { dirname, join } from "node:path";

import { fromArrayBuffer } from "geotiff";

import type { Group } from "./coordinates.js";
import { bytesPerElement, tiffPixelType, tiffSampleLayout, type PixelType } from "./dtypes.js";
import { errorMessage, StackAssemblyError } from "./errors.js";
import { ensureDir, pathExists, readBytes, writeBytes } from "./fs-ops.js";
import { silentLogger, type Logger } from "./logger.js";
import { buildOmeXml, type StackDimensions } from "./ome-xml-writer.js";
import { expandImportPattern } from "./pattern.js";
import {
  buildTiff,
  DEFAULT_TILE_SIZE,
  makeImageTags,
  slicePlane,
  type TiffCompression,
  type WritableIfd,
} from "./tiff-writer.js";

export interface AssemblyRequest {
  group: Group;
  /** Directory holding the group's member files. */
  sourceDir: string;
  /** Path of the joined file to write. */
  outputPath: string;
}

export interface AssemblyResult {
  outputPath: string;
  dimensions: StackDimensions;
  pixelType: PixelType;
  /** Member files of the pattern that were not found; written as blank planes. */
  missing: string[];
}

/** Joins the member files of one group into a single stack file. */
export interface StackAssembler {
  /**
   * @throws {StackAssemblyError} When the group cannot be joined.
   * @throws {FileOperationError} When a file cannot be read or written.
   */
  assemble(request: AssemblyRequest): Promise<AssemblyResult>;
}

export interface TiffStackAssemblerOptions {
  /** Default: "deflate". */
  compression?: TiffCompression;
  /** Deflate level (1-9). Default: 6. */
  compressionLevel?: number;
  /** Tile size for large planes; 0 writes strips. Default: 256. */
  tileSize?: number;
  /** Channel names embedded in the OME-XML, in channel order. */
  channelNames?: readonly string[];
  logger?: Logger;
}

interface DecodedPlane {
  width: number;
  height: number;
  pixelType: PixelType;
  /** Raw little-endian pixel bytes. */
  bytes: Uint8Array;
}

export class TiffStackAssembler implements StackAssembler {
  private readonly options: TiffStackAssemblerOptions;
  private readonly logger: Logger;

  constructor(options: TiffStackAssemblerOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async assemble(request: AssemblyRequest): Promise<AssemblyResult> {
    const { group, sourceDir, outputPath } = request;
    const members = expandImportPattern(group.importPattern);

    const planes: (DecodedPlane | undefined)[] = [];
    const missing: string[] = [];
    let reference: DecodedPlane | undefined;

    for (const member of members) {
      const path = join(sourceDir, member.fileName);
      if (!(await pathExists(path))) {
        missing.push(member.fileName);
        planes.push(undefined);
        continue;
      }

      const plane = await decodePlane(path, group.name);
      if (reference) {
        assertSameGeometry(reference, plane, member.fileName, group.name);
      } else {
        reference = plane;
      }
      planes.push(plane);
    }

    if (!reference) {
      throw new StackAssemblyError(
        group.name,
        `no file matching ${group.importPattern} in ${sourceDir}`,
      );
    }
    if (missing.length > 0) {
      this.logger.warn(`Missing planes written as blank`, {
        group: group.name,
        missing: missing.length,
        first: missing[0],
      });
    }

    const dimensions: StackDimensions = {
      sizeX: reference.width,
      sizeY: reference.height,
      sizeC: Math.max(...members.map((m) => m.c)) + 1,
      sizeZ: Math.max(...members.map((m) => m.z)) + 1,
      sizeT: Math.max(...members.map((m) => m.t)) + 1,
    };

    const buffer = this.encode(planes, reference, dimensions, group);
    await ensureDir(dirname(outputPath));
    await writeBytes(outputPath, new Uint8Array(buffer));

    return { outputPath, dimensions, pixelType: reference.pixelType, missing };
  }

  private encode(
    planes: (DecodedPlane | undefined)[],
    reference: DecodedPlane,
    dimensions: StackDimensions,
    group: Group,
  ): ArrayBuffer {
    const tileSize = this.options.tileSize ?? DEFAULT_TILE_SIZE;
    const { bitsPerSample, sampleFormat } = tiffSampleLayout(reference.pixelType);
    const bpe = bytesPerElement(reference.pixelType);
    const blank = new Uint8Array(reference.bytes.length);

    const omeXml = buildOmeXml(dimensions, reference.pixelType, {
      dimensionOrder: "XYCZT",
      imageName: group.firstFileName,
      channelNames: this.options.channelNames,
    });

    const ifds: WritableIfd[] = planes.map((plane, i) => ({
      tags: makeImageTags(
        dimensions.sizeX,
        dimensions.sizeY,
        bitsPerSample,
        sampleFormat,
        tileSize,
        i === 0 ? omeXml : undefined,
      ),
      blocks: slicePlane(plane?.bytes ?? blank, dimensions.sizeX, dimensions.sizeY, bpe, tileSize),
    }));

    return buildTiff(ifds, {
      compression: this.options.compression ?? "deflate",
      compressionLevel: this.options.compressionLevel,
    });
  }
}

function assertSameGeometry(
  reference: DecodedPlane,
  plane: DecodedPlane,
  fileName: string,
  groupName: string,
): void {
  if (
    plane.width !== reference.width ||
    plane.height !== reference.height ||
    plane.pixelType !== reference.pixelType
  ) {
    throw new StackAssemblyError(
      groupName,
      `${fileName} is ${plane.width}x${plane.height} ${plane.pixelType}, ` +
        `expected ${reference.width}x${reference.height} ${reference.pixelType}`,
    );
  }
}

/** Decode the first image of a single-sample TIFF. */
async function decodePlane(path: string, groupName: string): Promise<DecodedPlane> {
  const bytes = await readBytes(path);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);

  try {
    const tiff = await fromArrayBuffer(buffer);
    const image = await tiff.getImage(0);
    if (image.getSamplesPerPixel() !== 1) {
      throw new Error(`${image.getSamplesPerPixel()} samples per pixel, expected 1`);
    }
    const pixelType = tiffPixelType(image.getSampleFormat(), image.getBitsPerSample());
    const rasters = await image.readRasters({ samples: [0] });
    const band = Array.isArray(rasters) ? rasters[0] : rasters;

    return {
      width: image.getWidth(),
      height: image.getHeight(),
      pixelType,
      bytes: new Uint8Array(band.buffer, band.byteOffset, band.byteLength),
    };
  } catch (error) {
    throw new StackAssemblyError(groupName, `cannot decode ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
