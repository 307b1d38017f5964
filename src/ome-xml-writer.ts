// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * OME-XML writer for joined stacks.
 *
 * The generated XML follows the 2016-06 OME schema and describes one
 * image whose planes are stored one per IFD in DimensionOrder.
 */

import type { PixelType } from "./dtypes.js";
import { omePixelType } from "./dtypes.js";

export type DimensionOrder = "XYZCT" | "XYZTC" | "XYCTZ" | "XYCZT" | "XYTCZ" | "XYTZC";

/** Sizes of a 5D stack. */
export interface StackDimensions {
  sizeX: number;
  sizeY: number;
  sizeZ: number;
  sizeC: number;
  sizeT: number;
}

export interface OmeXmlWriterOptions {
  /** Default: "XYCZT". */
  dimensionOrder?: DimensionOrder;
  /** Creator attribute of the OME element. Default: "wellstack". */
  creator?: string;
  /** Default: "image". */
  imageName?: string;
  /** Channel names in channel order. Missing names become `C<n>`. */
  channelNames?: readonly string[];
}

/**
 * @returns A complete OME-XML document for a TIFF ImageDescription tag.
 */
export function buildOmeXml(
  dims: StackDimensions,
  pixelType: PixelType,
  options: OmeXmlWriterOptions = {},
): string {
  const dimensionOrder = options.dimensionOrder ?? "XYCZT";
  const creator = options.creator ?? "wellstack";
  const imageName = options.imageName ?? "image";
  const channels = buildChannelElements(dims.sizeC, options.channelNames ?? []);

  return `<?xml version="1.0" encoding="UTF-8"?>
<OME xmlns="http://www.openmicroscopy.org/Schemas/OME/2016-06"
     xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"
     xsi:schemaLocation="http://www.openmicroscopy.org/Schemas/OME/2016-06
       http://www.openmicroscopy.org/Schemas/OME/2016-06/ome.xsd"
     Creator="${escapeXml(creator)}">
  <Image ID="Image:0" Name="${escapeXml(imageName)}">
    <Pixels ID="Pixels:0" DimensionOrder="${dimensionOrder}" Type="${omePixelType(pixelType)}"
            SizeX="${dims.sizeX}" SizeY="${dims.sizeY}" SizeZ="${dims.sizeZ}" SizeC="${dims.sizeC}" SizeT="${dims.sizeT}"
            BigEndian="false">
${channels}      <TiffData IFD="0" PlaneCount="${dims.sizeZ * dims.sizeC * dims.sizeT}"/>
    </Pixels>
  </Image>
</OME>`;
}

function buildChannelElements(sizeC: number, names: readonly string[]): string {
  const lines: string[] = [];
  for (let c = 0; c < sizeC; c++) {
    const name = names[c] ?? `C${c + 1}`;
    lines.push(
      `      <Channel ID="Channel:0:${c}" Name="${escapeXml(name)}" SamplesPerPixel="1"/>`,
    );
  }
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}

/** Escape XML special characters. */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
