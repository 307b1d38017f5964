// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Parser for the plate imager's file-name grammar.
 *
 *   <Well>_<ReadStep>[_]SP<n>[_]Z<n>_[C<n>_]<Channel>_T<nnn>.tif
 *
 * Token 0 is the well and token 1 starts with the two-digit read step.
 * The remaining tokens carry position, Z-step, channel and timepoint in
 * no fixed order and are recognised by their tag, not by their index.
 */

/** Field separator in file names. */
export const SEPARATOR = "_";

/** Extension of every normalized and joined file. */
export const TIFF_EXTENSION = ".tif";

const EXTENSION_RE = /\.tiff?$/i;
const WELL_RE = /^(?<well>[A-Z]{1,2}\d{1,2})$/;
const READ_STEP_RE = /^(?<readStep>\d{2})(?<rest>.*)$/;
const POSITION_RE = /^SP(?<position>\d+)$/;
const POSITION_Z_RE = /^SP(?<position>\d+)Z(?<z>\d+)$/;
const Z_RE = /^Z(?<z>\d+)$/;
const CHANNEL_INDEX_RE = /^C(?<channel>\d+)$/;
const TIMEPOINT_RE = /^T(?<time>\d+)$/;

/** One classified token after the well and read step. */
export type FileNameToken =
  | { kind: "position"; text: string; position: number }
  | { kind: "position-z"; text: string; position: number; zStep: number }
  | { kind: "z"; text: string; zStep: number }
  | { kind: "channel-index"; text: string; channelIndex: number }
  | { kind: "timepoint"; text: string; timepoint: number }
  | { kind: "channel-name"; text: string; channelName: string }
  | { kind: "unknown"; text: string };

export interface ParsedFileName {
  /** The name as given, extension included. */
  fileName: string;
  /** The name without its extension. */
  baseName: string;
  extension: string;
  well: string;
  readStep: string;
  position?: number;
  /** Defaults to 0 when the name carries no Z tag. */
  zStep: number;
  channelIndex?: number;
  channelName?: string;
  /** Defaults to 1 when the name carries no timepoint tag. */
  timepoint: number;
  /** Tokens after the well and read step, in file order. */
  tokens: FileNameToken[];
  /** Tokens that matched no tag and no channel name. */
  unknownTokens: string[];
}

/** A file name the pipeline cannot use. */
export interface FileNameIssue {
  fileName: string;
  reason: string;
}

export type ParseResult =
  | { ok: true; value: ParsedFileName }
  | { ok: false; issue: FileNameIssue };

/**
 * Extract the index of a tagged token.
 *
 * The tag is replaced by a literal zero before parsing, so `SP3` reads
 * as `03` and `T012` as `0012`.
 */
export function extractIndex(text: string, tag: string): number {
  return Number.parseInt(text.replace(tag, "0"), 10);
}

export function isTiffFileName(name: string): boolean {
  return EXTENSION_RE.test(name);
}

export function splitExtension(name: string): { baseName: string; extension: string } {
  const match = EXTENSION_RE.exec(name);
  if (!match) return { baseName: name, extension: "" };
  return { baseName: name.slice(0, match.index), extension: match[0] };
}

/** Classify a single token against the tag grammar and the vocabulary. */
export function classifyToken(
  text: string,
  vocabulary: readonly string[] = [],
): FileNameToken {
  let groups = POSITION_RE.exec(text)?.groups;
  if (groups) {
    return { kind: "position", text, position: extractIndex(text, "SP") };
  }

  groups = POSITION_Z_RE.exec(text)?.groups;
  if (groups) {
    return {
      kind: "position-z",
      text,
      position: extractIndex(`SP${groups.position}`, "SP"),
      zStep: extractIndex(`Z${groups.z}`, "Z"),
    };
  }

  if (Z_RE.test(text)) {
    return { kind: "z", text, zStep: extractIndex(text, "Z") };
  }
  if (CHANNEL_INDEX_RE.test(text)) {
    return { kind: "channel-index", text, channelIndex: extractIndex(text, "C") };
  }
  if (TIMEPOINT_RE.test(text)) {
    return { kind: "timepoint", text, timepoint: extractIndex(text, "T") };
  }
  if (vocabulary.includes(text)) {
    return { kind: "channel-name", text, channelName: text };
  }
  return { kind: "unknown", text };
}

/**
 * Split a file name into its well, read step and classified tokens.
 *
 * @param fileName - A file name with or without a TIFF extension.
 * @param vocabulary - Expanded channel names to recognise as channel tokens.
 */
export function parseFileName(
  fileName: string,
  vocabulary: readonly string[] = [],
): ParseResult {
  const { baseName, extension } = splitExtension(fileName);
  const [wellToken, readStepToken, ...rest] = baseName.split(SEPARATOR);

  const well = WELL_RE.exec(wellToken)?.groups?.well;
  if (!well) {
    return { ok: false, issue: { fileName, reason: `no well label in "${wellToken}"` } };
  }

  const readStepMatch = READ_STEP_RE.exec(readStepToken ?? "")?.groups;
  if (!readStepMatch) {
    return {
      ok: false,
      issue: { fileName, reason: `no two-digit read step after well ${well}` },
    };
  }

  const texts = readStepMatch.rest ? [readStepMatch.rest, ...rest] : rest;
  const tokens = texts.map((text) => classifyToken(text, vocabulary));

  const value: ParsedFileName = {
    fileName,
    baseName,
    extension,
    well,
    readStep: readStepMatch.readStep,
    zStep: 0,
    timepoint: 1,
    tokens,
    unknownTokens: [],
  };

  const seen = new Set<string>();
  const claim = (field: string): string | undefined => {
    if (seen.has(field)) return `more than one ${field} tag`;
    seen.add(field);
    return undefined;
  };

  for (const token of tokens) {
    let duplicate: string | undefined;
    switch (token.kind) {
      case "position":
        duplicate = claim("position");
        value.position = token.position;
        break;
      case "position-z":
        duplicate = claim("position") ?? claim("Z");
        value.position = token.position;
        value.zStep = token.zStep;
        break;
      case "z":
        duplicate = claim("Z");
        value.zStep = token.zStep;
        break;
      case "channel-index":
        duplicate = claim("channel index");
        value.channelIndex = token.channelIndex;
        break;
      case "channel-name":
        duplicate = claim("channel name");
        value.channelName = token.channelName;
        break;
      case "timepoint":
        duplicate = claim("timepoint");
        value.timepoint = token.timepoint;
        break;
      case "unknown":
        value.unknownTokens.push(token.text);
        break;
    }
    if (duplicate) {
      return { ok: false, issue: { fileName, reason: duplicate } };
    }
  }

  return { ok: true, value };
}

/** Left-pad a timepoint to the instrument's three-digit width. */
export function padTimepoint(timepoint: number): string {
  return String(timepoint).padStart(3, "0");
}
