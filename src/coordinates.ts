// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Coordinate space builder: derives wells, positions, Z-steps and
 * timepoints from normalized file names, and enumerates the
 * (well, position) groups that are joined into stacks.
 */

import { parseFileName, SEPARATOR, type FileNameIssue } from "./filename.js";
import {
  formatFirstFileName,
  formatImportPattern,
  type GroupKey,
} from "./pattern.js";

export interface CoordinateSpace {
  /** Distinct wells in first-seen order. */
  wellsInUse: string[];
  /** Highest position index. 1 when no file has a position tag. */
  maxPosition: number;
  /** Highest Z-step. 0 when no file has a Z tag. */
  maxZ: number;
  /** Highest timepoint. 1 when no file has a timepoint tag. */
  maxTimepoint: number;
  /** Highest channel index. 1 when no file has a channel index. */
  maxChannel: number;
  /** Number of names that parsed. */
  fileCount: number;
  /** Names that could not be parsed; they contribute nothing. */
  issues: FileNameIssue[];
  /** Parsed names that carry tokens matching no tag. */
  warnings: FileNameIssue[];
}

/** One (well, position) pair: the unit joined into a single stack. */
export interface Group extends GroupKey {
  /** Display name, e.g. "B2 SP1". */
  name: string;
  firstFileName: string;
  importPattern: string;
}

export interface GroupOptions {
  /** Number of channels the import pattern spans. */
  channelCount: number;
}

export function groupName(key: GroupKey): string {
  return `${key.well} SP${key.position}`;
}

/**
 * Scan normalized file names once.
 *
 * Wells are kept as an ordered set, so a well that reappears later in a
 * listing that is not sorted by well is still counted once.
 */
export function buildCoordinateSpace(
  names: readonly string[],
  vocabulary: readonly string[] = [],
): CoordinateSpace {
  const wells = new Set<string>();
  const space: CoordinateSpace = {
    wellsInUse: [],
    maxPosition: 1,
    maxZ: 0,
    maxTimepoint: 1,
    maxChannel: 1,
    fileCount: 0,
    issues: [],
    warnings: [],
  };

  for (const name of names) {
    const result = parseFileName(name, vocabulary);
    if (!result.ok) {
      space.issues.push(result.issue);
      continue;
    }
    const parsed = result.value;
    space.fileCount++;
    wells.add(parsed.well);

    if (parsed.position !== undefined) {
      space.maxPosition = Math.max(space.maxPosition, parsed.position);
    }
    if (parsed.channelIndex !== undefined) {
      space.maxChannel = Math.max(space.maxChannel, parsed.channelIndex);
    }
    space.maxZ = Math.max(space.maxZ, parsed.zStep);
    space.maxTimepoint = Math.max(space.maxTimepoint, parsed.timepoint);

    if (parsed.unknownTokens.length > 0) {
      space.warnings.push({
        fileName: name,
        reason: `unrecognized token(s) ${parsed.unknownTokens.map((t) => `"${t}"`).join(", ")}`,
      });
    }
  }

  space.wellsInUse = [...wells];
  return space;
}

/**
 * Enumerate every group of the coordinate space.
 *
 * Groups come out nested by well then position, one per pair, whether
 * or not every plane of the pair exists. The read step of a well is
 * taken from the first file that starts with that well.
 */
export function buildGroups(
  space: CoordinateSpace,
  names: readonly string[],
  options: GroupOptions,
): Group[] {
  const groups: Group[] = [];
  const emitted = new Set<string>();

  for (const well of space.wellsInUse) {
    const readStep = firstReadStep(names, well);
    if (readStep === undefined) continue;

    for (let position = 1; position <= space.maxPosition; position++) {
      const key: GroupKey = { well, readStep, position };
      const firstFileName = formatFirstFileName(key);
      if (emitted.has(firstFileName)) continue;
      emitted.add(firstFileName);

      groups.push({
        ...key,
        name: groupName(key),
        firstFileName,
        importPattern: formatImportPattern(key, {
          maxZ: space.maxZ,
          channelCount: options.channelCount,
          maxTimepoint: space.maxTimepoint,
        }),
      });
    }
  }

  return groups;
}

function firstReadStep(names: readonly string[], well: string): string | undefined {
  for (const name of names) {
    if (!name.startsWith(well + SEPARATOR)) continue;
    const result = parseFileName(name);
    if (result.ok) return result.value.readStep;
  }
  return undefined;
}
