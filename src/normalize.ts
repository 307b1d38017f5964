// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Renaming normalizer.
 *
 * Brings every file name into the delimited form the rest of the pipeline
 * expects: position and Z-step in separate tokens, a position and a Z token
 * on every file, channel names replaced by their channel index, a timepoint
 * on every file.
 *
 * Planning is pure; {@link applyRenamePlan} performs the renames.
 */

import { join } from "node:path";

import { NormalizationConflictError } from "./errors.js";
import {
  parseFileName,
  SEPARATOR,
  TIFF_EXTENSION,
  type FileNameIssue,
  type FileNameToken,
  type ParsedFileName,
} from "./filename.js";
import { pathExists, renameFile } from "./fs-ops.js";

export interface RenameStep {
  from: string;
  to: string;
}

export interface NormalizationPlan {
  /** Renames to perform, in input order. Unchanged files are not listed. */
  renames: RenameStep[];
  /** Final name of every valid input file, in input order. */
  names: string[];
  /** Files skipped because their names cannot be parsed. */
  issues: FileNameIssue[];
  /** Whether any file carried a channel name from the vocabulary. */
  channelNamesEmbedded: boolean;
}

const hasKind = (tokens: FileNameToken[], ...kinds: FileNameToken["kind"][]) =>
  tokens.some((token) => kinds.includes(token.kind));

/**
 * Normalized name of a single parsed file.
 *
 * The order of existing tokens is kept. A file without a position token
 * was imaged at a single position and gets `SP1` right after the read
 * step. A missing Z token is inserted right after the position token,
 * which places it ahead of the channel marker.
 */
export function normalizeFileName(
  parsed: ParsedFileName,
  vocabulary: readonly string[],
): string {
  const { tokens } = parsed;
  const out = [parsed.well, parsed.readStep];
  const hasChannelIndex = hasKind(tokens, "channel-index");
  let zPlaced = hasKind(tokens, "z", "position-z");

  if (!hasKind(tokens, "position", "position-z")) {
    out.push("SP1");
    if (!zPlaced) {
      out.push("Z0");
      zPlaced = true;
    }
  }

  for (const token of tokens) {
    switch (token.kind) {
      case "position":
        out.push(token.text);
        if (!zPlaced) {
          out.push("Z0");
          zPlaced = true;
        }
        break;
      case "position-z": {
        const z = token.text.indexOf("Z");
        out.push(token.text.slice(0, z), token.text.slice(z));
        break;
      }
      case "channel-name":
        if (!hasChannelIndex) {
          out.push(`C${vocabulary.indexOf(token.channelName) + 1}`);
        }
        break;
      default:
        out.push(token.text);
    }
  }

  if (!hasKind(tokens, "timepoint")) {
    out.push("T001");
  }

  return out.join(SEPARATOR) + TIFF_EXTENSION;
}

/**
 * Plan the renames for a flat list of file names.
 *
 * @throws {NormalizationConflictError} When two files would end up with
 *   the same name.
 */
export function planNormalization(
  fileNames: readonly string[],
  vocabulary: readonly string[],
): NormalizationPlan {
  const renames: RenameStep[] = [];
  const names: string[] = [];
  const issues: FileNameIssue[] = [];
  const sourcesByTarget = new Map<string, string[]>();
  let channelNamesEmbedded = false;

  for (const fileName of fileNames) {
    const result = parseFileName(fileName, vocabulary);
    if (!result.ok) {
      issues.push(result.issue);
      continue;
    }
    if (result.value.channelName !== undefined) channelNamesEmbedded = true;

    const target = normalizeFileName(result.value, vocabulary);
    names.push(target);
    if (target !== fileName) renames.push({ from: fileName, to: target });

    const sources = sourcesByTarget.get(target) ?? [];
    sources.push(fileName);
    sourcesByTarget.set(target, sources);
  }

  for (const [target, sources] of sourcesByTarget) {
    if (sources.length > 1) throw new NormalizationConflictError(target, sources);
  }

  return { renames, names, issues, channelNamesEmbedded };
}

/**
 * Perform a rename plan inside `dir`, one file at a time.
 *
 * Not transactional: a failure leaves the files renamed so far in place.
 *
 * @throws {NormalizationConflictError} When a target name already exists.
 * @throws {FileOperationError} When a rename fails.
 */
export async function applyRenamePlan(
  dir: string,
  renames: readonly RenameStep[],
  onRename?: (step: RenameStep) => void,
): Promise<void> {
  for (const step of renames) {
    const target = join(dir, step.to);
    if (await pathExists(target)) {
      throw new NormalizationConflictError(step.to, [step.from]);
    }
    await renameFile(join(dir, step.from), target);
    onRename?.(step);
  }
}
