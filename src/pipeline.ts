// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * The batch run: normalize, group, organize, assemble, clean up.
 *
 * Every phase runs to completion before the next starts, and every file
 * operation is awaited in turn. Nothing else may touch the input
 * directory while a run is in progress.
 */

import { join } from "node:path";

import { resolveChannelVocabulary } from "./channels.js";
import { eraseRawData } from "./cleanup.js";
import type { PipelineConfig } from "./config.js";
import {
  buildCoordinateSpace,
  buildGroups,
  type CoordinateSpace,
  type Group,
} from "./coordinates.js";
import { errorMessage, StackAssemblyError } from "./errors.js";
import { isTiffFileName, type FileNameIssue } from "./filename.js";
import { listFiles } from "./fs-ops.js";
import { silentLogger, type Logger } from "./logger.js";
import { applyRenamePlan, planNormalization } from "./normalize.js";
import { organizeByWell } from "./organize.js";
import { jointFileName } from "./pattern.js";
import { plateLayout, wellLabels } from "./plate.js";
import type { ProgressCallback } from "./progress.js";
import { TiffStackAssembler, type StackAssembler } from "./stack-assembler.js";

/** Per-well normalized raw files, under the input directory. */
export const RAW_DATA_DIR = "RAW_DATA";

/** Per-well joined stacks, under the input directory. */
export const JOINT_DIR = "Joint_TIFs";

export interface PipelineDependencies {
  /** Default: a TiffStackAssembler configured from the run config. */
  assembler?: StackAssembler;
  logger?: Logger;
  onProgress?: ProgressCallback;
}

export interface GroupFailure {
  group: string;
  error: string;
}

export interface PipelineSummary {
  /** Expanded channel vocabulary. */
  channels: string[];
  channelCount: number;
  space: CoordinateSpace;
  /** Files whose names could not be used; left in the input directory. */
  skipped: FileNameIssue[];
  renamed: number;
  groups: Group[];
  /** Paths of the joined stacks written. */
  assembled: string[];
  failed: GroupFailure[];
  erased: boolean;
}

export function jointOutputPath(inputDir: string, group: Group): string {
  return join(inputDir, JOINT_DIR, group.well, jointFileName(group.firstFileName));
}

/**
 * Run the whole batch over `config.inputDir`.
 *
 * @throws {ConfigError} On an invalid channel selection.
 * @throws {NormalizationConflictError} When renaming would overwrite a file.
 * @throws {FileOperationError} On any failed rename, move, write or delete.
 * @throws {StackAssemblyError} When a group fails and the policy is "abort".
 */
export async function runPipeline(
  config: PipelineConfig,
  deps: PipelineDependencies = {},
): Promise<PipelineSummary> {
  const logger = deps.logger ?? silentLogger;
  const { inputDir } = config;
  const vocabulary = resolveChannelVocabulary(config.channels);

  const files = (await listFiles(inputDir)).filter(isTiffFileName);
  logger.info(`Found ${files.length} image files`, { inputDir });

  const plan = planNormalization(files, vocabulary);
  for (const issue of plan.issues) {
    logger.warn(`Skipping ${issue.fileName}: ${issue.reason}`);
  }
  if (!plan.channelNamesEmbedded) {
    logger.info("No channel names found in file names; leaving channels as they are");
  }
  await applyRenamePlan(inputDir, plan.renames, (step) =>
    logger.debug("Renamed", { from: step.from, to: step.to }),
  );

  const space = buildCoordinateSpace(plan.names);
  for (const warning of space.warnings) {
    logger.warn(`${warning.fileName}: ${warning.reason}`);
  }
  const channelCount = Math.max(vocabulary.length, space.maxChannel);

  const plateWells = new Set(wellLabels(plateLayout(config.plateSize)));
  const offPlate = space.wellsInUse.filter((well) => !plateWells.has(well));
  if (offPlate.length > 0) {
    logger.warn(`Wells not on a ${config.plateSize}-well plate`, { wells: offPlate.join(",") });
  }

  logger.info(`Wells: ${space.wellsInUse.length}`, { wells: space.wellsInUse.join(",") });
  logger.info(`Positions: ${space.maxPosition}`);
  logger.info(`Z-steps: ${space.maxZ + 1}`);
  logger.info(`Timepoints: ${space.maxTimepoint}`);
  logger.info(`Channels: ${channelCount}`, { names: vocabulary.join(",") });

  const rawRoot = join(inputDir, RAW_DATA_DIR);
  await organizeByWell(inputDir, rawRoot, plan.names, space.wellsInUse);

  const groups = buildGroups(space, plan.names, { channelCount });
  const assembler =
    deps.assembler ??
    new TiffStackAssembler({
      compression: config.compression,
      compressionLevel: config.compressionLevel,
      tileSize: config.tileSize,
      channelNames: vocabulary,
      logger,
    });

  const summary: PipelineSummary = {
    channels: vocabulary,
    channelCount,
    space,
    skipped: plan.issues,
    renamed: plan.renames.length,
    groups,
    assembled: [],
    failed: [],
    erased: false,
  };

  for (const [index, group] of groups.entries()) {
    const outputPath = jointOutputPath(inputDir, group);
    logger.info(`Assembling ${group.name}`, { file: group.firstFileName });

    let ok = true;
    try {
      await assembler.assemble({ group, sourceDir: join(rawRoot, group.well), outputPath });
      summary.assembled.push(outputPath);
    } catch (error) {
      if (!(error instanceof StackAssemblyError)) throw error;
      ok = false;
      summary.failed.push({ group: group.name, error: errorMessage(error) });
      logger.error(errorMessage(error), { group: group.name });
      if (config.onAssemblyFailure === "abort") {
        logger.error(`Aborting after ${summary.assembled.length} of ${groups.length} groups`);
        throw error;
      }
    }
    deps.onProgress?.({ completed: index + 1, total: groups.length, group, ok });
  }

  if (config.eraseRawData) {
    if (summary.failed.length > 0) {
      logger.warn(`Keeping ${RAW_DATA_DIR}: ${summary.failed.length} group(s) failed`);
    } else {
      const removed = await eraseRawData(rawRoot);
      summary.erased = true;
      logger.info(`Erased ${RAW_DATA_DIR}`, { files: removed.files, wells: removed.directories });
    }
  }

  return summary;
}

/** The closing message of a run; its wording depends on whether raw data was erased. */
export function completionMessage(summary: PipelineSummary): string {
  const joined = `${summary.assembled.length} of ${summary.groups.length} joined stacks written to ${JOINT_DIR}`;
  const failed =
    summary.failed.length > 0 ? ` ${summary.failed.length} group(s) failed.` : "";
  if (summary.erased) {
    return `Done: ${joined}. Raw data erased.${failed}`;
  }
  return `Done: ${joined}. Renamed raw files are kept in ${RAW_DATA_DIR}.${failed}`;
}
