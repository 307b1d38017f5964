// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * wellstack
 *
 * Rename plate-imager TIFF sequences, sort them per well, and join each
 * (well, position) into one multi-dimensional OME-TIFF.
 *
 * @example
 * ```ts
 * import { resolveConfig, runPipeline, createLogger } from "wellstack";
 *
 * const config = resolveConfig("/data/plate-7", { channels: ["GFP", "DAPI"] });
 * const summary = await runPipeline(config, { logger: createLogger() });
 * ```
 */

export { runPipeline, completionMessage, jointOutputPath, RAW_DATA_DIR, JOINT_DIR } from "./pipeline.js";
export type { PipelineDependencies, PipelineSummary, GroupFailure } from "./pipeline.js";

export {
  resolveConfig,
  parseConfigOverrides,
  loadConfigFile,
  findConfigFile,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
} from "./config.js";
export type { PipelineConfig, ConfigOverrides, FailurePolicy } from "./config.js";

export {
  parseFileName,
  classifyToken,
  extractIndex,
  isTiffFileName,
  splitExtension,
  padTimepoint,
  SEPARATOR,
  TIFF_EXTENSION,
} from "./filename.js";
export type { ParsedFileName, FileNameToken, FileNameIssue, ParseResult } from "./filename.js";

export { planNormalization, normalizeFileName, applyRenamePlan } from "./normalize.js";
export type { NormalizationPlan, RenameStep } from "./normalize.js";

export { buildCoordinateSpace, buildGroups, groupName } from "./coordinates.js";
export type { CoordinateSpace, Group, GroupOptions } from "./coordinates.js";

export {
  formatFirstFileName,
  formatImportPattern,
  expandImportPattern,
  jointFileName,
  JOINT_SUFFIX,
} from "./pattern.js";
export type { GroupKey, PatternExtent, PatternPlane } from "./pattern.js";

export {
  KNOWN_CHANNELS,
  COLOUR_BRIGHT_FIELD,
  expandChannelVocabulary,
  validateChannelVocabulary,
  resolveChannelVocabulary,
} from "./channels.js";

export { plateLayout, rowLabels, columnLabels, wellLabels, isPlateSize, PLATE_SIZES } from "./plate.js";
export type { PlateLayout, PlateSize } from "./plate.js";

export { organizeByWell } from "./organize.js";
export { eraseRawData, type CleanupResult } from "./cleanup.js";
export { createProgressBar, renderProgressBar, progressCheckpoints } from "./progress.js";
export type { ProgressCallback, ProgressEvent } from "./progress.js";

export { TiffStackAssembler } from "./stack-assembler.js";
export type {
  StackAssembler,
  AssemblyRequest,
  AssemblyResult,
  TiffStackAssemblerOptions,
} from "./stack-assembler.js";

export { buildOmeXml, type StackDimensions, type DimensionOrder } from "./ome-xml-writer.js";
export { buildTiff, makeImageTags, slicePlane, compressDeflate, DEFAULT_TILE_SIZE } from "./tiff-writer.js";
export type { WritableIfd, TiffTag, BuildTiffOptions, TiffCompression } from "./tiff-writer.js";
export { tiffPixelType, omePixelType, bytesPerElement, type PixelType } from "./dtypes.js";

export {
  ConfigError,
  FileOperationError,
  NormalizationConflictError,
  StackAssemblyError,
} from "./errors.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger.js";
