// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Run configuration. Layers, later wins: defaults, a JSON config file,
 * command-line flags.
 */

import { join } from "node:path";

import { z } from "zod";

import { resolveChannelVocabulary } from "./channels.js";
import { ConfigError, errorMessage } from "./errors.js";
import { pathExists, readBytes } from "./fs-ops.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { isPlateSize, PLATE_SIZES, type PlateSize } from "./plate.js";
import type { TiffCompression } from "./tiff-writer.js";

/** What to do when one group cannot be joined. */
export type FailurePolicy = "abort" | "continue";

export interface PipelineConfig {
  /** Directory holding the instrument's flat file list. */
  inputDir: string;
  /** Selected channel vocabulary entries, before expansion. */
  channels: string[];
  /** Only used to flag wells that do not exist on the plate. */
  plateSize: PlateSize;
  /** Delete RAW_DATA after every group was joined. */
  eraseRawData: boolean;
  onAssemblyFailure: FailurePolicy;
  compression: TiffCompression;
  /** Deflate level, 1 (fastest) to 9 (smallest). */
  compressionLevel: number;
  tileSize: number;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<PipelineConfig, "inputDir">>;

export const CONFIG_FILE_NAME = "wellstack.config.json";

export const DEFAULT_CONFIG: Omit<PipelineConfig, "inputDir"> = {
  channels: ["Bright Field"],
  plateSize: 96,
  eraseRawData: false,
  onAssemblyFailure: "abort",
  compression: "deflate",
  compressionLevel: 6,
  tileSize: 256,
  logLevel: "info",
};

const PLATE_SIZE_MESSAGE = `must be one of ${PLATE_SIZES.join(", ")}`;
const TILE_SIZE_MESSAGE = "must be 0 or a positive multiple of 16";

/** Settings a config file or the command line may give. Numbers may arrive as strings. */
const configOverridesSchema = z
  .object({
    channels: z.array(z.string()),
    plateSize: z.coerce.number().refine(isPlateSize, { message: PLATE_SIZE_MESSAGE }),
    eraseRawData: z.boolean(),
    onAssemblyFailure: z.enum(["abort", "continue"]),
    compression: z.enum(["none", "deflate"]),
    compressionLevel: z.coerce.number().int().min(1).max(9),
    tileSize: z.coerce
      .number()
      .int({ message: TILE_SIZE_MESSAGE })
      .min(0, { message: TILE_SIZE_MESSAGE })
      .multipleOf(16, { message: TILE_SIZE_MESSAGE }),
    logLevel: z.enum(LOG_LEVELS),
  })
  .partial()
  .strict();

/** Flags that were not given arrive as undefined; they must not override anything. */
function dropUndefined(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));
}

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
    .join(", ");
}

/**
 * Validate untyped settings (a parsed config file, or flags) into overrides.
 *
 * @param source - Where the values came from, for error messages.
 * @throws {ConfigError} On unknown keys or values of the wrong shape.
 */
export function parseConfigOverrides(raw: unknown, source: string): ConfigOverrides {
  const result = configOverridesSchema.safeParse(dropUndefined(raw));
  if (!result.success) {
    throw new ConfigError(`${source}: ${describeIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Read a JSON config file.
 *
 * @throws {ConfigError} When the file is not valid JSON or has bad settings.
 * @throws {FileOperationError} When the file cannot be read.
 */
export async function loadConfigFile(path: string): Promise<ConfigOverrides> {
  const text = new TextDecoder().decode(await readBytes(path));
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfigOverrides(raw, path);
}

/** The config file to read: the explicit one, else the input directory's. */
export async function findConfigFile(
  inputDir: string,
  explicit?: string,
): Promise<string | undefined> {
  if (explicit) return explicit;
  const candidate = join(inputDir, CONFIG_FILE_NAME);
  return (await pathExists(candidate)) ? candidate : undefined;
}

/**
 * Merge override layers over the defaults and check the channel selection.
 *
 * @throws {ConfigError} On an empty input directory or an invalid
 *   channel selection.
 */
export function resolveConfig(inputDir: string, ...layers: ConfigOverrides[]): PipelineConfig {
  if (inputDir.trim() === "") {
    throw new ConfigError("An input directory is required");
  }
  const config: PipelineConfig = { ...DEFAULT_CONFIG, inputDir };
  for (const layer of layers) {
    Object.assign(config, layer);
  }
  resolveChannelVocabulary(config.channels);
  return config;
}
