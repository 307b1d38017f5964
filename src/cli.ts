// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { parseArgs } from "node:util";

import {
  findConfigFile,
  loadConfigFile,
  parseConfigOverrides,
  resolveConfig,
  type ConfigOverrides,
} from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { completionMessage, runPipeline } from "./pipeline.js";
import { createProgressBar, type ProgressCallback } from "./progress.js";

const USAGE = `Usage: wellstack <input-dir> [options]

Renames plate-imager TIFFs, sorts them into RAW_DATA/<well>/ and joins
each (well, position) into Joint_TIFs/<well>/<first-file>_jointTIF.tif.

Options:
  --config <file>          JSON config (default: <input-dir>/wellstack.config.json)
  --channel <name>         Channel name in the file names; repeat for each
  --plate <size>           Plate size: 1, 2, 6, 24, 96 or 384
  --erase                  Delete RAW_DATA once every group is joined
  --on-failure <policy>    abort | continue
  --compression <type>     none | deflate
  --compression-level <n>  Deflate level, 1 to 9
  --tile-size <pixels>     0 for strips, else a multiple of 16
  --log-level <level>      debug | info | warn | error
  -h, --help               Show this help`;

/** Map parsed flags onto config keys, dropping the ones not given. */
function flagOverrides(values: Record<string, string | boolean | string[] | undefined>): ConfigOverrides {
  return parseConfigOverrides(
    {
      channels: values.channel,
      plateSize: values.plate,
      eraseRawData: values.erase,
      onAssemblyFailure: values["on-failure"],
      compression: values.compression,
      compressionLevel: values["compression-level"],
      tileSize: values["tile-size"],
      logLevel: values["log-level"],
    },
    "command line",
  );
}

export interface CliOptions {
  /** Line sink for usage and log output. Default: stdout for usage, stderr for logs. */
  write?: (line: string) => void;
}

/**
 * Run the command line.
 *
 * @returns The exit code: 0 when every group was joined, 2 when some
 *   groups failed under the continue policy, 1 on usage or run errors.
 */
export async function main(argv: string[], options: CliOptions = {}): Promise<number> {
  const writeUsage = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  let logger = createLogger({ write: options.write });

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        config: { type: "string" },
        channel: { type: "string", multiple: true },
        plate: { type: "string" },
        erase: { type: "boolean" },
        "on-failure": { type: "string" },
        compression: { type: "string" },
        "compression-level": { type: "string" },
        "tile-size": { type: "string" },
        "log-level": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });

    const inputDir = positionals[0];
    if (values.help || inputDir === undefined) {
      writeUsage(USAGE);
      return values.help ? 0 : 1;
    }

    const configFile = await findConfigFile(inputDir, values.config);
    const fileLayer = configFile ? await loadConfigFile(configFile) : {};
    const config = resolveConfig(inputDir, fileLayer, flagOverrides(values));
    logger = createLogger({ level: config.logLevel, write: options.write });
    if (configFile) logger.debug("Loaded config", { file: configFile });

    let bar: ProgressCallback | undefined;
    const summary = await runPipeline(config, {
      logger,
      onProgress: (event) => {
        bar ??= createProgressBar(event.total, (line) => logger.info(line));
        bar(event);
      },
    });

    logger.info(completionMessage(summary));
    return summary.failed.length > 0 ? 2 : 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }
}
