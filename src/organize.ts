// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { join } from "node:path";

import { SEPARATOR } from "./filename.js";
import { ensureDir, renameFile } from "./fs-ops.js";

/**
 * Move files from `sourceDir` into one subdirectory per well under
 * `targetRoot`. A file belongs to a well when its name starts with the
 * well label followed by the separator.
 *
 * @returns The moved file names per well, in input order.
 * @throws {FileOperationError} When a directory cannot be created or a
 *   file cannot be moved.
 */
export async function organizeByWell(
  sourceDir: string,
  targetRoot: string,
  names: readonly string[],
  wells: readonly string[],
): Promise<Map<string, string[]>> {
  const byWell = new Map<string, string[]>();

  for (const well of wells) {
    const wellDir = join(targetRoot, well);
    await ensureDir(wellDir);

    const members = names.filter((name) => name.startsWith(well + SEPARATOR));
    for (const name of members) {
      await renameFile(join(sourceDir, name), join(wellDir, name), "move");
    }
    byWell.set(well, members);
  }

  return byWell;
}
