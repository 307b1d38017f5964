// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { join } from "node:path";

import {
  listDirectories,
  listFiles,
  removeEmptyDir,
  removeFile,
} from "./fs-ops.js";

export interface CleanupResult {
  directories: number;
  files: number;
}

/**
 * Delete the raw per-well data: the files of every well subdirectory,
 * then the subdirectories, then the root itself. Irreversible.
 *
 * @throws {FileOperationError} On the first file or directory that
 *   cannot be removed.
 */
export async function eraseRawData(rawRoot: string): Promise<CleanupResult> {
  const result: CleanupResult = { directories: 0, files: 0 };

  for (const dir of await listDirectories(rawRoot)) {
    const wellDir = join(rawRoot, dir);
    for (const file of await listFiles(wellDir)) {
      await removeFile(join(wellDir, file));
      result.files++;
    }
    await removeEmptyDir(wellDir);
    result.directories++;
  }

  for (const file of await listFiles(rawRoot)) {
    await removeFile(join(rawRoot, file));
    result.files++;
  }
  await removeEmptyDir(rawRoot);

  return result;
}
