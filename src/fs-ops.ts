// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Filesystem calls used by the pipeline. Every failure is rethrown as a
 * FileOperationError carrying the operation and the paths involved.
 */

import { access, mkdir, readFile, readdir, rename, rm, rmdir, writeFile } from "node:fs/promises";

import { FileOperationError } from "./errors.js";

/** Regular files directly inside `dir`, sorted by name. */
export async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    throw new FileOperationError("list", dir, error);
  }
}

/** Subdirectories directly inside `dir`, sorted by name. */
export async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    throw new FileOperationError("list", dir, error);
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (error) {
    throw new FileOperationError("mkdir", path, error);
  }
}

export async function renameFile(
  from: string,
  to: string,
  operation: "rename" | "move" = "rename",
): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    throw new FileOperationError(operation, from, error, to);
  }
}

export async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new FileOperationError("read", path, error);
  }
}

export async function writeBytes(path: string, data: Uint8Array): Promise<void> {
  try {
    await writeFile(path, data);
  } catch (error) {
    throw new FileOperationError("write", path, error);
  }
}

export async function removeFile(path: string): Promise<void> {
  try {
    await rm(path);
  } catch (error) {
    throw new FileOperationError("delete", path, error);
  }
}

/** Remove an empty directory. */
export async function removeEmptyDir(path: string): Promise<void> {
  try {
    await rmdir(path);
  } catch (error) {
    throw new FileOperationError("delete", path, error);
  }
}
