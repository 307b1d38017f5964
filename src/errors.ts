// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Error types raised by the pipeline.
 *
 * Filename validation problems are not errors: they are returned as
 * {@link FileNameIssue} values and reported as warnings.
 */

/** Invalid configuration or channel selection. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type FileOperation =
  | "list"
  | "rename"
  | "move"
  | "mkdir"
  | "read"
  | "write"
  | "delete";

/** A filesystem call failed. The run cannot continue from a known state. */
export class FileOperationError extends Error {
  readonly operation: FileOperation;
  readonly path: string;
  readonly target?: string;

  constructor(
    operation: FileOperation,
    path: string,
    cause: unknown,
    target?: string,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const where = target ? `${path} -> ${target}` : path;
    super(`${operation} failed for ${where}: ${detail}`, { cause });
    this.name = "FileOperationError";
    this.operation = operation;
    this.path = path;
    this.target = target;
  }
}

/** Two files would be renamed onto the same name. */
export class NormalizationConflictError extends Error {
  readonly target: string;
  readonly sources: string[];

  constructor(target: string, sources: string[]) {
    super(
      `Renaming would overwrite "${target}" (from ${sources.map((s) => `"${s}"`).join(", ")})`,
    );
    this.name = "NormalizationConflictError";
    this.target = target;
    this.sources = sources;
  }
}

/** The planes of one group could not be joined into a stack. */
export class StackAssemblyError extends Error {
  readonly groupName: string;

  constructor(groupName: string, message: string, options?: { cause?: unknown }) {
    super(`Group ${groupName}: ${message}`, options);
    this.name = "StackAssemblyError";
    this.groupName = groupName;
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
