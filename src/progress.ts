// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import type { Group } from "./coordinates.js";

export interface ProgressEvent {
  /** Groups finished so far, failed ones included. */
  completed: number;
  total: number;
  group: Group;
  ok: boolean;
}

/** Called once after each group is processed. */
export type ProgressCallback = (event: ProgressEvent) => void;

const BAR_WIDTH = 20;

/**
 * Completed-group counts at which a bar is drawn: every group below 10,
 * every 10 % below 100, every 5 % above.
 */
export function progressCheckpoints(total: number): Set<number> {
  const checkpoints = new Set<number>();
  if (total <= 0) return checkpoints;

  const steps = total < 10 ? total : total < 100 ? 10 : 20;
  for (let i = 1; i <= steps; i++) {
    checkpoints.add(Math.ceil((i * total) / steps));
  }
  return checkpoints;
}

/** `[##########----------] 50% (5/10)` */
export function renderProgressBar(completed: number, total: number, width = BAR_WIDTH): string {
  const fraction = total > 0 ? Math.min(1, completed / total) : 1;
  const filled = Math.round(fraction * width);
  const percent = Math.round(fraction * 100);
  return `[${"#".repeat(filled)}${"-".repeat(width - filled)}] ${percent}% (${completed}/${total})`;
}

/** A progress callback that writes a bar at each checkpoint. */
export function createProgressBar(
  total: number,
  write: (line: string) => void,
): ProgressCallback {
  const checkpoints = progressCheckpoints(total);
  return ({ completed }) => {
    if (checkpoints.has(completed)) write(renderProgressBar(completed, total));
  };
}
