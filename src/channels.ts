// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Channel vocabulary: the channel names the instrument embeds in file
 * names, and the expansion of the composite colour bright field channel.
 */

import { ConfigError } from "./errors.js";

/** Composite channel recorded as three separate colour planes. */
export const COLOUR_BRIGHT_FIELD = "Colour Bright Field";

export const COLOUR_BRIGHT_FIELD_PARTS: readonly string[] = ["Red", "Green", "Blue"];

/** Channel names offered by the instrument's acquisition software. */
export const KNOWN_CHANNELS: readonly string[] = [
  "Bright Field",
  COLOUR_BRIGHT_FIELD,
  "Phase Contrast",
  "DAPI",
  "GFP",
  "YFP",
  "RFP",
  "Texas Red",
  "CY5",
  "CY7",
];

/**
 * Replace the composite channel with its three colour planes, keeping
 * the position of every other entry.
 *
 * Must run once, before any file name is scanned: the composite name
 * never appears in file names itself.
 */
export function expandChannelVocabulary(selected: readonly string[]): string[] {
  return selected.flatMap((name) =>
    name === COLOUR_BRIGHT_FIELD ? [...COLOUR_BRIGHT_FIELD_PARTS] : [name],
  );
}

/**
 * Check that an expanded vocabulary can be matched against file name
 * tokens. Matching is by whole token, so "Red" and "Texas Red" coexist.
 *
 * @throws {ConfigError} On empty or underscore-containing names, or duplicates.
 */
export function validateChannelVocabulary(vocabulary: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of vocabulary) {
    if (name.trim() === "") {
      throw new ConfigError("Channel names must not be empty");
    }
    if (name.includes("_")) {
      throw new ConfigError(`Channel name "${name}" must not contain "_"`);
    }
    if (seen.has(name)) {
      throw new ConfigError(`Channel "${name}" is selected more than once`);
    }
    seen.add(name);
  }
}

/** Expand and validate a channel selection in one step. */
export function resolveChannelVocabulary(selected: readonly string[]): string[] {
  const expanded = expandChannelVocabulary(selected);
  validateChannelVocabulary(expanded);
  return expanded;
}
