// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { expandChannelVocabulary } from "../src/channels.js";
import { NormalizationConflictError } from "../src/errors.js";
import { listFiles } from "../src/fs-ops.js";
import { applyRenamePlan, planNormalization } from "../src/normalize.js";
import { makeTempDir, removeTempDir, writeEmptyFiles } from "./fixtures.js";

describe("planNormalization", () => {
  it("replaces an embedded channel name and inserts Z0", () => {
    const plan = planNormalization(
      ["B2_02_SP1_C1_Bright Field_T001.tif", "B2_02_SP1_C1_Bright Field_T002.tif"],
      ["Bright Field"],
    );

    expect(plan.names).toEqual(["B2_02_SP1_Z0_C1_T001.tif", "B2_02_SP1_Z0_C1_T002.tif"]);
    expect(plan.renames).toEqual([
      { from: "B2_02_SP1_C1_Bright Field_T001.tif", to: "B2_02_SP1_Z0_C1_T001.tif" },
      { from: "B2_02_SP1_C1_Bright Field_T002.tif", to: "B2_02_SP1_Z0_C1_T002.tif" },
    ]);
    expect(plan.channelNamesEmbedded).toBe(true);
  });

  it("splits position and Z off the read step", () => {
    const plan = planNormalization(["B2_02SP10Z10_C1_GFP_T001.tif"], ["GFP"]);
    expect(plan.names).toEqual(["B2_02_SP10_Z10_C1_T001.tif"]);
  });

  it("numbers channels by their vocabulary position when no index is given", () => {
    const vocabulary = expandChannelVocabulary(["Colour Bright Field"]);
    const plan = planNormalization(
      ["C3_01_SP1_Red_T001.tif", "C3_01_SP1_Green_T001.tif", "C3_01_SP1_Blue_T001.tif"],
      vocabulary,
    );

    expect(plan.names).toEqual([
      "C3_01_SP1_Z0_C1_T001.tif",
      "C3_01_SP1_Z0_C2_T001.tif",
      "C3_01_SP1_Z0_C3_T001.tif",
    ]);
  });

  it("is idempotent", () => {
    const first = planNormalization(
      ["B2_02SP2Z1_C2_GFP_T004.tif", "B2_02_SP1_C1_GFP.tif"],
      ["GFP"],
    );
    const second = planNormalization(first.names, ["GFP"]);

    expect(second.renames).toEqual([]);
    expect(second.names).toEqual(first.names);
  });

  it("leaves names without a channel name alone", () => {
    const plan = planNormalization(["B2_02_SP1_Z0_C1_T001.tif"], ["GFP"]);

    expect(plan.renames).toEqual([]);
    expect(plan.channelNamesEmbedded).toBe(false);
  });

  it("fills in missing Z and timepoint tags per file", () => {
    const plan = planNormalization(
      ["C4_02_C1_T001.tif", "B2_02_SP1_Z2_C1.tif", "B2_02_SP2_C1_T001.tif", "B2_02_SP3_Z1_C1_T001.tif"],
      [],
    );

    expect(plan.names).toEqual([
      "C4_02_SP1_Z0_C1_T001.tif",
      "B2_02_SP1_Z2_C1_T001.tif",
      "B2_02_SP2_Z0_C1_T001.tif",
      "B2_02_SP3_Z1_C1_T001.tif",
    ]);
  });

  it("gives files without a position tag the first position", () => {
    const plan = planNormalization(
      ["B2_02_C1_Bright Field_T001.tif", "B2_02_Z3_C2_T001.tif", "B2_02_SP1_Z0_C1_T002.tif"],
      ["Bright Field"],
    );

    expect(plan.names).toEqual([
      "B2_02_SP1_Z0_C1_T001.tif",
      "B2_02_SP1_Z3_C2_T001.tif",
      "B2_02_SP1_Z0_C1_T002.tif",
    ]);
    expect(planNormalization(plan.names, ["Bright Field"]).renames).toEqual([]);
  });

  it("tells apart channel names that share a word", () => {
    const vocabulary = expandChannelVocabulary(["Colour Bright Field", "Texas Red"]);
    const plan = planNormalization(["D5_01_SP1_Red_T001.tif", "D5_01_SP1_Texas Red_T001.tif"], vocabulary);

    expect(plan.names).toEqual(["D5_01_SP1_Z0_C1_T001.tif", "D5_01_SP1_Z0_C4_T001.tif"]);
  });

  it("normalizes the extension", () => {
    const plan = planNormalization(["B2_02_SP1_Z0_C1_T001.TIFF"], []);
    expect(plan.renames).toEqual([
      { from: "B2_02_SP1_Z0_C1_T001.TIFF", to: "B2_02_SP1_Z0_C1_T001.tif" },
    ]);
  });

  it("reports names it cannot parse and skips them", () => {
    const plan = planNormalization(["notes_plate.tif", "B2_02_SP1_Z0_C1_T001.tif"], []);

    expect(plan.names).toEqual(["B2_02_SP1_Z0_C1_T001.tif"]);
    expect(plan.issues).toEqual([{ fileName: "notes_plate.tif", reason: 'no well label in "notes"' }]);
  });

  it("refuses to map two files onto one name", () => {
    expect(() =>
      planNormalization(["B2_02_SP1_C1_T001.tif", "B2_02_SP1_Z0_C1_T001.tif"], []),
    ).toThrow(NormalizationConflictError);
  });
});

describe("applyRenamePlan", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("renames the files on disk", async () => {
    const files = ["B2_02_SP1_C1_GFP_T001.tif", "B2_02_SP1_C1_GFP_T002.tif"];
    await writeEmptyFiles(dir, files);
    const plan = planNormalization(files, ["GFP"]);

    const seen: string[] = [];
    await applyRenamePlan(dir, plan.renames, (step) => seen.push(step.to));

    expect(await listFiles(dir)).toEqual(["B2_02_SP1_Z0_C1_T001.tif", "B2_02_SP1_Z0_C1_T002.tif"]);
    expect(seen).toEqual(["B2_02_SP1_Z0_C1_T001.tif", "B2_02_SP1_Z0_C1_T002.tif"]);
  });

  it("never overwrites an existing file", async () => {
    await writeEmptyFiles(dir, ["a.tif", "b.tif"]);

    await expect(applyRenamePlan(dir, [{ from: "a.tif", to: "b.tif" }])).rejects.toThrow(
      'Renaming would overwrite "b.tif" (from "a.tif")',
    );
    expect(await listFiles(dir)).toEqual(["a.tif", "b.tif"]);
  });
});
