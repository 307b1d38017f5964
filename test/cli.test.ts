// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { main } from "../src/cli.js";
import { CONFIG_FILE_NAME } from "../src/config.js";
import { listFiles, pathExists } from "../src/fs-ops.js";
import { makeTempDir, removeTempDir, writePlanes } from "./fixtures.js";

/** B2 has two positions, C3 only one, so the C3 SP2 group has no files. */
const oneMissingGroup = [
  "B2_02_SP1_Z0_C1_T001.tif",
  "B2_02_SP2_Z0_C1_T001.tif",
  "C3_02_SP1_Z0_C1_T001.tif",
];

describe("main", () => {
  let dir: string;
  let lines: string[];
  const run = (argv: string[]) => main(argv, { write: (line) => lines.push(line) });

  beforeEach(async () => {
    dir = await makeTempDir();
    lines = [];
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("prints the usage with --help", async () => {
    expect(await run(["--help"])).toBe(0);
    expect(lines[0]).toMatch(/^Usage: wellstack <input-dir> \[options\]/);
  });

  it("exits with 1 without an input directory", async () => {
    expect(await run([])).toBe(1);
    expect(lines[0]).toMatch(/^Usage: wellstack/);
  });

  it("maps flags onto the run", async () => {
    await writePlanes(dir, ["B2_02_SP1_GFP_T001.tif", "B2_02_SP1_GFP_T002.tif"]);

    expect(await run([dir, "--channel", "GFP", "--erase", "--compression", "none"])).toBe(0);

    expect(await listFiles(join(dir, "Joint_TIFs", "B2"))).toEqual(["B2_02_SP1_Z0_C1_T001.tif_jointTIF.tif"]);
    expect(await pathExists(join(dir, "RAW_DATA"))).toBe(false);
    expect(lines.at(-1)).toContain("Done: 1 of 1 joined stacks written to Joint_TIFs. Raw data erased.");
  });

  it("exits with 2 when groups fail under the continue policy", async () => {
    await writePlanes(dir, oneMissingGroup);

    expect(await run([dir, "--on-failure", "continue"])).toBe(2);

    expect(lines.at(-1)).toContain("Done: 3 of 4 joined stacks written to Joint_TIFs.");
    expect(lines.at(-1)).toContain("1 group(s) failed.");
    expect(await pathExists(join(dir, "RAW_DATA", "C3"))).toBe(true);
  });

  it("reads the config file and lets flags override it", async () => {
    await writePlanes(dir, oneMissingGroup);
    await writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify({ onAssemblyFailure: "continue" }));

    expect(await run([dir, "--on-failure", "abort"])).toBe(1);
    expect(lines.at(-1)).toContain("Group C3 SP2: no file matching C3_02_SP2_Z<0-0>_C<1-1>_T<001-001>.tif");
  });

  it("exits with 2 on the config file's policy alone", async () => {
    await writePlanes(dir, oneMissingGroup);
    await writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify({ onAssemblyFailure: "continue" }));

    expect(await run([dir])).toBe(2);
  });

  it("exits with 1 on a bad setting", async () => {
    expect(await run([dir, "--plate", "48"])).toBe(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("command line: plateSize: must be one of 1, 2, 6, 24, 96, 384");
  });

  it("exits with 1 on an unknown flag", async () => {
    expect(await run([dir, "--colour"])).toBe(1);
    expect(lines[0]).toContain("--colour");
  });
});
