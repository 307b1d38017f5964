// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, it, expect } from "vitest";
import {
  classifyToken,
  extractIndex,
  isTiffFileName,
  padTimepoint,
  parseFileName,
  splitExtension,
  type ParsedFileName,
} from "../src/filename.js";

function parsed(fileName: string, vocabulary: string[] = []): ParsedFileName {
  const result = parseFileName(fileName, vocabulary);
  if (!result.ok) throw new Error(`expected ${fileName} to parse: ${result.issue.reason}`);
  return result.value;
}

function reason(fileName: string): string {
  const result = parseFileName(fileName);
  if (result.ok) throw new Error(`expected ${fileName} to be rejected`);
  return result.issue.reason;
}

describe("parseFileName", () => {
  it("reads a normalized name", () => {
    const name = parsed("B2_02_SP1_Z0_C1_T001.tif");

    expect(name.well).toBe("B2");
    expect(name.readStep).toBe("02");
    expect(name.position).toBe(1);
    expect(name.zStep).toBe(0);
    expect(name.channelIndex).toBe(1);
    expect(name.timepoint).toBe(1);
    expect(name.baseName).toBe("B2_02_SP1_Z0_C1_T001");
    expect(name.extension).toBe(".tif");
    expect(name.unknownTokens).toEqual([]);
  });

  it("splits position and Z concatenated to the read step", () => {
    const name = parsed("B2_02SP10Z3_C2_GFP_T012.tif", ["GFP"]);

    expect(name.tokens.map((t) => t.kind)).toEqual([
      "position-z",
      "channel-index",
      "channel-name",
      "timepoint",
    ]);
    expect(name.position).toBe(10);
    expect(name.zStep).toBe(3);
    expect(name.channelIndex).toBe(2);
    expect(name.channelName).toBe("GFP");
    expect(name.timepoint).toBe(12);
  });

  it("finds tags by their prefix, not their position", () => {
    const name = parsed("D11_04_T005_C2_SP3.tif");

    expect(name.position).toBe(3);
    expect(name.channelIndex).toBe(2);
    expect(name.timepoint).toBe(5);
  });

  it("defaults Z to 0 and the timepoint to 1", () => {
    const name = parsed("C3_01_SP2_C1.tif");

    expect(name.zStep).toBe(0);
    expect(name.timepoint).toBe(1);
  });

  it("recognises channel names containing spaces", () => {
    expect(parsed("B2_02_SP1_C1_Bright Field_T001.tif", ["Bright Field"]).channelName).toBe(
      "Bright Field",
    );
  });

  it("collects tokens that match nothing", () => {
    const name = parsed("B2_02_SP1_Z0_C1_Mystery_T001.tif");

    expect(name.unknownTokens).toEqual(["Mystery"]);
    expect(name.channelName).toBeUndefined();
  });

  it("rejects names without a well label", () => {
    expect(reason("plate_02_SP1.tif")).toBe('no well label in "plate"');
    expect(reason("b2_02_SP1.tif")).toBe('no well label in "b2"');
  });

  it("rejects names without a two-digit read step", () => {
    expect(reason("B2_X2_SP1.tif")).toBe("no two-digit read step after well B2");
    expect(reason("B2.tif")).toBe("no two-digit read step after well B2");
  });

  it("rejects a tag given twice", () => {
    expect(reason("B2_02_SP1_T001_T002.tif")).toBe("more than one timepoint tag");
    expect(reason("B2_02SP1Z2_Z3_C1.tif")).toBe("more than one Z tag");
  });
});

describe("classifyToken", () => {
  it("needs digits after a tag", () => {
    expect(classifyToken("Z").kind).toBe("unknown");
    expect(classifyToken("SP").kind).toBe("unknown");
  });

  it("prefers tags over channel names", () => {
    expect(classifyToken("C1", ["C1"]).kind).toBe("channel-index");
  });
});

describe("extractIndex", () => {
  it("parses the digits after the tag", () => {
    expect(extractIndex("SP3", "SP")).toBe(3);
    expect(extractIndex("SP10", "SP")).toBe(10);
    expect(extractIndex("T012", "T")).toBe(12);
    expect(extractIndex("Z0", "Z")).toBe(0);
  });
});

describe("file name helpers", () => {
  it("accepts .tif and .tiff in any case", () => {
    expect(isTiffFileName("a.tif")).toBe(true);
    expect(isTiffFileName("a.TIFF")).toBe(true);
    expect(isTiffFileName("notes.txt")).toBe(false);
  });

  it("splits the extension", () => {
    expect(splitExtension("x_1.tiff")).toEqual({ baseName: "x_1", extension: ".tiff" });
    expect(splitExtension("x_1")).toEqual({ baseName: "x_1", extension: "" });
  });

  it("pads timepoints to three digits", () => {
    expect(padTimepoint(7)).toBe("007");
    expect(padTimepoint(1000)).toBe("1000");
  });
});
