import { beforeEach, describe, expect, test } from "vitest";
import { VimCommandError } from "./vim-errors";
import {
  createGlobalSettings,
  createLocalSettings,
  findOptionDefinition,
  getSetting,
  getToggleSetting,
  invertSetting,
  listModifiedSettings,
  OPTION_DEFINITIONS,
  resetSetting,
  runSetArguments,
  setSetting,
  splitSetArguments,
  toggleOffSetting,
  toggleOnSetting,
  type GlobalSettings,
  type LocalSettings,
} from "./vim-settings";

describe("settings store", () => {
  let global: GlobalSettings;
  let local: LocalSettings;

  beforeEach(() => {
    global = createGlobalSettings();
    local = createLocalSettings(global);
  });

  test("resolves names and abbreviations", () => {
    expect(findOptionDefinition("ts")?.name).toBe("tabstop");
    expect(findOptionDefinition("et")?.name).toBe("expandtab");
    expect(findOptionDefinition("nrformats")?.name).toBe("nrformats");
    expect(findOptionDefinition("bogus")).toBeUndefined();
  });

  test("local stores forward global options", () => {
    setSetting(local, "ic", true);
    expect(getSetting(global, "ignorecase")).toBe(true);
    expect(global.values.get("ignorecase")).toBe(true);
    expect(local.values.has("ignorecase")).toBe(false);
  });

  test("global stores reject local options", () => {
    expect(() => getSetting(global, "tabstop")).toThrow(
      "E518: Unknown option: tabstop"
    );
  });

  test("wrong kind is an error", () => {
    expect(() => setSetting(local, "ts", "wide")).toThrow(VimCommandError);
    expect(() => toggleOnSetting(local, "ts")).toThrow(
      "E474: Invalid argument: tabstop"
    );
  });

  test("invert is an involution for every toggle", () => {
    for (const def of OPTION_DEFINITIONS) {
      if (def.kind !== "toggle") continue;
      const before = getToggleSetting(local, def.name);
      invertSetting(local, def.name);
      expect(getToggleSetting(local, def.name)).toBe(!before);
      invertSetting(local, def.name);
      expect(getToggleSetting(local, def.name)).toBe(before);
    }
  });

  test("toggle on, off and reset", () => {
    toggleOnSetting(local, "list");
    expect(getSetting(local, "list")).toBe(true);
    toggleOffSetting(local, "list");
    expect(getSetting(local, "list")).toBe(false);
    setSetting(local, "sw", 2);
    resetSetting(local, "sw");
    expect(getSetting(local, "shiftwidth")).toBe(8);
  });

  test("modified listing follows definition order", () => {
    setSetting(local, "ts", 4);
    setSetting(local, "et", true);
    setSetting(local, "hls", true);
    expect(listModifiedSettings(local)).toEqual([
      "hlsearch",
      "expandtab",
      "tabstop=4",
    ]);
    expect(listModifiedSettings(global)).toEqual(["hlsearch"]);
  });
});

describe("runSetArguments", () => {
  let local: LocalSettings;

  beforeEach(() => {
    local = createLocalSettings(createGlobalSettings());
  });

  test("no arguments lists modified options", () => {
    setSetting(local, "expandtab", true);
    expect(runSetArguments(local, "")).toEqual(["expandtab"]);
  });

  test("assigns numbers and strings", () => {
    runSetArguments(local, "ts=42 sections=cat nf:alpha");
    expect(getSetting(local, "tabstop")).toBe(42);
    expect(getSetting(local, "sections")).toBe("cat");
    expect(getSetting(local, "nrformats")).toBe("alpha");
  });

  test("no, inv and bang prefixes", () => {
    runSetArguments(local, "et");
    expect(getSetting(local, "et")).toBe(true);
    runSetArguments(local, "noet");
    expect(getSetting(local, "et")).toBe(false);
    runSetArguments(local, "et!");
    expect(getSetting(local, "et")).toBe(true);
    runSetArguments(local, "invet");
    expect(getSetting(local, "et")).toBe(false);
  });

  test("queries print name and value", () => {
    expect(runSetArguments(local, "ts sw? et?")).toEqual([
      "tabstop=8",
      "shiftwidth=8",
      "noexpandtab",
    ]);
  });

  test("operators on numbers and comma lists", () => {
    runSetArguments(local, "sw+=2 ts-=3 report^=5");
    expect(getSetting(local, "sw")).toBe(10);
    expect(getSetting(local, "ts")).toBe(5);
    expect(getSetting(local, "report")).toBe(10);

    runSetArguments(local, "nf+=alpha");
    expect(getSetting(local, "nf")).toBe("octal,hex,alpha");
    runSetArguments(local, "nf-=octal");
    expect(getSetting(local, "nf")).toBe("hex,alpha");
    runSetArguments(local, "nf^=bin");
    expect(getSetting(local, "nf")).toBe("bin,hex,alpha");
  });

  test("& resets one option and all& resets every option", () => {
    runSetArguments(local, "ts=3 sw=3");
    runSetArguments(local, "ts&");
    expect(getSetting(local, "ts")).toBe(8);
    runSetArguments(local, "all&");
    expect(getSetting(local, "sw")).toBe(8);
  });

  test("a failing argument leaves every option untouched", () => {
    expect(() => runSetArguments(local, "ts=4 bogus")).toThrow(
      "E518: Unknown option: bogus"
    );
    expect(getSetting(local, "ts")).toBe(8);
  });

  test("number options need a number", () => {
    expect(() => runSetArguments(local, "ts=wide")).toThrow(
      "E521: Number required after =: ts=wide"
    );
  });

  test("toggles take no value", () => {
    expect(() => runSetArguments(local, "et=1")).toThrow(
      "E474: Invalid argument: et=1"
    );
  });

  test("escaped spaces stay in the value", () => {
    expect(splitSetArguments("sections=a\\ b ts=2")).toEqual([
      "sections=a b",
      "ts=2",
    ]);
  });
});
