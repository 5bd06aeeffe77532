import { beforeEach, describe, expect, test } from "vitest";
import {
  ALL_KEY_REMAP_MODES,
  clearAllKeyMappings,
  clearKeyMappings,
  createKeyMap,
  formatKeyMappings,
  getKeyMappingsForMode,
  getMapClearCommandModes,
  getMapCommandModes,
  mapWithNoRemap,
  mapWithRemap,
  unmapKeys,
  type KeyMapTable,
  type KeyRemapMode,
  type MapCommandPrefix,
} from "./vim-key-map";

describe("key map table", () => {
  let table: KeyMapTable;

  beforeEach(() => {
    table = createKeyMap();
  });

  test("stores both sides canonicalized", () => {
    expect(mapWithNoRemap(table, "<c-[>", "<S-a>", "normal")).toBe(true);
    expect(getKeyMappingsForMode(table, "normal")).toEqual([
      { lhs: "<Esc>", rhs: "A", allowRemap: false },
    ]);
  });

  test("last definition in a mode wins", () => {
    mapWithNoRemap(table, "a", "b", "normal");
    mapWithRemap(table, "a", "c", "normal");
    expect(getKeyMappingsForMode(table, "normal")).toEqual([
      { lhs: "a", rhs: "c", allowRemap: true },
    ]);
  });

  test("modes are independent", () => {
    mapWithNoRemap(table, "a", "b", "normal");
    mapWithNoRemap(table, "a", "c", "insert");
    expect(getKeyMappingsForMode(table, "normal")[0]?.rhs).toBe("b");
    expect(getKeyMappingsForMode(table, "insert")[0]?.rhs).toBe("c");
  });

  test("rejects an empty side", () => {
    expect(mapWithNoRemap(table, "", "b", "normal")).toBe(false);
    expect(mapWithNoRemap(table, "a", "", "normal")).toBe(false);
    expect(getKeyMappingsForMode(table, "normal")).toEqual([]);
  });

  test("unmap matches on the canonical lhs", () => {
    mapWithNoRemap(table, "<c-m>", "x", "normal");
    expect(unmapKeys(table, "<CR>", "normal")).toBe(true);
    expect(unmapKeys(table, "<CR>", "normal")).toBe(false);
  });

  test("clear touches only the given modes", () => {
    for (const mode of ALL_KEY_REMAP_MODES) {
      mapWithNoRemap(table, "a", "b", mode);
    }
    clearKeyMappings(table, ["visual", "select"]);
    const remaining = ALL_KEY_REMAP_MODES.filter(
      (mode) => getKeyMappingsForMode(table, mode).length > 0
    );
    expect(remaining).toEqual([
      "normal",
      "operator-pending",
      "insert",
      "command",
    ]);

    clearAllKeyMappings(table);
    for (const mode of ALL_KEY_REMAP_MODES) {
      expect(getKeyMappingsForMode(table, mode)).toEqual([]);
    }
  });

  test("formats one line per mapping with the mode letter", () => {
    mapWithNoRemap(table, "<c-a>", "<Esc>", "normal");
    mapWithNoRemap(table, "jj", "<Esc>", "insert");
    mapWithNoRemap(table, "jk", "<Esc>", "insert");
    expect(formatKeyMappings(table, ["normal", "insert"])).toEqual([
      "n    <C-A> <Esc>",
      "i    jj <Esc>",
      "i    jk <Esc>",
    ]);
    expect(formatKeyMappings(table, ["insert"], "jk")).toEqual([
      "i    jk <Esc>",
    ]);
  });

  test("the lhs filter compares whole keys", () => {
    const table = createKeyMap();
    mapWithRemap(table, "<c-a>", "x", "normal");
    mapWithRemap(table, "<b", "y", "normal");
    expect(formatKeyMappings(table, ["normal"], "<")).toEqual(["n    <b y"]);
    expect(formatKeyMappings(table, ["normal"], "<C-a>")).toEqual(["n    <C-A> x"]);
  });
});

describe("command mode sets", () => {
  test("map without a prefix covers normal, visual, select and operator-pending", () => {
    expect(getMapCommandModes("", false)).toEqual([
      "normal",
      "visual",
      "select",
      "operator-pending",
    ]);
    expect(getMapCommandModes("", true)).toEqual(["insert", "command"]);
    expect(getMapCommandModes("n", true)).toBeUndefined();
  });

  const mapClearCases: Array<[MapCommandPrefix, boolean, KeyRemapMode[]]> = [
    ["", false, ["normal", "visual", "command", "operator-pending"]],
    ["n", false, ["normal"]],
    ["v", false, ["visual", "select"]],
    ["x", false, ["visual"]],
    ["s", false, ["select"]],
    ["o", false, ["operator-pending"]],
    ["", true, ["insert", "command"]],
    ["i", false, ["insert"]],
    ["c", false, ["command"]],
  ];

  test.each(mapClearCases)("mapclear prefix '%s' bang %s", (prefix, bang, modes) => {
    expect(getMapClearCommandModes(prefix, bang)).toEqual(modes);
  });
});
