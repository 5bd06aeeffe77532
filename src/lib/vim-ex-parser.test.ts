import { describe, expect, test } from "vitest";
import {
  findCommandEntry,
  parseLineCommand,
  parseLineRange,
  parseLineSpecifier,
  type LineCommand,
} from "./vim-ex-parser";
import { NO_SUBSTITUTE_FLAGS } from "./vim-substitute";

function parsed(text: string): LineCommand {
  const result = parseLineCommand(text);
  if (!result.succeeded) {
    throw new Error(`expected "${text}" to parse: ${result.error}`);
  }
  return result.value;
}

function parseError(text: string): string {
  const result = parseLineCommand(text);
  if (result.succeeded) {
    throw new Error(`expected "${text}" to fail`);
  }
  return result.error;
}

describe("command names", () => {
  test.each([
    ["se", "set"],
    ["set", "set"],
    ["s", "substitute"],
    ["su", "substitute"],
    ["d", "delete"],
    ["di", "display"],
    ["reg", "registers"],
    ["ret", "retab"],
    ["r", "read"],
    ["pu", "put"],
    ["t", "t"],
    ["tabn", "tabnext"],
    ["tabN", "tabNext"],
    ["tabp", "tabprevious"],
    ["nmapc", "nmapclear"],
    ["nm", "nmap"],
    ["no", "noremap"],
    ["sor", "sort"],
    ["fo", "fold"],
    ["foldo", "foldopen"],
  ])("%s resolves to %s", (typed, name) => {
    expect(findCommandEntry(typed)?.name).toBe(name);
  });

  test.each(["p", "ta", "ma", "sortx", "xyz"])("%s is not a command", (typed) => {
    expect(findCommandEntry(typed)).toBeUndefined();
  });

  test("unknown commands fail with E492", () => {
    expect(parseError("frobnicate")).toBe("E492: Not an editor command: frobnicate");
  });

  test("an empty command line does nothing", () => {
    expect(parsed(":")).toEqual({ kind: "nop" });
    expect(parsed("  ")).toEqual({ kind: "nop" });
  });
});

describe("ranges", () => {
  test("percent", () => {
    expect(parseLineRange("%")).toEqual({
      succeeded: true,
      value: { kind: "entire-buffer" },
    });
  });

  test("two specifiers with offsets", () => {
    expect(parseLineRange(".,$-1")).toEqual({
      succeeded: true,
      value: {
        kind: "range",
        start: { kind: "current-line" },
        end: {
          kind: "with-adjustment",
          specifier: { kind: "last-line" },
          offset: -1,
        },
        adjustCursor: false,
      },
    });
  });

  test("; and bare offsets", () => {
    expect(parseLineRange("'a;+2")).toEqual({
      succeeded: true,
      value: {
        kind: "range",
        start: { kind: "mark", name: "a" },
        end: { kind: "adjustment-on-current", offset: 2 },
        adjustCursor: true,
      },
    });
  });

  test("runs of + and - add up", () => {
    expect(parseLineSpecifier("3++-")).toEqual({
      succeeded: true,
      value: {
        kind: "with-adjustment",
        specifier: { kind: "line-number", line: 3 },
        offset: 1,
      },
    });
  });

  test("search specifiers", () => {
    expect(parseLineSpecifier("/a\\/b/")).toEqual({
      succeeded: true,
      value: { kind: "next-search-pattern", pattern: "a/b" },
    });
    expect(parseLineSpecifier("?cat?+1")).toEqual({
      succeeded: true,
      value: {
        kind: "with-adjustment",
        specifier: { kind: "previous-search-pattern", pattern: "cat" },
        offset: 1,
      },
    });
    expect(parseLineSpecifier("\\/")).toEqual({
      succeeded: true,
      value: { kind: "adjustment-on-last-search", offset: 0 },
    });
    expect(parseLineSpecifier("\\?")).toEqual({
      succeeded: true,
      value: { kind: "previous-search-pattern", pattern: "" },
    });
  });

  test("bad addresses", () => {
    expect(parseLineSpecifier("'")).toEqual({
      succeeded: false,
      error: "E14: Invalid address",
    });
    expect(parseLineSpecifier("")).toEqual({
      succeeded: false,
      error: "E14: Invalid address",
    });
    expect(parseLineSpecifier("3x")).toEqual({
      succeeded: false,
      error: "E488: Trailing characters: x",
    });
  });

  test("a range alone jumps to its line", () => {
    expect(parsed(":42")).toEqual({
      kind: "jump-to-line",
      range: { kind: "single-line", line: { kind: "line-number", line: 42 } },
    });
  });
});

describe("parseLineCommand", () => {
  test("set keeps its arguments verbatim", () => {
    expect(parsed("set ts=4  et")).toEqual({ kind: "set", arguments: "ts=4  et" });
    expect(parsed("set")).toEqual({ kind: "set", arguments: "" });
  });

  test("map family", () => {
    expect(parsed("nnoremap <c-a> <Esc>")).toEqual({
      kind: "map-keys",
      prefix: "n",
      bang: false,
      allowRemap: false,
      lhs: "<c-a>",
      rhs: "<Esc>",
    });
    expect(parsed("map! jj")).toEqual({
      kind: "map-keys",
      prefix: "",
      bang: true,
      allowRemap: true,
      lhs: "jj",
      rhs: undefined,
    });
    expect(parsed("nmap")).toEqual({
      kind: "map-keys",
      prefix: "n",
      bang: false,
      allowRemap: true,
      lhs: undefined,
      rhs: undefined,
    });
  });

  test("map rhs keeps its inner spaces", () => {
    const command = parsed("imap jj a b c");
    expect(command.kind === "map-keys" && command.rhs).toBe("a b c");
  });

  test("mapclear family", () => {
    expect(parsed("mapc!")).toEqual({ kind: "map-clear", prefix: "", bang: true });
    expect(parsed("xmapclear")).toEqual({ kind: "map-clear", prefix: "x", bang: false });
    expect(parseError("nmapc!")).toBe("E477: No ! allowed");
  });

  test("unmap needs a key", () => {
    expect(parsed("iunmap jj")).toEqual({
      kind: "unmap-keys",
      prefix: "i",
      bang: false,
      lhs: "jj",
    });
    expect(parseError("unmap")).toBe("E474: Invalid argument");
  });

  test("put with bang, register and line", () => {
    expect(parsed("put")).toEqual({
      kind: "put",
      range: undefined,
      bang: false,
      register: undefined,
    });
    expect(parsed("0pu! a")).toEqual({
      kind: "put",
      range: { kind: "single-line", line: { kind: "line-number", line: 0 } },
      bang: true,
      register: "a",
    });
  });

  test("retab", () => {
    expect(parsed("retab!")).toEqual({
      kind: "retab",
      range: undefined,
      bang: true,
      tabStop: undefined,
    });
    expect(parsed("%ret 4")).toEqual({
      kind: "retab",
      range: { kind: "entire-buffer" },
      bang: false,
      tabStop: 4,
    });
    expect(parseError("retab 0")).toBe("E487: Argument must be positive");
  });

  test("substitute with an empty pattern", () => {
    expect(parsed("s//dog/")).toEqual({
      kind: "substitute",
      range: undefined,
      argument: {
        pattern: "",
        replacement: "dog",
        flags: undefined,
        keepFlags: false,
        count: undefined,
      },
    });
  });

  test("substitute over a range with flags", () => {
    expect(parsed("%s/a/b/g")).toEqual({
      kind: "substitute",
      range: { kind: "entire-buffer" },
      argument: {
        pattern: "a",
        replacement: "b",
        flags: { ...NO_SUBSTITUTE_FLAGS, replaceAll: true },
        keepFlags: false,
        count: undefined,
      },
    });
  });

  test("bare s, & and && repeat the last substitute", () => {
    const plain = { flags: undefined, keepFlags: false, count: undefined };
    expect(parsed("s")).toEqual({ kind: "substitute-repeat", range: undefined, tail: plain });
    expect(parsed("&")).toEqual({ kind: "substitute-repeat", range: undefined, tail: plain });
    expect(parsed("%&&")).toEqual({
      kind: "substitute-repeat",
      range: { kind: "entire-buffer" },
      tail: { flags: undefined, keepFlags: true, count: undefined },
    });
  });

  test("tab navigation", () => {
    expect(parsed("tabn")).toEqual({ kind: "tab-next", count: undefined });
    expect(parsed("tabn 3")).toEqual({ kind: "tab-next", count: 3 });
    expect(parsed("tabp")).toEqual({ kind: "tab-previous", count: undefined });
    expect(parsed("tabN")).toEqual({ kind: "tab-previous", count: undefined });
    expect(parsed("tabprevious 2")).toEqual({ kind: "tab-previous", count: 2 });
    expect(parseError("2tabn")).toBe("E481: No range allowed");
  });

  test("delete and yank take a register and a count", () => {
    expect(parsed("2,3d a")).toEqual({
      kind: "delete",
      range: {
        kind: "range",
        start: { kind: "line-number", line: 2 },
        end: { kind: "line-number", line: 3 },
        adjustCursor: false,
      },
      register: "a",
      count: undefined,
    });
    expect(parsed("y 3")).toEqual({
      kind: "yank",
      range: undefined,
      register: undefined,
      count: 3,
    });
    expect(parsed("yank b 2")).toEqual({
      kind: "yank",
      range: undefined,
      register: "b",
      count: 2,
    });
    expect(parseError("d a b")).toBe("E488: Trailing characters: b");
  });

  test("copy and move need an address", () => {
    expect(parsed("1,2t$")).toEqual({
      kind: "copy-to",
      range: {
        kind: "range",
        start: { kind: "line-number", line: 1 },
        end: { kind: "line-number", line: 2 },
        adjustCursor: false,
      },
      destination: { kind: "last-line" },
    });
    expect(parsed("m 0")).toEqual({
      kind: "move-to",
      range: undefined,
      destination: { kind: "line-number", line: 0 },
    });
    expect(parseError("co")).toBe("E14: Invalid address");
  });

  test("shifts count their symbols", () => {
    expect(parsed(">>> 2")).toEqual({
      kind: "shift-right",
      range: undefined,
      depth: 3,
      count: 2,
    });
    expect(parsed("%<")).toEqual({
      kind: "shift-left",
      range: { kind: "entire-buffer" },
      depth: 1,
      count: undefined,
    });
  });

  test("join, fold, write, read, registers and sort", () => {
    expect(parsed("j! 3")).toEqual({ kind: "join", range: undefined, bang: true, count: 3 });
    expect(parsed("foldc!")).toEqual({ kind: "fold-close", range: undefined, bang: true });
    expect(parsed("w! out.txt")).toEqual({
      kind: "write",
      range: undefined,
      bang: true,
      filePath: "out.txt",
    });
    expect(parsed("r notes.txt")).toEqual({
      kind: "read",
      range: undefined,
      filePath: "notes.txt",
    });
    expect(parsed("reg a b")).toEqual({ kind: "display-registers", names: "ab" });
    expect(parsed("sort! un")).toEqual({
      kind: "sort",
      range: undefined,
      options: { reverse: true, unique: true, ignoreCase: false, numeric: true },
    });
    expect(parseError("sort z")).toBe("E474: Invalid argument: z");
  });

  test("bang where none is allowed", () => {
    expect(parseError("set!")).toBe("E477: No ! allowed");
    expect(parseError("d!")).toBe("E477: No ! allowed");
  });
});
