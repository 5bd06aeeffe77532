import type { MapCommandPrefix } from "./vim-key-map";
import type { LineRange, LineSpecifier } from "./vim-range";
import { isValidRegisterName } from "./vim-registers";
import {
  isValidSubstituteDelimiter,
  parseSubstituteArgument,
  parseSubstituteFlagsAndCount,
  type SubstituteArgument,
  type SubstituteFlagsAndCount,
} from "./vim-substitute";
import { failed, succeeded, type ExResult } from "./vim-types";

export type ParseResult<T> = ExResult<T>;

export interface SortOptions {
  reverse: boolean;
  unique: boolean;
  ignoreCase: boolean;
  numeric: boolean;
}

type Ranged = { range: LineRange | undefined };

/** One variant per supported command; each carries only what it needs. */
export type LineCommand =
  | { kind: "set"; arguments: string }
  | {
      kind: "map-keys";
      prefix: MapCommandPrefix;
      bang: boolean;
      allowRemap: boolean;
      /** Undefined lists every mapping. */
      lhs: string | undefined;
      /** Undefined lists mappings starting with `lhs`. */
      rhs: string | undefined;
    }
  | { kind: "unmap-keys"; prefix: MapCommandPrefix; bang: boolean; lhs: string }
  | { kind: "map-clear"; prefix: MapCommandPrefix; bang: boolean }
  | (Ranged & { kind: "put"; bang: boolean; register: string | undefined })
  | (Ranged & { kind: "retab"; bang: boolean; tabStop: number | undefined })
  | (Ranged & { kind: "substitute"; argument: SubstituteArgument })
  | (Ranged & { kind: "substitute-repeat"; tail: SubstituteFlagsAndCount })
  | { kind: "tab-next"; count: number | undefined }
  | { kind: "tab-previous"; count: number | undefined }
  | (Ranged & {
      kind: "delete";
      register: string | undefined;
      count: number | undefined;
    })
  | (Ranged & {
      kind: "yank";
      register: string | undefined;
      count: number | undefined;
    })
  | (Ranged & { kind: "join"; bang: boolean; count: number | undefined })
  | (Ranged & { kind: "copy-to"; destination: LineSpecifier })
  | (Ranged & { kind: "move-to"; destination: LineSpecifier })
  | (Ranged & { kind: "shift-left"; depth: number; count: number | undefined })
  | (Ranged & { kind: "shift-right"; depth: number; count: number | undefined })
  | { kind: "jump-to-line"; range: LineRange }
  /** An empty command line. */
  | { kind: "nop" }
  | (Ranged & { kind: "fold" })
  | (Ranged & { kind: "fold-open"; bang: boolean })
  | (Ranged & { kind: "fold-close"; bang: boolean })
  | (Ranged & { kind: "write"; bang: boolean; filePath: string | undefined })
  | (Ranged & { kind: "read"; filePath: string | undefined })
  | { kind: "display-registers"; names: string | undefined }
  | (Ranged & { kind: "sort"; options: SortOptions });

export type LineCommandKind = LineCommand["kind"];

export interface CommandInput {
  range: LineRange | undefined;
  bang: boolean;
  /** Text after the name and bang, leading whitespace removed. */
  argument: string;
}

export interface CommandEntry {
  name: string;
  /** Shortest accepted abbreviation. */
  minimum: string;
  allowRange: boolean;
  allowBang: boolean;
  build: (input: CommandInput) => ParseResult<LineCommand>;
}

// Scanner over the command text. Functions below advance `pos`.
interface Scanner {
  text: string;
  pos: number;
}

function peek(scanner: Scanner, offset = 0): string | undefined {
  return scanner.text[scanner.pos + offset];
}

function skipWhitespace(scanner: Scanner): void {
  while (scanner.pos < scanner.text.length && /\s/.test(scanner.text[scanner.pos])) {
    scanner.pos++;
  }
}

function readNumber(scanner: Scanner): number | undefined {
  const match = /^\d+/.exec(scanner.text.slice(scanner.pos));
  if (!match) return undefined;
  scanner.pos += match[0].length;
  return Number(match[0]);
}

/** Reads `pattern{delimiter}`; the closing delimiter may be missing. */
function readPattern(scanner: Scanner, delimiter: string): string {
  let pattern = "";
  while (scanner.pos < scanner.text.length) {
    const ch = scanner.text[scanner.pos];
    if (ch === "\\" && peek(scanner, 1) !== undefined) {
      const next = scanner.text[scanner.pos + 1];
      pattern += next === delimiter ? next : ch + next;
      scanner.pos += 2;
      continue;
    }
    scanner.pos++;
    if (ch === delimiter) break;
    pattern += ch;
  }
  return pattern;
}

/** Reads any run of `+n`, `-n`, `+`, `-`; undefined when there is none. */
function readOffset(scanner: Scanner): number | undefined {
  let offset: number | undefined;
  for (;;) {
    const ch = peek(scanner);
    if (ch !== "+" && ch !== "-") return offset;
    scanner.pos++;
    const amount = readNumber(scanner) ?? 1;
    offset = (offset ?? 0) + (ch === "+" ? amount : -amount);
  }
}

function parseBaseSpecifier(
  scanner: Scanner
): ParseResult<LineSpecifier | undefined> {
  const ch = peek(scanner);
  switch (ch) {
    case ".":
      scanner.pos++;
      return succeeded({ kind: "current-line" });
    case "$":
      scanner.pos++;
      return succeeded({ kind: "last-line" });
    case "'": {
      const name = peek(scanner, 1);
      if (name === undefined || /\s/.test(name)) {
        return failed("E14: Invalid address");
      }
      scanner.pos += 2;
      return succeeded({ kind: "mark", name });
    }
    case "/":
      scanner.pos++;
      return succeeded({
        kind: "next-search-pattern",
        pattern: readPattern(scanner, "/"),
      });
    case "?":
      scanner.pos++;
      return succeeded({
        kind: "previous-search-pattern",
        pattern: readPattern(scanner, "?"),
      });
    case "\\": {
      const next = peek(scanner, 1);
      if (next === "/") {
        scanner.pos += 2;
        return succeeded({ kind: "adjustment-on-last-search", offset: 0 });
      }
      if (next === "?") {
        scanner.pos += 2;
        return succeeded({ kind: "previous-search-pattern", pattern: "" });
      }
      return failed("E10: \\ should be followed by /, ? or &");
    }
  }

  const line = readNumber(scanner);
  if (line !== undefined) {
    return succeeded({ kind: "line-number", line });
  }
  return succeeded(undefined);
}

/**
 * Parses one line specifier at the scanner position; undefined when none is
 * present. A bare offset is relative to the current line.
 */
function readLineSpecifier(
  scanner: Scanner
): ParseResult<LineSpecifier | undefined> {
  const base = parseBaseSpecifier(scanner);
  if (!base.succeeded) return base;

  const offset = readOffset(scanner);
  if (!base.value) {
    return succeeded(
      offset === undefined ? undefined : { kind: "adjustment-on-current", offset }
    );
  }
  if (offset === undefined) {
    return base;
  }
  if (base.value.kind === "adjustment-on-last-search") {
    return succeeded({ kind: "adjustment-on-last-search", offset });
  }
  return succeeded({ kind: "with-adjustment", specifier: base.value, offset });
}

/** Parses a complete line specifier such as `'a+2` or `/cat/-1`. */
export function parseLineSpecifier(text: string): ParseResult<LineSpecifier> {
  const scanner: Scanner = { text: text.trim(), pos: 0 };
  const result = readLineSpecifier(scanner);
  if (!result.succeeded) return result;
  if (!result.value) {
    return failed("E14: Invalid address");
  }
  if (scanner.pos < scanner.text.length) {
    return failed(`E488: Trailing characters: ${scanner.text.slice(scanner.pos)}`);
  }
  return succeeded(result.value);
}

function readLineRange(scanner: Scanner): ParseResult<LineRange | undefined> {
  skipWhitespace(scanner);
  if (peek(scanner) === "%") {
    scanner.pos++;
    return succeeded({ kind: "entire-buffer" });
  }

  const start = readLineSpecifier(scanner);
  if (!start.succeeded) return start;

  const separator = peek(scanner);
  if (separator !== "," && separator !== ";") {
    return succeeded(
      start.value ? { kind: "single-line", line: start.value } : undefined
    );
  }
  scanner.pos++;

  const end = readLineSpecifier(scanner);
  if (!end.succeeded) return end;
  return succeeded({
    kind: "range",
    start: start.value,
    end: end.value,
    adjustCursor: separator === ";",
  });
}

/** Parses the range prefix of a command line on its own. */
export function parseLineRange(text: string): ParseResult<LineRange | undefined> {
  const scanner: Scanner = { text, pos: 0 };
  const range = readLineRange(scanner);
  if (!range.succeeded) return range;
  skipWhitespace(scanner);
  if (scanner.pos < scanner.text.length) {
    return failed(`E488: Trailing characters: ${scanner.text.slice(scanner.pos)}`);
  }
  return range;
}

function parseCount(text: string): ParseResult<number | undefined> {
  const trimmed = text.trim();
  if (trimmed === "") return succeeded(undefined);
  if (!/^\d+$/.test(trimmed)) {
    return failed(`E488: Trailing characters: ${trimmed}`);
  }
  const count = Number(trimmed);
  if (count === 0) {
    return failed("E939: Positive count required");
  }
  return succeeded(count);
}

/** `[x] [count]`, where a digit is always read as the count. */
function parseRegisterAndCount(
  text: string
): ParseResult<{ register: string | undefined; count: number | undefined }> {
  let register: string | undefined;
  let rest = text;
  const first = text[0];
  if (first !== undefined && !/\d/.test(first) && isValidRegisterName(first)) {
    register = first;
    rest = text.slice(1);
  }
  const count = parseCount(rest);
  if (!count.succeeded) return count;
  return succeeded({ register, count: count.value });
}

/** Splits `lhs rhs` on the first unescaped whitespace. */
function splitMapArguments(text: string): { lhs: string; rhs: string } {
  let i = 0;
  let lhs = "";
  while (i < text.length && !/\s/.test(text[i])) {
    if ((text[i] === "\\" || text[i] === "\x16") && i + 1 < text.length) {
      lhs += text[i + 1];
      i += 2;
      continue;
    }
    lhs += text[i];
    i++;
  }
  return { lhs, rhs: text.slice(i).replace(/^\s+/, "") };
}

function parseSortOptions(bang: boolean, text: string): ParseResult<SortOptions> {
  const options: SortOptions = {
    reverse: bang,
    unique: false,
    ignoreCase: false,
    numeric: false,
  };
  for (const ch of text) {
    if (ch === "u") options.unique = true;
    else if (ch === "i") options.ignoreCase = true;
    else if (ch === "n") options.numeric = true;
    else if (!/\s/.test(ch)) return failed(`E474: Invalid argument: ${text}`);
  }
  return succeeded(options);
}

function noArgument(
  input: CommandInput,
  command: LineCommand
): ParseResult<LineCommand> {
  if (input.argument !== "") {
    return failed(`E488: Trailing characters: ${input.argument}`);
  }
  return succeeded(command);
}

function mapEntry(
  name: string,
  minimum: string,
  prefix: MapCommandPrefix,
  allowRemap: boolean
): CommandEntry {
  return {
    name,
    minimum,
    allowRange: false,
    allowBang: prefix === "",
    build: ({ bang, argument }) => {
      if (argument === "") {
        return succeeded({
          kind: "map-keys",
          prefix,
          bang,
          allowRemap,
          lhs: undefined,
          rhs: undefined,
        });
      }
      const { lhs, rhs } = splitMapArguments(argument);
      return succeeded({
        kind: "map-keys",
        prefix,
        bang,
        allowRemap,
        lhs,
        rhs: rhs === "" ? undefined : rhs,
      });
    },
  };
}

function unmapEntry(
  name: string,
  minimum: string,
  prefix: MapCommandPrefix
): CommandEntry {
  return {
    name,
    minimum,
    allowRange: false,
    allowBang: prefix === "",
    build: ({ bang, argument }) => {
      const { lhs } = splitMapArguments(argument);
      if (lhs === "") {
        return failed("E474: Invalid argument");
      }
      return succeeded({ kind: "unmap-keys", prefix, bang, lhs });
    },
  };
}

function mapClearEntry(
  name: string,
  minimum: string,
  prefix: MapCommandPrefix
): CommandEntry {
  return {
    name,
    minimum,
    allowRange: false,
    allowBang: prefix === "",
    build: (input) =>
      noArgument(input, { kind: "map-clear", prefix, bang: input.bang }),
  };
}

function tabEntry(
  name: string,
  minimum: string,
  kind: "tab-next" | "tab-previous"
): CommandEntry {
  return {
    name,
    minimum,
    allowRange: false,
    allowBang: false,
    build: ({ argument }) => {
      const trimmed = argument.trim();
      if (trimmed !== "" && !/^\d+$/.test(trimmed)) {
        return failed(`E488: Trailing characters: ${trimmed}`);
      }
      return succeeded({
        kind,
        count: trimmed === "" ? undefined : Number(trimmed),
      });
    },
  };
}

function registerEntry(
  name: string,
  minimum: string,
  kind: "delete" | "yank"
): CommandEntry {
  return {
    name,
    minimum,
    allowRange: true,
    allowBang: false,
    build: ({ range, argument }) => {
      const parsed = parseRegisterAndCount(argument);
      if (!parsed.succeeded) return parsed;
      return succeeded({ kind, range, ...parsed.value });
    },
  };
}

function addressEntry(
  name: string,
  minimum: string,
  kind: "copy-to" | "move-to"
): CommandEntry {
  return {
    name,
    minimum,
    allowRange: true,
    allowBang: false,
    build: ({ range, argument }) => {
      const destination = parseLineSpecifier(argument);
      if (!destination.succeeded) return destination;
      return succeeded({ kind, range, destination: destination.value });
    },
  };
}

function substituteBuild({
  range,
  argument,
}: CommandInput): ParseResult<LineCommand> {
  const first = argument[0];
  if (first === undefined || first === "&" || !isValidSubstituteDelimiter(first)) {
    const tail = parseSubstituteFlagsAndCount(argument);
    if (!tail.succeeded) return tail;
    return succeeded({ kind: "substitute-repeat", range, tail: tail.value });
  }
  const parsed = parseSubstituteArgument(argument);
  if (!parsed.succeeded) return parsed;
  return succeeded({ kind: "substitute", range, argument: parsed.value });
}

// Searched for an exact name first, then for the first entry whose name
// starts with the typed text and whose minimum the text covers.
const COMMAND_TABLE: readonly CommandEntry[] = [
  {
    name: "set",
    minimum: "se",
    allowRange: false,
    allowBang: false,
    build: ({ argument }) => succeeded({ kind: "set", arguments: argument }),
  },
  mapEntry("map", "map", "", true),
  mapEntry("nmap", "nm", "n", true),
  mapEntry("vmap", "vm", "v", true),
  mapEntry("xmap", "xm", "x", true),
  mapEntry("smap", "smap", "s", true),
  mapEntry("omap", "om", "o", true),
  mapEntry("imap", "im", "i", true),
  mapEntry("cmap", "cm", "c", true),
  mapEntry("noremap", "no", "", false),
  mapEntry("nnoremap", "nn", "n", false),
  mapEntry("vnoremap", "vn", "v", false),
  mapEntry("xnoremap", "xn", "x", false),
  mapEntry("snoremap", "snor", "s", false),
  mapEntry("onoremap", "ono", "o", false),
  mapEntry("inoremap", "ino", "i", false),
  mapEntry("cnoremap", "cno", "c", false),
  unmapEntry("unmap", "unm", ""),
  unmapEntry("nunmap", "nun", "n"),
  unmapEntry("vunmap", "vu", "v"),
  unmapEntry("xunmap", "xu", "x"),
  unmapEntry("sunmap", "sunm", "s"),
  unmapEntry("ounmap", "ou", "o"),
  unmapEntry("iunmap", "iu", "i"),
  unmapEntry("cunmap", "cu", "c"),
  mapClearEntry("mapclear", "mapc", ""),
  mapClearEntry("nmapclear", "nmapc", "n"),
  mapClearEntry("vmapclear", "vmapc", "v"),
  mapClearEntry("xmapclear", "xmapc", "x"),
  mapClearEntry("smapclear", "smapc", "s"),
  mapClearEntry("omapclear", "omapc", "o"),
  mapClearEntry("imapclear", "imapc", "i"),
  mapClearEntry("cmapclear", "cmapc", "c"),
  {
    name: "put",
    minimum: "pu",
    allowRange: true,
    allowBang: true,
    build: ({ range, bang, argument }) => {
      const register = argument === "" ? undefined : argument[0];
      if (register !== undefined && !isValidRegisterName(register)) {
        return failed(`E488: Trailing characters: ${argument}`);
      }
      if (argument.length > 1) {
        return failed(`E488: Trailing characters: ${argument.slice(1)}`);
      }
      return succeeded({ kind: "put", range, bang, register });
    },
  },
  {
    name: "retab",
    minimum: "ret",
    allowRange: true,
    allowBang: true,
    build: ({ range, bang, argument }) => {
      const trimmed = argument.trim();
      if (trimmed !== "" && !/^\d+$/.test(trimmed)) {
        return failed(`E475: Invalid argument: ${trimmed}`);
      }
      const tabStop = trimmed === "" ? undefined : Number(trimmed);
      if (tabStop === 0) {
        return failed("E487: Argument must be positive");
      }
      return succeeded({ kind: "retab", range, bang, tabStop });
    },
  },
  {
    name: "substitute",
    minimum: "s",
    allowRange: true,
    allowBang: false,
    build: substituteBuild,
  },
  tabEntry("tabnext", "tabn", "tab-next"),
  tabEntry("tabprevious", "tabp", "tab-previous"),
  tabEntry("tabNext", "tabN", "tab-previous"),
  registerEntry("delete", "d", "delete"),
  registerEntry("yank", "y", "yank"),
  {
    name: "join",
    minimum: "j",
    allowRange: true,
    allowBang: true,
    build: ({ range, bang, argument }) => {
      const count = parseCount(argument);
      if (!count.succeeded) return count;
      return succeeded({ kind: "join", range, bang, count: count.value });
    },
  },
  addressEntry("copy", "co", "copy-to"),
  addressEntry("t", "t", "copy-to"),
  addressEntry("move", "m", "move-to"),
  {
    name: "fold",
    minimum: "fo",
    allowRange: true,
    allowBang: false,
    build: (input) => noArgument(input, { kind: "fold", range: input.range }),
  },
  {
    name: "foldopen",
    minimum: "foldo",
    allowRange: true,
    allowBang: true,
    build: (input) =>
      noArgument(input, {
        kind: "fold-open",
        range: input.range,
        bang: input.bang,
      }),
  },
  {
    name: "foldclose",
    minimum: "foldc",
    allowRange: true,
    allowBang: true,
    build: (input) =>
      noArgument(input, {
        kind: "fold-close",
        range: input.range,
        bang: input.bang,
      }),
  },
  {
    name: "write",
    minimum: "w",
    allowRange: true,
    allowBang: true,
    build: ({ range, bang, argument }) =>
      succeeded({
        kind: "write",
        range,
        bang,
        filePath: argument.trim() === "" ? undefined : argument.trim(),
      }),
  },
  {
    name: "read",
    minimum: "r",
    allowRange: true,
    allowBang: false,
    build: ({ range, argument }) =>
      succeeded({
        kind: "read",
        range,
        filePath: argument.trim() === "" ? undefined : argument.trim(),
      }),
  },
  {
    name: "registers",
    minimum: "reg",
    allowRange: false,
    allowBang: false,
    build: ({ argument }) =>
      succeeded({
        kind: "display-registers",
        names: argument.trim() === "" ? undefined : argument.replace(/\s/g, ""),
      }),
  },
  {
    name: "display",
    minimum: "di",
    allowRange: false,
    allowBang: false,
    build: ({ argument }) =>
      succeeded({
        kind: "display-registers",
        names: argument.trim() === "" ? undefined : argument.replace(/\s/g, ""),
      }),
  },
  {
    name: "sort",
    minimum: "sor",
    allowRange: true,
    allowBang: true,
    build: ({ range, bang, argument }) => {
      const options = parseSortOptions(bang, argument);
      if (!options.succeeded) return options;
      return succeeded({ kind: "sort", range, options: options.value });
    },
  },
];

export function findCommandEntry(name: string): CommandEntry | undefined {
  return (
    COMMAND_TABLE.find((entry) => entry.name === name) ??
    COMMAND_TABLE.find(
      (entry) => name.startsWith(entry.minimum) && entry.name.startsWith(name)
    )
  );
}

function parseShift(
  scanner: Scanner,
  range: LineRange | undefined
): ParseResult<LineCommand> {
  const symbol = scanner.text[scanner.pos];
  let depth = 0;
  while (peek(scanner) === symbol || (depth > 0 && peek(scanner) === " ")) {
    if (peek(scanner) === symbol) depth++;
    scanner.pos++;
  }
  const count = parseCount(scanner.text.slice(scanner.pos));
  if (!count.succeeded) return count;
  return succeeded({
    kind: symbol === ">" ? "shift-right" : "shift-left",
    range,
    depth,
    count: count.value,
  });
}

/**
 * Parses one command line (with or without the leading ":") into a
 * LineCommand. Never throws; every failure carries the message to show.
 */
export function parseLineCommand(text: string): ParseResult<LineCommand> {
  const scanner: Scanner = { text, pos: 0 };
  while (peek(scanner) === ":" || /\s/.test(peek(scanner) ?? "")) {
    scanner.pos++;
  }
  const commandText = scanner.text.slice(scanner.pos).trim();

  const range = readLineRange(scanner);
  if (!range.succeeded) return range;
  skipWhitespace(scanner);

  const first = peek(scanner);
  if (first === undefined) {
    if (range.value) {
      return succeeded({ kind: "jump-to-line", range: range.value });
    }
    return succeeded({ kind: "nop" });
  }

  if (first === ">" || first === "<") {
    return parseShift(scanner, range.value);
  }

  let name: string;
  if (first === "&") {
    name = "&";
    scanner.pos++;
  } else {
    const match = /^[a-zA-Z]+/.exec(scanner.text.slice(scanner.pos));
    if (!match) {
      return failed(`E492: Not an editor command: ${commandText}`);
    }
    name = match[0];
    scanner.pos += name.length;
  }

  let bang = false;
  if (peek(scanner) === "!") {
    bang = true;
    scanner.pos++;
  }
  const argument = scanner.text.slice(scanner.pos).replace(/^\s+/, "");

  if (name === "&") {
    if (bang) return failed("E477: No ! allowed");
    const tail = parseSubstituteFlagsAndCount(argument);
    if (!tail.succeeded) return tail;
    return succeeded({ kind: "substitute-repeat", range: range.value, tail: tail.value });
  }

  const entry = findCommandEntry(name);
  if (!entry) {
    return failed(`E492: Not an editor command: ${commandText}`);
  }
  if (bang && !entry.allowBang) {
    return failed("E477: No ! allowed");
  }
  if (range.value && !entry.allowRange) {
    return failed("E481: No range allowed");
  }
  return entry.build({ range: range.value, bang, argument });
}
