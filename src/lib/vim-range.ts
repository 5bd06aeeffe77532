import { buildVimRegex } from "./vim-regex";
import { findLineMatching } from "./vim-search";
import { getToggleSetting, type SettingsStore } from "./vim-settings";
import {
  failed,
  succeeded,
  type ExResult,
  type SearchData,
  type SearchDirection,
  type VimTextBuffer,
} from "./vim-types";

export type LineSpecifier =
  | { kind: "current-line" }
  /** 1-based, as typed; 0 means "above the first line". */
  | { kind: "line-number"; line: number }
  | { kind: "last-line" }
  | { kind: "mark"; name: string }
  | { kind: "adjustment-on-current"; offset: number }
  /** \/ : the next line matching the last search pattern, plus offset. */
  | { kind: "adjustment-on-last-search"; offset: number }
  /** An empty pattern means the last search pattern. */
  | { kind: "next-search-pattern"; pattern: string }
  | { kind: "previous-search-pattern"; pattern: string }
  | { kind: "with-adjustment"; specifier: LineSpecifier; offset: number };

export type LineRange =
  | { kind: "entire-buffer" }
  | { kind: "single-line"; line: LineSpecifier }
  /**
   * A missing side is the current line. With `adjustCursor` (";") the end is
   * resolved relative to the start instead of the cursor.
   */
  | {
      kind: "range";
      start: LineSpecifier | undefined;
      end: LineSpecifier | undefined;
      adjustCursor: boolean;
    };

/** 0-based, inclusive. */
export interface ResolvedRange {
  start: number;
  end: number;
}

export interface RangeContext {
  buffer: VimTextBuffer;
  settings: SettingsStore;
  lastSearch: SearchData | undefined;
}

export interface ResolveOptions {
  /** Keep line 0 as -1 ("above the first line") instead of clamping to 0. */
  allowLineZero?: boolean;
}

function lastLineOf(buffer: VimTextBuffer): number {
  return Math.max(0, buffer.getLineCount() - 1);
}

function clampLine(context: RangeContext, line: number): number {
  return Math.max(0, Math.min(line, lastLineOf(context.buffer)));
}

function searchFrom(
  context: RangeContext,
  pattern: string,
  startLine: number,
  direction: SearchDirection
): ExResult<number> {
  const effective = pattern === "" ? context.lastSearch?.pattern : pattern;
  if (!effective) {
    return failed("E35: No previous regular expression");
  }

  const regex = buildVimRegex(effective, {
    global: false,
    ignoreCase: getToggleSetting(context.settings, "ignorecase"),
    smartCase: getToggleSetting(context.settings, "smartcase"),
    magic: getToggleSetting(context.settings, "magic"),
  });
  if (!regex.succeeded) {
    return regex;
  }
  const line = findLineMatching(context.buffer, regex.value, startLine, {
    direction,
    wrapScan: getToggleSetting(context.settings, "wrapscan"),
  });
  if (line === undefined) {
    return failed(`E486: Pattern not found: ${effective}`);
  }
  return succeeded(line);
}

/**
 * Resolves one line specifier to a 0-based line. `baseLine` stands in for the
 * cursor when a ";" range moved it. Fails for missing marks and for patterns
 * that do not match or compile.
 */
export function resolveLineSpecifier(
  context: RangeContext,
  specifier: LineSpecifier,
  baseLine = context.buffer.getCursorLine(),
  options: ResolveOptions = {}
): ExResult<number> {
  switch (specifier.kind) {
    case "current-line":
      return succeeded(baseLine);
    case "line-number":
      if (specifier.line === 0) {
        return succeeded(options.allowLineZero ? -1 : 0);
      }
      return succeeded(clampLine(context, specifier.line - 1));
    case "last-line":
      return succeeded(lastLineOf(context.buffer));
    case "mark": {
      const line = context.buffer.getMark(specifier.name);
      if (line === undefined) {
        return failed("E20: Mark not set");
      }
      return succeeded(clampLine(context, line));
    }
    case "adjustment-on-current":
      return succeeded(clampLine(context, baseLine + specifier.offset));
    case "adjustment-on-last-search": {
      const found = searchFrom(context, "", baseLine, "forward");
      if (!found.succeeded) return found;
      return succeeded(clampLine(context, found.value + specifier.offset));
    }
    case "next-search-pattern":
      return searchFrom(context, specifier.pattern, baseLine, "forward");
    case "previous-search-pattern":
      return searchFrom(context, specifier.pattern, baseLine, "backward");
    case "with-adjustment": {
      const base = resolveLineSpecifier(
        context,
        specifier.specifier,
        baseLine,
        options
      );
      if (!base.succeeded) return base;
      const line = Math.max(base.value, 0) + specifier.offset;
      if (line < 0 || line > lastLineOf(context.buffer)) {
        return failed("E16: Invalid range");
      }
      return succeeded(line);
    }
  }
}

/**
 * Resolves a range to concrete lines. No range at all means the current line.
 * A backwards range is swapped.
 */
export function resolveLineRange(
  context: RangeContext,
  range: LineRange | undefined,
  options: ResolveOptions = {}
): ExResult<ResolvedRange> {
  const cursor = context.buffer.getCursorLine();
  if (!range) {
    return succeeded({ start: cursor, end: cursor });
  }

  let start: number;
  let end: number;
  switch (range.kind) {
    case "entire-buffer":
      return succeeded({ start: 0, end: lastLineOf(context.buffer) });
    case "single-line": {
      const line = resolveLineSpecifier(context, range.line, cursor, options);
      if (!line.succeeded) return line;
      return succeeded({ start: line.value, end: line.value });
    }
    case "range": {
      if (range.start) {
        const first = resolveLineSpecifier(context, range.start, cursor, options);
        if (!first.succeeded) return first;
        start = first.value;
      } else {
        start = cursor;
      }
      const base = range.adjustCursor ? Math.max(start, 0) : cursor;
      if (range.end) {
        const last = resolveLineSpecifier(context, range.end, base, options);
        if (!last.succeeded) return last;
        end = last.value;
      } else {
        end = base;
      }
      break;
    }
  }

  return succeeded(start <= end ? { start, end } : { start: end, end: start });
}

/**
 * A trailing count turns the range into `count` lines starting at its last
 * line, as in ":d 3".
 */
export function applyCount(
  context: RangeContext,
  range: ResolvedRange,
  count: number | undefined
): ResolvedRange {
  if (count === undefined) return range;
  const start = Math.max(range.end, 0);
  return { start, end: clampLine(context, start + count - 1) };
}
