import type { VimTextBuffer } from "./vim-types";

export function isWhitespace(c: string): boolean {
  return /\s/.test(c);
}

/** Splits text into lines; a trailing newline terminates the last line. */
export function splitTextLines(text: string): string[] {
  let lines = text.split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "" && text.endsWith("\n")) {
    lines = lines.slice(0, -1);
  }
  return lines.length > 0 ? lines : [""];
}

export function getLeadingWhitespace(line: string): string {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0] : "";
}

/** Display width of a run of spaces and tabs starting at column 0. */
export function measureIndent(whitespace: string, tabStop: number): number {
  let width = 0;
  for (const ch of whitespace) {
    if (ch === "\t" && tabStop > 0) {
      width += tabStop - (width % tabStop);
    } else {
      width++;
    }
  }
  return width;
}

export function buildIndent(
  width: number,
  tabStop: number,
  expandTab: boolean
): string {
  if (width <= 0) return "";
  if (expandTab || tabStop <= 0) {
    return " ".repeat(width);
  }
  return "\t".repeat(Math.floor(width / tabStop)) + " ".repeat(width % tabStop);
}

export interface ShiftOptions {
  shiftWidth: number;
  tabStop: number;
  expandTab: boolean;
  shiftRound: boolean;
}

/** Moves a line's indent by `levels` shift widths; negative shifts left. */
export function shiftLine(
  line: string,
  levels: number,
  options: ShiftOptions
): string {
  if (line === "") return line;

  const indent = getLeadingWhitespace(line);
  const width = measureIndent(indent, options.tabStop);
  const step = options.shiftWidth > 0 ? options.shiftWidth : options.tabStop;

  let target = width + levels * step;
  if (options.shiftRound && step > 0) {
    const base = levels > 0 ? Math.floor(width / step) : Math.ceil(width / step);
    target = (base + levels) * step;
  }

  return (
    buildIndent(Math.max(0, target), options.tabStop, options.expandTab) +
    line.slice(indent.length)
  );
}

/**
 * Joins lines into one. Unless `keepWhitespace`, each joined line loses its
 * leading whitespace and is separated by one space, with none before ")" or
 * after existing trailing whitespace.
 */
export function joinLines(
  lines: readonly string[],
  keepWhitespace: boolean
): string {
  if (keepWhitespace) {
    return lines.join("");
  }

  let result = lines[0] ?? "";
  for (const next of lines.slice(1)) {
    const trimmed = next.replace(/^\s+/, "");
    if (
      trimmed === "" ||
      result === "" ||
      isWhitespace(result[result.length - 1]) ||
      trimmed.startsWith(")")
    ) {
      result += trimmed;
    } else {
      result += ` ${trimmed}`;
    }
  }
  return result;
}

export function getLines(
  buffer: VimTextBuffer,
  start: number,
  end: number
): string[] {
  const lines: string[] = [];
  for (let line = start; line <= end; line++) {
    lines.push(buffer.getLine(line));
  }
  return lines;
}

/** Replaces `count` lines at `start` with `lines`; inserts before deleting. */
export function replaceLines(
  buffer: VimTextBuffer,
  start: number,
  count: number,
  lines: readonly string[]
): void {
  if (lines.length > 0) {
    buffer.insertLines(start + count, lines);
  }
  if (count > 0) {
    buffer.deleteLines(start, count);
  }
}
