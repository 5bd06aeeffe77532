import type { SearchDirection, VimTextBuffer } from "./vim-types";

export interface LineSearchOptions {
  direction: SearchDirection;
  wrapScan: boolean;
}

/**
 * Finds the first line after (or before) `startLine` that matches `regex`,
 * wrapping around the buffer when `wrapScan` is set. The start line itself
 * is only checked last, after a full wrap.
 */
export function findLineMatching(
  buffer: VimTextBuffer,
  regex: RegExp,
  startLine: number,
  options: LineSearchOptions
): number | undefined {
  const lineCount = buffer.getLineCount();
  const step = options.direction === "forward" ? 1 : -1;
  const matcher = new RegExp(regex.source, regex.flags.replace("g", ""));

  let line = startLine;
  for (let visited = 0; visited < lineCount; visited++) {
    line += step;
    if (line >= lineCount || line < 0) {
      if (!options.wrapScan) return undefined;
      line = line < 0 ? lineCount - 1 : 0;
    }
    if (matcher.test(buffer.getLine(line))) {
      return line;
    }
  }
  return undefined;
}

