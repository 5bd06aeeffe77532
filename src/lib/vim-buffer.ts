import type { VimTextBuffer } from "./vim-types";
import { splitTextLines } from "./vim-utils";

export interface TextBufferOptions {
  cursorLine?: number;
  /** Mark name to 0-based line. */
  marks?: Record<string, number>;
  filePath?: string;
}

export interface InMemoryTextBuffer extends VimTextBuffer {
  getLines(): string[];
  getText(): string;
  setMark(name: string, line: number): void;
}

/**
 * A line buffer kept in memory. Marks follow their lines across inserts and
 * deletes; a mark whose line is deleted is dropped.
 */
export function createTextBuffer(
  content: string | readonly string[],
  options: TextBufferOptions = {}
): InMemoryTextBuffer {
  let lines =
    typeof content === "string"
      ? splitTextLines(content)
      : content.length > 0
      ? [...content]
      : [""];
  const marks = new Map<string, number>(Object.entries(options.marks ?? {}));
  let cursorLine = 0;

  const clamp = (line: number) =>
    Math.max(0, Math.min(line, lines.length - 1));
  cursorLine = clamp(options.cursorLine ?? 0);

  const checkLine = (line: number) => {
    if (!Number.isInteger(line) || line < 0 || line >= lines.length) {
      throw new RangeError(`Line ${line} is outside the buffer`);
    }
  };

  return {
    getLineCount: () => lines.length,
    getLine(line) {
      checkLine(line);
      return lines[line];
    },
    setLine(line, text) {
      checkLine(line);
      lines[line] = text;
    },
    insertLines(line, inserted) {
      if (line < 0 || line > lines.length) {
        throw new RangeError(`Cannot insert at line ${line}`);
      }
      if (inserted.length === 0) return;
      lines = [...lines.slice(0, line), ...inserted, ...lines.slice(line)];
      for (const [name, markLine] of marks) {
        if (markLine >= line) marks.set(name, markLine + inserted.length);
      }
    },
    deleteLines(start, count) {
      if (count <= 0) return;
      checkLine(start);
      const end = Math.min(start + count, lines.length);
      lines = [...lines.slice(0, start), ...lines.slice(end)];
      if (lines.length === 0) lines = [""];
      for (const [name, markLine] of marks) {
        if (markLine >= end) {
          marks.set(name, markLine - (end - start));
        } else if (markLine >= start) {
          marks.delete(name);
        }
      }
      cursorLine = clamp(cursorLine);
    },
    getCursorLine: () => cursorLine,
    setCursorLine(line) {
      cursorLine = clamp(line);
    },
    getMark: (name) => marks.get(name),
    getFilePath: () => options.filePath,
    getLines: () => [...lines],
    getText: () => lines.join("\n"),
    setMark(name, line) {
      checkLine(line);
      marks.set(name, line);
    },
  };
}
