export type ExResult<T> =
  | { succeeded: true; value: T }
  | { succeeded: false; error: string };

export function succeeded<T>(value: T): ExResult<T> {
  return { succeeded: true, value };
}

export function failed<T>(error: string): ExResult<T> {
  return { succeeded: false, error };
}

export type SearchDirection = "forward" | "backward";

export interface SearchData {
  pattern: string;
  direction: SearchDirection;
}

/**
 * Line storage owned by the host. Line numbers are 0-based; the buffer
 * always holds at least one (possibly empty) line.
 */
export interface VimTextBuffer {
  getLineCount(): number;
  getLine(line: number): string;
  setLine(line: number, text: string): void;
  /** Inserts before `line`; `line === getLineCount()` appends. */
  insertLines(line: number, lines: readonly string[]): void;
  deleteLines(start: number, count: number): void;
  getCursorLine(): number;
  setCursorLine(line: number): void;
  getMark(name: string): number | undefined;
  getFilePath(): string | undefined;
}

export interface VimStatus {
  report(message: string): void;
  reportError(message: string): void;
}

export type TabDirection = "forward" | "backward";

export interface VimHost {
  goToTab(direction: TabDirection, count: number): void;
}

/** Synchronous file access. Implementations throw on I/O failure. */
export interface VimFileSystem {
  exists(path: string): boolean;
  readLines(path: string): string[];
  writeLines(path: string, lines: readonly string[]): void;
}

export interface VimFoldManager {
  createFold(start: number, end: number): void;
  openFolds(start: number, end: number, all: boolean): void;
  closeFolds(start: number, end: number, all: boolean): void;
}
