import type {
  TabDirection,
  VimFileSystem,
  VimFoldManager,
  VimHost,
  VimStatus,
} from "./vim-types";

// In-process stand-ins for the host ports, shared by the tests.

export interface RecordingStatus extends VimStatus {
  messages: string[];
  errors: string[];
  lastStatus(): string | undefined;
  lastError(): string | undefined;
}

export function createRecordingStatus(): RecordingStatus {
  const messages: string[] = [];
  const errors: string[] = [];
  return {
    messages,
    errors,
    report: (message) => {
      messages.push(message);
    },
    reportError: (message) => {
      errors.push(message);
    },
    lastStatus: () => messages[messages.length - 1],
    lastError: () => errors[errors.length - 1],
  };
}

export interface RecordingHost extends VimHost {
  tabRequests: Array<{ direction: TabDirection; count: number }>;
}

export function createRecordingHost(): RecordingHost {
  const tabRequests: RecordingHost["tabRequests"] = [];
  return {
    tabRequests,
    goToTab: (direction, count) => {
      tabRequests.push({ direction, count });
    },
  };
}

export type FoldCall =
  | { kind: "create"; start: number; end: number }
  | { kind: "open" | "close"; start: number; end: number; all: boolean };

export interface RecordingFoldManager extends VimFoldManager {
  calls: FoldCall[];
}

export function createRecordingFoldManager(): RecordingFoldManager {
  const calls: FoldCall[] = [];
  return {
    calls,
    createFold: (start, end) => {
      calls.push({ kind: "create", start, end });
    },
    openFolds: (start, end, all) => {
      calls.push({ kind: "open", start, end, all });
    },
    closeFolds: (start, end, all) => {
      calls.push({ kind: "close", start, end, all });
    },
  };
}

export interface MemoryFileSystem extends VimFileSystem {
  files: Map<string, string[]>;
}

/** Files held in a map; paths listed in `failing` throw on access. */
export function createMemoryFileSystem(
  initial: Record<string, string[]> = {},
  failing: readonly string[] = []
): MemoryFileSystem {
  const files = new Map(Object.entries(initial));
  const check = (path: string) => {
    if (failing.includes(path)) {
      throw new Error(`EACCES: permission denied, open '${path}'`);
    }
  };
  return {
    files,
    exists: (path) => files.has(path) || failing.includes(path),
    readLines: (path) => {
      check(path);
      const lines = files.get(path);
      if (!lines) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return [...lines];
    },
    writeLines: (path, lines) => {
      check(path);
      files.set(path, [...lines]);
    },
  };
}
