export { log, type Logger, type LogLevel } from "./log";
export {
  readEnvConfig,
  VimSessionConfigSchema,
  type EnvConfig,
  type VimSessionConfig,
  type ResolvedVimSessionConfig,
} from "./config";
export { VimCommandError, getErrorMessage } from "./vim-errors";
export * from "./vim-types";
export * from "./vim-key-notation";
export * from "./vim-key-map";
export * from "./vim-settings";
export * from "./vim-registers";
export {
  buildVimRegex,
  expandVimReplacement,
  translateVimPattern,
  type VimPattern,
  type VimRegexOptions,
} from "./vim-regex";
export { findLineMatching, type LineSearchOptions } from "./vim-search";
export * from "./vim-range";
export * from "./vim-substitute";
export {
  findCommandEntry,
  parseLineCommand,
  parseLineRange,
  parseLineSpecifier,
  type CommandEntry,
  type CommandInput,
  type LineCommand,
  type LineCommandKind,
  type ParseResult,
  type SortOptions,
} from "./vim-ex-parser";
export {
  createExCommandContext,
  executeExCommand,
  getLine,
  getLineRange,
  runLineCommand,
  type ExCommandContext,
  type ExCommandPorts,
} from "./vim-ex-commands";
export {
  createBufferSettings,
  createVimSession,
  disposeVimSession,
  type VimData,
  type VimSession,
} from "./vim-session";
export {
  createTextBuffer,
  type InMemoryTextBuffer,
  type TextBufferOptions,
} from "./vim-buffer";
export { createNodeFileSystem } from "./vim-file-system";
