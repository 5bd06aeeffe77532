import { log } from "./log";
import { getErrorMessage, VimCommandError } from "./vim-errors";
import { parseLineCommand, type LineCommand, type SortOptions } from "./vim-ex-parser";
import {
  clearKeyMappings,
  formatKeyMappings,
  getMapClearCommandModes,
  getMapCommandModes,
  mapKeys,
  unmapKeys,
} from "./vim-key-map";
import {
  applyCount,
  resolveLineRange,
  resolveLineSpecifier,
  type LineRange,
  type LineSpecifier,
  type RangeContext,
  type ResolveOptions,
  type ResolvedRange,
} from "./vim-range";
import { buildVimRegex, expandVimReplacement, substitutePreviousReplacement } from "./vim-regex";
import {
  formatRegisterText,
  getRegister,
  getRegisterLines,
  isWritableRegisterName,
  REGISTER_NAMES,
  saveDeleteRegister,
  saveYankRegister,
  UNNAMED_REGISTER,
} from "./vim-registers";
import { createBufferSettings, type VimSession } from "./vim-session";
import {
  getNumberSetting,
  getToggleSetting,
  runSetArguments,
  setSetting,
  type LocalSettings,
} from "./vim-settings";
import {
  mergeSubstituteFlags,
  NO_SUBSTITUTE_FLAGS,
  type SubstituteFlags,
  type SubstituteFlagsAndCount,
} from "./vim-substitute";
import type {
  ExResult,
  VimFileSystem,
  VimFoldManager,
  VimHost,
  VimStatus,
  VimTextBuffer,
} from "./vim-types";
import {
  buildIndent,
  getLeadingWhitespace,
  getLines,
  joinLines,
  measureIndent,
  replaceLines,
  shiftLine,
} from "./vim-utils";

/** Everything one command may read or change. */
export interface ExCommandContext {
  session: VimSession;
  buffer: VimTextBuffer;
  localSettings: LocalSettings;
  status: VimStatus;
  host?: VimHost;
  foldManager?: VimFoldManager;
  fileSystem?: VimFileSystem;
}

export interface ExCommandPorts {
  status: VimStatus;
  host?: VimHost;
  foldManager?: VimFoldManager;
  fileSystem?: VimFileSystem;
  /** Defaults to a fresh copy of the session's local defaults. */
  localSettings?: LocalSettings;
}

export function createExCommandContext(
  session: VimSession,
  buffer: VimTextBuffer,
  ports: ExCommandPorts
): ExCommandContext {
  return {
    session,
    buffer,
    localSettings: ports.localSettings ?? createBufferSettings(session),
    status: ports.status,
    host: ports.host,
    foldManager: ports.foldManager,
    fileSystem: ports.fileSystem,
  };
}

function rangeContext(context: ExCommandContext): RangeContext {
  return {
    buffer: context.buffer,
    settings: context.localSettings,
    lastSearch: context.session.data.lastSearch,
  };
}

/** Resolves a single line specifier against the buffer and cursor. */
export function getLine(
  context: ExCommandContext,
  specifier: LineSpecifier,
  options: ResolveOptions = {}
): ExResult<number> {
  return resolveLineSpecifier(
    rangeContext(context),
    specifier,
    context.buffer.getCursorLine(),
    options
  );
}

export function getLineRange(
  context: ExCommandContext,
  range: LineRange | undefined,
  options: ResolveOptions = {}
): ExResult<ResolvedRange> {
  return resolveLineRange(rangeContext(context), range, options);
}

function requireRange(
  context: ExCommandContext,
  range: LineRange | undefined,
  options: ResolveOptions = {}
): ResolvedRange {
  const resolved = getLineRange(context, range, options);
  if (!resolved.succeeded) {
    throw new VimCommandError(resolved.error);
  }
  return resolved.value;
}

function requireCountedRange(
  context: ExCommandContext,
  range: LineRange | undefined,
  count: number | undefined
): ResolvedRange {
  return applyCount(rangeContext(context), requireRange(context, range), count);
}

function requireHost(context: ExCommandContext): VimHost {
  if (!context.host) {
    throw new VimCommandError("Tab navigation is not available");
  }
  return context.host;
}

function requireFoldManager(context: ExCommandContext): VimFoldManager {
  if (!context.foldManager) {
    throw new VimCommandError("Folding is not available");
  }
  return context.foldManager;
}

function requireFileSystem(context: ExCommandContext): VimFileSystem {
  if (!context.fileSystem) {
    throw new VimCommandError("File access is not available");
  }
  return context.fileSystem;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

function runSet(context: ExCommandContext, text: string): void {
  const lines = runSetArguments(context.localSettings, text);
  if (lines.length > 0) {
    context.status.report(lines.join("\n"));
  }
}

function runMapKeys(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "map-keys" }>
): void {
  const modes = getMapCommandModes(command.prefix, command.bang);
  if (!modes) {
    throw new VimCommandError("No ! allowed", 477);
  }
  const keyMap = context.session.keyMap;

  if (command.rhs === undefined) {
    const lines = formatKeyMappings(keyMap, modes, command.lhs);
    context.status.report(lines.length > 0 ? lines.join("\n") : "No mapping found");
    return;
  }

  const lhs = command.lhs ?? "";
  for (const mode of modes) {
    if (!mapKeys(keyMap, lhs, command.rhs, mode, command.allowRemap)) {
      throw new VimCommandError(`Invalid argument: ${lhs}`, 474);
    }
  }
}

function runUnmapKeys(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "unmap-keys" }>
): void {
  const modes = getMapCommandModes(command.prefix, command.bang);
  if (!modes) {
    throw new VimCommandError("No ! allowed", 477);
  }
  let removed = false;
  for (const mode of modes) {
    removed = unmapKeys(context.session.keyMap, command.lhs, mode) || removed;
  }
  if (!removed) {
    throw new VimCommandError("No such mapping", 31);
  }
}

function runMapClear(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "map-clear" }>
): void {
  const modes = getMapClearCommandModes(command.prefix, command.bang);
  if (!modes) {
    throw new VimCommandError("No ! allowed", 477);
  }
  clearKeyMappings(context.session.keyMap, modes);
}

// Always line-wise, whatever shape the register recorded.
function runPut(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "put" }>
): void {
  const name = command.register ?? UNNAMED_REGISTER;
  const value = getRegister(context.session.registers, name);
  if (value.text === "") {
    throw new VimCommandError(`Nothing in register ${name}`, 353);
  }

  const { end } = requireRange(context, command.range, { allowLineZero: true });
  const lines = getRegisterLines(value);
  const insertAt = command.bang ? Math.max(end, 0) : end + 1;
  context.buffer.insertLines(insertAt, lines);
  context.buffer.setCursorLine(insertAt + lines.length - 1);
}

/**
 * Rewrites leading whitespace. Without a bang, runs that contain no tab are
 * left alone. Widths are measured with the current tabstop and rebuilt with
 * the new one.
 */
function runRetab(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "retab" }>
): void {
  const settings = context.localSettings;
  const oldTabStop = getNumberSetting(settings, "tabstop");
  const newTabStop = command.tabStop ?? oldTabStop;
  const expandTab = getToggleSetting(settings, "expandtab");
  const { start, end } = requireRange(
    context,
    command.range ?? { kind: "entire-buffer" }
  );

  const edits: Array<{ line: number; text: string }> = [];
  for (let line = start; line <= end; line++) {
    const text = context.buffer.getLine(line);
    const indent = getLeadingWhitespace(text);
    if (indent === "" || (!command.bang && !indent.includes("\t"))) continue;

    const rebuilt = buildIndent(measureIndent(indent, oldTabStop), newTabStop, expandTab);
    if (rebuilt !== indent) {
      edits.push({ line, text: rebuilt + text.slice(indent.length) });
    }
  }

  for (const edit of edits) {
    context.buffer.setLine(edit.line, edit.text);
  }
  if (command.tabStop !== undefined) {
    setSetting(settings, "tabstop", newTabStop);
  }
}

interface LineReplacement {
  text: string;
  matches: number;
}

function replaceMatches(
  line: string,
  regex: RegExp,
  replaceAll: boolean,
  render: (match: RegExpExecArray) => string
): LineReplacement {
  let text = "";
  let matches = 0;
  let lastIndex = 0;
  regex.lastIndex = 0;

  let match = regex.exec(line);
  while (match) {
    matches++;
    text += line.slice(lastIndex, match.index) + render(match);
    lastIndex = match.index + match[0].length;
    if (!replaceAll) break;
    if (match[0] === "") {
      if (lastIndex >= line.length) break;
      text += line[lastIndex];
      lastIndex++;
    }
    regex.lastIndex = lastIndex;
    match = regex.exec(line);
  }
  return { text: text + line.slice(lastIndex), matches };
}

interface SubstituteRequest {
  range: LineRange | undefined;
  pattern: string;
  replacement: string;
  flags: SubstituteFlags;
  count: number | undefined;
}

function runSubstituteRequest(
  context: ExCommandContext,
  request: SubstituteRequest
): void {
  const settings = context.localSettings;
  const { flags } = request;
  const magic = getToggleSetting(settings, "magic");
  const replaceAll = getToggleSetting(settings, "gdefault")
    ? !flags.replaceAll
    : flags.replaceAll;
  const { start, end } = requireCountedRange(context, request.range, request.count);

  const regex = buildVimRegex(request.pattern, {
    global: true,
    ignoreCase:
      flags.ignoreCase ||
      (!flags.matchCase && getToggleSetting(settings, "ignorecase")),
    smartCase:
      !flags.ignoreCase && !flags.matchCase && getToggleSetting(settings, "smartcase"),
    magic,
  });
  if (!regex.succeeded) {
    throw new VimCommandError(regex.error);
  }

  const replacements = new Map<number, string[]>();
  let matchCount = 0;
  let lineCount = 0;
  for (let line = start; line <= end; line++) {
    const original = context.buffer.getLine(line);
    const result = replaceMatches(original, regex.value, replaceAll, (match) =>
      expandVimReplacement(request.replacement, match[0], match.slice(1), magic)
    );
    if (result.matches === 0) continue;
    matchCount += result.matches;
    lineCount++;
    if (!flags.reportOnly) {
      replacements.set(line, result.text.split("\n"));
    }
  }

  if (matchCount === 0) {
    if (flags.suppressError) return;
    throw new VimCommandError(`Pattern not found: ${request.pattern}`, 486);
  }

  context.session.data.lastSubstitute = {
    pattern: request.pattern,
    replacement: request.replacement,
    flags,
  };
  context.session.data.lastSearch = { pattern: request.pattern, direction: "forward" };

  if (flags.reportOnly) {
    const matches = `${matchCount} match${matchCount === 1 ? "" : "es"}`;
    context.status.report(`${matches} on ${plural(lineCount, "line")}`);
    return;
  }

  // Bottom-up so earlier line numbers stay valid while lines split.
  const changed = [...replacements.keys()].sort((a, b) => b - a);
  for (const line of changed) {
    const lines = replacements.get(line) ?? [];
    if (lines.length === 1) {
      context.buffer.setLine(line, lines[0]);
    } else {
      replaceLines(context.buffer, line, 1, lines);
    }
  }

  let lastLine = start;
  let added = 0;
  for (const line of [...changed].reverse()) {
    lastLine = line + added;
    added += (replacements.get(line)?.length ?? 1) - 1;
  }
  context.buffer.setCursorLine(lastLine);

  if (lineCount > getNumberSetting(settings, "report")) {
    context.status.report(
      `${plural(matchCount, "substitution")} on ${plural(lineCount, "line")}`
    );
  }
  if (flags.printLast) {
    context.status.report(context.buffer.getLine(lastLine));
  }
}

function runSubstitute(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "substitute" }>
): void {
  const { argument } = command;
  const data = context.session.data;
  const last = data.lastSubstitute;

  const pattern =
    argument.pattern !== "" ? argument.pattern : last?.pattern ?? data.lastSearch?.pattern;
  if (pattern === undefined || pattern === "") {
    throw new VimCommandError("No previous regular expression", 35);
  }

  const reuseFlags =
    argument.keepFlags || (argument.pattern === "" && argument.flags === undefined);
  let flags: SubstituteFlags = reuseFlags && last ? last.flags : { ...NO_SUBSTITUTE_FLAGS };
  if (argument.flags) {
    flags = mergeSubstituteFlags(flags, argument.flags);
  }

  runSubstituteRequest(context, {
    range: command.range,
    pattern,
    replacement: substitutePreviousReplacement(
      argument.replacement,
      last?.replacement ?? "",
      getToggleSetting(context.localSettings, "magic")
    ),
    flags,
    count: argument.count,
  });
}

function runSubstituteRepeat(
  context: ExCommandContext,
  range: LineRange | undefined,
  tail: SubstituteFlagsAndCount
): void {
  const last = context.session.data.lastSubstitute;
  if (!last) {
    throw new VimCommandError("No previous regular expression", 35);
  }
  let flags: SubstituteFlags = tail.keepFlags ? last.flags : { ...NO_SUBSTITUTE_FLAGS };
  if (tail.flags) {
    flags = mergeSubstituteFlags(flags, tail.flags);
  }
  runSubstituteRequest(context, {
    range,
    pattern: last.pattern,
    replacement: last.replacement,
    flags,
    count: tail.count,
  });
}

function registerFor(name: string | undefined): string | undefined {
  if (name !== undefined && !isWritableRegisterName(name)) {
    throw new VimCommandError("Invalid register name", 354);
  }
  return name;
}

function runDelete(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "delete" }>
): void {
  const register = registerFor(command.register);
  const { start, end } = requireCountedRange(context, command.range, command.count);
  const lines = getLines(context.buffer, start, end);

  saveDeleteRegister(
    context.session.registers,
    `${lines.join("\n")}\n`,
    "line-wise",
    register
  );
  context.buffer.deleteLines(start, lines.length);
  context.buffer.setCursorLine(Math.min(start, context.buffer.getLineCount() - 1));
}

function runYank(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "yank" }>
): void {
  const register = registerFor(command.register);
  const { start, end } = requireCountedRange(context, command.range, command.count);
  saveYankRegister(
    context.session.registers,
    `${getLines(context.buffer, start, end).join("\n")}\n`,
    "line-wise",
    register
  );
}

function runJoin(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "join" }>
): void {
  const resolved = requireCountedRange(context, command.range, command.count);
  const lastLine = context.buffer.getLineCount() - 1;
  const start = resolved.start;
  let end = resolved.end;
  if (start === end && command.count === undefined) {
    end = start + 1;
  }
  end = Math.min(end, lastLine);
  if (end <= start) return;

  const joined = joinLines(getLines(context.buffer, start, end), command.bang);
  context.buffer.setLine(start, joined);
  context.buffer.deleteLines(start + 1, end - start);
  context.buffer.setCursorLine(start);
}

function requireDestination(
  context: ExCommandContext,
  destination: LineSpecifier
): number {
  const line = getLine(context, destination, { allowLineZero: true });
  if (!line.succeeded) {
    throw new VimCommandError(line.error);
  }
  return line.value;
}

function runCopy(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "copy-to" }>
): void {
  const { start, end } = requireRange(context, command.range);
  const destination = requireDestination(context, command.destination);
  const lines = getLines(context.buffer, start, end);
  context.buffer.insertLines(destination + 1, lines);
  context.buffer.setCursorLine(destination + lines.length);
}

function runMove(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "move-to" }>
): void {
  const { start, end } = requireRange(context, command.range);
  const destination = requireDestination(context, command.destination);
  if (destination >= start && destination < end) {
    throw new VimCommandError("Cannot move a range of lines into itself", 134);
  }

  const lines = getLines(context.buffer, start, end);
  const buffer = context.buffer;
  if (destination >= end) {
    buffer.insertLines(destination + 1, lines);
    buffer.deleteLines(start, lines.length);
    buffer.setCursorLine(destination);
  } else {
    buffer.deleteLines(start, lines.length);
    buffer.insertLines(destination + 1, lines);
    buffer.setCursorLine(destination + lines.length);
  }
}

function runShift(
  context: ExCommandContext,
  range: LineRange | undefined,
  levels: number,
  count: number | undefined
): void {
  const settings = context.localSettings;
  const options = {
    shiftWidth: getNumberSetting(settings, "shiftwidth"),
    tabStop: getNumberSetting(settings, "tabstop"),
    expandTab: getToggleSetting(settings, "expandtab"),
    shiftRound: getToggleSetting(settings, "shiftround"),
  };
  const { start, end } = requireCountedRange(context, range, count);

  const shifted = getLines(context.buffer, start, end).map((line) =>
    shiftLine(line, levels, options)
  );
  shifted.forEach((text, index) => {
    if (context.buffer.getLine(start + index) !== text) {
      context.buffer.setLine(start + index, text);
    }
  });
  context.buffer.setCursorLine(end);
}

function runJumpToLine(context: ExCommandContext, range: LineRange): void {
  const { end } = requireRange(context, range, { allowLineZero: true });
  context.buffer.setCursorLine(Math.max(end, 0));
}

function runWrite(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "write" }>
): void {
  const fileSystem = requireFileSystem(context);
  const bufferPath = context.buffer.getFilePath();
  const filePath = command.filePath ?? bufferPath;
  if (!filePath) {
    throw new VimCommandError("No file name", 32);
  }
  if (
    command.filePath !== undefined &&
    command.filePath !== bufferPath &&
    !command.bang &&
    fileSystem.exists(filePath)
  ) {
    throw new VimCommandError("File exists (add ! to override)", 13);
  }

  const { start, end } = requireRange(
    context,
    command.range ?? { kind: "entire-buffer" }
  );
  const lines = getLines(context.buffer, start, end);
  fileSystem.writeLines(filePath, lines);
  context.status.report(`"${filePath}" ${lines.length}L written`);
}

function runRead(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "read" }>
): void {
  const fileSystem = requireFileSystem(context);
  const filePath = command.filePath ?? context.buffer.getFilePath();
  if (!filePath) {
    throw new VimCommandError("No file name", 32);
  }
  if (!fileSystem.exists(filePath)) {
    throw new VimCommandError(`Can't open file ${filePath}`, 484);
  }

  const { end } = requireRange(context, command.range, { allowLineZero: true });
  const lines = fileSystem.readLines(filePath);
  context.buffer.insertLines(end + 1, lines);
  context.buffer.setCursorLine(end + 1);
}

function runDisplayRegisters(
  context: ExCommandContext,
  names: string | undefined
): void {
  const wanted = names?.toLowerCase();
  const lines = ["--- Registers ---"];
  for (const name of REGISTER_NAMES) {
    if (wanted !== undefined && !wanted.includes(name)) continue;
    const value = getRegister(context.session.registers, name);
    if (value.text === "") continue;
    lines.push(`"${name}   ${formatRegisterText(value.text)}`);
  }
  context.status.report(lines.join("\n"));
}

function compareLines(a: string, b: string, options: SortOptions): number {
  if (options.numeric) {
    const first = /-?\d+/.exec(a);
    const second = /-?\d+/.exec(b);
    // Lines without a number sort first.
    if (!first || !second) {
      return (first ? 1 : 0) - (second ? 1 : 0);
    }
    return Number(first[0]) - Number(second[0]);
  }
  const left = options.ignoreCase ? a.toLowerCase() : a;
  const right = options.ignoreCase ? b.toLowerCase() : b;
  return left < right ? -1 : left > right ? 1 : 0;
}

function runSort(
  context: ExCommandContext,
  command: Extract<LineCommand, { kind: "sort" }>
): void {
  const { options } = command;
  const { start, end } = requireRange(
    context,
    command.range ?? { kind: "entire-buffer" }
  );
  const lines = getLines(context.buffer, start, end);

  const sorted = [...lines].sort((a, b) => {
    const order = compareLines(a, b, options);
    return options.reverse ? -order : order;
  });
  const result = options.unique
    ? sorted.filter(
        (line, index) => index === 0 || compareLines(sorted[index - 1], line, options) !== 0
      )
    : sorted;

  result.forEach((text, index) => context.buffer.setLine(start + index, text));
  if (result.length < lines.length) {
    context.buffer.deleteLines(start + result.length, lines.length - result.length);
  }
}

function runCommand(context: ExCommandContext, command: LineCommand): void {
  switch (command.kind) {
    case "set":
      return runSet(context, command.arguments);
    case "map-keys":
      return runMapKeys(context, command);
    case "unmap-keys":
      return runUnmapKeys(context, command);
    case "map-clear":
      return runMapClear(context, command);
    case "put":
      return runPut(context, command);
    case "retab":
      return runRetab(context, command);
    case "substitute":
      return runSubstitute(context, command);
    case "substitute-repeat":
      return runSubstituteRepeat(context, command.range, command.tail);
    case "tab-next":
      return requireHost(context).goToTab("forward", command.count ?? 1);
    case "tab-previous":
      return requireHost(context).goToTab("backward", command.count ?? 1);
    case "delete":
      return runDelete(context, command);
    case "yank":
      return runYank(context, command);
    case "join":
      return runJoin(context, command);
    case "copy-to":
      return runCopy(context, command);
    case "move-to":
      return runMove(context, command);
    case "shift-left":
      return runShift(context, command.range, -command.depth, command.count);
    case "shift-right":
      return runShift(context, command.range, command.depth, command.count);
    case "jump-to-line":
      return runJumpToLine(context, command.range);
    case "nop":
      return;
    case "fold": {
      const { start, end } = requireRange(context, command.range);
      return requireFoldManager(context).createFold(start, end);
    }
    case "fold-open": {
      const { start, end } = requireRange(context, command.range);
      return requireFoldManager(context).openFolds(start, end, command.bang);
    }
    case "fold-close": {
      const { start, end } = requireRange(context, command.range);
      return requireFoldManager(context).closeFolds(start, end, command.bang);
    }
    case "write":
      return runWrite(context, command);
    case "read":
      return runRead(context, command);
    case "display-registers":
      return runDisplayRegisters(context, command.names);
    case "sort":
      return runSort(context, command);
    default: {
      const unhandled: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Runs one parsed command. Failures are reported on the status port and
 * never thrown; returns whether the command succeeded.
 */
export function runLineCommand(
  context: ExCommandContext,
  command: LineCommand
): boolean {
  if (context.session.disposed) {
    context.status.reportError("Session has been disposed");
    return false;
  }

  log.debug(`Running :${command.kind}`);
  try {
    runCommand(context, command);
    return true;
  } catch (error) {
    if (error instanceof VimCommandError) {
      context.status.reportError(error.message);
    } else {
      log.error(`:${command.kind} failed`, error);
      context.status.reportError(getErrorMessage(error));
    }
    return false;
  }
}

/** Parses and runs a command line such as ":%s/a/b/g". */
export function executeExCommand(context: ExCommandContext, text: string): boolean {
  const parsed = parseLineCommand(text);
  if (!parsed.succeeded) {
    context.status.reportError(parsed.error);
    return false;
  }
  return runLineCommand(context, parsed.value);
}
