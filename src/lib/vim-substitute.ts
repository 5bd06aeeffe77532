import { failed, succeeded, type ExResult } from "./vim-types";

export interface SubstituteFlags {
  /** g */
  replaceAll: boolean;
  /** i */
  ignoreCase: boolean;
  /** I */
  matchCase: boolean;
  /** n: count matches, change nothing */
  reportOnly: boolean;
  /** e: no error when the pattern is missing */
  suppressError: boolean;
  /** p, #, l */
  printLast: boolean;
  /** c: accepted; there is no prompt to confirm with */
  confirm: boolean;
}

export const NO_SUBSTITUTE_FLAGS: Readonly<SubstituteFlags> = Object.freeze({
  replaceAll: false,
  ignoreCase: false,
  matchCase: false,
  reportOnly: false,
  suppressError: false,
  printLast: false,
  confirm: false,
});

/** The last successful :substitute, reused by an empty pattern, :& and :s. */
export interface SubstituteData {
  pattern: string;
  replacement: string;
  flags: SubstituteFlags;
}

export interface SubstituteFlagsAndCount {
  /** Undefined when no flag letters were given. */
  flags: SubstituteFlags | undefined;
  /** Leading `&`: start from the previous substitute's flags. */
  keepFlags: boolean;
  count: number | undefined;
}

export interface SubstituteArgument extends SubstituteFlagsAndCount {
  /** Empty means "use the previous pattern". */
  pattern: string;
  replacement: string;
}

const FLAG_SETTERS: Record<string, keyof SubstituteFlags> = {
  g: "replaceAll",
  i: "ignoreCase",
  I: "matchCase",
  n: "reportOnly",
  e: "suppressError",
  p: "printLast",
  "#": "printLast",
  l: "printLast",
  c: "confirm",
};

export function mergeSubstituteFlags(
  base: SubstituteFlags,
  extra: SubstituteFlags
): SubstituteFlags {
  return {
    replaceAll: base.replaceAll !== extra.replaceAll,
    ignoreCase: extra.ignoreCase || (base.ignoreCase && !extra.matchCase),
    matchCase: extra.matchCase || (base.matchCase && !extra.ignoreCase),
    reportOnly: base.reportOnly || extra.reportOnly,
    suppressError: base.suppressError || extra.suppressError,
    printLast: base.printLast || extra.printLast,
    confirm: base.confirm || extra.confirm,
  };
}

export function isValidSubstituteDelimiter(ch: string): boolean {
  return !/[a-zA-Z0-9\\"|\s]/.test(ch);
}

/**
 * Reads up to an unescaped `delimiter`. An escaped delimiter loses its
 * backslash; every other escape is kept for the pattern translator.
 */
function readUntilDelimiter(
  input: string,
  delimiter: string
): { part: string; remaining: string; terminated: boolean } {
  let part = "";
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch === "\\" && i + 1 < input.length) {
      const next = input[i + 1];
      part += next === delimiter ? delimiter : ch + next;
      i += 2;
      continue;
    }
    if (ch === delimiter) {
      return { part, remaining: input.slice(i + 1), terminated: true };
    }
    part += ch;
    i++;
  }
  return { part, remaining: "", terminated: false };
}

/** Parses `[&][flags] [count]`, the tail shared by :s and :&. */
export function parseSubstituteFlagsAndCount(
  text: string
): ExResult<SubstituteFlagsAndCount> {
  let i = 0;
  let keepFlags = false;
  if (text[0] === "&") {
    keepFlags = true;
    i = 1;
  }

  let flags: SubstituteFlags | undefined;
  while (i < text.length && FLAG_SETTERS[text[i]] !== undefined) {
    flags ??= { ...NO_SUBSTITUTE_FLAGS };
    const key = FLAG_SETTERS[text[i]];
    flags[key] = key === "replaceAll" ? !flags.replaceAll : true;
    i++;
  }

  const rest = text.slice(i).trim();
  if (rest === "") {
    return succeeded({ flags, keepFlags, count: undefined });
  }
  if (!/^\d+$/.test(rest)) {
    return failed(`E488: Trailing characters: ${rest}`);
  }
  const count = Number(rest);
  if (count === 0) {
    return failed("E939: Positive count required");
  }
  return succeeded({ flags, keepFlags, count });
}

/**
 * Parses the text after `:s`: `{delim}pattern{delim}replacement{delim}flags
 * count`. Trailing delimiters may be left off.
 */
export function parseSubstituteArgument(
  text: string
): ExResult<SubstituteArgument> {
  const delimiter = text[0];
  if (delimiter === undefined || !isValidSubstituteDelimiter(delimiter)) {
    return failed("E146: Regular expressions can't be delimited by letters");
  }

  const pattern = readUntilDelimiter(text.slice(1), delimiter);
  if (!pattern.terminated) {
    return succeeded({
      pattern: pattern.part,
      replacement: "",
      flags: undefined,
      keepFlags: false,
      count: undefined,
    });
  }

  const replacement = readUntilDelimiter(pattern.remaining, delimiter);
  const tail = parseSubstituteFlagsAndCount(replacement.remaining);
  if (!tail.succeeded) {
    return tail;
  }
  return succeeded({
    pattern: pattern.part,
    replacement: replacement.part,
    ...tail.value,
  });
}
