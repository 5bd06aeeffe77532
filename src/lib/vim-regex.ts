import { log } from "./log";
import { failed, succeeded, type ExResult } from "./vim-types";

type MagicLevel = "very-magic" | "magic" | "nomagic" | "very-nomagic";

export interface VimPattern {
  source: string;
  /** Set by \c (ignore) or \C (match) inside the pattern. */
  caseOverride: "ignore" | "match" | undefined;
}

export interface VimRegexOptions {
  global: boolean;
  ignoreCase: boolean;
  smartCase: boolean;
  magic?: boolean;
}

const JS_SPECIAL = /[.*+?^${}()|[\]\\/]/;

function literal(ch: string): string {
  return JS_SPECIAL.test(ch) ? `\\${ch}` : ch;
}

const CLASS_ESCAPES: Record<string, string> = {
  s: "\\s",
  S: "\\S",
  d: "\\d",
  D: "\\D",
  w: "\\w",
  W: "\\W",
  a: "[A-Za-z]",
  A: "[^A-Za-z]",
  l: "[a-z]",
  L: "[^a-z]",
  u: "[A-Z]",
  U: "[^A-Z]",
  x: "[0-9A-Fa-f]",
  X: "[^0-9A-Fa-f]",
  h: "[A-Za-z_]",
  H: "[^A-Za-z_]",
  n: "\\n",
  t: "\\t",
  r: "\\r",
  e: "\\x1b",
};

/** Reads a \{...} or {...} body starting just past the "{". */
function readBraceQuantifier(
  pattern: string,
  start: number
): { quantifier: string; next: number } {
  let end = pattern.indexOf("}", start);
  if (end === -1) {
    return { quantifier: "\\{", next: start };
  }
  let body = pattern.slice(start, end);
  if (body.endsWith("\\")) body = body.slice(0, -1);
  end++;

  const lazy = body.startsWith("-");
  if (lazy) body = body.slice(1);

  let quantifier: string;
  if (body === "") {
    quantifier = "*";
  } else if (/^\d+$/.test(body)) {
    quantifier = `{${body}}`;
  } else if (/^\d*,\d*$/.test(body)) {
    const [min, max] = body.split(",");
    quantifier = `{${min === "" ? "0" : min},${max}}`;
  } else {
    return { quantifier: "\\{", next: start };
  }
  return { quantifier: lazy ? `${quantifier}?` : quantifier, next: end };
}

/** Copies a [...] collection; returns undefined when it never closes. */
function readCollection(
  pattern: string,
  start: number
): { source: string; next: number } | undefined {
  let i = start + 1;
  let body = "";
  if (pattern[i] === "^") {
    body += "^";
    i++;
  }
  if (pattern[i] === "]") {
    body += "\\]";
    i++;
  }
  while (i < pattern.length && pattern[i] !== "]") {
    const ch = pattern[i];
    if (ch === "\\" && i + 1 < pattern.length) {
      body += ch + pattern[i + 1];
      i += 2;
      continue;
    }
    body += ch === "[" ? "\\[" : ch;
    i++;
  }
  if (i >= pattern.length) return undefined;
  return { source: `[${body}]`, next: i + 1 };
}

/**
 * Translates a Vim regular expression to JavaScript source. Handles the
 * \v \m \M \V magic switches, \( \) groups, \| alternation, \{n,m} counts,
 * \< \> word edges, and the common character classes.
 */
export function translateVimPattern(
  pattern: string,
  magic = true
): VimPattern {
  let level: MagicLevel = magic ? "magic" : "nomagic";
  let caseOverride: VimPattern["caseOverride"];
  let out = "";
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === "\\") {
      const next = pattern[i + 1];
      i += 2;
      if (next === undefined) {
        out += "\\\\";
        continue;
      }
      switch (next) {
        case "v":
          level = "very-magic";
          continue;
        case "m":
          level = "magic";
          continue;
        case "M":
          level = "nomagic";
          continue;
        case "V":
          level = "very-nomagic";
          continue;
        case "c":
          caseOverride = "ignore";
          continue;
        case "C":
          caseOverride = "match";
          continue;
      }
      if (/[1-9]/.test(next)) {
        out += `\\${next}`;
        continue;
      }
      const cls = CLASS_ESCAPES[next];
      if (cls) {
        out += cls;
        continue;
      }
      if (level === "very-magic") {
        out += literal(next);
        continue;
      }
      switch (next) {
        case "<":
        case ">":
          out += "\\b";
          continue;
        case "(":
        case ")":
        case "|":
        case "+":
          out += next;
          continue;
        case "?":
        case "=":
          out += "?";
          continue;
        case "{": {
          const { quantifier, next: after } = readBraceQuantifier(pattern, i);
          out += quantifier;
          i = after;
          continue;
        }
      }
      if (level !== "magic" && ".*[~".includes(next)) {
        if (next === "[") {
          const collection = readCollection(pattern, i - 1);
          if (collection) {
            out += collection.source;
            i = collection.next;
            continue;
          }
        }
        out += next === "~" ? "~" : next;
        continue;
      }
      if (level === "very-nomagic" && (next === "^" || next === "$")) {
        out += next;
        continue;
      }
      out += literal(next);
      continue;
    }

    i++;
    if (level === "very-nomagic") {
      out += literal(ch);
      continue;
    }
    if (ch === "^" || ch === "$") {
      out += ch;
      continue;
    }
    if (level === "nomagic") {
      out += literal(ch);
      continue;
    }
    if (ch === "." || ch === "*") {
      out += ch;
      continue;
    }
    if (ch === "[") {
      const collection = readCollection(pattern, i - 1);
      if (collection) {
        out += collection.source;
        i = collection.next;
      } else {
        out += "\\[";
      }
      continue;
    }
    if (level === "very-magic") {
      if ("()|+?".includes(ch)) {
        out += ch;
        continue;
      }
      if (ch === "=") {
        out += "?";
        continue;
      }
      if (ch === "<" || ch === ">") {
        out += "\\b";
        continue;
      }
      if (ch === "{") {
        const { quantifier, next: after } = readBraceQuantifier(pattern, i);
        out += quantifier;
        i = after;
        continue;
      }
    }
    out += literal(ch);
  }

  return { source: out, caseOverride };
}

/** Whether the pattern has an uppercase letter outside a backslash escape. */
function hasUppercase(pattern: string): boolean {
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch >= "A" && ch <= "Z") {
      return true;
    }
  }
  return false;
}

/**
 * Builds the JavaScript RegExp for a Vim pattern. Fails with E383 when the
 * translated pattern does not compile.
 */
export function buildVimRegex(
  pattern: string,
  options: VimRegexOptions
): ExResult<RegExp> {
  const { source, caseOverride } = translateVimPattern(
    pattern,
    options.magic ?? true
  );

  let ignoreCase = options.ignoreCase;
  if (ignoreCase && options.smartCase && hasUppercase(pattern)) {
    ignoreCase = false;
  }
  if (caseOverride) {
    ignoreCase = caseOverride === "ignore";
  }

  const flags = `${options.global ? "g" : ""}${ignoreCase ? "i" : ""}`;
  try {
    return succeeded(new RegExp(source, flags));
  } catch (error) {
    log.warn(`Regex build failed. pattern="${pattern.slice(0, 200)}"`, error);
    return failed(`E383: Invalid search string: ${pattern}`);
  }
}

type CaseMode = "upper" | "lower" | undefined;

/**
 * Expands a :substitute replacement for one match. `&` and \0 insert the
 * whole match, \1..\9 groups, \u \l \U \L \E change case, \r splits the line
 * and \n inserts a NUL.
 */
export function expandVimReplacement(
  template: string,
  match: string,
  groups: readonly (string | undefined)[],
  magic = true
): string {
  let out = "";
  let spanCase: CaseMode;
  let onceCase: CaseMode;

  const append = (segment: string) => {
    for (const ch of segment) {
      let next = ch;
      if (onceCase) {
        next = onceCase === "upper" ? ch.toUpperCase() : ch.toLowerCase();
        onceCase = undefined;
      } else if (spanCase) {
        next = spanCase === "upper" ? ch.toUpperCase() : ch.toLowerCase();
      }
      out += next;
    }
  };

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];

    if (ch === "\\") {
      const next = template[i + 1];
      if (next === undefined) {
        append("\\");
        continue;
      }
      i++;
      if (/\d/.test(next)) {
        const idx = Number(next);
        append(idx === 0 ? match : groups[idx - 1] ?? "");
        continue;
      }
      switch (next) {
        case "U":
          spanCase = "upper";
          break;
        case "L":
          spanCase = "lower";
          break;
        case "E":
        case "e":
          spanCase = undefined;
          break;
        case "u":
          onceCase = "upper";
          break;
        case "l":
          onceCase = "lower";
          break;
        case "r":
          out += "\n";
          break;
        case "n":
          out += "\x00";
          break;
        case "t":
          append("\t");
          break;
        case "&":
          append(magic ? "&" : match);
          break;
        default:
          append(next);
      }
      continue;
    }

    if (ch === "&" && magic) {
      append(match);
      continue;
    }
    append(ch);
  }

  return out;
}

/** Replaces an unescaped `~` with the previous replacement string. */
export function substitutePreviousReplacement(
  template: string,
  previous: string,
  magic = true
): string {
  let out = "";
  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    if (ch === "\\" && i + 1 < template.length) {
      const next = template[i + 1];
      if (next === "~" && magic) {
        out += "\\~";
      } else if (next === "~") {
        out += previous;
      } else {
        out += ch + next;
      }
      i++;
      continue;
    }
    out += ch === "~" && magic ? previous : ch;
  }
  return out;
}
