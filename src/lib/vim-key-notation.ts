export type KeyModifier = "control" | "shift" | "alt" | "command";

/**
 * A single key press. `key` is either one character or the canonical name of
 * a special key ("Esc", "CR", "F5", ...).
 */
export interface KeyInput {
  key: string;
  modifiers: readonly KeyModifier[];
}

const MODIFIER_ORDER: readonly KeyModifier[] = [
  "control",
  "shift",
  "alt",
  "command",
];

const MODIFIER_PREFIX: Record<KeyModifier, string> = {
  control: "C-",
  shift: "S-",
  alt: "M-",
  command: "D-",
};

const MODIFIER_BY_LETTER: Record<string, KeyModifier> = {
  c: "control",
  s: "shift",
  a: "alt",
  m: "alt",
  d: "command",
};

const NAMED_KEYS: Record<string, string> = {
  esc: "Esc",
  tab: "Tab",
  cr: "CR",
  return: "CR",
  enter: "CR",
  nl: "NL",
  newline: "NL",
  linefeed: "NL",
  lf: "NL",
  bs: "BS",
  backspace: "BS",
  ff: "FF",
  nul: "Nul",
  del: "Del",
  delete: "Del",
  insert: "Insert",
  home: "Home",
  end: "End",
  pageup: "PageUp",
  pagedown: "PageDown",
  up: "Up",
  down: "Down",
  left: "Left",
  right: "Right",
  help: "Help",
  undo: "Undo",
};

for (let i = 1; i <= 12; i++) {
  NAMED_KEYS[`f${i}`] = `F${i}`;
}

// Names that stand for a printable character rather than a special key.
const NAMED_CHARACTERS: Record<string, string> = {
  space: " ",
  lt: "<",
  bar: "|",
  bslash: "\\",
};

// Raw control characters that read as their named key.
const CONTROL_CHARACTER_KEYS: Record<string, string> = {
  "\x00": "Nul",
  "\b": "BS",
  "\t": "Tab",
  "\n": "NL",
  "\f": "FF",
  "\r": "CR",
  "\x1b": "Esc",
};

// Historical <C-x> spellings of keys that have their own name.
const CONTROL_ALIASES: Record<string, string> = {
  "[": "Esc",
  "@": "Nul",
  i: "Tab",
  j: "NL",
  m: "CR",
};

function isLetter(ch: string): boolean {
  return /^[a-zA-Z]$/.test(ch);
}

function normalizeKeyInput(key: string, modifiers: KeyModifier[]): KeyInput {
  let mods = MODIFIER_ORDER.filter((m) => modifiers.includes(m));

  if (mods.includes("shift") && key.length === 1 && isLetter(key)) {
    key = key.toUpperCase();
    mods = mods.filter((m) => m !== "shift");
  }

  if (mods.includes("control") && key.length === 1) {
    const alias = CONTROL_ALIASES[key.toLowerCase()];
    if (alias) {
      key = alias;
      mods = mods.filter((m) => m !== "control");
    } else if (isLetter(key)) {
      key = key.toUpperCase();
    }
  }

  return { key, modifiers: mods };
}

function parseBracketContent(content: string): KeyInput | undefined {
  const modifiers: KeyModifier[] = [];
  let rest = content;
  while (rest.length > 2 && rest[1] === "-") {
    const modifier = MODIFIER_BY_LETTER[rest[0].toLowerCase()];
    if (!modifier) break;
    modifiers.push(modifier);
    rest = rest.slice(2);
  }

  const lower = rest.toLowerCase();
  if (rest.length === 1) {
    // "<a>" is not key notation; only modified single characters are.
    if (modifiers.length === 0) return undefined;
    return normalizeKeyInput(rest, modifiers);
  }
  const namedCharacter = NAMED_CHARACTERS[lower];
  if (namedCharacter !== undefined) {
    return normalizeKeyInput(namedCharacter, modifiers);
  }
  const named = NAMED_KEYS[lower];
  if (named !== undefined) {
    return normalizeKeyInput(named, modifiers);
  }
  return undefined;
}

/**
 * Reads one bracketed key at `start` (which must point at "<").
 * Returns the key and the index just past the closing ">".
 */
function readBracketKey(
  text: string,
  start: number
): { key: KeyInput; next: number } | undefined {
  let end = text.indexOf(">", start + 1);
  if (end === -1) return undefined;

  // "<C->>" names the ">" key itself.
  if (text[end - 1] === "-" && text[end + 1] === ">" && end - start > 2) {
    end++;
  }

  const key = parseBracketContent(text.slice(start + 1, end));
  return key ? { key, next: end + 1 } : undefined;
}

export function parseKeyNotation(text: string): KeyInput[] {
  const keys: KeyInput[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "<") {
      const bracket = readBracketKey(text, i);
      if (bracket) {
        keys.push(bracket.key);
        i = bracket.next;
        continue;
      }
    }

    const controlKey = CONTROL_CHARACTER_KEYS[ch];
    keys.push({ key: controlKey ?? ch, modifiers: [] });
    i++;
  }
  return keys;
}

function formatKeyName(key: string): string {
  if (key === " ") return "Space";
  if (key === "<") return "lt";
  return key;
}

export function formatKeyInput(input: KeyInput): string {
  if (input.modifiers.length === 0) {
    if (input.key === " ") return "<Space>";
    return input.key.length === 1 ? input.key : `<${input.key}>`;
  }
  const prefix = input.modifiers.map((m) => MODIFIER_PREFIX[m]).join("");
  return `<${prefix}${formatKeyName(input.key)}>`;
}

export function formatKeyInputs(keys: readonly KeyInput[]): string {
  let out = "";
  for (let i = keys.length - 1; i >= 0; i--) {
    const key = keys[i];
    const text = formatKeyInput(key);
    // A bare "<" that would read back as the start of a key name.
    if (text === "<" && readBracketKey(text + out, 0)) {
      out = "<lt>" + out;
    } else {
      out = text + out;
    }
  }
  return out;
}

/**
 * Canonical spelling of a key sequence, used as the key-map storage key and
 * for display. Idempotent.
 */
export function canonicalizeKeyNotation(text: string): string {
  return formatKeyInputs(parseKeyNotation(text));
}
