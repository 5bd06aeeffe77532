import {
  canonicalizeKeyNotation,
  formatKeyInput,
  parseKeyNotation,
} from "./vim-key-notation";

export type KeyRemapMode =
  | "normal"
  | "visual"
  | "select"
  | "operator-pending"
  | "insert"
  | "command";

export const ALL_KEY_REMAP_MODES: readonly KeyRemapMode[] = [
  "normal",
  "visual",
  "select",
  "operator-pending",
  "insert",
  "command",
];

export const KEY_REMAP_MODE_LETTERS: Record<KeyRemapMode, string> = {
  normal: "n",
  visual: "x",
  select: "s",
  "operator-pending": "o",
  insert: "i",
  command: "c",
};

export interface KeyMapping {
  lhs: string;
  rhs: string;
  allowRemap: boolean;
}

/**
 * Per-mode remapping table, keyed by the canonical left-hand side. One table
 * lives for the whole session; later definitions of the same lhs in a mode
 * replace earlier ones.
 */
export interface KeyMapTable {
  mappings: Record<KeyRemapMode, Map<string, KeyMapping>>;
}

/** The mode letter(s) in front of map/noremap/unmap/mapclear. */
export type MapCommandPrefix = "" | "n" | "v" | "x" | "s" | "o" | "i" | "c";

const MAP_COMMAND_MODES: Record<MapCommandPrefix, readonly KeyRemapMode[]> = {
  "": ["normal", "visual", "select", "operator-pending"],
  n: ["normal"],
  v: ["visual", "select"],
  x: ["visual"],
  s: ["select"],
  o: ["operator-pending"],
  i: ["insert"],
  c: ["command"],
};

// :mapclear without a prefix clears command mode and leaves select mode alone,
// unlike :map. Hosts depend on this exact set.
const MAP_CLEAR_COMMAND_MODES: Record<
  MapCommandPrefix,
  readonly KeyRemapMode[]
> = {
  ...MAP_COMMAND_MODES,
  "": ["normal", "visual", "command", "operator-pending"],
};

const BANG_MODES: readonly KeyRemapMode[] = ["insert", "command"];

/** Modes for map/noremap/unmap; undefined when the bang is not allowed. */
export function getMapCommandModes(
  prefix: MapCommandPrefix,
  bang: boolean
): readonly KeyRemapMode[] | undefined {
  if (bang) {
    return prefix === "" ? BANG_MODES : undefined;
  }
  return MAP_COMMAND_MODES[prefix];
}

export function getMapClearCommandModes(
  prefix: MapCommandPrefix,
  bang: boolean
): readonly KeyRemapMode[] | undefined {
  if (bang) {
    return prefix === "" ? BANG_MODES : undefined;
  }
  return MAP_CLEAR_COMMAND_MODES[prefix];
}

export function createKeyMap(): KeyMapTable {
  return {
    mappings: {
      normal: new Map(),
      visual: new Map(),
      select: new Map(),
      "operator-pending": new Map(),
      insert: new Map(),
      command: new Map(),
    },
  };
}

export function mapKeys(
  table: KeyMapTable,
  lhs: string,
  rhs: string,
  mode: KeyRemapMode,
  allowRemap: boolean
): boolean {
  const key = canonicalizeKeyNotation(lhs);
  const value = canonicalizeKeyNotation(rhs);
  if (key === "" || value === "") {
    return false;
  }
  table.mappings[mode].set(key, { lhs: key, rhs: value, allowRemap });
  return true;
}

export function mapWithNoRemap(
  table: KeyMapTable,
  lhs: string,
  rhs: string,
  mode: KeyRemapMode
): boolean {
  return mapKeys(table, lhs, rhs, mode, false);
}

export function mapWithRemap(
  table: KeyMapTable,
  lhs: string,
  rhs: string,
  mode: KeyRemapMode
): boolean {
  return mapKeys(table, lhs, rhs, mode, true);
}

export function unmapKeys(
  table: KeyMapTable,
  lhs: string,
  mode: KeyRemapMode
): boolean {
  return table.mappings[mode].delete(canonicalizeKeyNotation(lhs));
}

export function clearKeyMappings(
  table: KeyMapTable,
  modes: readonly KeyRemapMode[]
): void {
  for (const mode of modes) {
    table.mappings[mode].clear();
  }
}

export function clearAllKeyMappings(table: KeyMapTable): void {
  clearKeyMappings(table, ALL_KEY_REMAP_MODES);
}

export function getKeyMappingsForMode(
  table: KeyMapTable,
  mode: KeyRemapMode
): KeyMapping[] {
  return [...table.mappings[mode].values()];
}

function startsWithKeys(lhs: string, prefix: readonly string[]): boolean {
  const keys = parseKeyNotation(lhs).map(formatKeyInput);
  return (
    keys.length >= prefix.length &&
    prefix.every((key, index) => keys[index] === key)
  );
}

/**
 * One line per mapping: mode letter, four spaces, lhs, a space, rhs.
 * With `lhsPrefix`, only mappings whose lhs starts with the same keys are
 * listed.
 */
export function formatKeyMappings(
  table: KeyMapTable,
  modes: readonly KeyRemapMode[],
  lhsPrefix?: string
): string[] {
  const prefix =
    lhsPrefix === undefined ? [] : parseKeyNotation(lhsPrefix).map(formatKeyInput);
  const lines: string[] = [];
  for (const mode of modes) {
    for (const mapping of table.mappings[mode].values()) {
      if (!startsWithKeys(mapping.lhs, prefix)) continue;
      lines.push(
        `${KEY_REMAP_MODE_LETTERS[mode]}    ${mapping.lhs} ${mapping.rhs}`
      );
    }
  }
  return lines;
}
