export type OperationKind = "character-wise" | "line-wise" | "block-wise";

export interface RegisterValue {
  text: string;
  kind: OperationKind;
}

export interface RegisterMap {
  registers: Record<string, RegisterValue>;
}

export const UNNAMED_REGISTER = '"';
export const BLACK_HOLE_REGISTER = "_";

// Display order for :registers.
export const REGISTER_NAMES = '"0123456789abcdefghijklmnopqrstuvwxyz-*+.:/';

const EMPTY_REGISTER: RegisterValue = { text: "", kind: "character-wise" };

export function createRegisterMap(): RegisterMap {
  return { registers: {} };
}

export function isValidRegisterName(name: string): boolean {
  return name.length === 1 && /^["0-9a-zA-Z\-*+.:/_]$/.test(name);
}

/** Registers the user may write to with :delete, :yank and friends. */
export function isWritableRegisterName(name: string): boolean {
  return isValidRegisterName(name) && !".:/".includes(name);
}

export function getRegister(map: RegisterMap, name: string): RegisterValue {
  return map.registers[name.toLowerCase()] ?? EMPTY_REGISTER;
}

/** Replaces the register content outright, without the yank/delete side effects. */
export function updateRegister(
  map: RegisterMap,
  name: string,
  text: string,
  kind: OperationKind
): void {
  map.registers[name.toLowerCase()] = { text, kind };
}

function writeRegister(
  map: RegisterMap,
  name: string,
  text: string,
  kind: OperationKind
): void {
  // Uppercase registers append to their lowercase equivalent
  if (/^[A-Z]$/.test(name)) {
    const lower = name.toLowerCase();
    const existing = map.registers[lower];
    if (!existing) {
      map.registers[lower] = { text, kind };
      return;
    }
    const linewise = existing.kind === "line-wise" || kind === "line-wise";
    const joiner =
      linewise && !existing.text.endsWith("\n") && existing.text !== ""
        ? "\n"
        : "";
    map.registers[lower] = {
      text: existing.text + joiner + text,
      kind: linewise ? "line-wise" : existing.kind,
    };
    return;
  }
  map.registers[name] = { text, kind };
}

function shiftNumberedRegisters(map: RegisterMap): void {
  for (let i = 9; i >= 2; i--) {
    const from = map.registers[(i - 1).toString()];
    if (from) {
      map.registers[i.toString()] = from;
    } else {
      delete map.registers[i.toString()];
    }
  }
}

export function saveYankRegister(
  map: RegisterMap,
  text: string,
  kind: OperationKind,
  register?: string
): void {
  const reg = register ?? UNNAMED_REGISTER;
  if (reg === BLACK_HOLE_REGISTER) return;

  writeRegister(map, reg, text, kind);
  if (reg !== UNNAMED_REGISTER) {
    writeRegister(map, UNNAMED_REGISTER, getRegister(map, reg).text, kind);
    return;
  }
  // Only an unnamed yank updates register 0.
  writeRegister(map, "0", text, kind);
}

export function saveDeleteRegister(
  map: RegisterMap,
  text: string,
  kind: OperationKind,
  register?: string
): void {
  const reg = register ?? UNNAMED_REGISTER;
  if (reg === BLACK_HOLE_REGISTER) return;

  if (reg !== UNNAMED_REGISTER) {
    writeRegister(map, reg, text, kind);
    writeRegister(map, UNNAMED_REGISTER, getRegister(map, reg).text, kind);
    return;
  }

  // Line deletes and anything spanning lines rotate the numbered registers;
  // small in-line deletes land in "-".
  if (kind === "line-wise" || text.includes("\n")) {
    shiftNumberedRegisters(map);
    writeRegister(map, "1", text, kind);
  } else {
    writeRegister(map, "-", text, kind);
  }
  writeRegister(map, UNNAMED_REGISTER, text, kind);
}

/**
 * The lines a register contributes when inserted line-wise. Line-wise text
 * carries one trailing newline that does not start another line.
 */
export function getRegisterLines(value: RegisterValue): string[] {
  const text =
    value.kind === "line-wise" && value.text.endsWith("\n")
      ? value.text.slice(0, -1)
      : value.text;
  return text.split("\n");
}

export function formatRegisterText(text: string): string {
  return text.replace(/\n/g, "^J").replace(/\t/g, "^I");
}
