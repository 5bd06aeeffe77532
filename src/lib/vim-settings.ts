import { z } from "zod";
import definitionsJson from "./data/vim-option-definitions.json";
import { VimCommandError } from "./vim-errors";

const definitionBase = {
  name: z.string().min(1),
  abbreviation: z.string().min(1),
  scope: z.enum(["global", "local"]),
  commaList: z.boolean().default(false),
};

const OptionDefinitionSchema = z.discriminatedUnion("kind", [
  z.object({
    ...definitionBase,
    kind: z.literal("toggle"),
    default: z.boolean(),
  }),
  z.object({
    ...definitionBase,
    kind: z.literal("number"),
    default: z.number().int(),
  }),
  z.object({
    ...definitionBase,
    kind: z.literal("string"),
    default: z.string(),
  }),
]);

export type OptionDefinition = z.infer<typeof OptionDefinitionSchema>;
export type SettingKind = OptionDefinition["kind"];
export type SettingScope = OptionDefinition["scope"];
export type SettingValue = string | number | boolean;

/** Registration order; listings follow it. */
export const OPTION_DEFINITIONS: readonly OptionDefinition[] = z
  .array(OptionDefinitionSchema)
  .parse(definitionsJson);

const VALUE_SCHEMAS = {
  toggle: z.boolean(),
  number: z.number().int(),
  string: z.string(),
} satisfies Record<SettingKind, z.ZodType<SettingValue>>;

const NumberTextSchema = z
  .string()
  .regex(/^(-?\d+|0[xX][0-9a-fA-F]+)$/)
  .transform(Number);

export interface GlobalSettings {
  scope: "global";
  values: Map<string, SettingValue>;
}

/**
 * Buffer-local options. Reads and writes of global-scoped options go through
 * to `globalSettings`, so one store answers for every option name.
 */
export interface LocalSettings {
  scope: "local";
  values: Map<string, SettingValue>;
  globalSettings: GlobalSettings;
}

export type SettingsStore = GlobalSettings | LocalSettings;

export function findOptionDefinition(
  name: string
): OptionDefinition | undefined {
  return OPTION_DEFINITIONS.find(
    (def) => def.name === name || def.abbreviation === name
  );
}

function defaultValues(scope: SettingScope): Map<string, SettingValue> {
  const values = new Map<string, SettingValue>();
  for (const def of OPTION_DEFINITIONS) {
    if (def.scope === scope) values.set(def.name, def.default);
  }
  return values;
}

export function createGlobalSettings(): GlobalSettings {
  return { scope: "global", values: defaultValues("global") };
}

export function createLocalSettings(
  globalSettings: GlobalSettings
): LocalSettings {
  return { scope: "local", values: defaultValues("local"), globalSettings };
}

function requireDefinition(name: string): OptionDefinition {
  const def = findOptionDefinition(name);
  if (!def) {
    throw new VimCommandError(`Unknown option: ${name}`, 518);
  }
  return def;
}

function valuesFor(
  store: SettingsStore,
  def: OptionDefinition
): Map<string, SettingValue> {
  if (def.scope === "global") {
    return store.scope === "global" ? store.values : store.globalSettings.values;
  }
  if (store.scope === "global") {
    throw new VimCommandError(`Unknown option: ${def.name}`, 518);
  }
  return store.values;
}

function readValue(store: SettingsStore, def: OptionDefinition): SettingValue {
  return valuesFor(store, def).get(def.name) ?? def.default;
}

function writeValue(
  store: SettingsStore,
  def: OptionDefinition,
  value: unknown
): void {
  const schema: z.ZodType<SettingValue> = VALUE_SCHEMAS[def.kind];
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new VimCommandError(
      `Invalid argument: ${def.name}=${String(value)}`,
      474
    );
  }
  valuesFor(store, def).set(def.name, parsed.data);
}

function requireToggle(def: OptionDefinition): void {
  if (def.kind !== "toggle") {
    throw new VimCommandError(`Invalid argument: ${def.name}`, 474);
  }
}

export function getSetting(store: SettingsStore, name: string): SettingValue {
  return readValue(store, requireDefinition(name));
}

export function setSetting(
  store: SettingsStore,
  name: string,
  value: SettingValue
): void {
  writeValue(store, requireDefinition(name), value);
}

export function getToggleSetting(store: SettingsStore, name: string): boolean {
  const value = getSetting(store, name);
  if (typeof value !== "boolean") {
    throw new VimCommandError(`Invalid argument: ${name}`, 474);
  }
  return value;
}

export function getNumberSetting(store: SettingsStore, name: string): number {
  const value = getSetting(store, name);
  if (typeof value !== "number") {
    throw new VimCommandError(`Invalid argument: ${name}`, 474);
  }
  return value;
}

export function toggleOnSetting(store: SettingsStore, name: string): void {
  const def = requireDefinition(name);
  requireToggle(def);
  writeValue(store, def, true);
}

export function toggleOffSetting(store: SettingsStore, name: string): void {
  const def = requireDefinition(name);
  requireToggle(def);
  writeValue(store, def, false);
}

export function invertSetting(store: SettingsStore, name: string): void {
  const def = requireDefinition(name);
  requireToggle(def);
  writeValue(store, def, !readValue(store, def));
}

export function resetSetting(store: SettingsStore, name: string): void {
  const def = requireDefinition(name);
  writeValue(store, def, def.default);
}

export function formatSetting(
  def: OptionDefinition,
  value: SettingValue
): string {
  if (def.kind === "toggle") {
    return value ? def.name : `no${def.name}`;
  }
  return `${def.name}=${String(value)}`;
}

function visibleDefinitions(store: SettingsStore): OptionDefinition[] {
  return OPTION_DEFINITIONS.filter(
    (def) => store.scope === "local" || def.scope === "global"
  );
}

export function listModifiedSettings(store: SettingsStore): string[] {
  return visibleDefinitions(store)
    .filter((def) => readValue(store, def) !== def.default)
    .map((def) => formatSetting(def, readValue(store, def)));
}

export function listAllSettings(store: SettingsStore): string[] {
  return visibleDefinitions(store).map((def) =>
    formatSetting(def, readValue(store, def))
  );
}

/** Splits `:set` arguments on unescaped whitespace; "\ " keeps a space. */
export function splitSetArguments(text: string): string[] {
  const args: string[] = [];
  let current = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\" && (text[i + 1] === " " || text[i + 1] === "\\")) {
      current += text[i + 1];
      i++;
      continue;
    }
    if (/\s/.test(ch)) {
      if (current) args.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (current) args.push(current);
  return args;
}

function applyNumberOperator(
  current: number,
  operator: string,
  operand: number
): number {
  switch (operator) {
    case "+":
      return current + operand;
    case "-":
      return current - operand;
    case "^":
      return current * operand;
    default:
      return operand;
  }
}

function applyStringOperator(
  def: OptionDefinition,
  current: string,
  operator: string,
  operand: string
): string {
  if (def.commaList) {
    const items = current === "" ? [] : current.split(",");
    switch (operator) {
      case "+":
        return items.includes(operand)
          ? current
          : [...items, operand].join(",");
      case "-":
        return items.filter((item) => item !== operand).join(",");
      case "^":
        return items.includes(operand)
          ? current
          : [operand, ...items].join(",");
      default:
        return operand;
    }
  }

  switch (operator) {
    case "+":
      return current + operand;
    case "-":
      return current.replace(operand, "");
    case "^":
      return operand + current;
    default:
      return operand;
  }
}

function applySetArgument(
  store: SettingsStore,
  arg: string,
  output: string[]
): void {
  if (arg === "all") {
    output.push(...listAllSettings(store));
    return;
  }
  if (arg === "all&") {
    for (const def of visibleDefinitions(store)) {
      writeValue(store, def, def.default);
    }
    return;
  }

  const match = /^([a-zA-Z]+)([\s\S]*)$/.exec(arg);
  if (!match) {
    throw new VimCommandError(`Unknown option: ${arg}`, 518);
  }
  const [, rawName, suffix] = match;

  let def = findOptionDefinition(rawName);
  let prefix: "no" | "inv" | undefined;
  if (!def && rawName.startsWith("no")) {
    def = findOptionDefinition(rawName.slice(2));
    prefix = "no";
  }
  if (!def && rawName.startsWith("inv")) {
    def = findOptionDefinition(rawName.slice(3));
    prefix = "inv";
  }
  if (!def) {
    throw new VimCommandError(`Unknown option: ${rawName}`, 518);
  }

  if (prefix) {
    if (suffix !== "" || def.kind !== "toggle") {
      throw new VimCommandError(`Invalid argument: ${arg}`, 474);
    }
    writeValue(store, def, prefix === "no" ? false : !readValue(store, def));
    return;
  }

  switch (suffix) {
    case "":
      if (def.kind === "toggle") {
        writeValue(store, def, true);
      } else {
        output.push(formatSetting(def, readValue(store, def)));
      }
      return;
    case "?":
      output.push(formatSetting(def, readValue(store, def)));
      return;
    case "!":
      requireToggle(def);
      writeValue(store, def, !readValue(store, def));
      return;
    case "&":
      writeValue(store, def, def.default);
      return;
  }

  const assignment = /^([+\-^]?)[=:]([\s\S]*)$/.exec(suffix);
  if (!assignment || def.kind === "toggle") {
    throw new VimCommandError(`Invalid argument: ${arg}`, 474);
  }
  const [, operator, operand] = assignment;

  if (def.kind === "number") {
    const parsed = NumberTextSchema.safeParse(operand);
    if (!parsed.success) {
      throw new VimCommandError(`Number required after =: ${arg}`, 521);
    }
    const current = readValue(store, def);
    const base = typeof current === "number" ? current : def.default;
    writeValue(store, def, applyNumberOperator(base, operator, parsed.data));
    return;
  }

  const current = String(readValue(store, def));
  writeValue(store, def, applyStringOperator(def, current, operator, operand));
}

function cloneSettingsStore(store: SettingsStore): SettingsStore {
  if (store.scope === "global") {
    return { scope: "global", values: new Map(store.values) };
  }
  return {
    scope: "local",
    values: new Map(store.values),
    globalSettings: {
      scope: "global",
      values: new Map(store.globalSettings.values),
    },
  };
}

function replaceValues(
  target: Map<string, SettingValue>,
  source: Map<string, SettingValue>
): void {
  target.clear();
  for (const [key, value] of source) target.set(key, value);
}

function commitSettingsStore(store: SettingsStore, staged: SettingsStore): void {
  replaceValues(store.values, staged.values);
  if (store.scope === "local" && staged.scope === "local") {
    replaceValues(store.globalSettings.values, staged.globalSettings.values);
  }
}

/**
 * Runs the text after `:set`. Every argument is applied to a staged copy and
 * committed only when all of them succeed. Returns the lines to print.
 */
export function runSetArguments(store: SettingsStore, text: string): string[] {
  const args = splitSetArguments(text);
  if (args.length === 0) {
    return listModifiedSettings(store);
  }

  const staged = cloneSettingsStore(store);
  const output: string[] = [];
  for (const arg of args) {
    applySetArgument(staged, arg, output);
  }
  commitSettingsStore(store, staged);
  return output;
}
