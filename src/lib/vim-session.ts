import { VimSessionConfigSchema, type VimSessionConfig } from "./config";
import {
  clearAllKeyMappings,
  createKeyMap,
  type KeyMapTable,
} from "./vim-key-map";
import {
  createRegisterMap,
  updateRegister,
  type RegisterMap,
} from "./vim-registers";
import {
  createGlobalSettings,
  createLocalSettings,
  findOptionDefinition,
  setSetting,
  type GlobalSettings,
  type LocalSettings,
} from "./vim-settings";
import type { SubstituteData } from "./vim-substitute";
import type { SearchData } from "./vim-types";

/** State that outlives any one command and is shared by every buffer. */
export interface VimData {
  lastSubstitute: SubstituteData | undefined;
  lastSearch: SearchData | undefined;
}

export interface VimSession {
  keyMap: KeyMapTable;
  globalSettings: GlobalSettings;
  /** Local option values new buffers start from. */
  defaultLocalSettings: LocalSettings;
  registers: RegisterMap;
  data: VimData;
  disposed: boolean;
}

export function createVimSession(config: VimSessionConfig = {}): VimSession {
  const parsed = VimSessionConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new Error(`Invalid session config: ${parsed.error.message}`);
  }

  const globalSettings = createGlobalSettings();
  const defaultLocalSettings = createLocalSettings(globalSettings);
  for (const [name, value] of Object.entries(parsed.data.settings)) {
    const def = findOptionDefinition(name);
    setSetting(
      def?.scope === "global" ? globalSettings : defaultLocalSettings,
      name,
      value
    );
  }

  const registers = createRegisterMap();
  for (const [name, value] of Object.entries(parsed.data.registers)) {
    updateRegister(registers, name, value.text, value.kind);
  }

  return {
    keyMap: createKeyMap(),
    globalSettings,
    defaultLocalSettings,
    registers,
    data: { lastSubstitute: undefined, lastSearch: undefined },
    disposed: false,
  };
}

/** Local settings for a newly opened buffer. */
export function createBufferSettings(session: VimSession): LocalSettings {
  return {
    scope: "local",
    values: new Map(session.defaultLocalSettings.values),
    globalSettings: session.globalSettings,
  };
}

export function disposeVimSession(session: VimSession): void {
  clearAllKeyMappings(session.keyMap);
  session.registers.registers = {};
  session.data.lastSubstitute = undefined;
  session.data.lastSearch = undefined;
  session.disposed = true;
}
