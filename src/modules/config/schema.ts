import { z } from "zod";

// ---------------------------------------------------------------------------
// In-memory shape
// ---------------------------------------------------------------------------

export interface Configuration {
  /** Extra child-process variables; values may hold $VAR / ${VAR} placeholders. */
  environment: Record<string, string>;
  /** `syncAudio` lets the launcher switch the prefix driver to match `alsa`. */
  wine: { alsa: boolean; syncAudio: boolean };
  mangohud: { enabled: boolean };
  gamemode: { enabled: boolean };
  gamescope: { enabled: boolean; hdr: boolean; args: string[] };
  eosOverlay: { enabled: boolean };
  umu: {
    enabled: boolean;
    /** Proton root directory, exported as PROTONPATH. */
    proton: string;
    gameId: string;
    store: string;
    args: string[];
  };
  preScripts: string[];
  postScripts: string[];
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] | Record<string, string>
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

/** A configuration file where every field is optional: the override layer. */
export type ConfigurationPatch = DeepPartial<Configuration>;

export function createDefaultConfiguration(): Configuration {
  return {
    environment: {},
    wine: { alsa: true, syncAudio: false },
    mangohud: { enabled: false },
    gamemode: { enabled: true },
    gamescope: { enabled: false, hdr: false, args: [] },
    eosOverlay: { enabled: false },
    umu: { enabled: false, proton: "", gameId: "", store: "", args: [] },
    preScripts: [],
    postScripts: [],
  };
}

// ---------------------------------------------------------------------------
// File schema (YAML keys)
// ---------------------------------------------------------------------------
// Every field is optional and `null` reads as absent, so one schema serves
// both the base file and the override files. Unknown keys are stripped.

const optionalBoolean = z.boolean().nullish().transform((v) => v ?? undefined);
const optionalString = z.string().nullish().transform((v) => v ?? undefined);
const optionalList = z.array(z.string()).nullish().transform((v) => v ?? undefined);

/** YAML happily types `DXVK_HDR: 1` as a number; the child env wants strings. */
const envValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const ConfigFileSchema = z
  .object({
    environment: z.record(z.string(), envValue).nullish(),
    wine: z.object({ alsa: optionalBoolean, "sync-audio": optionalBoolean }).nullish(),
    mangohud: z.object({ enabled: optionalBoolean }).nullish(),
    gamemode: z.object({ enabled: optionalBoolean }).nullish(),
    gamescope: z
      .object({ enabled: optionalBoolean, hdr: optionalBoolean, args: optionalList })
      .nullish(),
    "eos-overlay": z.object({ enabled: optionalBoolean }).nullish(),
    umu: z
      .object({
        enabled: optionalBoolean,
        proton: optionalString,
        "game-id": optionalString,
        store: optionalString,
        args: optionalList,
      })
      .nullish(),
    "pre-scripts": optionalList,
    "post-scripts": optionalList,
  })
  .nullish()
  .transform((file): ConfigurationPatch => {
    const patch: ConfigurationPatch = {};
    if (!file) return patch;

    if (file.environment) patch.environment = file.environment;
    if (file.wine) {
      const { "sync-audio": syncAudio, ...rest } = file.wine;
      patch.wine = { ...rest, ...(syncAudio !== undefined && { syncAudio }) };
    }
    if (file.mangohud) patch.mangohud = { enabled: file.mangohud.enabled };
    if (file.gamemode) patch.gamemode = { enabled: file.gamemode.enabled };
    if (file.gamescope) patch.gamescope = { ...file.gamescope };
    if (file["eos-overlay"]) patch.eosOverlay = { enabled: file["eos-overlay"].enabled };
    if (file.umu) {
      patch.umu = {
        enabled: file.umu.enabled,
        proton: file.umu.proton,
        gameId: file.umu["game-id"],
        store: file.umu.store,
        args: file.umu.args,
      };
    }
    if (file["pre-scripts"]) patch.preScripts = file["pre-scripts"];
    if (file["post-scripts"]) patch.postScripts = file["post-scripts"];
    return patch;
  });

/**
 * Fills every field the patch leaves out with the built-in default.
 * Values present in the patch are taken verbatim (no list union here).
 */
export function resolveConfiguration(patch: ConfigurationPatch): Configuration {
  const d = createDefaultConfiguration();
  return {
    environment: { ...(patch.environment ?? d.environment) },
    wine: {
      alsa: patch.wine?.alsa ?? d.wine.alsa,
      syncAudio: patch.wine?.syncAudio ?? d.wine.syncAudio,
    },
    mangohud: { enabled: patch.mangohud?.enabled ?? d.mangohud.enabled },
    gamemode: { enabled: patch.gamemode?.enabled ?? d.gamemode.enabled },
    gamescope: {
      enabled: patch.gamescope?.enabled ?? d.gamescope.enabled,
      hdr: patch.gamescope?.hdr ?? d.gamescope.hdr,
      args: [...(patch.gamescope?.args ?? d.gamescope.args)],
    },
    eosOverlay: { enabled: patch.eosOverlay?.enabled ?? d.eosOverlay.enabled },
    umu: {
      enabled: patch.umu?.enabled ?? d.umu.enabled,
      proton: patch.umu?.proton ?? d.umu.proton,
      gameId: patch.umu?.gameId ?? d.umu.gameId,
      store: patch.umu?.store ?? d.umu.store,
      args: [...(patch.umu?.args ?? d.umu.args)],
    },
    preScripts: [...(patch.preScripts ?? d.preScripts)],
    postScripts: [...(patch.postScripts ?? d.postScripts)],
  };
}

/**
 * Converts to the on-disk YAML shape. Key order here is the order written.
 */
export function toConfigFile(config: Configuration) {
  return {
    environment: { ...config.environment },
    wine: { alsa: config.wine.alsa, "sync-audio": config.wine.syncAudio },
    mangohud: { enabled: config.mangohud.enabled },
    gamemode: { enabled: config.gamemode.enabled },
    gamescope: {
      enabled: config.gamescope.enabled,
      hdr: config.gamescope.hdr,
      args: [...config.gamescope.args],
    },
    "eos-overlay": { enabled: config.eosOverlay.enabled },
    umu: {
      enabled: config.umu.enabled,
      proton: config.umu.proton,
      "game-id": config.umu.gameId,
      store: config.umu.store,
      args: [...config.umu.args],
    },
    "pre-scripts": [...config.preScripts],
    "post-scripts": [...config.postScripts],
  };
}
