import type { Configuration, ConfigurationPatch } from "./schema.js";

/**
 * Appends every item of `extra` that `base` does not already hold.
 * Base order is kept; `base` is mutated.
 */
export function unionInto(base: string[], extra: readonly string[] | undefined): void {
  for (const item of extra ?? []) {
    if (!base.includes(item)) base.push(item);
  }
}

function nonEmpty(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/**
 * Merges an override layer onto `base` in place.
 *
 *   • booleans present in the override win
 *   • strings win when non-empty
 *   • environment entries merge key by key, override wins
 *   • argument and script lists are unioned, duplicates dropped
 *
 * Applying the same override twice leaves `base` as after the first time.
 */
export function applyOverrides(base: Configuration, override: ConfigurationPatch): void {
  Object.assign(base.environment, override.environment ?? {});

  base.wine.alsa = override.wine?.alsa ?? base.wine.alsa;
  base.wine.syncAudio = override.wine?.syncAudio ?? base.wine.syncAudio;
  base.mangohud.enabled = override.mangohud?.enabled ?? base.mangohud.enabled;
  base.gamemode.enabled = override.gamemode?.enabled ?? base.gamemode.enabled;
  base.gamescope.enabled = override.gamescope?.enabled ?? base.gamescope.enabled;
  base.gamescope.hdr = override.gamescope?.hdr ?? base.gamescope.hdr;
  base.eosOverlay.enabled = override.eosOverlay?.enabled ?? base.eosOverlay.enabled;
  base.umu.enabled = override.umu?.enabled ?? base.umu.enabled;

  const umu: NonNullable<ConfigurationPatch["umu"]> = override.umu ?? {};
  if (nonEmpty(umu.proton)) base.umu.proton = umu.proton;
  if (nonEmpty(umu.store)) base.umu.store = umu.store;
  if (nonEmpty(umu.gameId)) base.umu.gameId = umu.gameId;

  unionInto(base.umu.args, umu.args);
  unionInto(base.gamescope.args, override.gamescope?.args);
  unionInto(base.preScripts, override.preScripts);
  unionInto(base.postScripts, override.postScripts);
}
