import { existsSync } from "fs";
import { join } from "path";
import { logger } from "../../logger.js";
import {
  PROP_ID,
  PROP_NAME,
  applyOverrides,
  loadOverride,
  saveConfiguration,
  type Configuration,
  type LaunchContext,
} from "../config/index.js";

const log = logger.child({ module: "overrides" });

export const SAVE_NAME_FLAG = "save-name";
export const SAVE_ID_FLAG = "save-id";

/**
 * Variables that describe one particular launch rather than the game;
 * never written into a saved override.
 */
const LAUNCH_SPECIFIC_ENV: ReadonlyArray<string> = [
  "STEAM_COMPAT_DATA_PATH",
  "MANGOHUD",
  "DISABLE_MANGOAPP",
  "MANGOHUD_CONFIGFILE",
];

/**
 * Returns the override file for a name or id.
 */
export function overrideFilePath(overridesDir: string, key: string): string {
  return join(overridesDir, `${key}.yaml`);
}

/**
 * Merges `<name>.yaml` and then `<id>.yaml` from the overrides directory
 * onto `config`, skipping empty keys and missing files.
 * Returns the files that were applied.
 */
export function applyGameOverrides(
  config: Configuration,
  ctx: LaunchContext,
  overridesDir: string,
): string[] {
  const applied: string[] = [];

  for (const prop of [PROP_NAME, PROP_ID]) {
    const key = ctx.props[prop];
    if (!key) continue;

    const file = overrideFilePath(overridesDir, key);
    if (!existsSync(file)) continue;

    log.info({ path: file }, `Found game ${prop} override file`);
    applyOverrides(config, loadOverride(file));
    applied.push(file);
  }

  return applied;
}

/** Returns a copy of `config` suitable for saving as an override. */
export function stripLaunchSpecificData(config: Configuration): Configuration {
  const copy = structuredClone(config);
  for (const key of LAUNCH_SPECIFIC_ENV) {
    delete copy.environment[key];
  }
  return copy;
}

/**
 * Handles `--save-name` and `--save-id`: writes the current configuration
 * to the game's override file unless one already exists.
 * Returns the files written.
 */
export function processSpecialFlags(
  config: Configuration,
  ctx: LaunchContext,
  overridesDir: string,
): string[] {
  const written: string[] = [];

  const targets: Array<[flag: string, prop: string]> = [
    [SAVE_NAME_FLAG, PROP_NAME],
    [SAVE_ID_FLAG, PROP_ID],
  ];

  for (const [flag, prop] of targets) {
    if (!ctx.specialFlags.has(flag)) continue;

    const key = ctx.props[prop];
    if (!key) {
      log.warn({ flag }, `--${flag} given but the game has no ${prop}`);
      continue;
    }

    const file = overrideFilePath(overridesDir, key);
    if (existsSync(file)) {
      log.info({ path: file }, "Override file already exists, not overwriting");
      continue;
    }

    log.info({ path: file }, `Creating ${prop} override file`);
    saveConfiguration(file, stripLaunchSpecificData(config));
    written.push(file);
  }

  return written;
}
