/**
 * ============================================================
 *  Compat data — Steam compatdata relocation
 * ============================================================
 *
 * When Steam starts a game through this launcher it passes the
 * game's Proton data directory in STEAM_COMPAT_DATA_PATH
 * (…/steamapps/compatdata/<appid>). The launcher keeps every
 * game's data under one base instead, named after the game:
 *
 *   <data>/gamewrap/compatdata/
 *   └── <game name>/        ← authoritative copy
 *
 * and leaves a symlink at Steam's path so Steam keeps working:
 *
 *   steamapps/compatdata/<appid> → <data>/gamewrap/compatdata/<name>
 *
 * Every step is safe to repeat on the next launch.
 * ============================================================
 */
import { lstatSync, rmSync, statSync, symlinkSync } from "fs";
import { join } from "path";
import { logger } from "../../logger.js";
import { LaunchError, describeError } from "../../errors.js";
import { copyDirectory } from "../file-utils/index.js";

const log = logger.child({ module: "compat-data" });

export type MigrationAction = "copied" | "replaced" | "relinked";

export interface MigrationResult {
  action: MigrationAction;
  /** The directory STEAM_COMPAT_DATA_PATH must point at from now on. */
  compatDataPath: string;
}

/**
 * Replaces whatever sits at `linkPath` with a symlink to `target`.
 */
export function replaceSymlink(target: string, linkPath: string): void {
  rmSync(linkPath, { force: true });
  symlinkSync(target, linkPath);
}

function isDirectory(path: string): boolean {
  return lstatSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function exists(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false }) !== undefined;
}

/**
 * Moves a game's legacy compatdata directory to `<compatDataBase>/<gameName>`.
 *
 *   new absent, legacy is a dir  → copy, delete legacy, link legacy → new
 *   new present, legacy is a dir → delete legacy (new wins), link legacy → new
 *   otherwise                    → remove whatever is at legacy, link → new
 *
 * Throws LaunchError("migration") when the copy or the delete fails; the
 * copy is not rolled back.
 */
export function migrateCompatData(
  legacyPath: string,
  compatDataBase: string,
  gameName: string,
): MigrationResult {
  const compatDataPath = join(compatDataBase, gameName);
  let action: MigrationAction;

  if (isDirectory(legacyPath) && !exists(compatDataPath)) {
    try {
      copyDirectory(legacyPath, compatDataPath);
    } catch (err) {
      throw new LaunchError("migration", `Failed to copy compat data: ${describeError(err)}`, { cause: err });
    }
    try {
      rmSync(legacyPath, { recursive: true });
    } catch (err) {
      throw new LaunchError("migration", `Failed to delete old compat data: ${describeError(err)}`, {
        cause: err,
      });
    }
    action = "copied";
  } else if (isDirectory(legacyPath)) {
    try {
      rmSync(legacyPath, { recursive: true });
    } catch (err) {
      throw new LaunchError("migration", `Failed to delete old compat data: ${describeError(err)}`, {
        cause: err,
      });
    }
    action = "replaced";
  } else {
    rmSync(legacyPath, { force: true });
    action = "relinked";
  }

  symlinkSync(compatDataPath, legacyPath);

  log.info({ action, old: legacyPath, new: compatDataPath }, "Compat data relocated");
  return { action, compatDataPath };
}
