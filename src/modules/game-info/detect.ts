import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { PROP_ID, PROP_STEAM_APPID, type LaunchContext } from "../config/index.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "game-info" });

/** Steam drops this next to many game executables. */
export const STEAM_APPID_FILENAME = "steam_appid.txt";

// Steam launches Proton as `proton waitforexitandrun /path/to/Game.exe …`.
// Greedy on purpose: install paths often contain spaces.
const GAME_EXE_PATTERN = /waitforexitandrun (\/.+\.(?:exe|bat))/i;

// Steam's reaper wrapper passes `AppId=<n>` ahead of the game command.
const STEAM_APPID_PATTERN = /AppId=([0-9]+)/;

// ---------------------------------------------------------------------------
// Pure matchers (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Returns the Windows executable (or batch file) Steam asked Proton to run,
 * or null when the command line holds no such launch.
 */
export function matchGameExecutable(commandLine: string): string | null {
  return GAME_EXE_PATTERN.exec(commandLine)?.[1] ?? null;
}

/** Returns the numeric Steam app id in `AppId=<n>`, or null. */
export function matchSteamAppId(commandLine: string): string | null {
  return STEAM_APPID_PATTERN.exec(commandLine)?.[1] ?? null;
}

// ---------------------------------------------------------------------------
// Enrichment
// ---------------------------------------------------------------------------

function setAppId(ctx: LaunchContext, appId: string): void {
  ctx.props[PROP_STEAM_APPID] = appId;
  ctx.props[PROP_ID] = appId;
}

/**
 * Reads the first non-blank line of `steam_appid.txt` next to `exePath`.
 * Returns null when the file is absent or blank.
 */
export function readSidecarAppId(exePath: string): string | null {
  const file = join(dirname(exePath), STEAM_APPID_FILENAME);
  if (!existsSync(file)) return null;

  const firstLine = readFileSync(file, "utf-8").split("\n", 1)[0]?.trim() ?? "";
  return firstLine === "" ? null : firstLine;
}

/**
 * Sets `steam-appid` and `id` from the side-car file of the launched
 * executable. No-op when an app id is already known.
 */
export function enrichAppIdByExecutable(ctx: LaunchContext, commandLine: string): void {
  if (ctx.props[PROP_STEAM_APPID] !== undefined) return;

  const exePath = matchGameExecutable(commandLine);
  if (!exePath) return;

  const appId = readSidecarAppId(exePath);
  if (appId) {
    log.info({ exePath, appId }, "Found app id next to game executable");
    setAppId(ctx, appId);
  }
}

/**
 * Sets `steam-appid` and `id` from an `AppId=<n>` argument.
 * No-op when an app id is already known.
 */
export function enrichAppIdByArgs(ctx: LaunchContext, commandLine: string): void {
  if (ctx.props[PROP_STEAM_APPID] !== undefined) return;

  const appId = matchSteamAppId(commandLine);
  if (appId) {
    log.info({ appId }, "Found app id in launch arguments");
    setAppId(ctx, appId);
  }
}
