/**
 * ============================================================
 *  Game names — SteamSpy lookup with an on-disk cache
 * ============================================================
 *
 * Flow:
 *   1. <cache>/gamewrap/appnames/<appid> exists → its content is the name
 *   2. otherwise GET steamspy.com/api.php?request=appdetails&appid=<appid>
 *      → { appid: number, name: string }
 *   3. the name is written to the cache file and returned
 *
 * Cache entries never expire. Lookup failures are fatal: there is no
 * offline fallback.
 * ============================================================
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import fetch from "node-fetch";
import { z } from "zod";
import { logger } from "../../logger.js";
import { LaunchError, describeError } from "../../errors.js";
import { PROP_NAME, PROP_STEAM_APPID, type LaunchContext } from "../config/index.js";

const log = logger.child({ module: "game-info" });

/** Resolves a Steam app id to its display name. */
export type GameNameFetcher = (appId: string) => Promise<string>;

const SteamSpyAppSchema = z.object({
  appid: z.number().int(),
  name: z.string(),
});

export function buildSteamSpyUrl(appId: string): string {
  return `https://steamspy.com/api.php?request=appdetails&appid=${encodeURIComponent(appId)}`;
}

/**
 * Looks the name up on SteamSpy.
 * Throws LaunchError("lookup") on transport errors, non-2xx responses
 * and payloads that are not `{ appid, name }`.
 */
export const fetchSteamSpyName: GameNameFetcher = async (appId) => {
  const url = buildSteamSpyUrl(appId);

  let body: unknown;
  try {
    const res = await fetch(url);
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`);
    }
    body = await res.json();
  } catch (err) {
    throw new LaunchError("lookup", `Could not fetch steam game name for ${appId}: ${describeError(err)}`, {
      cause: err,
    });
  }

  const parsed = SteamSpyAppSchema.safeParse(body);
  if (!parsed.success) {
    throw new LaunchError("lookup", `SteamSpy response for ${appId} is not a valid app record`);
  }
  return parsed.data.name;
};

/**
 * Returns the cached name for `appId`, fetching and caching it on a miss.
 */
export async function resolveGameName(
  appId: string,
  cacheDir: string,
  fetchName: GameNameFetcher,
): Promise<string> {
  const cacheFile = join(cacheDir, appId);

  if (existsSync(cacheFile)) {
    log.debug({ path: cacheFile }, "Using cached game name");
    return readFileSync(cacheFile, "utf-8");
  }

  log.info({ appId }, "Game name not cached, fetching from SteamSpy");
  const name = await fetchName(appId);

  try {
    mkdirSync(cacheDir, { recursive: true });
    writeFileSync(cacheFile, name);
  } catch (err) {
    throw new LaunchError("lookup", `Could not write cache file ${cacheFile}: ${describeError(err)}`, {
      cause: err,
    });
  }
  log.info({ name, path: cacheFile }, "Saved game name to cache");
  return name;
}

/**
 * Sets the `name` prop from the known Steam app id, unless a name was
 * given explicitly.
 */
export async function enrichGameName(
  ctx: LaunchContext,
  cacheDir: string,
  fetchName: GameNameFetcher,
): Promise<void> {
  const appId = ctx.props[PROP_STEAM_APPID];
  if (!appId || ctx.props[PROP_NAME]) return;

  ctx.props[PROP_NAME] = await resolveGameName(appId, cacheDir, fetchName);
}
