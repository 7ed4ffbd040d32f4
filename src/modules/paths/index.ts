import { isAbsolute, join } from "path";
import { LaunchError } from "../../errors.js";

export const APP_NAME = "gamewrap";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppPaths {
  home: string;
  /** $XDG_CONFIG_HOME or ~/.config */
  userConfigDir: string;
  /** $XDG_CACHE_HOME or ~/.cache */
  userCacheDir: string;
  /** $XDG_DATA_HOME or ~/.local/share */
  userDataDir: string;

  /** <config>/gamewrap: holds config.yaml, scripts/ and overrides/ */
  appConfigDir: string;
  /** <data>/gamewrap */
  appDataDir: string;
  configFile: string;
  scriptsDir: string;
  overridesDir: string;
  /** <cache>/gamewrap/appnames: one file per Steam app id */
  nameCacheDir: string;
  /** <data>/gamewrap/compatdata: one runner profile per game name */
  compatDataBase: string;
  eosOverlayDir: string;
  debugLog: string;
  /** ~/.gamewrap → appConfigDir */
  configShortcut: string;
  /** ~/.compatdata → compatDataBase */
  compatDataShortcut: string;
}

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

function xdgDir(env: Env, variable: string, fallback: string): string {
  const value = env[variable];
  if (!value) return fallback;
  if (!isAbsolute(value)) {
    throw new LaunchError(
      "environment",
      `${variable} must be an absolute path, got "${value}"`,
    );
  }
  return value;
}

/**
 * Derives every directory the launcher touches from HOME and the XDG base
 * directory variables. Pure, no filesystem access.
 *
 * Throws LaunchError("environment") when HOME is unset or an XDG variable
 * holds a relative path.
 */
export function resolveAppPaths(env: Env): AppPaths {
  const home = env.HOME;
  if (!home) {
    throw new LaunchError("environment", "Failed to determine user HOME folder: $HOME is not defined");
  }

  const userConfigDir = xdgDir(env, "XDG_CONFIG_HOME", join(home, ".config"));
  const userCacheDir = xdgDir(env, "XDG_CACHE_HOME", join(home, ".cache"));
  const userDataDir = xdgDir(env, "XDG_DATA_HOME", join(home, ".local", "share"));

  const appConfigDir = join(userConfigDir, APP_NAME);
  const appDataDir = join(userDataDir, APP_NAME);
  const compatDataBase = join(appDataDir, "compatdata");

  return {
    home,
    userConfigDir,
    userCacheDir,
    userDataDir,
    appConfigDir,
    appDataDir,
    configFile: join(appConfigDir, "config.yaml"),
    scriptsDir: join(appConfigDir, "scripts"),
    overridesDir: join(appConfigDir, "overrides"),
    nameCacheDir: join(userCacheDir, APP_NAME, "appnames"),
    compatDataBase,
    eosOverlayDir: join(appDataDir, "eos-overlay"),
    debugLog: join(appDataDir, "debug.log"),
    configShortcut: join(home, `.${APP_NAME}`),
    compatDataShortcut: join(home, ".compatdata"),
  };
}
