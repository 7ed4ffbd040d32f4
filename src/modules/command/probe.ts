import { spawnSync } from "child_process";

export const GAMEMODE_BIN_NAME = "gamemoderun";
export const MANGOHUD_BIN_NAME = "mangohud";
export const GAMESCOPE_BIN_NAME = "gamescope";
export const UMU_RUN_BIN_NAME = "umu-run";
export const LEGENDARY_BIN_NAME = "legendary";
export const WINETRICKS_BIN_NAME = "winetricks";

/**
 * Resolves a helper binary name to its absolute path on the host, or null
 * when it is not installed. Injected so tests can fake what is present.
 */
export type BinaryProbe = (binName: string) => string | null;

/**
 * Asks `which` for the binary. Not cached: every call reflects the
 * current PATH.
 */
export const whichProbe: BinaryProbe = (binName) => {
  const result = spawnSync("which", [binName], { encoding: "utf-8" });
  if (result.error || result.status !== 0) return null;

  const path = result.stdout.split("\n")[0]?.trim() ?? "";
  return path === "" ? null : path;
};
