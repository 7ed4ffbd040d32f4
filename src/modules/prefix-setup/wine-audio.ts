import { existsSync, statSync } from "fs";
import { join } from "path";
import { logger } from "../../logger.js";
import { readLastLine } from "../file-utils/index.js";
import type { Configuration } from "../config/index.js";
import { WINETRICKS_BIN_NAME, type BinaryProbe } from "../command/index.js";
import { succeeded, type ProcessRunner } from "../process/index.js";

const log = logger.child({ module: "wine-audio" });

export type AudioDriver = "alsa" | "pulse";

/** Wine's default when winetricks never touched the sound setting. */
const DEFAULT_DRIVER: AudioDriver = "pulse";

/**
 * Reads the driver from a winetricks log line such as `sound=alsa`.
 * Returns null for any other line.
 * Pure, no filesystem access.
 */
export function parseSoundSetting(line: string): AudioDriver | null {
  const [key, value] = line.trim().split("=");
  if (key !== "sound") return null;
  return value === "alsa" || value === "pulse" ? value : null;
}

/**
 * The driver winetricks last set in `prefixDir`, judged by the final line
 * of its log; "pulse" when the log is missing or ends with another verb.
 */
export function currentAudioDriver(prefixDir: string): AudioDriver {
  const logFile = join(prefixDir, "winetricks.log");
  if (!existsSync(logFile)) return DEFAULT_DRIVER;

  const lastLine = readLastLine(logFile);
  log.debug({ lastLine }, "Winetricks log last line");
  return parseSoundSetting(lastLine) ?? DEFAULT_DRIVER;
}

/**
 * Decides which driver to switch to, or null when the prefix already uses
 * the configured one.
 */
export function pickAudioDriverChange(wantAlsa: boolean, current: AudioDriver): AudioDriver | null {
  if (wantAlsa && current === "pulse") return "alsa";
  if (!wantAlsa && current === "alsa") return "pulse";
  return null;
}

export interface WineAudioOptions {
  probe: BinaryProbe;
  run: ProcessRunner;
  hostEnv: Record<string, string>;
}

/**
 * Brings the Wine prefix at `<compatDir>/pfx` in line with `wine.alsa`
 * through `winetricks settings sound=<driver>`.
 *
 * Opt-in through `wine.syncAudio`. Skipped when the prefix does not exist
 * yet or winetricks is not installed. Returns the driver switched to, or
 * null. A winetricks failure is logged and the launch goes on.
 */
export function syncWineAudioDriver(
  config: Configuration,
  compatDir: string,
  opts: WineAudioOptions,
): AudioDriver | null {
  if (!config.wine.syncAudio) return null;

  const prefixDir = join(compatDir, "pfx");
  if (!statSync(prefixDir, { throwIfNoEntry: false })?.isDirectory()) return null;

  const winetricks = opts.probe(WINETRICKS_BIN_NAME);
  if (!winetricks) return null;

  const change = pickAudioDriverChange(config.wine.alsa, currentAudioDriver(prefixDir));
  if (!change) return null;

  log.info({ prefix: prefixDir, driver: change }, "Updating wine audio driver");
  const outcome = opts.run([winetricks, "settings", `sound=${change}`], {
    env: { ...opts.hostEnv, WINEPREFIX: prefixDir },
  });
  if (!succeeded(outcome)) {
    log.warn(
      { prefix: prefixDir, status: outcome.status, err: outcome.error, output: outcome.output },
      `Could not enable ${change} in prefix`,
    );
    return null;
  }

  return change;
}
