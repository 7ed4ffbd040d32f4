import { join } from "path";
import { logger } from "../../logger.js";
import { LaunchError } from "../../errors.js";
import type { Configuration } from "../config/index.js";
import { LEGENDARY_BIN_NAME, STEAM_COMPAT_DATA_ENV, type BinaryProbe } from "../command/index.js";
import { succeeded, type ProcessRunner } from "../process/index.js";

const log = logger.child({ module: "eos-overlay" });

/** Answers legendary's confirmation prompts. */
const CONFIRM_INPUT = "y\n".repeat(8);

export interface EosOverlayOptions {
  probe: BinaryProbe;
  run: ProcessRunner;
  /** Where legendary keeps the overlay files, shared by every prefix. */
  overlayDir: string;
}

/**
 * Installs the Epic Online Services overlay with legendary and enables it
 * in the Steam prefix (`$STEAM_COMPAT_DATA_PATH/pfx`).
 *
 * Runs only when the overlay is enabled, the configuration carries a
 * compat data path and legendary is installed. Returns whether it ran.
 *
 * An install failure is logged; an enable failure throws LaunchError("tool").
 */
export function setupEosOverlay(config: Configuration, opts: EosOverlayOptions): boolean {
  if (!config.eosOverlay.enabled) return false;

  const compatData = config.environment[STEAM_COMPAT_DATA_ENV];
  if (!compatData) return false;

  const legendary = opts.probe(LEGENDARY_BIN_NAME);
  if (!legendary) return false;

  log.info({ path: opts.overlayDir }, "Installing eos-overlay");
  const install = opts.run([legendary, "eos-overlay", "install", "--path", opts.overlayDir], {
    input: CONFIRM_INPUT,
  });
  if (!succeeded(install)) {
    log.warn({ status: install.status, err: install.error, output: install.output }, "eos-overlay install failed");
  }

  const prefix = join(compatData, "pfx");
  log.info({ path: opts.overlayDir, prefix }, "Enabling eos-overlay");
  const enable = opts.run([legendary, "eos-overlay", "enable", "--prefix", prefix], {
    input: CONFIRM_INPUT,
  });
  if (!succeeded(enable)) {
    throw new LaunchError(
      "tool",
      `Failed to enable eos-overlay in ${prefix}: ${enable.error?.message ?? `exit status ${enable.status}`}`,
      { cause: enable.error },
    );
  }

  return true;
}
