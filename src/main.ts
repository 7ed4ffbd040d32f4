#!/usr/bin/env node
/**
 * gamewrap: wraps a game launch with gamemode, gamescope, MangoHud and
 * umu-run according to ~/.config/gamewrap/config.yaml.
 *
 * Steam launch options:   gamewrap [flags] %command%
 * Standalone:             gamewrap --name=<game> [flags] <command…>
 */
import { attachLogFile, logger } from "./logger.js";
import { LaunchError, describeError } from "./errors.js";
import { runLauncher } from "./launch.js";
import { whichProbe } from "./modules/command/index.js";
import { fetchSteamSpyName } from "./modules/game-info/index.js";
import { spawnRunner } from "./modules/process/index.js";

async function main(): Promise<void> {
  try {
    process.exitCode = await runLauncher(process.argv.slice(2), process.env, {
      probe: whichProbe,
      fetchGameName: fetchSteamSpyName,
      runProcess: spawnRunner,
      attachLog: attachLogFile,
    });
  } catch (err) {
    const kind = err instanceof LaunchError ? err.kind : "unexpected";
    logger.fatal({ kind, err }, describeError(err));
    process.exitCode = 1;
  }
}

void main();
