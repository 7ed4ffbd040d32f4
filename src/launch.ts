/**
 * ============================================================
 *  launch.ts — one launcher run, from argv to exit status
 * ============================================================
 *
 *   paths → debug log → folders → config.yaml → argv flags
 *     → (Steam session) app id, name, compatdata relocation
 *     → overrides → prefix setup → command assembly
 *     → saved overrides → pre-scripts → game → post-scripts
 *
 * Everything that touches the host beyond the filesystem comes in
 * through LauncherDeps. Errors propagate to the caller as LaunchError.
 * ============================================================
 */
import { mkdirSync } from "fs";
import { join } from "path";
import { logger } from "./logger.js";
import { resolveAppPaths } from "./modules/paths/index.js";
import {
  PROP_NAME,
  applyToggles,
  createDefaultConfiguration,
  loadConfiguration,
  parseLaunchArgs,
  serializeConfiguration,
} from "./modules/config/index.js";
import {
  enrichAppIdByArgs,
  enrichAppIdByExecutable,
  enrichGameName,
  type GameNameFetcher,
} from "./modules/game-info/index.js";
import { migrateCompatData, replaceSymlink } from "./modules/compat-data/index.js";
import { applyGameOverrides, processSpecialFlags } from "./modules/overrides/index.js";
import { setupEosOverlay, syncWineAudioDriver } from "./modules/prefix-setup/index.js";
import {
  STEAM_COMPAT_DATA_ENV,
  assembleCommand,
  buildChildEnv,
  type BinaryProbe,
} from "./modules/command/index.js";
import { executeScripts, succeeded, type ProcessRunner } from "./modules/process/index.js";

const log = logger.child({ module: "launch" });

const DEFAULT_SHELL = "/bin/sh";

export interface LauncherDeps {
  probe: BinaryProbe;
  fetchGameName: GameNameFetcher;
  runProcess: ProcessRunner;
  /** Starts mirroring log entries into the debug file. */
  attachLog: (path: string) => void;
}

type Env = Record<string, string | undefined>;

function definedEntries(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Runs one launch. `args` excludes the node binary and script path.
 * Resolves to the process exit status: 0 when the game exited cleanly,
 * 1 when it failed to start or exited non-zero.
 */
export async function runLauncher(args: readonly string[], env: Env, deps: LauncherDeps): Promise<number> {
  // --- Paths and logging ---------------------------------------------------
  const paths = resolveAppPaths(env);

  deps.attachLog(paths.debugLog);
  log.info({ pid: process.pid }, "---------------------- START ----------------------");
  log.debug(
    {
      configFile: paths.configFile,
      nameCache: paths.nameCacheDir,
      scripts: paths.scriptsDir,
      overrides: paths.overridesDir,
      debugLog: paths.debugLog,
    },
    "Using folders",
  );

  for (const dir of [paths.nameCacheDir, paths.scriptsDir, paths.overridesDir]) {
    mkdirSync(dir, { recursive: true });
  }
  replaceSymlink(paths.appConfigDir, paths.configShortcut);

  // --- Configuration -------------------------------------------------------
  const config = loadConfiguration(paths.configFile, createDefaultConfiguration());
  const { context: ctx, toggles } = parseLaunchArgs(args);
  applyToggles(config, toggles);

  const commandLine = ctx.command.join(" ");

  // --- Steam session -------------------------------------------------------
  const steamCompatData = env[STEAM_COMPAT_DATA_ENV];
  if (steamCompatData !== undefined) {
    log.info({ path: steamCompatData }, "Detected steam compat data variables");
    enrichAppIdByExecutable(ctx, commandLine);
    enrichAppIdByArgs(ctx, commandLine);
    await enrichGameName(ctx, paths.nameCacheDir, deps.fetchGameName);

    mkdirSync(paths.compatDataBase, { recursive: true });
    replaceSymlink(paths.compatDataBase, paths.compatDataShortcut);

    const name = ctx.props[PROP_NAME];
    if (name) {
      const { compatDataPath } = migrateCompatData(steamCompatData, paths.compatDataBase, name);
      config.environment[STEAM_COMPAT_DATA_ENV] = compatDataPath;
    } else {
      log.warn({ path: steamCompatData }, "Game name unknown, leaving compat data in place");
    }
  }

  // --- Overrides and prefix ------------------------------------------------
  applyGameOverrides(config, ctx, paths.overridesDir);

  const hostEnv = definedEntries(env);
  setupEosOverlay(config, { probe: deps.probe, run: deps.runProcess, overlayDir: paths.eosOverlayDir });

  const name = ctx.props[PROP_NAME];
  if (name) {
    syncWineAudioDriver(config, join(paths.compatDataBase, name), {
      probe: deps.probe,
      run: deps.runProcess,
      hostEnv,
    });
  }

  // --- Command -------------------------------------------------------------
  const assembled = assembleCommand(config, ctx, {
    probe: deps.probe,
    hostEnv: env,
    userConfigDir: paths.userConfigDir,
    compatDataBase: paths.compatDataBase,
  });
  config.environment = assembled.environment;

  log.info({ props: ctx.props }, `Final configuration:\n${serializeConfiguration(config)}`);

  processSpecialFlags(config, ctx, paths.overridesDir);

  // --- Run -----------------------------------------------------------------
  const shell = env.SHELL || DEFAULT_SHELL;
  executeScripts(config.preScripts, paths.scriptsDir, shell, deps.runProcess);

  log.info({ argv: assembled.argv }, "Executing");
  const outcome = deps.runProcess(assembled.argv, { env: buildChildEnv(env, config.environment) });

  const ok = succeeded(outcome);
  if (ok) {
    log.debug({ output: outcome.output }, "Command finished");
  } else {
    log.error(
      { status: outcome.status, signal: outcome.signal, err: outcome.error, output: outcome.output },
      "Command stopped",
    );
  }

  executeScripts(config.postScripts, paths.scriptsDir, shell, deps.runProcess);
  log.info({ pid: process.pid }, "---------------------- END ----------------------");

  return ok ? 0 : 1;
}
