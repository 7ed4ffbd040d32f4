import { mkdirSync, statSync } from "fs";
import { join } from "path";
import { logger } from "../../logger.js";
import { LaunchError, describeError } from "../../errors.js";
import { PROP_ID, PROP_NAME, type Configuration, type LaunchContext } from "../config/index.js";
import {
  GAMEMODE_BIN_NAME,
  GAMESCOPE_BIN_NAME,
  MANGOHUD_BIN_NAME,
  UMU_RUN_BIN_NAME,
  type BinaryProbe,
} from "./probe.js";

const log = logger.child({ module: "command" });

export const GAMESCOPE_HDR_ARG = "--hdr-enabled";
export const STEAM_COMPAT_DATA_ENV = "STEAM_COMPAT_DATA_PATH";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AssembleOptions {
  probe: BinaryProbe;
  /** Host environment; a Steam session is detected from it. */
  hostEnv: Record<string, string | undefined>;
  /** $XDG_CONFIG_HOME or ~/.config: MangoHud looks for its config there. */
  userConfigDir: string;
  /** Base directory for per-game runner profiles. */
  compatDataBase: string;
}

export interface AssembledCommand {
  /** Wrapper binaries, their arguments, then the game command. */
  argv: string[];
  /** The configured environment plus what the stages injected (unexpanded). */
  environment: Record<string, string>;
}

interface StageState {
  argv: string[];
  environment: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

/** MangoHud hooks in through the environment, it adds no argv token. */
function mangohudStage(state: StageState, config: Configuration, opts: AssembleOptions): void {
  if (!config.mangohud.enabled || !opts.probe(MANGOHUD_BIN_NAME)) return;

  state.environment.MANGOHUD_CONFIGFILE = join(opts.userConfigDir, "MangoHud", "MangoHud.conf");
  state.environment.MANGOHUD = "1";
  state.environment.DISABLE_MANGOAPP = "1";
}

function gamemodeStage(state: StageState, config: Configuration, opts: AssembleOptions): void {
  if (!config.gamemode.enabled) return;
  const bin = opts.probe(GAMEMODE_BIN_NAME);
  if (bin) state.argv.push(bin);
}

function gamescopeStage(state: StageState, config: Configuration, opts: AssembleOptions): void {
  if (!config.gamescope.enabled) return;
  const bin = opts.probe(GAMESCOPE_BIN_NAME);
  if (!bin) return;

  state.argv.push(bin);

  if (config.gamescope.hdr && !config.gamescope.args.includes(GAMESCOPE_HDR_ARG)) {
    state.argv.push(GAMESCOPE_HDR_ARG);
    state.environment.DXVK_HDR = "1";
    state.environment.ENABLE_HDR_WSI = "1";
  }

  for (const arg of config.gamescope.args) {
    state.argv.push(...arg.split(/\s+/).filter((token) => token !== ""));
  }

  // Everything after this belongs to the wrapped command, not gamescope
  state.argv.push("--");
}

function assertDirectory(path: string): void {
  let isDir = false;
  try {
    isDir = path !== "" && statSync(path).isDirectory();
  } catch (err) {
    throw new LaunchError("config", `Specified proton path "${path}" does not exist: ${describeError(err)}`, {
      cause: err,
    });
  }
  if (!isDir) {
    throw new LaunchError("config", `Specified proton path "${path}" does not exist or is not a directory`);
  }
}

/**
 * Runs games outside Steam through umu-run with a dedicated prefix under
 * the compatdata base. Skipped inside a Steam session, where Steam already
 * supplies the runner.
 */
function umuStage(
  state: StageState,
  config: Configuration,
  ctx: LaunchContext,
  opts: AssembleOptions,
): void {
  if (opts.hostEnv[STEAM_COMPAT_DATA_ENV] !== undefined || !config.umu.enabled) return;
  const bin = opts.probe(UMU_RUN_BIN_NAME);
  if (!bin) return;

  const name = ctx.props[PROP_NAME] ?? "";
  if (name === "") {
    throw new LaunchError("missing-property", "Games outside steam need a name. Set with --name=<value>");
  }

  assertDirectory(config.umu.proton);

  const prefix = join(opts.compatDataBase, name);
  mkdirSync(prefix, { recursive: true });

  state.environment.WINEPREFIX = prefix;
  state.environment.GAMEID =
    ctx.props[PROP_ID] || config.umu.gameId || state.environment.GAMEID || name;
  state.environment.PROTONPATH = config.umu.proton;
  state.environment.STORE = config.umu.store;

  state.argv.push(bin, ...config.umu.args);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Builds the full invocation chain for a launch:
 *
 *   [gamemoderun] [gamescope <args> --] [umu-run <args>] <game command…>
 *
 * Each stage runs only when enabled in `config` and its binary is found by
 * `opts.probe`. The configuration is not mutated; injected variables are
 * returned in `environment`.
 *
 * Throws LaunchError when umu-run is enabled outside Steam without a game
 * name or without a valid proton directory.
 */
export function assembleCommand(
  config: Configuration,
  ctx: LaunchContext,
  opts: AssembleOptions,
): AssembledCommand {
  const state: StageState = { argv: [], environment: { ...config.environment } };

  mangohudStage(state, config, opts);
  gamemodeStage(state, config, opts);
  gamescopeStage(state, config, opts);
  umuStage(state, config, ctx, opts);
  state.argv.push(...ctx.command);

  log.debug({ argv: state.argv }, "Assembled command");
  return state;
}
