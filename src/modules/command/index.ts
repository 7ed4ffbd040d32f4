// Re-export probe
export {
  GAMEMODE_BIN_NAME,
  MANGOHUD_BIN_NAME,
  GAMESCOPE_BIN_NAME,
  UMU_RUN_BIN_NAME,
  LEGENDARY_BIN_NAME,
  WINETRICKS_BIN_NAME,
  whichProbe,
  type BinaryProbe,
} from "./probe.js";

// Re-export builder
export {
  GAMESCOPE_HDR_ARG,
  STEAM_COMPAT_DATA_ENV,
  assembleCommand,
  type AssembleOptions,
  type AssembledCommand,
} from "./builder.js";

// Re-export env
export { expandEnv, buildChildEnv } from "./env.js";
