// Re-export detect
export {
  STEAM_APPID_FILENAME,
  matchGameExecutable,
  matchSteamAppId,
  readSidecarAppId,
  enrichAppIdByExecutable,
  enrichAppIdByArgs,
} from "./detect.js";

// Re-export names
export {
  buildSteamSpyUrl,
  fetchSteamSpyName,
  resolveGameName,
  enrichGameName,
  type GameNameFetcher,
} from "./names.js";
