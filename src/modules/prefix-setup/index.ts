// Re-export eos-overlay
export { setupEosOverlay, type EosOverlayOptions } from "./eos-overlay.js";

// Re-export wine-audio
export {
  parseSoundSetting,
  currentAudioDriver,
  pickAudioDriverChange,
  syncWineAudioDriver,
  type AudioDriver,
  type WineAudioOptions,
} from "./wine-audio.js";
