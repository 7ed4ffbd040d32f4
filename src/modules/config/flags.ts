import { LaunchError } from "../../errors.js";
import type { Configuration } from "./schema.js";

// ---------------------------------------------------------------------------
// Launch context: runtime-only state, never written to disk
// ---------------------------------------------------------------------------

/** Well-known prop keys. Any other `--key=value` is kept as well. */
export const PROP_NAME = "name";
export const PROP_ID = "id";
export const PROP_STEAM_APPID = "steam-appid";

export interface LaunchContext {
  /** `--key=value` pairs plus values derived during the launch (name, id…). */
  props: Record<string, string>;
  /** One-shot `--flag` switches such as `save-name`. */
  specialFlags: Set<string>;
  /** The game invocation: first non-flag argument and everything after it. */
  command: string[];
}

// ---------------------------------------------------------------------------
// Boolean toggles
// ---------------------------------------------------------------------------

export type ToggleTarget = "gamescope" | "gamemode" | "hdr" | "mangohud" | "eosOverlay";

export interface Toggle {
  target: ToggleTarget;
  value: boolean;
}

const TOGGLE_CHARS: Readonly<Record<string, ToggleTarget>> = {
  G: "gamescope",
  g: "gamemode",
  h: "hdr",
  m: "mangohud",
  e: "eosOverlay",
};

function parseToggles(chars: string, value: boolean): Toggle[] {
  const toggles: Toggle[] = [];
  for (const char of chars) {
    const target = TOGGLE_CHARS[char];
    if (target) toggles.push({ target, value });
  }
  return toggles;
}

export function applyToggles(config: Configuration, toggles: readonly Toggle[]): void {
  for (const { target, value } of toggles) {
    switch (target) {
      case "gamescope":
        config.gamescope.enabled = value;
        break;
      case "gamemode":
        config.gamemode.enabled = value;
        break;
      case "hdr":
        config.gamescope.hdr = value;
        break;
      case "mangohud":
        config.mangohud.enabled = value;
        break;
      case "eosOverlay":
        config.eosOverlay.enabled = value;
        break;
    }
  }
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export interface ParsedArgs {
  context: LaunchContext;
  toggles: Toggle[];
  /** Index in `args` where the game command starts. */
  commandStart: number;
}

/**
 * Splits the launcher's own flags from the game command.
 *
 *   --key=value   props[key] = value (split at the first "=")
 *   --flag        specialFlags.add(flag)
 *   -!chars       turn the matching toggles off
 *   -chars        turn the matching toggles on
 *
 * The first argument matching none of these starts the game command.
 * `args` must not include the node binary or script path.
 *
 * Throws LaunchError("usage") when no command follows the flags.
 */
export function parseLaunchArgs(args: readonly string[]): ParsedArgs {
  // No prototype: `--__proto__=x` and `--constructor=y` are ordinary props
  const props: Record<string, string> = Object.create(null);
  const specialFlags = new Set<string>();
  const toggles: Toggle[] = [];

  for (const [i, arg] of args.entries()) {
    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq >= 0) {
        props[body.slice(0, eq)] = body.slice(eq + 1);
      } else {
        specialFlags.add(body);
      }
      continue;
    }

    if (arg.startsWith("-!")) {
      toggles.push(...parseToggles(arg.slice(2), false));
      continue;
    }

    if (arg.startsWith("-")) {
      toggles.push(...parseToggles(arg.slice(1), true));
      continue;
    }

    return {
      context: { props, specialFlags, command: args.slice(i) },
      toggles,
      commandStart: i,
    };
  }

  throw new LaunchError("usage", `Could not find command in: ${JSON.stringify(args)}`);
}
