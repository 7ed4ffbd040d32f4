import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { parse, stringify } from "yaml";
import { logger } from "../../logger.js";
import { LaunchError, describeError } from "../../errors.js";
import {
  ConfigFileSchema,
  resolveConfiguration,
  toConfigFile,
  type Configuration,
  type ConfigurationPatch,
} from "./schema.js";

const log = logger.child({ module: "config" });

const FILE_MODE = 0o755;

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function serializeConfiguration(config: Configuration): string {
  return stringify(toConfigFile(config));
}

/**
 * Parses YAML text into a patch. `source` is only used in error messages.
 * Throws LaunchError("config") on YAML syntax or schema errors.
 */
export function parseConfigurationPatch(text: string, source: string): ConfigurationPatch {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new LaunchError("config", `Invalid YAML in ${source}: ${describeError(err)}`, { cause: err });
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new LaunchError("config", `Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Disk access
// ---------------------------------------------------------------------------

function readText(file: string): string {
  try {
    return readFileSync(file, "utf-8");
  } catch (err) {
    throw new LaunchError("config", `Could not read ${file}: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Writes `config` as YAML, creating parent directories as needed.
 */
export function saveConfiguration(file: string, config: Configuration): void {
  try {
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, serializeConfiguration(config), { mode: FILE_MODE });
  } catch (err) {
    throw new LaunchError("config", `Could not write ${file}: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Loads the configuration stored at `file`. When the file does not exist
 * yet, `defaults` is written there and returned unchanged.
 */
export function loadConfiguration(file: string, defaults: Configuration): Configuration {
  if (!existsSync(file)) {
    log.info({ path: file }, "Configuration file missing, writing defaults");
    saveConfiguration(file, defaults);
    return defaults;
  }

  return resolveConfiguration(parseConfigurationPatch(readText(file), file));
}

/**
 * Loads an override file as-is: fields it does not mention stay undefined
 * so they leave the base configuration alone when merged.
 */
export function loadOverride(file: string): ConfigurationPatch {
  return parseConfigurationPatch(readText(file), file);
}
