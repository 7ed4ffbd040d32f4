/**
 * ============================================================
 *  config store — Unit Tests
 * ============================================================
 *
 * Schema parsing is tested on strings; load/save round trips
 * write real YAML files into a temp directory.
 *
 * Module under test: src/modules/config/store.ts, schema.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe, after } from "node:test";
import assert from "node:assert/strict";
import { existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import {
  createDefaultConfiguration,
  loadConfiguration,
  loadOverride,
  parseConfigurationPatch,
  saveConfiguration,
  serializeConfiguration,
} from "./index.js";
import { LaunchError } from "../../errors.js";
import { makeTempDir, removeTempDirs } from "../../tests/helpers/index.js";

after(removeTempDirs);

// ─── Schema parsing ───────────────────────────────────────────────────────────

describe("parseConfigurationPatch", () => {
  test("maps YAML keys onto the in-memory names", () => {
    const patch = parseConfigurationPatch(
      [
        "eos-overlay:",
        "  enabled: true",
        "umu:",
        "  game-id: umu-1",
        "pre-scripts: [a.sh]",
        "post-scripts: [b.sh]",
      ].join("\n"),
      "test.yaml",
    );
    assert.deepEqual(patch.eosOverlay, { enabled: true });
    assert.equal(patch.umu?.gameId, "umu-1");
    assert.deepEqual(patch.preScripts, ["a.sh"]);
    assert.deepEqual(patch.postScripts, ["b.sh"]);
  });

  test("absent fields stay undefined", () => {
    const patch = parseConfigurationPatch("gamescope:\n  hdr: true\n", "test.yaml");
    assert.equal(patch.gamescope?.hdr, true);
    assert.equal(patch.gamescope?.enabled, undefined);
    assert.equal(patch.mangohud, undefined);
  });

  test("null lists and an empty document are accepted", () => {
    assert.deepEqual(parseConfigurationPatch("", "empty.yaml"), {});
    const patch = parseConfigurationPatch("gamescope:\n  args:\n", "test.yaml");
    assert.equal(patch.gamescope?.args, undefined);
  });

  test("numeric and boolean environment values become strings", () => {
    const patch = parseConfigurationPatch("environment:\n  DXVK_HDR: 1\n  FOO: true\n", "test.yaml");
    assert.deepEqual(patch.environment, { DXVK_HDR: "1", FOO: "true" });
  });

  test("unknown keys are ignored", () => {
    const patch = parseConfigurationPatch("colour: blue\nwine:\n  alsa: false\n  extra: 1\n", "test.yaml");
    assert.deepEqual(patch, { wine: { alsa: false } });
  });

  test("wine sync-audio maps to syncAudio", () => {
    const patch = parseConfigurationPatch("wine:\n  sync-audio: true\n", "test.yaml");
    assert.deepEqual(patch, { wine: { syncAudio: true } });
  });

  test("a wrongly typed field is a config error naming the path", () => {
    assert.throws(
      () => parseConfigurationPatch("gamemode:\n  enabled: sometimes\n", "bad.yaml"),
      (err: unknown) =>
        err instanceof LaunchError &&
        err.kind === "config" &&
        err.message.includes("bad.yaml") &&
        err.message.includes("gamemode.enabled"),
    );
  });

  test("broken YAML is a config error", () => {
    assert.throws(() => parseConfigurationPatch("a: [1, 2", "broken.yaml"), /Invalid YAML in broken\.yaml/);
  });
});

// ─── Serialization ────────────────────────────────────────────────────────────

describe("serializeConfiguration", () => {
  test("writes top-level keys in structure order", () => {
    const yaml = serializeConfiguration(createDefaultConfiguration());
    const keys = yaml
      .split("\n")
      .filter((line) => /^[a-z-]+:/.test(line))
      .map((line) => line.slice(0, line.indexOf(":")));
    assert.deepEqual(keys, [
      "environment",
      "wine",
      "mangohud",
      "gamemode",
      "gamescope",
      "eos-overlay",
      "umu",
      "pre-scripts",
      "post-scripts",
    ]);
  });
});

// ─── Load / save ──────────────────────────────────────────────────────────────

describe("loadConfiguration", () => {
  test("creates the file from defaults when missing", () => {
    const file = join(makeTempDir(), "nested", "config.yaml");
    const defaults = createDefaultConfiguration();

    const loaded = loadConfiguration(file, defaults);

    assert.equal(loaded, defaults);
    assert.ok(existsSync(file));
    assert.equal(readFileSync(file, "utf-8"), serializeConfiguration(defaults));
  });

  test("round-trips a default configuration field for field", () => {
    const file = join(makeTempDir(), "config.yaml");
    loadConfiguration(file, createDefaultConfiguration());
    assert.deepEqual(loadConfiguration(file, createDefaultConfiguration()), createDefaultConfiguration());
  });

  test("round-trips a customised configuration", () => {
    const file = join(makeTempDir(), "config.yaml");
    const config = createDefaultConfiguration();
    config.environment = { PROTON_ENABLE_WAYLAND: "1", CACHE: "$HOME/.cache/dxvk" };
    config.gamescope = { enabled: true, hdr: true, args: ["-W 3440 -H 1440", "-f"] };
    config.umu = { enabled: true, proton: "/opt/GE-Proton9-20", gameId: "umu-0", store: "gog", args: ["-dx12"] };
    config.preScripts = ["pre.sh"];
    config.postScripts = ["post.sh"];
    saveConfiguration(file, config);

    assert.deepEqual(loadConfiguration(file, createDefaultConfiguration()), config);
  });

  test("fills missing keys with defaults", () => {
    const file = join(makeTempDir(), "config.yaml");
    writeFileSync(file, "mangohud:\n  enabled: true\n");
    const loaded = loadConfiguration(file, createDefaultConfiguration());
    assert.equal(loaded.mangohud.enabled, true);
    assert.equal(loaded.gamemode.enabled, true);
    assert.equal(loaded.wine.alsa, true);
    assert.deepEqual(loaded.environment, {});
  });
});

describe("loadOverride", () => {
  test("returns only what the file mentions", () => {
    const file = join(makeTempDir(), "Game.yaml");
    writeFileSync(file, "gamemode:\n  enabled: false\n");
    assert.deepEqual(loadOverride(file), { gamemode: { enabled: false } });
  });

  test("a missing file is a config error", () => {
    assert.throws(
      () => loadOverride(join(makeTempDir(), "absent.yaml")),
      (err: unknown) => err instanceof LaunchError && err.kind === "config",
    );
  });
});
