/**
 * ============================================================
 *  compat-data — Unit Tests
 * ============================================================
 *
 * Runs each migration branch against a real directory layout
 * in a temp dir:
 *
 *   <tmp>/steamapps/compatdata/<appid>   legacy (Steam's path)
 *   <tmp>/gamewrap/compatdata/<name>     new
 *
 * Module under test: src/modules/compat-data/index.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe, after } from "node:test";
import assert from "node:assert/strict";
import {
  chmodSync,
  lstatSync,
  mkdirSync,
  readFileSync,
  readlinkSync,
  statSync,
  symlinkSync,
  writeFileSync,
} from "fs";
import { join } from "path";
import { migrateCompatData, replaceSymlink } from "./index.js";
import { makeTempDir, removeTempDirs } from "../../tests/helpers/index.js";

after(removeTempDirs);

function layout() {
  const root = makeTempDir();
  const steamCompat = join(root, "steamapps", "compatdata");
  mkdirSync(steamCompat, { recursive: true });
  const base = join(root, "gamewrap", "compatdata");
  mkdirSync(base, { recursive: true });
  return {
    legacy: join(steamCompat, "367520"),
    base,
    target: join(base, "Hollow Knight"),
  };
}

function assertLinked(legacy: string, target: string): void {
  assert.ok(lstatSync(legacy).isSymbolicLink(), `${legacy} should be a symlink`);
  assert.equal(readlinkSync(legacy), target);
}

describe("migrateCompatData: new absent, legacy directory present", () => {
  test("moves the files, keeps their modes and links legacy → new", () => {
    const { legacy, base, target } = layout();
    mkdirSync(join(legacy, "pfx", "drive_c"), { recursive: true });
    writeFileSync(join(legacy, "version"), "9.0");
    writeFileSync(join(legacy, "pfx", "drive_c", "save.dat"), "progress");
    chmodSync(join(legacy, "version"), 0o640);
    chmodSync(join(legacy, "pfx", "drive_c", "save.dat"), 0o600);

    const result = migrateCompatData(legacy, base, "Hollow Knight");

    assert.deepEqual(result, { action: "copied", compatDataPath: target });
    assertLinked(legacy, target);
    assert.equal(readFileSync(join(target, "version"), "utf-8"), "9.0");
    assert.equal(readFileSync(join(target, "pfx", "drive_c", "save.dat"), "utf-8"), "progress");
    assert.equal(statSync(join(target, "version")).mode & 0o777, 0o640);
    assert.equal(statSync(join(target, "pfx", "drive_c", "save.dat")).mode & 0o777, 0o600);
  });
});

describe("migrateCompatData: new present, legacy directory present", () => {
  test("drops the legacy copy and keeps the new data", () => {
    const { legacy, base, target } = layout();
    mkdirSync(legacy);
    writeFileSync(join(legacy, "version"), "stale");
    mkdirSync(target);
    writeFileSync(join(target, "version"), "current");

    const result = migrateCompatData(legacy, base, "Hollow Knight");

    assert.equal(result.action, "replaced");
    assertLinked(legacy, target);
    assert.equal(readFileSync(join(target, "version"), "utf-8"), "current");
  });
});

describe("migrateCompatData: legacy absent or not a directory", () => {
  test("creates the link when nothing is at the legacy path", () => {
    const { legacy, base, target } = layout();
    const result = migrateCompatData(legacy, base, "Hollow Knight");
    assert.equal(result.action, "relinked");
    assertLinked(legacy, target);
  });

  test("a second run over an existing link only relinks", () => {
    const { legacy, base, target } = layout();
    mkdirSync(legacy);
    writeFileSync(join(legacy, "version"), "9.0");

    migrateCompatData(legacy, base, "Hollow Knight");
    const second = migrateCompatData(legacy, base, "Hollow Knight");

    assert.equal(second.action, "relinked");
    assertLinked(legacy, target);
    assert.equal(readFileSync(join(target, "version"), "utf-8"), "9.0");
  });

  test("replaces a plain file at the legacy path", () => {
    const { legacy, base, target } = layout();
    writeFileSync(legacy, "not a directory");
    const result = migrateCompatData(legacy, base, "Hollow Knight");
    assert.equal(result.action, "relinked");
    assertLinked(legacy, target);
  });
});

describe("replaceSymlink", () => {
  test("creates a missing link", () => {
    const root = makeTempDir();
    replaceSymlink("/some/target", join(root, "link"));
    assert.equal(readlinkSync(join(root, "link")), "/some/target");
  });

  test("repoints an existing link", () => {
    const root = makeTempDir();
    symlinkSync("/old/target", join(root, "link"));
    replaceSymlink("/new/target", join(root, "link"));
    assert.equal(readlinkSync(join(root, "link")), "/new/target");
  });
});
