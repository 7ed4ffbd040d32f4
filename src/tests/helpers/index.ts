/**
 * Shared test utilities used across the test suite.
 *
 * Import selectively: only import what your test needs:
 *   import { makeTempDir } from "../../tests/helpers/index.js";
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { LaunchContext } from "../../modules/config/index.js";
import type { BinaryProbe } from "../../modules/command/index.js";
import type { ProcessOutcome, ProcessRunner, RunOptions } from "../../modules/process/index.js";

// ─── Temp directories ─────────────────────────────────────────────────────────

const tempDirs: string[] = [];

/**
 * Creates a fresh directory under the OS temp dir. Register
 * `after(removeTempDirs)` in the test file to clean up.
 */
export function makeTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "gamewrap-test-"));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

// ─── Launch context ───────────────────────────────────────────────────────────

/**
 * @example
 * makeContext({ name: "Celeste" }, ["/games/celeste/Celeste"])
 */
export function makeContext(
  props: Record<string, string> = {},
  command: string[] = ["/games/SomeGame/game.exe"],
): LaunchContext {
  return { props: { ...props }, specialFlags: new Set(), command };
}

// ─── Binary probe ─────────────────────────────────────────────────────────────

/**
 * A probe that "finds" exactly the named binaries under /usr/bin.
 *
 * @example
 * fakeProbe("gamescope")("gamescope") // → "/usr/bin/gamescope"
 * fakeProbe("gamescope")("mangohud")  // → null
 */
export function fakeProbe(...installed: string[]): BinaryProbe {
  const present = new Set(installed);
  return (binName) => (present.has(binName) ? `/usr/bin/${binName}` : null);
}

// ─── Process runner ───────────────────────────────────────────────────────────

export interface RecordedRun {
  argv: string[];
  options: RunOptions;
}

export interface RecordingRunner {
  runner: ProcessRunner;
  calls: RecordedRun[];
}

/**
 * A runner that records every invocation instead of spawning anything.
 * `respond` picks the outcome per call; the default is a clean exit 0.
 */
export function recordingRunner(
  respond: (argv: readonly string[]) => Partial<ProcessOutcome> = () => ({}),
): RecordingRunner {
  const calls: RecordedRun[] = [];
  const runner: ProcessRunner = (argv, options = {}) => {
    calls.push({ argv: [...argv], options });
    return { status: 0, signal: null, output: "", ...respond(argv) };
  };
  return { runner, calls };
}
