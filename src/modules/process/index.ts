import { spawnSync } from "child_process";
import { join } from "path";
import { logger } from "../../logger.js";

const log = logger.child({ module: "process" });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** Complete child environment; inherits process.env when omitted. */
  env?: Record<string, string>;
  cwd?: string;
  /** Written to the child's stdin. */
  input?: string;
}

export interface ProcessOutcome {
  /** Exit status, or null when killed by a signal or never started. */
  status: number | null;
  signal: string | null;
  /** stdout followed by stderr. */
  output: string;
  /** Set when the process could not be spawned. */
  error?: Error;
}

/**
 * Runs `argv[0]` with the remaining arguments and blocks until it exits.
 * Injected so tests never start real processes.
 */
export type ProcessRunner = (argv: readonly string[], options?: RunOptions) => ProcessOutcome;

export function succeeded(outcome: ProcessOutcome): boolean {
  return !outcome.error && outcome.status === 0;
}

// ---------------------------------------------------------------------------
// Default runner
// ---------------------------------------------------------------------------

/**
 * Blocks until the child exits and captures everything it prints.
 * Output is never capped: a game that logs heavily still runs to completion.
 */
export const spawnRunner: ProcessRunner = (argv, options = {}) => {
  const [file, ...args] = argv;
  if (!file) {
    return { status: null, signal: null, output: "", error: new Error("Empty command") };
  }

  const result = spawnSync(file, args, {
    env: options.env,
    cwd: options.cwd,
    input: options.input,
    encoding: "utf-8",
    maxBuffer: Infinity,
  });

  return {
    status: result.status,
    signal: result.signal,
    output: `${result.stdout ?? ""}${result.stderr ?? ""}`,
    ...(result.error && { error: result.error }),
  };
};

// ---------------------------------------------------------------------------
// Hook scripts
// ---------------------------------------------------------------------------

/**
 * Runs each script in order as `<shell> <scriptsDir>/<script>`, waiting for
 * each to finish. A failing script is logged and the rest still run.
 */
export function executeScripts(
  scripts: readonly string[],
  scriptsDir: string,
  shell: string,
  run: ProcessRunner,
): void {
  for (const script of scripts) {
    const scriptPath = join(scriptsDir, script);
    log.info({ script: scriptPath }, "Executing script");

    const outcome = run([shell, scriptPath], { cwd: scriptsDir });
    if (!succeeded(outcome)) {
      log.warn(
        {
          script: scriptPath,
          status: outcome.status,
          signal: outcome.signal,
          err: outcome.error,
          output: outcome.output,
        },
        "Script failed",
      );
    }
  }
}
