/**
 * Every condition that ends a launch early is raised as a LaunchError and
 * handled once in main(). Absent helper binaries and a failing game process
 * are not errors.
 */
export type LaunchErrorKind =
  | "environment"       // HOME / XDG directories cannot be determined
  | "config"            // configuration read, parse or write failure
  | "usage"             // no game command on the command line
  | "missing-property"  // a launch needs a prop that was not given
  | "migration"         // compatdata copy or delete failure
  | "lookup"            // remote game name lookup failure
  | "tool";             // a required helper tool invocation failed

export class LaunchError extends Error {
  constructor(
    public readonly kind: LaunchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LaunchError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
