type Env = Record<string, string | undefined>;

const PLACEHOLDER = /\$\{([^}]*)\}|\$([A-Za-z0-9_]+)/g;

/**
 * Expands `$NAME` and `${NAME}` from `env`. Unset names expand to "".
 * A `$` not followed by a name is left as-is.
 *
 * @example
 *   expandEnv("$HOME/.cache/dxvk", { HOME: "/home/p" }) → "/home/p/.cache/dxvk"
 */
export function expandEnv(value: string, env: Env): string {
  return value.replace(PLACEHOLDER, (_match, braced: string | undefined, bare: string | undefined) => {
    return env[braced ?? bare ?? ""] ?? "";
  });
}

/**
 * Builds the environment handed to the game process.
 *
 * Variable precedence (highest wins):
 *   configured environment (expanded against the host)  >  inherited host env
 */
export function buildChildEnv(host: Env, configured: Record<string, string>): Record<string, string> {
  const inherited: Record<string, string> = {};
  for (const [key, value] of Object.entries(host)) {
    if (value !== undefined) inherited[key] = value;
  }

  const expanded: Record<string, string> = {};
  for (const [key, value] of Object.entries(configured)) {
    expanded[key] = expandEnv(value, host);
  }

  return { ...inherited, ...expanded };
}
