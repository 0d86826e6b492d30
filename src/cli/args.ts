import { ConfigError } from "../shared/errors.js";

export type FlagValue = string | true;

export interface ParsedArgs {
  command: string;
  /** Flag names in camelCase: `--max-lag 3` → `{ maxLag: "3" }`. */
  flags: Record<string, FlagValue>;
}

function camelCase(name: string): string {
  return name.replace(/-([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Split argv (without the node and script entries) into the command and its
 * flags. A flag followed by a token that is not itself a flag takes that
 * token as its value; otherwise it is a boolean switch.
 */
export function parseArgv(args: readonly string[]): ParsedArgs {
  const [command, ...rest] = args;
  if (!command || command.startsWith("--")) {
    throw new ConfigError("missing command");
  }

  const flags: Record<string, FlagValue> = {};
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith("--") || arg.length === 2) {
      throw new ConfigError(`unexpected argument "${arg}"`);
    }

    const eq = arg.indexOf("=");
    if (eq > 2) {
      flags[camelCase(arg.slice(2, eq))] = arg.slice(eq + 1);
      continue;
    }

    const name = camelCase(arg.slice(2));
    const next = rest[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags[name] = next;
      i++;
    } else {
      flags[name] = true;
    }
  }

  return { command, flags };
}
