import { EdaFileError } from "../kicad/errors";

export function die(msg: string): never {
  console.error(`❌  ${msg}`);
  process.exit(1);
}

/**
 * Split `--flag value` pairs from positional arguments. A flag followed by
 * another flag or nothing is a boolean switch.
 */
export function parseArgs(args: string[]): { positional: string[]; flags: Map<string, string | true> } {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.set(arg.slice(2), next);
      i++;
    } else {
      flags.set(arg.slice(2), true);
    }
  }
  return { positional, flags };
}

export function numberFlag(flags: Map<string, string | true>, name: string): number | undefined {
  const value = flags.get(name);
  if (value === undefined) return undefined;
  const parsed = typeof value === "string" ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) die(`--${name} needs a number`);
  return parsed;
}

export function stringFlag(flags: Map<string, string | true>, name: string): string | undefined {
  const value = flags.get(name);
  if (value === true) die(`--${name} needs a value`);
  return value;
}

export function printJson(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

/** Report a failed operation and exit: typed errors as JSON on stderr. */
export function reportError(err: unknown): never {
  if (err instanceof EdaFileError) {
    console.error(JSON.stringify(err.toJSON(), null, 2));
    die(err.message);
  }
  console.error(err);
  process.exit(1);
}
