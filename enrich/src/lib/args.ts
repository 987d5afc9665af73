import { ErrorCode, LookupError } from "../../../sdk/typescript/src/errors.js";

export type EnrichArgs = {
  ip: string | null;
  token: string | null;
  configPath: string | null;
  help: boolean;
};

const VALUE_FLAGS = new Set(["-t", "--token", "--config"]);

function readOption(args: string[], ...flags: string[]): string | null {
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx !== -1) {
      const value = args[idx + 1];
      if (value === undefined || value.startsWith("-")) {
        throw new LookupError(ErrorCode.INVALID_ARGS, `missing value for ${flag}`);
      }
      return value;
    }
    const inline = args.find((a) => a.startsWith(`${flag}=`));
    if (inline) {
      return inline.slice(flag.length + 1);
    }
  }
  return null;
}

function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith("-")) {
      continue;
    }
    out.push(arg);
  }
  return out;
}

export function parseEnrichArgs(args: string[]): EnrichArgs {
  const help = args.includes("--help") || args.includes("-h");
  const rest = positionals(args);
  if (rest.length > 1) {
    throw new LookupError(ErrorCode.INVALID_ARGS, `unexpected argument: ${rest[1]}`);
  }

  return {
    ip: rest[0] ?? null,
    token: readOption(args, "-t", "--token"),
    configPath: readOption(args, "--config"),
    help,
  };
}
