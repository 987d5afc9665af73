import { loadConfig } from "../../../sdk/typescript/src/config.js";
import { formatLocalDateTime } from "../../../sdk/typescript/src/dates.js";
import {
  ErrorCode,
  LookupError,
  errorMessage,
  toLookupError,
} from "../../../sdk/typescript/src/errors.js";
import { assertIp, lookupGeolocation } from "../../../sdk/typescript/src/geo.js";
import { lookupRegistration } from "../../../sdk/typescript/src/rdap.js";
import type {
  AppConfig,
  GeoRecord,
  LookupOptions,
  RegistrationRecord,
} from "../../../sdk/typescript/src/types.js";
import { parseEnrichArgs } from "./args.js";
import { type Settled, renderReport } from "./report.js";

export const USAGE = `Usage: waypoint-enrich <ip> [options]

Look up geolocation (ipinfo.io) and registration (RDAP) data for an IP address.

Options:
  -t, --token TOKEN   ipinfo.io API token (default: lookup.ipinfo_token from config)
  --json              Print the report as JSON
  --config PATH       Settings file
  -h, --help          Show help`;

export interface EnrichDeps {
  lookupGeolocation: (ip: string, opts: LookupOptions) => Promise<GeoRecord>;
  lookupRegistration: (ip: string, opts: LookupOptions) => Promise<RegistrationRecord>;
  loadConfig: (configPath?: string) => Promise<AppConfig>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  now: () => Date;
}

const defaultDeps: EnrichDeps = {
  lookupGeolocation,
  lookupRegistration,
  loadConfig: (configPath) => loadConfig(configPath),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  now: () => new Date(),
};

async function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, data: await promise };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/** Runs one enrichment and returns the process exit code. */
export async function runEnrich(argv: string[], overrides: Partial<EnrichDeps> = {}): Promise<number> {
  const deps: EnrichDeps = { ...defaultDeps, ...overrides };

  // read before parsing so argument errors come out as JSON as well
  const json = argv.includes("--json");

  try {
    const args = parseEnrichArgs(argv);
    if (args.help) {
      deps.stdout(USAGE);
      return 0;
    }
    if (!args.ip) {
      throw new LookupError(ErrorCode.INVALID_ARGS, "missing IP address");
    }
    const ip = args.ip;
    assertIp(ip);

    const config = await deps.loadConfig(args.configPath ?? undefined);
    const token = args.token ?? (config.lookup.ipinfo_token || null);
    const timeoutMs = config.lookup.timeout_seconds * 1000;

    const [geolocation, registration] = await Promise.all([
      settle(deps.lookupGeolocation(ip, { token, timeoutMs })),
      settle(deps.lookupRegistration(ip, { timeoutMs, baseUrl: config.lookup.rdap_base_url })),
    ]);
    const generated = formatLocalDateTime(deps.now());

    if (json) {
      deps.stdout(JSON.stringify({ ip, generated, geolocation, registration }, null, 2));
    } else {
      deps.stdout(renderReport({ generated, geolocation, registration }).join("\n"));
    }
    return 0;
  } catch (err) {
    const failure = toLookupError(err);
    if (json) {
      deps.stdout(JSON.stringify({ ok: false, error: failure.toErrorPayload() }, null, 2));
      return failure.exitCode;
    }
    deps.stderr(`Error: ${failure.message}`);
    if (failure.code === ErrorCode.INVALID_ARGS) {
      deps.stderr(USAGE);
    }
    return failure.exitCode;
  }
}
