import { homedir } from "node:os";
import path from "node:path";
import { access, readFile } from "node:fs/promises";

import * as toml from "toml";

import { errorMessage } from "./errors.js";
import { isRecord } from "./guards.js";
import type { AppConfig, JsonValue } from "./types.js";

const DEFAULT_HOME = process.env.WAYPOINT_HOME ?? path.join(homedir(), ".waypoint");
const DEFAULT_CONFIG_PATH = path.join(DEFAULT_HOME, "config.toml");

const DEFAULT_CONFIG: AppConfig = {
  chord: {
    prefix: "ctrl+x",
    quit_key: "q",
    timeout_seconds: 3
  },
  logging: {
    enabled: true,
    event_log: path.join("logs", "tui_events.log")
  },
  lookup: {
    ipinfo_token: "",
    timeout_seconds: 10,
    rdap_base_url: "https://rdap.org"
  }
};

type RawSection = Record<string, unknown>;

function cloneDefaults(): AppConfig {
  return structuredClone(DEFAULT_CONFIG);
}

export function expandHome(input: string): string {
  if (input.startsWith("~/")) {
    return path.join(homedir(), input.slice(2));
  }
  return input;
}

export function coerceEnvValue(raw: string): JsonValue {
  const lower = raw.toLowerCase();
  if (lower === "true" || lower === "false") {
    return lower === "true";
  }
  if (/^-?\d+$/.test(raw)) {
    return Number.parseInt(raw, 10);
  }
  if (/^-?\d+\.\d+$/.test(raw)) {
    return Number.parseFloat(raw);
  }
  return raw;
}

function sectionOf(raw: RawSection, name: keyof AppConfig): RawSection {
  const section = raw[name];
  return isRecord(section) ? section : {};
}

function pickString(section: RawSection, key: string, fallback: string): string {
  const value = section[key];
  if (typeof value === "string") {
    return value;
  }
  // env coercion turns numeric-looking tokens into numbers
  if (typeof value === "number") {
    return String(value);
  }
  return fallback;
}

// "ctrl+x", "alt+k", "ctrl+alt+w": modifiers joined by "+" ending in one letter
const CHORD_TEXT = /^(?:(?:ctrl|control|alt|meta)\s*\+\s*)+[a-z]$/i;
const SINGLE_LETTER = /^[a-z]$/i;

function pickMatching(section: RawSection, key: string, fallback: string, pattern: RegExp): string {
  const value = pickString(section, key, fallback).trim();
  return pattern.test(value) ? value : fallback;
}

function pickPositive(section: RawSection, key: string, fallback: number): number {
  const value = section[key];
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return value;
  }
  return fallback;
}

function pickBoolean(section: RawSection, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === "boolean" ? value : fallback;
}

function normalizeConfig(raw: RawSection, base: AppConfig): AppConfig {
  const chord = sectionOf(raw, "chord");
  const logging = sectionOf(raw, "logging");
  const lookup = sectionOf(raw, "lookup");

  return {
    chord: {
      prefix: pickMatching(chord, "prefix", base.chord.prefix, CHORD_TEXT),
      quit_key: pickMatching(chord, "quit_key", base.chord.quit_key, SINGLE_LETTER),
      timeout_seconds: pickPositive(chord, "timeout_seconds", base.chord.timeout_seconds)
    },
    logging: {
      enabled: pickBoolean(logging, "enabled", base.logging.enabled),
      event_log: expandHome(pickString(logging, "event_log", base.logging.event_log))
    },
    lookup: {
      ipinfo_token: pickString(lookup, "ipinfo_token", base.lookup.ipinfo_token),
      timeout_seconds: pickPositive(lookup, "timeout_seconds", base.lookup.timeout_seconds),
      rdap_base_url: pickString(lookup, "rdap_base_url", base.lookup.rdap_base_url)
    }
  };
}

export function applyEnvOverrides(base: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const sections = new Set<string>(["chord", "logging", "lookup"]);
  const raw: Record<string, Record<string, JsonValue>> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith("WAYPOINT_") || value === undefined) {
      continue;
    }

    const tokens = key.slice("WAYPOINT_".length).toLowerCase().split("_");
    if (tokens.length < 2) {
      continue;
    }

    const section = tokens[0];
    if (!sections.has(section)) {
      continue;
    }

    const field = tokens.slice(1).join("_");
    raw[section] = { ...raw[section], [field]: coerceEnvValue(value) };
  }

  return normalizeConfig(raw, base);
}

async function readTomlConfig(configPath: string): Promise<RawSection> {
  try {
    await access(configPath);
  } catch {
    return {};
  }

  const raw = await readFile(configPath, "utf8");
  let parsed: unknown;
  try {
    parsed = toml.parse(raw);
  } catch (err) {
    throw new Error(`invalid config file ${configPath}: ${errorMessage(err)}`);
  }
  return isRecord(parsed) ? parsed : {};
}

export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const resolvedConfigPath = expandHome(configPath ?? env.WAYPOINT_CONFIG ?? DEFAULT_CONFIG_PATH);
  const fromFile = await readTomlConfig(resolvedConfigPath);
  const normalized = normalizeConfig(fromFile, cloneDefaults());
  return applyEnvOverrides(normalized, env);
}

export function defaultConfig(): AppConfig {
  return cloneDefaults();
}

export const defaults = {
  DEFAULT_HOME,
  DEFAULT_CONFIG_PATH
};
