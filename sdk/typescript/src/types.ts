export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, JsonValue>;
  suggestion?: string | null;
}

// ── Configuration ───────────────────────────────────────────────

export interface ChordConfig {
  prefix: string;
  quit_key: string;
  timeout_seconds: number;
}

export interface LoggingConfig {
  enabled: boolean;
  event_log: string;
}

export interface LookupConfig {
  ipinfo_token: string;
  timeout_seconds: number;
  rdap_base_url: string;
}

export interface AppConfig {
  chord: ChordConfig;
  logging: LoggingConfig;
  lookup: LookupConfig;
}

// ── Lookup records ──────────────────────────────────────────────

export interface AsnInfo {
  asn: string | null;
  name: string | null;
  domain: string | null;
  route: string | null;
  type: string | null;
}

export interface CompanyInfo {
  name: string | null;
  domain: string | null;
  type: string | null;
}

export interface PrivacyInfo {
  vpn: boolean;
  proxy: boolean;
  tor: boolean;
  relay: boolean;
  hosting: boolean;
}

export interface GeoRecord {
  ip: string;
  city: string | null;
  region: string | null;
  country: string | null;
  loc: string | null;
  postal: string | null;
  timezone: string | null;
  org: string | null;
  asn: AsnInfo | null;
  company: CompanyInfo | null;
  privacy: PrivacyInfo | null;
}

export interface RegistrationRecord {
  ip: string;
  startAddress: string | null;
  endAddress: string | null;
  cidr: string | null;
  type: string | null;
  registrar: string | null;
  organization: string | null;
  registrant: string | null;
  address: string | null;
  country: string | null;
  created: string | null;
  updated: string | null;
  expires: string | null;
  statuses: string[];
}

/** Shape shared by both lookups so callers can swap in fakes. */
export interface LookupOptions {
  token?: string | null;
  timeoutMs?: number;
  baseUrl?: string;
  fetch?: typeof fetch;
}
