/**
 * Geolocation lookup against the ipinfo.io JSON API.
 */

import { isIP } from "node:net";

import { ErrorCode, LookupError } from "./errors.js";
import { isRecord, stringField } from "./guards.js";
import { fetchJson } from "./http.js";
import type { AsnInfo, CompanyInfo, GeoRecord, LookupOptions, PrivacyInfo } from "./types.js";

const IPINFO_BASE_URL = "https://ipinfo.io";

function parseAsn(raw: unknown): AsnInfo | null {
  if (!isRecord(raw)) {
    return null;
  }
  return {
    asn: stringField(raw, "asn"),
    name: stringField(raw, "name"),
    domain: stringField(raw, "domain"),
    route: stringField(raw, "route"),
    type: stringField(raw, "type"),
  };
}

function parseCompany(raw: unknown): CompanyInfo | null {
  if (!isRecord(raw)) {
    return null;
  }
  return {
    name: stringField(raw, "name"),
    domain: stringField(raw, "domain"),
    type: stringField(raw, "type"),
  };
}

function parsePrivacy(raw: unknown): PrivacyInfo | null {
  if (!isRecord(raw)) {
    return null;
  }
  return {
    vpn: raw.vpn === true,
    proxy: raw.proxy === true,
    tor: raw.tor === true,
    relay: raw.relay === true,
    hosting: raw.hosting === true,
  };
}

/** Map an ipinfo response body onto a GeoRecord. */
export function parseGeoResponse(ip: string, body: unknown): GeoRecord {
  if (!isRecord(body)) {
    throw new LookupError(ErrorCode.LOOKUP_FAILED, "unexpected geolocation response", { ip });
  }
  const error = body.error;
  if (isRecord(error)) {
    const message = stringField(error, "message") ?? stringField(error, "title");
    throw new LookupError(ErrorCode.LOOKUP_FAILED, message ?? "geolocation lookup failed", { ip });
  }

  return {
    ip: stringField(body, "ip") ?? ip,
    city: stringField(body, "city"),
    region: stringField(body, "region"),
    country: stringField(body, "country"),
    loc: stringField(body, "loc"),
    postal: stringField(body, "postal"),
    timezone: stringField(body, "timezone"),
    org: stringField(body, "org"),
    asn: parseAsn(body.asn),
    company: parseCompany(body.company),
    privacy: parsePrivacy(body.privacy),
  };
}

export function assertIp(ip: string): void {
  if (isIP(ip) === 0) {
    throw new LookupError(
      ErrorCode.INVALID_IP,
      `not an IP address: ${ip}`,
      { ip },
      "pass an IPv4 or IPv6 address"
    );
  }
}

export async function lookupGeolocation(ip: string, opts: LookupOptions = {}): Promise<GeoRecord> {
  assertIp(ip);
  const base = opts.baseUrl ?? IPINFO_BASE_URL;
  const headers: Record<string, string> = {};
  if (opts.token) {
    headers.authorization = `Bearer ${opts.token}`;
  }
  const body = await fetchJson(`${base}/${encodeURIComponent(ip)}/json`, {
    timeoutMs: opts.timeoutMs,
    headers,
    fetch: opts.fetch,
  });
  return parseGeoResponse(ip, body);
}
