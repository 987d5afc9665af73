/**
 * Registration lookup over RDAP (the JSON successor of WHOIS).
 *
 * Only the handful of fields the report prints are read; everything else in
 * the response is ignored.
 */

import { normalizeDate } from "./dates.js";
import { ErrorCode, LookupError } from "./errors.js";
import { assertIp } from "./geo.js";
import { isRecord, stringField } from "./guards.js";
import { fetchJson } from "./http.js";
import type { LookupOptions, RegistrationRecord } from "./types.js";

const DEFAULT_RDAP_BASE_URL = "https://rdap.org";

const CREATED_ACTIONS = new Set(["registration", "created", "announcement"]);
const UPDATED_ACTIONS = new Set(["last changed", "last update", "updated"]);
const EXPIRES_ACTIONS = new Set(["expiration", "expires"]);
const PREFERRED_ROLES = new Set(["registrant", "administrative", "technical"]);

type RdapEntity = Record<string, unknown>;

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function strings(value: unknown): string[] {
  if (typeof value === "string" && value.length > 0) {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string" && v.length > 0);
  }
  return [];
}

/** "whois.arin.net" -> "arin" */
function registryFromPort43(port43: string | null): string | null {
  if (!port43) {
    return null;
  }
  const match = /^whois\.([a-z]+)\./i.exec(port43);
  return match ? match[1].toLowerCase() : null;
}

function pickEntity(entities: RdapEntity[]): RdapEntity | null {
  for (const entity of entities) {
    const roles = strings(entity.roles).map((r) => r.toLowerCase());
    if (roles.some((r) => PREFERRED_ROLES.has(r))) {
      return entity;
    }
  }
  return entities[0] ?? null;
}

/** vcardArray is ["vcard", [[name, params, type, value], ...]]. */
function vcardProperties(entity: RdapEntity): unknown[][] {
  const vcard = entity.vcardArray;
  if (!Array.isArray(vcard) || !Array.isArray(vcard[1])) {
    return [];
  }
  return vcard[1].filter((prop): prop is unknown[] => Array.isArray(prop));
}

function vcardName(entity: RdapEntity): string | null {
  for (const prop of vcardProperties(entity)) {
    const value = prop[3];
    if (prop[0] === "fn" && typeof value === "string" && value.length > 0) {
      return value;
    }
  }
  return null;
}

function vcardAddress(entity: RdapEntity): string | null {
  for (const prop of vcardProperties(entity)) {
    if (prop[0] !== "adr") {
      continue;
    }
    const params = prop[1];
    const label = isRecord(params) ? params.label : undefined;
    if (typeof label === "string" && label.length > 0) {
      return label.replace(/\n/g, " ");
    }
    const parts = strings(prop[3]);
    if (parts.length > 0) {
      return parts.join(" ");
    }
  }
  return null;
}

function cidrOf(network: Record<string, unknown>): string | null {
  const cidrs = records(network.cidr0_cidrs)
    .map((entry) => {
      const prefix = stringField(entry, "v4prefix") ?? stringField(entry, "v6prefix");
      const length = entry.length;
      return prefix && typeof length === "number" ? `${prefix}/${length}` : null;
    })
    .filter((cidr): cidr is string => cidr !== null);
  return cidrs.length > 0 ? cidrs.join(", ") : null;
}

type EventDates = Pick<RegistrationRecord, "created" | "updated" | "expires">;

/** First matching event wins for each date. */
export function datesFromEvents(events: unknown): EventDates {
  const out: EventDates = { created: null, updated: null, expires: null };
  for (const event of records(events)) {
    const action = (stringField(event, "eventAction") ?? "").toLowerCase();
    const rawDate = stringField(event, "eventDate");
    const date = normalizeDate(rawDate);
    if (!date) {
      continue;
    }
    if (CREATED_ACTIONS.has(action)) {
      out.created = out.created ?? date;
    } else if (UPDATED_ACTIONS.has(action)) {
      out.updated = out.updated ?? date;
    } else if (EXPIRES_ACTIONS.has(action)) {
      out.expires = out.expires ?? date;
    }
  }
  return out;
}

/** Map an RDAP ip-network response onto a RegistrationRecord. */
export function parseRdapResponse(ip: string, body: unknown): RegistrationRecord {
  if (!isRecord(body)) {
    throw new LookupError(ErrorCode.LOOKUP_FAILED, "unexpected RDAP response", { ip });
  }
  const errorCode = body.errorCode;
  if (typeof errorCode === "number") {
    const title = stringField(body, "title") ?? `RDAP error ${errorCode}`;
    throw new LookupError(ErrorCode.LOOKUP_FAILED, title, { ip, status: errorCode });
  }

  const entity = pickEntity(records(body.entities));
  const handle = stringField(body, "handle");

  return {
    ip,
    startAddress: stringField(body, "startAddress"),
    endAddress: stringField(body, "endAddress"),
    cidr: cidrOf(body),
    type: stringField(body, "type"),
    registrar:
      registryFromPort43(stringField(body, "port43")) ?? stringField(body, "parentHandle") ?? handle,
    organization: stringField(body, "name"),
    registrant: entity ? vcardName(entity) : null,
    address: entity ? vcardAddress(entity) : null,
    country: stringField(body, "country"),
    ...datesFromEvents(body.events),
    statuses: strings(body.status),
  };
}

export async function lookupRegistration(
  ip: string,
  opts: LookupOptions = {}
): Promise<RegistrationRecord> {
  assertIp(ip);
  const base = (opts.baseUrl ?? DEFAULT_RDAP_BASE_URL).replace(/\/+$/, "");
  const body = await fetchJson(`${base}/ip/${encodeURIComponent(ip)}`, {
    timeoutMs: opts.timeoutMs,
    headers: { accept: "application/rdap+json, application/json" },
    fetch: opts.fetch,
  });
  return parseRdapResponse(ip, body);
}
