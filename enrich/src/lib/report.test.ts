import { describe, expect, it } from "vitest";
import type { GeoRecord, RegistrationRecord } from "../../../sdk/typescript/src/types.js";
import { formatSection, renderGeolocation, renderRegistration, renderReport } from "./report.js";

const GEO: GeoRecord = {
  ip: "192.0.2.10",
  city: "Springfield",
  region: null,
  country: "US",
  loc: null,
  postal: null,
  timezone: null,
  org: "AS64500 Example Net",
  asn: { asn: "AS64500", name: "Example Net", domain: null, route: null, type: "isp" },
  company: null,
  privacy: { vpn: false, proxy: true, tor: false, relay: false, hosting: false },
};

const REGISTRATION: RegistrationRecord = {
  ip: "192.0.2.10",
  startAddress: "192.0.2.0",
  endAddress: "192.0.2.255",
  cidr: "192.0.2.0/24",
  type: null,
  registrar: "arin",
  organization: "TEST-NET-1",
  registrant: null,
  address: null,
  country: null,
  created: "2010-05-01",
  updated: null,
  expires: null,
  statuses: ["active", "validated"],
};

describe("formatSection", () => {
  it("wraps the title in 60-character rules", () => {
    expect(formatSection("TITLE", "-")).toBe(`${"-".repeat(60)}\nTITLE\n${"-".repeat(60)}`);
  });
});

describe("renderGeolocation", () => {
  it("prints every field with N/A for the missing ones", () => {
    expect(renderGeolocation(GEO)).toEqual([
      "IP Address:       192.0.2.10",
      "City:             Springfield",
      "Region:           N/A",
      "Country:          US",
      "Location:         N/A",
      "Postal Code:      N/A",
      "Timezone:         N/A",
      "Organization:     AS64500 Example Net",
      "ASN Information:",
      "  ASN:          AS64500",
      "  Name:         Example Net",
      "  Domain:       N/A",
      "  Route:        N/A",
      "  Type:         isp",
      "Privacy/Proxy:",
      "  VPN:          false",
      "  Proxy:        true",
      "  Tor:          false",
      "  Relay:        false",
      "  Hosting:      false",
    ]);
  });
});

describe("renderRegistration", () => {
  it("prints only the fields the registry returned", () => {
    expect(renderRegistration(REGISTRATION)).toEqual([
      "IP Details:       192.0.2.10",
      "  IP Range:       192.0.2.0 - 192.0.2.255",
      "  CIDR:           192.0.2.0/24",
      "Registrar:        arin",
      "Organization:     TEST-NET-1",
      "Created:          2010-05-01",
      "Statuses:",
      "  - active",
      "  - validated",
    ]);
  });
});

describe("renderReport", () => {
  it("prints the lookup errors in their sections", () => {
    expect(
      renderReport({
        generated: "2026-01-02 03:04:05",
        geolocation: { ok: false, error: "HTTP 429 Too Many Requests" },
        registration: { ok: false, error: "request timed out after 10000ms" },
      })
    ).toEqual([
      `${"=".repeat(60)}\nIP ENRICHMENT REPORT\n${"=".repeat(60)}`,
      "Generated: 2026-01-02 03:04:05",
      `${"-".repeat(60)}\nIPINFO GEOLOCATION DATA\n${"-".repeat(60)}`,
      "Error fetching IPInfo data: HTTP 429 Too Many Requests",
      `${"-".repeat(60)}\nWHOIS REGISTRATION DATA\n${"-".repeat(60)}`,
      "Error fetching WHOIS data: request timed out after 10000ms",
    ]);
  });
});
