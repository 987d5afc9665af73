/**
 * Plain-text rendering of the enrichment report.
 */

import type { GeoRecord, RegistrationRecord } from "../../../sdk/typescript/src/types.js";

export type Settled<T> = { ok: true; data: T } | { ok: false; error: string };

const RULE_WIDTH = 60;
const LABEL_WIDTH = 18;
const NA = "N/A";

export function formatSection(title: string, char = "="): string {
  const rule = char.repeat(RULE_WIDTH);
  return `${rule}\n${title}\n${rule}`;
}

/** `Label:` padded so values line up in one column; indented rows keep the column. */
function field(label: string, value: string, indent = 0): string {
  return `${" ".repeat(indent)}${`${label}:`.padEnd(LABEL_WIDTH - indent)}${value}`;
}

function subField(label: string, value: string): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH - 4)}${value}`;
}

export function renderGeolocation(geo: GeoRecord): string[] {
  const lines = [
    field("IP Address", geo.ip),
    field("City", geo.city ?? NA),
    field("Region", geo.region ?? NA),
    field("Country", geo.country ?? NA),
    field("Location", geo.loc ?? NA),
    field("Postal Code", geo.postal ?? NA),
    field("Timezone", geo.timezone ?? NA),
    field("Organization", geo.org ?? NA),
  ];

  if (geo.asn) {
    lines.push(
      "ASN Information:",
      subField("ASN", geo.asn.asn ?? NA),
      subField("Name", geo.asn.name ?? NA),
      subField("Domain", geo.asn.domain ?? NA),
      subField("Route", geo.asn.route ?? NA),
      subField("Type", geo.asn.type ?? NA)
    );
  }
  if (geo.company) {
    lines.push(
      "Company:",
      subField("Name", geo.company.name ?? NA),
      subField("Domain", geo.company.domain ?? NA),
      subField("Type", geo.company.type ?? NA)
    );
  }
  if (geo.privacy) {
    lines.push(
      "Privacy/Proxy:",
      subField("VPN", String(geo.privacy.vpn)),
      subField("Proxy", String(geo.privacy.proxy)),
      subField("Tor", String(geo.privacy.tor)),
      subField("Relay", String(geo.privacy.relay)),
      subField("Hosting", String(geo.privacy.hosting))
    );
  }
  return lines;
}

/** Only fields the registry returned are printed. */
export function renderRegistration(reg: RegistrationRecord): string[] {
  const lines = [field("IP Details", reg.ip)];
  if (reg.startAddress && reg.endAddress) {
    lines.push(field("IP Range", `${reg.startAddress} - ${reg.endAddress}`, 2));
  }
  if (reg.cidr) {
    lines.push(field("CIDR", reg.cidr, 2));
  }
  if (reg.type) {
    lines.push(field("Type", reg.type, 2));
  }
  if (reg.registrar) {
    lines.push(field("Registrar", reg.registrar));
  }
  if (reg.organization) {
    lines.push(field("Organization", reg.organization));
  }
  if (reg.registrant) {
    lines.push(field("Registrant", reg.registrant));
  }
  if (reg.address) {
    lines.push(field("Address", reg.address.replace(/\n/g, " "), 2));
  }
  if (reg.country) {
    lines.push(field("Country", reg.country, 2));
  }
  if (reg.created) {
    lines.push(field("Created", reg.created));
  }
  if (reg.expires) {
    lines.push(field("Expires", reg.expires));
  }
  if (reg.updated) {
    lines.push(field("Updated", reg.updated));
  }
  if (reg.statuses.length > 0) {
    lines.push("Statuses:", ...reg.statuses.map((s) => `  - ${s}`));
  }
  return lines;
}

export function renderReport(input: {
  generated: string;
  geolocation: Settled<GeoRecord>;
  registration: Settled<RegistrationRecord>;
}): string[] {
  const lines = [formatSection("IP ENRICHMENT REPORT", "="), `Generated: ${input.generated}`];

  lines.push(formatSection("IPINFO GEOLOCATION DATA", "-"));
  if (input.geolocation.ok) {
    lines.push(...renderGeolocation(input.geolocation.data));
  } else {
    lines.push(`Error fetching IPInfo data: ${input.geolocation.error}`);
  }

  lines.push(formatSection("WHOIS REGISTRATION DATA", "-"));
  if (input.registration.ok) {
    lines.push(...renderRegistration(input.registration.data));
  } else {
    lines.push(`Error fetching WHOIS data: ${input.registration.error}`);
  }

  return lines;
}
