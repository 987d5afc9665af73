import { describe, expect, it, vi } from "vitest";
import { datesFromEvents, lookupRegistration, parseRdapResponse } from "./rdap.js";

const IP = "192.0.2.10";

const NETWORK = {
  handle: "NET-192-0-2-0-1",
  parentHandle: "NET-192-0-0-0-0",
  port43: "whois.arin.net",
  startAddress: "192.0.2.0",
  endAddress: "192.0.2.255",
  type: "ASSIGNMENT",
  name: "TEST-NET-1",
  country: "US",
  cidr0_cidrs: [{ v4prefix: "192.0.2.0", length: 24 }],
  status: ["active"],
  events: [
    { eventAction: "registration", eventDate: "2010-05-01T12:00:00-04:00" },
    { eventAction: "last changed", eventDate: "2020-01-02T03:04:05Z" },
  ],
  entities: [
    { roles: ["abuse"], vcardArray: ["vcard", [["fn", {}, "text", "Abuse Desk"]]] },
    {
      roles: ["registrant"],
      vcardArray: [
        "vcard",
        [
          ["version", {}, "text", "4.0"],
          ["fn", {}, "text", "Example Org"],
          ["adr", { label: "1 Example Way\nSpringfield" }, "text", ["", "", "", "", "", "", ""]],
        ],
      ],
    },
  ],
};

describe("parseRdapResponse", () => {
  it("maps an ip-network object", () => {
    expect(parseRdapResponse(IP, NETWORK)).toEqual({
      ip: IP,
      startAddress: "192.0.2.0",
      endAddress: "192.0.2.255",
      cidr: "192.0.2.0/24",
      type: "ASSIGNMENT",
      registrar: "arin",
      organization: "TEST-NET-1",
      registrant: "Example Org",
      address: "1 Example Way Springfield",
      country: "US",
      created: "2010-05-01",
      updated: "2020-01-02",
      expires: null,
      statuses: ["active"],
    });
  });

  it("falls back to the parent handle for the registrar", () => {
    const { port43: _port43, ...rest } = NETWORK;
    expect(parseRdapResponse(IP, rest).registrar).toBe("NET-192-0-0-0-0");
  });

  it("raises RDAP error objects", () => {
    expect(() => parseRdapResponse(IP, { errorCode: 404, title: "Not Found" })).toThrow("Not Found");
    expect(() => parseRdapResponse(IP, { errorCode: 500 })).toThrow("RDAP error 500");
  });
});

describe("datesFromEvents", () => {
  it("keeps the first date per kind", () => {
    expect(
      datesFromEvents([
        { eventAction: "expiration", eventDate: "2030-01-01" },
        { eventAction: "last changed", eventDate: "2021-06-01" },
        { eventAction: "last changed", eventDate: "2022-06-01" },
      ])
    ).toEqual({ created: null, updated: "2021-06-01", expires: "2030-01-01" });
  });

  it("ignores anything that is not a list", () => {
    expect(datesFromEvents("soon")).toEqual({ created: null, updated: null, expires: null });
  });
});

describe("lookupRegistration", () => {
  it("requests the ip path with RDAP content negotiation", async () => {
    const fetchStub = vi.fn<typeof fetch>(
      async () => new Response(JSON.stringify(NETWORK), { status: 200 })
    );

    const record = await lookupRegistration(IP, { baseUrl: "https://rdap.example/", fetch: fetchStub });

    expect(record.organization).toBe("TEST-NET-1");
    expect(fetchStub).toHaveBeenCalledWith(
      `https://rdap.example/ip/${IP}`,
      expect.objectContaining({
        headers: { accept: "application/rdap+json, application/json" },
      })
    );
  });
});
