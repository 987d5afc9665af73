import { describe, expect, it, vi } from "vitest";
import { ErrorCode } from "./errors.js";
import { lookupGeolocation, parseGeoResponse } from "./geo.js";

const IP = "192.0.2.10";

describe("parseGeoResponse", () => {
  it("maps the ipinfo body", () => {
    const record = parseGeoResponse(IP, {
      ip: IP,
      city: "Springfield",
      region: "Test Region",
      country: "US",
      loc: "12.3400,-56.7800",
      postal: "00000",
      timezone: "America/Chicago",
      org: "AS64500 Example Net",
      asn: { asn: "AS64500", name: "Example Net", domain: "example.net", route: "192.0.2.0/24", type: "isp" },
      privacy: { vpn: true, proxy: false, tor: "yes" },
    });

    expect(record).toEqual({
      ip: IP,
      city: "Springfield",
      region: "Test Region",
      country: "US",
      loc: "12.3400,-56.7800",
      postal: "00000",
      timezone: "America/Chicago",
      org: "AS64500 Example Net",
      asn: { asn: "AS64500", name: "Example Net", domain: "example.net", route: "192.0.2.0/24", type: "isp" },
      company: null,
      privacy: { vpn: true, proxy: false, tor: false, relay: false, hosting: false },
    });
  });

  it("leaves missing fields null", () => {
    const record = parseGeoResponse(IP, { city: "" });
    expect(record.ip).toBe(IP);
    expect(record.city).toBeNull();
    expect(record.asn).toBeNull();
  });

  it("raises the API error message", () => {
    expect(() =>
      parseGeoResponse(IP, { error: { title: "Wrong ip", message: "Please provide a valid IP address" } })
    ).toThrow("Please provide a valid IP address");
  });
});

describe("lookupGeolocation", () => {
  it("requests the address with the bearer token", async () => {
    const fetchStub = vi.fn<typeof fetch>(
      async () => new Response(JSON.stringify({ ip: IP, city: "Springfield" }), { status: 200 })
    );

    const record = await lookupGeolocation(IP, {
      token: "test-token",
      baseUrl: "https://geo.example",
      fetch: fetchStub,
    });

    expect(record.city).toBe("Springfield");
    expect(fetchStub).toHaveBeenCalledWith(
      `https://geo.example/${IP}/json`,
      expect.objectContaining({
        headers: { accept: "application/json", authorization: "Bearer test-token" },
      })
    );
  });

  it("rejects a malformed address without a request", async () => {
    const fetchStub = vi.fn<typeof fetch>();

    await expect(lookupGeolocation("999.1.1.1", { fetch: fetchStub })).rejects.toMatchObject({
      code: ErrorCode.INVALID_IP,
      message: "not an IP address: 999.1.1.1",
    });
    expect(fetchStub).not.toHaveBeenCalled();
  });
});
