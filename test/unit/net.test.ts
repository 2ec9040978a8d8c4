import { describe, it, expect } from "vitest";
import { formatHostPort, parseHostPort } from "../../src/shared/net.js";

const FALLBACK = { host: "0.0.0.0", port: 6015 };

describe("parseHostPort", () => {
  it("returns the fallback for empty input", () => {
    expect(parseHostPort("", FALLBACK)).toEqual({ host: "0.0.0.0", port: 6015 });
    expect(parseHostPort(undefined, FALLBACK)).toEqual({ host: "0.0.0.0", port: 6015 });
  });

  it("parses port-only input", () => {
    expect(parseHostPort("7337", FALLBACK)).toEqual({ host: "0.0.0.0", port: 7337 });
  });

  it("parses host-only input", () => {
    expect(parseHostPort("patch.example.net", FALLBACK)).toEqual({ host: "patch.example.net", port: 6015 });
  });

  it("parses host:port", () => {
    expect(parseHostPort("127.0.0.1:7337", FALLBACK)).toEqual({ host: "127.0.0.1", port: 7337 });
    expect(parseHostPort("[::1]:6015", FALLBACK)).toEqual({ host: "::1", port: 6015 });
  });

  it("uses the fallback port when the port is invalid", () => {
    expect(parseHostPort("99999", FALLBACK)).toEqual({ host: "0.0.0.0", port: 6015 });
    expect(parseHostPort("127.0.0.1:bad", FALLBACK)).toEqual({ host: "127.0.0.1", port: 6015 });
    expect(parseHostPort("127.0.0.1:0", FALLBACK)).toEqual({ host: "127.0.0.1", port: 6015 });
  });

  it("uses the fallback host when the host is empty", () => {
    expect(parseHostPort(":8080", FALLBACK)).toEqual({ host: "0.0.0.0", port: 8080 });
  });
});

describe("formatHostPort", () => {
  it("brackets IPv6 hosts", () => {
    expect(formatHostPort({ host: "10.0.0.1", port: 6015 })).toBe("10.0.0.1:6015");
    expect(formatHostPort({ host: "::1", port: 6015 })).toBe("[::1]:6015");
  });
});
