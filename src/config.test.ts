import { CommanderError } from "commander";
import { describe, expect, it } from "vitest";
import { parseConfig } from "./config";
import { ConfigError } from "./errors";

const A = "https://a.test/dns-query";
const B = "https://b.test/dns-query";

describe("parseConfig", () => {
  it("reads single-dash and double-dash flags", () => {
    const config = parseConfig(["-upstream", A, "--upstream", B, "-timeout", "2.5", "-address=127.0.0.1:5300"], {});

    expect(config).toEqual({
      address: { host: "127.0.0.1", port: 5300 },
      upstreams: [A, B],
      timeoutSeconds: 2.5,
    });
  });

  it("falls back to defaults", () => {
    const config = parseConfig(["--upstream", A], {});

    expect(config.address).toEqual({ host: "0.0.0.0", port: 5354 });
    expect(config.timeoutSeconds).toBe(10);
  });

  it("falls back to the environment", () => {
    const config = parseConfig([], {
      DNS_ADDRESS: "[::1]:53",
      DOH_UPSTREAMS: `${A}, ${B}`,
      DOH_TIMEOUT_SECONDS: "0",
    });

    expect(config).toEqual({ address: { host: "::1", port: 53 }, upstreams: [A, B], timeoutSeconds: 0 });
  });

  it("prefers flags over the environment", () => {
    const config = parseConfig(["--upstream", B], { DOH_UPSTREAMS: A });
    expect(config.upstreams).toEqual([B]);
  });

  it("is frozen", () => {
    const config = parseConfig(["--upstream", A], {});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.upstreams)).toBe(true);
    expect(Object.isFrozen(config.address)).toBe(true);
  });

  it("requires an upstream", () => {
    expect(() => parseConfig([], {})).toThrow(new ConfigError("-upstream is required"));
  });

  it.each([
    ["a non-http upstream", ["--upstream", "ftp://a.test/dns-query"]],
    ["an upstream that is not a URL", ["--upstream", "dns.test"]],
    ["a timeout that is not a number", ["--upstream", A, "--timeout", "soon"]],
    ["a timeout beyond the timer range", ["--upstream", A, "--timeout", "5000000"]],
    ["an address without a port", ["--upstream", A, "--address", "localhost"]],
    ["an unknown flag", ["--upstream", A, "--verbose"]],
  ])("rejects %s", (_label, argv) => {
    expect(() => parseConfig(argv, {})).toThrow(ConfigError);
  });

  it("rejects an out-of-range timeout from the environment", () => {
    expect(() => parseConfig(["--upstream", A], { DOH_TIMEOUT_SECONDS: "5000000" })).toThrow(ConfigError);
  });

  it("lets help through as a commander exit", () => {
    let caught: unknown;
    const write = process.stdout.write;
    process.stdout.write = () => true;
    try {
      parseConfig(["--help"], {});
    } catch (error) {
      caught = error;
    } finally {
      process.stdout.write = write;
    }
    expect(caught).toBeInstanceOf(CommanderError);
    expect(caught).toMatchObject({ exitCode: 0 });
  });
});
