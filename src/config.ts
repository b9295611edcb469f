import { Command, CommanderError, InvalidArgumentError } from "commander";
import { z } from "zod";
import { DEFAULT_ADDRESS, DEFAULT_TIMEOUT_SECONDS, MAX_TIMEOUT_SECONDS } from "./constants";
import { ConfigError } from "./errors";
import { parseList, parseListenAddress } from "./net-utils";
import type { ProxyConfig } from "./types";

type CliOptions = {
  address: string;
  upstream: string[];
  timeout: number;
};

const LONG_FLAGS = ["address", "upstream", "timeout"];

const UpstreamSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "expected an http or https URL");

function collect(value: string, previous: string[]) {
  return [...previous, value];
}

function parseSeconds(value: string) {
  const seconds = Number(value);
  if (!value.trim() || !Number.isFinite(seconds)) {
    throw new InvalidArgumentError("Not a number of seconds.");
  }
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`At most ${MAX_TIMEOUT_SECONDS} seconds.`);
  }
  return seconds;
}

// `-address` and `--address` are both accepted.
function normalizeArgs(argv: readonly string[]) {
  return argv.map((arg) => {
    const match = /^-([a-z]+)(=.*)?$/.exec(arg);
    return match && LONG_FLAGS.includes(match[1]) ? `-${arg}` : arg;
  });
}

export function createProgram(env: NodeJS.ProcessEnv) {
  return new Command()
    .name("dohproxy")
    .description("Answer UDP DNS queries through DNS-over-HTTPS JSON resolvers")
    .option("--address <host:port>", "UDP address to listen on", env.DNS_ADDRESS ?? DEFAULT_ADDRESS)
    .option("--upstream <url>", "DoH JSON endpoint, tried in the order given (repeatable)", collect, [])
    .option(
      "--timeout <seconds>",
      "deadline for each upstream request, 0 disables it",
      parseSeconds,
      env.DOH_TIMEOUT_SECONDS ? parseSeconds(env.DOH_TIMEOUT_SECONDS) : DEFAULT_TIMEOUT_SECONDS,
    )
    .configureOutput({ outputError: () => {} })
    .exitOverride();
}

/**
 * Builds the immutable process configuration from command-line flags,
 * falling back to `DNS_ADDRESS`, `DOH_UPSTREAMS` and `DOH_TIMEOUT_SECONDS`.
 * Help output surfaces as a `CommanderError`; every other problem is a
 * `ConfigError`.
 */
export function parseConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  let options: CliOptions;
  try {
    const program = createProgram(env);
    program.parse(normalizeArgs(argv), { from: "user" });
    options = program.opts<CliOptions>();
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode === 0) throw error;
    if (error instanceof CommanderError) throw new ConfigError(error.message);
    throw error;
  }

  const address = parseListenAddress(options.address);
  if (!address) {
    throw new ConfigError(`Invalid listen address "${options.address}"`);
  }

  const upstreams = options.upstream.length > 0 ? options.upstream : parseList(env.DOH_UPSTREAMS ?? "");
  if (upstreams.length === 0) {
    throw new ConfigError("-upstream is required");
  }
  for (const upstream of upstreams) {
    const result = UpstreamSchema.safeParse(upstream);
    if (!result.success) {
      throw new ConfigError(`Invalid upstream "${upstream}": ${result.error.issues[0]?.message ?? "invalid URL"}`);
    }
  }

  return Object.freeze({
    address: Object.freeze(address),
    upstreams: Object.freeze([...upstreams]),
    timeoutSeconds: options.timeout,
  });
}
