import { describe, expect, it } from "vitest";
import { AllUpstreamsFailedError, NetworkError, UpstreamRejectedError } from "./errors";
import type { DohQueryClient, ResourceRecord } from "./types";
import { UpstreamResolver } from "./upstream";

const U1 = "https://one.test/dns-query";
const U2 = "https://two.test/dns-query";

const fromU1: ResourceRecord = { name: "example.com.", ttl: 300, type: "A", address: "192.0.2.1" };
const fromU2: ResourceRecord = { name: "example.com.", ttl: 300, type: "A", address: "192.0.2.2" };

function stubClient(results: Record<string, ResourceRecord[] | Error>) {
  const calls: string[] = [];
  const client: DohQueryClient = {
    async query(upstream) {
      calls.push(upstream);
      const result = results[upstream];
      if (result instanceof Error) throw result;
      return result;
    },
  };
  return { client, calls };
}

describe("UpstreamResolver", () => {
  it("falls through to the next upstream when one fails", async () => {
    const { client, calls } = stubClient({ [U1]: new NetworkError(U1, "connection refused"), [U2]: [fromU2] });
    const resolver = new UpstreamResolver([U1, U2], client);

    await expect(resolver.resolve("example.com.", 1)).resolves.toEqual([fromU2]);
    expect(calls).toEqual([U1, U2]);
  });

  it("stops at the first upstream that answers", async () => {
    const { client, calls } = stubClient({ [U1]: [fromU1], [U2]: [fromU2] });
    const resolver = new UpstreamResolver([U1, U2], client);

    await expect(resolver.resolve("example.com.", 1)).resolves.toEqual([fromU1]);
    expect(calls).toEqual([U1]);
  });

  it("treats an empty answer as a success", async () => {
    const { client, calls } = stubClient({ [U1]: [], [U2]: [fromU2] });
    const resolver = new UpstreamResolver([U1, U2], client);

    await expect(resolver.resolve("example.com.", 1)).resolves.toEqual([]);
    expect(calls).toEqual([U1]);
  });

  it("starts from the first upstream on every query", async () => {
    const { client, calls } = stubClient({ [U1]: new UpstreamRejectedError(U1, 2), [U2]: [fromU2] });
    const resolver = new UpstreamResolver([U1, U2], client);

    await resolver.resolve("example.com.", 1);
    await resolver.resolve("example.com.", 1);
    expect(calls).toEqual([U1, U2, U1, U2]);
  });

  it("fails once every upstream has failed", async () => {
    const { client } = stubClient({
      [U1]: new NetworkError(U1, "timeout"),
      [U2]: new UpstreamRejectedError(U2, 2),
    });
    const resolver = new UpstreamResolver([U1, U2], client);

    const error = await resolver.resolve("example.com.", 1).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(AllUpstreamsFailedError);
    expect(error).toMatchObject({ kind: "AllUpstreamsFailed", question: "example.com.", type: 1 });
    if (!(error instanceof AllUpstreamsFailedError)) return;
    expect(error.failures.map((failure) => failure.upstream)).toEqual([U1, U2]);
  });
});
