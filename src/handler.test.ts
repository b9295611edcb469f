import { describe, expect, it, vi } from "vitest";
import { buildAnswerResponse, encodeQuery, parseMessage, rcodeOf } from "./dns-codec";
import { AllUpstreamsFailedError, NetworkError } from "./errors";
import { createQueryHandler } from "./handler";
import type { DnsQuestion, DohQueryClient, QueryResolver, ResourceRecord } from "./types";
import { UpstreamResolver } from "./upstream";

const exampleA: ResourceRecord = { name: "example.com.", ttl: 300, type: "A", address: "93.184.216.34" };

function question(name: string, type = 1): DnsQuestion {
  return { name, type, class: 1 };
}

function resolverReturning(answers: Record<string, ResourceRecord[]>) {
  const resolve = vi.fn(async (name: string, type: number) => {
    const records = answers[name];
    if (!records) throw new AllUpstreamsFailedError(name, type, []);
    return records;
  });
  const resolver: QueryResolver = { resolve };
  return { resolver, resolve };
}

async function send(resolver: QueryResolver, packet: Uint8Array) {
  const reply = await createQueryHandler(resolver)(packet);
  if (!reply) throw new Error("expected a reply");
  return parseMessage(reply);
}

describe("createQueryHandler", () => {
  it("answers a query through the upstreams", async () => {
    const client: DohQueryClient = { query: async () => [exampleA] };
    const resolver = new UpstreamResolver(["https://doh.test/dns-query"], client);

    const reply = await send(resolver, encodeQuery({ id: 0x1234, questions: [question("example.com.")] }));

    expect(reply.id).toBe(0x1234);
    expect(rcodeOf(reply.flags)).toBe(0);
    expect(reply.answers).toEqual([
      { name: "example.com.", type: 1, class: 1, ttl: 300, data: Uint8Array.of(93, 184, 216, 34) },
    ]);
  });

  it("returns SERVFAIL with the request id when every upstream fails", async () => {
    const failing: DohQueryClient = {
      query: async (upstream) => {
        throw new NetworkError(upstream, "connection refused");
      },
    };
    const resolver = new UpstreamResolver(["https://one.test/dns-query", "https://two.test/dns-query"], failing);

    const reply = await send(resolver, encodeQuery({ id: 0x4242, questions: [question("example.com.")] }));

    expect(reply.id).toBe(0x4242);
    expect(rcodeOf(reply.flags)).toBe(2);
    expect(reply.answers).toEqual([]);
  });

  it("fails queries without questions before asking any upstream", async () => {
    const { resolver, resolve } = resolverReturning({});

    const reply = await send(resolver, encodeQuery({ id: 7, questions: [] }));

    expect(reply.id).toBe(7);
    expect(rcodeOf(reply.flags)).toBe(2);
    expect(resolve).not.toHaveBeenCalled();
  });

  it("fails opcodes other than QUERY", async () => {
    const { resolver, resolve } = resolverReturning({ "example.com.": [exampleA] });

    const reply = await send(resolver, encodeQuery({ id: 8, questions: [question("example.com.")], opcode: 2 }));

    expect(rcodeOf(reply.flags)).toBe(2);
    expect(resolve).not.toHaveBeenCalled();
  });

  it("answers only the first question that resolves", async () => {
    const other: ResourceRecord = { name: "two.test.", ttl: 60, type: "A", address: "192.0.2.2" };
    const { resolver, resolve } = resolverReturning({ "two.test.": [other], "three.test.": [exampleA] });

    const reply = await send(
      resolver,
      encodeQuery({ id: 9, questions: [question("one.test."), question("two.test."), question("three.test.")] }),
    );

    expect(rcodeOf(reply.flags)).toBe(0);
    expect(reply.answers).toHaveLength(1);
    expect(reply.answers[0]).toMatchObject({ name: "two.test.", data: Uint8Array.of(192, 0, 2, 2) });
    expect(resolve.mock.calls.map(([name]) => name)).toEqual(["one.test.", "two.test."]);
  });

  it("maps unexpected resolver errors to SERVFAIL", async () => {
    const resolver: QueryResolver = {
      resolve: async () => {
        throw new Error("boom");
      },
    };

    const reply = await send(resolver, encodeQuery({ id: 10, questions: [question("example.com.")] }));

    expect(reply.id).toBe(10);
    expect(rcodeOf(reply.flags)).toBe(2);
  });

  it("answers undecodable bodies with FORMERR", async () => {
    const { resolver } = resolverReturning({});
    const packet = encodeQuery({ id: 11, questions: [question("example.com.")] }).slice(0, 15);

    const reply = await createQueryHandler(resolver)(packet);

    expect(reply).toEqual(Uint8Array.of(0, 11, 0x81, 0x01, 0, 0, 0, 0, 0, 0, 0, 0));
  });

  it("ignores packets shorter than a header and responses", async () => {
    const { resolver, resolve } = resolverReturning({ "example.com.": [exampleA] });
    const handle = createQueryHandler(resolver);
    const response = buildAnswerResponse(
      parseMessage(encodeQuery({ id: 12, questions: [question("example.com.")] })),
      [exampleA],
    );

    await expect(handle(Uint8Array.of(0, 1, 2))).resolves.toBeNull();
    await expect(handle(response)).resolves.toBeNull();
    expect(resolve).not.toHaveBeenCalled();
  });
});
