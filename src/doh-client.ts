import { isValidationError, up } from "up-fetch";
import { z } from "zod";
import { DOH_JSON_CONTENT_TYPE, MAX_TIMEOUT_MS, RCODE } from "./constants";
import { DecodeError, DohProxyError, NetworkError, UpstreamRejectedError } from "./errors";
import { typeToMnemonic } from "./record-types";
import type { DohQueryClient, ResourceRecord } from "./types";
import { formatRecordLine, parseRecordLine } from "./zone-line";

const DohQuestionSchema = z.object({
  name: z.string(),
  type: z.number().int(),
});

const DohAnswerSchema = z.object({
  name: z.string(),
  type: z.number().int().nonnegative(),
  TTL: z.number().int(),
  data: z.string(),
});

export const DohResponseSchema = z.object({
  Status: z.number().int(),
  TC: z.boolean().optional(),
  RD: z.boolean().optional(),
  RA: z.boolean().optional(),
  AD: z.boolean().optional(),
  CD: z.boolean().optional(),
  Question: z.array(DohQuestionSchema).optional(),
  Answer: z.array(DohAnswerSchema).optional(),
});

export type DohResponse = z.infer<typeof DohResponseSchema>;

export type DohClientOptions = {
  /** Per-request deadline; zero or negative disables it. */
  timeoutSeconds: number;
  fetch?: typeof fetch;
};

/** Whole milliseconds for the abort timer, or `undefined` for no deadline. */
export function timeoutMillis(seconds: number): number | undefined {
  if (!(seconds > 0)) return undefined;
  return Math.min(Math.ceil(seconds * 1000), MAX_TIMEOUT_MS);
}

function createUpfetch(options: DohClientOptions) {
  const timeout = timeoutMillis(options.timeoutSeconds);
  return up(options.fetch ?? fetch, () => ({
    headers: { Accept: DOH_JSON_CONTENT_TYPE },
    timeout,
  }));
}

async function readJson(response: Response, upstream: string): Promise<unknown> {
  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new NetworkError(upstream, error);
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new DecodeError(upstream, error);
  }
}

/**
 * Client for the JSON flavour of DNS-over-HTTPS
 * (`GET ?name=<fqdn>&type=<mnemonic>`, `Accept: application/dns-json`).
 */
export class DohClient implements DohQueryClient {
  private readonly upfetch: ReturnType<typeof createUpfetch>;

  constructor(options: DohClientOptions) {
    this.upfetch = createUpfetch(options);
  }

  async query(upstream: string, name: string, type: number): Promise<ResourceRecord[]> {
    const mnemonic = typeToMnemonic(type);
    const response = await this.fetchEnvelope(upstream, name, mnemonic);

    if (response.Status !== RCODE.NOERROR) {
      throw new UpstreamRejectedError(upstream, response.Status);
    }

    return (response.Answer ?? []).map((answer) =>
      parseRecordLine(formatRecordLine(answer.name, answer.TTL, typeToMnemonic(answer.type), answer.data)),
    );
  }

  private async fetchEnvelope(upstream: string, name: string, mnemonic: string): Promise<DohResponse> {
    try {
      return await this.upfetch(upstream, {
        params: { name, type: mnemonic },
        parseResponse: (response) => readJson(response, upstream),
        schema: DohResponseSchema,
      });
    } catch (error) {
      if (error instanceof DohProxyError) throw error;
      if (isValidationError(error)) throw new DecodeError(upstream, error);
      throw new NetworkError(upstream, error);
    }
  }
}
