import { AllUpstreamsFailedError, describeError, toError, type UpstreamFailure } from "./errors";
import { createLogger, type Logger } from "./logger";
import type { DohQueryClient, QueryResolver, ResourceRecord } from "./types";

/**
 * Tries the configured upstreams one after another, always starting from
 * the first, and returns the records of the first one that answers.
 */
export class UpstreamResolver implements QueryResolver {
  constructor(
    private readonly upstreams: readonly string[],
    private readonly client: DohQueryClient,
    private readonly logger: Logger = createLogger("upstream"),
  ) {}

  async resolve(name: string, type: number): Promise<ResourceRecord[]> {
    const failures: UpstreamFailure[] = [];

    for (const upstream of this.upstreams) {
      try {
        return await this.client.query(upstream, name, type);
      } catch (error) {
        this.logger.warn({ upstream, name, type }, `${upstream} DoH query failed: ${describeError(error)}`);
        failures.push({ upstream, error: toError(error) });
      }
    }

    throw new AllUpstreamsFailedError(name, type, failures);
  }
}
