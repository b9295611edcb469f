import { OPCODE, RCODE } from "./constants";
import {
  buildAnswerResponse,
  buildFailureResponse,
  buildFormatErrorResponse,
  isResponse,
  opcodeOf,
  parseHeader,
  parseMessage,
} from "./dns-codec";
import { AllUpstreamsFailedError, describeError, InvalidRequestError } from "./errors";
import { createLogger, type Logger } from "./logger";
import type { DnsMessage, PacketHandler, QueryResolver } from "./types";

function rejectionReason(message: DnsMessage): string | null {
  if (message.questions.length === 0) return "Query has no questions";
  const opcode = opcodeOf(message.flags);
  if (opcode !== OPCODE.QUERY) return `Unsupported opcode ${opcode}`;
  return null;
}

async function answer(message: DnsMessage, resolver: QueryResolver, logger: Logger): Promise<Uint8Array> {
  // Only the first question that resolves is answered.
  for (const question of message.questions) {
    try {
      const records = await resolver.resolve(question.name, question.type);
      return buildAnswerResponse(message, records);
    } catch (error) {
      if (!(error instanceof AllUpstreamsFailedError)) throw error;
      logger.warn({ id: message.id, name: question.name, type: question.type }, error.message);
    }
  }
  return buildFailureResponse(message, RCODE.SERVFAIL);
}

/**
 * Turns one inbound datagram into the reply datagram. Returns `null` for
 * packets that get no reply at all: anything shorter than a DNS header,
 * and responses.
 */
export function createQueryHandler(resolver: QueryResolver, logger: Logger = createLogger("handler")): PacketHandler {
  return async (packet) => {
    const header = parseHeader(packet);
    if (!header || isResponse(header.flags)) return null;

    let message: DnsMessage;
    try {
      message = parseMessage(packet);
    } catch (error) {
      if (!(error instanceof InvalidRequestError)) throw error;
      logger.debug({ id: header.id }, `Malformed query: ${error.message}`);
      return buildFormatErrorResponse(header);
    }

    const reason = rejectionReason(message);
    if (reason) {
      logger.debug({ id: message.id }, reason);
      return buildFailureResponse(message, RCODE.SERVFAIL);
    }

    try {
      return await answer(message, resolver, logger);
    } catch (error) {
      logger.error({ id: message.id, err: error }, `Query handling failed: ${describeError(error)}`);
      return buildFailureResponse(message, RCODE.SERVFAIL);
    }
  };
}
