import {
  HEADER_LENGTH,
  MAX_LABEL_LENGTH,
  MAX_NAME_LENGTH,
  OPCODE,
  QCLASS,
  QTYPE,
  RCODE,
} from "./constants";
import { InvalidRequestError } from "./errors";
import { ipv4ToBytes, ipv6ToBytes } from "./net-utils";
import type { DnsAnswer, DnsHeader, DnsMessage, DnsQuestion, ResourceRecord } from "./types";

const textEncoder = new TextEncoder();

const QR_FLAG = 1 << 15;
const RD_FLAG = 1 << 8;
const CD_FLAG = 1 << 4;
const OPCODE_SHIFT = 11;
const OPCODE_MASK = 0xf;
const RCODE_MASK = 0xf;

// Characters that must be escaped when a label is written as text.
const SPECIAL_LABEL_CHARS = new Set([".", "\\", '"', "(", ")", ";", "@", "$"].map((ch) => ch.charCodeAt(0)));

function u16(view: DataView, offset: number) {
  return view.getUint16(offset, false);
}

function u32(view: DataView, offset: number) {
  return view.getUint32(offset, false);
}

function writeU16(buf: Uint8Array, offset: number, value: number) {
  buf[offset] = (value >> 8) & 0xff;
  buf[offset + 1] = value & 0xff;
}

function writeU32(buf: Uint8Array, offset: number, value: number) {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function opcodeOf(flags: number) {
  return (flags >> OPCODE_SHIFT) & OPCODE_MASK;
}

export function rcodeOf(flags: number) {
  return flags & RCODE_MASK;
}

export function isResponse(flags: number) {
  return (flags & QR_FLAG) !== 0;
}

function wireLength(labels: readonly Uint8Array[]) {
  return labels.reduce((sum, label) => sum + label.length + 1, 1);
}

/**
 * Splits a presentation-format domain name into raw labels. Accepts `\X`
 * and `\DDD` escapes. A name without a trailing dot is taken as relative
 * to the root, so `example.com` and `example.com.` give the same labels.
 */
export function nameToLabels(name: string): Uint8Array[] {
  if (name === ".") return [];
  if (!name) throw new Error("empty name");

  const chars = Array.from(name);
  const labels: Uint8Array[] = [];
  let current: number[] = [];

  const closeLabel = () => {
    if (current.length === 0) throw new Error(`empty label in ${name}`);
    if (current.length > MAX_LABEL_LENGTH) throw new Error(`label longer than ${MAX_LABEL_LENGTH} octets in ${name}`);
    labels.push(Uint8Array.from(current));
    current = [];
  };

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch === "\\") {
      const digits = chars.slice(i + 1, i + 4).join("");
      if (/^\d{3}$/.test(digits)) {
        const value = Number(digits);
        if (value > 255) throw new Error(`escape \\${digits} out of range in ${name}`);
        current.push(value);
        i += 3;
        continue;
      }
      const escaped = chars[i + 1];
      if (escaped === undefined) throw new Error(`trailing backslash in ${name}`);
      current.push(...textEncoder.encode(escaped));
      i += 1;
      continue;
    }
    if (ch === ".") {
      closeLabel();
      continue;
    }
    current.push(...textEncoder.encode(ch));
  }
  if (current.length > 0) closeLabel();

  if (wireLength(labels) > MAX_NAME_LENGTH) {
    throw new Error(`name longer than ${MAX_NAME_LENGTH} octets: ${name}`);
  }
  return labels;
}

export function labelsToName(labels: readonly Uint8Array[]): string {
  if (labels.length === 0) return ".";
  const parts = labels.map((label) => {
    let text = "";
    for (const byte of label) {
      if (SPECIAL_LABEL_CHARS.has(byte)) {
        text += `\\${String.fromCharCode(byte)}`;
      } else if (byte < 0x21 || byte > 0x7e) {
        text += `\\${byte.toString().padStart(3, "0")}`;
      } else {
        text += String.fromCharCode(byte);
      }
    }
    return text;
  });
  return `${parts.join(".")}.`;
}

export function encodeName(name: string): Uint8Array {
  const chunks: number[] = [];
  for (const label of nameToLabels(name)) {
    chunks.push(label.length, ...label);
  }
  chunks.push(0);
  return Uint8Array.from(chunks);
}

function decodeName(bytes: Uint8Array, start: number): { name: string; next: number } {
  let offset = start;
  let jumped = false;
  let jumpNext = 0;
  const labels: Uint8Array[] = [];
  let guard = 0;

  while (true) {
    if (guard++ >= 128) {
      throw new InvalidRequestError("Name decode guard reached");
    }
    if (offset >= bytes.length) {
      throw new InvalidRequestError("Name decode out of range");
    }

    const len = bytes[offset];
    if (len === 0) {
      offset += 1;
      break;
    }

    if ((len & 0xc0) === 0xc0) {
      if (offset + 1 >= bytes.length) {
        throw new InvalidRequestError("Compression pointer out of range");
      }
      const ptr = ((len & 0x3f) << 8) | bytes[offset + 1];
      if (!jumped) {
        jumpNext = offset + 2;
        jumped = true;
      }
      offset = ptr;
      continue;
    }
    if ((len & 0xc0) !== 0) {
      throw new InvalidRequestError(`Unsupported label type 0x${len.toString(16)}`);
    }

    const labelEnd = offset + 1 + len;
    if (labelEnd > bytes.length) {
      throw new InvalidRequestError("Label out of range");
    }
    labels.push(bytes.slice(offset + 1, labelEnd));
    offset = labelEnd;
  }

  if (wireLength(labels) > MAX_NAME_LENGTH) {
    throw new InvalidRequestError("Name too long");
  }
  return { name: labelsToName(labels), next: jumped ? jumpNext : offset };
}

export function parseHeader(bytes: Uint8Array): DnsHeader | null {
  if (bytes.length < HEADER_LENGTH) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    id: u16(view, 0),
    flags: u16(view, 2),
    qdcount: u16(view, 4),
    ancount: u16(view, 6),
  };
}

/**
 * Decodes the header, question and answer sections. Authority and
 * additional sections (EDNS0 OPT included) are left unread.
 */
export function parseMessage(bytes: Uint8Array): DnsMessage {
  const header = parseHeader(bytes);
  if (!header) {
    throw new InvalidRequestError("Message shorter than DNS header");
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = HEADER_LENGTH;

  const questions: DnsQuestion[] = [];
  for (let i = 0; i < header.qdcount; i++) {
    const { name, next } = decodeName(bytes, offset);
    if (next + 4 > bytes.length) {
      throw new InvalidRequestError("Question out of range");
    }
    questions.push({ name, type: u16(view, next), class: u16(view, next + 2) });
    offset = next + 4;
  }

  const answers: DnsAnswer[] = [];
  for (let i = 0; i < header.ancount; i++) {
    const { name, next } = decodeName(bytes, offset);
    if (next + 10 > bytes.length) {
      throw new InvalidRequestError("Record header out of range");
    }
    const rdlength = u16(view, next + 8);
    const rdataStart = next + 10;
    if (rdataStart + rdlength > bytes.length) {
      throw new InvalidRequestError("Record data out of range");
    }
    answers.push({
      name,
      type: u16(view, next),
      class: u16(view, next + 2),
      ttl: u32(view, next + 4),
      data: bytes.slice(rdataStart, rdataStart + rdlength),
    });
    offset = rdataStart + rdlength;
  }

  return { id: header.id, flags: header.flags, questions, answers };
}

function encodeRdata(record: ResourceRecord): Uint8Array {
  switch (record.type) {
    case "A": {
      const bytes = ipv4ToBytes(record.address);
      if (!bytes) throw new Error(`Invalid IPv4: ${record.address}`);
      return bytes;
    }
    case "AAAA": {
      const bytes = ipv6ToBytes(record.address);
      if (!bytes) throw new Error(`Invalid IPv6: ${record.address}`);
      return bytes;
    }
    case "CNAME":
    case "NS":
    case "PTR":
      return encodeName(record.target);
    case "MX": {
      const preference = new Uint8Array(2);
      writeU16(preference, 0, record.preference);
      return concatBytes([preference, encodeName(record.exchange)]);
    }
    case "TXT":
    case "SPF":
      return concatBytes(record.strings.flatMap((text) => [Uint8Array.of(text.length), text]));
    case "SOA": {
      const timers = new Uint8Array(20);
      writeU32(timers, 0, record.serial);
      writeU32(timers, 4, record.refresh);
      writeU32(timers, 8, record.retry);
      writeU32(timers, 12, record.expire);
      writeU32(timers, 16, record.minimum);
      return concatBytes([encodeName(record.mname), encodeName(record.rname), timers]);
    }
  }
}

/** Wire form of one answer record; names are written uncompressed. */
export function encodeRecord(record: ResourceRecord): Uint8Array {
  const rdata = encodeRdata(record);
  if (rdata.length > 0xffff) {
    throw new Error(`Record data too long: ${rdata.length} octets`);
  }

  const rrHeader = new Uint8Array(10);
  writeU16(rrHeader, 0, QTYPE[record.type]);
  writeU16(rrHeader, 2, QCLASS.IN);
  writeU32(rrHeader, 4, record.ttl);
  writeU16(rrHeader, 8, rdata.length);
  return concatBytes([encodeName(record.name), rrHeader, rdata]);
}

function replyFlags(requestFlags: number, rcode: number) {
  const opcode = opcodeOf(requestFlags);
  // RD and CD are only carried over for standard queries.
  const copied = opcode === OPCODE.QUERY ? requestFlags & (RD_FLAG | CD_FLAG) : 0;
  return QR_FLAG | (opcode << OPCODE_SHIFT) | copied | (rcode & RCODE_MASK);
}

function encodeHeader(id: number, flags: number, qdcount: number, ancount: number): Uint8Array {
  const header = new Uint8Array(HEADER_LENGTH);
  writeU16(header, 0, id);
  writeU16(header, 2, flags);
  writeU16(header, 4, qdcount);
  writeU16(header, 6, ancount);
  writeU16(header, 8, 0);
  writeU16(header, 10, 0);
  return header;
}

function encodeQuestion(question: DnsQuestion): Uint8Array {
  const footer = new Uint8Array(4);
  writeU16(footer, 0, question.type);
  writeU16(footer, 2, question.class);
  return concatBytes([encodeName(question.name), footer]);
}

/**
 * Builds the reply to `request`: same ID, opcode, RD and CD, the first
 * question echoed back, and `records` as the answer section in order.
 */
export function buildResponse(request: DnsMessage, rcode: number, records: readonly ResourceRecord[]): Uint8Array {
  const question = request.questions[0];
  const parts: Uint8Array[] = [encodeHeader(request.id, replyFlags(request.flags, rcode), question ? 1 : 0, records.length)];
  if (question) {
    parts.push(encodeQuestion(question));
  }
  for (const record of records) {
    parts.push(encodeRecord(record));
  }
  return concatBytes(parts);
}

export function buildAnswerResponse(request: DnsMessage, records: readonly ResourceRecord[]): Uint8Array {
  return buildResponse(request, RCODE.NOERROR, records);
}

export function buildFailureResponse(request: DnsMessage, rcode: number = RCODE.SERVFAIL): Uint8Array {
  return buildResponse(request, rcode, []);
}

export function buildFormatErrorResponse(header: DnsHeader): Uint8Array {
  return encodeHeader(header.id, replyFlags(header.flags, RCODE.FORMERR), 0, 0);
}

export type QueryOptions = {
  id: number;
  questions: readonly DnsQuestion[];
  opcode?: number;
  recursionDesired?: boolean;
};

export function encodeQuery({ id, questions, opcode = OPCODE.QUERY, recursionDesired = true }: QueryOptions): Uint8Array {
  const flags = ((opcode & OPCODE_MASK) << OPCODE_SHIFT) | (recursionDesired ? RD_FLAG : 0);
  return concatBytes([encodeHeader(id, flags, questions.length, 0), ...questions.map(encodeQuestion)]);
}
