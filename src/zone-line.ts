import { MAX_CHARACTER_STRING_LENGTH } from "./constants";
import { encodeRecord, labelsToName, nameToLabels } from "./dns-codec";
import { describeError, RecordParseError } from "./errors";
import { ipv4ToBytes, ipv6ToBytes } from "./net-utils";
import { parseMnemonic } from "./record-types";
import type { RecordMnemonic, ResourceRecord } from "./types";

const textEncoder = new TextEncoder();

type Token = { text: string; quoted: boolean };

const MAX_U16 = 0xffff;
const MAX_U32 = 0xffffffff;

export function formatRecordLine(name: string, ttl: number, type: string, data: string): string {
  return `${name} ${ttl} IN ${type} ${data}`;
}

/**
 * Splits a master-file line on whitespace. Double-quoted strings stay one
 * token, backslash escapes are kept verbatim for the field parsers, and an
 * unquoted `;` starts a comment.
 */
function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < line.length) {
    const ch = line[i];
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }
    if (ch === ";") break;

    const quoted = ch === '"';
    let text = "";
    i += quoted ? 1 : 0;
    let closed = !quoted;

    while (i < line.length) {
      const c = line[i];
      if (c === "\\") {
        if (i + 1 >= line.length) throw new Error("trailing backslash");
        text += line.slice(i, i + 2);
        i += 2;
        continue;
      }
      if (quoted && c === '"') {
        closed = true;
        i += 1;
        break;
      }
      if (!quoted && (/\s/.test(c) || c === '"' || c === ";")) break;
      text += c;
      i += 1;
    }

    if (!closed) throw new Error("unterminated quoted string");
    tokens.push({ text, quoted });
  }

  return tokens;
}

function unescapeBytes(text: string): Uint8Array {
  const out: number[] = [];
  const chars = Array.from(text);
  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch !== "\\") {
      out.push(...textEncoder.encode(ch));
      continue;
    }
    const digits = chars.slice(i + 1, i + 4).join("");
    if (/^\d{3}$/.test(digits)) {
      const value = Number(digits);
      if (value > 255) throw new Error(`escape \\${digits} out of range`);
      out.push(value);
      i += 3;
    } else {
      out.push(...textEncoder.encode(chars[i + 1]));
      i += 1;
    }
  }
  return Uint8Array.from(out);
}

function parseUint(text: string, max: number, field: string): number {
  if (!/^\d+$/.test(text)) throw new Error(`bad ${field} "${text}"`);
  const value = Number(text);
  if (value > max) throw new Error(`${field} ${text} out of range`);
  return value;
}

function parseDomainName(token: Token | undefined, field: string): string {
  if (!token) throw new Error(`missing ${field}`);
  if (token.quoted) throw new Error(`quoted ${field}`);
  return labelsToName(nameToLabels(token.text));
}

function expectFields(rdata: Token[], count: number, type: string) {
  if (rdata.length !== count) {
    throw new Error(`${type} expects ${count} field(s), got ${rdata.length}`);
  }
}

function parseRdata(type: RecordMnemonic, rdata: Token[], base: { name: string; ttl: number }): ResourceRecord {
  switch (type) {
    case "A": {
      expectFields(rdata, 1, type);
      const address = rdata[0].text;
      if (!ipv4ToBytes(address)) throw new Error(`bad A address "${address}"`);
      return { ...base, type, address };
    }
    case "AAAA": {
      expectFields(rdata, 1, type);
      const address = rdata[0].text;
      if (!ipv6ToBytes(address)) throw new Error(`bad AAAA address "${address}"`);
      return { ...base, type, address };
    }
    case "CNAME":
    case "NS":
    case "PTR":
      expectFields(rdata, 1, type);
      return { ...base, type, target: parseDomainName(rdata[0], "target") };
    case "MX":
      expectFields(rdata, 2, type);
      return {
        ...base,
        type,
        preference: parseUint(rdata[0].text, MAX_U16, "preference"),
        exchange: parseDomainName(rdata[1], "exchange"),
      };
    case "TXT":
    case "SPF": {
      if (rdata.length === 0) throw new Error(`${type} expects at least one string`);
      const strings = rdata.map((token) => unescapeBytes(token.text));
      const tooLong = strings.find((text) => text.length > MAX_CHARACTER_STRING_LENGTH);
      if (tooLong) {
        throw new Error(`character-string longer than ${MAX_CHARACTER_STRING_LENGTH} octets`);
      }
      return { ...base, type, strings };
    }
    case "SOA":
      expectFields(rdata, 7, type);
      return {
        ...base,
        type,
        mname: parseDomainName(rdata[0], "mname"),
        rname: parseDomainName(rdata[1], "rname"),
        serial: parseUint(rdata[2].text, MAX_U32, "serial"),
        refresh: parseUint(rdata[3].text, MAX_U32, "refresh"),
        retry: parseUint(rdata[4].text, MAX_U32, "retry"),
        expire: parseUint(rdata[5].text, MAX_U32, "expire"),
        minimum: parseUint(rdata[6].text, MAX_U32, "minimum"),
      };
    case "ANY":
      throw new Error("ANY is a query type, not a record type");
  }
}

/**
 * Parses `<name> <TTL> IN <TYPE> <data>` into a record, then encodes it once
 * so anything that would not survive the trip to wire format is rejected
 * here rather than when the reply is written.
 */
export function parseRecordLine(line: string): ResourceRecord {
  try {
    const tokens = tokenize(line);
    if (tokens.length < 4) throw new Error("expected <name> <TTL> IN <TYPE> <data>");
    const [owner, ttlToken, classToken, typeToken, ...rdata] = tokens;

    if (classToken.text.toUpperCase() !== "IN") {
      throw new Error(`unsupported class "${classToken.text}"`);
    }
    const base = {
      name: parseDomainName(owner, "owner name"),
      ttl: parseUint(ttlToken.text, MAX_U32, "TTL"),
    };
    const record = parseRdata(parseMnemonic(typeToken.text), rdata, base);
    encodeRecord(record);
    return record;
  } catch (error) {
    throw new RecordParseError(line, describeError(error));
  }
}
