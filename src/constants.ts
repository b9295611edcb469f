export const DEFAULT_ADDRESS = ":5354";
export const DEFAULT_TIMEOUT_SECONDS = 10;
// Largest delay a Node timer accepts.
export const MAX_TIMEOUT_MS = 0xffffffff;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMEOUT_MS / 1000);
export const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";

export const DOH_JSON_CONTENT_TYPE = "application/dns-json";

export const QTYPE = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  PTR: 12,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  SPF: 99,
  ANY: 255,
} as const;

export const QCLASS = {
  IN: 1,
} as const;

export const OPCODE = {
  QUERY: 0,
} as const;

export const RCODE = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

export const HEADER_LENGTH = 12;
export const MAX_LABEL_LENGTH = 63;
export const MAX_NAME_LENGTH = 255;
export const MAX_CHARACTER_STRING_LENGTH = 255;
