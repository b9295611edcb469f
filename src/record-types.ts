import { QTYPE } from "./constants";
import { UnsupportedTypeError } from "./errors";
import type { RecordMnemonic } from "./types";

const SUPPORTED_TYPES: readonly RecordMnemonic[] = [
  "A",
  "AAAA",
  "CNAME",
  "MX",
  "TXT",
  "SPF",
  "NS",
  "SOA",
  "PTR",
  "ANY",
];

const MNEMONIC_BY_CODE = new Map(
  SUPPORTED_TYPES.map((mnemonic): [number, RecordMnemonic] => [QTYPE[mnemonic], mnemonic]),
);

export function typeToMnemonic(code: number): RecordMnemonic {
  const mnemonic = MNEMONIC_BY_CODE.get(code);
  if (!mnemonic) {
    throw new UnsupportedTypeError(code);
  }
  return mnemonic;
}

export function parseMnemonic(text: string): RecordMnemonic {
  const upper = text.toUpperCase();
  const known = SUPPORTED_TYPES.find((candidate) => candidate === upper);
  if (!known) {
    throw new UnsupportedTypeError(text);
  }
  return known;
}
