import type { QTYPE } from "./constants";

export type RecordMnemonic = keyof typeof QTYPE;

type RecordBase = { name: string; ttl: number };

export type RecordA = RecordBase & { type: "A"; address: string };
export type RecordAAAA = RecordBase & { type: "AAAA"; address: string };
export type RecordTarget = RecordBase & { type: "CNAME" | "NS" | "PTR"; target: string };
export type RecordMX = RecordBase & { type: "MX"; preference: number; exchange: string };
export type RecordTXT = RecordBase & { type: "TXT" | "SPF"; strings: Uint8Array[] };
export type RecordSOA = RecordBase & {
  type: "SOA";
  mname: string;
  rname: string;
  serial: number;
  refresh: number;
  retry: number;
  expire: number;
  minimum: number;
};

export type ResourceRecord = RecordA | RecordAAAA | RecordTarget | RecordMX | RecordTXT | RecordSOA;

export type DnsHeader = {
  id: number;
  flags: number;
  qdcount: number;
  ancount: number;
};

export type DnsQuestion = {
  name: string;
  type: number;
  class: number;
};

export type DnsAnswer = {
  name: string;
  type: number;
  class: number;
  ttl: number;
  data: Uint8Array;
};

export type DnsMessage = {
  id: number;
  flags: number;
  questions: DnsQuestion[];
  answers: DnsAnswer[];
};

export type ListenAddress = { host: string; port: number };

export type ProxyConfig = Readonly<{
  address: ListenAddress;
  upstreams: readonly string[];
  timeoutSeconds: number;
}>;

export interface DohQueryClient {
  query(upstream: string, name: string, type: number): Promise<ResourceRecord[]>;
}

export interface QueryResolver {
  resolve(name: string, type: number): Promise<ResourceRecord[]>;
}

export type PacketHandler = (packet: Uint8Array) => Promise<Uint8Array | null>;
