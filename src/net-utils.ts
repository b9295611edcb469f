import { isIP, isIPv4, isIPv6 } from "node:net";
import type { ListenAddress } from "./types";

export function ipv4ToBytes(ip: string): Uint8Array | null {
  if (!isIPv4(ip)) return null;
  const parts = ip.split(".").map((v) => Number(v));
  if (parts.length !== 4 || parts.some((v) => !Number.isInteger(v) || v < 0 || v > 255)) return null;
  return Uint8Array.from(parts);
}

export function ipv6ToBytes(ip: string): Uint8Array | null {
  if (!isIPv6(ip) || ip.includes("%")) return null;

  let groups = ip;
  let tail: Uint8Array | null = null;
  const lastColon = ip.lastIndexOf(":");
  if (ip.slice(lastColon + 1).includes(".")) {
    tail = ipv4ToBytes(ip.slice(lastColon + 1));
    if (!tail) return null;
    // The embedded IPv4 tail stands for the last two groups.
    groups = `${ip.slice(0, lastColon + 1)}${((tail[0] << 8) | tail[1]).toString(16)}:${((tail[2] << 8) | tail[3]).toString(16)}`;
  }

  const [left, right] = groups.split("::");
  const leftParts = left ? left.split(":").filter(Boolean) : [];
  const rightParts = right ? right.split(":").filter(Boolean) : [];
  const fill = 8 - (leftParts.length + rightParts.length);
  if (fill < 0) return null;
  const parts = [...leftParts, ...Array.from({ length: fill }, () => "0"), ...rightParts].map((part) =>
    Number.parseInt(part || "0", 16),
  );
  if (parts.length !== 8 || parts.some((v) => Number.isNaN(v) || v < 0 || v > 0xffff)) return null;
  const out = new Uint8Array(16);
  for (let i = 0; i < 8; i++) {
    out[i * 2] = (parts[i] >> 8) & 0xff;
    out[i * 2 + 1] = parts[i] & 0xff;
  }
  return out;
}

export function parseList(input: string): string[] {
  return input
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Splits a `host:port` bind address. An empty host binds every IPv4
 * interface; IPv6 hosts are written in brackets, e.g. `[::1]:53`.
 */
export function parseListenAddress(input: string): ListenAddress | null {
  const trimmed = input.trim();
  const sep = trimmed.lastIndexOf(":");
  if (sep < 0) return null;

  let host = trimmed.slice(0, sep);
  const portRaw = trimmed.slice(sep + 1);
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
    if (isIP(host) !== 6) return null;
  } else if (host.includes(":")) {
    return null;
  }

  if (!/^\d+$/.test(portRaw)) return null;
  const port = Number(portRaw);
  if (port > 65535) return null;

  return { host: host || "0.0.0.0", port };
}

export function socketTypeFor(host: string): "udp4" | "udp6" {
  return isIP(host) === 6 ? "udp6" : "udp4";
}
