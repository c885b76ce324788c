import { lookup } from "node:dns/promises";
import { createTaggedError, isTaggedError } from "../../core/Retry.js";

/**
 * Validate a URL for an outbound request: http(s) only, and the host must not
 * resolve into a blocked CIDR range. Host allow-listing is the policy gate's job.
 */
export async function validateUrl(url: string, blockedCidrs: string[]): Promise<URL> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw createTaggedError("invalid_url", `Invalid URL: ${url}`, { url });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw createTaggedError(
      "invalid_url",
      `Protocol not allowed: ${parsed.protocol}. Only http: and https: are supported.`,
      { url, protocol: parsed.protocol },
    );
  }

  const hostname = parsed.hostname.replace(/^\[|\]$/g, "");

  try {
    const { address } = await lookup(hostname);
    if (isIpInBlockedCidrs(address, blockedCidrs)) {
      throw createTaggedError(
        "blocked_address",
        `Host "${hostname}" resolves to blocked address ${address}`,
        { url, hostname, resolvedIp: address },
      );
    }
  } catch (err) {
    if (isTaggedError(err)) throw err;
    // DNS resolution failure blocks the request
    throw createTaggedError(
      "dns_lookup_failed",
      `DNS resolution failed for host "${hostname}": ${err instanceof Error ? err.message : String(err)}`,
      { url, hostname },
    );
  }

  return parsed;
}

/**
 * Check if an address (IPv4, IPv6 or IPv4-mapped IPv6) falls within any blocked CIDR range.
 */
export function isIpInBlockedCidrs(ip: string, cidrs: string[]): boolean {
  // Handle IPv4-mapped IPv6
  const ipv4 = normalizeIp(ip);

  for (const cidr of cidrs) {
    if (cidr.includes(":")) {
      if (ipv4 === null && isIpv6InCidr(ip, cidr)) return true;
    } else if (ipv4 !== null && isIpv4InCidr(ipv4, cidr)) {
      return true;
    }
  }
  return false;
}

function normalizeIp(ip: string): string | null {
  // Handle IPv4-mapped IPv6 (e.g. "::ffff:127.0.0.1")
  if (ip.startsWith("::ffff:")) {
    return ip.slice(7);
  }
  // Pure IPv4
  if (/^\d+\.\d+\.\d+\.\d+$/.test(ip)) {
    return ip;
  }
  return null;
}

function isIpv4InCidr(ip: string, cidr: string): boolean {
  const [cidrIp, prefixStr] = cidr.split("/");
  if (!cidrIp || !prefixStr) return false;

  const prefix = parseInt(prefixStr, 10);
  if (isNaN(prefix) || prefix < 0 || prefix > 32) return false;

  const ipNum = ipv4ToNum(ip);
  const cidrNum = ipv4ToNum(cidrIp);
  if (ipNum === null || cidrNum === null) return false;

  const mask = prefix === 0 ? 0 : (~0 << (32 - prefix)) >>> 0;
  return (ipNum & mask) === (cidrNum & mask);
}

function ipv4ToNum(ip: string): number | null {
  const parts = ip.split(".");
  if (parts.length !== 4) return null;
  let num = 0;
  for (const part of parts) {
    const n = parseInt(part, 10);
    if (isNaN(n) || n < 0 || n > 255) return null;
    num = (num << 8) | n;
  }
  return num >>> 0;
}

function isIpv6InCidr(ip: string, cidr: string): boolean {
  const [cidrIp, prefixStr] = cidr.split("/");
  if (!cidrIp || !prefixStr) return false;

  const prefix = parseInt(prefixStr, 10);
  if (isNaN(prefix)) return false;

  const ipBytes = expandIpv6(ip);
  const cidrBytes = expandIpv6(cidrIp);
  if (!ipBytes || !cidrBytes) return false;

  // Compare prefix bits
  const fullBytes = Math.floor(prefix / 8);
  for (let i = 0; i < fullBytes && i < 16; i++) {
    if (ipBytes[i] !== cidrBytes[i]) return false;
  }

  const remainingBits = prefix % 8;
  if (remainingBits > 0 && fullBytes < 16) {
    const mask = (~0 << (8 - remainingBits)) & 0xff;
    if (((ipBytes[fullBytes] ?? 0) & mask) !== ((cidrBytes[fullBytes] ?? 0) & mask)) return false;
  }

  return true;
}

function expandIpv6(ip: string): number[] | null {
  // Remove zone ID
  const zoneIdx = ip.indexOf("%");
  if (zoneIdx !== -1) ip = ip.slice(0, zoneIdx);

  const parts = ip.split("::");
  if (parts.length > 2) return null;

  const bytes: number[] = new Array<number>(16).fill(0);

  const expandGroup = (group: string): number[] => {
    if (!group) return [];
    return group.split(":").flatMap((hex) => {
      const val = parseInt(hex || "0", 16);
      return [(val >> 8) & 0xff, val & 0xff];
    });
  };

  const [head = "", rest] = parts;
  if (rest === undefined) {
    const expanded = expandGroup(head);
    return expanded.length === 16 ? expanded : null;
  }

  const left = expandGroup(head);
  const right = expandGroup(rest);
  if (left.length + right.length > 16) return null;

  bytes.splice(0, left.length, ...left);
  bytes.splice(16 - right.length, right.length, ...right);

  return bytes;
}
