/**
 * Target construction and safety checks
 *
 * A Target is only ever built through Target.parse, which rejects
 * non-HTTP(S) schemes, loopback/private/link-local addresses and known
 * internal hostnames, and applies the optional host allowlist. The
 * resolved-address check (DNS) runs again right before each attempt.
 */

import { isIP } from "node:net";
import { lookup } from "node:dns/promises";
import { PagegrabErrorCode, SafetyRejectionError, ValidationError } from "./errors.js";

/**
 * Allowed URL protocols
 */
const ALLOWED_PROTOCOLS = ["http:", "https:"];

/**
 * Hostnames that always point inside the network
 */
const BLOCKED_HOSTNAMES = [
  "localhost",
  "localhost.localdomain",
  "metadata.google.internal",
  "metadata",
  "instance-data.ec2.internal",
  "kubernetes.default.svc",
];

/**
 * Non-public IPv4 ranges as [start, end] inclusive
 */
const PRIVATE_IPV4_RANGES: Array<{ start: string; end: string; name: string }> = [
  { start: "0.0.0.0", end: "0.255.255.255", name: "this network" },
  { start: "10.0.0.0", end: "10.255.255.255", name: "private (10.x)" },
  { start: "100.64.0.0", end: "100.127.255.255", name: "carrier-grade NAT" },
  { start: "127.0.0.0", end: "127.255.255.255", name: "loopback" },
  { start: "169.254.0.0", end: "169.254.255.255", name: "link-local" },
  { start: "172.16.0.0", end: "172.31.255.255", name: "private (172.16-31.x)" },
  { start: "192.168.0.0", end: "192.168.255.255", name: "private (192.168.x)" },
  { start: "224.0.0.0", end: "239.255.255.255", name: "multicast" },
  { start: "240.0.0.0", end: "255.255.255.255", name: "reserved" },
];

function ipv4ToNumber(ip: string): number {
  const parts = ip.split(".").map(Number);
  return (parts[0] ?? 0) * 16777216 + (parts[1] ?? 0) * 65536 + (parts[2] ?? 0) * 256 + (parts[3] ?? 0);
}

/**
 * IPv4 address carried in an IPv4-mapped (::ffff:a.b.c.d) or IPv4-compatible
 * (::a.b.c.d) IPv6 address, in dotted or hex form
 */
function embeddedIpv4(address: string): string | null {
  let text = address;
  const dotted = text.match(/^(.*:)(\d+\.\d+\.\d+\.\d+)$/);
  if (dotted?.[1] && dotted[2]) {
    const value = ipv4ToNumber(dotted[2]);
    text = `${dotted[1]}${Math.floor(value / 65536).toString(16)}:${(value % 65536).toString(16)}`;
  }

  const halves = text.split("::");
  if (halves.length > 2) return null;
  const head = halves[0] ? halves[0].split(":") : [];
  const tail = halves.length === 2 && halves[1] ? halves[1].split(":") : [];
  const fill = halves.length === 2 ? 8 - head.length - tail.length : 0;
  const groups = [...head, ...Array.from({ length: fill }, () => "0"), ...tail].map((group) => parseInt(group, 16));
  if (groups.length !== 8 || groups.some((group) => Number.isNaN(group))) return null;

  const [a = 0, b = 0, c = 0, d = 0, e = 0, f = 0, high = 0, low = 0] = groups;
  if (a !== 0 || b !== 0 || c !== 0 || d !== 0 || e !== 0) return null;
  if (f !== 0xffff && f !== 0) return null;

  return `${high >> 8}.${high & 255}.${low >> 8}.${low & 255}`;
}

/**
 * Name of the non-public range an address falls in, or null for public addresses
 */
export function privateRangeOf(address: string): string | null {
  const version = isIP(address);

  if (version === 4) {
    const value = ipv4ToNumber(address);
    for (const range of PRIVATE_IPV4_RANGES) {
      if (value >= ipv4ToNumber(range.start) && value <= ipv4ToNumber(range.end)) {
        return range.name;
      }
    }
    return null;
  }

  if (version === 6) {
    const lower = address.toLowerCase();
    if (lower === "::" || lower === "::1") return "loopback";

    const embedded = embeddedIpv4(lower);
    if (embedded) return privateRangeOf(embedded);

    if (/^f[cd][0-9a-f]{2}:/.test(lower)) return "unique local";
    if (/^fe[89ab][0-9a-f]:/.test(lower)) return "link-local";
    if (lower.startsWith("ff")) return "multicast";
    return null;
  }

  return null;
}

function stripWww(host: string): string {
  return host.startsWith("www.") ? host.slice(4) : host;
}

/**
 * Whether host equals domain or is a subdomain of it, ignoring a leading www.
 */
export function hostMatches(host: string, domain: string): boolean {
  const h = stripWww(host.toLowerCase());
  const d = stripWww(domain.toLowerCase());
  return h === d || h.endsWith(`.${d}`);
}

/**
 * Safety policy applied when building a target
 */
export interface TargetPolicy {
  /** Only these domains (and their subdomains) may be fetched */
  allowedDomains?: readonly string[];
}

/**
 * Validated, immutable fetch target
 */
export class Target {
  /** Normalized absolute URL, fragment removed */
  readonly url: string;
  /** URL as supplied by the caller */
  readonly originalUrl: string;
  readonly protocol: "http:" | "https:";
  /** Lower-cased hostname, IPv6 literals without brackets */
  readonly host: string;

  private constructor(originalUrl: string, parsed: URL, protocol: "http:" | "https:") {
    this.originalUrl = originalUrl;
    parsed.hash = "";
    this.url = parsed.toString();
    this.protocol = protocol;
    this.host = parsed.hostname.toLowerCase().replace(/^\[|\]$/g, "");
    Object.freeze(this);
  }

  /**
   * Parse and check a URL
   *
   * @throws ValidationError when the string is not an absolute URL
   * @throws SafetyRejectionError when the scheme or host is not allowed
   */
  static parse(input: string, policy: TargetPolicy = {}): Target {
    const raw = input.trim();
    let parsed: URL;
    try {
      parsed = new URL(raw);
    } catch {
      throw new ValidationError(`Invalid URL: ${input}`, {
        field: "url",
        url: input,
        code: PagegrabErrorCode.INVALID_URL,
      });
    }

    const protocol = parsed.protocol;
    if (protocol !== "http:" && protocol !== "https:") {
      throw new SafetyRejectionError(
        input,
        `protocol ${protocol} not allowed, only ${ALLOWED_PROTOCOLS.join(" and ")} are permitted`
      );
    }

    const host = parsed.hostname.toLowerCase().replace(/^\[|\]$/g, "");
    if (!host) {
      throw new ValidationError(`Invalid URL: ${input}`, {
        field: "url",
        url: input,
        code: PagegrabErrorCode.INVALID_URL,
      });
    }

    if (BLOCKED_HOSTNAMES.some((blocked) => host === blocked || host.endsWith(`.${blocked}`))) {
      throw new SafetyRejectionError(input, `hostname "${host}" is internal`);
    }

    const range = privateRangeOf(host);
    if (range) {
      throw new SafetyRejectionError(input, `address ${host} is in a ${range} range`);
    }

    if (policy.allowedDomains && policy.allowedDomains.length > 0) {
      if (!policy.allowedDomains.some((domain) => hostMatches(host, domain))) {
        throw new SafetyRejectionError(input, `domain "${host}" is not allowed`, PagegrabErrorCode.DOMAIN_NOT_ALLOWED);
      }
    }

    return new Target(input, parsed, protocol);
  }

  /** Origin (scheme + host + port) */
  get origin(): string {
    return new URL(this.url).origin;
  }

  toString(): string {
    return this.url;
  }
}

/**
 * Resolves a hostname to its addresses
 */
export type HostResolver = (host: string) => Promise<string[]>;

export const dnsResolver: HostResolver = async (host) => {
  const records = await lookup(host, { all: true });
  return records.map((record) => record.address);
};

/**
 * Reject a target whose hostname resolves to a non-public address
 *
 * Literal addresses were checked at parse time and pass straight through.
 * Resolution failures are left to the fetcher, which reports them as
 * network errors.
 *
 * @throws SafetyRejectionError
 */
export async function assertPublicAddress(target: Target, resolver: HostResolver): Promise<void> {
  if (isIP(target.host)) {
    return;
  }

  let addresses: string[];
  try {
    addresses = await resolver(target.host);
  } catch {
    return;
  }

  for (const address of addresses) {
    const range = privateRangeOf(address);
    if (range) {
      throw new SafetyRejectionError(
        target.originalUrl,
        `hostname "${target.host}" resolves to ${address} (${range})`
      );
    }
  }
}

/**
 * Check a URL reached through redirects against the same rules as the target
 *
 * @throws SafetyRejectionError
 */
export function assertSafeRedirect(target: Target, finalUrl: string, policy: TargetPolicy): void {
  if (!finalUrl || finalUrl === target.url) {
    return;
  }

  try {
    Target.parse(finalUrl, policy);
  } catch (error: unknown) {
    if (error instanceof SafetyRejectionError) {
      throw new SafetyRejectionError(target.originalUrl, `redirected to unsafe location: ${error.reason}`);
    }
    // Unparseable final URLs are the fetcher's concern
    if (!(error instanceof ValidationError)) {
      throw error;
    }
  }
}
