const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

const PRIVATE_IP_RANGES = [
  /^0\./,
  /^127\./,
  /^10\./,
  /^192\.168\./,
  /^169\.254\./,
  /^172\.(1[6-9]|2[0-9]|3[0-1])\./,
];

const PRIVATE_IPV6_PREFIXES = ['fc', 'fd', 'fe80', '::1', '::'];

const isIpv4 = (value: string): boolean => /^(\d{1,3}\.){3}\d{1,3}$/.test(value);
const isIpv6 = (value: string): boolean => value.includes(':');

const isPrivateIp = (ip: string): boolean => {
  if (isIpv6(ip)) {
    const normalized = ip.toLowerCase();
    // The URL parser serializes IPv4-mapped addresses as two hex groups.
    const mapped = normalized.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/);
    if (mapped) {
      const high = Number.parseInt(mapped[1], 16);
      const low = Number.parseInt(mapped[2], 16);
      return isPrivateIp(`${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`);
    }
    return PRIVATE_IPV6_PREFIXES.some((prefix) => normalized.startsWith(prefix));
  }
  return PRIVATE_IP_RANGES.some((pattern) => pattern.test(ip));
};

export interface UrlPolicyOptions {
  blockPrivateHosts: boolean;
}

/**
 * Returns the reason a URL must not be fetched, or null when it may be.
 * Only literal addresses are checked; hostnames are not resolved.
 */
export const findUrlPolicyViolation = (rawUrl: string, options: UrlPolicyOptions): string | null => {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return 'invalid URL';
  }

  if (!TRUSTED_PROTOCOLS.has(parsed.protocol)) {
    return `unsupported protocol ${parsed.protocol}`;
  }

  if (!options.blockPrivateHosts) {
    return null;
  }

  const hostname = parsed.hostname.replace(/^\[|\]$/g, '').toLowerCase();
  if (hostname === 'localhost' || hostname.endsWith('.localhost') || hostname.endsWith('.local')) {
    return `blocked hostname ${hostname}`;
  }

  if ((isIpv4(hostname) || isIpv6(hostname)) && isPrivateIp(hostname)) {
    return `blocked address ${hostname}`;
  }

  return null;
};
