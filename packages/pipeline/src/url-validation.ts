/**
 * Validation for facilitator endpoints (relay and proxy account URLs).
 *
 * Payment instructions and credentials only ever go to HTTPS endpoints on
 * public addresses. IPv4-mapped IPv6 is checked in both the dotted
 * (::ffff:127.0.0.1) and hex (::ffff:7f00:1) forms, since URL.hostname
 * normalizes to the hex form.
 */

import { ConfigError } from './errors.js';

// -- Public API ---

export function isAllowedUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  return parsed.protocol === 'https:' && !isPrivateHost(parsed.hostname);
}

/**
 * Validate a facilitator base URL and return it without a trailing slash.
 *
 * @throws {ConfigError} when the URL is not HTTPS or points at a private address
 */
export function facilitatorBaseUrl(url: string, label: string): string {
  if (!isAllowedUrl(url)) {
    throw new ConfigError(`${label} must be HTTPS and cannot point to a private IP address: ${url}`);
  }
  return url.replace(/\/+$/, '');
}

// -- Internal Helpers ---

function isPrivateHost(hostname: string): boolean {
  if (hostname === 'localhost' || hostname.endsWith('.localhost')) {
    return true;
  }

  const octets = parseIPv4(hostname);
  if (octets) {
    return isPrivateIPv4(octets);
  }

  if (!hostname.includes(':')) {
    return false;
  }

  const bare = hostname.replace(/^\[|\]$/g, '').toLowerCase();
  if (bare === '::1' || bare === '::') return true;
  if (/^(fe80|fc00|fd[0-9a-f]{2}):/.test(bare)) return true;

  const dotted = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/.exec(bare);
  if (dotted?.[1]) {
    const mapped = parseIPv4(dotted[1]);
    return mapped !== null && isPrivateIPv4(mapped);
  }

  const hex = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(bare);
  if (hex?.[1] && hex[2]) {
    const hi = parseInt(hex[1], 16);
    const lo = parseInt(hex[2], 16);
    return isPrivateIPv4([(hi >> 8) & 0xff, hi & 0xff, (lo >> 8) & 0xff, lo & 0xff]);
  }

  return false;
}

function parseIPv4(hostname: string): [number, number, number, number] | null {
  const match = /^(\d+)\.(\d+)\.(\d+)\.(\d+)$/.exec(hostname);
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3]), Number(match[4])];
}

function isPrivateIPv4([a, b]: readonly number[]): boolean {
  if (a === 10 || a === 127 || a === 0) return true;
  if (a === 172 && b !== undefined && b >= 16 && b <= 31) return true;
  if (a === 192 && b === 168) return true;
  if (a === 169 && b === 254) return true;
  return false;
}
