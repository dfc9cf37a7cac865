import { IncomingHttpHeaders } from 'http';

export type RoutingKeyKind = 'subdomain' | 'custom';

export interface ParsedHost {
  host: string;
  routingKey: string;
  kind: RoutingKeyKind;
}

const LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

/**
 * Lowercases a Host header value and strips the port and any trailing dot.
 * Returns null for empty values and IPv6 literals.
 */
export function normalizeHost(raw: string): string | null {
  const value = raw.trim().toLowerCase();
  if (value.length === 0 || value.startsWith('[')) {
    return null;
  }

  const withoutPort = value.split(':')[0];
  const host = withoutPort.endsWith('.') ? withoutPort.slice(0, -1) : withoutPort;
  return host.length > 0 ? host : null;
}

/**
 * Host the client addressed: `Host`, or the first `X-Forwarded-Host` entry
 * when the Host header is absent.
 */
export function pickRequestHost(headers: IncomingHttpHeaders): string | undefined {
  if (headers.host) {
    return headers.host;
  }
  const forwarded = headers['x-forwarded-host'];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(',')[0];
  return first?.trim() || undefined;
}

/**
 * Derives the registry routing key from a host.
 *
 * Under a base domain the key is the leftmost label (`acme.example.com` → `acme`);
 * the bare base domain carries no tenant. Any other well-formed host is a
 * custom host and is looked up verbatim.
 */
export function extractRoutingKey(rawHost: string, baseDomains: readonly string[]): ParsedHost | null {
  const host = normalizeHost(rawHost);
  if (!host) {
    return null;
  }

  const labels = host.split('.');
  if (!labels.every(label => LABEL.test(label))) {
    return null;
  }

  const bases = [...baseDomains].sort((a, b) => b.length - a.length);
  for (const base of bases) {
    if (host === base) {
      return null;
    }
    if (host.endsWith(`.${base}`)) {
      const prefix = host.slice(0, host.length - base.length - 1);
      return { host, routingKey: prefix.split('.')[0], kind: 'subdomain' };
    }
  }

  return { host, routingKey: host, kind: 'custom' };
}
