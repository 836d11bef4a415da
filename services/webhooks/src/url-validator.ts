/**
 * Webhook destination validation
 *
 * Rejects destinations that would make the service call into its own
 * infrastructure: loopback, private and link-local address space, and the
 * cloud metadata endpoints. Runs before any request is sent and before any
 * delivery record exists.
 */

import { BlockList, isIP, type LookupFunction } from 'net';
import { lookup } from 'dns/promises';
import { createLogger } from '@hookline/service-utils';
import type { UrlValidationResult } from './types.js';

const logger = createLogger('webhooks:url-validator');

export interface ResolvedAddress {
  address: string;
  family: number;
}

/**
 * A validation result plus the addresses that passed, for pinning the
 * connection. Empty for literal IP destinations.
 */
export interface DestinationCheck extends UrlValidationResult {
  addresses: ResolvedAddress[];
}

export type HostResolver = (hostname: string) => Promise<ResolvedAddress[]>;

export const resolveWithDns: HostResolver = async (hostname) => {
  const addresses = await lookup(hostname, { all: true, verbatim: true });
  return addresses.map(entry => ({ address: entry.address, family: entry.family }));
};

type AddressCategory = 'loopback' | 'private network' | 'link-local' | 'unspecified';

type Subnet = [network: string, prefix: number, type: 'ipv4' | 'ipv6'];

function blockListOf(subnets: Subnet[]): BlockList {
  const list = new BlockList();
  for (const [network, prefix, type] of subnets) {
    list.addSubnet(network, prefix, type);
  }
  return list;
}

const ADDRESS_RULES: Array<{ category: AddressCategory; list: BlockList }> = [
  {
    category: 'loopback',
    list: blockListOf([['127.0.0.0', 8, 'ipv4'], ['::1', 128, 'ipv6']]),
  },
  {
    category: 'private network',
    list: blockListOf([
      ['10.0.0.0', 8, 'ipv4'],
      ['172.16.0.0', 12, 'ipv4'],
      ['192.168.0.0', 16, 'ipv4'],
      ['fc00::', 7, 'ipv6'],
    ]),
  },
  {
    category: 'link-local',
    list: blockListOf([['169.254.0.0', 16, 'ipv4'], ['fe80::', 10, 'ipv6']]),
  },
  {
    category: 'unspecified',
    list: blockListOf([['0.0.0.0', 8, 'ipv4'], ['::', 128, 'ipv6']]),
  },
];

const METADATA_HOSTNAMES = new Set([
  'metadata.google.internal',
  'metadata.goog',
  'metadata',
  'metadata.azure.com',
  'instance-data',
  'instance-data.ec2.internal',
]);

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * `::ffff:a.b.c.d` (or its hex form `::ffff:xxxx:xxxx`) is an IPv4 address in
 * disguise and must be judged by the IPv4 rules.
 */
export function unmapIpv4(address: string): string {
  const lower = address.toLowerCase();

  const dotted = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/.exec(lower);
  if (dotted) {
    return dotted[1];
  }

  const hex = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(lower);
  if (hex) {
    const high = parseInt(hex[1], 16);
    const low = parseInt(hex[2], 16);
    return `${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`;
  }

  return address;
}

export function categorizeAddress(address: string): AddressCategory | null {
  const normalized = unmapIpv4(address);
  const version = isIP(normalized);
  if (version === 0) {
    return null;
  }

  const type = version === 4 ? 'ipv4' : 'ipv6';
  for (const rule of ADDRESS_RULES) {
    if (rule.list.check(normalized, type)) {
      return rule.category;
    }
  }
  return null;
}

function isLocalhostName(hostname: string): boolean {
  return hostname === 'localhost' || hostname.endsWith('.localhost');
}

function invalid(reason: string): DestinationCheck {
  return { valid: false, reason, addresses: [] };
}

function summary(check: DestinationCheck): UrlValidationResult {
  return { valid: check.valid, reason: check.reason };
}

/**
 * Socket `lookup` that answers only with already-validated addresses, so a
 * second DNS answer cannot move the connection into blocked space.
 */
export function pinnedLookup(addresses: ResolvedAddress[]): LookupFunction {
  return (hostname, options, callback) => {
    const family = typeof options.family === 'number' && options.family !== 0 ? options.family : null;
    const candidates = family === null ? addresses : addresses.filter(entry => entry.family === family);

    if (candidates.length === 0) {
      const error: NodeJS.ErrnoException = new Error(`No validated address for ${hostname}`);
      error.code = 'ENOTFOUND';
      callback(error, '');
      return;
    }

    if (options.all) {
      callback(null, candidates.map(entry => ({ address: entry.address, family: entry.family })));
    } else {
      callback(null, candidates[0].address, candidates[0].family);
    }
  };
}

export class WebhookUrlValidator {
  private readonly resolve: HostResolver;

  constructor(resolver: HostResolver = resolveWithDns) {
    this.resolve = resolver;
  }

  /**
   * Full validation: every blocked range applies.
   */
  async validate(url: string): Promise<UrlValidationResult> {
    return summary(await this.check(url, false));
  }

  /**
   * Relaxes only the loopback rules, for harnesses that run a receiver on
   * this machine. Private, link-local and metadata destinations stay blocked.
   */
  async validateForTesting(url: string, allowLocalhost: boolean): Promise<UrlValidationResult> {
    return summary(await this.check(url, allowLocalhost));
  }

  /** Validation with the resolved addresses kept for connecting */
  async check(url: string, allowLoopback: boolean): Promise<DestinationCheck> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return invalid('Invalid URL format');
    }

    if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
      return invalid(`URL scheme must be http or https, got ${parsed.protocol.replace(/:$/, '')}`);
    }

    const hostname = parsed.hostname
      .replace(/^\[(.*)\]$/, '$1')
      .replace(/\.$/, '')
      .toLowerCase();

    if (!hostname) {
      return invalid('URL must include a hostname');
    }

    if (METADATA_HOSTNAMES.has(hostname)) {
      return invalid(`Hostname ${hostname} is blocked (cloud metadata service)`);
    }

    if (isLocalhostName(hostname) && !allowLoopback) {
      return invalid(`Hostname ${hostname} is blocked (loopback)`);
    }

    let resolved: ResolvedAddress[] = [];
    if (isIP(hostname) === 0) {
      try {
        resolved = await this.resolve(hostname);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.debug('Hostname resolution failed', { hostname, error: message });
        return invalid(`Could not resolve hostname ${hostname}`);
      }

      if (resolved.length === 0) {
        return invalid(`Could not resolve hostname ${hostname}`);
      }
    }

    const addresses = resolved.length > 0 ? resolved.map(entry => entry.address) : [hostname];

    // Every address must pass: a host with one private A record is rejected
    for (const address of addresses) {
      const category = categorizeAddress(address);
      if (!category || (category === 'loopback' && allowLoopback)) {
        continue;
      }

      return invalid(
        address === hostname
          ? `Address ${address} is blocked (${category})`
          : `Hostname ${hostname} resolves to blocked address ${address} (${category})`
      );
    }

    return { valid: true, reason: '', addresses: resolved };
  }
}
