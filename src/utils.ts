import { Buffer } from 'buffer';
import { randomInt } from 'crypto';
import { DNS_RECORD_TYPES, ROOT_SERVERS } from './constants.js';
import { ConfigurationError, InvalidFieldError } from './errors.js';
import type { DnsRecordType } from './types.js';

// get a random root server IPv4 address
export function getRandomRootServer(): string {
  const rootServerHosts = Object.values(ROOT_SERVERS);
  const [ipv4] = rootServerHosts[Math.floor(Math.random() * rootServerHosts.length)];
  return ipv4;
}

// uniform random 16-bit transaction id
export function randomTransactionId(): number {
  return randomInt(0, 0x10000);
}

// check if a value is empty (null, undefined, empty string)
export function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && !value.trim());
}

// normalize host, remove leading/trailing periods, whitespace and case
export const normalizeHost = (host: string): string => {
  if (isEmpty(host)) return '';
  return String(host)
    .trim()
    .replace(/^\.+|\.+$/g, '') // remove leading and trailing periods
    .toLowerCase();
};

// strip trailing dot from a string
export function stripTrailingDot(str: string): string {
  return str.endsWith('.') ? str.slice(0, -1) : str;
}

// upper-case and validate a record type given in any case
export function toRecordType(type: string): DnsRecordType {
  const upper = type.toUpperCase();
  const recordType = DNS_RECORD_TYPES.find(t => t === upper);
  if (!recordType) {
    throw new ConfigurationError(`Invalid record type: ${type}`);
  }
  return recordType;
}

// query is an IPv4/IPv6 address
export function isValidIp(ip: string): boolean {
  return isValidIpv4(ip) || isValidIpv6(ip);
}

// check for a dotted-quad IPv4 address
export const isValidIpv4 = (ip: string) => {
  if (isEmpty(ip)) return false;
  const parts = String(ip).trim().split('.');
  if (parts.length !== 4) {
    return false;
  }
  return parts.every(part => /^\d{1,3}$/.test(part) && parseInt(part, 10) <= 255);
};

// check for a colon-hex IPv6 address
export const isValidIpv6 = (ip: string) => {
  if (isEmpty(ip)) return false;
  return expandIpv6(String(ip).trim()) !== null;
};

// expand an IPv6 address to 8 groups of 4 hex digits, null if it is not one
export function expandIpv6(ipv6: string): string | null {
  // handle :: expansion
  const parts = ipv6.split('::');
  if (parts.length > 2) return null; // invalid format

  const leftPart = parts[0] ? parts[0].split(':') : [];
  const rightPart = parts[1] ? parts[1].split(':') : [];

  // calculate missing groups
  const totalGroups = 8;
  const missingGroups = totalGroups - leftPart.length - rightPart.length;
  if (parts.length === 2 ? missingGroups < 1 : missingGroups !== 0) return null;

  // build the full address
  const fullGroups: string[] = [
    ...leftPart,
    ...Array<string>(missingGroups).fill('0000'),
    ...rightPart,
  ];
  if (!fullGroups.every(group => /^[0-9a-f]{1,4}$/i.test(group))) return null;

  // pad each group to 4 characters
  return fullGroups.map(group => group.padStart(4, '0').toLowerCase()).join(':');
}

// 4 raw bytes -> dotted quad
export function formatIpv4(bytes: Uint8Array): string {
  return Array.from(bytes).join('.');
}

// 16 raw bytes -> RFC 5952 text, longest run of 2+ zero groups collapsed to '::'
export function formatIpv6(bytes: Uint8Array): string {
  const groups: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    groups.push((bytes[i] << 8) | bytes[i + 1]);
  }

  // find the first longest run of zero groups
  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map(group => group.toString(16));
  if (bestLength < 2) {
    return hex.join(':');
  }
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}

// dotted quad -> 4 raw bytes
export function parseIpv4(ip: string): Buffer {
  if (!isValidIpv4(ip)) {
    throw new InvalidFieldError(`Invalid IPv4 address: ${ip}`);
  }
  return Buffer.from(ip.trim().split('.').map(part => parseInt(part, 10)));
}

// colon-hex -> 16 raw bytes
export function parseIpv6(ip: string): Buffer {
  const expanded = expandIpv6(ip.trim());
  if (!expanded) {
    throw new InvalidFieldError(`Invalid IPv6 address: ${ip}`);
  }
  return Buffer.from(expanded.replace(/:/g, ''), 'hex');
}

// convert an IP address to its reverse DNS format
export function reverseIp(ip: string): string {
  const cleanIp = ip.trim();

  if (isValidIpv4(cleanIp)) {
    // for IPv4: reverse the octets and append .in-addr.arpa
    // e.g. 1.0.0.1 -> 1.0.0.1.in-addr.arpa
    return `${cleanIp.split('.').reverse().join('.')}.in-addr.arpa`;
  }

  // for IPv6: expand to full form, remove colons, reverse nibbles, and append .ip6.arpa
  // e.g. 2606:4700:4700::1111 -> 1.1.1.1.0.0.0.0.0.0.0.0.0.0.7.4.0.0.7.4.6.0.6.2.ip6.arpa
  const expandedIpv6 = expandIpv6(cleanIp);
  if (expandedIpv6) {
    const hexChars = expandedIpv6.replace(/:/g, '').split('').reverse();
    return `${hexChars.join('.')}.ip6.arpa`;
  }

  // invalid IP
  return ip;
}
