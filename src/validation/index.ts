/**
 * Argument validators. Every failure raises `ValidationError` before a
 * request is built.
 * @module validation
 */

import { isIPv4 as netIsIPv4, isIPv6 as netIsIPv6 } from 'net';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { SearchModifier } from '../types/index.js';

const LABEL = /^(\*|[A-Za-z0-9_](?:[A-Za-z0-9_-]{0,61}[A-Za-z0-9_])?)$/;

/**
 * A DNS name: dot separated labels of 1-63 characters, 253 characters in
 * total, with an optional trailing dot. A `*` label is allowed for wildcards.
 */
export const domainNameSchema = z
  .string()
  .min(1)
  .transform((name) => (name.endsWith('.') && name.length > 1 ? name.slice(0, -1) : name))
  .refine((name) => name.length <= 253, { message: 'longer than 253 characters' })
  .refine((name) => name.split('.').every((label) => LABEL.test(label)), {
    message: 'contains an invalid label',
  });

export const ipv4Schema = z.string().refine((value) => netIsIPv4(value), {
  message: 'not a valid IPv4 address',
});

export const ipv6Schema = z.string().refine((value) => netIsIPv6(value), {
  message: 'not a valid IPv6 address',
});

function check<S extends z.ZodTypeAny>(schema: S, field: string, value: unknown): void {
  if (value === undefined || value === null) {
    throw ValidationError.missing(field);
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues.map((i) => i.message).join(', ');
    throw new ValidationError(field, `${field} '${String(value)}' is invalid: ${reason}`);
  }
}

export function isIPv4(value: string): boolean {
  return netIsIPv4(value);
}

export function isIPv6(value: string): boolean {
  return netIsIPv6(value);
}

export function requireIPv4(value: string, field = 'IPv4 address'): string {
  check(ipv4Schema, field, value);
  return value;
}

export function requireIPv6(value: string, field = 'IPv6 address'): string {
  check(ipv6Schema, field, value);
  return value;
}

/**
 * Accepts either address family.
 */
export function requireIPAddress(value: string, field = 'IP address'): string {
  if (value === undefined || value === null) {
    throw ValidationError.missing(field);
  }
  if (!netIsIPv4(value) && !netIsIPv6(value)) {
    throw new ValidationError(field, `${field} '${value}' is not a valid IPv4 or IPv6 address`);
  }
  return value;
}

export function requireDomainName(value: string, field = 'Domain name'): string {
  check(domainNameSchema, field, value);
  return value;
}

/**
 * Requires a non-empty string, e.g. TXT data.
 */
export function requireText(value: string, field: string): string {
  check(z.string().min(1, 'must not be empty'), field, value);
  return value;
}

export function requirePositiveInt(value: number, field: string): number {
  check(z.number().int().positive(), field, value);
  return value;
}

/**
 * Expands an IPv6 literal into its eight 16-bit groups.
 */
export function expandIPv6(address: string): number[] {
  requireIPv6(address);
  let text = address.split('%')[0] ?? address;

  // Embedded IPv4 tail, e.g. ::ffff:10.0.0.1
  const lastColon = text.lastIndexOf(':');
  const tail = text.slice(lastColon + 1);
  if (netIsIPv4(tail)) {
    const octets = tail.split('.').map((o) => parseInt(o, 10));
    const [a = 0, b = 0, c = 0, d = 0] = octets;
    const high = ((a << 8) | b).toString(16);
    const low = ((c << 8) | d).toString(16);
    text = `${text.slice(0, lastColon + 1)}${high}:${low}`;
  }

  const [head = '', rest] = text.split('::');
  const headGroups = head ? head.split(':') : [];
  const tailGroups = rest ? rest.split(':') : [];
  const missing = 8 - headGroups.length - tailGroups.length;
  const zeros: string[] = rest === undefined ? [] : new Array<string>(missing).fill('0');

  return [...headGroups, ...zeros, ...tailGroups].map((group) => parseInt(group, 16));
}

/**
 * Reverse-mapping name the appliance uses for PTR records:
 * `5.0.0.10.in-addr.arpa` for IPv4 and the nibble form under `ip6.arpa` for IPv6.
 */
export function reverseMapName(address: string): string {
  requireIPAddress(address);

  if (netIsIPv4(address)) {
    return `${address.split('.').reverse().join('.')}.in-addr.arpa`;
  }

  const nibbles = expandIPv6(address)
    .map((group) => group.toString(16).padStart(4, '0'))
    .join('')
    .split('');
  return `${nibbles.reverse().join('.')}.ip6.arpa`;
}

const PATTERN_MODIFIERS: ReadonlySet<SearchModifier> = new Set([
  SearchModifier.Regex,
  SearchModifier.CaseInsensitiveRegex,
]);

/**
 * Validates a name used as a search value. Regex searches take a pattern,
 * which only has to be non-empty.
 */
export function requireSearchName(
  value: string,
  modifier: SearchModifier,
  field = 'Domain name'
): string {
  if (PATTERN_MODIFIERS.has(modifier)) {
    return requireText(value, field);
  }
  return requireDomainName(value, field);
}
