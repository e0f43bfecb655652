/**
 * Type definitions and Zod schemas for WAPI objects.
 *
 * Responses are requested with `_return_as_object=1`, so every body is a
 * `{ result }` envelope. Unknown fields are kept on the parsed objects.
 */

import { z } from 'zod';

// =============================================================================
// Search
// =============================================================================

/**
 * WAPI search modifiers, appended to a field name in a query filter.
 */
export enum SearchModifier {
  None = '',
  CaseInsensitive = ':',
  Regex = '~',
  CaseInsensitiveRegex = ':~',
  Negate = '!',
  LessOrEqual = '<',
  GreaterOrEqual = '>',
}

/**
 * Query filter sent as URL parameters. Entries are ANDed by the appliance.
 */
export type QueryFilter = Record<string, string>;

// =============================================================================
// Envelopes
// =============================================================================

/**
 * Builds the schema of a `{ result, next_page_id? }` response envelope.
 */
export function resultEnvelope<S extends z.ZodTypeAny>(result: S) {
  return z.object({
    result,
    next_page_id: z.string().min(1).optional(),
  });
}

export type ResultEnvelope<T> = {
  result: T;
  next_page_id?: string;
};

/** A reference string, as returned by delete. */
export const RefSchema = z.string().min(1);

// =============================================================================
// Records
// =============================================================================

const wapiObject = z.object({
  _ref: z.string().min(1),
});

const ttlFields = {
  view: z.string().optional(),
  ttl: z.number().optional(),
  use_ttl: z.boolean().optional(),
};

/**
 * Any object that carries a WAPI reference.
 */
export const WapiObjectSchema = wapiObject.passthrough();
export type WapiObject = z.infer<typeof WapiObjectSchema>;

/**
 * Address record (record:a).
 */
export const ARecordSchema = wapiObject
  .extend({
    name: z.string(),
    ipv4addr: z.string(),
    ...ttlFields,
  })
  .passthrough();
export type ARecord = z.infer<typeof ARecordSchema>;

/**
 * IPv6 address record (record:aaaa).
 */
export const AAAARecordSchema = wapiObject
  .extend({
    name: z.string(),
    ipv6addr: z.string(),
    ...ttlFields,
  })
  .passthrough();
export type AAAARecord = z.infer<typeof AAAARecordSchema>;

/**
 * Canonical name record (record:cname).
 */
export const CNameRecordSchema = wapiObject
  .extend({
    name: z.string(),
    canonical: z.string(),
    ...ttlFields,
  })
  .passthrough();
export type CNameRecord = z.infer<typeof CNameRecordSchema>;

/**
 * Mail exchange record (record:mx).
 */
export const MXRecordSchema = wapiObject
  .extend({
    name: z.string(),
    mail_exchanger: z.string(),
    preference: z.number().int(),
    ...ttlFields,
  })
  .passthrough();
export type MXRecord = z.infer<typeof MXRecordSchema>;

/**
 * Pointer record (record:ptr). Carries either an IPv4 or an IPv6 address.
 */
export const PTRRecordSchema = wapiObject
  .extend({
    ptrdname: z.string(),
    name: z.string().optional(),
    ipv4addr: z.string().optional(),
    ipv6addr: z.string().optional(),
    ...ttlFields,
  })
  .passthrough();
export type PTRRecord = z.infer<typeof PTRRecordSchema>;

/**
 * Text record (record:txt).
 */
export const TXTRecordSchema = wapiObject
  .extend({
    name: z.string(),
    text: z.string(),
    ...ttlFields,
  })
  .passthrough();
export type TXTRecord = z.infer<typeof TXTRecordSchema>;

/**
 * Host address entry inside a host record.
 */
export const HostIPv4AddrSchema = z
  .object({
    _ref: z.string().optional(),
    ipv4addr: z.string(),
    host: z.string().optional(),
  })
  .passthrough();
export type HostIPv4Addr = z.infer<typeof HostIPv4AddrSchema>;

/**
 * Host record (record:host).
 */
export const HostRecordSchema = wapiObject
  .extend({
    name: z.string(),
    ipv4addrs: z.array(HostIPv4AddrSchema),
    ...ttlFields,
  })
  .passthrough();
export type HostRecord = z.infer<typeof HostRecordSchema>;

/**
 * Response of a TTL update.
 */
export const TTLRecordSchema = wapiObject
  .extend({
    ttl: z.number().optional(),
    use_ttl: z.boolean().optional(),
  })
  .passthrough();
export type TTLRecord = z.infer<typeof TTLRecordSchema>;

// =============================================================================
// Zones
// =============================================================================

/**
 * Authoritative zone (zone_auth).
 */
export const ZoneAuthSchema = wapiObject
  .extend({
    fqdn: z.string(),
    view: z.string().optional(),
  })
  .passthrough();
export type ZoneAuth = z.infer<typeof ZoneAuthSchema>;

/**
 * Name server a zone is delegated to.
 */
export const DelegateSchema = z
  .object({
    address: z.string(),
    name: z.string(),
  })
  .passthrough();
export type Delegate = z.infer<typeof DelegateSchema>;

/**
 * Delegated zone (zone_delegated).
 */
export const ZoneDelegateSchema = wapiObject
  .extend({
    fqdn: z.string(),
    delegate_to: z.array(DelegateSchema),
    delegated_ttl: z.number().optional(),
    locked: z.boolean().optional(),
    view: z.string().optional(),
  })
  .passthrough();
export type ZoneDelegate = z.infer<typeof ZoneDelegateSchema>;
