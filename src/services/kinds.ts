/**
 * Capability entries for the WAPI object types the client manages.
 */

import type { z } from 'zod';
import {
  AAAARecordSchema,
  ARecordSchema,
  CNameRecordSchema,
  HostRecordSchema,
  MXRecordSchema,
  PTRRecordSchema,
  TXTRecordSchema,
  ZoneAuthSchema,
  ZoneDelegateSchema,
  type AAAARecord,
  type ARecord,
  type CNameRecord,
  type HostRecord,
  type MXRecord,
  type PTRRecord,
  type TXTRecord,
  type ZoneAuth,
  type ZoneDelegate,
} from '../types/index.js';

/**
 * Anything addressable by a WAPI reference.
 */
export interface Referenceable {
  _ref: string;
}

/**
 * Describes one WAPI object type.
 */
export interface RecordKind<T extends Referenceable> {
  /** WAPI object type, e.g. `record:a`. */
  readonly objectType: string;
  /** Name used in log lines. */
  readonly label: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Seed creates with the configured `ttl` and `use_ttl: true`. */
  readonly usesTtl: boolean;
}

export const A_RECORD: RecordKind<ARecord> = {
  objectType: 'record:a',
  label: 'A record',
  schema: ARecordSchema,
  usesTtl: true,
};

export const AAAA_RECORD: RecordKind<AAAARecord> = {
  objectType: 'record:aaaa',
  label: 'AAAA record',
  schema: AAAARecordSchema,
  usesTtl: true,
};

export const CNAME_RECORD: RecordKind<CNameRecord> = {
  objectType: 'record:cname',
  label: 'CNAME record',
  schema: CNameRecordSchema,
  usesTtl: true,
};

export const MX_RECORD: RecordKind<MXRecord> = {
  objectType: 'record:mx',
  label: 'MX record',
  schema: MXRecordSchema,
  usesTtl: true,
};

export const PTR_RECORD: RecordKind<PTRRecord> = {
  objectType: 'record:ptr',
  label: 'PTR record',
  schema: PTRRecordSchema,
  usesTtl: true,
};

export const TXT_RECORD: RecordKind<TXTRecord> = {
  objectType: 'record:txt',
  label: 'TXT record',
  schema: TXTRecordSchema,
  usesTtl: true,
};

export const HOST_RECORD: RecordKind<HostRecord> = {
  objectType: 'record:host',
  label: 'host record',
  schema: HostRecordSchema,
  usesTtl: true,
};

export const AUTH_ZONE: RecordKind<ZoneAuth> = {
  objectType: 'zone_auth',
  label: 'auth zone',
  schema: ZoneAuthSchema,
  usesTtl: false,
};

export const DELEGATED_ZONE: RecordKind<ZoneDelegate> = {
  objectType: 'zone_delegated',
  label: 'delegated zone',
  schema: ZoneDelegateSchema,
  usesTtl: false,
};
