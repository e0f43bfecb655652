/**
 * Test fixtures for WAPI objects.
 */

import { SecretString } from '../auth/index.js';
import {
  createDefaultConfig,
  type InfobloxConfig,
} from '../config/index.js';
import type {
  AAAARecord,
  ARecord,
  CNameRecord,
  HostRecord,
  MXRecord,
  PTRRecord,
  TXTRecord,
  ZoneAuth,
  ZoneDelegate,
} from '../types/index.js';

/**
 * Builds a reference in the appliance's format:
 * `<type>/<opaque id>:<name>/<view>`.
 */
export function refFor(objectType: string, name: string, view = 'default'): string {
  return `${objectType}/${Buffer.from(name).toString('base64url')}:${name}/${view}`;
}

/**
 * Configuration with verification off, suitable for mocked transports.
 */
export function testConfig(overrides: Partial<InfobloxConfig> = {}): InfobloxConfig {
  return {
    ...createDefaultConfig(),
    endpoint: 'ib.example.test',
    username: 'test-user',
    password: new SecretString('test-secret'),
    tlsVerify: false,
    ...overrides,
  };
}

export const recordFixtures = {
  aRecord(name = 'host.example.com', ipv4addr = '10.0.0.5', overrides?: Partial<ARecord>): ARecord {
    return { _ref: refFor('record:a', name), name, ipv4addr, view: 'default', ...overrides };
  },

  aaaaRecord(
    name = 'host.example.com',
    ipv6addr = '2001:db8::5',
    overrides?: Partial<AAAARecord>
  ): AAAARecord {
    return { _ref: refFor('record:aaaa', name), name, ipv6addr, view: 'default', ...overrides };
  },

  cnameRecord(
    name = 'www.example.com',
    canonical = 'host.example.com',
    overrides?: Partial<CNameRecord>
  ): CNameRecord {
    return { _ref: refFor('record:cname', name), name, canonical, view: 'default', ...overrides };
  },

  mxRecord(
    name = 'example.com',
    mailExchanger = 'mail.example.com',
    preference = 10,
    overrides?: Partial<MXRecord>
  ): MXRecord {
    return {
      _ref: refFor('record:mx', name),
      name,
      mail_exchanger: mailExchanger,
      preference,
      view: 'default',
      ...overrides,
    };
  },

  ptrRecord(
    ptrdname = 'host.example.com',
    ipv4addr = '10.0.0.5',
    overrides?: Partial<PTRRecord>
  ): PTRRecord {
    return {
      _ref: refFor('record:ptr', ptrdname),
      ptrdname,
      ipv4addr,
      view: 'default',
      ...overrides,
    };
  },

  txtRecord(name = 'example.com', text = 'v=spf1 -all', overrides?: Partial<TXTRecord>): TXTRecord {
    return { _ref: refFor('record:txt', name), name, text, view: 'default', ...overrides };
  },

  hostRecord(
    name = 'host.example.com',
    addresses: string[] = ['10.0.0.5'],
    overrides?: Partial<HostRecord>
  ): HostRecord {
    return {
      _ref: refFor('record:host', name),
      name,
      ipv4addrs: addresses.map((ipv4addr) => ({ ipv4addr, host: name })),
      view: 'default',
      ...overrides,
    };
  },
};

export const zoneFixtures = {
  authZone(fqdn = 'example.com', overrides?: Partial<ZoneAuth>): ZoneAuth {
    return { _ref: refFor('zone_auth', fqdn), fqdn, view: 'default', ...overrides };
  },

  delegatedZone(fqdn = 'sub.example.com', overrides?: Partial<ZoneDelegate>): ZoneDelegate {
    return {
      _ref: refFor('zone_delegated', fqdn),
      fqdn,
      delegate_to: [{ address: '10.0.0.53', name: 'ns1.example.com' }],
      view: 'default',
      ...overrides,
    };
  },
};
