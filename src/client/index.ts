/**
 * Infoblox WAPI client.
 *
 * One instance owns one connection pool to one appliance. Every operation
 * validates its arguments, then issues its calls one after another; batch
 * modifies and deletes stop at the first failure.
 *
 * @module client
 */

import type { Dispatcher } from 'undici';
import { InfobloxConfig, validateConfig } from '../config/index.js';
import { ValidationError } from '../errors/index.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import {
  createAAAARecordService,
  createARecordService,
  type AddressRecordService,
} from '../services/address.js';
import { CNameRecordService } from '../services/cname.js';
import { HostRecordService } from '../services/host.js';
import type { Referenceable } from '../services/kinds.js';
import { MXRecordService } from '../services/mx.js';
import { PTRRecordService } from '../services/ptr.js';
import { deleteReference, modifyRecordTtl, type ServiceContext } from '../services/records.js';
import { TXTRecordService } from '../services/txt.js';
import { ZoneService } from '../services/zones.js';
import { createTransport, type HttpTransport } from '../transport/index.js';
import {
  SearchModifier,
  type AAAARecord,
  type ARecord,
  type CNameRecord,
  type Delegate,
  type HostRecord,
  type MXRecord,
  type PTRRecord,
  type TTLRecord,
  type TXTRecord,
  type ZoneAuth,
  type ZoneDelegate,
} from '../types/index.js';
import { CallExecutor } from './executor.js';

export interface InfobloxClientOptions {
  config: InfobloxConfig;
  logger?: Logger;
  /** Replaces the undici transport, e.g. with a mock. */
  transport?: HttpTransport;
  /** undici dispatcher for the default transport, e.g. a `MockAgent`. */
  dispatcher?: Dispatcher;
}

/**
 * Main Infoblox WAPI client.
 */
export class InfobloxClient {
  readonly config: InfobloxConfig;
  readonly zones: ZoneService;
  readonly hosts: HostRecordService;
  readonly a: AddressRecordService<ARecord>;
  readonly aaaa: AddressRecordService<AAAARecord>;
  readonly cname: CNameRecordService;
  readonly mx: MXRecordService;
  readonly ptr: PTRRecordService;
  readonly txt: TXTRecordService;

  private readonly transport: HttpTransport;
  private readonly context: ServiceContext;

  /**
   * @throws {ConfigurationError} If the configuration is invalid.
   * @throws {SecurityInitError} If the trust store cannot be loaded.
   */
  constructor(options: InfobloxClientOptions) {
    validateConfig(options.config);
    this.config = options.config;
    const logger = options.logger ?? new ConsoleLogger();

    logger.info('Initializing Infoblox client', {
      endpoint: this.config.endpoint,
      wapiVersion: this.config.wapiVersion,
      username: this.config.username,
      dnsView: this.config.dnsView,
      ttl: this.config.ttl,
      tlsVerify: this.config.tlsVerify,
      trustStore: this.config.trustStore,
      timeoutSecs: this.config.timeoutSecs,
      debug: this.config.debug,
    });

    this.transport =
      options.transport ?? createTransport(this.config, logger, options.dispatcher);

    this.context = {
      executor: new CallExecutor(this.transport),
      wapiVersion: this.config.wapiVersion,
      dnsView: this.config.dnsView,
      ttl: this.config.ttl,
      maxPages: this.config.maxPages,
      logger,
    };

    this.zones = new ZoneService(this.context);
    this.hosts = new HostRecordService(this.context);
    this.a = createARecordService(this.context);
    this.aaaa = createAAAARecordService(this.context);
    this.cname = new CNameRecordService(this.context);
    this.mx = new MXRecordService(this.context);
    this.ptr = new PTRRecordService(this.context);
    this.txt = new TXTRecordService(this.context);
  }

  // ---------------------------------------------------------------------------
  // Zones
  // ---------------------------------------------------------------------------

  /**
   * Lists authoritative zones, optionally only those with the given FQDN.
   */
  getAuthZones(domainName?: string): Promise<ZoneAuth[]> {
    return this.zones.getAuthZones(domainName);
  }

  /**
   * Lists every delegated zone using paged requests of `pageSize` zones.
   */
  getDelegatedZones(pageSize: number): Promise<ZoneDelegate[]> {
    return this.zones.getDelegatedZones(pageSize);
  }

  getDelegatedZonesByName(domainName: string): Promise<ZoneDelegate[]> {
    return this.zones.getDelegatedZonesByName(domainName);
  }

  createDelegatedZone(
    domainName: string,
    delegateTo: Delegate[],
    delegatedTtl: number
  ): Promise<ZoneDelegate> {
    return this.zones.createDelegatedZone(domainName, delegateTo, delegatedTtl);
  }

  modifyDelegatedZone(
    domainName: string,
    params: Record<string, unknown>
  ): Promise<ZoneDelegate[]> {
    return this.zones.modifyDelegatedZone(domainName, params);
  }

  deleteDelegatedZone(domainName: string): Promise<string[]> {
    return this.zones.deleteDelegatedZone(domainName);
  }

  // ---------------------------------------------------------------------------
  // Host records
  // ---------------------------------------------------------------------------

  getHostRec(domainName: string, modifier?: SearchModifier): Promise<HostRecord[]> {
    return this.hosts.getHostRec(domainName, modifier);
  }

  createHostRec(domainName: string, ipv4Addrs: string[]): Promise<HostRecord> {
    return this.hosts.createHostRec(domainName, ipv4Addrs);
  }

  deleteHostRec(domainName: string): Promise<string[]> {
    return this.hosts.deleteHostRec(domainName);
  }

  // ---------------------------------------------------------------------------
  // A records
  // ---------------------------------------------------------------------------

  getARec(domainName: string, modifier?: SearchModifier): Promise<ARecord[]> {
    return this.a.getByName(domainName, modifier);
  }

  getARecByIP(ipv4Address: string): Promise<ARecord[]> {
    return this.a.getByAddress(ipv4Address);
  }

  getARecWithIP(domainName: string, ipv4Address: string): Promise<ARecord[]> {
    return this.a.getByNameAndAddress(domainName, ipv4Address);
  }

  createARec(domainName: string, ipv4Address: string): Promise<ARecord> {
    return this.a.create(domainName, ipv4Address);
  }

  deleteARec(domainName: string): Promise<string[]> {
    return this.a.deleteByName(domainName);
  }

  deleteARecWithIP(domainName: string, ipv4Address: string): Promise<string[]> {
    return this.a.deleteByNameAndAddress(domainName, ipv4Address);
  }

  modifyARec(domainName: string, newDomainName: string): Promise<ARecord[]> {
    return this.a.rename(domainName, newDomainName);
  }

  modifyARecIP(domainName: string, ipv4Address: string, newIpv4Address: string): Promise<ARecord[]> {
    return this.a.readdress(domainName, ipv4Address, newIpv4Address);
  }

  // ---------------------------------------------------------------------------
  // AAAA records
  // ---------------------------------------------------------------------------

  getAAAARec(domainName: string, modifier?: SearchModifier): Promise<AAAARecord[]> {
    return this.aaaa.getByName(domainName, modifier);
  }

  getAAAARecByIP(ipv6Address: string): Promise<AAAARecord[]> {
    return this.aaaa.getByAddress(ipv6Address);
  }

  getAAAARecWithIP(domainName: string, ipv6Address: string): Promise<AAAARecord[]> {
    return this.aaaa.getByNameAndAddress(domainName, ipv6Address);
  }

  createAAAARec(domainName: string, ipv6Address: string): Promise<AAAARecord> {
    return this.aaaa.create(domainName, ipv6Address);
  }

  deleteAAAARec(domainName: string): Promise<string[]> {
    return this.aaaa.deleteByName(domainName);
  }

  deleteAAAARecWithIP(domainName: string, ipv6Address: string): Promise<string[]> {
    return this.aaaa.deleteByNameAndAddress(domainName, ipv6Address);
  }

  modifyAAAARec(domainName: string, newDomainName: string): Promise<AAAARecord[]> {
    return this.aaaa.rename(domainName, newDomainName);
  }

  modifyAAAARecIP(
    domainName: string,
    ipv6Address: string,
    newIpv6Address: string
  ): Promise<AAAARecord[]> {
    return this.aaaa.readdress(domainName, ipv6Address, newIpv6Address);
  }

  // ---------------------------------------------------------------------------
  // CNAME records
  // ---------------------------------------------------------------------------

  getCNameRec(alias: string, modifier?: SearchModifier): Promise<CNameRecord[]> {
    return this.cname.getCNameRec(alias, modifier);
  }

  getCNameRecWithCanonical(alias: string, canonical: string): Promise<CNameRecord[]> {
    return this.cname.getCNameRecWithCanonical(alias, canonical);
  }

  getCNameCanonicalRec(canonical: string): Promise<CNameRecord[]> {
    return this.cname.getCNameCanonicalRec(canonical);
  }

  createCNameRec(alias: string, canonical: string): Promise<CNameRecord> {
    return this.cname.createCNameRec(alias, canonical);
  }

  deleteCNameRec(alias: string): Promise<string[]> {
    return this.cname.deleteCNameRec(alias);
  }

  deleteCNameRecWithCanonical(alias: string, canonical: string): Promise<string[]> {
    return this.cname.deleteCNameRecWithCanonical(alias, canonical);
  }

  modifyCNameRec(alias: string, newAlias: string): Promise<CNameRecord[]> {
    return this.cname.modifyCNameRec(alias, newAlias);
  }

  modifyCNameCanonicalRec(alias: string, newCanonical: string): Promise<CNameRecord[]> {
    return this.cname.modifyCNameCanonicalRec(alias, newCanonical);
  }

  // ---------------------------------------------------------------------------
  // MX records
  // ---------------------------------------------------------------------------

  getMXRec(domainName: string, modifier?: SearchModifier): Promise<MXRecord[]> {
    return this.mx.getMXRec(domainName, modifier);
  }

  getMXRecWithExchanger(domainName: string, mailExchanger: string): Promise<MXRecord[]> {
    return this.mx.getMXRecWithExchanger(domainName, mailExchanger);
  }

  createMXRec(domainName: string, mailExchanger: string, preference: number): Promise<MXRecord> {
    return this.mx.createMXRec(domainName, mailExchanger, preference);
  }

  deleteMXRec(domainName: string): Promise<string[]> {
    return this.mx.deleteMXRec(domainName);
  }

  deleteMXRecWithExchanger(domainName: string, mailExchanger: string): Promise<string[]> {
    return this.mx.deleteMXRecWithExchanger(domainName, mailExchanger);
  }

  modifyMXRec(domainName: string, newDomainName: string): Promise<MXRecord[]> {
    return this.mx.modifyMXRec(domainName, newDomainName);
  }

  // ---------------------------------------------------------------------------
  // PTR records
  // ---------------------------------------------------------------------------

  /**
   * Lists PTR records for an IPv4 or IPv6 address.
   */
  getPTRRec(ipAddress: string): Promise<PTRRecord[]> {
    return this.ptr.getPTRRec(ipAddress);
  }

  getPTRDRec(ptrdname: string): Promise<PTRRecord[]> {
    return this.ptr.getPTRDRec(ptrdname);
  }

  createPTRRec(ipAddress: string, ptrdname: string): Promise<PTRRecord> {
    return this.ptr.createPTRRec(ipAddress, ptrdname);
  }

  modifyPTRRec(ipAddress: string, newPtrdname: string): Promise<PTRRecord[]> {
    return this.ptr.modifyPTRRec(ipAddress, newPtrdname);
  }

  deletePTRRec(ipAddress: string): Promise<string[]> {
    return this.ptr.deletePTRRec(ipAddress);
  }

  deletePTRDRec(ptrdname: string): Promise<string[]> {
    return this.ptr.deletePTRDRec(ptrdname);
  }

  // ---------------------------------------------------------------------------
  // TXT records
  // ---------------------------------------------------------------------------

  getTXTRec(domainName: string, modifier?: SearchModifier): Promise<TXTRecord[]> {
    return this.txt.getTXTRec(domainName, modifier);
  }

  createTXTRec(domainName: string, text: string): Promise<TXTRecord> {
    return this.txt.createTXTRec(domainName, text);
  }

  deleteTXTRec(domainName: string): Promise<string[]> {
    return this.txt.deleteTXTRec(domainName);
  }

  modifyTXTRec(domainName: string, newText: string): Promise<TXTRecord[]> {
    return this.txt.modifyTXTRec(domainName, newText);
  }

  // ---------------------------------------------------------------------------
  // Any record
  // ---------------------------------------------------------------------------

  /**
   * Sets a record's TTL, in seconds, and enables it with `use_ttl`.
   */
  modifyTTL(record: Referenceable, newTtl: number): Promise<TTLRecord> {
    return modifyRecordTtl(this.context, record, newTtl);
  }

  /**
   * Deletes a record returned by one of the lookups.
   *
   * @returns The deleted reference
   */
  async deleteRecord(record: Referenceable): Promise<string> {
    if (record === undefined || record === null) {
      throw ValidationError.missing('Record');
    }
    return deleteReference(this.context, record._ref);
  }

  deleteRef(ref: string): Promise<string> {
    return deleteReference(this.context, ref);
  }

  /**
   * Releases the connection pool.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }
}

/**
 * Create a client from a configuration.
 */
export function createClient(config: InfobloxConfig, logger?: Logger): InfobloxClient {
  return new InfobloxClient({ config, logger });
}

/**
 * Create a client from `INFOBLOX_*` environment variables.
 */
export function createClientFromEnv(logger?: Logger): InfobloxClient {
  return createClient(InfobloxConfig.fromEnv().build(), logger);
}

export { CallExecutor, errorFromResponse, isJsonResponse } from './executor.js';
export {
  getAllPages,
  paginateAll,
  PAGE_ID_PARAM,
  MAX_RESULTS_PARAM,
  PAGING_PARAM,
} from './pagination.js';
export type { PageOptions } from './pagination.js';
