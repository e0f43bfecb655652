/**
 * Authoritative and delegated zone operations.
 */

import type { Delegate, ZoneAuth, ZoneDelegate } from '../types/index.js';
import { requireDomainName, requireIPAddress, requirePositiveInt } from '../validation/index.js';
import { AUTH_ZONE, DELEGATED_ZONE } from './kinds.js';
import { RecordService, type ServiceContext } from './records.js';

/**
 * Zone service for `zone_auth` and `zone_delegated` objects.
 */
export class ZoneService {
  private readonly authZones: RecordService<ZoneAuth>;
  private readonly delegatedZones: RecordService<ZoneDelegate>;

  constructor(context: ServiceContext) {
    this.authZones = new RecordService(context, AUTH_ZONE);
    this.delegatedZones = new RecordService(context, DELEGATED_ZONE);
  }

  /**
   * Lists authoritative zones, all of them or those with the given FQDN.
   */
  async getAuthZones(domainName?: string): Promise<ZoneAuth[]> {
    if (domainName !== undefined) {
      requireDomainName(domainName);
    }
    return this.authZones.search([['fqdn', domainName]]);
  }

  /**
   * Lists every delegated zone, fetching `pageSize` zones per request.
   */
  async getDelegatedZones(pageSize: number): Promise<ZoneDelegate[]> {
    requirePositiveInt(pageSize, 'Page size');
    return this.delegatedZones.searchAll([], pageSize);
  }

  async getDelegatedZonesByName(domainName: string): Promise<ZoneDelegate[]> {
    requireDomainName(domainName);
    return this.delegatedZones.search([['fqdn', domainName]]);
  }

  /**
   * Delegates a zone to the given name servers.
   *
   * @param delegatedTtl - TTL of the delegation, in seconds
   */
  async createDelegatedZone(
    domainName: string,
    delegateTo: Delegate[],
    delegatedTtl: number
  ): Promise<ZoneDelegate> {
    requireDomainName(domainName);
    for (const delegate of delegateTo) {
      requireDomainName(delegate.name, 'Delegate name');
      requireIPAddress(delegate.address, 'Delegate address');
    }
    return this.delegatedZones.create({
      fqdn: domainName,
      delegate_to: delegateTo,
      delegated_ttl: delegatedTtl,
    });
  }

  async modifyDelegatedZone(
    domainName: string,
    params: Record<string, unknown>
  ): Promise<ZoneDelegate[]> {
    requireDomainName(domainName);
    return this.delegatedZones.modifyMatching([['fqdn', domainName]], params);
  }

  async deleteDelegatedZone(domainName: string): Promise<string[]> {
    requireDomainName(domainName);
    return this.delegatedZones.deleteMatching([['fqdn', domainName]]);
  }
}
