/**
 * Host record operations.
 */

import { SearchModifier, type HostRecord } from '../types/index.js';
import { requireDomainName, requireSearchName, requireIPv4 } from '../validation/index.js';
import { ValidationError } from '../errors/index.js';
import { HOST_RECORD } from './kinds.js';
import { RecordService, type ServiceContext } from './records.js';

export class HostRecordService {
  private readonly records: RecordService<HostRecord>;

  constructor(context: ServiceContext) {
    this.records = new RecordService(context, HOST_RECORD);
  }

  async getHostRec(
    domainName: string,
    modifier: SearchModifier = SearchModifier.CaseInsensitive
  ): Promise<HostRecord[]> {
    requireSearchName(domainName, modifier);
    return this.records.search([['name', domainName, modifier]]);
  }

  /**
   * Creates a host record with one or more IPv4 addresses.
   */
  async createHostRec(domainName: string, ipv4Addrs: string[]): Promise<HostRecord> {
    requireDomainName(domainName);
    if (ipv4Addrs === undefined || ipv4Addrs === null) {
      throw ValidationError.missing('IPv4 addresses');
    }
    if (ipv4Addrs.length === 0) {
      throw new ValidationError('IPv4 addresses', 'IPv4 addresses is empty');
    }
    const addrs = ipv4Addrs.map((address) => ({ ipv4addr: requireIPv4(address) }));
    return this.records.create({ name: domainName, ipv4addrs: addrs });
  }

  async deleteHostRec(domainName: string): Promise<string[]> {
    requireDomainName(domainName);
    return this.records.deleteMatching([
      ['name', domainName, SearchModifier.CaseInsensitive],
    ]);
  }
}
