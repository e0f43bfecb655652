/**
 * PTR record operations. The address field (`ipv4addr` or `ipv6addr`) is
 * picked from the literal passed in.
 */

import { SearchModifier, type PTRRecord } from '../types/index.js';
import {
  isIPv4,
  requireDomainName,
  requireIPAddress,
  reverseMapName,
} from '../validation/index.js';
import { PTR_RECORD } from './kinds.js';
import { RecordService, type Criterion, type ServiceContext } from './records.js';

function addressField(address: string): 'ipv4addr' | 'ipv6addr' {
  return isIPv4(address) ? 'ipv4addr' : 'ipv6addr';
}

function byAddress(address: string): Criterion[] {
  return [[addressField(address), address]];
}

function byPtrdname(ptrdname: string): Criterion[] {
  return [['ptrdname', ptrdname, SearchModifier.CaseInsensitive]];
}

export class PTRRecordService {
  private readonly records: RecordService<PTRRecord>;

  constructor(context: ServiceContext) {
    this.records = new RecordService(context, PTR_RECORD);
  }

  async getPTRRec(address: string): Promise<PTRRecord[]> {
    requireIPAddress(address);
    return this.records.search(byAddress(address));
  }

  async getPTRDRec(ptrdname: string): Promise<PTRRecord[]> {
    requireDomainName(ptrdname, 'Pointer domain name');
    return this.records.search(byPtrdname(ptrdname));
  }

  /**
   * Creates a PTR record named after the reverse-mapping zone of the address.
   */
  async createPTRRec(address: string, ptrdname: string): Promise<PTRRecord> {
    requireIPAddress(address);
    requireDomainName(ptrdname, 'Pointer domain name');
    return this.records.create({
      name: reverseMapName(address),
      ptrdname,
      [addressField(address)]: address,
    });
  }

  async modifyPTRRec(address: string, newPtrdname: string): Promise<PTRRecord[]> {
    requireIPAddress(address);
    requireDomainName(newPtrdname, 'New pointer domain name');
    return this.records.modifyMatching(byAddress(address), { ptrdname: newPtrdname });
  }

  async deletePTRRec(address: string): Promise<string[]> {
    requireIPAddress(address);
    return this.records.deleteMatching(byAddress(address));
  }

  async deletePTRDRec(ptrdname: string): Promise<string[]> {
    requireDomainName(ptrdname, 'Pointer domain name');
    return this.records.deleteMatching(byPtrdname(ptrdname));
  }
}
