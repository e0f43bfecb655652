/**
 * A and AAAA record operations. Both kinds share one implementation that
 * differs in the address field and its validator.
 */

import {
  SearchModifier,
  type AAAARecord,
  type ARecord,
} from '../types/index.js';
import {
  requireDomainName,
  requireIPv4,
  requireIPv6,
  requireSearchName,
} from '../validation/index.js';
import { A_RECORD, AAAA_RECORD, type RecordKind } from './kinds.js';
import { RecordService, type Criterion, type ServiceContext } from './records.js';

interface AddressFamily<T extends { _ref: string }> {
  kind: RecordKind<T>;
  field: 'ipv4addr' | 'ipv6addr';
  validate: (address: string) => string;
}

/**
 * Address record service for one address family.
 */
export class AddressRecordService<T extends { _ref: string }> {
  private readonly records: RecordService<T>;

  constructor(
    context: ServiceContext,
    private readonly family: AddressFamily<T>
  ) {
    this.records = new RecordService(context, family.kind);
  }

  private criteria(
    domainName: string | undefined,
    address: string | undefined,
    modifier: SearchModifier = SearchModifier.CaseInsensitive
  ): Criterion[] {
    return [
      ['name', domainName, modifier],
      [this.family.field, address],
    ];
  }

  async getByName(
    domainName: string,
    modifier: SearchModifier = SearchModifier.CaseInsensitive
  ): Promise<T[]> {
    requireSearchName(domainName, modifier);
    return this.records.search(this.criteria(domainName, undefined, modifier));
  }

  async getByAddress(address: string): Promise<T[]> {
    this.family.validate(address);
    return this.records.search(this.criteria(undefined, address));
  }

  async getByNameAndAddress(domainName: string, address: string): Promise<T[]> {
    requireDomainName(domainName);
    this.family.validate(address);
    return this.records.search(this.criteria(domainName, address));
  }

  async create(domainName: string, address: string): Promise<T> {
    requireDomainName(domainName);
    this.family.validate(address);
    return this.records.create({ name: domainName, [this.family.field]: address });
  }

  async deleteByName(domainName: string): Promise<string[]> {
    requireDomainName(domainName);
    return this.records.deleteMatching(this.criteria(domainName, undefined));
  }

  async deleteByNameAndAddress(domainName: string, address: string): Promise<string[]> {
    requireDomainName(domainName);
    this.family.validate(address);
    return this.records.deleteMatching(this.criteria(domainName, address));
  }

  /**
   * Renames every record with the given name.
   */
  async rename(domainName: string, newDomainName: string): Promise<T[]> {
    requireDomainName(domainName);
    requireDomainName(newDomainName, 'New domain name');
    return this.records.modifyMatching(this.criteria(domainName, undefined), {
      name: newDomainName,
    });
  }

  /**
   * Moves the records with the given name and address to a new address.
   */
  async readdress(domainName: string, address: string, newAddress: string): Promise<T[]> {
    requireDomainName(domainName);
    this.family.validate(address);
    this.family.validate(newAddress);
    return this.records.modifyMatching(this.criteria(domainName, address), {
      [this.family.field]: newAddress,
    });
  }
}

export function createARecordService(context: ServiceContext): AddressRecordService<ARecord> {
  return new AddressRecordService(context, {
    kind: A_RECORD,
    field: 'ipv4addr',
    validate: (address) => requireIPv4(address),
  });
}

export function createAAAARecordService(
  context: ServiceContext
): AddressRecordService<AAAARecord> {
  return new AddressRecordService(context, {
    kind: AAAA_RECORD,
    field: 'ipv6addr',
    validate: (address) => requireIPv6(address),
  });
}
