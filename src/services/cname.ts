/**
 * CNAME record operations.
 */

import { SearchModifier, type CNameRecord } from '../types/index.js';
import { requireDomainName, requireSearchName } from '../validation/index.js';
import { CNAME_RECORD } from './kinds.js';
import { RecordService, type Criterion, type ServiceContext } from './records.js';

function criteria(
  alias: string | undefined,
  canonical: string | undefined,
  modifier: SearchModifier = SearchModifier.CaseInsensitive
): Criterion[] {
  // Both fields take the modifier.
  return [
    ['name', alias, modifier],
    ['canonical', canonical, modifier],
  ];
}

export class CNameRecordService {
  private readonly records: RecordService<CNameRecord>;

  constructor(context: ServiceContext) {
    this.records = new RecordService(context, CNAME_RECORD);
  }

  async getCNameRec(
    alias: string,
    modifier: SearchModifier = SearchModifier.CaseInsensitive
  ): Promise<CNameRecord[]> {
    requireSearchName(alias, modifier, 'Alias name');
    return this.records.search(criteria(alias, undefined, modifier));
  }

  async getCNameRecWithCanonical(alias: string, canonical: string): Promise<CNameRecord[]> {
    requireDomainName(alias, 'Alias name');
    requireDomainName(canonical, 'Canonical name');
    return this.records.search(criteria(alias, canonical));
  }

  async getCNameCanonicalRec(canonical: string): Promise<CNameRecord[]> {
    requireDomainName(canonical, 'Canonical name');
    return this.records.search(criteria(undefined, canonical));
  }

  async createCNameRec(alias: string, canonical: string): Promise<CNameRecord> {
    requireDomainName(alias, 'Alias name');
    requireDomainName(canonical, 'Canonical name');
    return this.records.create({ name: alias, canonical });
  }

  async deleteCNameRec(alias: string): Promise<string[]> {
    requireDomainName(alias, 'Alias name');
    return this.records.deleteMatching(criteria(alias, undefined));
  }

  async deleteCNameRecWithCanonical(alias: string, canonical: string): Promise<string[]> {
    requireDomainName(alias, 'Alias name');
    requireDomainName(canonical, 'Canonical name');
    return this.records.deleteMatching(criteria(alias, canonical));
  }

  async modifyCNameRec(alias: string, newAlias: string): Promise<CNameRecord[]> {
    requireDomainName(alias, 'Alias name');
    requireDomainName(newAlias, 'New alias name');
    return this.records.modifyMatching(criteria(alias, undefined), { name: newAlias });
  }

  async modifyCNameCanonicalRec(alias: string, newCanonical: string): Promise<CNameRecord[]> {
    requireDomainName(alias, 'Alias name');
    requireDomainName(newCanonical, 'New canonical name');
    return this.records.modifyMatching(criteria(alias, undefined), { canonical: newCanonical });
  }
}
