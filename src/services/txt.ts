/**
 * TXT record operations.
 */

import { SearchModifier, type TXTRecord } from '../types/index.js';
import { requireDomainName, requireSearchName, requireText } from '../validation/index.js';
import { TXT_RECORD } from './kinds.js';
import { RecordService, type ServiceContext } from './records.js';

export class TXTRecordService {
  private readonly records: RecordService<TXTRecord>;

  constructor(context: ServiceContext) {
    this.records = new RecordService(context, TXT_RECORD);
  }

  async getTXTRec(
    domainName: string,
    modifier: SearchModifier = SearchModifier.CaseInsensitive
  ): Promise<TXTRecord[]> {
    requireSearchName(domainName, modifier);
    return this.records.search([['name', domainName, modifier]]);
  }

  async createTXTRec(domainName: string, text: string): Promise<TXTRecord> {
    requireDomainName(domainName);
    requireText(text, 'Text');
    return this.records.create({ name: domainName, text });
  }

  async deleteTXTRec(domainName: string): Promise<string[]> {
    requireDomainName(domainName);
    return this.records.deleteMatching([['name', domainName, SearchModifier.CaseInsensitive]]);
  }

  async modifyTXTRec(domainName: string, newText: string): Promise<TXTRecord[]> {
    requireDomainName(domainName);
    requireText(newText, 'Text');
    return this.records.modifyMatching([['name', domainName, SearchModifier.CaseInsensitive]], {
      text: newText,
    });
  }
}
