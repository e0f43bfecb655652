/**
 * MX record operations.
 */

import { SearchModifier, type MXRecord } from '../types/index.js';
import { requireDomainName, requireSearchName } from '../validation/index.js';
import { ValidationError } from '../errors/index.js';
import { MX_RECORD } from './kinds.js';
import { RecordService, type ServiceContext } from './records.js';

/** Preference is an unsigned 16-bit value. */
const MAX_PREFERENCE = 65535;

export class MXRecordService {
  private readonly records: RecordService<MXRecord>;

  constructor(context: ServiceContext) {
    this.records = new RecordService(context, MX_RECORD);
  }

  async getMXRec(
    domainName: string,
    modifier: SearchModifier = SearchModifier.CaseInsensitive
  ): Promise<MXRecord[]> {
    requireSearchName(domainName, modifier);
    return this.records.search([['name', domainName, modifier]]);
  }

  async getMXRecWithExchanger(domainName: string, mailExchanger: string): Promise<MXRecord[]> {
    requireDomainName(domainName);
    requireDomainName(mailExchanger, 'Mail exchanger');
    return this.records.search([
      ['name', domainName, SearchModifier.CaseInsensitive],
      ['mail_exchanger', mailExchanger],
    ]);
  }

  async createMXRec(
    domainName: string,
    mailExchanger: string,
    preference: number
  ): Promise<MXRecord> {
    requireDomainName(domainName);
    requireDomainName(mailExchanger, 'Mail exchanger');
    if (!Number.isInteger(preference) || preference < 0 || preference > MAX_PREFERENCE) {
      throw new ValidationError(
        'Preference',
        `Preference '${preference}' is invalid: must be an integer in 0..${MAX_PREFERENCE}`
      );
    }
    return this.records.create({
      name: domainName,
      mail_exchanger: mailExchanger,
      preference,
    });
  }

  async deleteMXRec(domainName: string): Promise<string[]> {
    requireDomainName(domainName);
    return this.records.deleteMatching([['name', domainName, SearchModifier.CaseInsensitive]]);
  }

  async deleteMXRecWithExchanger(domainName: string, mailExchanger: string): Promise<string[]> {
    requireDomainName(domainName);
    requireDomainName(mailExchanger, 'Mail exchanger');
    return this.records.deleteMatching([
      ['name', domainName, SearchModifier.CaseInsensitive],
      ['mail_exchanger', mailExchanger],
    ]);
  }

  async modifyMXRec(domainName: string, newDomainName: string): Promise<MXRecord[]> {
    requireDomainName(domainName);
    requireDomainName(newDomainName, 'New domain name');
    return this.records.modifyMatching([['name', domainName, SearchModifier.CaseInsensitive]], {
      name: newDomainName,
    });
  }
}
