/**
 * Generic search, create, modify and delete over one WAPI object type.
 *
 * Batch mutations search first, then send one write per match in search
 * order. The first failure stops the batch; earlier writes stay applied.
 */

import { z } from 'zod';
import type { CallExecutor } from '../client/executor.js';
import { getAllPages } from '../client/pagination.js';
import { MAX_TTL } from '../config/index.js';
import { ValidationError } from '../errors/index.js';
import type { Logger } from '../observability/logging.js';
import {
  RefSchema,
  SearchModifier,
  TTLRecordSchema,
  type QueryFilter,
  type TTLRecord,
} from '../types/index.js';
import type { RecordKind, Referenceable } from './kinds.js';

/**
 * One search criterion: field, value and optional modifier. A criterion
 * whose value is undefined is left out of the filter.
 */
export type Criterion = readonly [field: string, value: string | undefined, modifier?: SearchModifier];

/**
 * Shared state every service needs.
 */
export interface ServiceContext {
  readonly executor: CallExecutor;
  readonly wapiVersion: string;
  readonly dnsView: string;
  readonly ttl: number;
  readonly maxPages?: number;
  readonly logger: Logger;
}

/**
 * Builds a query filter from the present criteria. The modifier token is
 * appended to the field name, e.g. `name:`.
 */
export function buildFilter(criteria: readonly Criterion[]): QueryFilter {
  const filter: QueryFilter = {};
  for (const [field, value, modifier = SearchModifier.None] of criteria) {
    if (value !== undefined) {
      filter[`${field}${modifier}`] = value;
    }
  }
  return filter;
}

/**
 * Path of an object type or reference under the configured WAPI version.
 */
export function wapiPath(context: Pick<ServiceContext, 'wapiVersion'>, suffix: string): string {
  return `${context.wapiVersion}/${suffix}`;
}

function requireRef(ref: string): string {
  if (ref === undefined || ref === null) {
    throw ValidationError.missing('Reference');
  }
  if (ref.trim() === '') {
    throw new ValidationError('Reference', 'Reference is empty');
  }
  return ref;
}

/**
 * Deletes the object behind a reference and returns the deleted reference.
 */
export async function deleteReference(context: ServiceContext, ref: string): Promise<string> {
  requireRef(ref);
  context.logger.warn('Deleting a dns record with ref', { ref });
  return sendDelete(context, ref);
}

function sendDelete(context: ServiceContext, ref: string): Promise<string> {
  return context.executor.execute({ method: 'DELETE', path: wapiPath(context, ref) }, RefSchema);
}

/**
 * Sets a new TTL on a record and enables it with `use_ttl`.
 */
export async function modifyRecordTtl(
  context: ServiceContext,
  record: Referenceable,
  ttl: number
): Promise<TTLRecord> {
  if (record === undefined || record === null) {
    throw ValidationError.missing('Record');
  }
  requireRef(record._ref);
  if (!Number.isInteger(ttl) || ttl < 0 || ttl > MAX_TTL) {
    throw new ValidationError('TTL', `TTL '${ttl}' is invalid: must be an integer in 0..${MAX_TTL}`);
  }
  context.logger.warn(`Changing TTL of record to '${ttl}' seconds.`, { ref: record._ref });
  return context.executor.execute(
    {
      method: 'PUT',
      path: wapiPath(context, record._ref),
      body: { ttl, use_ttl: true },
    },
    TTLRecordSchema
  );
}

/**
 * Operations over a single record kind.
 */
export class RecordService<T extends Referenceable> {
  constructor(
    private readonly context: ServiceContext,
    readonly kind: RecordKind<T>
  ) {}

  /**
   * Lists the objects matching all present criteria.
   */
  async search(criteria: readonly Criterion[]): Promise<T[]> {
    return this.context.executor.execute(
      {
        method: 'GET',
        path: wapiPath(this.context, this.kind.objectType),
        query: buildFilter(criteria),
      },
      z.array(this.kind.schema)
    );
  }

  /**
   * Lists every object matching the criteria using paged requests.
   */
  async searchAll(criteria: readonly Criterion[], pageSize: number): Promise<T[]> {
    return getAllPages(
      this.context.executor,
      {
        method: 'GET',
        path: wapiPath(this.context, this.kind.objectType),
        query: buildFilter(criteria),
      },
      this.kind.schema,
      { pageSize, maxPages: this.context.maxPages, logger: this.context.logger }
    );
  }

  /**
   * Creates an object. TTL kinds start from the configured TTL; every
   * object is created in the configured view.
   */
  async create(fields: Record<string, unknown>): Promise<T> {
    const body: Record<string, unknown> = this.kind.usesTtl
      ? { ttl: this.context.ttl, use_ttl: true }
      : {};
    body.view = this.context.dnsView;
    Object.assign(body, fields);

    this.context.logger.debug(`Creating ${this.kind.label}`, { fields });
    return this.context.executor.execute(
      { method: 'POST', path: wapiPath(this.context, this.kind.objectType), body },
      this.kind.schema
    );
  }

  /**
   * Applies changes to one object.
   */
  async update(record: T, changes: Record<string, unknown>): Promise<T> {
    this.context.logger.warn(`Modifying ${this.kind.label}`, { ref: record._ref, changes });
    return this.context.executor.execute(
      { method: 'PUT', path: wapiPath(this.context, record._ref), body: changes },
      this.kind.schema
    );
  }

  /**
   * Applies the same changes to every match, in search order.
   */
  async modifyMatching(
    criteria: readonly Criterion[],
    changes: Record<string, unknown>
  ): Promise<T[]> {
    const matches = await this.search(criteria);
    const updated: T[] = [];
    for (const record of matches) {
      updated.push(await this.update(record, changes));
    }
    return updated;
  }

  async delete(record: T): Promise<string> {
    requireRef(record._ref);
    this.context.logger.warn(`Deleting ${this.kind.label}`, { ref: record._ref });
    return sendDelete(this.context, record._ref);
  }

  /**
   * Deletes every match, in search order, and returns the deleted references.
   */
  async deleteMatching(criteria: readonly Criterion[]): Promise<string[]> {
    const matches = await this.search(criteria);
    const deleted: string[] = [];
    for (const record of matches) {
      deleted.push(await this.delete(record));
    }
    return deleted;
  }
}
