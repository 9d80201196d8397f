/**
 * Socrata Open Data API (SODA) client
 *
 * Pages through `https://<domain>/resource/<id>.json` with `$limit`,
 * `$offset` and a stable `$order=:id`, so pages neither overlap nor skip
 * rows while the dataset is read.
 */

import { z } from 'zod';
import { ExtractionError } from '../core/errors.js';
import { tableFromRows, type RawRecord, type RawTable } from '../core/types/records.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'socrata' });

const DEFAULT_DOMAIN = 'data.cityofnewyork.us';
const DEFAULT_PAGE_SIZE = 50000;
const DEFAULT_TIMEOUT_MS = 60000;

const rowsSchema = z.array(z.record(z.unknown()));

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface SocrataClientOptions {
  readonly domain?: string;
  /** Sent as X-App-Token; raises the anonymous rate limit */
  readonly appToken?: string;
  readonly pageSize?: number;
  readonly timeoutMs?: number;
  readonly fetch?: FetchFn;
}

export interface FetchRowsOptions {
  /** Stop after this many rows (default: all) */
  readonly limit?: number;
  readonly pageSize?: number;
}

export class SocrataClient {
  private readonly domain: string;
  private readonly appToken: string | undefined;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: SocrataClientOptions = {}) {
    this.domain = options.domain ?? DEFAULT_DOMAIN;
    this.appToken = options.appToken;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  resourceUrl(resourceId: string, offset: number, limit: number): string {
    const params = new URLSearchParams({
      $limit: String(limit),
      $offset: String(offset),
      $order: ':id',
    });
    return `https://${this.domain}/resource/${encodeURIComponent(resourceId)}.json?${params.toString()}`;
  }

  /**
   * Fetch one page of rows
   */
  async fetchPage(resourceId: string, offset: number, limit: number): Promise<RawRecord[]> {
    const url = this.resourceUrl(resourceId, offset, limit);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.appToken) {
      headers['X-App-Token'] = this.appToken;
    }

    const response = await this.fetchFn(url, {
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new ExtractionError(`HTTP ${response.status}: ${response.statusText}`, url, response.status);
    }

    const body: unknown = await response.json();
    const parsed = rowsSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionError('Invalid response: expected an array of row objects', url, response.status);
    }
    return parsed.data;
  }

  /**
   * Read a dataset page by page into a raw table
   */
  async fetchRows(resourceId: string, options: FetchRowsOptions = {}): Promise<RawTable> {
    const pageSize = options.pageSize ?? this.pageSize;
    const limit = options.limit ?? Number.POSITIVE_INFINITY;
    const rows: RawRecord[] = [];

    while (rows.length < limit) {
      const pageLimit = Math.min(pageSize, limit - rows.length);
      const page = await this.fetchPage(resourceId, rows.length, pageLimit);
      rows.push(...page);
      logger.debug('Fetched page', { resourceId, offset: rows.length - page.length, rows: page.length });
      if (page.length < pageLimit) {
        break;
      }
    }

    logger.info('Fetched dataset', { resourceId, domain: this.domain, rows: rows.length });
    return tableFromRows(rows);
  }
}
