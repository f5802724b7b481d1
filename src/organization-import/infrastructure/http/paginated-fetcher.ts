import { Logger } from '@nestjs/common';
import { FetchError } from '../../domain/errors/data-import.errors';
import { ImportConfiguration } from '../../domain/import-configuration';
import { JsonHttpClient } from '../../domain/ports/json-http-client.port';
import { isRawRecord } from '../../domain/raw-record';

export type PaginationConfiguration = Pick<
  ImportConfiguration,
  'nextKey' | 'resultsKey' | 'hasMeta'
>;

/**
 * Walks a REST listing page by page, following the next-page link until
 * it is null. Records are yielded as each page arrives.
 */
export class PaginatedFetcher {
  private readonly logger = new Logger(PaginatedFetcher.name);

  constructor(
    private readonly httpClient: JsonHttpClient,
    private readonly pagination: PaginationConfiguration,
  ) {}

  async *fetch(url: string): AsyncGenerator<unknown, void, undefined> {
    const visited = new Set<string>();
    let pageUrl: string | null = url;

    while (pageUrl !== null) {
      if (visited.has(pageUrl)) {
        throw new FetchError({
          url: pageUrl,
          status: null,
          message: `Pagination loop: ${pageUrl} was already fetched`,
        });
      }
      visited.add(pageUrl);

      this.logger.log(`Start importing data from ${pageUrl} ...`);
      const body = await this.httpClient.getJson(pageUrl);
      const records = this.records(pageUrl, body);
      for (const record of records) {
        yield record;
      }
      this.logger.log(`Importing data from ${pageUrl} completed`);

      pageUrl = this.nextPage(pageUrl, body);
    }
  }

  private records(url: string, body: unknown): unknown[] {
    const { resultsKey } = this.pagination;
    const records =
      resultsKey === null
        ? body
        : isRawRecord(body)
          ? body[resultsKey]
          : undefined;

    if (!Array.isArray(records)) {
      throw new FetchError({
        url,
        status: null,
        message: resultsKey
          ? `Response from ${url} has no "${resultsKey}" list`
          : `Response from ${url} is not a list`,
      });
    }
    return records;
  }

  private nextPage(url: string, body: unknown): string | null {
    const { nextKey, hasMeta } = this.pagination;
    if (nextKey === null || !isRawRecord(body)) {
      return null;
    }

    const container = hasMeta ? body.meta : body;
    const next = isRawRecord(container) ? container[nextKey] : null;
    if (next === null || next === undefined || next === '') {
      return null;
    }
    if (typeof next !== 'string') {
      throw new FetchError({
        url,
        status: null,
        message: `Next page link in ${url} is not a string`,
      });
    }
    return new URL(next, url).toString();
  }
}
