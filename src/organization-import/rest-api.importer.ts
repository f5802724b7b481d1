import { Logger } from '@nestjs/common';
import { Organization } from '../organizations/domain/entities/organization.entity';
import { HierarchyUnitOfWork } from '../organizations/domain/repositories/hierarchy-unit-of-work.port';
import { ImportConfiguration } from './domain/import-configuration';
import { ImportSession } from './domain/import-session';
import { JsonHttpClient } from './domain/ports/json-http-client.port';
import { RawRecord } from './domain/raw-record';
import { FieldValueResolver } from './domain/services/field-value.resolver';
import { OrganizationImportEngine } from './domain/services/organization-import.engine';
import { PaginatedFetcher } from './infrastructure/http/paginated-fetcher';

/**
 * RestApiImporter
 *
 * Imports the organizations listed at one REST endpoint. Each top-level
 * record is imported in its own transaction; the run caches of the
 * instance are rolled back with it.
 *
 * Created through OrganizationImporterFactory, which also runs
 * initialize().
 */
export class RestApiImporter {
  private readonly logger = new Logger(RestApiImporter.name);
  private readonly session = new ImportSession();
  private readonly resolver: FieldValueResolver;
  private readonly engine: OrganizationImportEngine;
  private readonly fetcher: PaginatedFetcher;

  constructor(
    readonly url: string,
    readonly configuration: ImportConfiguration,
    private readonly unitOfWork: HierarchyUnitOfWork,
    httpClient: JsonHttpClient,
  ) {
    this.resolver = new FieldValueResolver(url, httpClient, this.session, () =>
      this.indexListing(),
    );
    this.engine = new OrganizationImportEngine(
      configuration,
      this.session,
      this.resolver,
    );
    this.fetcher = new PaginatedFetcher(httpClient, configuration);

    this.logger.log(
      `Importing organization data from ${url} with the following config: ${JSON.stringify(configuration)}`,
    );
  }

  get defaultParent(): Organization | null {
    return this.session.defaultParent;
  }

  /**
   * Create the default parent organization, when one is configured
   */
  async initialize(): Promise<void> {
    const name = this.configuration.defaultParentOrganization;
    if (!name || this.session.defaultParent) {
      return;
    }

    const { defaultDataSource, fieldConfig } = this.configuration;
    const record: RawRecord = {
      [fieldConfig.origin_id?.sourceField ?? 'origin_id']: defaultDataSource,
      [fieldConfig.data_source?.sourceField ?? 'data_source']: defaultDataSource,
      [fieldConfig.name?.sourceField ?? 'name']: name,
    };
    this.session.defaultParent = await this.importOne(record);
  }

  async importAll(): Promise<void> {
    let count = 0;
    for await (const record of this.fetcher.fetch(this.url)) {
      await this.importOne(record);
      count++;
    }
    this.logger.log(`Imported ${count} records from ${this.url}`);
  }

  /**
   * Import a single record; null when it was skipped
   */
  async importOne(record: unknown): Promise<Organization | null> {
    this.session.indexRecord(record);
    const snapshot = this.session.snapshot();

    try {
      return await this.unitOfWork.transaction((repositories) =>
        this.engine.importOrganization(record, repositories),
      );
    } catch (error) {
      this.session.restore(snapshot);
      throw error;
    }
  }

  /**
   * Index every record of the listing, for references to records that
   * come later in it
   */
  async indexListing(): Promise<void> {
    if (this.session.listingIndexed) {
      return;
    }
    for await (const record of this.fetcher.fetch(this.url)) {
      this.session.indexRecord(record);
    }
    this.session.listingIndexed = true;
  }

  buildResourceUrl(resource: string): string {
    return this.resolver.buildResourceUrl(resource);
  }
}
