import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { HierarchyUnitOfWork } from '../organizations/domain/repositories/hierarchy-unit-of-work.port';
import { JsonHttpClient } from './domain/ports/json-http-client.port';
import { ImportConfigurationResolver } from './domain/services/import-configuration.resolver';
import { RestApiImporter } from './rest-api.importer';

export interface CreateImporterOptions {
  url: string;
  /** preset name, defaults to IMPORT_DEFAULT_PRESET */
  preset?: string;
  override?: object;
  /** "old:new" entries */
  renameDataSource?: readonly string[];
}

@Injectable()
export class OrganizationImporterFactory {
  constructor(
    private readonly unitOfWork: HierarchyUnitOfWork,
    private readonly httpClient: JsonHttpClient,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async create(options: CreateImporterOptions): Promise<RestApiImporter> {
    const preset =
      options.preset ??
      this.configService.getOrThrow('organizationImport.defaultPreset', {
        infer: true,
      });

    const configuration = ImportConfigurationResolver.resolve(
      preset,
      options.override,
      options.renameDataSource,
    );
    const importer = new RestApiImporter(
      options.url,
      configuration,
      this.unitOfWork,
      this.httpClient,
    );
    await importer.initialize();
    return importer;
  }
}
