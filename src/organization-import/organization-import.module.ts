import { Module } from '@nestjs/common';
import { OrganizationsModule } from '../organizations/organizations.module';
import { JsonHttpClient } from './domain/ports/json-http-client.port';
import { RestApiClientService } from './infrastructure/http/rest-api-client.service';
import { OrganizationImporterFactory } from './organization-importer.factory';

@Module({
  imports: [OrganizationsModule],
  providers: [
    {
      provide: JsonHttpClient,
      useClass: RestApiClientService,
    },
    OrganizationImporterFactory,
  ],
  exports: [OrganizationImporterFactory],
})
export class OrganizationImportModule {}
