import { AppConfig } from './app-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { OrganizationImportConfig } from '../organization-import/config/organization-import-config.type';

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  organizationImport: OrganizationImportConfig;
};
