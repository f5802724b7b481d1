import { DataSourceRepository } from './data-source.repository.port';
import { OrganizationClassRepository } from './organization-class.repository.port';
import { OrganizationRepository } from './organization.repository.port';

export interface HierarchyRepositories {
  dataSources: DataSourceRepository;
  organizationClasses: OrganizationClassRepository;
  organizations: OrganizationRepository;
}

export abstract class HierarchyUnitOfWork {
  /**
   * Run work against repositories bound to one transaction.
   * Everything written through them commits together or not at all.
   */
  abstract transaction<T>(
    work: (repositories: HierarchyRepositories) => Promise<T>,
  ): Promise<T>;
}
