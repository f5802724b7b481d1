import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource as TypeOrmDataSource, EntityManager } from 'typeorm';
import {
  HierarchyRepositories,
  HierarchyUnitOfWork,
} from '../../../domain/repositories/hierarchy-unit-of-work.port';
import { DataSourceEntity } from './entities/data-source.entity';
import { OrganizationClassEntity } from './entities/organization-class.entity';
import { OrganizationEntity } from './entities/organization.entity';
import { DataSourceRelationalRepository } from './repositories/data-source.repository';
import { OrganizationClassRelationalRepository } from './repositories/organization-class.repository';
import { OrganizationRelationalRepository } from './repositories/organization.repository';

@Injectable()
export class HierarchyRelationalUnitOfWork implements HierarchyUnitOfWork {
  constructor(
    @InjectDataSource()
    private readonly dataSource: TypeOrmDataSource,
  ) {}

  transaction<T>(
    work: (repositories: HierarchyRepositories) => Promise<T>,
  ): Promise<T> {
    return this.dataSource.transaction((manager) =>
      work(this.bind(manager)),
    );
  }

  private bind(manager: EntityManager): HierarchyRepositories {
    return {
      dataSources: new DataSourceRelationalRepository(
        manager.getRepository(DataSourceEntity),
      ),
      organizationClasses: new OrganizationClassRelationalRepository(
        manager.getRepository(OrganizationClassEntity),
      ),
      organizations: new OrganizationRelationalRepository(
        manager.getRepository(OrganizationEntity),
      ),
    };
  }
}
