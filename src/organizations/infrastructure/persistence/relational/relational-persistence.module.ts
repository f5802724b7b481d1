import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSourceEntity } from './entities/data-source.entity';
import { OrganizationClassEntity } from './entities/organization-class.entity';
import { OrganizationEntity } from './entities/organization.entity';
import { DataSourceRepository } from '../../../domain/repositories/data-source.repository.port';
import { OrganizationClassRepository } from '../../../domain/repositories/organization-class.repository.port';
import { OrganizationRepository } from '../../../domain/repositories/organization.repository.port';
import { HierarchyUnitOfWork } from '../../../domain/repositories/hierarchy-unit-of-work.port';
import { DataSourceRelationalRepository } from './repositories/data-source.repository';
import { OrganizationClassRelationalRepository } from './repositories/organization-class.repository';
import { OrganizationRelationalRepository } from './repositories/organization.repository';
import { HierarchyRelationalUnitOfWork } from './hierarchy-unit-of-work';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      DataSourceEntity,
      OrganizationClassEntity,
      OrganizationEntity,
    ]),
  ],
  providers: [
    {
      provide: DataSourceRepository,
      useClass: DataSourceRelationalRepository,
    },
    {
      provide: OrganizationClassRepository,
      useClass: OrganizationClassRelationalRepository,
    },
    {
      provide: OrganizationRepository,
      useClass: OrganizationRelationalRepository,
    },
    {
      provide: HierarchyUnitOfWork,
      useClass: HierarchyRelationalUnitOfWork,
    },
  ],
  exports: [
    DataSourceRepository,
    OrganizationClassRepository,
    OrganizationRepository,
    HierarchyUnitOfWork,
  ],
})
export class RelationalHierarchyPersistenceModule {}
