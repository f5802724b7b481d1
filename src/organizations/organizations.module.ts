import { Module } from '@nestjs/common';
import { RelationalHierarchyPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { OrganizationsService } from './organizations.service';

@Module({
  imports: [RelationalHierarchyPersistenceModule],
  providers: [OrganizationsService],
  exports: [OrganizationsService, RelationalHierarchyPersistenceModule],
})
export class OrganizationsModule {}
