import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { HierarchyUnitOfWork } from './domain/repositories/hierarchy-unit-of-work.port';
import { OrganizationRepository } from './domain/repositories/organization.repository.port';
import { OrganizationTree } from './domain/services/organization-tree.domain.service';
import { Organization } from './domain/entities/organization.entity';
import { OrganizationInternalType } from './domain/enums/organization-internal-type.enum';

/**
 * Organizations Service (Application Layer)
 *
 * Structural writes run in a transaction through OrganizationTree so the
 * sibling order of the affected parent is restored before commit.
 */
@Injectable()
export class OrganizationsService {
  private readonly logger = new Logger(OrganizationsService.name);

  constructor(
    private readonly unitOfWork: HierarchyUnitOfWork,
    private readonly organizationRepository: OrganizationRepository,
  ) {}

  async findById(id: Organization['id']): Promise<Organization> {
    return this.getOrThrow(this.organizationRepository, id);
  }

  async move(
    id: Organization['id'],
    parentId: Organization['id'] | null,
  ): Promise<Organization> {
    return this.unitOfWork.transaction(async ({ organizations }) => {
      const current = await this.getOrThrow(organizations, id);
      const moved = await new OrganizationTree(organizations).move(
        current,
        parentId,
      );
      this.logger.log(`Moved ${id} under ${parentId ?? '(root)'}`);
      return moved;
    });
  }

  async setInternalType(
    id: Organization['id'],
    internalType: OrganizationInternalType,
  ): Promise<Organization> {
    return this.unitOfWork.transaction(async ({ organizations }) => {
      const current = await this.getOrThrow(organizations, id);
      return new OrganizationTree(organizations).update(current, {
        internalType,
      });
    });
  }

  async replace(
    id: Organization['id'],
    replacementId: Organization['id'],
  ): Promise<Organization> {
    return this.unitOfWork.transaction(async ({ organizations }) => {
      const current = await this.getOrThrow(organizations, id);
      const replacement = await this.getOrThrow(organizations, replacementId);
      const replaced = await new OrganizationTree(organizations).replace(
        current,
        replacement,
      );
      this.logger.log(`${id} replaced by ${replacementId}`);
      return replaced;
    });
  }

  async getChildren(id: Organization['id']): Promise<Organization[]> {
    await this.findById(id);
    return this.tree().children(id);
  }

  async getSubOrganizations(id: Organization['id']): Promise<Organization[]> {
    await this.findById(id);
    return this.tree().subOrganizations(id);
  }

  async getAffiliatedOrganizations(
    id: Organization['id'],
  ): Promise<Organization[]> {
    await this.findById(id);
    return this.tree().affiliatedOrganizations(id);
  }

  async getAncestors(id: Organization['id']): Promise<Organization[]> {
    await this.findById(id);
    return this.tree().ancestors(id);
  }

  async getDescendants(id: Organization['id']): Promise<Organization[]> {
    await this.findById(id);
    return this.tree().descendants(id);
  }

  async getDisplayName(id: Organization['id']): Promise<string> {
    const organization = await this.findById(id);
    return this.tree().displayName(organization);
  }

  private tree(): OrganizationTree {
    return new OrganizationTree(this.organizationRepository);
  }

  private async getOrThrow(
    organizations: OrganizationRepository,
    id: Organization['id'],
  ): Promise<Organization> {
    const organization = await organizations.findById(id);
    if (!organization) {
      throw new NotFoundException(`Organization ${id} not found`);
    }
    return organization;
  }
}
