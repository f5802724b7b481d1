import { BadRequestException, NotFoundException } from '@nestjs/common';
import {
  NewOrganization,
  Organization,
  OrganizationChanges,
} from '../entities/organization.entity';
import { OrganizationInternalType } from '../enums/organization-internal-type.enum';
import { OrganizationRepository } from '../repositories/organization.repository.port';
import { SiblingOrder } from '../utils/sibling-order.util';

/**
 * OrganizationTree
 *
 * Every structural write of an organization goes through here, so the
 * sibling order invariant (affiliated before normal) holds after any save,
 * not only after imports.
 *
 * Bound to one repository instance, which may be transactional; callers
 * create one per unit of work.
 */
export class OrganizationTree {
  constructor(private readonly organizations: OrganizationRepository) {}

  async create(data: NewOrganization): Promise<Organization> {
    if (data.parentId) {
      await this.getOrThrow(data.parentId);
    }

    const created = await this.organizations.create({
      ...data,
      siblingOrder: 0,
    });

    if (!created.parentId) {
      return created;
    }
    await this.arrangeChildren(created.parentId, created.id, true);
    return this.getOrThrow(created.id);
  }

  /**
   * Apply changes to an existing organization.
   * The composite id is never part of the changes.
   */
  async update(
    current: Organization,
    changes: OrganizationChanges,
  ): Promise<Organization> {
    const parentId =
      changes.parentId === undefined ? current.parentId : changes.parentId;
    const internalType = changes.internalType ?? current.internalType;

    if (parentId && parentId !== current.parentId) {
      await this.assertValidParent(current.id, parentId);
    }

    const updated = await this.organizations.update(current.id, changes);

    if (!updated.parentId) {
      return updated;
    }
    const relocated =
      parentId !== current.parentId || internalType !== current.internalType;
    await this.arrangeChildren(updated.parentId, updated.id, relocated);
    return this.getOrThrow(updated.id);
  }

  async move(
    current: Organization,
    parentId: Organization['id'] | null,
  ): Promise<Organization> {
    return this.update(current, { parentId });
  }

  /**
   * Mark `current` as replaced by `replacement`.
   * A replacement that has itself been replaced is rejected.
   */
  async replace(
    current: Organization,
    replacement: Organization,
  ): Promise<Organization> {
    if (current.id === replacement.id) {
      throw new BadRequestException(
        `Organization ${current.id} cannot replace itself`,
      );
    }
    if (replacement.replacedById) {
      throw new BadRequestException(
        `Organization ${replacement.id} has already been replaced by ${replacement.replacedById}`,
      );
    }
    return this.organizations.update(current.id, {
      replacedById: replacement.id,
    });
  }

  async children(parentId: Organization['id']): Promise<Organization[]> {
    return this.organizations.findChildren(parentId);
  }

  async subOrganizations(parentId: Organization['id']): Promise<Organization[]> {
    const children = await this.children(parentId);
    return children.filter(
      (child) => child.internalType === OrganizationInternalType.NORMAL,
    );
  }

  async affiliatedOrganizations(
    parentId: Organization['id'],
  ): Promise<Organization[]> {
    const children = await this.children(parentId);
    return children.filter(
      (child) => child.internalType === OrganizationInternalType.AFFILIATED,
    );
  }

  async ancestors(id: Organization['id']): Promise<Organization[]> {
    return this.organizations.findAncestors(id);
  }

  async descendants(id: Organization['id']): Promise<Organization[]> {
    return this.organizations.findDescendants(id);
  }

  /**
   * "Parent / Child", with " (dissolved)" for dissolved organizations
   */
  async displayName(organization: Organization): Promise<string> {
    const name = organization.dissolutionDate
      ? `${organization.name} (dissolved)`
      : organization.name;
    if (!organization.parentId) {
      return name;
    }
    const parent = await this.getOrThrow(organization.parentId);
    return `${parent.name} / ${name}`;
  }

  private async arrangeChildren(
    parentId: Organization['id'],
    savedId: Organization['id'],
    relocated: boolean,
  ): Promise<void> {
    const siblings = await this.organizations.findChildren(parentId);
    const orderedIds = SiblingOrder.arrange(siblings, savedId, relocated);
    const changed = SiblingOrder.changedPositions(siblings, orderedIds);

    if (changed.length > 0) {
      await this.organizations.updateSiblingOrder(changed);
    }
  }

  private async assertValidParent(
    id: Organization['id'],
    parentId: Organization['id'],
  ): Promise<void> {
    if (parentId === id) {
      throw new BadRequestException(
        `Organization ${id} cannot be its own parent`,
      );
    }
    await this.getOrThrow(parentId);

    const ancestors = await this.organizations.findAncestors(parentId);
    if (ancestors.some((ancestor) => ancestor.id === id)) {
      throw new BadRequestException(
        `Organization ${id} cannot be moved under its descendant ${parentId}`,
      );
    }
  }

  private async getOrThrow(id: Organization['id']): Promise<Organization> {
    const organization = await this.organizations.findById(id);
    if (!organization) {
      throw new NotFoundException(`Organization ${id} not found`);
    }
    return organization;
  }
}
