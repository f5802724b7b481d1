import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, TreeRepository } from 'typeorm';
import { OrganizationEntity } from '../entities/organization.entity';
import {
  OrganizationRepository,
  SiblingPosition,
} from '../../../../domain/repositories/organization.repository.port';
import {
  NewOrganization,
  Organization,
  OrganizationChanges,
} from '../../../../domain/entities/organization.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class OrganizationRelationalRepository implements OrganizationRepository {
  constructor(
    @InjectRepository(OrganizationEntity)
    private readonly repository: Repository<OrganizationEntity>,
  ) {}

  private get treeRepository(): TreeRepository<OrganizationEntity> {
    return this.repository.manager.getTreeRepository(OrganizationEntity);
  }

  async findById(id: Organization['id']): Promise<NullableType<Organization>> {
    const entity = await this.repository.findOne({
      where: { id },
    });

    return entity ? this.toDomain(entity) : null;
  }

  async findByOrigin(
    originId: string,
    dataSourceId: string | null,
  ): Promise<NullableType<Organization>> {
    const query = this.repository
      .createQueryBuilder('organization')
      .where('LOWER(organization.origin_id) = LOWER(:originId)', { originId });

    if (dataSourceId === null) {
      query.andWhere('organization.data_source_id IS NULL');
    } else {
      query.andWhere('organization.data_source_id = :dataSourceId', {
        dataSourceId,
      });
    }

    const entity = await query.getOne();
    return entity ? this.toDomain(entity) : null;
  }

  async findChildren(parentId: Organization['id']): Promise<Organization[]> {
    const entities = await this.repository.find({
      where: { parentId },
      order: { siblingOrder: 'ASC', createdAt: 'ASC' },
    });

    return entities.map((entity) => this.toDomain(entity));
  }

  async findAncestors(id: Organization['id']): Promise<Organization[]> {
    const entity = await this.repository.findOne({ where: { id } });
    if (!entity) {
      return [];
    }

    const tree = await this.treeRepository.findAncestorsTree(entity);
    const ancestors: Organization[] = [];
    let node = tree.parent;
    while (node) {
      ancestors.unshift(this.toDomain(node));
      node = node.parent;
    }
    return ancestors;
  }

  async findDescendants(id: Organization['id']): Promise<Organization[]> {
    const entity = await this.repository.findOne({ where: { id } });
    if (!entity) {
      return [];
    }

    const entities = await this.treeRepository.findDescendants(entity);
    return entities
      .filter((descendant) => descendant.id !== id)
      .map((descendant) => this.toDomain(descendant));
  }

  async create(
    data: NewOrganization & Pick<Organization, 'siblingOrder'>,
  ): Promise<Organization> {
    const entity = this.repository.create({
      id: data.id,
      dataSourceId: data.dataSourceId,
      originId: data.originId,
      name: data.name,
      abbreviation: data.abbreviation,
      classificationId: data.classificationId,
      foundingDate: data.foundingDate,
      dissolutionDate: data.dissolutionDate,
      internalType: data.internalType,
      parentId: data.parentId,
      replacedById: data.replacedById,
      siblingOrder: data.siblingOrder,
    });
    // the closure table is maintained from the relation, not the id column
    entity.parent = await this.loadParent(data.parentId);

    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  async update(
    id: Organization['id'],
    changes: OrganizationChanges,
  ): Promise<Organization> {
    const existing = await this.repository.findOne({ where: { id } });
    if (!existing) {
      throw new NotFoundException(`Organization ${id} not found`);
    }

    this.repository.merge(existing, changes);
    if (changes.parentId !== undefined) {
      existing.parent = await this.loadParent(changes.parentId);
    }

    const saved = await this.repository.save(existing);
    return this.toDomain(saved);
  }

  async updateSiblingOrder(positions: SiblingPosition[]): Promise<void> {
    for (const position of positions) {
      await this.repository.update(position.id, {
        siblingOrder: position.siblingOrder,
      });
    }
  }

  private async loadParent(
    parentId: string | null,
  ): Promise<OrganizationEntity | null> {
    if (!parentId) {
      return null;
    }
    const parent = await this.repository.findOne({ where: { id: parentId } });
    if (!parent) {
      throw new NotFoundException(`Organization ${parentId} not found`);
    }
    return parent;
  }

  private toDomain(entity: OrganizationEntity): Organization {
    return {
      id: entity.id,
      dataSourceId: entity.dataSourceId,
      originId: entity.originId,
      name: entity.name,
      abbreviation: entity.abbreviation,
      classificationId: entity.classificationId,
      foundingDate: entity.foundingDate,
      dissolutionDate: entity.dissolutionDate,
      internalType: entity.internalType,
      parentId: entity.parentId,
      replacedById: entity.replacedById,
      siblingOrder: entity.siblingOrder,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
