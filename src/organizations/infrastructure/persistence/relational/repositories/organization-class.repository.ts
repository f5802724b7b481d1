import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { OrganizationClassEntity } from '../entities/organization-class.entity';
import { OrganizationClassRepository } from '../../../../domain/repositories/organization-class.repository.port';
import { OrganizationClass } from '../../../../domain/entities/organization-class.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class OrganizationClassRelationalRepository
  implements OrganizationClassRepository
{
  constructor(
    @InjectRepository(OrganizationClassEntity)
    private readonly repository: Repository<OrganizationClassEntity>,
  ) {}

  async findById(
    id: OrganizationClass['id'],
  ): Promise<NullableType<OrganizationClass>> {
    const entity = await this.repository.findOne({
      where: { id },
    });

    return entity ? this.toDomain(entity) : null;
  }

  async getOrCreate(
    data: Omit<OrganizationClass, 'createdAt' | 'updatedAt'>,
  ): Promise<OrganizationClass> {
    const existing = await this.findById(data.id);
    if (existing) {
      return existing;
    }

    const entity = this.repository.create({
      id: data.id,
      dataSourceId: data.dataSourceId,
      originId: data.originId,
      name: data.name,
    });

    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  private toDomain(entity: OrganizationClassEntity): OrganizationClass {
    return {
      id: entity.id,
      dataSourceId: entity.dataSourceId,
      originId: entity.originId,
      name: entity.name,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
