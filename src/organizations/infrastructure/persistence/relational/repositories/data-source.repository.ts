import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DataSourceEntity } from '../entities/data-source.entity';
import { DataSourceRepository } from '../../../../domain/repositories/data-source.repository.port';
import { DataSource } from '../../../../domain/entities/data-source.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class DataSourceRelationalRepository implements DataSourceRepository {
  constructor(
    @InjectRepository(DataSourceEntity)
    private readonly repository: Repository<DataSourceEntity>,
  ) {}

  async findById(id: DataSource['id']): Promise<NullableType<DataSource>> {
    const entity = await this.repository.findOne({
      where: { id },
    });

    return entity ? this.toDomain(entity) : null;
  }

  async getOrCreate(data: DataSource): Promise<DataSource> {
    const existing = await this.findById(data.id);
    if (existing) {
      return existing;
    }

    const entity = this.repository.create({
      id: data.id,
      name: data.name,
      userEditableOrganizations: data.userEditableOrganizations,
    });

    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  private toDomain(entity: DataSourceEntity): DataSource {
    return {
      id: entity.id,
      name: entity.name,
      userEditableOrganizations: entity.userEditableOrganizations,
    };
  }
}
