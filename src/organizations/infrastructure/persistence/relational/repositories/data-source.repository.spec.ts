import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSourceEntity } from '../entities/data-source.entity';
import { DataSourceRelationalRepository } from './data-source.repository';

describe('DataSourceRelationalRepository', () => {
  let repository: DataSourceRelationalRepository;
  let typeormRepository: {
    findOne: jest.Mock;
    create: jest.Mock;
    save: jest.Mock;
  };

  function buildEntity(data: Partial<DataSourceEntity>): DataSourceEntity {
    return Object.assign(new DataSourceEntity(), data);
  }

  beforeEach(async () => {
    typeormRepository = {
      findOne: jest.fn().mockResolvedValue(null),
      create: jest.fn((data: Partial<DataSourceEntity>) => buildEntity(data)),
      save: jest.fn(async (entity: DataSourceEntity) => entity),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DataSourceRelationalRepository,
        {
          provide: getRepositoryToken(DataSourceEntity),
          useValue: typeormRepository,
        },
      ],
    }).compile();

    repository = module.get<DataSourceRelationalRepository>(
      DataSourceRelationalRepository,
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should save a new data source and return a plain domain object', async () => {
    const created = await repository.getOrCreate({
      id: 'hel',
      name: 'Helsinki',
      userEditableOrganizations: true,
    });

    expect(typeormRepository.save).toHaveBeenCalledTimes(1);
    expect(created).toStrictEqual({
      id: 'hel',
      name: 'Helsinki',
      userEditableOrganizations: true,
    });
  });

  it('should return the stored data source without saving', async () => {
    typeormRepository.findOne.mockResolvedValue(
      buildEntity({ id: 'hel', name: 'Stored', userEditableOrganizations: false }),
    );

    const existing = await repository.getOrCreate({
      id: 'hel',
      name: 'Helsinki',
      userEditableOrganizations: true,
    });

    expect(typeormRepository.save).not.toHaveBeenCalled();
    expect(existing).toStrictEqual({
      id: 'hel',
      name: 'Stored',
      userEditableOrganizations: false,
    });
  });

  it('should return null for an unknown id', async () => {
    await expect(repository.findById('nope')).resolves.toBeNull();
    expect(typeormRepository.findOne).toHaveBeenCalledWith({
      where: { id: 'nope' },
    });
  });
});
