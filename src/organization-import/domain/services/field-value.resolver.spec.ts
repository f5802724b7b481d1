import { Logger } from '@nestjs/common';
import { FakeJsonHttpClient } from '../../../../test/utils/fake-json-http-client';
import { buildOrganization } from '../../../../test/utils/in-memory-hierarchy';
import {
  ConfigurationError,
  FieldMissingError,
  FieldPatternError,
  FieldValueError,
} from '../errors/data-import.errors';
import { FieldDataType } from '../import-configuration';
import { ImportSession } from '../import-session';
import { FieldValueResolver, RelationImporters } from './field-value.resolver';

describe('FieldValueResolver', () => {
  const endpoint = 'http://fake.url/organization/';
  const dataSource = { id: 'ds', name: 'ds', userEditableOrganizations: false };
  const parent = buildOrganization({ id: 'ds:parent' });

  let client: FakeJsonHttpClient;
  let session: ImportSession;
  let resolver: FieldValueResolver;
  let relations: {
    importDataSource: jest.Mock;
    importClassification: jest.Mock;
    importParent: jest.Mock;
  } & RelationImporters;

  beforeEach(() => {
    client = new FakeJsonHttpClient();
    session = new ImportSession();
    resolver = new FieldValueResolver(endpoint, client, session);
    relations = {
      importDataSource: jest.fn().mockResolvedValue(dataSource),
      importClassification: jest.fn(),
      importParent: jest.fn().mockResolvedValue(parent),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('source lookup', () => {
    it('should read the value from the source field', async () => {
      await expect(
        resolver.resolve(
          { name_fi: 'Kaupunginhallitus' },
          'name',
          { sourceField: 'name_fi' },
          relations,
        ),
      ).resolves.toEqual({ relation: null, value: 'Kaupunginhallitus' });
    });

    it('should throw FieldMissingError when the key is absent, even if optional', async () => {
      await expect(
        resolver.resolve({ name: 'x' }, 'abbreviation', { optional: true }, relations),
      ).rejects.toThrow(FieldMissingError);
    });

    it('should return empty values without transforming them', async () => {
      await expect(
        resolver.resolve(
          { classification: null },
          'classification',
          { dataType: FieldDataType.LINK },
          relations,
        ),
      ).resolves.toEqual({ relation: null, value: null });
      await expect(
        resolver.resolve({ name: '' }, 'name', {}, relations),
      ).resolves.toEqual({ relation: null, value: '' });
      expect(relations.importClassification).not.toHaveBeenCalled();
      expect(client.requests).toEqual([]);
    });
  });

  describe('unwrapList and unquote', () => {
    it('should treat an empty list as null', async () => {
      await expect(
        resolver.resolve({ parents: [] }, 'parent', { sourceField: 'parents', unwrapList: true }, relations),
      ).resolves.toEqual({ relation: null, value: null });
      expect(relations.importParent).not.toHaveBeenCalled();
    });

    it('should take the first element and warn about the rest', async () => {
      const warn = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);

      await expect(
        resolver.resolve({ name: ['first', 'second'] }, 'name', { unwrapList: true }, relations),
      ).resolves.toEqual({ relation: null, value: 'first' });
      expect(warn).toHaveBeenCalledWith(
        'Field "name" has 2 values, using the first one',
      );
    });

    it('should percent-decode strings', async () => {
      await expect(
        resolver.resolve({ name: 'hel%3A00001' }, 'name', { unquote: true }, relations),
      ).resolves.toEqual({ relation: null, value: 'hel:00001' });
    });

    it('should leave malformed escapes as they are', async () => {
      await expect(
        resolver.resolve({ name: 'a%ZZ%3A' }, 'name', { unquote: true }, relations),
      ).resolves.toEqual({ relation: null, value: 'a%ZZ:' });
    });
  });

  describe('data types', () => {
    it('should stringify and lowercase str_lower values', async () => {
      await expect(
        resolver.resolve({ origin_id: 'U02100' }, 'origin_id', { dataType: FieldDataType.STR_LOWER }, relations),
      ).resolves.toEqual({ relation: null, value: 'u02100' });
      await expect(
        resolver.resolve({ origin_id: 42 }, 'origin_id', { dataType: FieldDataType.STR_LOWER }, relations),
      ).resolves.toEqual({ relation: null, value: '42' });
    });

    it('should return capture group 1 of a regex', async () => {
      await expect(
        resolver.resolve(
          { origin_id: 'ABC-123' },
          'origin_id',
          { dataType: FieldDataType.REGEX, pattern: '\\w+-(\\d+)' },
          relations,
        ),
      ).resolves.toEqual({ relation: null, value: '123' });
    });

    it('should throw FieldPatternError when the regex does not match', async () => {
      await expect(
        resolver.resolve(
          { origin_id: 'ABC' },
          'origin_id',
          { dataType: FieldDataType.REGEX, pattern: '\\w+-(\\d+)' },
          relations,
        ),
      ).rejects.toThrow(FieldPatternError);
    });

    it.each([
      ['missing', undefined],
      ['invalid', '(unclosed'],
      ['without a capture group', '\\w+'],
    ])('should throw ConfigurationError for a %s pattern', async (_label, pattern) => {
      await expect(
        resolver.resolve(
          { origin_id: 'ABC-123' },
          'origin_id',
          { dataType: FieldDataType.REGEX, pattern },
          relations,
        ),
      ).rejects.toThrow(ConfigurationError);
    });

    it('should fetch link values relative to the endpoint', async () => {
      client.route('http://fake.url/organization/7/', { id: 7, name: 'Board' });

      await expect(
        resolver.resolve({ name: '7/' }, 'name', { dataType: FieldDataType.LINK }, relations),
      ).resolves.toEqual({ relation: null, value: { id: 7, name: 'Board' } });
    });

    it('should throw FieldValueError for a link that is not a string', async () => {
      await expect(
        resolver.resolve({ name: 7 }, 'name', { dataType: FieldDataType.LINK }, relations),
      ).rejects.toThrow(FieldValueError);
    });

    it('should look up org_id values among fetched records', async () => {
      session.indexRecord({ id: 'hel:00001', name_fi: 'Helsinki' });

      await expect(
        resolver.resolve({ name: 'hel:00001' }, 'name', { dataType: FieldDataType.ORG_ID }, relations),
      ).resolves.toEqual({
        relation: null,
        value: { id: 'hel:00001', name_fi: 'Helsinki' },
      });
    });

    it('should throw FieldValueError for an org_id that was not fetched', async () => {
      await expect(
        resolver.resolve({ name: 'hel:99999' }, 'name', { dataType: FieldDataType.ORG_ID }, relations),
      ).rejects.toThrow('Invalid value for field "name": no fetched record has id "hel:99999"');
    });

    it('should index the listing once for org_id values not fetched yet', async () => {
      const indexListing = jest.fn(async () => {
        session.indexRecord({ id: 'hel:02900', name_fi: 'Council' });
        session.listingIndexed = true;
      });
      resolver = new FieldValueResolver(endpoint, client, session, indexListing);

      await expect(
        resolver.resolve({ name: 'hel:02900' }, 'name', { dataType: FieldDataType.ORG_ID }, relations),
      ).resolves.toEqual({
        relation: null,
        value: { id: 'hel:02900', name_fi: 'Council' },
      });
      await expect(
        resolver.resolve({ name: 'hel:99999' }, 'name', { dataType: FieldDataType.ORG_ID }, relations),
      ).rejects.toThrow(FieldValueError);
      expect(indexListing).toHaveBeenCalledTimes(1);
    });
  });

  describe('relations', () => {
    it('should resolve a parent through org_id_regex', async () => {
      const record = { id: 'hel:00001', name_fi: 'Helsinki' };
      session.indexRecord(record);

      const resolved = await resolver.resolve(
        { parents: ['/paatokset/v1/organization/hel%3A00001/'] },
        'parent',
        {
          sourceField: 'parents',
          dataType: FieldDataType.ORG_ID_REGEX,
          pattern: '\\/(\\w+:\\w+)\\/$',
          unquote: true,
          unwrapList: true,
        },
        relations,
      );

      expect(resolved).toEqual({ relation: 'parent', entity: parent });
      expect(relations.importParent).toHaveBeenCalledWith(record);
    });

    it('should hand data_source values to the data source importer', async () => {
      await expect(
        resolver.resolve({ data_source: 'ds' }, 'data_source', {}, relations),
      ).resolves.toEqual({ relation: 'data_source', entity: dataSource });
      expect(relations.importDataSource).toHaveBeenCalledWith('ds');
    });
  });

  describe('buildResourceUrl', () => {
    it.each([
      [
        '/organization/?limit=20&offset=20',
        'http://fake.url/organization/?limit=20&offset=20',
      ],
      ['123', 'http://fake.url/organization/123'],
      [
        'https://identifier-with-host/paatokset/v1/organization/?limit=20',
        'https://identifier-with-host/paatokset/v1/organization/?limit=20',
      ],
    ])('should resolve %s', (resource, expected) => {
      expect(resolver.buildResourceUrl(resource)).toBe(expected);
    });
  });
});
