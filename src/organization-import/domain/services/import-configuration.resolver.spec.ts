import { ConfigurationError } from '../errors/data-import.errors';
import { FieldDataType } from '../import-configuration';
import { ImportConfigurationResolver } from './import-configuration.resolver';

describe('ImportConfigurationResolver', () => {
  describe('resolve', () => {
    it('should return the preset when there is no override', () => {
      const configuration = ImportConfigurationResolver.resolve('paatos');

      expect(configuration.nextKey).toBe('next');
      expect(configuration.resultsKey).toBe('results');
      expect(configuration.defaultDataSource).toBe('OpenDecisionAPI');
      expect(configuration.fieldConfig).toEqual({
        origin_id: { dataType: FieldDataType.STR_LOWER },
        parent: { dataType: FieldDataType.LINK },
      });
    });

    it('should resolve the Open Ahjo preset', () => {
      const configuration = ImportConfigurationResolver.resolve('openahjo');

      expect(configuration.hasMeta).toBe(true);
      expect(configuration.resultsKey).toBe('objects');
      expect(configuration.defaultDataSource).toBe('OpenAhjoAPI');
      expect(configuration.fieldConfig).toEqual({
        classification: { sourceField: 'type' },
        name: { sourceField: 'name_fi' },
        origin_id: { dataType: FieldDataType.STR_LOWER },
        parent: {
          sourceField: 'parents',
          dataType: FieldDataType.ORG_ID_REGEX,
          pattern: '\\/(\\w+:\\w+)\\/$',
          optional: true,
          unquote: true,
          unwrapList: true,
        },
      });
    });

    it('should throw ConfigurationError for an unknown preset', () => {
      expect(() => ImportConfigurationResolver.resolve('nope')).toThrow(
        ConfigurationError,
      );
      expect(() => ImportConfigurationResolver.resolve('nope')).toThrow(
        'Unknown import configuration "nope": supported configurations: paatos, tprek, openahjo',
      );
    });

    it('should replace top-level keys with the override', () => {
      const configuration = ImportConfigurationResolver.resolve('paatos', {
        nextKey: null,
        resultsKey: 'items',
        defaultDataSource: 'custom',
        skipClassifications: ['custom:hidden'],
      });

      expect(configuration.nextKey).toBeNull();
      expect(configuration.resultsKey).toBe('items');
      expect(configuration.defaultDataSource).toBe('custom');
      expect(configuration.skipClassifications).toEqual(['custom:hidden']);
      expect(configuration.updateFields).toEqual([
        'classification',
        'name',
        'founding_date',
        'dissolution_date',
        'parent',
      ]);
    });

    it('should rebuild fieldConfig from the override field list', () => {
      const configuration = ImportConfigurationResolver.resolve('paatos', {
        fields: ['origin_id', 'name', 'classification'],
        fieldConfig: {
          name: { sourceField: 'title' },
          parent: { dataType: 'value' },
        },
      });

      expect(configuration.fields).toEqual([
        'origin_id',
        'name',
        'classification',
      ]);
      expect(configuration.fieldConfig).toEqual({
        origin_id: { dataType: FieldDataType.STR_LOWER },
        name: { sourceField: 'title' },
      });
    });

    it('should keep base entries for listed fields the override leaves out', () => {
      const configuration = ImportConfigurationResolver.resolve('tprek', {
        fieldConfig: { name: { sourceField: 'name_sv' } },
      });

      expect(configuration.fieldConfig.name).toEqual({ sourceField: 'name_sv' });
      expect(configuration.fieldConfig.origin_id).toEqual({
        sourceField: 'id',
        dataType: FieldDataType.VALUE,
      });
    });

    it('should throw ConfigurationError for an unknown data type', () => {
      expect(() =>
        ImportConfigurationResolver.resolve('paatos', {
          fieldConfig: { name: { dataType: 'uppercase' } },
        }),
      ).toThrow(/fieldConfig\.name\.dataType: dataType must be one of the following values/);
    });

    it('should throw ConfigurationError for an unknown field name', () => {
      expect(() =>
        ImportConfigurationResolver.resolve('paatos', {
          fields: ['origin_id', 'color'],
        }),
      ).toThrow(ConfigurationError);
      expect(() =>
        ImportConfigurationResolver.resolve('paatos', {
          fieldConfig: { color: { sourceField: 'colour' } },
        }),
      ).toThrow('fieldConfig.color: unknown field');
    });

    it('should throw ConfigurationError for an unknown override key', () => {
      expect(() =>
        ImportConfigurationResolver.resolve('paatos', { next_key: 'next' }),
      ).toThrow(ConfigurationError);
    });

    it('should merge the rename list into renameDataSource', () => {
      const configuration = ImportConfigurationResolver.resolve(
        'paatos',
        { renameDataSource: { a: 'b', c: 'd' } },
        ['c:e', 'helsinki:hel'],
      );

      expect(configuration.renameDataSource).toEqual({
        a: 'b',
        c: 'e',
        helsinki: 'hel',
      });
    });

    it('should freeze the configuration', () => {
      const configuration = ImportConfigurationResolver.resolve('tprek');

      expect(Object.isFrozen(configuration)).toBe(true);
      expect(Object.isFrozen(configuration.fields)).toBe(true);
      expect(Object.isFrozen(configuration.fieldConfig.parent)).toBe(true);
    });

    it('should not share state between resolved configurations', () => {
      const first = ImportConfigurationResolver.resolve('paatos', undefined, [
        'x:y',
      ]);
      const second = ImportConfigurationResolver.resolve('paatos');

      expect(first.renameDataSource).toEqual({ x: 'y' });
      expect(second.renameDataSource).toEqual({});
    });
  });

  describe('parseRenameList', () => {
    it('should parse old:new entries', () => {
      expect(
        ImportConfigurationResolver.parseRenameList(['old:new', 'a:b']),
      ).toEqual({ old: 'new', a: 'b' });
    });

    it.each(['no-colon', 'a:b:c', ':new', 'old:'])(
      'should reject "%s"',
      (entry) => {
        expect(() =>
          ImportConfigurationResolver.parseRenameList([entry]),
        ).toThrow(ConfigurationError);
      },
    );
  });
});
