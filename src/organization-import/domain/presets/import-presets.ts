import {
  FieldDataType,
  ImportConfiguration,
  deepFreeze,
} from '../import-configuration';

export enum ImportPreset {
  PAATOS = 'paatos',
  TPREK = 'tprek',
  OPENAHJO = 'openahjo',
}

export function isImportPreset(name: string): name is ImportPreset {
  return Object.values(ImportPreset).some((preset) => preset === name);
}

/**
 * Open Decision API (paatos) organization endpoint
 */
const paatos: ImportConfiguration = {
  nextKey: 'next',
  resultsKey: 'results',
  hasMeta: false,
  fields: [
    'data_source',
    'origin_id',
    'classification',
    'name',
    'founding_date',
    'dissolution_date',
    'parent',
  ],
  updateFields: [
    'classification',
    'name',
    'founding_date',
    'dissolution_date',
    'parent',
  ],
  fieldConfig: {
    parent: { dataType: FieldDataType.LINK },
    origin_id: { dataType: FieldDataType.STR_LOWER },
  },
  renameDataSource: {},
  defaultDataSource: 'OpenDecisionAPI',
  defaultParentOrganization: null,
  skipClassifications: [],
};

/**
 * Service point register: one unpaginated list, parents by bare id
 */
const tprek: ImportConfiguration = {
  nextKey: null,
  resultsKey: null,
  hasMeta: false,
  fields: ['origin_id', 'classification', 'name', 'parent'],
  updateFields: ['classification', 'name', 'parent'],
  fieldConfig: {
    parent: {
      sourceField: 'parent_id',
      dataType: FieldDataType.VALUE,
      optional: true,
    },
    origin_id: {
      sourceField: 'id',
      dataType: FieldDataType.VALUE,
    },
    classification: {
      sourceField: 'organization_type',
      optional: true,
    },
    name: {
      sourceField: 'name_fi',
      optional: true,
    },
  },
  renameDataSource: {},
  defaultDataSource: 'tprek',
  defaultParentOrganization: 'Pääkaupunkiseudun toimipisterekisteri',
  skipClassifications: [],
};

/**
 * Open Ahjo API: paging under "meta", parents as a list of resource URIs
 * that point at other records of the same listing
 */
const openahjo: ImportConfiguration = {
  nextKey: 'next',
  resultsKey: 'objects',
  hasMeta: true,
  fields: [
    'data_source',
    'origin_id',
    'classification',
    'name',
    'founding_date',
    'dissolution_date',
    'parent',
  ],
  updateFields: [
    'classification',
    'name',
    'founding_date',
    'dissolution_date',
    'parent',
  ],
  fieldConfig: {
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
  },
  renameDataSource: {},
  defaultDataSource: 'OpenAhjoAPI',
  defaultParentOrganization: null,
  skipClassifications: [],
};

export const IMPORT_PRESETS: Readonly<Record<ImportPreset, ImportConfiguration>> =
  deepFreeze({
    [ImportPreset.PAATOS]: paatos,
    [ImportPreset.TPREK]: tprek,
    [ImportPreset.OPENAHJO]: openahjo,
  });
