export enum FieldDataType {
  VALUE = 'value',
  STR_LOWER = 'str_lower',
  LINK = 'link',
  REGEX = 'regex',
  ORG_ID = 'org_id',
  ORG_ID_REGEX = 'org_id_regex',
}

export const IMPORTABLE_FIELDS = [
  'origin_id',
  'data_source',
  'classification',
  'name',
  'abbreviation',
  'founding_date',
  'dissolution_date',
  'internal_type',
  'parent',
] as const;

export type ImportableField = (typeof IMPORTABLE_FIELDS)[number];

/**
 * Fields whose value is another entity, imported through the
 * related-entity importer instead of being stored as is
 */
export const RELATION_FIELDS = ['data_source', 'classification', 'parent'] as const;

export type RelationField = (typeof RELATION_FIELDS)[number];

/**
 * Fields that identify a record. They are resolved before the record is
 * looked up, never as part of the create or update field loop.
 */
export const IDENTITY_FIELDS: readonly ImportableField[] = [
  'origin_id',
  'data_source',
];

export function isImportableField(name: string): name is ImportableField {
  return IMPORTABLE_FIELDS.some((field) => field === name);
}

export function isRelationField(name: string): name is RelationField {
  return RELATION_FIELDS.some((field) => field === name);
}

export interface FieldConfig {
  /** record key the value is read from, defaults to the field name */
  sourceField?: string;
  /** defaults to FieldDataType.VALUE */
  dataType?: FieldDataType;
  /** a failure resolving this field skips the field instead of the record */
  optional?: boolean;
  unwrapList?: boolean;
  unquote?: boolean;
  /** for regex and org_id_regex; capture group 1 is the value */
  pattern?: string;
}

export type FieldConfigMap = Partial<Record<ImportableField, FieldConfig>>;

export interface ImportConfiguration {
  fields: ImportableField[];
  updateFields: ImportableField[];
  fieldConfig: FieldConfigMap;
  nextKey: string | null;
  resultsKey: string | null;
  hasMeta: boolean;
  renameDataSource: Record<string, string>;
  defaultDataSource: string;
  defaultParentOrganization: string | null;
  skipClassifications: string[];
}

/**
 * Freezes the configuration and everything it holds
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
