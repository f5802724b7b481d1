import { Logger } from '@nestjs/common';
import { DataSource } from '../../../organizations/domain/entities/data-source.entity';
import { OrganizationClass } from '../../../organizations/domain/entities/organization-class.entity';
import { Organization } from '../../../organizations/domain/entities/organization.entity';
import {
  ConfigurationError,
  FieldMissingError,
  FieldPatternError,
  FieldValueError,
} from '../errors/data-import.errors';
import {
  FieldConfig,
  FieldDataType,
  ImportableField,
  RelationField,
  isRelationField,
} from '../import-configuration';
import { ImportSession } from '../import-session';
import { JsonHttpClient } from '../ports/json-http-client.port';
import { RawRecord, hasKey, isEmptyValue } from '../raw-record';

/**
 * Handlers for the fields whose value is another entity
 */
export interface RelationImporters {
  importDataSource(value: unknown): Promise<DataSource>;
  importClassification(value: unknown): Promise<OrganizationClass>;
  importParent(value: unknown): Promise<Organization | null>;
}

export type ResolvedFieldValue =
  | { relation: 'data_source'; entity: DataSource }
  | { relation: 'classification'; entity: OrganizationClass }
  | { relation: 'parent'; entity: Organization | null }
  | { relation: null; value: unknown };

const RELATION_HANDLERS: {
  [F in RelationField]: (
    importers: RelationImporters,
    value: unknown,
  ) => Promise<ResolvedFieldValue>;
} = {
  data_source: async (importers, value) => ({
    relation: 'data_source',
    entity: await importers.importDataSource(value),
  }),
  classification: async (importers, value) => ({
    relation: 'classification',
    entity: await importers.importClassification(value),
  }),
  parent: async (importers, value) => ({
    relation: 'parent',
    entity: await importers.importParent(value),
  }),
};

/**
 * Loads every record of the import endpoint into the session's raw record
 * index
 */
export type RecordIndexer = () => Promise<void>;

/**
 * Extracts one field's value from a raw record and applies the configured
 * transforms. Relation fields are handed to the relation importers.
 */
export class FieldValueResolver {
  private readonly logger = new Logger(FieldValueResolver.name);

  constructor(
    private readonly endpoint: string,
    private readonly httpClient: JsonHttpClient,
    private readonly session: ImportSession,
    private readonly indexListing?: RecordIndexer,
  ) {}

  async resolve(
    record: RawRecord,
    fieldName: ImportableField,
    fieldConfig: FieldConfig,
    relations: RelationImporters,
  ): Promise<ResolvedFieldValue> {
    const sourceField = fieldConfig.sourceField ?? fieldName;
    if (!hasKey(record, sourceField)) {
      throw new FieldMissingError(fieldName, sourceField);
    }

    const value = await this.transform(
      record[sourceField],
      fieldName,
      fieldConfig,
    );
    if (isEmptyValue(value) || !isRelationField(fieldName)) {
      return { relation: null, value };
    }
    return RELATION_HANDLERS[fieldName](relations, value);
  }

  /**
   * Absolute URL of a resource given relative to the import endpoint
   */
  buildResourceUrl(resource: string): string {
    return new URL(resource, this.endpoint).toString();
  }

  private async transform(
    raw: unknown,
    fieldName: ImportableField,
    fieldConfig: FieldConfig,
  ): Promise<unknown> {
    let value = raw;

    if (fieldConfig.unwrapList && Array.isArray(value)) {
      if (value.length === 0) {
        return null;
      }
      if (value.length > 1) {
        this.logger.warn(
          `Field "${fieldName}" has ${value.length} values, using the first one`,
        );
      }
      value = value[0];
    }

    if (isEmptyValue(value)) {
      return value;
    }

    if (fieldConfig.unquote && typeof value === 'string') {
      value = this.unquote(value);
    }

    const dataType = fieldConfig.dataType ?? FieldDataType.VALUE;
    switch (dataType) {
      case FieldDataType.VALUE:
        return value;
      case FieldDataType.STR_LOWER:
        return String(value).toLowerCase();
      case FieldDataType.LINK:
        return this.dereference(fieldName, value);
      case FieldDataType.REGEX:
        return this.extract(fieldName, value, fieldConfig.pattern);
      case FieldDataType.ORG_ID:
        return this.lookupRecord(fieldName, value);
      case FieldDataType.ORG_ID_REGEX:
        return this.lookupRecord(
          fieldName,
          this.extract(fieldName, value, fieldConfig.pattern),
        );
      default:
        throw new ConfigurationError(
          `Unknown data type "${String(dataType)}" for field "${fieldName}"`,
          [`supported types: ${Object.values(FieldDataType).join(', ')}`],
        );
    }
  }

  private async dereference(
    fieldName: ImportableField,
    value: unknown,
  ): Promise<unknown> {
    if (typeof value !== 'string') {
      throw new FieldValueError(fieldName, value, 'a link must be a string');
    }
    const url = this.buildResourceUrl(value);
    this.logger.debug(`Following ${fieldName} link ${url}`);
    return this.httpClient.getJson(url);
  }

  private extract(
    fieldName: ImportableField,
    value: unknown,
    pattern: string | undefined,
  ): string {
    const regex = this.compile(fieldName, pattern);
    const text = String(value);
    const match = regex.exec(text);
    if (!match || match[1] === undefined) {
      throw new FieldPatternError(fieldName, text, regex.source);
    }
    return match[1];
  }

  private compile(fieldName: ImportableField, pattern: string | undefined): RegExp {
    if (!pattern) {
      throw new ConfigurationError(
        `Field "${fieldName}" uses a regex data type but has no pattern`,
      );
    }

    let regex: RegExp;
    let groups: number;
    try {
      regex = new RegExp(pattern);
      // an empty alternative always matches, exposing every group
      groups = (new RegExp(`${pattern}|`).exec('')?.length ?? 1) - 1;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        `Invalid pattern for field "${fieldName}": ${reason}`,
      );
    }

    if (groups < 1) {
      throw new ConfigurationError(
        `Pattern for field "${fieldName}" has no capture group: ${pattern}`,
      );
    }
    return regex;
  }

  /**
   * Records not seen yet are looked for in the whole listing once
   */
  private async lookupRecord(
    fieldName: ImportableField,
    value: unknown,
  ): Promise<unknown> {
    const id = String(value);
    let record = this.session.rawRecords.get(id);
    if (!record && this.indexListing && !this.session.listingIndexed) {
      this.logger.debug(`Record "${id}" not fetched yet, indexing the listing`);
      await this.indexListing();
      record = this.session.rawRecords.get(id);
    }
    if (!record) {
      throw new FieldValueError(
        fieldName,
        value,
        `no fetched record has id "${id}"`,
      );
    }
    return record;
  }

  /**
   * Percent-decode; escapes that do not decode stay as they are
   */
  private unquote(value: string): string {
    try {
      return decodeURIComponent(value);
    } catch {
      return value.replace(/(%[0-9A-Fa-f]{2})+/g, (escaped) => {
        try {
          return decodeURIComponent(escaped);
        } catch {
          return escaped;
        }
      });
    }
  }
}
