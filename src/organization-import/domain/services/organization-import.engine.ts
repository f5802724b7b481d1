import { Logger } from '@nestjs/common';
import { DataSource } from '../../../organizations/domain/entities/data-source.entity';
import { OrganizationClass } from '../../../organizations/domain/entities/organization-class.entity';
import {
  NewOrganization,
  Organization,
  OrganizationChanges,
  buildCompositeId,
} from '../../../organizations/domain/entities/organization.entity';
import { OrganizationInternalType } from '../../../organizations/domain/enums/organization-internal-type.enum';
import { HierarchyRepositories } from '../../../organizations/domain/repositories/hierarchy-unit-of-work.port';
import { OrganizationTree } from '../../../organizations/domain/services/organization-tree.domain.service';
import {
  DataImportError,
  FieldValueError,
  InvalidRecordError,
} from '../errors/data-import.errors';
import {
  IDENTITY_FIELDS,
  ImportConfiguration,
  ImportableField,
} from '../import-configuration';
import { ImportSession } from '../import-session';
import { RawRecord, isEmptyValue, isRawRecord } from '../raw-record';
import {
  FieldValueResolver,
  RelationImporters,
  ResolvedFieldValue,
} from './field-value.resolver';
import { RelatedEntityImporter } from './related-entity.importer';

const ISO_DATE = /^(\d{4}-\d{2}-\d{2})(?:$|T|\s)/;

interface ResolvedFields {
  changes: OrganizationChanges;
  classification: OrganizationClass | null;
}

/**
 * Organization Import Engine
 *
 * Imports one record: resolves its identity, serves it from the run cache
 * or creates/updates the stored organization, and recursively imports the
 * parent it references. Parent cycles are cut at the first repeated
 * identity. Callers provide the repositories of the
 * transaction the record runs in.
 */
export class OrganizationImportEngine {
  private readonly logger = new Logger(OrganizationImportEngine.name);

  constructor(
    private readonly configuration: ImportConfiguration,
    private readonly session: ImportSession,
    private readonly resolver: FieldValueResolver,
  ) {}

  async importOrganization(
    input: unknown,
    repositories: HierarchyRepositories,
  ): Promise<Organization | null> {
    if (!isRawRecord(input)) {
      throw new InvalidRecordError(
        `Organization data must be an object, got ${JSON.stringify(input)}`,
      );
    }

    const relations = this.relationsFor(repositories);
    const originId = await this.resolveOriginId(input, relations);
    const dataSource = await this.resolveDataSource(input, relations);

    const cacheKey = `${dataSource.id}:${originId.toLowerCase()}`;
    if (this.session.organizations.has(cacheKey)) {
      return this.session.organizations.get(cacheKey) ?? null;
    }

    // a reference back to a record still being imported resolves to
    // nothing; the outer import of that record completes it
    const cycle = this.session.enter(cacheKey);
    if (cycle) {
      this.logger.warn(
        `Parent reference cycle ${cycle.join(' -> ')}: leaving the reference to ${cacheKey} empty`,
      );
      return null;
    }

    try {
      const existing = await repositories.organizations.findByOrigin(
        originId,
        dataSource.id,
      );
      const organization = existing
        ? await this.update(existing, input, repositories, relations)
        : await this.create(originId, dataSource, input, repositories, relations);

      this.session.organizations.set(cacheKey, organization);
      return organization;
    } finally {
      this.session.leave(cacheKey);
    }
  }

  private async update(
    existing: Organization,
    record: RawRecord,
    repositories: HierarchyRepositories,
    relations: RelationImporters,
  ): Promise<Organization> {
    this.logger.log(`Organization already exists: ${existing.id}`);

    const { changes } = await this.resolveFields(
      this.configuration.updateFields,
      record,
      existing.originId,
      relations,
    );

    const parentId =
      changes.parentId === undefined ? existing.parentId : changes.parentId;
    const defaultParentId = this.defaultParentFor(existing.id, parentId);
    if (defaultParentId) {
      changes.parentId = defaultParentId;
    }

    return new OrganizationTree(repositories.organizations).update(
      existing,
      changes,
    );
  }

  private async create(
    originId: string,
    dataSource: DataSource,
    record: RawRecord,
    repositories: HierarchyRepositories,
    relations: RelationImporters,
  ): Promise<Organization | null> {
    const { changes, classification } = await this.resolveFields(
      this.configuration.fields,
      record,
      originId,
      relations,
    );

    if (classification && this.isSkipped(classification)) {
      this.logger.log(
        `Skipping ${originId}: classification ${classification.id} is skipped`,
      );
      return null;
    }

    const id = buildCompositeId(dataSource.id, originId);
    const parentId = changes.parentId ?? null;
    const data: NewOrganization = {
      id,
      dataSourceId: dataSource.id,
      originId,
      name: changes.name ?? originId,
      abbreviation: changes.abbreviation ?? null,
      classificationId: changes.classificationId ?? null,
      foundingDate: changes.foundingDate ?? null,
      dissolutionDate: changes.dissolutionDate ?? null,
      internalType: changes.internalType ?? OrganizationInternalType.NORMAL,
      parentId: this.defaultParentFor(id, parentId) ?? parentId,
      replacedById: null,
    };

    const organization = await new OrganizationTree(
      repositories.organizations,
    ).create(data);
    this.logger.log(`Created organization ${organization.id}`);
    return organization;
  }

  private async resolveOriginId(
    record: RawRecord,
    relations: RelationImporters,
  ): Promise<string> {
    const resolved = await this.resolver.resolve(
      record,
      'origin_id',
      this.configuration.fieldConfig.origin_id ?? {},
      relations,
    );
    const value = resolved.relation === null ? resolved.value : null;

    if (typeof value === 'number') {
      return String(value);
    }
    if (typeof value !== 'string' || value.trim() === '') {
      throw new InvalidRecordError(
        `Organization origin id is missing or empty: ${JSON.stringify(value)}`,
      );
    }
    return value;
  }

  /**
   * A failure is tolerated when data_source has no configuration or is
   * optional; the default data source is used then, and for empty values.
   */
  private async resolveDataSource(
    record: RawRecord,
    relations: RelationImporters,
  ): Promise<DataSource> {
    const fieldConfig = this.configuration.fieldConfig.data_source;
    try {
      const resolved = await this.resolver.resolve(
        record,
        'data_source',
        fieldConfig ?? {},
        relations,
      );
      if (resolved.relation === 'data_source') {
        return resolved.entity;
      }
    } catch (error) {
      if (
        !(error instanceof DataImportError) ||
        (fieldConfig && !fieldConfig.optional)
      ) {
        throw error;
      }
      this.logger.debug(`Using the default data source: ${error.message}`);
    }
    return relations.importDataSource(this.configuration.defaultDataSource);
  }

  private async resolveFields(
    fields: readonly ImportableField[],
    record: RawRecord,
    originId: string,
    relations: RelationImporters,
  ): Promise<ResolvedFields> {
    const result: ResolvedFields = { changes: {}, classification: null };

    for (const field of fields) {
      if (IDENTITY_FIELDS.includes(field)) {
        continue;
      }
      const fieldConfig = this.configuration.fieldConfig[field] ?? {};
      let resolved: ResolvedFieldValue;
      try {
        resolved = await this.resolver.resolve(
          record,
          field,
          fieldConfig,
          relations,
        );
      } catch (error) {
        if (error instanceof DataImportError && fieldConfig.optional) {
          this.logger.debug(
            `Skipping optional field "${field}" of ${originId}: ${error.message}`,
          );
          continue;
        }
        throw error;
      }
      this.apply(result, field, resolved, originId);
    }
    return result;
  }

  private apply(
    result: ResolvedFields,
    field: ImportableField,
    resolved: ResolvedFieldValue,
    originId: string,
  ): void {
    const { changes } = result;

    if (resolved.relation === 'classification') {
      result.classification = resolved.entity;
      changes.classificationId = resolved.entity.id;
      return;
    }
    if (resolved.relation === 'parent') {
      changes.parentId = resolved.entity ? resolved.entity.id : null;
      return;
    }
    if (resolved.relation === 'data_source') {
      return;
    }

    const value = resolved.value;
    switch (field) {
      case 'classification':
        changes.classificationId = null;
        return;
      case 'parent':
        changes.parentId = null;
        return;
      case 'name':
        changes.name = isEmptyValue(value) ? originId : String(value);
        return;
      case 'abbreviation':
        changes.abbreviation = isEmptyValue(value) ? null : String(value);
        return;
      case 'founding_date':
        changes.foundingDate = this.toDate(field, value);
        return;
      case 'dissolution_date':
        changes.dissolutionDate = this.toDate(field, value);
        return;
      case 'internal_type':
        changes.internalType = this.toInternalType(value);
        return;
    }
  }

  private toDate(field: ImportableField, value: unknown): string | null {
    if (isEmptyValue(value)) {
      return null;
    }
    const match = typeof value === 'string' ? ISO_DATE.exec(value) : null;
    if (!match) {
      throw new FieldValueError(field, value, 'expected a YYYY-MM-DD date');
    }
    return match[1];
  }

  private toInternalType(value: unknown): OrganizationInternalType {
    if (isEmptyValue(value)) {
      return OrganizationInternalType.NORMAL;
    }
    const internalType = Object.values(OrganizationInternalType).find(
      (type) => type === value,
    );
    if (!internalType) {
      throw new FieldValueError(
        'internal_type',
        value,
        `expected one of ${Object.values(OrganizationInternalType).join(', ')}`,
      );
    }
    return internalType;
  }

  private isSkipped(classification: OrganizationClass): boolean {
    return this.configuration.skipClassifications.some(
      (skipped) =>
        skipped === classification.originId || skipped === classification.id,
    );
  }

  /**
   * The default parent's id when it should be attached to the organization
   */
  private defaultParentFor(
    id: Organization['id'],
    parentId: Organization['id'] | null,
  ): Organization['id'] | null {
    const defaultParent = this.session.defaultParent;
    if (
      !this.configuration.defaultParentOrganization ||
      !defaultParent ||
      parentId ||
      id === defaultParent.id
    ) {
      return null;
    }
    return defaultParent.id;
  }

  private relationsFor(repositories: HierarchyRepositories): RelationImporters {
    const related = new RelatedEntityImporter(
      this.configuration,
      this.session,
      repositories,
    );
    return {
      importDataSource: (value) => related.importDataSource(value),
      importClassification: (value) => related.importClassification(value),
      importParent: (value) => this.importParent(value, repositories),
    };
  }

  /**
   * Parents may be referenced by bare origin id
   */
  private importParent(
    value: unknown,
    repositories: HierarchyRepositories,
  ): Promise<Organization | null> {
    if (typeof value === 'string' || typeof value === 'number') {
      const sourceField =
        this.configuration.fieldConfig.origin_id?.sourceField ?? 'origin_id';
      return this.importOrganization({ [sourceField]: value }, repositories);
    }
    return this.importOrganization(value, repositories);
  }
}
