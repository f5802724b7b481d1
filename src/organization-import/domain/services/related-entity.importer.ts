import { Logger } from '@nestjs/common';
import { DataSource } from '../../../organizations/domain/entities/data-source.entity';
import { OrganizationClass } from '../../../organizations/domain/entities/organization-class.entity';
import { HierarchyRepositories } from '../../../organizations/domain/repositories/hierarchy-unit-of-work.port';
import { FieldValueError } from '../errors/data-import.errors';
import { ImportConfiguration } from '../import-configuration';
import { ImportSession } from '../import-session';
import { hasKey, isEmptyValue, isRawRecord } from '../raw-record';

/**
 * Create-or-get of data sources and organization classes referenced by
 * imported records. Bound to the repositories of one transaction.
 */
export class RelatedEntityImporter {
  private readonly logger = new Logger(RelatedEntityImporter.name);

  constructor(
    private readonly configuration: ImportConfiguration,
    private readonly session: ImportSession,
    private readonly repositories: HierarchyRepositories,
  ) {}

  /**
   * Accepts an identifier or an object with `id` and optionally `name` and
   * `user_editable_organizations`
   */
  async importDataSource(value: unknown): Promise<DataSource> {
    let identifier: string;
    let name: string | null = null;
    let userEditableOrganizations = false;

    if (isRawRecord(value)) {
      if (isEmptyValue(value.id)) {
        throw new FieldValueError('data_source', value, 'object has no id');
      }
      identifier = this.identifier('data_source', value.id);
      name = typeof value.name === 'string' && value.name ? value.name : null;
      userEditableOrganizations = value.user_editable_organizations === true;
    } else {
      identifier = this.identifier('data_source', value);
    }

    const id = this.renamed(identifier);
    const cached = this.session.dataSources.get(id);
    if (cached) {
      return cached;
    }

    const dataSource = await this.repositories.dataSources.getOrCreate({
      id,
      name: name ?? id,
      userEditableOrganizations,
    });
    this.logger.debug(`Data source ${dataSource.id} ready`);
    this.session.dataSources.set(id, dataSource);
    return dataSource;
  }

  /**
   * Accepts an identifier or an object with `origin_id` (or `id`) and
   * optionally `data_source` and `name`. "ds:x" identifiers carry their
   * data source; bare ones belong to the default data source.
   */
  async importClassification(value: unknown): Promise<OrganizationClass> {
    let identifier: string;
    let dataSourceValue: unknown = null;
    let name: string | null = null;

    if (isRawRecord(value)) {
      identifier = this.identifier(
        'classification',
        hasKey(value, 'origin_id') ? value.origin_id : value.id,
      );
      dataSourceValue = value.data_source;
      name = typeof value.name === 'string' && value.name ? value.name : null;
    } else {
      identifier = this.identifier('classification', value);
    }

    let originId = identifier;
    const separator = identifier.indexOf(':');
    if (separator !== -1) {
      originId = identifier.slice(separator + 1);
      if (isEmptyValue(dataSourceValue)) {
        dataSourceValue = identifier.slice(0, separator);
      }
    }
    if (isEmptyValue(dataSourceValue)) {
      dataSourceValue = this.configuration.defaultDataSource;
    }

    const dataSource = await this.importDataSource(dataSourceValue);
    const id = `${dataSource.id}:${originId}`;
    const cached = this.session.organizationClasses.get(id);
    if (cached) {
      return cached;
    }

    const organizationClass =
      await this.repositories.organizationClasses.getOrCreate({
        id,
        dataSourceId: dataSource.id,
        originId,
        name: name ?? id,
      });
    this.session.organizationClasses.set(id, organizationClass);
    return organizationClass;
  }

  renamed(identifier: string): string {
    const renames = this.configuration.renameDataSource;
    return hasKey(renames, identifier) ? renames[identifier] : identifier;
  }

  private identifier(field: string, value: unknown): string {
    if (typeof value === 'string' && value !== '') {
      return value;
    }
    if (typeof value === 'number') {
      return String(value);
    }
    throw new FieldValueError(field, value, 'expected an identifier');
  }
}
