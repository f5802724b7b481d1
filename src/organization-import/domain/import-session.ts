import { DataSource } from '../../organizations/domain/entities/data-source.entity';
import { OrganizationClass } from '../../organizations/domain/entities/organization-class.entity';
import { Organization } from '../../organizations/domain/entities/organization.entity';
import { RawRecord, isRawRecord } from './raw-record';

export interface ImportSessionSnapshot {
  dataSources: Map<string, DataSource>;
  organizationClasses: Map<string, OrganizationClass>;
  organizations: Map<string, Organization | null>;
}

/**
 * Run-scoped state of one importer.
 *
 * - dataSources: by final (renamed) identifier
 * - organizationClasses: by composite id
 * - organizations: by "{data source id}:{lowercased origin id}", null for
 *   a skipped record
 * - rawRecords: source records by their "id" key, filled as they are
 *   imported and, on the first unknown reference, from the whole listing
 */
export class ImportSession {
  dataSources = new Map<string, DataSource>();
  organizationClasses = new Map<string, OrganizationClass>();
  organizations = new Map<string, Organization | null>();
  readonly rawRecords = new Map<string, RawRecord>();
  listingIndexed = false;

  defaultParent: Organization | null = null;

  private readonly inProgress: string[] = [];

  indexRecord(record: unknown): void {
    if (!isRawRecord(record)) {
      return;
    }
    const id = record.id;
    if (typeof id === 'string' || typeof id === 'number') {
      this.rawRecords.set(String(id), record);
    }
  }

  /**
   * Returns the chain of identities being imported, ending with key,
   * when key is already among them.
   */
  enter(key: string): string[] | null {
    if (this.inProgress.includes(key)) {
      return [...this.inProgress.slice(this.inProgress.indexOf(key)), key];
    }
    this.inProgress.push(key);
    return null;
  }

  leave(key: string): void {
    const index = this.inProgress.lastIndexOf(key);
    if (index !== -1) {
      this.inProgress.splice(index, 1);
    }
  }

  snapshot(): ImportSessionSnapshot {
    return {
      dataSources: new Map(this.dataSources),
      organizationClasses: new Map(this.organizationClasses),
      organizations: new Map(this.organizations),
    };
  }

  /**
   * Drop everything cached after the snapshot was taken, for use when the
   * transaction that produced those entries rolled back
   */
  restore(snapshot: ImportSessionSnapshot): void {
    this.dataSources = new Map(snapshot.dataSources);
    this.organizationClasses = new Map(snapshot.organizationClasses);
    this.organizations = new Map(snapshot.organizations);
    this.inProgress.length = 0;
  }
}
