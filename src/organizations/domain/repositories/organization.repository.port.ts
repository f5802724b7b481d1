import { NullableType } from '../../../utils/types/nullable.type';
import {
  NewOrganization,
  Organization,
  OrganizationChanges,
} from '../entities/organization.entity';

export type SiblingPosition = Pick<Organization, 'id' | 'siblingOrder'>;

/**
 * Storage for organization nodes.
 *
 * The tree shape (ancestors, descendants) is maintained by the store.
 * Sibling order is only stored here; OrganizationTree decides it.
 */
export abstract class OrganizationRepository {
  abstract findById(id: Organization['id']): Promise<NullableType<Organization>>;

  /**
   * Find by origin id (case-insensitive) within a data source
   */
  abstract findByOrigin(
    originId: string,
    dataSourceId: string | null,
  ): Promise<NullableType<Organization>>;

  /**
   * Children of a parent, ordered by siblingOrder
   */
  abstract findChildren(parentId: Organization['id']): Promise<Organization[]>;

  /**
   * Ancestors ordered from the root down, excluding the node itself
   */
  abstract findAncestors(id: Organization['id']): Promise<Organization[]>;

  /**
   * All descendants, excluding the node itself
   */
  abstract findDescendants(id: Organization['id']): Promise<Organization[]>;

  abstract create(
    data: NewOrganization & Pick<Organization, 'siblingOrder'>,
  ): Promise<Organization>;

  abstract update(
    id: Organization['id'],
    changes: OrganizationChanges,
  ): Promise<Organization>;

  abstract updateSiblingOrder(positions: SiblingPosition[]): Promise<void>;
}
