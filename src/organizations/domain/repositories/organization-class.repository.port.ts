import { NullableType } from '../../../utils/types/nullable.type';
import { OrganizationClass } from '../entities/organization-class.entity';

export abstract class OrganizationClassRepository {
  abstract findById(
    id: OrganizationClass['id'],
  ): Promise<NullableType<OrganizationClass>>;

  /**
   * Return the class with the given composite id, creating it if missing.
   */
  abstract getOrCreate(
    data: Omit<OrganizationClass, 'createdAt' | 'updatedAt'>,
  ): Promise<OrganizationClass>;
}
