import { OrganizationInternalType } from '../enums/organization-internal-type.enum';

/**
 * Domain entity for Organization
 * A node in the organization hierarchy
 *
 * NOTE: id is "{dataSourceId}:{originId}", assigned once when the
 * organization is created. It is never recomputed, even if the data
 * source or origin id change afterwards.
 */
export interface Organization {
  id: string;
  dataSourceId: string | null;
  originId: string;
  name: string;
  abbreviation: string | null;
  classificationId: string | null;
  foundingDate: string | null; // YYYY-MM-DD
  dissolutionDate: string | null; // YYYY-MM-DD
  internalType: OrganizationInternalType;
  parentId: string | null;
  replacedById: string | null;
  siblingOrder: number; // position among the children of parentId
  createdAt: Date;
  updatedAt: Date;
}

export type NewOrganization = Omit<
  Organization,
  'siblingOrder' | 'createdAt' | 'updatedAt'
>;

export type OrganizationChanges = Partial<
  Omit<Organization, 'id' | 'siblingOrder' | 'createdAt' | 'updatedAt'>
>;

export function buildCompositeId(
  dataSourceId: string | null,
  originId: string,
): string {
  return `${dataSourceId}:${originId}`;
}
