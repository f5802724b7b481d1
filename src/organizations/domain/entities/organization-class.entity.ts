/**
 * Domain entity for OrganizationClass
 * An organization category (e.g. committee), namespaced per data source
 *
 * NOTE: id is "{dataSourceId}:{originId}" and is fixed at creation
 */
export interface OrganizationClass {
  id: string;
  dataSourceId: string | null;
  originId: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}
