/**
 * Domain entity for DataSource
 * The named origin system that organizations and classes are imported from
 */
export interface DataSource {
  id: string;
  name: string;
  userEditableOrganizations: boolean;
}
