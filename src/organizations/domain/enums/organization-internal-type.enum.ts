export enum OrganizationInternalType {
  NORMAL = 'normal',
  AFFILIATED = 'affiliated',
}
