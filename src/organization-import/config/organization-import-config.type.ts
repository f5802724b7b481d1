import { ImportPreset } from '../domain/presets/import-presets';

export type OrganizationImportConfig = {
  httpTimeoutMs: number;
  defaultPreset: ImportPreset;
};
