import { registerAs } from '@nestjs/config';
import { IsEnum, IsInt, IsOptional, Min } from 'class-validator';
import { OrganizationImportConfig } from './organization-import-config.type';
import { ImportPreset, isImportPreset } from '../domain/presets/import-presets';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  IMPORT_HTTP_TIMEOUT_MS?: number;

  @IsEnum(ImportPreset)
  @IsOptional()
  IMPORT_DEFAULT_PRESET?: ImportPreset;
}

export default registerAs<OrganizationImportConfig>(
  'organizationImport',
  () => {
    validateConfig(process.env, EnvironmentVariablesValidator);

    const preset = process.env.IMPORT_DEFAULT_PRESET;

    return {
      httpTimeoutMs: process.env.IMPORT_HTTP_TIMEOUT_MS
        ? parseInt(process.env.IMPORT_HTTP_TIMEOUT_MS, 10)
        : 30000,
      defaultPreset:
        preset && isImportPreset(preset) ? preset : ImportPreset.PAATOS,
    };
  },
);
