import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import {
  FieldDataType,
  IMPORTABLE_FIELDS,
  ImportableField,
} from '../domain/import-configuration';

export class FieldConfigDto {
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  sourceField?: string;

  @IsEnum(FieldDataType)
  @IsOptional()
  dataType?: FieldDataType;

  @IsBoolean()
  @IsOptional()
  optional?: boolean;

  @IsBoolean()
  @IsOptional()
  unwrapList?: boolean;

  @IsBoolean()
  @IsOptional()
  unquote?: boolean;

  @IsString()
  @IsOptional()
  pattern?: string;
}

/**
 * Caller overrides on top of a preset. Every property replaces the preset's
 * value; fieldConfig is merged per field (see ImportConfigurationResolver).
 */
export class ImportConfigurationOverrideDto {
  @IsArray()
  @IsIn(IMPORTABLE_FIELDS, { each: true })
  @IsOptional()
  fields?: ImportableField[];

  @IsArray()
  @IsIn(IMPORTABLE_FIELDS, { each: true })
  @IsOptional()
  updateFields?: ImportableField[];

  // entries are validated one by one as FieldConfigDto
  @IsObject()
  @IsOptional()
  fieldConfig?: Record<string, unknown>;

  // null is a valid override for the two keys below
  @IsString()
  @IsOptional()
  nextKey?: string | null;

  @IsString()
  @IsOptional()
  resultsKey?: string | null;

  @IsBoolean()
  @IsOptional()
  hasMeta?: boolean;

  @IsObject()
  @IsOptional()
  renameDataSource?: Record<string, unknown>;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  @IsOptional()
  defaultDataSource?: string;

  @IsString()
  @IsOptional()
  defaultParentOrganization?: string | null;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  skipClassifications?: string[];
}
