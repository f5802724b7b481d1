import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { ConfigurationError } from '../errors/data-import.errors';
import {
  FieldConfig,
  FieldConfigMap,
  ImportableField,
  ImportConfiguration,
  deepFreeze,
  isImportableField,
} from '../import-configuration';
import {
  IMPORT_PRESETS,
  ImportPreset,
  isImportPreset,
} from '../presets/import-presets';
import {
  FieldConfigDto,
  ImportConfigurationOverrideDto,
} from '../../dto/import-configuration-override.dto';

interface ValidatedOverride {
  override: ImportConfigurationOverrideDto;
  fieldConfig: Map<ImportableField, FieldConfigDto>;
}

/**
 * Builds the immutable configuration of one importer from a preset, an
 * optional override object and an optional "old:new" rename list.
 */
export class ImportConfigurationResolver {
  private static readonly logger = new Logger(ImportConfigurationResolver.name);

  static resolve(
    presetName: string,
    override?: object,
    renameList: readonly string[] = [],
  ): ImportConfiguration {
    if (!isImportPreset(presetName)) {
      throw new ConfigurationError(
        `Unknown import configuration "${presetName}"`,
        [`supported configurations: ${Object.values(ImportPreset).join(', ')}`],
      );
    }

    const base = IMPORT_PRESETS[presetName];
    const merged = override
      ? this.merge(base, this.validateOverride(override))
      : this.copy(base);

    const renames = this.parseRenameList(renameList);
    const configuration = deepFreeze({
      ...merged,
      renameDataSource: { ...merged.renameDataSource, ...renames },
    });

    this.logger.debug(
      `Resolved "${presetName}" configuration: ${JSON.stringify(configuration)}`,
    );
    return configuration;
  }

  /**
   * ["old:new", ...] → { old: "new", ... }
   */
  static parseRenameList(entries: readonly string[]): Record<string, string> {
    const renames: Record<string, string> = {};
    for (const entry of entries) {
      const parts = entry.split(':');
      if (parts.length !== 2 || !parts[0] || !parts[1]) {
        throw new ConfigurationError(
          `Invalid data source rename "${entry}", expected "old:new"`,
        );
      }
      renames[parts[0]] = parts[1];
    }
    return renames;
  }

  /**
   * Top-level keys of the override replace the base's. fieldConfig is
   * rebuilt for the resulting field list only: the override's entry for a
   * field if it has one, else the base's. Entries for unlisted fields are
   * dropped.
   */
  private static merge(
    base: ImportConfiguration,
    { override, fieldConfig: overrideFieldConfig }: ValidatedOverride,
  ): ImportConfiguration {
    const fields = override.fields ?? base.fields;
    const fieldConfig: FieldConfigMap = {};

    for (const field of fields) {
      const entry = overrideFieldConfig.get(field) ?? base.fieldConfig[field];
      if (entry) {
        fieldConfig[field] = this.copyFieldConfig(entry);
      }
    }

    return {
      fields: [...fields],
      updateFields: [...(override.updateFields ?? base.updateFields)],
      fieldConfig,
      nextKey: override.nextKey !== undefined ? override.nextKey : base.nextKey,
      resultsKey:
        override.resultsKey !== undefined
          ? override.resultsKey
          : base.resultsKey,
      hasMeta: override.hasMeta ?? base.hasMeta,
      renameDataSource: override.renameDataSource
        ? this.stringEntries(override.renameDataSource)
        : { ...base.renameDataSource },
      defaultDataSource: override.defaultDataSource ?? base.defaultDataSource,
      defaultParentOrganization:
        override.defaultParentOrganization !== undefined
          ? override.defaultParentOrganization
          : base.defaultParentOrganization,
      skipClassifications: [
        ...(override.skipClassifications ?? base.skipClassifications),
      ],
    };
  }

  private static copy(base: ImportConfiguration): ImportConfiguration {
    const fieldConfig: FieldConfigMap = {};
    for (const field of base.fields) {
      const entry = base.fieldConfig[field];
      if (entry) {
        fieldConfig[field] = this.copyFieldConfig(entry);
      }
    }

    return {
      ...base,
      fields: [...base.fields],
      updateFields: [...base.updateFields],
      fieldConfig,
      renameDataSource: { ...base.renameDataSource },
      skipClassifications: [...base.skipClassifications],
    };
  }

  private static copyFieldConfig(entry: FieldConfig): FieldConfig {
    const copy: FieldConfig = {};
    if (entry.sourceField !== undefined) copy.sourceField = entry.sourceField;
    if (entry.dataType !== undefined) copy.dataType = entry.dataType;
    if (entry.optional !== undefined) copy.optional = entry.optional;
    if (entry.unwrapList !== undefined) copy.unwrapList = entry.unwrapList;
    if (entry.unquote !== undefined) copy.unquote = entry.unquote;
    if (entry.pattern !== undefined) copy.pattern = entry.pattern;
    return copy;
  }

  private static validateOverride(override: object): ValidatedOverride {
    const options = { whitelist: true, forbidNonWhitelisted: true };
    const dto = plainToInstance(ImportConfigurationOverrideDto, override);
    const details = this.describe(validateSync(dto, options));
    const fieldConfig = new Map<ImportableField, FieldConfigDto>();

    for (const [field, entry] of Object.entries(dto.fieldConfig ?? {})) {
      if (!isImportableField(field)) {
        details.push(`fieldConfig.${field}: unknown field`);
        continue;
      }
      if (entry === null || typeof entry !== 'object' || Array.isArray(entry)) {
        details.push(`fieldConfig.${field}: must be an object`);
        continue;
      }
      const fieldDto = plainToInstance(FieldConfigDto, entry);
      details.push(
        ...this.describe(validateSync(fieldDto, options), `fieldConfig.${field}`),
      );
      fieldConfig.set(field, fieldDto);
    }

    for (const [key, value] of Object.entries(dto.renameDataSource ?? {})) {
      if (typeof value !== 'string') {
        details.push(`renameDataSource.${key}: must be a string`);
      }
    }

    if (details.length > 0) {
      throw new ConfigurationError(
        'Invalid import configuration override',
        details,
      );
    }
    return { override: dto, fieldConfig };
  }

  private static stringEntries(
    values: Record<string, unknown>,
  ): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
      if (typeof value === 'string') {
        result[key] = value;
      }
    }
    return result;
  }

  private static describe(errors: ValidationError[], prefix = ''): string[] {
    return errors.flatMap((error) => {
      const path = prefix ? `${prefix}.${error.property}` : error.property;
      const own = Object.values(error.constraints ?? {}).map(
        (constraint) => `${path}: ${constraint}`,
      );
      return [...own, ...this.describe(error.children ?? [], path)];
    });
  }
}
