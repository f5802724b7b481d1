import { Logger } from '@nestjs/common';
import { Command } from 'commander';
import { DataImportError } from '../domain/errors/data-import.errors';
import { ImportPreset } from '../domain/presets/import-presets';
import { OrganizationImporterFactory } from '../organization-importer.factory';

export interface RestImportOptions {
  config?: string;
  renameDataSource: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Run one import. Returns the process exit code.
 */
export async function runRestImport(
  factory: Pick<OrganizationImporterFactory, 'create'>,
  url: string,
  options: RestImportOptions,
  logger: Pick<Logger, 'log' | 'error'> = new Logger('RestImport'),
): Promise<number> {
  try {
    const importer = await factory.create({
      url,
      preset: options.config,
      renameDataSource: options.renameDataSource,
    });
    await importer.importAll();
  } catch (error) {
    if (error instanceof DataImportError) {
      logger.error(`Import failed: ${error.message}`);
      return 1;
    }
    throw error;
  }

  logger.log('Import completed successfully');
  return 0;
}

export function buildRestImportCommand(
  factory: Pick<OrganizationImporterFactory, 'create'>,
  onExit: (code: number) => void,
): Command {
  return new Command('rest-import')
    .description('Import organization data from a REST API endpoint')
    .argument('<url>', 'URL of the organization listing')
    .option(
      '--config <name>',
      `import configuration (${Object.values(ImportPreset).join(', ')})`,
    )
    .option(
      '--rename-data-source <old:new>',
      'rename a data source while importing, may be repeated',
      collect,
      [],
    )
    .action(async (url: string, options: RestImportOptions) => {
      onExit(await runRestImport(factory, url, options));
    });
}
