#!/usr/bin/env node
import 'dotenv/config';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../../app.module';
import { OrganizationImporterFactory } from '../organization-importer.factory';
import { buildRestImportCommand } from './rest-import.command';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const command = buildRestImportCommand(
      app.get(OrganizationImporterFactory),
      (code) => {
        process.exitCode = code;
      },
    );
    await command.parseAsync(process.argv);
  } finally {
    await app.close();
  }
}

void bootstrap();
