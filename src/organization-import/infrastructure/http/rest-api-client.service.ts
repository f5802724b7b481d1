import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { FetchError } from '../../domain/errors/data-import.errors';
import { JsonHttpClient } from '../../domain/ports/json-http-client.port';

/**
 * REST API Client Service
 *
 * GETs JSON documents with the global fetch. Every request is bounded by
 * IMPORT_HTTP_TIMEOUT_MS and never retried.
 */
@Injectable()
export class RestApiClientService implements JsonHttpClient {
  private readonly logger = new Logger(RestApiClientService.name);
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    this.timeoutMs =
      this.configService.get('organizationImport.httpTimeoutMs', {
        infer: true,
      }) ?? 30000;
  }

  async getJson(url: string): Promise<unknown> {
    const startTime = Date.now();
    this.logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error(
        `GET ${url} failed after ${Date.now() - startTime}ms: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      throw FetchError.fromNetworkError(url, error);
    }

    this.logger.debug(
      `GET ${url} - ${response.status} (${Date.now() - startTime}ms)`,
    );

    if (!response.ok) {
      throw FetchError.fromResponse(url, response);
    }

    const body = await response.text();
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new FetchError({
        url,
        status: response.status,
        message: `GET ${url} returned invalid JSON`,
        cause: error,
      });
    }
  }
}
