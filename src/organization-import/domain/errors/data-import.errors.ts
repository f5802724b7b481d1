/**
 * Import error hierarchy
 *
 * Everything the importer raises on bad input, bad configuration or a
 * failed upstream call extends DataImportError, so callers (the CLI, an
 * optional field in the engine) can catch one type.
 */
export class DataImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataImportError';

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, DataImportError.prototype);
  }
}

export class ConfigurationError extends DataImportError {
  /**
   * Individual problems, one per offending property
   */
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.details = details;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class FieldMissingError extends DataImportError {
  constructor(
    readonly field: string,
    readonly sourceField: string,
  ) {
    super(
      field === sourceField
        ? `Field "${field}" is missing from the record`
        : `Field "${field}" (source "${sourceField}") is missing from the record`,
    );
    this.name = 'FieldMissingError';
    Object.setPrototypeOf(this, FieldMissingError.prototype);
  }
}

export class FieldPatternError extends DataImportError {
  constructor(
    readonly field: string,
    readonly value: string,
    readonly pattern: string,
  ) {
    super(`Value "${value}" of field "${field}" does not match ${pattern}`);
    this.name = 'FieldPatternError';
    Object.setPrototypeOf(this, FieldPatternError.prototype);
  }
}

export class FieldValueError extends DataImportError {
  constructor(
    readonly field: string,
    readonly value: unknown,
    reason: string,
  ) {
    super(`Invalid value for field "${field}": ${reason}`);
    this.name = 'FieldValueError';
    Object.setPrototypeOf(this, FieldValueError.prototype);
  }
}

export class InvalidRecordError extends DataImportError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRecordError';
    Object.setPrototypeOf(this, InvalidRecordError.prototype);
  }
}

/**
 * FetchError - failed GET of a page or linked resource
 *
 * status is null when no response was received (timeout, DNS, refused).
 */
export class FetchError extends DataImportError {
  readonly url: string;
  readonly status: number | null;
  readonly cause: unknown;

  constructor(params: {
    url: string;
    status: number | null;
    message: string;
    cause?: unknown;
  }) {
    super(params.message);
    this.name = 'FetchError';
    this.url = params.url;
    this.status = params.status;
    this.cause = params.cause;
    Object.setPrototypeOf(this, FetchError.prototype);
  }

  /**
   * Create FetchError from a non-2xx fetch Response
   */
  static fromResponse(url: string, response: Response): FetchError {
    return new FetchError({
      url,
      status: response.status,
      message: `GET ${url} failed: ${response.status} ${response.statusText}`.trim(),
    });
  }

  /**
   * Create FetchError from a network/fetch error
   */
  static fromNetworkError(url: string, error: unknown): FetchError {
    const reason = error instanceof Error ? error.message : String(error);
    return new FetchError({
      url,
      status: null,
      message: `GET ${url} failed: ${reason}`,
      cause: error,
    });
  }
}
