export class CatalogUnavailableError extends Error {
  code = 'CATALOG_UNAVAILABLE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'CatalogUnavailableError';
  }
}

export class CatalogValidationError extends Error {
  code = 'CATALOG_VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'CatalogValidationError';
  }
}

export class CatalogLoadError extends Error {
  code = 'CATALOG_LOAD_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'CatalogLoadError';
  }
}

export class InvalidProfileError extends Error {
  code = 'INVALID_PROFILE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'InvalidProfileError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
