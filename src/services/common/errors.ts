export class CatalogLoadError extends Error {
  readonly code = 'catalog_load_failed' as const;

  constructor(
    message: string,
    readonly source: string,
  ) {
    super(message);
    this.name = 'CatalogLoadError';
  }
}

export class EngineConfigurationError extends Error {
  readonly code = 'invalid_configuration' as const;

  constructor(message: string) {
    super(message);
    this.name = 'EngineConfigurationError';
  }
}

export class PatientContextValidationError extends Error {
  readonly code = 'invalid_patient_context' as const;

  constructor(
    message: string,
    readonly issues: string[],
  ) {
    super(message);
    this.name = 'PatientContextValidationError';
  }
}
