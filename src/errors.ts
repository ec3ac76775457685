export type ShowSettingsErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'INVALID_LOCATION'
  | 'UNSUPPORTED_LANGUAGE'
  | 'VALIDATION'
  | 'TIMEOUT'
  | 'PERSISTENCE';

export class ShowSettingsError extends Error {
  constructor(
    message: string,
    readonly code: ShowSettingsErrorCode,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ShowNotFoundError extends ShowSettingsError {
  constructor(readonly showId: number) {
    super(`Show ${showId} not found`, 'NOT_FOUND', 404);
  }
}

export class ShowAlreadyExistsError extends ShowSettingsError {
  constructor(readonly showId: number) {
    super(`Show ${showId} is already in the library`, 'ALREADY_EXISTS', 409);
  }
}

export class InvalidLocationError extends ShowSettingsError {
  constructor(readonly location: string, reason: string) {
    super(`Invalid location "${location}": ${reason}`, 'INVALID_LOCATION', 400);
  }
}

export class UnsupportedLanguageError extends ShowSettingsError {
  constructor(readonly language: string) {
    super(`Language "${language}" is not supported by the indexer`, 'UNSUPPORTED_LANGUAGE', 400);
  }
}

export type FieldErrors = Record<string, string>;

export class FormValidationError extends ShowSettingsError {
  constructor(readonly fields: FieldErrors) {
    super(
      `Invalid form fields: ${Object.entries(fields)
        .map(([field, message]) => `${field} (${message})`)
        .join(', ')}`,
      'VALIDATION',
      400
    );
  }
}

export class OperationTimeoutError extends ShowSettingsError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504);
  }
}

export class PersistenceError extends ShowSettingsError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE', 500);
    this.cause = cause;
  }
}
