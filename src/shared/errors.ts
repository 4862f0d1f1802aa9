export enum GenApiErrorCode {
  SPAWN_FAILED = 'SPAWN_FAILED',
  INVALID_GENERATOR_CONFIG = 'INVALID_GENERATOR_CONFIG',
}

export class GenApiError extends Error {
  readonly code: GenApiErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GenApiErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GenApiError';
    this.code = code;
    this.context = context;
  }
}
