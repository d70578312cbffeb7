export class OgpError extends Error {
  public readonly code: string;
  public readonly statusCode: number | undefined;

  constructor(message: string, code: string, statusCode?: number) {
    super(message);
    this.name = 'OgpError';
    this.code = code;
    this.statusCode = statusCode;
    Error.captureStackTrace(this, OgpError);
  }
}

export class ValidationError extends OgpError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class ExternalServiceError extends OgpError {
  public readonly service: string;

  constructor(message: string, service: string) {
    super(message, 'EXTERNAL_SERVICE_ERROR', 502);
    this.name = 'ExternalServiceError';
    this.service = service;
  }
}
