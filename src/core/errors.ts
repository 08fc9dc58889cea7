/**
 * Base error class for all admission webhook errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class AdmissionError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'AdmissionError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
  }
}

/** A request body that does not have the shape the endpoint accepts. */
export class ValidationError extends AdmissionError {
  constructor(message: string, issues: { path: string; message: string }[]) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context: { issues },
    });
    this.name = 'ValidationError';
  }
}

/** An ApprovalTask body (old or new) that could not be decoded. */
export class DecodeError extends AdmissionError {
  constructor(which: 'old' | 'new', detail: string, issues?: { path: string; message: string }[]) {
    super({
      message: `cannot decode incoming ${which} object: ${detail}`,
      code: 'DECODE_ERROR',
      statusCode: 400,
      context: { object: which, ...(issues && { issues }) },
    });
    this.name = 'DecodeError';
  }
}

/**
 * The requester targeted their own decision field but supplied a value
 * outside the accepted domain.
 */
export class InvalidInputError extends AdmissionError {
  public readonly value: string;

  constructor(value: string) {
    super({
      message: `invalid input value: '${value}'. Supported values are 'approve' or 'reject'`,
      code: 'INVALID_INPUT',
      statusCode: 403,
      context: { value },
    });
    this.name = 'InvalidInputError';
    this.value = value;
  }
}
