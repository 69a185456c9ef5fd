/** Base error class for all advisor errors */
export class AdvisorError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AdvisorError';
    this.code = code;
    this.details = options?.details;
  }
}

/** A request field is missing or has the wrong type */
export class InvalidRequestError extends AdvisorError {
  /** Dotted path of the offending field, e.g. `resource_constraints.cpu_utilization` */
  readonly field: string;

  constructor(
    field: string,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super('INVALID_REQUEST', `Invalid request field "${field}": ${message}`, options);
    this.name = 'InvalidRequestError';
    this.field = field;
  }
}

export function isInvalidRequestError(error: unknown): error is InvalidRequestError {
  return error instanceof InvalidRequestError;
}
