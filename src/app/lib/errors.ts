/**
 * Domain errors raised by the services. The RPC layer converts them into
 * TRPCErrors through ErrorHandler.toTRPCError.
 */

export type FieldErrors = Record<string, string[]>;

/**
 * A user-correctable failure. Messages are scoped by field; record-level
 * messages live under `base`.
 */
export class ValidationError extends Error {
  readonly errors: FieldErrors;

  constructor(errors: FieldErrors) {
    super(ValidationError.summarize(errors));
    this.name = 'ValidationError';
    this.errors = errors;
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }

  static base(message: string): ValidationError {
    return new ValidationError({ base: [message] });
  }

  /**
   * "Cannot archive donor with active sponsorships" for base messages,
   * "email is invalid" for field messages.
   */
  static summarize(errors: FieldErrors): string {
    return Object.entries(errors)
      .flatMap(([field, messages]) =>
        messages.map((message) => (field === 'base' ? message : `${field} ${message}`))
      )
      .join(', ');
  }
}

/**
 * A concurrent writer won a race for a uniquely-keyed row.
 */
export class ConflictError extends Error {
  readonly constraint: string;

  constructor(constraint: string, message?: string) {
    super(message ?? `Conflicting write on ${constraint}`);
    this.name = 'ConflictError';
    this.constraint = constraint;
  }
}

export class NotFoundError extends Error {
  readonly resourceType: string;
  readonly resourceId: string | number;

  constructor(resourceType: string, resourceId: string | number) {
    super(`${resourceType} with ID ${resourceId} not found`);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

export function isDomainError(
  error: unknown
): error is ValidationError | ConflictError | NotFoundError {
  return (
    error instanceof ValidationError ||
    error instanceof ConflictError ||
    error instanceof NotFoundError
  );
}

export const DUPLICATE_SUBSCRIPTION_CHILD_MESSAGE =
  'A donation for this subscription and child already exists';
export const EMAIL_TAKEN_MESSAGE = 'has already been taken';
