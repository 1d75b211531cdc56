export type FieldErrors = Record<string, string[]>;

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    readonly fields?: FieldErrors
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly code: string = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  static forField(field: string, message: string): ValidationError {
    return new ValidationError(message, { [field]: [message] });
  }
}

export class DuplicateIngredientError extends ValidationError {
  readonly code = 'DUPLICATE_INGREDIENT';

  constructor(ingredientId: string) {
    const message = `Ingredient ${ingredientId} is listed more than once`;
    super(message, { ingredients: [message] });
  }
}

export class InvalidImageEncodingError extends ValidationError {
  readonly code = 'INVALID_IMAGE_ENCODING';

  constructor(field: string, reason: string) {
    super(`Invalid image encoding: ${reason}`, { [field]: [reason] });
  }
}

export class AlreadyExistsError extends AppError {
  readonly code = 'ALREADY_EXISTS';
  readonly statusCode = 400;
}

export class InvalidSelfReferenceError extends AppError {
  readonly code = 'INVALID_SELF_REFERENCE';
  readonly statusCode = 400;
}

export class AuthenticationRequiredError extends AppError {
  readonly code: string = 'AUTHENTICATION_REQUIRED';
  readonly statusCode = 401;

  constructor(message = 'Authentication credentials were not provided') {
    super(message);
  }
}

export class InvalidCredentialsError extends AuthenticationRequiredError {
  readonly code = 'INVALID_CREDENTIALS';

  constructor(message = 'Invalid email or password') {
    super(message);
  }
}

export class PermissionDeniedError extends AppError {
  readonly code = 'PERMISSION_DENIED';
  readonly statusCode = 403;
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode: number = 404;
}

/** An edge that was asked to be removed but is not there. */
export class RelationNotFoundError extends NotFoundError {
  readonly statusCode = 400;
}

/** Raised by stores when a unique constraint rejects a write. */
export class UniqueConstraintError extends Error {
  constructor(readonly constraint: string) {
    super(`Unique constraint violated: ${constraint}`);
    this.name = 'UniqueConstraintError';
  }
}
