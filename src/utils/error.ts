export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum TAG_ERROR {
  TAG_NOT_FOUND = "TAG_NOT_FOUND",
  INVALID_START_TAG = "INVALID_START_TAG",
  TAG_OVERFLOW = "TAG_OVERFLOW",
  ENTITY_ALREADY_REGISTERED = "ENTITY_ALREADY_REGISTERED",
  ENTITY_NOT_REGISTERED = "ENTITY_NOT_REGISTERED",
  ENTITY_DETACHED = "ENTITY_DETACHED",
  DUPLICATE_NAME = "DUPLICATE_NAME",
  NAME_NOT_FOUND = "NAME_NOT_FOUND",
  DENSITY_VIOLATION = "DENSITY_VIOLATION",
}

/**
 * Raised by registries and tagged entities. Every category except
 * DENSITY_VIOLATION is a caller mistake; DENSITY_VIOLATION means the
 * registry itself broke and is only checked in dev builds.
 */
export class TagError extends AppError {
  constructor(
    public readonly category: TAG_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(
      message ?? category,
      category !== TAG_ERROR.DENSITY_VIOLATION,
      context,
    );
  }
}

export function is_tag_error(error: unknown): error is TagError {
  return error instanceof TagError;
}
