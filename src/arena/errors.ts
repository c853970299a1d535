/**
 * Skills Arena Errors
 */

export type ArenaErrorKind = 'validation' | 'not_found' | 'policy' | 'transient';

// =============================================================================
// Base Error
// =============================================================================

export abstract class ArenaError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;
  abstract readonly kind: ArenaErrorKind;
  readonly timestamp: number;
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends ArenaError {
  readonly code: string = 'VALIDATION_ERROR';
  readonly httpStatus = 400;
  readonly kind = 'validation';
}

export class InvalidRatingError extends ValidationError {
  override readonly code = 'INVALID_RATING';

  constructor(public readonly rating: unknown) {
    super('Rating must be a number between 0 and 100', { rating });
  }
}

export class InvalidTargetTypeError extends ValidationError {
  override readonly code = 'INVALID_TARGET_TYPE';

  constructor(public readonly targetType: unknown) {
    super(`Invalid target type: ${String(targetType)}`, { targetType });
  }
}

export class InvalidActionError extends ValidationError {
  override readonly code = 'INVALID_ACTION';

  constructor(public readonly action: unknown) {
    super(`Invalid vote action: ${String(action)}`, { action });
  }
}

export class InvalidSortKeyError extends ValidationError {
  override readonly code = 'INVALID_SORT_KEY';

  constructor(public readonly sortKey: unknown) {
    super(`Invalid sort key: ${String(sortKey)}`, { sortKey });
  }
}

// =============================================================================
// Not Found
// =============================================================================

export class NotFoundError extends ArenaError {
  readonly code: string = 'NOT_FOUND';
  readonly httpStatus = 404;
  readonly kind = 'not_found';

  constructor(
    public readonly resource: string,
    public readonly resourceId: string
  ) {
    super(`${resource} not found: ${resourceId}`, { resource, resourceId });
  }
}

export class IdentityNotFoundError extends NotFoundError {
  override readonly code = 'IDENTITY_NOT_FOUND';

  constructor(token: string) {
    super('Agent', token);
  }
}

export class SkillNotFoundError extends NotFoundError {
  override readonly code = 'SKILL_NOT_FOUND';

  constructor(skillId: string) {
    super('Skill', skillId);
  }
}

// =============================================================================
// Policy Errors
// =============================================================================

export class InsufficientUsageError extends ArenaError {
  readonly code = 'INSUFFICIENT_USAGE';
  readonly httpStatus = 403;
  readonly kind = 'policy';

  constructor(
    public readonly required: number,
    public readonly actual: number
  ) {
    super(`Must use skill at least ${required} times before reviewing (current: ${actual})`, {
      required,
      actual,
    });
  }
}

export class DuplicateReviewError extends ArenaError {
  readonly code = 'DUPLICATE_REVIEW';
  readonly httpStatus = 409;
  readonly kind = 'policy';

  constructor(skillId: string, agentId: string) {
    super('You have already reviewed this skill', { skillId, agentId });
  }
}

export class DownloadForbiddenError extends ArenaError {
  readonly code = 'DOWNLOAD_FORBIDDEN';
  readonly httpStatus = 403;
  readonly kind = 'policy';

  constructor(skillId: string, agentId: string) {
    super('Only uploaders may download a private skill', { skillId, agentId });
  }
}

export class VersionConflictError extends ArenaError {
  readonly code = 'VERSION_CONFLICT';
  readonly httpStatus = 409;
  readonly kind = 'policy';

  constructor(
    name: string,
    version: string,
    public readonly conflictWith: string
  ) {
    super(`Version ${version} of ${name} already exists with different content`, {
      name,
      version,
      conflictWith,
    });
  }
}

// =============================================================================
// Storage
// =============================================================================

export class TransientStorageError extends ArenaError {
  readonly code = 'STORAGE_UNAVAILABLE';
  readonly httpStatus = 503;
  readonly kind = 'transient';

  constructor(attempts: number, cause?: unknown) {
    super(`Storage busy after ${attempts} attempts`, {
      attempts,
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });
  }
}
