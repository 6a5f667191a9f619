/**
 * Rigging Kernel — Error Types
 *
 * Every error raised by the pipeline itself extends RiggingError and carries
 * a stable `code`. Errors raised by a target's constructor or operations are
 * never wrapped: they reach the caller unchanged.
 *
 * Build-time errors (MissingTypeAnnotationError, UnknownOperationError) mean
 * no grammar can be derived. UsageError means operator input did not satisfy
 * a grammar; it is always raised before any target is constructed.
 */

import type { ValidationError } from './validation.js';

export type RiggingErrorCode =
  | 'MISSING_TYPE_ANNOTATION'
  | 'UNKNOWN_OPERATION'
  | 'USAGE_ERROR'
  | 'INVALID_MANIFEST';

export class RiggingError extends Error {
  constructor(
    readonly code: RiggingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'RiggingError';
  }
}

/** A constructor parameter declares no semantic type. */
export class MissingTypeAnnotationError extends RiggingError {
  constructor(
    readonly targetId: string,
    readonly parameter: string,
  ) {
    super(
      'MISSING_TYPE_ANNOTATION',
      `Constructor parameter "${parameter}" of target "${targetId}" has no type. ` +
        'A grammar cannot be derived without one.',
    );
    this.name = 'MissingTypeAnnotationError';
  }
}

/** A single-responsibility interface names an operation the target lacks. */
export class UnknownOperationError extends RiggingError {
  constructor(
    readonly targetId: string,
    readonly operation: string,
  ) {
    super('UNKNOWN_OPERATION', `Target "${targetId}" has no operation "${operation}".`);
    this.name = 'UnknownOperationError';
  }
}

/** Operator input does not satisfy the grammar. */
export class UsageError extends RiggingError {
  constructor(message: string) {
    super('USAGE_ERROR', message);
    this.name = 'UsageError';
  }
}

/** A manifest failed structural validation at registration. */
export class InvalidManifestError extends RiggingError {
  constructor(
    readonly targetId: string,
    readonly errors: ReadonlyArray<ValidationError>,
  ) {
    super(
      'INVALID_MANIFEST',
      `Manifest "${targetId}" is invalid:\n` + errors.map((e) => `  - ${e.message}`).join('\n'),
    );
    this.name = 'InvalidManifestError';
  }
}
