/**
 * Rigging Kernel — Validation Result Types
 *
 * Validation that can collect several problems returns a ValidationResult
 * instead of throwing on the first one.
 */

export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
