/**
 * Error details type
 */
export interface ErrorDetails extends Record<string, unknown> {
  originalError?: string;
}

export type SectionEngineErrorCode =
  | 'INVALID_COORDINATE'
  | 'INVALID_BUFFER_WIDTH'
  | 'DEGENERATE_INPUT'
  | 'TRANSFORM_FAILURE'
  | 'INVALID_CONFIG';

/**
 * Base error class for the section engine
 */
export class SectionEngineError extends Error {
  constructor(
    message: string,
    public readonly code: SectionEngineErrorCode,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = 'SectionEngineError';
  }
}

/**
 * A coordinate is non-finite or outside its system's valid range
 */
export class InvalidCoordinateError extends SectionEngineError {
  constructor(
    message: string,
    public readonly coordinates: { x: number; y: number },
    details?: ErrorDetails
  ) {
    super(message, 'INVALID_COORDINATE', { coordinates, ...details });
    this.name = 'InvalidCoordinateError';
  }
}

export class InvalidBufferWidthError extends SectionEngineError {
  constructor(public readonly halfWidthMeters: number) {
    super(`Buffer half-width must be a positive number of meters, got ${halfWidthMeters}`, 'INVALID_BUFFER_WIDTH', {
      halfWidthMeters
    });
    this.name = 'InvalidBufferWidthError';
  }
}

/**
 * Too few distinct points to derive a line, corridor or ordering
 */
export class DegenerateInputError extends SectionEngineError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'DEGENERATE_INPUT', details);
    this.name = 'DegenerateInputError';
  }
}

export class TransformFailureError extends SectionEngineError {
  constructor(
    message: string,
    public readonly sourceSystem: string,
    public readonly targetSystem: string,
    details?: ErrorDetails
  ) {
    super(message, 'TRANSFORM_FAILURE', { sourceSystem, targetSystem, ...details });
    this.name = 'TransformFailureError';
  }
}

export class EngineConfigError extends SectionEngineError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'INVALID_CONFIG', details);
    this.name = 'EngineConfigError';
  }
}

export type Result<T, E extends SectionEngineError = SectionEngineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends SectionEngineError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Create error details with original error
 */
export function createErrorDetails(originalError: unknown): ErrorDetails {
  return {
    originalError: originalError instanceof Error ? originalError.message : String(originalError)
  };
}
