export class ClauseKitError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'ClauseKitError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends ClauseKitError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class CompileError extends ClauseKitError {
  constructor(message: string, public dialect?: string, cause?: Error) {
    super(message, 'COMPILE_ERROR', cause);
    this.name = 'CompileError';
  }
}

/**
 * Raised when a compiler is asked to render something its dialect has no
 * SQL for, e.g. an upsert on the ANSI compiler.
 */
export class NotImplementedError extends ClauseKitError {
  constructor(feature: string) {
    super(`Feature "${feature}" is not implemented`, 'NOT_IMPLEMENTED');
    this.name = 'NotImplementedError';
  }
}
