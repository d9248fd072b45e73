/**
 * PatternCompileError
 *
 * Thrown when one of the fixed caption patterns cannot be compiled.
 * Raised while the module loads; it points at a broken pattern constant,
 * never at input data.
 */
export class PatternCompileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PatternCompileError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PatternCompileError from unknown error with context
   */
  static fromError(context: string, error: unknown): PatternCompileError {
    return new PatternCompileError(
      `${context}: ${PatternCompileError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
