import type { z } from 'zod';

/**
 * InputValidationError
 *
 * Thrown by the boundary parsers when caller-supplied records do not
 * have the expected shape. The originating ZodError is kept as `cause`.
 */
export class InputValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InputValidationError';
  }

  /**
   * Create InputValidationError listing every zod issue as "path: message"
   */
  static fromZodError(context: string, error: z.ZodError): InputValidationError {
    const details = error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return new InputValidationError(`${context}: ${details}`, {
      cause: error,
    });
  }
}
