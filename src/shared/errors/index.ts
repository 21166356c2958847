/**
 * Base error for failures the service reports to its callers.
 * `code` is stable and safe to branch on; `message` is for logs.
 */
export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}
