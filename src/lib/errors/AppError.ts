/**
 * Base class for every error raised by this project.
 * `code` is a stable, machine-readable identifier; `message` is for humans.
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}
