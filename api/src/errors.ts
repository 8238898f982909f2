export type Issue = { path: string; message: string };

export class AppError extends Error {
  constructor(
    readonly status: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toBody(): Record<string, unknown> {
    return { detail: this.message };
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    readonly issues: Issue[] = [],
  ) {
    super(422, message);
  }

  override toBody() {
    return { detail: this.message, issues: this.issues };
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message);
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(500, message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Client errors pass through untouched; anything else becomes a 500 naming the operation
export function asFailure(context: string, err: unknown): AppError {
  if (err instanceof AppError && err.status < 500) return err;
  return new AppError(500, `${context}: ${errorMessage(err)}`, { cause: err });
}
