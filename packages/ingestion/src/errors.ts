interface ErrorDetails {
  cause?: unknown;
}

/** Credential exchange rejected or unreachable. */
export class AuthError extends Error {
  readonly status: number | null;

  constructor(message: string, details: ErrorDetails & { status?: number } = {}) {
    super(message, { cause: details.cause });
    this.name = "AuthError";
    this.status = details.status ?? null;
  }
}

/** Remote listing failed permanently or after the retry budget ran out. */
export class FetchError extends Error {
  readonly status: number | null;

  constructor(message: string, details: ErrorDetails & { status?: number } = {}) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.status = details.status ?? null;
  }
}

export class StoreError extends Error {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = "StoreError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
