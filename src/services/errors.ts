/** The inference endpoint could not be reached or answered with a non-success status. */
export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
