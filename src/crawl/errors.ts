export class FieldExtractionError extends Error {
  constructor(readonly field: string, detail: string) {
    super(`Failed to extract ${field}: ${detail}`);
    this.name = 'FieldExtractionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function summarize(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/**
 * Error text for the crawl error log: name and message, followed by the cause chain.
 * Contains no stack frames.
 */
export function describeError(err: unknown): string {
  const parts = [summarize(err)];
  const seen = new Set<unknown>([err]);
  let cause = err instanceof Error ? err.cause : undefined;

  while (cause !== undefined && !seen.has(cause)) {
    parts.push(summarize(cause));
    seen.add(cause);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return parts.join(', caused by ');
}

/** Stack for logging; falls back to describeError when there is none. */
export function errorStack(err: unknown): string {
  return err instanceof Error && err.stack ? err.stack : describeError(err);
}
