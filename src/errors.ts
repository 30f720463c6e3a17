/**
 * Raised by the fetcher when a listing page cannot be retrieved: network
 * failure, timeout, or a non-2xx response.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(
    message: string,
    url: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "FetchError";
    this.url = url;
    this.status = options?.status ?? null;
  }
}

/**
 * Raised when the feed document cannot be serialized. Points at a defect in
 * the builder rather than at the source site.
 */
export class BuildError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "BuildError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
