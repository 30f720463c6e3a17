import type { Logger } from "pino";
import { FetchError, errorMessage } from "../errors";
import type { ListingPage } from "./types";

/**
 * Headers of a current desktop browser. The broadcaster's site answers
 * default library clients with an error page.
 */
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "nl-NL,nl;q=0.9,en;q=0.8",
};

/**
 * Fetches one listing page. Throws FetchError on network failure, timeout or
 * a non-2xx status. No retries: the scheduler owns retry timing.
 */
export async function fetchListing(
  url: string,
  timeoutMs: number,
  logger: Logger,
): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: { ...BROWSER_HEADERS },
    });
  } catch (err) {
    const message = errorMessage(err);
    logger.warn({ url, error: message }, "listing fetch failed");
    throw new FetchError(`request to ${url} failed: ${message}`, url, {
      cause: err,
    });
  }

  if (!response.ok) {
    logger.warn({ url, status: response.status }, "listing fetch rejected");
    throw new FetchError(
      `HTTP ${response.status}: ${response.statusText}`,
      url,
      { status: response.status },
    );
  }

  try {
    return await response.text();
  } catch (err) {
    throw new FetchError(
      `reading body of ${url} failed: ${errorMessage(err)}`,
      url,
      { cause: err },
    );
  }
}

/**
 * Fetches every listing page in turn. Failed pages are skipped; FetchError
 * is thrown only when none succeeds.
 */
export async function fetchListings(
  urls: ReadonlyArray<string>,
  timeoutMs: number,
  logger: Logger,
): Promise<Array<ListingPage>> {
  const pages: Array<ListingPage> = [];
  const failures: Array<FetchError> = [];

  for (const url of urls) {
    try {
      const html = await fetchListing(url, timeoutMs, logger);
      pages.push({ url, html });
    } catch (err) {
      if (!(err instanceof FetchError)) {
        throw err;
      }
      failures.push(err);
    }
  }

  if (pages.length === 0) {
    const last = failures[failures.length - 1];
    throw new FetchError(
      `all ${urls.length} listing page(s) failed: ${failures
        .map((f) => f.message)
        .join("; ")}`,
      last?.url ?? urls[0] ?? "",
      { status: last?.status ?? undefined, cause: last },
    );
  }

  logger.info(
    { fetched: pages.length, failed: failures.length },
    "listing pages fetched",
  );
  return pages;
}
