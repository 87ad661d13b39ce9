import { log } from './logger.js';
import { FetchError, errorMessage } from './errors.js';
import { extractListings } from './extractor.js';
import type { FetchSettings } from './config.js';
import type { Source, SourceResult } from './types.js';

export type SourceFetcher = (source: Source) => Promise<SourceResult>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function fetchWithRetry(source: Source, settings: FetchSettings): Promise<string> {
  const attempts = settings.retries + 1;
  let lastError: FetchError | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetch(source.url, {
        headers: {
          'User-Agent': settings.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        signal: AbortSignal.timeout(settings.timeoutMs),
      });
      if (response.ok) return await response.text();
      lastError = new FetchError(source.name, `${source.name} returned HTTP ${response.status}`, {
        status: response.status,
      });
      log.warn(`${source.url} returned ${response.status} (attempt ${attempt}/${attempts})`);
    } catch (err: unknown) {
      lastError = new FetchError(source.name, `${source.name} fetch failed: ${errorMessage(err)}`, {
        cause: err,
      });
      log.warn(`${source.url} fetch failed (attempt ${attempt}/${attempts}): ${errorMessage(err)}`);
    }
    if (attempt < attempts) await sleep(settings.retryDelayMs);
  }

  throw lastError ?? new FetchError(source.name, `${source.name} was not fetched`);
}

export function createSourceFetcher(settings: FetchSettings): SourceFetcher {
  return async (source) => {
    log.info(`Fetching ${source.name} (${source.url})...`);

    let html: string;
    try {
      html = await fetchWithRetry(source, settings);
    } catch (err: unknown) {
      const error =
        err instanceof FetchError ? err : new FetchError(source.name, errorMessage(err), { cause: err });
      log.warn(`${source.name}: all attempts failed — contributing no listings this run`);
      return { source, listings: [], error };
    }

    const listings = extractListings(html, source);
    log.info(`${source.name}: ${listings.length} candidate listings extracted`);
    return { source, listings };
  };
}
