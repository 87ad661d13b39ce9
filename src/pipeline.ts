import { log } from './logger.js';
import { SendError, errorMessage } from './errors.js';
import { filterListings } from './matcher.js';
import { buildDigest, formatRunDate, generateSubject } from './digest.js';
import type { Config } from './config.js';
import type { Mailer } from './emailer.js';
import type { SourceFetcher } from './fetcher.js';
import type { NumericExtractors } from './numeric.js';
import type { DigestGroup, Listing, RunPhase, RunStatus, SourceResult } from './types.js';

export interface SeenHistory {
  contains(id: string): boolean;
  markSeen(ids: Iterable<string>, timestamp: Date, source?: string): void;
  persist(): number;
  readonly size: number;
}

export interface PipelineDeps {
  config: Config;
  store: SeenHistory;
  fetchSource: SourceFetcher;
  /** null runs without sending or recording anything. */
  mailer: Mailer | null;
  extractors?: NumericExtractors;
  now?: () => Date;
}

export interface RunReport extends RunStatus {
  groups: DigestGroup[];
}

function enter(phase: RunPhase): RunPhase {
  log.debug(`Phase ${phase}`);
  return phase;
}

export async function runPipeline(deps: PipelineDeps): Promise<RunReport> {
  const { config, store, fetchSource, mailer } = deps;
  const now = deps.now ?? (() => new Date());
  const startTime = now().getTime();
  const errors: string[] = [];

  let phase = enter('INIT');
  log.info(`Starting rental digest run${mailer ? '' : ' (dry-run mode)'} for ${config.sources.length} sources`);

  phase = enter('LOAD_SEEN');
  log.info(`${store.size} listings already delivered in earlier runs`);

  phase = enter('FETCH_ALL');
  const results: SourceResult[] = [];
  for (const source of config.sources) {
    results.push(await fetchSource(source));
  }
  for (const result of results) {
    if (result.error) {
      log.warn(`Source failed: ${result.error.message}`);
      errors.push(result.error.message);
    }
  }
  const listingsFound = results.reduce((sum, r) => sum + r.listings.length, 0);

  phase = enter('FILTER_ALL');
  const matched = results.map((r) => ({
    source: r.source.name,
    listings: filterListings(r.listings, config.filters, deps.extractors),
  }));
  const listingsMatched = matched.reduce((sum, g) => sum + g.listings.length, 0);

  phase = enter('DIFF_AGAINST_SEEN');
  const reported = new Set<string>();
  const groups: DigestGroup[] = matched.map((group) => {
    const fresh: Listing[] = [];
    for (const listing of group.listings) {
      if (store.contains(listing.url) || reported.has(listing.url)) continue;
      reported.add(listing.url);
      fresh.push(listing);
    }
    log.info(`${group.source}: ${fresh.length} new of ${group.listings.length} matching`);
    return { source: group.source, listings: fresh };
  });

  phase = enter('BUILD_DIGEST');
  const runAt = now();
  const { date, time } = formatRunDate(runAt, config.email.timezone);
  const digest = buildDigest(groups, { date, warnings: errors });

  const finish = (success: boolean, emailSent: boolean): RunReport => ({
    timestamp: runAt.toISOString(),
    success,
    phase,
    sourcesFetched: results.length - results.filter((r) => r.error).length,
    sourcesFailed: results.filter((r) => r.error).length,
    listingsFound,
    listingsMatched,
    listingsNew: digest.count,
    emailSent,
    durationMs: now().getTime() - startTime,
    errors,
    groups,
  });

  phase = enter('SEND_IF_NONEMPTY');
  if (digest.isEmpty) {
    log.info('No new listings — no email sent');
    phase = enter('DONE');
    return finish(true, false);
  }

  if (!mailer) {
    log.info(`Dry-run: ${digest.count} new listings, skipping send and history update`);
    log.info(`\n${digest.text}`);
    phase = enter('DONE');
    return finish(true, false);
  }

  try {
    await mailer.send({ subject: generateSubject(date, time, digest.count), text: digest.text, html: digest.html });
  } catch (err: unknown) {
    const failure = err instanceof SendError ? err : new SendError(errorMessage(err), { cause: err });
    log.error(`${failure.message} — seen history left unchanged, listings will be retried next run`);
    errors.push(failure.message);
    phase = enter('FAILED');
    return finish(false, false);
  }

  phase = enter('PERSIST_SEEN');
  for (const group of groups) {
    store.markSeen(
      group.listings.map((l) => l.url),
      runAt,
      group.source,
    );
  }
  store.persist();

  phase = enter('DONE');
  log.info(`Run complete: ${digest.count} new listings delivered`);
  return finish(true, true);
}
