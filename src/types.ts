import type { FetchError } from './errors.js';

export interface Source {
  name: string;
  url: string;
  domainHint?: string;
  linkPatterns?: string[];
}

export interface Listing {
  url: string;
  text: string;
  source: string;
  image?: string;
}

export interface SourceResult {
  source: Source;
  listings: Listing[];
  error?: FetchError;
}

export interface DigestGroup {
  source: string;
  listings: Listing[];
}

export type RunPhase =
  | 'INIT'
  | 'LOAD_SEEN'
  | 'FETCH_ALL'
  | 'FILTER_ALL'
  | 'DIFF_AGAINST_SEEN'
  | 'BUILD_DIGEST'
  | 'SEND_IF_NONEMPTY'
  | 'PERSIST_SEEN'
  | 'DONE'
  | 'FAILED';

export interface RunStatus {
  timestamp: string;
  success: boolean;
  phase: RunPhase;
  sourcesFetched: number;
  sourcesFailed: number;
  listingsFound: number;
  listingsMatched: number;
  listingsNew: number;
  emailSent: boolean;
  durationMs: number;
  errors: string[];
}
