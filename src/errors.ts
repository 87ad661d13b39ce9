export class DigestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Configuration is missing, unreadable or fails validation. Fatal before any fetch. */
export class ConfigError extends DigestError {}

/** One source could not be fetched. The run continues without it. */
export class FetchError extends DigestError {
  readonly source: string;
  readonly status: number | undefined;

  constructor(source: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.source = source;
    this.status = options?.status;
  }
}

/** The digest was built but not delivered. The seen history must not be committed. */
export class SendError extends DigestError {}

/** The persisted history could not be read. Logged; the run starts from an empty history. */
export class StoreLoadError extends DigestError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
