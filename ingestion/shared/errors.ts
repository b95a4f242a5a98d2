/**
 * Error types for the ingestion pipeline.
 *
 * Per-document errors (FetchError, UnreadablePdfError) are recorded and the
 * batch continues. The rest stop a run before it starts.
 */

export class StateCorruptError extends Error {
  readonly statePath: string;

  constructor(statePath: string, cause: unknown) {
    super(`Scrape state at ${statePath} is unreadable: ${describeError(cause)}`);
    this.name = 'StateCorruptError';
    this.statePath = statePath;
  }
}

export type FetchErrorKind = 'transient' | 'permanent';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, kind: FetchErrorKind, message: string, status: number | null = null) {
    super(`${kind === 'permanent' ? 'Permanent' : 'Transient'} fetch failure for ${url}: ${message}`);
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = status;
  }
}

export class UnreadablePdfError extends Error {
  constructor(reason: string) {
    super(`Unreadable PDF: ${reason}`);
    this.name = 'UnreadablePdfError';
  }
}

export class RosterLoadError extends Error {
  constructor(rosterPath: string, cause: unknown) {
    super(`Failed to load member roster from ${rosterPath}: ${describeError(cause)}`);
    this.name = 'RosterLoadError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
