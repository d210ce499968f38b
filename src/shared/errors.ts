// ──────────────────────────────────────────
// Error taxonomy
// ──────────────────────────────────────────

export class BoardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Environment is missing or has malformed settings. */
export class ConfigError extends BoardError {}

/** The data source could not be reached or the query failed. */
export class ConnectivityError extends BoardError {}

/** A fetched row carries a malformed numeric or date field. */
export class DataQualityError extends BoardError {}

/** The configured locale or currency cannot be used by Intl. */
export class LocaleResolutionError extends BoardError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
