export type DashboardErrorKind = 'not-found' | 'schema';

export abstract class DashboardError extends Error {
  abstract readonly kind: DashboardErrorKind;
}

/** The data source is missing or could not be read. */
export class DataNotFoundError extends DashboardError {
  readonly kind = 'not-found';

  constructor(readonly source: string, readonly cause?: unknown) {
    super(`Data file '${source}' not found or unreadable.`);
    this.name = 'DataNotFoundError';
  }
}

/** The data source was read but lacks the columns the dashboard needs. */
export class SchemaError extends DashboardError {
  readonly kind = 'schema';

  constructor(readonly missingColumns: string[], detail?: string) {
    super(detail ?? `Missing required column(s): ${missingColumns.join(', ')}`);
    this.name = 'SchemaError';
  }
}

export const isDashboardError = (err: unknown): err is DashboardError =>
  err instanceof DashboardError;
