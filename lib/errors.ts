/**
 * Fatal input error: a required source is missing or unreadable. Aborts the run.
 */
export class DataLoadError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DataLoadError';
  }
}
