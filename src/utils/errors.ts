export class ClassificationConfigError extends Error {
  readonly code = 'INVALID_CLASSIFICATION_OPTION';

  constructor(readonly option: string, message: string) {
    super(message);
    this.name = 'ClassificationConfigError';
  }
}

export class DatasetLoadError extends Error {
  readonly code = 'DATASET_LOAD_FAILED';

  constructor(readonly filePath: string, message: string) {
    super(message);
    this.name = 'DatasetLoadError';
  }
}

export class ScrapeError extends Error {
  readonly code = 'SCRAPE_FAILED';

  constructor(message: string, readonly status: number | null = null) {
    super(message);
    this.name = 'ScrapeError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
