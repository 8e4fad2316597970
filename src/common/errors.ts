export class CatalogRequestError extends Error {
  constructor(
    readonly url: string,
    readonly status: number | null,
    message?: string,
  ) {
    super(message ?? `Request to ${url} failed with status ${status ?? 'n/a'}`);
    this.name = 'CatalogRequestError';
  }
}

export class CatalogFormatError extends Error {
  constructor(
    readonly url: string,
    message: string,
  ) {
    super(`Unexpected response from ${url}: ${message}`);
    this.name = 'CatalogFormatError';
  }
}

export class DbError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DbError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
