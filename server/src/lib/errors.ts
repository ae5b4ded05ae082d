export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ObjectFetchError extends Error {
  constructor(
    message: string,
    readonly bucket: string,
    readonly key: string,
  ) {
    super(message);
    this.name = 'ObjectFetchError';
  }
}

export class TextExtractionError extends Error {
  constructor(
    message: string,
    readonly kind: string,
  ) {
    super(message);
    this.name = 'TextExtractionError';
  }
}

/** Non-2xx response or unusable body from the remote stage service. */
export class AdapterHttpError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = 'AdapterHttpError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
