export class PromptrailError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = 'PromptrailError';
  }
}

/** The durable store is unreachable or a write failed. Never retried. */
export class StorageError extends PromptrailError {
  constructor(
    message: string,
    public operation?: string,
  ) {
    super(message, 'STORAGE_ERROR');
    this.name = 'StorageError';
  }
}

export class NotFoundError extends PromptrailError {
  constructor(
    message: string,
    public entity: 'prompt' | 'session' | 'repository',
    public id: string,
  ) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** A path does not resolve to any git repository. */
export class ResolutionError extends PromptrailError {
  constructor(public path: string) {
    super(`Not inside a git repository: ${path}`, 'RESOLUTION_ERROR');
    this.name = 'ResolutionError';
  }
}

export class ConfigError extends PromptrailError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
