export class GcovsmithError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GcovsmithError';
  }
}

/**
 * The repository root could not be read. Unreadable entries below the root
 * are skipped instead.
 */
export class RepositoryReadError extends GcovsmithError {
  readonly rootPath: string;

  constructor(rootPath: string, message: string) {
    super(message);
    this.name = 'RepositoryReadError';
    this.rootPath = rootPath;
  }
}

export class ModificationError extends GcovsmithError {
  constructor(message: string) {
    super(message);
    this.name = 'ModificationError';
  }
}

export class ReportError extends GcovsmithError {
  constructor(message: string) {
    super(message);
    this.name = 'ReportError';
  }
}

export class ConfigError extends GcovsmithError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ProviderError extends GcovsmithError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'ProviderError';
    this.status = status;
  }

  get isServerError(): boolean {
    return this.status !== null && this.status >= 500 && this.status <= 504;
  }
}

export class RateLimitError extends ProviderError {
  readonly isRateLimit = true;
  readonly retryAfter: number | null;

  constructor(message: string, options: { retryAfter?: number | null } = {}) {
    super(message, 429);
    this.name = 'RateLimitError';
    this.retryAfter = options.retryAfter ?? null;
  }
}
