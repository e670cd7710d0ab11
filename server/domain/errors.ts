/**
 * Failures raised inside a component. Apart from ConfigurationError none of these
 * is allowed to escape its component: each is converted to a documented fallback
 * (a Failure outcome, absent cache, empty embeddings) where it is caught.
 */
export class StartupMatcherError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "StartupMatcherError";
  }
}

export class TransientFetchError extends StartupMatcherError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransientFetchError";
    this.url = url;
    this.status = options.status;
  }
}

export class CacheCorruptError extends StartupMatcherError {
  readonly location: string;

  constructor(location: string, options: { cause?: unknown } = {}) {
    super(`Cache at ${location} is unreadable`, options);
    this.name = "CacheCorruptError";
    this.location = location;
  }
}

export class EmbeddingServiceError extends StartupMatcherError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "EmbeddingServiceError";
  }
}

export class ConfigurationError extends StartupMatcherError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
